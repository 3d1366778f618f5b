import { Logger } from "../config/logger";
import { normalizeKeywords, rankCandidates } from "../ranking/keyword-ranker";
import { StoreUnavailableError } from "../shared/errors";
import { Candidate, KeywordMatch } from "../shared/types/domain.types";
import { ResumeFileService } from "../storage/resume-file.service";

export interface CandidateSource {
  isEnabled(): boolean;
  fetchCandidates(limit?: number): Promise<Candidate[]>;
}

export interface AnalysisRequest {
  keywords: string[];
  limit?: number;
  minScore?: number;
}

export interface AnalysisResultItem {
  id: string;
  name: string;
  score: number;
  email: string | null;
  category: string | null;
  pdfUrl: string | null;
  matches: KeywordMatch[];
}

export interface AnalysisResult {
  results: AnalysisResultItem[];
  total: number;
  keywords: string[];
}

export class AnalysisService {
  constructor(
    private readonly candidateSource: CandidateSource,
    private readonly resumeFileService: ResumeFileService,
    private readonly logger: Logger,
    private readonly fetchLimit: number,
  ) {}

  async analyze(request: AnalysisRequest): Promise<AnalysisResult> {
    if (!this.candidateSource.isEnabled()) {
      throw new StoreUnavailableError();
    }

    const keywords = normalizeKeywords(request.keywords);
    const candidates = await this.candidateSource.fetchCandidates(this.fetchLimit);
    if (candidates.length === 0) {
      this.logger.warn("No resumes found in the database to analyze.");
      return { results: [], total: 0, keywords };
    }
    this.logger.info("Resumes fetched for analysis", { count: candidates.length });

    let ranked = rankCandidates(candidates, keywords);
    const { minScore, limit } = request;
    if (typeof minScore === "number") {
      ranked = ranked.filter((entry) => entry.score >= minScore);
    }
    if (typeof limit === "number") {
      ranked = ranked.slice(0, limit);
    }

    const results = ranked.map(({ candidate, score, matches }) => ({
      id: candidate.id,
      name: candidate.name,
      score,
      email: candidate.email ?? null,
      category: candidate.category ?? null,
      pdfUrl: this.resumeFileService.resolveUrl(candidate.pdfReference),
      matches,
    }));

    this.logger.info("Analysis finished", {
      keywords: keywords.length,
      results: results.length,
      topScore: results[0]?.score ?? 0,
    });

    return { results, total: candidates.length, keywords };
  }
}
