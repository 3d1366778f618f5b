import { Logger } from "../../config/logger";
import { Candidate } from "../../shared/types/domain.types";
import { SupabaseReader, SupabaseWriter } from "../supabase.client";

const RESUMES_TABLE = "resumes";
const CANDIDATE_COLUMNS =
  "id,resume_text,pdf_url,category,candidates(id,full_name,email,phone_number)";

export const DEFAULT_RESUME_FETCH_LIMIT = 3000;

interface CandidateRow {
  id?: unknown;
  full_name?: unknown;
  email?: unknown;
  phone_number?: unknown;
}

interface ResumeRow {
  id?: unknown;
  resume_text?: unknown;
  pdf_url?: unknown;
  category?: unknown;
  candidates?: unknown;
}

export interface NewResume {
  candidateId: string;
  resumeText: string;
  pdfUrl: string | null;
  category: string;
}

export class ResumesRepository {
  constructor(
    private readonly logger: Logger,
    private readonly supabaseClient?: SupabaseReader & SupabaseWriter,
  ) {}

  isEnabled(): boolean {
    return Boolean(this.supabaseClient);
  }

  /**
   * Loads resumes joined with their candidate. Rows without a linked candidate
   * are skipped, since the caller needs a stable identifier for every result.
   */
  async fetchCandidates(limit = DEFAULT_RESUME_FETCH_LIMIT): Promise<Candidate[]> {
    if (!this.supabaseClient) {
      return [];
    }

    const rows = await this.supabaseClient.selectMany(RESUMES_TABLE, {
      columns: CANDIDATE_COLUMNS,
      orderBy: { column: "id" },
      limit,
    });

    const candidates: Candidate[] = [];
    let skipped = 0;
    let nonTextResumes = 0;
    for (const row of rows) {
      const candidate = toCandidate(row);
      if (!candidate) {
        skipped += 1;
        continue;
      }
      // Kept with no text; they score 0 like a missing resume.
      if (isRecord(row) && row.resume_text != null && candidate.resumeText === null) {
        nonTextResumes += 1;
      }
      candidates.push(candidate);
    }

    if (skipped > 0) {
      this.logger.warn("Resumes without a linked candidate were skipped", { skipped });
    }
    this.logger.debug("Resumes fetched from Supabase", {
      rows: rows.length,
      candidates: candidates.length,
      nonTextResumes,
    });
    return candidates;
  }

  async insertResume(input: NewResume): Promise<void> {
    if (!this.supabaseClient) {
      return;
    }
    await this.supabaseClient.insert(RESUMES_TABLE, {
      candidate_id: input.candidateId,
      resume_text: input.resumeText,
      pdf_url: input.pdfUrl,
      category: input.category,
    });
  }

  async deleteAll(): Promise<void> {
    if (!this.supabaseClient) {
      return;
    }
    await this.supabaseClient.deleteWhere(RESUMES_TABLE, {
      column: "id",
      operator: "gt",
      value: -1,
    });
    this.logger.info("All resumes deleted");
  }
}

function toCandidate(value: unknown): Candidate | null {
  if (!isRecord(value)) {
    return null;
  }
  const row: ResumeRow = value;
  const linked = Array.isArray(row.candidates) ? row.candidates[0] : row.candidates;
  if (!isRecord(linked)) {
    return null;
  }
  const candidateRow: CandidateRow = linked;
  const id = toId(candidateRow.id);
  if (!id) {
    return null;
  }

  return {
    id,
    name: toText(candidateRow.full_name) ?? "",
    resumeText: toText(row.resume_text),
    pdfReference: toText(row.pdf_url),
    email: toText(candidateRow.email),
    phoneNumber: toText(candidateRow.phone_number),
    category: toText(row.category),
  };
}

function toId(value: unknown): string | null {
  if (typeof value === "string" && value.trim()) {
    return value.trim();
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  return null;
}

function toText(value: unknown): string | null {
  return typeof value === "string" ? value : null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
