export interface Candidate {
  id: string;
  name: string;
  /** Plain resume text. `null` or absent when the stored row has none; scored as empty. */
  resumeText?: string | null;
  /** Storage path or URL of the original PDF. Opaque to the ranking engine. */
  pdfReference: string | null;
  email?: string | null;
  phoneNumber?: string | null;
  category?: string | null;
}

export interface KeywordMatch {
  keyword: string;
  count: number;
}

export interface ScoredCandidate {
  candidate: Candidate;
  score: number;
  matches: KeywordMatch[];
}

export type RankedResult = readonly ScoredCandidate[];

export type DocumentType = "pdf" | "docx" | "unknown";
