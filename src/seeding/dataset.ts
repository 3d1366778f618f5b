import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { parse } from "csv-parse/sync";

export const DATASET_CSV_FILE = "Resume.csv";
export const DATASET_FILES_FOLDER = "data";

export interface DatasetRecord {
  resumeId: string;
  category: string;
  resumeText: string;
  localPdfPath: string;
  storagePath: string;
}

export interface PlaceholderIdentity {
  fullName: string;
  email: string;
  phoneNumber: string;
}

/**
 * Reads `<datasetDir>/Resume.csv` (columns `ID`, `Category`, `Resume_str`; others
 * are ignored). Each record points at `<datasetDir>/data/<Category>/<ID>.pdf`,
 * which may or may not exist.
 */
export async function readDatasetRecords(datasetDir: string): Promise<DatasetRecord[]> {
  const content = await readFile(join(datasetDir, DATASET_CSV_FILE), "utf8");
  return parseDatasetCsv(content, datasetDir);
}

export function parseDatasetCsv(content: string, datasetDir: string): DatasetRecord[] {
  const rows: unknown = parse(content, {
    bom: true,
    columns: true,
    skip_empty_lines: true,
  });
  if (!Array.isArray(rows)) {
    return [];
  }

  return rows.map((row: unknown, index) => {
    const resumeId = isRecord(row) ? cell(row.ID).trim() : "";
    const category = isRecord(row) ? cell(row.Category).trim() : "";
    if (!resumeId || !category) {
      throw new Error(`Dataset record ${index + 1} is missing ID or Category.`);
    }
    return {
      resumeId,
      category,
      resumeText: isRecord(row) ? cell(row.Resume_str) : "",
      localPdfPath: join(datasetDir, DATASET_FILES_FOLDER, category, `${resumeId}.pdf`),
      storagePath: `${category}/${resumeId}.pdf`,
    };
  });
}

export function chunk<T>(items: readonly T[], size: number): T[][] {
  if (!Number.isInteger(size) || size <= 0) {
    throw new Error(`Invalid batch size: ${size}`);
  }
  const batches: T[][] = [];
  for (let start = 0; start < items.length; start += size) {
    batches.push(items.slice(start, start + size));
  }
  return batches;
}

export function placeholderIdentity(category: string, resumeId: string): PlaceholderIdentity {
  const label = category
    .split(/[\s_-]+/)
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(" ");
  const slug = category.toLowerCase().replace(/[^a-z0-9]+/g, "-").replace(/^-+|-+$/g, "");
  // 555-0100 through 555-0199 are reserved for fictional use.
  const lineSuffix = (resumeId.replace(/\D/g, "").slice(-2) || "0").padStart(2, "0");
  return {
    fullName: `${label} Candidate ${resumeId}`,
    email: `candidate.${slug}.${resumeId}@example.com`,
    phoneNumber: `+1-555-01${lineSuffix}`,
  };
}

function cell(value: unknown): string {
  return typeof value === "string" ? value : "";
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
