import { setTimeout as sleep } from "node:timers/promises";
import { errorMessage, Logger } from "../config/logger";
import { NewCandidate } from "../db/repositories/candidates.repo";
import { NewResume } from "../db/repositories/resumes.repo";
import { contentTypeFor, detectDocumentType } from "../documents/document-type";
import { DocumentType } from "../shared/types/domain.types";
import { StorageObject } from "../storage/supabase-storage.client";
import { chunk, DatasetRecord, placeholderIdentity } from "./dataset";

export const SEED_BATCH_SIZE = 100;

export interface SeedStorage {
  list(prefix?: string): Promise<StorageObject[]>;
  remove(paths: string[]): Promise<void>;
  upload(path: string, body: Buffer, contentType: string, options: { upsert: boolean }): Promise<void>;
  getPublicUrl(path: string): string;
}

export interface SeedDeps {
  storage: SeedStorage;
  candidates: {
    insertCandidate(input: NewCandidate): Promise<string>;
    deleteAll(): Promise<void>;
  };
  resumes: {
    insertResume(input: NewResume): Promise<void>;
    deleteAll(): Promise<void>;
  };
  documents: {
    readFile(filePath: string): Promise<Buffer | null>;
    extractText(buffer: Buffer, type: DocumentType, source: string): Promise<string>;
  };
  logger: Logger;
  batchSize?: number;
  delayMs?: number;
}

export interface SeedReport {
  total: number;
  seeded: number;
  failed: number;
  uploadsSkipped: number;
}

export class SeedService {
  private readonly batchSize: number;
  private readonly delayMs: number;

  constructor(private readonly deps: SeedDeps) {
    this.batchSize = deps.batchSize ?? SEED_BATCH_SIZE;
    this.delayMs = deps.delayMs ?? 50;
  }

  async clearStorage(): Promise<number> {
    const objects = await this.deps.storage.list();
    const paths: string[] = [];
    for (const object of objects) {
      if (object.id !== null) {
        paths.push(object.name);
        continue;
      }
      const nested = await this.deps.storage.list(object.name);
      paths.push(...nested.map((file) => `${object.name}/${file.name}`));
    }

    if (paths.length === 0) {
      this.deps.logger.info("Storage bucket is already empty.");
      return 0;
    }
    await this.deps.storage.remove(paths);
    this.deps.logger.info("Storage bucket cleared", { files: paths.length });
    return paths.length;
  }

  async clearTables(): Promise<void> {
    // Resumes reference candidates, so they go first.
    await this.deps.resumes.deleteAll();
    await this.deps.candidates.deleteAll();
  }

  async seed(records: readonly DatasetRecord[]): Promise<SeedReport> {
    const report: SeedReport = { total: records.length, seeded: 0, failed: 0, uploadsSkipped: 0 };
    const batches = chunk(records, this.batchSize);
    this.deps.logger.info("Seeding started", { records: records.length, batches: batches.length });

    for (const [batchIndex, batch] of batches.entries()) {
      this.deps.logger.info("Processing batch", {
        batch: batchIndex + 1,
        of: batches.length,
      });
      for (const record of batch) {
        const outcome = await this.seedRecord(record);
        if (outcome === "failed") {
          report.failed += 1;
        } else {
          report.seeded += 1;
          if (outcome === "seeded_without_file") {
            report.uploadsSkipped += 1;
          }
        }
        if (this.delayMs > 0) {
          await sleep(this.delayMs);
        }
      }
    }

    this.deps.logger.info("Seeding complete", { ...report });
    return report;
  }

  private async seedRecord(
    record: DatasetRecord,
  ): Promise<"seeded" | "seeded_without_file" | "failed"> {
    try {
      const file = await this.deps.documents.readFile(record.localPdfPath);
      if (!file) {
        this.deps.logger.warn("PDF not found; skipping file upload", { path: record.localPdfPath });
      }
      const resumeText = await this.resolveText(record, file);

      const identity = placeholderIdentity(record.category, record.resumeId);
      const candidateId = await this.deps.candidates.insertCandidate(identity);

      const pdfUrl = file ? await this.uploadFile(record, file) : null;
      await this.deps.resumes.insertResume({
        candidateId,
        resumeText,
        pdfUrl,
        category: record.category,
      });
      this.deps.logger.debug("Resume seeded", { candidateId, resumeId: record.resumeId });
      return pdfUrl ? "seeded" : "seeded_without_file";
    } catch (error) {
      this.deps.logger.error("Failed to seed resume", {
        resumeId: record.resumeId,
        error: errorMessage(error),
      });
      return "failed";
    }
  }

  /** The dataset's own text wins; the PDF is only read for text when that column is blank. */
  private async resolveText(record: DatasetRecord, file: Buffer | null): Promise<string> {
    if (record.resumeText.trim() || !file) {
      return record.resumeText;
    }
    return this.deps.documents.extractText(
      file,
      detectDocumentType(record.localPdfPath),
      record.localPdfPath,
    );
  }

  private async uploadFile(record: DatasetRecord, file: Buffer): Promise<string | null> {
    try {
      const contentType = contentTypeFor(detectDocumentType(record.localPdfPath));
      await this.deps.storage.upload(record.storagePath, file, contentType, { upsert: true });
      return this.deps.storage.getPublicUrl(record.storagePath);
    } catch (error) {
      this.deps.logger.warn("Upload failed; resume stored without a file link", {
        storagePath: record.storagePath,
        error: errorMessage(error),
      });
      return null;
    }
  }
}
