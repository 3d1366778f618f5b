import { readFile } from "node:fs/promises";
import mammoth from "mammoth";
import pdfParse from "pdf-parse";
import { Logger } from "../config/logger";
import { DocumentType } from "../shared/types/domain.types";

/** Keeps line breaks so resume sections stay readable; squeezes runs of spaces. */
export function cleanExtractedText(text: string): string {
  return text
    .replace(/\u0000/g, "")
    .replace(/[^\S\n]+/g, " ")
    .replace(/ *\n */g, "\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

export class DocumentService {
  constructor(private readonly logger: Logger) {}

  /** Resolves to null when the file does not exist. */
  async readFile(filePath: string): Promise<Buffer | null> {
    try {
      return await readFile(filePath);
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        return null;
      }
      throw error;
    }
  }

  async extractText(buffer: Buffer, type: DocumentType, source: string): Promise<string> {
    if (type === "unknown") {
      throw new Error(`Unsupported document type for ${source}. Expected PDF or DOCX.`);
    }

    const raw =
      type === "pdf"
        ? (await pdfParse(buffer)).text
        : (await mammoth.extractRawText({ buffer })).value;
    const text = cleanExtractedText(raw);

    this.logger.debug("Document text extracted", { source, type, chars: text.length });
    if (!text) {
      this.logger.warn("Document has no extractable text", { source });
    }
    return text;
  }
}
