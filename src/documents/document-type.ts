import { extname } from "node:path";
import { DocumentType } from "../shared/types/domain.types";

export const PDF_CONTENT_TYPE = "application/pdf";
export const DOCX_CONTENT_TYPE =
  "application/vnd.openxmlformats-officedocument.wordprocessingml.document";

export function detectDocumentType(fileName: string): DocumentType {
  const extension = extname(fileName).toLowerCase();
  if (extension === ".pdf") {
    return "pdf";
  }
  if (extension === ".docx") {
    return "docx";
  }
  return "unknown";
}

export function contentTypeFor(type: DocumentType): string {
  if (type === "pdf") {
    return PDF_CONTENT_TYPE;
  }
  if (type === "docx") {
    return DOCX_CONTENT_TYPE;
  }
  return "application/octet-stream";
}
