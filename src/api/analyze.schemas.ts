import { AnalysisRequest } from "../analysis/analysis.service";
import { RequestValidationError, ValidationIssue } from "../shared/errors";

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Validates a decoded `/api/analyze` body. Collects every issue before throwing. */
export function parseAnalyzeRequest(body: Record<string, unknown>): AnalysisRequest {
  const issues: ValidationIssue[] = [];
  const keywords = readKeywords(body.keywords, issues);
  const limit = readInteger(body.limit, "limit", 1, "Expected a positive integer", issues);
  const minScore = readInteger(
    body.minScore,
    "minScore",
    0,
    "Expected a non-negative integer",
    issues,
  );

  if (issues.length > 0) {
    throw new RequestValidationError(issues);
  }

  const request: AnalysisRequest = { keywords };
  if (limit !== undefined) {
    request.limit = limit;
  }
  if (minScore !== undefined) {
    request.minScore = minScore;
  }
  return request;
}

function readKeywords(value: unknown, issues: ValidationIssue[]): string[] {
  if (value === undefined || value === null) {
    issues.push({ path: "keywords", message: "Field required" });
    return [];
  }
  if (!Array.isArray(value)) {
    issues.push({ path: "keywords", message: "Expected a list of strings" });
    return [];
  }

  const keywords: string[] = [];
  value.forEach((item: unknown, index) => {
    if (typeof item === "string") {
      keywords.push(item);
      return;
    }
    issues.push({ path: `keywords.${index}`, message: "Expected a string" });
  });
  return keywords;
}

function readInteger(
  value: unknown,
  path: string,
  minimum: number,
  message: string,
  issues: ValidationIssue[],
): number | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== "number" || !Number.isInteger(value) || value < minimum) {
    issues.push({ path, message });
    return undefined;
  }
  return value;
}
