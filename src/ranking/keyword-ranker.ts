import { InvalidInputError } from "../shared/errors";
import {
  Candidate,
  KeywordMatch,
  RankedResult,
  ScoredCandidate,
} from "../shared/types/domain.types";

interface KeywordMatcher {
  keyword: string;
  pattern: RegExp;
}

interface PreparedKeyword {
  /** Lower-cased form; dedup key and reported label. */
  key: string;
  /** Trimmed, whitespace-collapsed form as the caller wrote it; the pattern is built from this. */
  text: string;
}

// A keyword occurrence must not touch a letter, combining mark, digit or underscore on either side.
const WORD_CHAR_BEFORE = "(?<![\\p{L}\\p{M}\\p{N}_])";
const WORD_CHAR_AFTER = "(?![\\p{L}\\p{M}\\p{N}_])";

/**
 * Ranks candidates by how often the keywords occur in their resume text.
 *
 * Keywords are trimmed, lower-cased and deduplicated first; each unique keyword
 * contributes its number of case-insensitive, whole-word occurrences. Candidates
 * with equal scores keep their input order, and every input candidate appears in
 * the result, including those scoring 0.
 */
export function rankCandidates(
  candidates: readonly Candidate[],
  keywords: readonly string[],
): RankedResult {
  const matchers = prepareKeywords(keywords).map(buildMatcher);

  return candidates
    .map((candidate, index) => ({ index, scored: scoreWithMatchers(candidate, matchers) }))
    .sort((left, right) => right.scored.score - left.scored.score || left.index - right.index)
    .map((entry) => entry.scored);
}

export function scoreCandidate(candidate: Candidate, keywords: readonly string[]): ScoredCandidate {
  return scoreWithMatchers(candidate, prepareKeywords(keywords).map(buildMatcher));
}

export function normalizeKeywords(keywords: unknown): string[] {
  return prepareKeywords(keywords).map((keyword) => keyword.key);
}

export function countKeywordOccurrences(
  text: string | null | undefined,
  keyword: string,
): number {
  const collapsed = collapseWhitespace(keyword);
  if (!collapsed) {
    return 0;
  }
  return countMatches(text, buildMatcher({ key: collapsed.toLowerCase(), text: collapsed }).pattern);
}

function scoreWithMatchers(
  candidate: Candidate,
  matchers: readonly KeywordMatcher[],
): ScoredCandidate {
  const text = candidate.resumeText ?? "";
  const matches: KeywordMatch[] = matchers.map((matcher) => ({
    keyword: matcher.keyword,
    count: countMatches(text, matcher.pattern),
  }));
  const score = matches.reduce((total, match) => total + match.count, 0);
  return { candidate, score, matches };
}

function countMatches(text: string | null | undefined, pattern: RegExp): number {
  if (!text) {
    return 0;
  }
  return text.match(pattern)?.length ?? 0;
}

function prepareKeywords(keywords: unknown): PreparedKeyword[] {
  if (!Array.isArray(keywords)) {
    throw new InvalidInputError("Keywords must be a list of strings.");
  }

  const seen = new Set<string>();
  const prepared: PreparedKeyword[] = [];
  keywords.forEach((keyword: unknown, index) => {
    if (typeof keyword !== "string") {
      throw new InvalidInputError(`Keyword at position ${index} must be a string.`);
    }
    const text = collapseWhitespace(keyword);
    const key = text.toLowerCase();
    if (!key || seen.has(key)) {
      return;
    }
    seen.add(key);
    prepared.push({ key, text });
  });
  return prepared;
}

function collapseWhitespace(keyword: string): string {
  return keyword.trim().replace(/\s+/g, " ");
}

// Built from the caller's characters: lower-casing can change them (U+0130), the `i` flag cannot.
function buildMatcher(keyword: PreparedKeyword): KeywordMatcher {
  const body = keyword.text.split(" ").map(escapeRegExp).join("\\s+");
  return {
    keyword: keyword.key,
    pattern: new RegExp(`${WORD_CHAR_BEFORE}${body}${WORD_CHAR_AFTER}`, "giu"),
  };
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
