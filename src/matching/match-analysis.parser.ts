import { isRecord } from "../profiles/profile.schemas";
import { ValidationError } from "../shared/errors";
import {
  CategoryScoreInput,
  CategoryScoreInputs,
  MATCH_CATEGORIES,
  MatchCategory,
  UpstreamMatchAnalysis,
} from "../shared/types/match.types";
import { clampScore, round2 } from "./scoring/category-match";

const MAX_ANNOTATIONS = 12;

/**
 * Accepts both generator conventions: `overall_match_score` (0-1) with
 * `<category>_match` breakdowns, or `match_score` (0-100) with a `categories`
 * map. The overall key decides the scale of every score in the document.
 */
export function parseUpstreamMatchAnalysis(raw: unknown): UpstreamMatchAnalysis {
  if (!isRecord(raw)) {
    throw new ValidationError("Match analysis must be a JSON object");
  }

  const scale: UpstreamMatchAnalysis["scale"] =
    raw.overall_match_score !== undefined && raw.match_score === undefined ? "unit" : "percent";
  const notes: string[] = [];
  const categories: CategoryScoreInputs = {};

  for (const category of MATCH_CATEGORIES) {
    const entry = readCategoryEntry(raw, category);
    if (entry === undefined) {
      continue;
    }
    categories[category] = toCategoryInput(category, entry, scale, notes);
  }

  const reportedOverallScore = normalizeOverallScore(raw);
  if (reportedOverallScore !== null) {
    notes.push(
      `Upstream overall score ${reportedOverallScore} is informational; the overall score is derived from category scores.`,
    );
  }

  return { categories, reportedOverallScore, scale, notes };
}

/** Either overall convention as a 0-100 integer. */
export function normalizeOverallScore(raw: Record<string, unknown>): number | null {
  const percent = toFiniteNumber(raw.match_score);
  if (percent !== null) {
    return Math.round(clampScore(percent));
  }
  const unit = toFiniteNumber(raw.overall_match_score);
  if (unit !== null) {
    return Math.round(clampScore(unit * 100));
  }
  return null;
}

function readCategoryEntry(raw: Record<string, unknown>, category: MatchCategory): unknown {
  const nested = raw.categories;
  if (isRecord(nested) && nested[category] !== undefined) {
    return nested[category];
  }
  return raw[`${category}_match`];
}

function toCategoryInput(
  category: MatchCategory,
  entry: unknown,
  scale: UpstreamMatchAnalysis["scale"],
  notes: string[],
): CategoryScoreInput {
  const source = isRecord(entry) ? entry : { score: entry };
  const rawScore = toFiniteNumber(source.score);
  const matches = toAnnotations(source.matches ?? source.details);
  const gaps = toAnnotations(source.gaps ?? source.missing);

  if (rawScore === null) {
    notes.push(`The ${category} score ${JSON.stringify(source.score ?? null)} is not numeric; category treated as not assessed.`);
    return { score: Number.NaN, matches, gaps };
  }

  const scaled = scale === "unit" ? rawScore * 100 : rawScore;
  if (scaled < 0 || scaled > 100) {
    notes.push(`The ${category} score ${rawScore} is out of range and was clamped.`);
  }
  return { score: round2(clampScore(scaled)), matches, gaps };
}

function toAnnotations(value: unknown): string[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value
    .map((item) => (typeof item === "string" ? item.replace(/\s+/g, " ").trim() : ""))
    .filter((item) => Boolean(item))
    .slice(0, MAX_ANNOTATIONS);
}

function toFiniteNumber(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === "string" && value.trim()) {
    const numeric = Number(value.trim().replace(/%$/, ""));
    return Number.isFinite(numeric) ? numeric : null;
  }
  return null;
}
