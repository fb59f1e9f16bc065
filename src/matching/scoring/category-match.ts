import {
  CategoryScore,
  CategoryScoreInputs,
  MATCH_CATEGORIES,
  MatchAnalysis,
  MatchCategory,
  MatchWeights,
} from "../../shared/types/match.types";
import { JobRequirement } from "../../shared/types/profile.types";
import { DEFAULT_MATCH_WEIGHTS } from "../weights";

export const NOT_ASSESSED_GAP = "category not assessed";

const STRENGTH_THRESHOLD = 70;
const MAX_STRENGTHS = 8;
const MAX_AREAS = 10;

export function computeMatch(
  requirement: JobRequirement,
  categoryScores: CategoryScoreInputs,
  weights: MatchWeights = DEFAULT_MATCH_WEIGHTS,
): MatchAnalysis {
  const dataQualityNotes: string[] = [];
  const toCategoryScore = (category: MatchCategory): CategoryScore => {
    const input = categoryScores[category];
    if (!input || !Number.isFinite(input.score)) {
      dataQualityNotes.push(`The ${category} category was not assessed; it counts as 0 pending review.`);
      return {
        category,
        score: 0,
        matches: [],
        gaps: [...cleanList(input?.gaps), NOT_ASSESSED_GAP],
        assessed: false,
      };
    }
    return {
      category,
      score: round2(clampScore(input.score)),
      matches: cleanList(input.matches),
      gaps: cleanList(input.gaps),
      assessed: true,
    };
  };
  const categories: Record<MatchCategory, CategoryScore> = {
    skills: toCategoryScore("skills"),
    experience: toCategoryScore("experience"),
    education: toCategoryScore("education"),
    additional: toCategoryScore("additional"),
  };

  const overallScore = roundHalfUp(
    MATCH_CATEGORIES.reduce((sum, category) => sum + weights[category] * categories[category].score, 0),
  );

  return {
    overall_score: clampScore(overallScore),
    categories,
    recommendation: buildRecommendation(requirement, overallScore),
    key_strengths: MATCH_CATEGORIES.filter(
      (category) => categories[category].assessed && categories[category].score >= STRENGTH_THRESHOLD,
    )
      .flatMap((category) => categories[category].matches)
      .slice(0, MAX_STRENGTHS),
    areas_for_consideration: unique(
      MATCH_CATEGORIES.flatMap((category) =>
        categories[category].gaps.map((gap) => (gap === NOT_ASSESSED_GAP ? `${category}: ${gap}` : gap)),
      ),
    ).slice(0, MAX_AREAS),
    data_quality_notes: dataQualityNotes,
    weights: { ...weights },
  };
}

function buildRecommendation(requirement: JobRequirement, overallScore: number): string {
  if (overallScore >= 70) {
    return `Strong match for ${requirement.title}.`;
  }
  if (overallScore >= 40) {
    return `Partial match for ${requirement.title}; gaps need review.`;
  }
  return `Weak match for ${requirement.title}.`;
}

function cleanList(values: ReadonlyArray<string> | undefined): string[] {
  if (!values) {
    return [];
  }
  return unique(values.map((value) => value.trim()).filter((value) => Boolean(value)));
}

function unique(values: string[]): string[] {
  return Array.from(new Set(values));
}

export function clampScore(value: number): number {
  if (value < 0) {
    return 0;
  }
  if (value > 100) {
    return 100;
  }
  return value;
}

/** Snaps float noise (69.49999999) to six decimals before rounding .5 up. */
export function roundHalfUp(value: number): number {
  return Math.round(Math.round(value * 1e6) / 1e6);
}

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}
