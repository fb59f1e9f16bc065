import { clampScore, round2 } from "../matching/scoring/category-match";
import {
  ASSESSMENT_CATEGORIES,
  AssessmentCategory,
  AssessmentQuestion,
  AssessmentReport,
  CategoryBreakdown,
} from "../shared/types/assessment.types";

export const DEFAULT_PASS_THRESHOLD = 60;

export interface ScoreAssessmentOptions {
  passThreshold?: number;
}

export function scoreAssessment(
  questions: ReadonlyArray<AssessmentQuestion>,
  options: ScoreAssessmentOptions = {},
): AssessmentReport {
  const passThreshold = options.passThreshold ?? DEFAULT_PASS_THRESHOLD;
  const notes: string[] = [];
  const normalizedQuestions = questions.map(normalizeQuestion);

  const categories: CategoryBreakdown[] = [];
  for (const category of ASSESSMENT_CATEGORIES) {
    const inCategory = normalizedQuestions.filter((question) => question.category === category);
    if (inCategory.length === 0) {
      continue;
    }
    const total = inCategory.reduce((sum, question) => sum + (question.score ?? 0), 0);
    categories.push({
      category,
      average: round2(total / inCategory.length),
      question_count: inCategory.length,
      unanswered_count: inCategory.filter((question) => question.score === null).length,
    });
  }

  const categoryAverages: Partial<Record<AssessmentCategory, number>> = {};
  for (const item of categories) {
    categoryAverages[item.category] = item.average;
  }

  if (categories.length === 0) {
    notes.push("The assessment contains no questions; all scores are 0.");
  }
  const overallScore =
    categories.length === 0
      ? 0
      : round2(categories.reduce((sum, item) => sum + item.average, 0) / categories.length);

  const unansweredCount = categories.reduce((sum, item) => sum + item.unanswered_count, 0);
  if (unansweredCount > 0) {
    notes.push(`${unansweredCount} question(s) had no answer and count as 0.`);
  }

  return {
    category_averages: categoryAverages,
    categories,
    overall_score: overallScore,
    status: overallScore >= passThreshold ? "PASS" : "FAIL",
    pass_threshold: passThreshold,
    technical_rating: computeTechnicalRating(categoryAverages, notes),
    passion_rating: computePassionRating(normalizedQuestions, notes),
    strongest_category: pickCategory(categories, (candidate, best) => candidate > best),
    weakest_category: pickCategory(categories, (candidate, best) => candidate < best),
    unanswered_count: unansweredCount,
    questions: normalizedQuestions,
    data_quality_notes: notes,
  };
}

function normalizeQuestion(question: AssessmentQuestion): AssessmentQuestion {
  const score =
    typeof question.score === "number" && Number.isFinite(question.score)
      ? round2(clampScore(question.score))
      : null;
  return {
    id: question.id,
    category: question.category,
    score,
    feedback: question.feedback,
    passion_score:
      typeof question.passion_score === "number" && Number.isFinite(question.passion_score)
        ? clamp01(question.passion_score)
        : null,
  };
}

function computeTechnicalRating(
  averages: Partial<Record<AssessmentCategory, number>>,
  notes: string[],
): number {
  const technical = [averages.coding, averages.system_design].filter(
    (value): value is number => value !== undefined,
  );
  if (technical.length === 0) {
    notes.push("No coding or system design questions; technical rating is 0.");
    return 0;
  }
  const mean = technical.reduce((sum, value) => sum + value, 0) / technical.length;
  return round2(mean / 100);
}

/** Averages the per-answer passion signal supplied upstream; it does not judge answers itself. */
function computePassionRating(questions: ReadonlyArray<AssessmentQuestion>, notes: string[]): number {
  const behavioral = questions.filter((question) => question.category === "behavioral");
  if (behavioral.length === 0) {
    notes.push("No behavioral questions; passion rating is 0.");
    return 0;
  }
  const signals = behavioral
    .map((question) => question.passion_score)
    .filter((value): value is number => typeof value === "number");
  if (signals.length === 0) {
    notes.push("Behavioral answers carry no passion signal; passion rating is 0.");
    return 0;
  }
  return round2(signals.reduce((sum, value) => sum + value, 0) / signals.length);
}

/** Walks categories in priority order; a later category wins only on a strict improvement. */
function pickCategory(
  categories: ReadonlyArray<CategoryBreakdown>,
  isBetter: (candidate: number, best: number) => boolean,
): AssessmentCategory | null {
  let best: CategoryBreakdown | null = null;
  for (const item of categories) {
    if (!best || isBetter(item.average, best.average)) {
      best = item;
    }
  }
  return best ? best.category : null;
}

function clamp01(value: number): number {
  if (value < 0) {
    return 0;
  }
  if (value > 1) {
    return 1;
  }
  return value;
}
