import { clampScore, NOT_ASSESSED_GAP, round2 } from "../matching/scoring/category-match";
import { AssessmentCategory, AssessmentReport } from "../shared/types/assessment.types";
import {
  Decision,
  DecisionRationale,
  DecisionRecommendations,
  DecisionStatus,
  InterviewStage,
} from "../shared/types/decision.types";
import { CategoryScore, MATCH_CATEGORIES, MatchAnalysis } from "../shared/types/match.types";
import { buildNextSteps } from "./next-steps";

export const PROCEED_MIN_SCORE = 70;
export const HOLD_MIN_SCORE = 40;
export const FULL_LOOP_MIN_CONFIDENCE = 85;

const FAULT_PENALTY = 15;
const NOT_ASSESSED_PENALTY = 10;
const GAP_FOCUS_BELOW = 70;
const MAX_ITEMS = 10;

const ASSESSMENT_LABELS: Record<AssessmentCategory, string> = {
  coding: "coding",
  system_design: "system design",
  behavioral: "behavioral",
};

export interface ClassifyDecisionInput {
  analysis: MatchAnalysis;
  assessment?: AssessmentReport | null;
  /** Set when an upstream stage failed and the analysis is a stand-in. */
  errorSignal?: boolean;
  upstreamNotes?: string[];
}

/** Bands are closed below and open above: [70,100] PROCEED, [40,70) HOLD, [0,40) REJECT. */
export function statusForScore(score: number): DecisionStatus {
  if (score >= PROCEED_MIN_SCORE) {
    return "PROCEED";
  }
  if (score >= HOLD_MIN_SCORE) {
    return "HOLD";
  }
  return "REJECT";
}

export function stageFor(status: DecisionStatus, confidence: number): InterviewStage {
  switch (status) {
    case "PROCEED":
      return confidence >= FULL_LOOP_MIN_CONFIDENCE ? "FULL_LOOP" : "TECHNICAL";
    case "HOLD":
      return "SCREENING";
    default:
      return "SKIP";
  }
}

export function classifyDecision(input: ClassifyDecisionInput): Decision {
  const { analysis, assessment } = input;
  const errorSignal = input.errorSignal === true;
  const categories = MATCH_CATEGORIES.map((category) => analysis.categories[category]);
  const notAssessed = categories.filter((item) => !item.assessed);
  const allAssessedZero = notAssessed.length === 0 && categories.every((item) => item.score === 0);
  const noneAssessed = notAssessed.length === categories.length;
  const notes = [...(input.upstreamNotes ?? []), ...analysis.data_quality_notes];

  const score = clampScore(analysis.overall_score);
  let confidence = score;
  if (errorSignal) {
    confidence -= FAULT_PENALTY;
    notes.push(`An upstream processing error was reported; confidence reduced by ${FAULT_PENALTY}.`);
  } else if (allAssessedZero) {
    confidence -= FAULT_PENALTY;
    notes.push(`Every category scored exactly 0, which points to a pipeline fault; confidence reduced by ${FAULT_PENALTY}.`);
  }
  if (notAssessed.length > 0) {
    confidence -= NOT_ASSESSED_PENALTY;
    notes.push(
      `Categories not assessed (${notAssessed.map((item) => item.category).join(", ")}); confidence reduced by ${NOT_ASSESSED_PENALTY}.`,
    );
  }
  confidence = round2(clampScore(confidence));

  let status = statusForScore(score);
  const suspectedFault = errorSignal || allAssessedZero || noneAssessed;
  if (status === "REJECT" && suspectedFault) {
    status = "HOLD";
    notes.push("Status raised from REJECT to HOLD: the score reflects a processing fault or missing data, not an assessed mismatch.");
  }
  if (assessment) {
    notes.push(...assessment.data_quality_notes.map((note) => `Assessment: ${note}`));
  }

  const interviewStage = stageFor(status, confidence);
  const skillsAssessed = analysis.categories.skills.assessed;

  return {
    decision: {
      status,
      confidence_score: confidence,
      interview_stage: interviewStage,
    },
    rationale: buildRationale(categories, assessment ?? null, errorSignal),
    recommendations: buildRecommendations(analysis, categories, assessment ?? null),
    hiring_manager_notes: {
      salary_band_fit: "Not provided",
      growth_trajectory: "Not provided",
      team_fit_considerations: suspectedFault ? "Manual assessment required" : "Not provided",
      onboarding_requirements: skillsAssessed ? analysis.categories.skills.gaps.slice(0, MAX_ITEMS) : [],
    },
    next_steps: buildNextSteps(interviewStage, suspectedFault),
    data_quality_notes: unique(notes),
  };
}

function buildRationale(
  categories: ReadonlyArray<CategoryScore>,
  assessment: AssessmentReport | null,
  errorSignal: boolean,
): DecisionRationale {
  const keyStrengths = categories.filter((item) => item.assessed).flatMap((item) => item.matches);
  const concerns: string[] = [];
  const riskFactors: string[] = [];

  for (const item of categories) {
    if (!item.assessed) {
      riskFactors.push(`${item.category}: ${NOT_ASSESSED_GAP}`);
      continue;
    }
    const target = item.score < HOLD_MIN_SCORE ? riskFactors : concerns;
    target.push(...item.gaps);
  }

  if (assessment) {
    const line = `Technical assessment ${assessment.overall_score}/100 against a pass mark of ${assessment.pass_threshold}`;
    if (assessment.status === "PASS") {
      keyStrengths.push(`${line}: passed`);
    } else {
      riskFactors.push(`${line}: failed`);
    }
    if (assessment.strongest_category) {
      const average = assessment.category_averages[assessment.strongest_category] ?? 0;
      keyStrengths.push(
        `Strongest assessment area: ${ASSESSMENT_LABELS[assessment.strongest_category]} (average ${average}/100)`,
      );
    }
  }
  if (errorSignal) {
    riskFactors.push("Decision based on incomplete information");
  }

  return {
    key_strengths: unique(keyStrengths).slice(0, MAX_ITEMS),
    concerns: unique(concerns).slice(0, MAX_ITEMS),
    risk_factors: unique(riskFactors).slice(0, MAX_ITEMS),
  };
}

function buildRecommendations(
  analysis: MatchAnalysis,
  categories: ReadonlyArray<CategoryScore>,
  assessment: AssessmentReport | null,
): DecisionRecommendations {
  const interviewFocus = categories
    .filter((item) => item.assessed && item.score < GAP_FOCUS_BELOW)
    .flatMap((item) => item.gaps.map((gap) => `Explore ${item.category} gap: ${gap}`));
  if (assessment?.weakest_category) {
    const average = assessment.category_averages[assessment.weakest_category] ?? 0;
    interviewFocus.push(
      `Focus on ${ASSESSMENT_LABELS[assessment.weakest_category]} questions (assessment average ${average}/100)`,
    );
  }

  const skillVerification = analysis.categories.skills.assessed
    ? analysis.categories.skills.matches.map((match) => `Verify ${match}`)
    : [];
  for (const item of categories) {
    if (!item.assessed) {
      skillVerification.push(`Assess ${item.category} manually`);
    }
  }

  return {
    interview_focus: unique(interviewFocus).slice(0, MAX_ITEMS),
    skill_verification: unique(skillVerification).slice(0, MAX_ITEMS),
    discussion_points: analysis.areas_for_consideration.slice(0, MAX_ITEMS),
  };
}

function unique(values: string[]): string[] {
  return Array.from(new Set(values));
}
