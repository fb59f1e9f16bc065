import { clampScore, round2 } from "../matching/scoring/category-match";
import { isRecord } from "../profiles/profile.schemas";
import { ValidationError } from "../shared/errors";
import {
  AssessmentCategory,
  AssessmentSubmission,
  SubmittedQuestion,
} from "../shared/types/assessment.types";

const MAX_TEXT = 4000;

const CATEGORY_ALIASES: Record<string, AssessmentCategory> = {
  coding: "coding",
  code: "coding",
  system_design: "system_design",
  "system design": "system_design",
  "system-design": "system_design",
  design: "system_design",
  behavioral: "behavioral",
  behavioural: "behavioral",
  behavior: "behavioral",
  behaviour: "behavioral",
};

const ID_PREFIXES: Array<[string, AssessmentCategory]> = [
  ["code_", "coding"],
  ["design_", "system_design"],
  ["behavior_", "behavioral"],
];

const GROUPED_KEYS: Array<[string, AssessmentCategory]> = [
  ["coding_questions", "coding"],
  ["system_design_questions", "system_design"],
  ["behavioral_questions", "behavioral"],
];

/**
 * Reads a submitted assessment. Three layouts are accepted: a `questions`
 * list (or a bare list), per-category `*_questions` lists with an optional
 * `answers` map, and a scored result with `question_scores`/`feedback` maps
 * keyed by prefixed question id.
 */
export function parseAssessmentSubmission(raw: unknown): AssessmentSubmission {
  const source = Array.isArray(raw) ? { questions: raw } : raw;
  if (!isRecord(source)) {
    throw new ValidationError("Assessment must be a JSON object or a list of questions");
  }

  const notes: string[] = [];
  const answers = isRecord(source.answers) ? source.answers : {};
  const items: Array<{ item: Record<string, unknown>; category?: AssessmentCategory }> = [];

  if (Array.isArray(source.questions)) {
    for (const item of source.questions) {
      if (isRecord(item)) {
        items.push({ item });
      }
    }
  }
  for (const [key, category] of GROUPED_KEYS) {
    const grouped = source[key];
    if (!Array.isArray(grouped)) {
      continue;
    }
    for (const item of grouped) {
      if (isRecord(item)) {
        items.push({ item, category });
      }
    }
  }
  if (items.length === 0 && isRecord(source.question_scores)) {
    const feedback = isRecord(source.feedback) ? source.feedback : {};
    for (const [id, score] of Object.entries(source.question_scores)) {
      items.push({ item: { id, score, feedback: feedback[id] } });
    }
  }

  const seen = new Set<string>();
  const questions: SubmittedQuestion[] = [];
  items.forEach(({ item, category: groupCategory }, index) => {
    const question = toQuestion(item, index, groupCategory, answers, notes);
    if (!question) {
      return;
    }
    if (seen.has(question.id)) {
      notes.push(`Duplicate question id ${question.id} ignored.`);
      return;
    }
    seen.add(question.id);
    questions.push(question);
  });

  return {
    candidate_name: toText(source.candidate_name) || null,
    assessment_id: toText(source.assessment_id) || toText(source.id) || null,
    questions,
    notes,
  };
}

export function resolveAssessmentCategory(value: unknown, id: string): AssessmentCategory | null {
  const normalized = toText(value).toLowerCase();
  const fromAlias = CATEGORY_ALIASES[normalized];
  if (fromAlias) {
    return fromAlias;
  }
  const prefixed = ID_PREFIXES.find(([prefix]) => id.toLowerCase().startsWith(prefix));
  return prefixed ? prefixed[1] : null;
}

function toQuestion(
  item: Record<string, unknown>,
  index: number,
  groupCategory: AssessmentCategory | undefined,
  answers: Record<string, unknown>,
  notes: string[],
): SubmittedQuestion | null {
  const rawId = typeof item.id === "number" ? String(item.id) : toText(item.id);
  const category = groupCategory ?? resolveAssessmentCategory(item.category ?? item.type, rawId);
  if (!category) {
    notes.push(`Question ${rawId || `#${index + 1}`} has no recognisable category and was skipped.`);
    return null;
  }
  const id = rawId || `${category}_${index + 1}`;
  const answer = toText(item.answer ?? answers[id], MAX_TEXT) || null;

  return {
    id,
    category,
    score: toScore(item.score, id, notes),
    feedback: toText(item.feedback, MAX_TEXT),
    passion_score: toPassionScore(item.passion_score),
    text: toText(item.text ?? item.question, MAX_TEXT),
    answer,
    difficulty: toText(item.difficulty) || "medium",
  };
}

function toScore(value: unknown, id: string, notes: string[]): number | null {
  if (value === undefined || value === null || value === "") {
    return null;
  }
  const numeric = typeof value === "number" ? value : Number(value);
  if (!Number.isFinite(numeric)) {
    notes.push(`Question ${id} score ${JSON.stringify(value)} is not numeric and was treated as missing.`);
    return null;
  }
  if (numeric < 0 || numeric > 100) {
    notes.push(`Question ${id} score ${numeric} is out of range and was clamped.`);
  }
  return round2(clampScore(numeric));
}

function toPassionScore(value: unknown): number | null {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    return null;
  }
  return Math.min(1, Math.max(0, value));
}

function toText(value: unknown, max = 400): string {
  if (typeof value !== "string") {
    return "";
  }
  return value.replace(/\s+/g, " ").trim().slice(0, max);
}
