import { AssessmentCategory } from "../../../shared/types/assessment.types";

export type AssessmentDifficulty = "easy" | "medium" | "hard";

export interface AnswerPromptTemplate {
  category: AssessmentCategory;
  difficulty: AssessmentDifficulty;
  prompt_fields: {
    focus: string;
    criteria: string[];
    expectation: string;
  };
}

const CATEGORY_FIELDS: Record<AssessmentCategory, { focus: string; criteria: string[] }> = {
  coding: {
    focus: "correctness of the chosen solution and the reasoning behind it",
    criteria: ["Correct result", "Edge cases considered", "Complexity understood", "Readable approach"],
  },
  system_design: {
    focus: "architecture quality for the stated scenario",
    criteria: ["Core components identified", "Scalability addressed", "Security addressed", "Trade-offs explained"],
  },
  behavioral: {
    focus: "concrete experience, ownership, and genuine interest in the work",
    criteria: ["Specific situation described", "Personal ownership shown", "Outcome stated", "Reflection on learning"],
  },
};

const DIFFICULTY_EXPECTATIONS: Record<AssessmentDifficulty, string> = {
  easy: "A correct, plainly stated answer earns a high score.",
  medium: "A high score needs a correct answer with the main trade-off named.",
  hard: "A high score needs depth: alternatives compared, failure modes and limits discussed.",
};

export const ANSWER_SCORE_V1_PROMPT = `You are an assessment answer scorer.

Score one candidate answer to one assessment question.

Rules:
- score is an integer from 0 to 100 judged against the rubric criteria.
- An empty, off-topic, or copied-question answer scores 0.
- Match expectations to the stated difficulty.
- feedback is one or two sentences addressed to a reviewer.
- passion_score is a number from 0.0 to 1.0 for behavioral questions and null otherwise.

OUTPUT STRICT JSON:
{
  "score": number,
  "feedback": "string",
  "passion_score": number | null,
  "strengths": ["string"],
  "weaknesses": ["string"]
}

Return ONLY valid JSON.
No markdown.
No commentary.`;

export const ANSWER_SCORE_V1_SCHEMA_HINT =
  '{"score":number,"feedback":string,"passion_score":number|null,"strengths":string[],"weaknesses":string[]}';

export function toDifficulty(value: string): AssessmentDifficulty {
  const normalized = value.trim().toLowerCase();
  return normalized === "easy" || normalized === "hard" ? normalized : "medium";
}

export function answerPromptTemplate(category: AssessmentCategory, difficulty: string): AnswerPromptTemplate {
  const tier = toDifficulty(difficulty);
  return {
    category,
    difficulty: tier,
    prompt_fields: {
      ...CATEGORY_FIELDS[category],
      expectation: DIFFICULTY_EXPECTATIONS[tier],
    },
  };
}

export function buildAnswerScoreV1Prompt(input: {
  category: AssessmentCategory;
  difficulty: string;
  question: string;
  answer: string;
}): string {
  const template = answerPromptTemplate(input.category, input.difficulty);
  return [
    ANSWER_SCORE_V1_PROMPT,
    "",
    "Runtime input JSON:",
    JSON.stringify(
      {
        category: template.category,
        difficulty: template.difficulty,
        ...template.prompt_fields,
        question: input.question,
        answer: input.answer,
      },
      null,
      2,
    ),
  ].join("\n");
}
