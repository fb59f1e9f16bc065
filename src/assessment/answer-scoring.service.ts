import {
  GeneratorCallOptions,
  GeneratorCallSettings,
  StructuredJsonGenerator,
  callJsonPromptSafe,
  toGeneratorError,
} from "../ai/llm.safe";
import {
  ANSWER_SCORE_V1_SCHEMA_HINT,
  buildAnswerScoreV1Prompt,
} from "../ai/prompts/assessment/answer-score.v1.prompt";
import { Logger, logContext } from "../config/logger";
import { clampScore, round2 } from "../matching/scoring/category-match";
import { isRecord } from "../profiles/profile.schemas";
import { SubmittedQuestion } from "../shared/types/assessment.types";

const PROMPT_NAME = "answer_score_v1";

export interface AnswerScore {
  score: number;
  feedback: string;
  passion_score: number | null;
}

export interface AnswerScoreProvider {
  scoreAnswer(question: SubmittedQuestion, answer: string, options?: GeneratorCallOptions): Promise<AnswerScore>;
}

interface AnswerScorePayload {
  score: number | string;
  [key: string]: unknown;
}

export class AnswerScoringService implements AnswerScoreProvider {
  constructor(
    private readonly llmClient: StructuredJsonGenerator,
    private readonly logger: Logger,
    private readonly settings: GeneratorCallSettings,
  ) {}

  async scoreAnswer(
    question: SubmittedQuestion,
    answer: string,
    options: GeneratorCallOptions = {},
  ): Promise<AnswerScore> {
    const safe = await callJsonPromptSafe({
      llmClient: this.llmClient,
      logger: this.logger,
      prompt: buildAnswerScoreV1Prompt({
        category: question.category,
        difficulty: question.difficulty,
        question: question.text,
        answer,
      }),
      maxTokens: 600,
      timeoutMs: this.settings.timeoutMs,
      retryPolicy: this.settings.retryPolicy,
      signal: options.signal,
      context: options.context,
      promptName: PROMPT_NAME,
      schemaHint: ANSWER_SCORE_V1_SCHEMA_HINT,
      validate: isAnswerScorePayload,
    });

    if (!safe.ok) {
      logContext(
        this.logger,
        "warn",
        "assessment.generator.failed",
        {
          ...options.context,
          prompt_name: PROMPT_NAME,
          attempt: safe.attempts,
          error_code: safe.error_code,
        },
        { questionId: question.id },
      );
      throw toGeneratorError(safe, PROMPT_NAME, this.settings.timeoutMs);
    }

    return normalizeAnswerScore(safe.data, question);
  }
}

function normalizeAnswerScore(raw: AnswerScorePayload, question: SubmittedQuestion): AnswerScore {
  const passion = Number(raw.passion_score);
  return {
    score: round2(clampScore(Number(raw.score))),
    feedback: typeof raw.feedback === "string" ? raw.feedback.replace(/\s+/g, " ").trim().slice(0, 1000) : "",
    passion_score:
      question.category === "behavioral" && raw.passion_score !== null && Number.isFinite(passion)
        ? Math.min(1, Math.max(0, passion))
        : null,
  };
}

function isAnswerScorePayload(value: unknown): value is AnswerScorePayload {
  if (!isRecord(value)) {
    return false;
  }
  const score = value.score;
  if (typeof score === "number") {
    return Number.isFinite(score);
  }
  return typeof score === "string" && score.trim().length > 0 && Number.isFinite(Number(score));
}
