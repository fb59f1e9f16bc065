import assert from "node:assert/strict";
import { test } from "node:test";
import { RetryPolicy } from "../../ai/retry-policy";
import { AnswerScoringService } from "../../assessment/answer-scoring.service";
import { Logger } from "../../config/logger";
import { CategoryScoringService } from "../../matching/category-scoring.service";
import { ExternalServiceError, ValidationError } from "../../shared/errors";
import { SubmittedQuestion } from "../../shared/types/assessment.types";
import { CandidateProfile, JobRequirement } from "../../shared/types/profile.types";

const noopLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

const settings = {
  timeoutMs: 1000,
  retryPolicy: new RetryPolicy({ maxAttempts: 1, backoffMs: [] }),
};

function generatorReturning(reply: string) {
  const prompts: string[] = [];
  return {
    prompts,
    getModelName: () => "gpt-test",
    async generateStructuredJson(prompt: string): Promise<string> {
      prompts.push(prompt);
      return reply;
    },
  };
}

function question(overrides: Partial<SubmittedQuestion> = {}): SubmittedQuestion {
  return {
    id: "behavior_1",
    category: "behavioral",
    score: null,
    feedback: "",
    passion_score: null,
    text: "Tell us about a project you loved.",
    answer: "The search rewrite.",
    difficulty: "medium",
    ...overrides,
  };
}

const profile: CandidateProfile = {
  personal_info: { name: "Dana Reyes", email: "dana@example.com", phone: null, location: null },
  summary: "",
  education: [],
  experience: [],
  skills: ["TypeScript"],
  projects: [],
  certifications: [],
};

const requirement: JobRequirement = {
  title: "Backend Engineer",
  required_skills: ["TypeScript"],
  preferred_skills: [],
  min_experience_years: null,
  education_requirements: [],
};

test("answer scores are clamped, rounded and trimmed", async () => {
  const llm = generatorReturning('{"score": "82.456", "feedback": "  Clear   story. ", "passion_score": 1.3}');
  const service = new AnswerScoringService(llm, noopLogger, settings);

  const scored = await service.scoreAnswer(question(), "The search rewrite.");

  assert.deepEqual(scored, { score: 82.46, feedback: "Clear story.", passion_score: 1 });
  assert.equal(llm.prompts.length, 1);
  assert.ok(llm.prompts[0]?.includes("The search rewrite."));
});

test("passion is only kept for behavioral answers", async () => {
  const llm = generatorReturning('{"score": 140, "feedback": "Fast.", "passion_score": 0.9}');
  const service = new AnswerScoringService(llm, noopLogger, settings);

  const scored = await service.scoreAnswer(question({ id: "code_1", category: "coding" }), "Use a heap.");

  assert.deepEqual(scored, { score: 100, feedback: "Fast.", passion_score: null });
});

test("an answer reply without a score is a validation error", async () => {
  const service = new AnswerScoringService(generatorReturning('{"feedback": "?"}'), noopLogger, settings);

  await assert.rejects(service.scoreAnswer(question(), "The search rewrite."), (error: unknown) => {
    assert.ok(error instanceof ValidationError);
    assert.equal(error.message, "answer_score_v1 returned malformed output: schema_invalid");
    return true;
  });
});

test("category scores are read through the match analysis parser", async () => {
  const llm = generatorReturning(
    JSON.stringify({
      match_score: 64,
      categories: {
        skills: { score: 90, matches: ["TypeScript"], gaps: [] },
        experience: { score: 40, matches: [], gaps: ["3 years"] },
        education: { score: "n/a" },
      },
    }),
  );
  const service = new CategoryScoringService(llm, noopLogger, settings);

  const upstream = await service.scoreCategories(profile, requirement);

  assert.equal(upstream.scale, "percent");
  assert.equal(upstream.reportedOverallScore, 64);
  assert.deepEqual(upstream.categories.skills, { score: 90, matches: ["TypeScript"], gaps: [] });
  assert.deepEqual(upstream.categories.experience, { score: 40, matches: [], gaps: ["3 years"] });
  assert.equal(upstream.categories.additional, undefined);
  assert.ok(Number.isNaN(upstream.categories.education?.score));
  assert.ok(llm.prompts[0]?.includes("Backend Engineer"));
});

test("a generator failure surfaces as an external service error", async () => {
  const llm = {
    async generateStructuredJson(): Promise<string> {
      throw new Error("Generator API error: HTTP 401 - denied");
    },
  };
  const service = new CategoryScoringService(llm, noopLogger, settings);

  await assert.rejects(service.scoreCategories(profile, requirement), (error: unknown) => {
    assert.ok(error instanceof ExternalServiceError);
    assert.equal(error.message, "category_scores_v1 failed: llm_failure");
    return true;
  });
});
