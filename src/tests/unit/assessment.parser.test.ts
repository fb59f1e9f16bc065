import assert from "node:assert/strict";
import { test } from "node:test";
import { parseAssessmentSubmission, resolveAssessmentCategory } from "../../assessment/assessment.parser";
import { ValidationError } from "../../shared/errors";

test("reads a questions list with answers from the answers map", () => {
  const submission = parseAssessmentSubmission({
    candidate_name: "  Dana   Reyes ",
    assessment_id: "asm-7",
    answers: { code_1: "Use a hash map." },
    questions: [
      { id: "code_1", category: "coding", text: "Find duplicates", difficulty: "easy" },
      { id: "design_1", type: "System Design", score: 72, feedback: "Clear trade-offs." },
    ],
  });

  assert.equal(submission.candidate_name, "Dana Reyes");
  assert.equal(submission.assessment_id, "asm-7");
  assert.deepEqual(submission.notes, []);
  assert.deepEqual(submission.questions, [
    {
      id: "code_1",
      category: "coding",
      score: null,
      feedback: "",
      passion_score: null,
      text: "Find duplicates",
      answer: "Use a hash map.",
      difficulty: "easy",
    },
    {
      id: "design_1",
      category: "system_design",
      score: 72,
      feedback: "Clear trade-offs.",
      passion_score: null,
      text: "",
      answer: null,
      difficulty: "medium",
    },
  ]);
});

test("reads grouped question lists and generates missing ids", () => {
  const submission = parseAssessmentSubmission({
    id: "asm-9",
    coding_questions: [{ score: 90 }],
    behavioral_questions: [{ id: "behavior_1", score: 55, passion_score: 0.8 }],
  });

  assert.equal(submission.assessment_id, "asm-9");
  assert.deepEqual(
    submission.questions.map((question) => [question.id, question.category, question.score, question.passion_score]),
    [
      ["coding_1", "coding", 90, null],
      ["behavior_1", "behavioral", 55, 0.8],
    ],
  );
});

test("reads scored results keyed by prefixed question id", () => {
  const submission = parseAssessmentSubmission({
    question_scores: { code_1: 80, design_1: "7.4", behavior_1: 0 },
    feedback: { code_1: "Good." },
  });

  assert.deepEqual(
    submission.questions.map((question) => [question.id, question.category, question.score, question.feedback]),
    [
      ["code_1", "coding", 80, "Good."],
      ["design_1", "system_design", 7.4, ""],
      ["behavior_1", "behavioral", 0, ""],
    ],
  );
});

test("records notes for duplicates, unknown categories and bad scores", () => {
  const submission = parseAssessmentSubmission([
    { id: "q1", category: "coding", score: 150 },
    { id: "q1", category: "coding", score: 10 },
    { id: "q2", category: "trivia", score: 10 },
    { id: "q3", category: "behavioral", score: "great" },
    { category: "astrology" },
  ]);

  assert.equal(submission.candidate_name, null);
  assert.equal(submission.assessment_id, null);
  assert.deepEqual(
    submission.questions.map((question) => [question.id, question.score]),
    [
      ["q1", 100],
      ["q3", null],
    ],
  );
  assert.deepEqual(submission.notes, [
    "Question q1 score 150 is out of range and was clamped.",
    "Duplicate question id q1 ignored.",
    "Question q2 has no recognisable category and was skipped.",
    'Question q3 score "great" is not numeric and was treated as missing.',
    "Question #5 has no recognisable category and was skipped.",
  ]);
});

test("rejects input that is neither an object nor a list", () => {
  assert.throws(() => parseAssessmentSubmission("coding: 80"), ValidationError);
  assert.throws(() => parseAssessmentSubmission(null), ValidationError);
});

test("resolves categories from aliases before id prefixes", () => {
  assert.equal(resolveAssessmentCategory("Behavioural", "code_3"), "behavioral");
  assert.equal(resolveAssessmentCategory(undefined, "DESIGN_2"), "system_design");
  assert.equal(resolveAssessmentCategory("", "misc_1"), null);
});
