import assert from "node:assert/strict";
import { test } from "node:test";
import { scoreAssessment } from "../../assessment/assessment-scorer";
import { AssessmentCategory, AssessmentQuestion } from "../../shared/types/assessment.types";

function question(
  id: string,
  category: AssessmentCategory,
  score: number | null,
  passionScore?: number | null,
): AssessmentQuestion {
  return { id, category, score, feedback: "", passion_score: passionScore };
}

test("averages categories equally and applies the pass threshold", () => {
  const report = scoreAssessment([
    question("code_1", "coding", 80),
    question("design_1", "system_design", 7.4),
    question("behavior_1", "behavioral", 0, 0.6),
  ]);

  assert.deepEqual(report.category_averages, { coding: 80, system_design: 7.4, behavioral: 0 });
  assert.equal(report.overall_score, 29.13);
  assert.equal(report.status, "FAIL");
  assert.equal(report.pass_threshold, 60);
  assert.equal(report.technical_rating, 0.44);
  assert.equal(report.passion_rating, 0.6);
  assert.equal(report.strongest_category, "coding");
  assert.equal(report.weakest_category, "behavioral");
  assert.deepEqual(report.data_quality_notes, []);
});

test("unanswered questions count as zero and are reported", () => {
  const report = scoreAssessment([question("code_1", "coding", 100), question("code_2", "coding", null)]);

  assert.deepEqual(report.categories, [
    { category: "coding", average: 50, question_count: 2, unanswered_count: 1 },
  ]);
  assert.equal(report.unanswered_count, 1);
  assert.equal(report.overall_score, 50);
  assert.equal(report.status, "FAIL");
  assert.equal(report.technical_rating, 0.5);
  assert.equal(report.passion_rating, 0);
  assert.deepEqual(report.data_quality_notes, [
    "1 question(s) had no answer and count as 0.",
    "No behavioral questions; passion rating is 0.",
  ]);
});

test("the threshold is inclusive and configurable", () => {
  const questions = [question("code_1", "coding", 100), question("code_2", "coding", null)];
  assert.equal(scoreAssessment(questions, { passThreshold: 50 }).status, "PASS");
  assert.equal(scoreAssessment(questions, { passThreshold: 50.01 }).status, "FAIL");
});

test("an empty assessment scores zero with notes", () => {
  const report = scoreAssessment([]);
  assert.equal(report.overall_score, 0);
  assert.equal(report.status, "FAIL");
  assert.equal(report.strongest_category, null);
  assert.equal(report.weakest_category, null);
  assert.deepEqual(report.data_quality_notes, [
    "The assessment contains no questions; all scores are 0.",
    "No coding or system design questions; technical rating is 0.",
    "No behavioral questions; passion rating is 0.",
  ]);
});

test("ties go to the earlier category for both strongest and weakest", () => {
  const even = scoreAssessment([
    question("code_1", "coding", 70),
    question("design_1", "system_design", 70),
    question("behavior_1", "behavioral", 70, 0.5),
  ]);
  assert.equal(even.strongest_category, "coding");
  assert.equal(even.weakest_category, "coding");

  const lowTie = scoreAssessment([
    question("code_1", "coding", 90),
    question("design_1", "system_design", 50),
    question("behavior_1", "behavioral", 50, 0.5),
  ]);
  assert.equal(lowTie.weakest_category, "system_design");
});

test("passion rating averages only the signals present and clamps them", () => {
  const report = scoreAssessment([
    question("behavior_1", "behavioral", 60, 1.4),
    question("behavior_2", "behavioral", 40, 0.5),
    question("behavior_3", "behavioral", 50),
  ]);
  assert.equal(report.passion_rating, 0.75);
  assert.equal(report.questions[0]?.passion_score, 1);

  const silent = scoreAssessment([question("behavior_1", "behavioral", 60)]);
  assert.equal(silent.passion_rating, 0);
  assert.ok(silent.data_quality_notes.includes("Behavioral answers carry no passion signal; passion rating is 0."));
});

test("scoring is idempotent", () => {
  const questions = [question("code_1", "coding", 64.25), question("behavior_1", "behavioral", 72, 0.9)];
  assert.deepEqual(scoreAssessment(questions), scoreAssessment(questions));
});
