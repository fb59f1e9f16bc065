import assert from "node:assert/strict";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { Writable } from "node:stream";
import { test } from "node:test";
import { USAGE, runEvaluateCli } from "../../cli/evaluate.cli";
import { loadEnv } from "../../config/env";
import { Logger } from "../../config/logger";

const noopLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

const profile = {
  personal_info: { name: "Dana Reyes", email: "dana@example.com" },
  skills: ["TypeScript", "PostgreSQL"],
};

const requirement = { title: "Backend Engineer", required_skills: ["TypeScript"] };

const match = {
  match_score: 80,
  categories: {
    skills: { score: 90, matches: ["TypeScript"] },
    experience: { score: 80 },
    education: { score: 70 },
    additional: { score: 60 },
  },
};

const assessment = {
  questions: [
    { id: "code_1", category: "coding", score: 85, feedback: "Efficient." },
    { id: "behavior_1", category: "behavioral", score: 70, passion_score: 0.8 },
  ],
};

function capture(): { stream: Writable; text: () => string } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      chunks.push(String(chunk));
      callback();
    },
  });
  return { stream, text: () => chunks.join("") };
}

async function withWorkspace(run: (dir: string) => Promise<void>): Promise<void> {
  const dir = await mkdtemp(path.join(os.tmpdir(), "evaluate-cli-"));
  try {
    await run(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

async function writeJson(dir: string, name: string, value: unknown): Promise<string> {
  const filePath = path.join(dir, name);
  await writeFile(filePath, JSON.stringify(value), "utf-8");
  return filePath;
}

async function invoke(argv: string[]) {
  const stdout = capture();
  const stderr = capture();
  const code = await runEvaluateCli(argv, {
    env: loadEnv({}),
    logger: noopLogger,
    stdout: stdout.stream,
    stderr: stderr.stream,
    now: () => new Date("2026-01-02T03:04:05Z"),
  });
  return { code, stdout: stdout.text(), stderr: stderr.text() };
}

test("a complete run writes every artifact and exits 0", async () => {
  await withWorkspace(async (dir) => {
    const profilePath = await writeJson(dir, "dana.json", profile);
    const requirementPath = await writeJson(dir, "role.json", requirement);
    const matchPath = await writeJson(dir, "match.json", match);
    const assessmentPath = await writeJson(dir, "assessment.json", assessment);
    const prefix = path.join(dir, "out", "dana");

    const result = await invoke([
      "evaluate",
      profilePath,
      requirementPath,
      "--output",
      prefix,
      "--match",
      matchPath,
      "--assessment",
      assessmentPath,
    ]);

    assert.equal(result.code, 0);
    assert.equal(result.stderr, "");
    const lines = result.stdout.trimEnd().split("\n");
    assert.match(lines[0] ?? "", /^Run [0-9a-f-]{36}: completed$/);
    assert.deepEqual(lines.slice(1), [
      "Decision: PROCEED (confidence 80, stage TECHNICAL)",
      `Wrote ${prefix}_parsed_resume.json`,
      `Wrote ${prefix}_match_analysis.json`,
      `Wrote ${prefix}_decision.json`,
      `Wrote ${prefix}_assessment_report.txt`,
    ]);

    const analysis: unknown = JSON.parse(await readFile(`${prefix}_match_analysis.json`, "utf-8"));
    assert.ok(typeof analysis === "object" && analysis !== null);
    assert.ok("match_score" in analysis && "overall_match_score" in analysis);
    assert.equal(analysis.match_score, 80);
    assert.equal(analysis.overall_match_score, 0.8);

    const report = await readFile(`${prefix}_assessment_report.txt`, "utf-8");
    const reportLines = report.split("\n");
    assert.equal(reportLines[0], "Assessment Summary for Dana Reyes");
    assert.equal(reportLines[2], "Generated on: 2026-01-02 03:04:05 UTC");
    assert.ok(reportLines.includes("Total Score: 77.50/100"));
  });
});

test("custom weights change the decision", async () => {
  await withWorkspace(async (dir) => {
    const result = await invoke([
      "evaluate",
      await writeJson(dir, "dana.json", profile),
      await writeJson(dir, "role.json", requirement),
      "-o",
      path.join(dir, "dana"),
      "--match",
      await writeJson(dir, "match.json", match),
      "--weights",
      "skills=1,experience=0,education=0,additional=0",
    ]);

    assert.equal(result.code, 0);
    assert.ok(result.stdout.includes("Decision: PROCEED (confidence 90, stage FULL_LOOP)\n"));
  });
});

test("a missing --output prints usage and exits 1", async () => {
  const result = await invoke(["evaluate", "a.json", "b.json", "--match", "m.json"]);

  assert.equal(result.code, 1);
  assert.equal(result.stdout, "");
  assert.equal(result.stderr, `--output <prefix> is required\n${USAGE}\n`);
});

test("without --match or an api key the command is refused", async () => {
  const result = await invoke(["evaluate", "a.json", "b.json", "--output", "out/x"]);

  assert.equal(result.code, 1);
  assert.equal(result.stderr.split("\n")[0], "Without --match the generator scores categories; set GENERATOR_API_KEY");
});

test("invalid weights exit 1 without running", async () => {
  await withWorkspace(async (dir) => {
    const result = await invoke([
      "evaluate",
      await writeJson(dir, "dana.json", profile),
      await writeJson(dir, "role.json", requirement),
      "--output",
      path.join(dir, "dana"),
      "--match",
      await writeJson(dir, "match.json", match),
      "--weights",
      "skills=0.9",
    ]);

    assert.equal(result.code, 1);
    assert.equal(result.stdout, "");
    assert.ok(result.stderr.startsWith("Match weights must sum to 1.0"));
  });
});

test("a profile that is not JSON exits 1", async () => {
  await withWorkspace(async (dir) => {
    const profilePath = path.join(dir, "broken.json");
    await writeFile(profilePath, "{ name: ", "utf-8");

    const result = await invoke([
      "evaluate",
      profilePath,
      await writeJson(dir, "role.json", requirement),
      "--output",
      path.join(dir, "broken"),
      "--match",
      await writeJson(dir, "match.json", match),
    ]);

    assert.equal(result.code, 1);
    assert.ok(result.stderr.startsWith(`${profilePath} is not valid JSON:`));
  });
});

test("a profile without a name fails the run and leaves a run record", async () => {
  await withWorkspace(async (dir) => {
    const prefix = path.join(dir, "anon");
    const result = await invoke([
      "evaluate",
      await writeJson(dir, "anon.json", { personal_info: { email: "anon@example.com" } }),
      await writeJson(dir, "role.json", requirement),
      "--output",
      prefix,
      "--match",
      await writeJson(dir, "match.json", match),
    ]);

    assert.equal(result.code, 1);
    const lines = result.stdout.trimEnd().split("\n");
    assert.match(lines[0] ?? "", /: failed$/);
    assert.deepEqual(lines.slice(1), [
      "Failure at ingestion: Candidate profile has no name",
      `Wrote ${prefix}_run.json`,
    ]);

    const record: unknown = JSON.parse(await readFile(`${prefix}_run.json`, "utf-8"));
    assert.ok(typeof record === "object" && record !== null && "candidate_id" in record && "failure" in record);
    assert.equal(record.candidate_id, "anon");
    assert.deepEqual(record.failure, {
      stage: "ingestion",
      error_code: "parse_error",
      message: "Candidate profile has no name",
    });
  });
});

test("an unreadable match analysis degrades the run and exits 2", async () => {
  await withWorkspace(async (dir) => {
    const result = await invoke([
      "evaluate",
      await writeJson(dir, "dana.json", profile),
      await writeJson(dir, "role.json", requirement),
      "--output",
      path.join(dir, "dana"),
      "--match",
      await writeJson(dir, "match.json", [80]),
    ]);

    assert.equal(result.code, 2);
    assert.ok(result.stdout.includes(": degraded\n"));
    assert.ok(result.stdout.includes("Decision: HOLD (confidence 0, stage SCREENING)\n"));
  });
});

test("an assessment file that is not JSON fails only that stage and exits 2", async () => {
  await withWorkspace(async (dir) => {
    const assessmentPath = path.join(dir, "assessment.json");
    await writeFile(assessmentPath, "{ not json", "utf-8");

    const result = await invoke([
      "evaluate",
      await writeJson(dir, "dana.json", profile),
      await writeJson(dir, "role.json", requirement),
      "--output",
      path.join(dir, "dana"),
      "--match",
      await writeJson(dir, "match.json", match),
      "--assessment",
      assessmentPath,
    ]);

    assert.equal(result.code, 2);
    assert.equal(result.stderr, "");
    const lines = result.stdout.split("\n");
    assert.match(lines[0] ?? "", /^Run [0-9a-f-]{36}: degraded$/);
    assert.equal(lines[1], "Decision: PROCEED (confidence 80, stage TECHNICAL)");
  });
});

test("a match file that is not JSON fails only matching and exits 2", async () => {
  await withWorkspace(async (dir) => {
    const matchPath = path.join(dir, "match.json");
    await writeFile(matchPath, "{ not json", "utf-8");

    const result = await invoke([
      "evaluate",
      await writeJson(dir, "dana.json", profile),
      await writeJson(dir, "role.json", requirement),
      "--output",
      path.join(dir, "dana"),
      "--match",
      matchPath,
      "--assessment",
      await writeJson(dir, "assessment.json", assessment),
    ]);

    assert.equal(result.code, 2);
    assert.equal(result.stderr, "");
    const lines = result.stdout.split("\n");
    assert.match(lines[0] ?? "", /^Run [0-9a-f-]{36}: degraded$/);
    assert.equal(lines[1], "Decision: HOLD (confidence 0, stage SCREENING)");
  });
});
