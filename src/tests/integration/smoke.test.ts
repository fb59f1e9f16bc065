import assert from "node:assert/strict";
import { Server } from "node:http";
import { after, before, test } from "node:test";
import fetch from "node-fetch";
import { createApp } from "../../app";
import { loadEnv } from "../../config/env";
import { Logger } from "../../config/logger";
import { CandidateResultCache } from "../../pipeline/result-cache";
import { isRecord } from "../../profiles/profile.schemas";

const logger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

const cache = new CandidateResultCache();
let server: Server;
let baseUrl = "";

before(async () => {
  const { app } = createApp(loadEnv({}), { logger, overrides: { cache } });
  server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, "127.0.0.1", () => resolve(listening));
  });
  const address = server.address();
  assert.ok(address !== null && typeof address === "object");
  baseUrl = `http://127.0.0.1:${address.port}`;
});

after(async () => {
  await new Promise<void>((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
});

async function postEvaluation(body: unknown): Promise<{ status: number; json: Record<string, unknown> }> {
  const response = await fetch(`${baseUrl}/evaluations`, {
    method: "POST",
    headers: { "content-type": "application/json" },
    body: JSON.stringify(body),
  });
  const json: unknown = await response.json();
  assert.ok(isRecord(json));
  return { status: response.status, json };
}

const profile = { personal_info: { name: "Dana Reyes", phone: "+1 555 0100 200" } };
const requirement = { title: "Backend Engineer", required_skills: ["TypeScript"] };
const match = {
  overall_match_score: 0.7,
  skills_match: { score: 0.8 },
  experience_match: { score: 0.7 },
  education_match: { score: 0.6 },
  additional_match: { score: 0.5 },
};

test("health responds ok", async () => {
  const response = await fetch(`${baseUrl}/health`);
  assert.equal(response.status, 200);
  assert.deepEqual(await response.json(), { ok: true });
});

test("an evaluation returns the run record", async () => {
  const { status, json } = await postEvaluation({ candidate_id: "cand-9", profile, requirement, match });

  assert.equal(status, 200);
  assert.equal(json.ok, true);
  const run = json.run;
  assert.ok(isRecord(run));
  assert.equal(run.candidate_id, "cand-9");
  assert.equal(run.status, "completed");
  assert.ok(isRecord(run.match_analysis));
  assert.equal(run.match_analysis.match_score, 70);
  assert.equal(run.match_analysis.overall_match_score, 0.7);
  assert.ok(isRecord(run.decision));
  assert.deepEqual(run.decision.decision, { status: "PROCEED", confidence_score: 70, interview_stage: "TECHNICAL" });
});

test("an unreadable profile is rejected with 422", async () => {
  const { status, json } = await postEvaluation({ profile: { personal_info: { name: "Dana Reyes" } }, requirement, match });

  assert.equal(status, 422);
  assert.equal(json.ok, false);
  assert.equal(json.error, "Candidate profile has no email or phone");
});

test("a body without a requirement is rejected with 400", async () => {
  const { status, json } = await postEvaluation({ profile });

  assert.equal(status, 400);
  assert.deepEqual(json, { ok: false, error: "Body must be an object with profile and requirement" });
});

test("only requests that name their candidate are cached", async () => {
  const cachedBefore = cache.size;

  const anonymous = await postEvaluation({ profile, requirement, match });
  assert.equal(anonymous.status, 200);
  assert.equal(cache.size, cachedBefore);

  const named = await postEvaluation({ candidate_id: "cand-10", profile, requirement, match });
  assert.equal(named.status, 200);
  assert.equal(cache.size, cachedBefore + 1);
});
