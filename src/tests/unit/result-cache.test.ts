import assert from "node:assert/strict";
import { test } from "node:test";
import { CandidateResultCache, fingerprintOf } from "../../pipeline/result-cache";
import { computeMatch } from "../../matching/scoring/category-match";
import { JobRequirement } from "../../shared/types/profile.types";

const requirement: JobRequirement = {
  title: "Data Engineer",
  required_skills: ["SQL"],
  preferred_skills: [],
  min_experience_years: null,
  education_requirements: [],
};

test("a slot is written once per fingerprint", () => {
  const cache = new CandidateResultCache();
  const first = computeMatch(requirement, { skills: { score: 80 } });
  const second = computeMatch(requirement, { skills: { score: 20 } });

  assert.equal(cache.set("cand-1", "matching", "fp-a", first), true);
  assert.equal(cache.set("cand-1", "matching", "fp-a", second), false);
  assert.equal(cache.get("cand-1", "matching", "fp-a"), first);
  assert.equal(cache.get("cand-1", "decision", "fp-a"), undefined);
  assert.equal(cache.get("cand-2", "matching", "fp-a"), undefined);
  assert.equal(cache.size, 1);
});

test("a different fingerprint misses and the next write replaces the slot", () => {
  const cache = new CandidateResultCache();
  const stale = computeMatch(requirement, { skills: { score: 80 } });
  const fresh = computeMatch(requirement, { skills: { score: 10 } });
  cache.set("cand-1", "matching", "fp-old", stale);

  assert.equal(cache.get("cand-1", "matching", "fp-new"), undefined);
  assert.equal(cache.set("cand-1", "matching", "fp-new", fresh), true);
  assert.equal(cache.get("cand-1", "matching", "fp-new"), fresh);
  assert.equal(cache.get("cand-1", "matching", "fp-old"), undefined);
});

test("the least recently used candidate is evicted past the limit", () => {
  const cache = new CandidateResultCache({ maxCandidates: 2 });
  const analysis = computeMatch(requirement, {});
  cache.set("cand-1", "matching", "fp", analysis);
  cache.set("cand-2", "matching", "fp", analysis);
  cache.get("cand-1", "matching", "fp");
  cache.set("cand-3", "matching", "fp", analysis);

  assert.equal(cache.size, 2);
  assert.equal(cache.get("cand-2", "matching", "fp"), undefined);
  assert.equal(cache.get("cand-1", "matching", "fp"), analysis);
  assert.equal(cache.get("cand-3", "matching", "fp"), analysis);
});

test("fingerprints ignore property order and undefined fields", () => {
  assert.equal(
    fingerprintOf({ a: 1, b: [1, { c: "x", d: null }] }),
    fingerprintOf({ b: [1, { d: null, c: "x" }], a: 1, e: undefined }),
  );
  assert.notEqual(fingerprintOf({ a: [1, 2] }), fingerprintOf({ a: [2, 1] }));
  assert.equal(fingerprintOf("x").length, 64);
});
