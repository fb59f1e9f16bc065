import assert from "node:assert/strict";
import { Writable } from "node:stream";
import { test } from "node:test";
import { createLogger, logContext, redactMeta } from "../../config/logger";

function captureLines(): { stream: Writable; lines: () => unknown[] } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      chunks.push(String(chunk));
      callback();
    },
  });
  return {
    stream,
    lines: () =>
      chunks
        .join("")
        .split("\n")
        .filter((line) => line.length > 0)
        .map((line): unknown => JSON.parse(line)),
  };
}

test("writes one JSON line per entry at or above the minimum level", () => {
  const output = captureLines();
  const logger = createLogger({ minLevel: "info", stream: output.stream });

  logger.debug("dropped");
  logger.info("pipeline.run.started", { run_id: "run-1" });
  logger.error("pipeline.run.finished");

  const lines = output.lines();
  assert.equal(lines.length, 2);
  const [first, second] = lines;
  assert.ok(typeof first === "object" && first !== null && "level" in first && "message" in first && "meta" in first);
  assert.equal(first.level, "info");
  assert.equal(first.message, "pipeline.run.started");
  assert.deepEqual(first.meta, { run_id: "run-1" });
  assert.ok(typeof second === "object" && second !== null && "level" in second);
  assert.equal(second.level, "error");
  assert.equal("meta" in second, false);
});

test("logContext merges the run context with extra fields", () => {
  const output = captureLines();
  const logger = createLogger({ minLevel: "debug", stream: output.stream });

  logContext(
    logger,
    "warn",
    "pipeline.stage.failed",
    { run_id: "run-1", stage: "matching", error_code: "timeout" },
    { reason: "Generator call timed out after 25000ms" },
  );

  const [line] = output.lines();
  assert.ok(typeof line === "object" && line !== null && "level" in line && "meta" in line);
  assert.equal(line.level, "warn");
  assert.deepEqual(line.meta, {
    run_id: "run-1",
    stage: "matching",
    error_code: "timeout",
    reason: "Generator call timed out after 25000ms",
  });
});

test("redacts credentials but keeps token counts", () => {
  const redacted = redactMeta({
    apiKey: "test-secret",
    Authorization: "Bearer test-secret",
    client_secret: "test-secret",
    maxTokens: 600,
    tokenEstimate: 120,
    error: new TypeError("bad input"),
    skipped: undefined,
    body: "x".repeat(510),
  });

  assert.deepEqual(redacted, {
    apiKey: "[REDACTED]",
    Authorization: "[REDACTED]",
    client_secret: "[REDACTED]",
    maxTokens: 600,
    tokenEstimate: 120,
    error: { name: "TypeError", message: "bad input" },
    body: `${"x".repeat(500)}...`,
  });
});
