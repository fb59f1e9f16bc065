import { Logger, LoggerContext, logContext } from "../config/logger";
import { isRecord } from "../profiles/profile.schemas";
import { ExternalServiceError, GeneratorTimeoutError, ValidationError } from "../shared/errors";
import { buildJsonRepairV1Prompt } from "./prompts/utils/json-repair.v1.prompt";
import { RetryPolicy } from "./retry-policy";
import { EVALUATOR_SYSTEM_PROMPT } from "./system/evaluator.system";

export interface StructuredJsonGenerator {
  generateStructuredJson(prompt: string, maxTokens: number, options?: { promptName?: string }): Promise<string>;
  getModelName?(): string;
}

export interface JsonSafeCallArgs<T> {
  llmClient: StructuredJsonGenerator;
  prompt: string;
  maxTokens: number;
  promptName: string;
  schemaHint: string;
  validate: (value: unknown) => value is T;
  logger?: Logger;
  timeoutMs?: number;
  retryPolicy?: RetryPolicy;
  signal?: AbortSignal;
  context?: LoggerContext;
}

export type SafeJsonErrorCode =
  | "missing_system_prompt"
  | "timeout"
  | "transient_failure"
  | "llm_failure"
  | "json_parse_failed"
  | "schema_invalid";

export type SafeJsonResult<T> =
  | {
      ok: true;
      data: T;
      attempts: number;
    }
  | {
      ok: false;
      error_code: SafeJsonErrorCode;
      attempts: number;
      raw?: string;
    };

type RawCallResult =
  | { ok: true; raw: string; attempts: number }
  | { ok: false; error_code: "timeout" | "transient_failure" | "llm_failure"; attempts: number };

export const DEFAULT_TIMEOUT_MS = 25_000;

const SINGLE_RETRY_POLICY = new RetryPolicy({ maxAttempts: 2, backoffMs: [0] });

export async function callJsonPromptSafe<T>(args: JsonSafeCallArgs<T>): Promise<SafeJsonResult<T>> {
  if (!EVALUATOR_SYSTEM_PROMPT.trim()) {
    return { ok: false, error_code: "missing_system_prompt", attempts: 0 };
  }

  const timeoutMs = normalizeTimeout(args.timeoutMs);
  const initial = await attemptJsonCall(args, args.prompt, args.maxTokens, args.promptName, timeoutMs);
  if (!initial.ok) {
    return initial;
  }

  const parsed = tryParseJsonObject(initial.raw);
  if (parsed.ok) {
    if (!args.validate(parsed.data)) {
      return { ok: false, error_code: "schema_invalid", raw: initial.raw, attempts: initial.attempts };
    }
    return { ok: true, data: parsed.data, attempts: initial.attempts };
  }

  const repairPrompt = buildJsonRepairV1Prompt({
    schemaHint: args.schemaHint,
    raw: initial.raw,
  });
  const repaired = await attemptJsonCall(
    args,
    repairPrompt,
    Math.max(240, Math.min(2400, args.maxTokens)),
    `${args.promptName}_json_repair`,
    timeoutMs,
  );
  const attempts = initial.attempts + repaired.attempts;
  if (!repaired.ok) {
    return { ...repaired, attempts };
  }
  const repairedParsed = tryParseJsonObject(repaired.raw);
  if (!repairedParsed.ok) {
    return { ok: false, error_code: "json_parse_failed", raw: repaired.raw, attempts };
  }
  if (!args.validate(repairedParsed.data)) {
    return { ok: false, error_code: "schema_invalid", raw: repaired.raw, attempts };
  }
  return { ok: true, data: repairedParsed.data, attempts };
}

async function attemptJsonCall<T>(
  args: JsonSafeCallArgs<T>,
  prompt: string,
  maxTokens: number,
  promptName: string,
  timeoutMs: number,
): Promise<RawCallResult> {
  const policy = args.retryPolicy ?? SINGLE_RETRY_POLICY;
  const context: LoggerContext = {
    ...(args.context ?? {}),
    prompt_name: promptName,
    model_name: args.llmClient.getModelName?.(),
  };

  const outcome = await policy.execute(
    () => withTimeout(args.llmClient.generateStructuredJson(prompt, maxTokens, { promptName }), timeoutMs),
    {
      isRetryable: isTransientError,
      signal: args.signal,
      onRetry: ({ attempt, delayMs, error }) => {
        if (args.logger) {
          logContext(args.logger, "warn", "llm.safe.retry", { ...context, attempt }, {
            delayMs,
            error: error instanceof Error ? error.message : "Unknown error",
          });
        }
      },
    },
  );

  if (outcome.ok) {
    return { ok: true, raw: outcome.value, attempts: outcome.attempts };
  }
  return {
    ok: false,
    error_code: isTimeoutError(outcome.error)
      ? "timeout"
      : isTransientError(outcome.error)
        ? "transient_failure"
        : "llm_failure",
    attempts: outcome.attempts,
  };
}

export function tryParseJsonObject(raw: string): { ok: true; data: Record<string, unknown> } | { ok: false } {
  const text = raw.trim();
  const firstBrace = text.indexOf("{");
  const lastBrace = text.lastIndexOf("}");
  if (firstBrace < 0 || lastBrace < 0 || lastBrace <= firstBrace) {
    return { ok: false };
  }
  try {
    const parsed: unknown = JSON.parse(text.slice(firstBrace, lastBrace + 1));
    return isRecord(parsed) ? { ok: true, data: parsed } : { ok: false };
  } catch {
    return { ok: false };
  }
}

function normalizeTimeout(value?: number): number {
  if (typeof value === "number" && Number.isFinite(value) && value > 0) {
    return Math.round(value);
  }
  return DEFAULT_TIMEOUT_MS;
}

export function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new GeneratorTimeoutError(timeoutMs));
    }, timeoutMs);
    promise
      .then((value) => {
        clearTimeout(timer);
        resolve(value);
      })
      .catch((error: unknown) => {
        clearTimeout(timer);
        reject(error);
      });
  });
}

function isTimeoutError(error: unknown): boolean {
  if (error instanceof GeneratorTimeoutError) {
    return true;
  }
  const message = error instanceof Error ? error.message.toLowerCase() : "";
  return message.includes("timeout") || message.includes("timed out");
}

export function isTransientError(error: unknown): boolean {
  if (isTimeoutError(error)) {
    return true;
  }
  const message = error instanceof Error ? error.message.toLowerCase() : "";
  return (
    message.includes("econnreset") ||
    message.includes("econnrefused") ||
    message.includes("network") ||
    message.includes("429") ||
    message.includes("rate limit") ||
    message.includes("http 500") ||
    message.includes("http 502") ||
    message.includes("http 503") ||
    message.includes("http 504")
  );
}

/** Maps a failed safe call onto the error the pipeline records. */
export function toGeneratorError(
  result: { error_code: SafeJsonErrorCode; attempts: number; raw?: string },
  promptName: string,
  timeoutMs?: number,
): ExternalServiceError | ValidationError {
  if (result.error_code === "timeout") {
    return new GeneratorTimeoutError(normalizeTimeout(timeoutMs), result.attempts);
  }
  if (result.error_code === "json_parse_failed" || result.error_code === "schema_invalid") {
    return new ValidationError(`${promptName} returned malformed output: ${result.error_code}`, result.raw);
  }
  return new ExternalServiceError(`${promptName} failed: ${result.error_code}`, result.attempts);
}

export interface GeneratorCallSettings {
  timeoutMs: number;
  retryPolicy: RetryPolicy;
}

export interface GeneratorCallOptions {
  signal?: AbortSignal;
  context?: LoggerContext;
}
