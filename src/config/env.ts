import dotenv from "dotenv";
import { DEFAULT_PASS_THRESHOLD } from "../assessment/assessment-scorer";
import { DEFAULT_MATCH_WEIGHTS, parseWeightsOverride } from "../matching/weights";
import { DEFAULT_CACHE_MAX_CANDIDATES } from "../pipeline/result-cache";
import { ConfigurationError } from "../shared/errors";
import { MatchWeights } from "../shared/types/match.types";
import { LogLevel } from "./logger";

dotenv.config();

export const DEFAULT_GENERATOR_API_URL = "https://openrouter.ai/api/v1/chat/completions";
export const DEFAULT_GENERATOR_MODEL = "openai/o3-mini";

export interface EnvConfig {
  readonly nodeEnv: string;
  readonly port: number;
  readonly logLevel: LogLevel;
  readonly generatorApiUrl: string;
  readonly generatorApiKey?: string;
  readonly generatorModel: string;
  readonly generatorTimeoutMs: number;
  readonly generatorMaxAttempts: number;
  readonly generatorBackoffMs: readonly number[];
  readonly matchWeights: Readonly<MatchWeights>;
  readonly assessmentPassThreshold: number;
  readonly pipelineConcurrency: number;
  readonly resultCacheMaxCandidates: number;
}

type EnvSource = Record<string, string | undefined>;

function getOptionalTrimmed(source: EnvSource, name: string): string | undefined {
  const value = source[name];
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

/**
 * Builds the process-wide configuration once at startup. Every value is
 * validated here; a bad value stops the process instead of surfacing later
 * inside a candidate run.
 */
export function loadEnv(source: EnvSource = process.env): EnvConfig {
  const portRaw = source.PORT ?? "3000";
  const port = Number(portRaw);
  const timeoutRaw = source.GENERATOR_TIMEOUT_MS ?? "25000";
  const generatorTimeoutMs = Number(timeoutRaw);
  const maxAttemptsRaw = source.GENERATOR_MAX_ATTEMPTS ?? "3";
  const generatorMaxAttempts = Number(maxAttemptsRaw);
  const backoffRaw = source.GENERATOR_BACKOFF_MS ?? "500,1500";
  const thresholdRaw = source.ASSESSMENT_PASS_THRESHOLD ?? String(DEFAULT_PASS_THRESHOLD);
  const assessmentPassThreshold = Number(thresholdRaw);
  const concurrencyRaw = source.PIPELINE_CONCURRENCY ?? "4";
  const pipelineConcurrency = Number(concurrencyRaw);
  const cacheSizeRaw = source.RESULT_CACHE_MAX_CANDIDATES ?? String(DEFAULT_CACHE_MAX_CANDIDATES);
  const resultCacheMaxCandidates = Number(cacheSizeRaw);
  const weightsRaw = getOptionalTrimmed(source, "MATCH_WEIGHTS");

  if (!Number.isInteger(port) || port <= 0) {
    throw new ConfigurationError(`Invalid PORT value: ${portRaw}`);
  }
  if (!Number.isInteger(generatorTimeoutMs) || generatorTimeoutMs < 1000) {
    throw new ConfigurationError(`Invalid GENERATOR_TIMEOUT_MS value: ${timeoutRaw}`);
  }
  if (!Number.isInteger(generatorMaxAttempts) || generatorMaxAttempts < 1 || generatorMaxAttempts > 10) {
    throw new ConfigurationError(`Invalid GENERATOR_MAX_ATTEMPTS value: ${maxAttemptsRaw}. Expected 1-10.`);
  }
  if (!Number.isFinite(assessmentPassThreshold) || assessmentPassThreshold < 0 || assessmentPassThreshold > 100) {
    throw new ConfigurationError(
      `Invalid ASSESSMENT_PASS_THRESHOLD value: ${thresholdRaw}. Expected number between 0 and 100.`,
    );
  }
  if (!Number.isInteger(pipelineConcurrency) || pipelineConcurrency < 1) {
    throw new ConfigurationError(`Invalid PIPELINE_CONCURRENCY value: ${concurrencyRaw}`);
  }
  if (!Number.isInteger(resultCacheMaxCandidates) || resultCacheMaxCandidates < 1) {
    throw new ConfigurationError(`Invalid RESULT_CACHE_MAX_CANDIDATES value: ${cacheSizeRaw}`);
  }

  return Object.freeze({
    nodeEnv: source.NODE_ENV ?? "development",
    port,
    logLevel: parseLogLevel((source.LOG_LEVEL ?? "info").trim().toLowerCase()),
    generatorApiUrl: getOptionalTrimmed(source, "GENERATOR_API_URL") ?? DEFAULT_GENERATOR_API_URL,
    generatorApiKey: getOptionalTrimmed(source, "GENERATOR_API_KEY"),
    generatorModel: getOptionalTrimmed(source, "GENERATOR_MODEL") ?? DEFAULT_GENERATOR_MODEL,
    generatorTimeoutMs,
    generatorMaxAttempts,
    generatorBackoffMs: Object.freeze(parseBackoff(backoffRaw)),
    matchWeights: weightsRaw ? parseWeightsOverride(weightsRaw) : DEFAULT_MATCH_WEIGHTS,
    assessmentPassThreshold,
    pipelineConcurrency,
    resultCacheMaxCandidates,
  });
}

function parseBackoff(value: string): number[] {
  const delays = value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0)
    .map((item) => Number(item));
  if (delays.some((delay) => !Number.isInteger(delay) || delay < 0)) {
    throw new ConfigurationError(`Invalid GENERATOR_BACKOFF_MS value: ${value}`);
  }
  return delays;
}

function parseLogLevel(value: string): LogLevel {
  if (value === "debug" || value === "info" || value === "warn" || value === "error") {
    return value;
  }
  throw new ConfigurationError(`Invalid LOG_LEVEL value: ${value}`);
}
