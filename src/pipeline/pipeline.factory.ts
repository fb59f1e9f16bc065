import { LlmClient } from "../ai/llm.client";
import { GeneratorCallSettings } from "../ai/llm.safe";
import { RetryPolicy } from "../ai/retry-policy";
import { AnswerScoreProvider, AnswerScoringService } from "../assessment/answer-scoring.service";
import { EnvConfig } from "../config/env";
import { Logger } from "../config/logger";
import { CategoryScoreProvider, CategoryScoringService } from "../matching/category-scoring.service";
import { MatchWeights } from "../shared/types/match.types";
import { EvaluationPipeline } from "./evaluation.pipeline";
import { CandidateResultCache } from "./result-cache";

export interface PipelineOverrides {
  weights?: MatchWeights;
  categoryScorer?: CategoryScoreProvider;
  answerScorer?: AnswerScoreProvider;
  cache?: CandidateResultCache;
}

/** Wires the pipeline from configuration. Generator-backed scorers exist only when an API key is set. */
export function createEvaluationPipeline(
  env: EnvConfig,
  logger: Logger,
  overrides: PipelineOverrides = {},
): EvaluationPipeline {
  const settings: GeneratorCallSettings = {
    timeoutMs: env.generatorTimeoutMs,
    retryPolicy: new RetryPolicy({
      maxAttempts: env.generatorMaxAttempts,
      backoffMs: env.generatorBackoffMs,
    }),
  };
  const llmClient = env.generatorApiKey
    ? new LlmClient(
        {
          apiUrl: env.generatorApiUrl,
          apiKey: env.generatorApiKey,
          model: env.generatorModel,
        },
        logger,
      )
    : null;

  return new EvaluationPipeline({
    logger,
    categoryScorer:
      overrides.categoryScorer ?? (llmClient ? new CategoryScoringService(llmClient, logger, settings) : undefined),
    answerScorer:
      overrides.answerScorer ?? (llmClient ? new AnswerScoringService(llmClient, logger, settings) : undefined),
    cache: overrides.cache ?? new CandidateResultCache({ maxCandidates: env.resultCacheMaxCandidates }),
    weights: overrides.weights ?? env.matchWeights,
    passThreshold: env.assessmentPassThreshold,
    concurrency: env.pipelineConcurrency,
  });
}
