import {
  GeneratorCallOptions,
  GeneratorCallSettings,
  StructuredJsonGenerator,
  callJsonPromptSafe,
  toGeneratorError,
} from "../ai/llm.safe";
import {
  CATEGORY_SCORES_V1_SCHEMA_HINT,
  buildCategoryScoresV1Prompt,
} from "../ai/prompts/matching/category-scores.v1.prompt";
import { Logger, logContext } from "../config/logger";
import { isRecord } from "../profiles/profile.schemas";
import { UpstreamMatchAnalysis } from "../shared/types/match.types";
import { CandidateProfile, JobRequirement } from "../shared/types/profile.types";
import { parseUpstreamMatchAnalysis } from "./match-analysis.parser";

const PROMPT_NAME = "category_scores_v1";

export interface CategoryScoreProvider {
  scoreCategories(
    profile: CandidateProfile,
    requirement: JobRequirement,
    options?: GeneratorCallOptions,
  ): Promise<UpstreamMatchAnalysis>;
}

export class CategoryScoringService implements CategoryScoreProvider {
  constructor(
    private readonly llmClient: StructuredJsonGenerator,
    private readonly logger: Logger,
    private readonly settings: GeneratorCallSettings,
  ) {}

  async scoreCategories(
    profile: CandidateProfile,
    requirement: JobRequirement,
    options: GeneratorCallOptions = {},
  ): Promise<UpstreamMatchAnalysis> {
    const safe = await callJsonPromptSafe({
      llmClient: this.llmClient,
      logger: this.logger,
      prompt: buildCategoryScoresV1Prompt({ profile, requirement }),
      maxTokens: 1400,
      timeoutMs: this.settings.timeoutMs,
      retryPolicy: this.settings.retryPolicy,
      signal: options.signal,
      context: options.context,
      promptName: PROMPT_NAME,
      schemaHint: CATEGORY_SCORES_V1_SCHEMA_HINT,
      validate: hasCategoryMap,
    });

    if (!safe.ok) {
      logContext(this.logger, "warn", "matching.generator.failed", {
        ...options.context,
        prompt_name: PROMPT_NAME,
        attempt: safe.attempts,
        error_code: safe.error_code,
      });
      throw toGeneratorError(safe, PROMPT_NAME, this.settings.timeoutMs);
    }

    return parseUpstreamMatchAnalysis(safe.data);
  }
}

function hasCategoryMap(value: unknown): value is Record<string, unknown> {
  return isRecord(value) && isRecord(value.categories);
}
