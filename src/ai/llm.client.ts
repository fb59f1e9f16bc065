import fetch from "node-fetch";
import { Logger } from "../config/logger";
import { isRecord } from "../profiles/profile.schemas";
import { ExternalServiceError } from "../shared/errors";
import { EVALUATOR_SYSTEM_PROMPT } from "./system/evaluator.system";

const EVALUATOR_EXECUTION_SYSTEM_PROMPT = [
  "Universal execution rules.",
  "If output requires strict JSON, return JSON only and follow schema exactly.",
  "Score only what the input shows.",
  "Keep evidence strings short and factual.",
].join(" ");

export interface ChatCompletionsRequestBody {
  model: string;
  temperature: number;
  messages: Array<{
    role: "system" | "user";
    content: string;
  }>;
  max_tokens?: number;
  max_completion_tokens?: number;
}

export interface LlmClientConfig {
  apiUrl: string;
  apiKey: string;
  model: string;
}

interface LlmCallOptions {
  promptName?: string;
}

export class LlmClient {
  constructor(
    private readonly config: LlmClientConfig,
    private readonly logger: Logger,
  ) {
    if (!config.apiKey.trim()) {
      throw new ExternalServiceError("Generator API key is empty");
    }
  }

  getModelName(): string {
    return this.config.model;
  }

  async generateStructuredJson(
    prompt: string,
    maxTokens: number,
    options?: LlmCallOptions,
  ): Promise<string> {
    const startedAt = Date.now();
    const promptName = options?.promptName ?? "structured_json";
    const requestBody = this.buildJsonRequestBody(prompt, maxTokens);
    try {
      const response = await fetch(this.config.apiUrl, {
        method: "POST",
        headers: {
          authorization: `Bearer ${this.config.apiKey}`,
          "content-type": "application/json",
        },
        body: JSON.stringify(requestBody),
      });

      if (!response.ok) {
        const body = await response.text();
        throw new ExternalServiceError(`Generator API error: HTTP ${response.status} - ${body.slice(0, 300)}`);
      }

      const body: unknown = await response.json();
      const content = extractMessageContent(body);
      if (!content) {
        throw new ExternalServiceError("Generator response does not contain message content");
      }

      this.logger.info("llm.call.completed", {
        prompt_name: promptName,
        model_name: this.config.model,
        latency_ms: Date.now() - startedAt,
        maxTokens,
        tokenEstimate: estimateTokenCount(prompt, content),
      });
      return content;
    } catch (error) {
      this.logger.warn("llm.call.failed", {
        prompt_name: promptName,
        model_name: this.config.model,
        latency_ms: Date.now() - startedAt,
        maxTokens,
        error: error instanceof Error ? error.message : "Unknown error",
      });
      throw error;
    }
  }

  buildJsonRequestBody(prompt: string, maxTokens: number): ChatCompletionsRequestBody {
    const body: ChatCompletionsRequestBody = {
      model: this.config.model,
      temperature: 0.2,
      messages: [
        {
          role: "system",
          content: EVALUATOR_SYSTEM_PROMPT,
        },
        {
          role: "system",
          content: EVALUATOR_EXECUTION_SYSTEM_PROMPT,
        },
        {
          role: "user",
          content: prompt,
        },
      ],
    };
    if (usesMaxCompletionTokens(this.config.model)) {
      body.max_completion_tokens = maxTokens;
    } else {
      body.max_tokens = maxTokens;
    }
    return body;
  }
}

function extractMessageContent(body: unknown): string | null {
  if (!isRecord(body) || !Array.isArray(body.choices)) {
    return null;
  }
  const first: unknown = body.choices[0];
  if (!isRecord(first) || !isRecord(first.message)) {
    return null;
  }
  const content = first.message.content;
  return typeof content === "string" && content.trim() ? content : null;
}

function estimateTokenCount(prompt: string, output: string): number {
  const totalChars = prompt.length + output.length;
  return Math.max(1, Math.round(totalChars / 4));
}

/** Reasoning models reject max_tokens. */
function usesMaxCompletionTokens(model: string): boolean {
  const normalized = model.trim().toLowerCase().replace(/^[a-z0-9-]+\//, "");
  return normalized.startsWith("gpt-5") || /^o\d/.test(normalized);
}
