import Anthropic from "@anthropic-ai/sdk";
import type { RawUsage } from "@chunkwise/shared";

import type { ExtractionProvider, ProviderHttpError, ProviderResponse } from "./types";

const ANTHROPIC_ENDPOINT = "https://api.anthropic.com/v1/messages";

export interface AnthropicConfig {
  apiKey: string;
  model: string;
  maxOutputTokens?: number;
  /** Injected in tests; built from apiKey otherwise. */
  client?: Anthropic;
}

interface AnthropicUsage {
  input_tokens: number;
  output_tokens: number;
  cache_read_input_tokens?: number | null;
  cache_creation_input_tokens?: number | null;
}

function usageFrom(usage: AnthropicUsage | undefined): RawUsage | null {
  if (!usage) return null;
  const cacheRead = usage.cache_read_input_tokens;
  const cacheWrite = usage.cache_creation_input_tokens;
  const promptTokensDetails: Record<string, number> = {};
  if (typeof cacheRead === "number") promptTokensDetails.cached_tokens = cacheRead;
  if (typeof cacheWrite === "number") promptTokensDetails.cache_creation_tokens = cacheWrite;
  return {
    promptTokens: usage.input_tokens,
    completionTokens: usage.output_tokens,
    ...(Object.keys(promptTokensDetails).length > 0 ? { promptTokensDetails } : {}),
  };
}

export function createAnthropicProvider(config: AnthropicConfig): ExtractionProvider {
  const client = config.client ?? new Anthropic({ apiKey: config.apiKey, maxRetries: 0 });

  return {
    name: "anthropic",
    model: config.model,
    async complete(request, signal): Promise<ProviderResponse> {
      try {
        const response = await client.messages.create(
          {
            model: config.model,
            max_tokens: request.maxOutputTokens ?? config.maxOutputTokens ?? 4096,
            temperature: request.temperature ?? 0,
            system: request.system,
            messages: [{ role: "user", content: request.user }],
          },
          { signal },
        );

        const outputText = response.content
          .filter((block): block is Anthropic.TextBlock => block.type === "text")
          .map((block) => block.text)
          .join("");

        return {
          outputText: outputText.trim(),
          usage: usageFrom(response.usage),
          rawResponse: response,
          endpoint: ANTHROPIC_ENDPOINT,
        };
      } catch (error) {
        if (error instanceof Anthropic.APIConnectionTimeoutError) {
          const err = new Error(`Anthropic request timed out: ${error.message}`);
          err.name = "TimeoutError";
          throw err;
        }
        if (error instanceof Anthropic.APIError) {
          const err: ProviderHttpError = new Error(`Anthropic API error (${error.status}): ${error.message}`);
          err.statusCode = error.status;
          err.endpoint = ANTHROPIC_ENDPOINT;
          err.model = config.model;
          err.requestId = error.headers?.["request-id"] ?? null;
          throw err;
        }
        throw error;
      }
    },
  };
}
