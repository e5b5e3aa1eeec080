import type { TokenUsage } from "@chunkwise/shared";

import { type ClassifiedProviderError, classifyProviderError, MalformedResponseError } from "./error_classification";
import { extractJsonValue } from "./json";
import { buildExtractionRequest, type PromptChunk } from "./prompts";
import { withTimeout } from "./timeout";
import type { ExtractionProvider, ProviderResponse } from "./types";
import { normalizeUsage } from "./usage";

export interface ExtractionCallParams {
  provider: ExtractionProvider;
  chunk: PromptChunk;
  totalChunks: number;
  instruction: string;
  schema?: Record<string, unknown>;
  timeoutMs: number;
  maxOutputTokens?: number;
}

export type ExtractionCallOutcome =
  | { ok: true; content: unknown; usage: TokenUsage }
  | {
      ok: false;
      error: ClassifiedProviderError;
      /** Present when the provider answered (and billed) but the answer was unusable. */
      usage: TokenUsage | null;
    };

function parseContent(outputText: string, schemaRequested: boolean): unknown {
  if (outputText.length === 0) {
    throw new MalformedResponseError("Provider returned empty output");
  }
  const json = extractJsonValue(outputText);
  if (json) return json;
  if (schemaRequested) {
    throw new MalformedResponseError("Provider output is not JSON matching the requested schema");
  }
  return outputText;
}

/**
 * One provider call for one chunk. Never throws: failures come back classified
 * so the orchestrator can decide whether to retry.
 */
export async function callExtraction(params: ExtractionCallParams): Promise<ExtractionCallOutcome> {
  const { provider, chunk } = params;
  const request = buildExtractionRequest({
    instruction: params.instruction,
    schema: params.schema,
    chunk,
    totalChunks: params.totalChunks,
    maxOutputTokens: params.maxOutputTokens,
  });

  const controller = new AbortController();
  let response: ProviderResponse;
  try {
    response = await withTimeout(
      provider.complete(request, controller.signal),
      params.timeoutMs,
      `${provider.name} extraction (chunk ${chunk.index})`,
      controller,
    );
  } catch (err) {
    return { ok: false, error: classifyProviderError(err), usage: null };
  }

  const usage = normalizeUsage(response.usage);
  try {
    return { ok: true, content: parseContent(response.outputText, params.schema !== undefined), usage };
  } catch (err) {
    return { ok: false, error: classifyProviderError(err), usage };
  }
}
