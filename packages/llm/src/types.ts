import type { RawUsage } from "@chunkwise/shared";

export interface ExtractionRequest {
  system: string;
  user: string;
  maxOutputTokens?: number;
  temperature?: number;
}

/**
 * What every provider client hands back. Provider-specific response shapes stop
 * here: `usage` carries only the counters the provider actually reported.
 */
export interface ProviderResponse {
  outputText: string;
  usage: RawUsage | null;
  rawResponse: unknown;
  endpoint: string;
}

/**
 * Capability set the extraction pipeline needs from any LLM provider client.
 */
export interface ExtractionProvider {
  readonly name: string;
  readonly model: string;
  complete(request: ExtractionRequest, signal?: AbortSignal): Promise<ProviderResponse>;
}

export type ProviderHttpError = Error & {
  statusCode?: number;
  statusText?: string;
  endpoint?: string;
  model?: string;
  responseSnippet?: string | null;
  requestId?: string | null;
};
