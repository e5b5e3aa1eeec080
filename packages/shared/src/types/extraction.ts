import type { TokenUsage } from "./usage";

export type ProviderErrorKind =
  | "rate_limited"
  | "timeout"
  | "provider_error"
  | "auth_error"
  | "malformed_response";

/** `cancelled` marks chunks that never got (another) attempt because the job was cancelled. */
export type ChunkErrorKind = ProviderErrorKind | "cancelled";

export interface ChunkError {
  kind: ChunkErrorKind;
  message: string;
}

export type ChunkStatus = "success" | "failed";

export interface ChunkResult {
  chunkIndex: number;
  /** Parsed JSON when a schema was requested (or the output parsed), raw text otherwise. */
  content: unknown;
  /** null when no provider call for this chunk returned a response. */
  usage: TokenUsage | null;
  status: ChunkStatus;
  error: ChunkError | null;
  attempts: number;
}

export type OverallStatus = "success" | "partial" | "failed";

export interface AggregateResult {
  chunks: ChunkResult[];
  usage: TokenUsage;
  overallStatus: OverallStatus;
}

export interface ChunkingOptions {
  /** Character budget per chunk. Takes precedence over maxTokens. */
  maxChars?: number;
  /** Token budget per chunk, converted to characters. */
  maxTokens?: number;
  overlapChars?: number;
  /** Fraction of the budget, counted back from the limit, searched for a boundary. */
  boundaryTolerance?: number;
}

export interface RetryPolicy {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface ExtractionOptions {
  instruction: string;
  schema?: Record<string, unknown>;
  chunking: ChunkingOptions;
  concurrency: number;
  retry: RetryPolicy;
  timeoutMs: number;
}

export interface DocumentInput {
  url: string;
  content: string;
}

export function computeOverallStatus(chunks: readonly ChunkResult[]): OverallStatus {
  const succeeded = chunks.filter((c) => c.status === "success").length;
  if (chunks.length > 0 && succeeded === chunks.length) return "success";
  if (succeeded > 0) return "partial";
  return "failed";
}
