import type {
  AggregateResult,
  ChunkErrorKind,
  ChunkStatus,
  Job,
  JobError,
  JobStatus,
  TokenDetails,
  TokenUsage,
  UsageAvailability,
} from "@chunkwise/shared";

export interface ChunkUsageView {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
}

export interface TokenUsageView extends ChunkUsageView {
  availability: UsageAvailability;
  prompt_tokens_details?: TokenDetails;
  completion_tokens_details?: TokenDetails;
  /** Per-chunk usage in chunk order; null where a chunk has none. */
  chunks: Array<ChunkUsageView | null>;
}

export interface ChunkStatusView {
  index: number;
  status: ChunkStatus;
  error: { kind: ChunkErrorKind; message: string } | null;
}

export interface DocumentResultView {
  url: string;
  success: boolean;
  overall_status: AggregateResult["overallStatus"];
  extracted_content: unknown[];
  error?: string;
  chunks: ChunkStatusView[];
  token_usage?: TokenUsageView;
}

export interface WebhookPayload {
  task_id: string;
  task_type: "llm_extraction";
  status: JobStatus;
  urls: string[];
  result: DocumentResultView | null;
  token_usage: TokenUsageView | null;
  error: JobError | null;
}

function chunkUsageView(usage: TokenUsage): ChunkUsageView {
  return {
    prompt_tokens: usage.promptTokens,
    completion_tokens: usage.completionTokens,
    total_tokens: usage.totalTokens,
  };
}

/**
 * Wire shape of an aggregate's usage, or null when no chunk reported any.
 */
export function tokenUsageView(result: AggregateResult): TokenUsageView | null {
  const { usage } = result;
  if (usage.availability === "unavailable") return null;

  const view: TokenUsageView = {
    ...chunkUsageView(usage),
    availability: usage.availability,
    chunks: result.chunks.map((c) => (c.usage && c.usage.availability !== "unavailable" ? chunkUsageView(c.usage) : null)),
  };
  if (usage.promptTokensDetails) view.prompt_tokens_details = usage.promptTokensDetails;
  if (usage.completionTokensDetails) view.completion_tokens_details = usage.completionTokensDetails;
  return view;
}

/** Successful chunk contents in chunk order, with array outputs flattened. */
export function mergeExtractedContent(result: AggregateResult): unknown[] {
  const merged: unknown[] = [];
  for (const chunk of result.chunks) {
    if (chunk.status !== "success") continue;
    if (Array.isArray(chunk.content)) merged.push(...chunk.content);
    else merged.push(chunk.content);
  }
  return merged;
}

export function documentResultView(url: string, result: AggregateResult): DocumentResultView {
  const view: DocumentResultView = {
    url,
    success: result.overallStatus !== "failed",
    overall_status: result.overallStatus,
    extracted_content: mergeExtractedContent(result),
    chunks: result.chunks.map((c) => ({ index: c.chunkIndex, status: c.status, error: c.error })),
  };

  if (result.overallStatus === "failed") {
    const first = result.chunks.find((c) => c.error);
    view.error = first?.error
      ? `All ${result.chunks.length} chunks failed (first: ${first.error.kind}: ${first.error.message})`
      : "Extraction failed";
  }
  const usage = tokenUsageView(result);
  if (usage) view.token_usage = usage;
  return view;
}

export function buildWebhookPayload(job: Job): WebhookPayload {
  return {
    task_id: job.id,
    task_type: "llm_extraction",
    status: job.status,
    urls: [job.input.url],
    result: job.result ? documentResultView(job.input.url, job.result) : null,
    token_usage: job.result ? tokenUsageView(job.result) : null,
    error: job.error,
  };
}
