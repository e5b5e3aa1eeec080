import { classifyProviderError, type ExtractionCallOutcome } from "@chunkwise/llm";
import {
  type AggregateResult,
  type ChunkError,
  type ChunkErrorKind,
  type ChunkResult,
  computeOverallStatus,
  createLogger,
  type Logger,
  type RetryPolicy,
  type TokenUsage,
} from "@chunkwise/shared";

import type { TextChunk } from "../chunking/chunker";
import { Semaphore } from "../lib/semaphore";
import { sleep as defaultSleep, type SleepFn } from "../lib/sleep";
import { backoffDelayMs, maxAttempts } from "./retry_policy";
import { accumulateUsage } from "./usage_accumulator";

/** One provider invocation for one chunk. `attempt` starts at 1. */
export type ChunkCaller = (chunk: TextChunk, attempt: number) => Promise<ExtractionCallOutcome>;

export interface AttemptEvent {
  chunkIndex: number;
  attempt: number;
  outcome: "success" | ChunkErrorKind;
  durationMs: number;
  usage: TokenUsage | null;
}

export interface OrchestratorParams {
  chunks: readonly TextChunk[];
  call: ChunkCaller;
  concurrency: number;
  retry: RetryPolicy;
  /** Cooperative cancel: stops new attempts, lets in-flight calls finish. */
  signal?: AbortSignal;
  sleep?: SleepFn;
  log?: Logger;
  onAttempt?: (event: AttemptEvent) => void;
}

export interface OrchestrationOutcome {
  result: AggregateResult;
  cancelled: boolean;
  /** Provider calls made across all chunks and attempts. */
  invocations: number;
}

function finalize(
  chunkIndex: number,
  fields: Pick<ChunkResult, "content" | "usage" | "error" | "attempts">,
): ChunkResult {
  return Object.freeze({
    chunkIndex,
    status: fields.error ? "failed" : "success",
    ...fields,
  });
}

function cancelledError(attempts: number, lastError: ChunkError | null): ChunkError {
  const suffix = lastError ? ` (last error: ${lastError.kind}: ${lastError.message})` : "";
  return {
    kind: "cancelled",
    message: `Cancelled before attempt ${attempts + 1}${suffix}`,
  };
}

/**
 * Run every chunk through `call` with at most `concurrency` calls in flight.
 *
 * Each chunk retries retryable failures with exponential backoff; backoff sleeps
 * happen outside the semaphore so a waiting retry does not hold a slot. A chunk's
 * attempts are strictly sequential and a failing chunk never affects its
 * siblings. The aggregate is built once every chunk is terminal.
 */
export async function runChunkedExtraction(params: OrchestratorParams): Promise<OrchestrationOutcome> {
  const { chunks, call, retry, signal } = params;
  const sleep = params.sleep ?? defaultSleep;
  const log = params.log ?? createLogger({ component: "orchestrator" });
  const semaphore = new Semaphore(params.concurrency);
  const attemptsAllowed = maxAttempts(retry);
  let invocations = 0;

  const invoke = async (chunk: TextChunk, attempt: number): Promise<ExtractionCallOutcome> => {
    try {
      return await call(chunk, attempt);
    } catch (err) {
      return { ok: false, error: classifyProviderError(err), usage: null };
    }
  };

  const runChunk = async (chunk: TextChunk): Promise<ChunkResult> => {
    let attempts = 0;
    let usage: TokenUsage | null = null;
    let lastError: ChunkError | null = null;

    while (attempts < attemptsAllowed) {
      if (attempts > 0) {
        await sleep(backoffDelayMs(retry, attempts - 1), signal);
      }
      if (signal?.aborted) {
        return finalize(chunk.index, { content: null, usage, error: cancelledError(attempts, lastError), attempts });
      }

      await semaphore.acquire();
      if (signal?.aborted) {
        semaphore.release();
        return finalize(chunk.index, { content: null, usage, error: cancelledError(attempts, lastError), attempts });
      }

      attempts += 1;
      invocations += 1;
      const startedAt = Date.now();
      let outcome: ExtractionCallOutcome;
      try {
        outcome = await invoke(chunk, attempts);
      } finally {
        semaphore.release();
      }
      const durationMs = Date.now() - startedAt;

      if (outcome.ok) {
        params.onAttempt?.({ chunkIndex: chunk.index, attempt: attempts, outcome: "success", durationMs, usage: outcome.usage });
        log.debug({ chunkIndex: chunk.index, attempt: attempts, durationMs }, "Chunk extracted");
        return finalize(chunk.index, { content: outcome.content, usage: outcome.usage, error: null, attempts });
      }

      usage = outcome.usage ?? usage;
      lastError = { kind: outcome.error.kind, message: outcome.error.message };
      params.onAttempt?.({
        chunkIndex: chunk.index,
        attempt: attempts,
        outcome: outcome.error.kind,
        durationMs,
        usage: outcome.usage,
      });

      if (!outcome.error.retryable) {
        log.warn({ chunkIndex: chunk.index, attempt: attempts, kind: outcome.error.kind }, "Chunk failed with fatal error");
        break;
      }
      log.debug(
        { chunkIndex: chunk.index, attempt: attempts, kind: outcome.error.kind, statusCode: outcome.error.statusCode },
        "Chunk attempt failed",
      );
    }

    if (lastError && attempts >= attemptsAllowed) {
      log.warn({ chunkIndex: chunk.index, attempts, kind: lastError.kind }, "Chunk retries exhausted");
    }
    return finalize(chunk.index, { content: null, usage, error: lastError, attempts });
  };

  const settled = await Promise.all(chunks.map((chunk) => runChunk(chunk)));
  const ordered = [...settled].sort((a, b) => a.chunkIndex - b.chunkIndex);
  const { usage } = accumulateUsage(ordered.map((c) => c.usage));

  return {
    result: {
      chunks: ordered,
      usage,
      overallStatus: computeOverallStatus(ordered),
    },
    cancelled: signal?.aborted === true,
    invocations,
  };
}
