import type { ExtractionProvider } from "@chunkwise/llm";
import {
  CodedError,
  createJobLogger,
  errorMessage,
  InvalidTransitionError,
  type Job,
  type JobError,
  type JobStore,
  JobNotFoundError,
  jobStatusForOutcome,
  type Logger,
} from "@chunkwise/shared";

import { extractDocument } from "../extraction/extract_document";
import type { AttemptEvent } from "../extraction/orchestrator";
import type { SleepFn } from "../lib/sleep";
import { buildWebhookPayload } from "../views/response";
import type { WebhookDispatcher } from "../webhooks/dispatcher";

export const DEFAULT_CANCEL_POLL_MS = 1000;

/** Error code of a job whose runner disappeared mid-run. */
export const WORKER_LOST_CODE = "WORKER_LOST";

export interface JobRunnerDeps {
  store: JobStore;
  provider: ExtractionProvider;
  dispatcher?: WebhookDispatcher;
  cancelPollMs?: number;
  maxOutputTokens?: number;
  sleep?: SleepFn;
  log?: Logger;
  onAttempt?: (event: AttemptEvent) => void;
}

export interface JobRunResult {
  job: Job;
  /** False when the job was no longer pending and nothing ran. */
  ran: boolean;
  cancelled: boolean;
  invocations: number;
}

function toJobError(err: unknown): JobError {
  if (err instanceof CodedError) return { code: err.code, message: err.message };
  return { code: "INTERNAL_ERROR", message: errorMessage(err) };
}

/**
 * POST the job's terminal state to its webhook and record the outcome.
 * A no-op without a webhook or a dispatcher. Never throws for delivery or
 * recording failures.
 */
export async function notifyJobWebhook(
  deps: Pick<JobRunnerDeps, "store" | "dispatcher">,
  job: Job,
  log: Logger,
): Promise<Job> {
  if (!job.webhook || !deps.dispatcher) return job;
  const outcome = await deps.dispatcher.deliver(buildWebhookPayload(job), job.webhook);
  try {
    await deps.store.recordWebhookDelivery(job.id, outcome);
  } catch (err) {
    log.error({ err: errorMessage(err) }, "Failed to record webhook delivery");
  }
  return { ...job, webhookDelivery: outcome };
}

/**
 * Move a terminal state into the store. A cancel that lands after the
 * orchestrator finished wins: the stored cancelled job is returned instead.
 */
async function commit(
  store: JobStore,
  job: Job,
  to: Parameters<JobStore["transition"]>[1],
  patch: Parameters<JobStore["transition"]>[2],
): Promise<Job> {
  try {
    return await store.transition(job.id, to, patch);
  } catch (err) {
    if (!(err instanceof InvalidTransitionError)) throw err;
    const current = await store.get(job.id);
    if (!current) throw new JobNotFoundError(job.id);
    return current;
  }
}

/**
 * Handle a job the runner was handed but cannot start.
 *
 * A `running` job seen here was left behind by a runner that died (the queue
 * re-delivers stalled jobs), so it is failed with WORKER_LOST. A job cancelled
 * before it started still owes its webhook.
 */
async function settleUnstartedJob(deps: JobRunnerDeps, job: Job, log: Logger): Promise<JobRunResult> {
  let settled = job;
  if (job.status === "running") {
    log.warn("Job was left running by a lost runner, failing it");
    settled = await commit(deps.store, job, "failed", {
      error: { code: WORKER_LOST_CODE, message: "The runner processing this job stopped before it finished" },
    });
    if (settled.status === "failed") settled = await notifyJobWebhook(deps, settled, log);
  } else if (job.status === "cancelled" && job.webhookDelivery === null) {
    log.info("Job was cancelled before it started");
    settled = await notifyJobWebhook(deps, job, log);
  } else {
    log.info({ status: job.status }, "Job is not pending, skipping");
  }
  return { job: settled, ran: false, cancelled: settled.status === "cancelled", invocations: 0 };
}

/**
 * Run one stored job end to end: running, extraction, terminal state, webhook.
 *
 * Cancellation is picked up by polling the store; once seen, the orchestrator
 * stops starting provider calls, in-flight calls drain and the job stays
 * cancelled without a result. A ChunkingError fails the job, is reported to
 * the webhook and rethrown.
 */
export async function runExtractionJob(deps: JobRunnerDeps, jobId: string): Promise<JobRunResult> {
  const { store } = deps;
  const log = deps.log ?? createJobLogger(jobId);

  const loaded = await store.get(jobId);
  if (!loaded) throw new JobNotFoundError(jobId);
  if (loaded.status !== "pending") return settleUnstartedJob(deps, loaded, log);

  let running: Job;
  try {
    running = await store.transition(jobId, "running");
  } catch (err) {
    if (!(err instanceof InvalidTransitionError)) throw err;
    const current = await store.get(jobId);
    if (!current) throw new JobNotFoundError(jobId);
    // Another runner already started it; that runner owns it.
    if (current.status === "running") {
      log.info("Job was started by another runner, skipping");
      return { job: current, ran: false, cancelled: false, invocations: 0 };
    }
    return settleUnstartedJob(deps, current, log);
  }

  const controller = new AbortController();
  const pollMs = deps.cancelPollMs ?? DEFAULT_CANCEL_POLL_MS;
  const cancelPoll = setInterval(async () => {
    try {
      const current = await store.get(jobId);
      if (current?.status === "cancelled" && !controller.signal.aborted) {
        log.info("Cancellation requested, draining in-flight calls");
        controller.abort();
      }
    } catch (err) {
      log.warn({ err: errorMessage(err) }, "Failed to poll job for cancellation");
    }
  }, pollMs);

  const startedAt = Date.now();
  try {
    const extraction = await extractDocument({
      document: running.input,
      options: running.options,
      provider: deps.provider,
      signal: controller.signal,
      sleep: deps.sleep,
      log,
      maxOutputTokens: deps.maxOutputTokens,
      onAttempt: deps.onAttempt,
    });
    const { result } = extraction;
    // A cancelled run keeps the stored cancelled job; its partial result is dropped.
    let job = extraction.cancelled
      ? await commit(store, running, "cancelled", {})
      : await commit(store, running, jobStatusForOutcome(result.overallStatus), { result });

    log.info(
      {
        status: job.status,
        overallStatus: result.overallStatus,
        chunks: result.chunks.length,
        invocations: extraction.invocations,
        totalTokens: result.usage.totalTokens,
        durationMs: Date.now() - startedAt,
      },
      "Extraction job finished",
    );
    job = await notifyJobWebhook(deps, job, log);
    return { job, ran: true, cancelled: job.status === "cancelled", invocations: extraction.invocations };
  } catch (err) {
    const error = toJobError(err);
    log.error({ code: error.code, err: error.message }, "Extraction job failed");
    const failed = await commit(store, running, "failed", { error });
    await notifyJobWebhook(deps, failed, log);
    throw err;
  } finally {
    clearInterval(cancelPoll);
  }
}
