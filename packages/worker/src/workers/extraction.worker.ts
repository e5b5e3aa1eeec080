import type { ExtractionProvider } from "@chunkwise/llm";
import { runExtractionJob, type WebhookDispatcher } from "@chunkwise/pipeline";
import { EXTRACTION_QUEUE_NAME, parseRedisConnection, type RunExtractionJobData } from "@chunkwise/queues";
import { createJobLogger, type JobStatus, type JobStore } from "@chunkwise/shared";
import { type Job, Worker } from "bullmq";

import { recordExtractionJob, recordProviderAttempt, updateHealthStatus } from "../metrics";

export interface ExtractionWorkerDeps {
  store: JobStore;
  provider: ExtractionProvider;
  dispatcher: WebhookDispatcher;
  cancelPollMs: number;
}

/** Kept as the BullMQ return value, so it stays small. */
export interface ExtractionJobSummary {
  jobId: string;
  status: JobStatus;
  ran: boolean;
  invocations: number;
}

/**
 * Handle one run_extraction job: run the stored job and record metrics.
 * Errors propagate so BullMQ marks the queue job failed.
 */
export async function handleRunExtractionJob(
  deps: ExtractionWorkerDeps,
  job: Pick<Job<RunExtractionJobData>, "id" | "data">,
): Promise<ExtractionJobSummary> {
  const { jobId } = job.data;
  const jobLog = createJobLogger(jobId);
  const startTime = process.hrtime.bigint();

  jobLog.info({ queueJobId: job.id }, "Starting extraction job");
  try {
    const run = await runExtractionJob(
      {
        store: deps.store,
        provider: deps.provider,
        dispatcher: deps.dispatcher,
        cancelPollMs: deps.cancelPollMs,
        log: jobLog,
        onAttempt: (event) => recordProviderAttempt(deps.provider, event),
      },
      jobId,
    );
    if (run.ran) {
      const durationSec = Number(process.hrtime.bigint() - startTime) / 1e9;
      recordExtractionJob({ status: run.job.status, durationSec });
    }
    return { jobId, status: run.job.status, ran: run.ran, invocations: run.invocations };
  } catch (err) {
    const durationSec = Number(process.hrtime.bigint() - startTime) / 1e9;
    recordExtractionJob({ status: "error", durationSec });
    throw err;
  } finally {
    updateHealthStatus({ lastJobAt: new Date().toISOString() });
  }
}

/**
 * Create the worker that processes run_extraction jobs.
 */
export function createExtractionWorker(params: {
  redisUrl: string;
  concurrency: number;
  deps: ExtractionWorkerDeps;
}): Worker<RunExtractionJobData, ExtractionJobSummary> {
  const worker = new Worker<RunExtractionJobData, ExtractionJobSummary>(
    EXTRACTION_QUEUE_NAME,
    (job) => handleRunExtractionJob(params.deps, job),
    {
      connection: parseRedisConnection(params.redisUrl),
      concurrency: params.concurrency,
    },
  );

  worker.on("failed", (job, err) => {
    const jobLog = createJobLogger(job?.data.jobId ?? "unknown");
    jobLog.error({ err: err.message }, "Extraction job failed");
  });

  worker.on("completed", (job, result) => {
    const jobLog = createJobLogger(job.data.jobId);
    jobLog.info({ status: result.status, invocations: result.invocations }, "Extraction job processed");
  });

  return worker;
}
