import { type JobRunnerDeps, runExtractionJob } from "@chunkwise/pipeline";
import { enqueueExtractionJob, type ExtractionQueue } from "@chunkwise/queues";
import { createLogger, errorMessage } from "@chunkwise/shared";

import type { JobLauncher } from "./context";

const log = createLogger({ component: "launcher" });

/**
 * Hand jobs to the worker through the extraction queue.
 */
export function createQueueLauncher(queue: ExtractionQueue): JobLauncher {
  return {
    async launch(jobId) {
      await enqueueExtractionJob(queue, jobId);
      log.info({ jobId }, "Enqueued extraction job");
    },
    async close() {
      await queue.close();
    },
  };
}

/**
 * Run jobs inside the API process. Used with the in-memory job store, where
 * no worker could see the job.
 */
export function createInProcessLauncher(deps: JobRunnerDeps): JobLauncher {
  const running = new Set<Promise<void>>();

  return {
    async launch(jobId) {
      const run: Promise<void> = runExtractionJob(deps, jobId)
        .then(
          (result) => {
            log.info({ jobId, status: result.job.status, invocations: result.invocations }, "In-process job finished");
          },
          (err: unknown) => {
            // The job itself is already marked failed in the store.
            log.error({ jobId, err: errorMessage(err) }, "In-process job failed");
          },
        )
        .finally(() => {
          running.delete(run);
        });
      running.add(run);
    },
    async close() {
      await Promise.all(running);
    },
  };
}
