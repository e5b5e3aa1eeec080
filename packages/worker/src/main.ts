import { createJobStoreFromEnv } from "@chunkwise/db";
import { createEnvExtractionProvider } from "@chunkwise/llm";
import { createWebhookDispatcher } from "@chunkwise/pipeline";
import {
  clearEmergencyStop,
  createExtractionQueue,
  createRedisClient,
  EXTRACTION_QUEUE_NAME,
  isEmergencyStopActive,
} from "@chunkwise/queues";
import { createLogger, loadDotEnvIfPresent, loadRuntimeEnv } from "@chunkwise/shared";

import { recordWebhookAttempt, startMetricsServer, updateHealthStatus, updateQueueDepth } from "./metrics";
import { createExtractionWorker } from "./workers/extraction.worker";

// Load .env and .env.local files (must happen before reading env vars)
loadDotEnvIfPresent();

const log = createLogger({ component: "worker" });

async function main(): Promise<void> {
  log.info("Starting chunkwise worker");

  const env = loadRuntimeEnv();
  if (env.jobStore === "memory") {
    throw new Error("The worker needs a shared job store; set JOB_STORE=postgres (the API runs jobs in-process otherwise)");
  }

  updateHealthStatus({ startedAt: new Date().toISOString() });

  const stores = createJobStoreFromEnv(env);
  const provider = createEnvExtractionProvider(process.env);
  const dispatcher = createWebhookDispatcher({
    defaultMaxRetries: env.webhook.maxRetries,
    timeoutMs: env.webhook.timeoutMs,
    log: createLogger({ component: "webhook" }),
    onAttempt: recordWebhookAttempt,
  });
  log.info({ provider: provider.name, model: provider.model }, "Using LLM provider");

  // Queue handle is only used to read depth
  const queue = createExtractionQueue(env.redisUrl);
  const worker = createExtractionWorker({
    redisUrl: env.redisUrl,
    concurrency: env.workerConcurrency,
    deps: { store: stores.store, provider, dispatcher, cancelPollMs: env.cancelPollMs },
  });

  // Create Redis client for emergency stop checks
  const emergencyStopRedis = createRedisClient(env.redisUrl);

  // Clear any stale emergency stop flag on startup
  await clearEmergencyStop(emergencyStopRedis);
  log.info("Emergency stop flag cleared on startup");

  // Start metrics server (also serves /health)
  const metricsServer = startMetricsServer(env.workerMetricsPort);
  log.info({ port: env.workerMetricsPort }, "Metrics server started");

  // Update queue depth periodically
  const queueDepthInterval = setInterval(async () => {
    try {
      const counts = await queue.getJobCounts("waiting", "active", "delayed");
      updateQueueDepth(EXTRACTION_QUEUE_NAME, (counts.waiting ?? 0) + (counts.active ?? 0) + (counts.delayed ?? 0));
    } catch (err) {
      log.warn({ err }, "Failed to update queue depth");
    }
  }, 15_000); // Every 15 seconds

  log.info({ concurrency: env.workerConcurrency }, "Worker started, listening for jobs");

  // Graceful shutdown
  let isShuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (isShuttingDown) return; // Prevent double shutdown
    isShuttingDown = true;

    log.info({ signal }, "Received signal, shutting down");

    clearInterval(queueDepthInterval);
    clearInterval(emergencyStopInterval);

    // worker.close() waits for active jobs to finish
    await worker.close();
    await metricsServer.close();
    await queue.close();
    await emergencyStopRedis.quit();
    await stores.close();

    log.info("Shutdown complete");
    process.exit(0);
  };

  // Poll for emergency stop flag every 2 seconds
  const emergencyStopInterval = setInterval(async () => {
    try {
      const shouldStop = await isEmergencyStopActive(emergencyStopRedis);
      if (shouldStop) {
        log.warn("Emergency stop flag detected! Shutting down worker...");
        updateHealthStatus({ emergencyStop: true });
        await shutdown("EMERGENCY_STOP");
      }
    } catch (err) {
      log.warn({ err }, "Failed to check emergency stop flag");
    }
  }, 2000);

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err: unknown) => {
      log.fatal({ err }, "Shutdown failed");
      process.exit(1);
    });
  };
  process.on("SIGTERM", () => onSignal("SIGTERM"));
  process.on("SIGINT", () => onSignal("SIGINT"));
}

main().catch((err) => {
  log.fatal({ err }, "Fatal error");
  process.exit(1);
});
