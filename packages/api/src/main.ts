import { createJobStoreFromEnv } from "@chunkwise/db";
import { createEnvExtractionProvider } from "@chunkwise/llm";
import { createWebhookDispatcher } from "@chunkwise/pipeline";
import { clearEmergencyStop, createExtractionQueue, createRedisClient, setEmergencyStop } from "@chunkwise/queues";
import { createLogger, loadDotEnvIfPresent, loadRuntimeEnv } from "@chunkwise/shared";

import type { ApiContext, JobLauncher } from "./lib/context";
import { createInProcessLauncher, createQueueLauncher } from "./lib/queue";
import { buildServer } from "./server";

// Load .env and .env.local files (must happen before reading env vars)
loadDotEnvIfPresent();

const log = createLogger({ component: "api" });

async function main(): Promise<void> {
  const env = loadRuntimeEnv();
  const stores = createJobStoreFromEnv(env);
  const provider = createEnvExtractionProvider(process.env);
  log.info({ store: stores.kind, provider: provider.name, model: provider.model }, "Starting chunkwise API");

  const dispatcher = createWebhookDispatcher({
    defaultMaxRetries: env.webhook.maxRetries,
    timeoutMs: env.webhook.timeoutMs,
    log: createLogger({ component: "webhook" }),
  });

  let launcher: JobLauncher;
  let redis: ReturnType<typeof createRedisClient> | null = null;
  if (stores.kind === "memory") {
    // No worker can see an in-memory job, so this process runs it.
    launcher = createInProcessLauncher({
      store: stores.store,
      provider,
      cancelPollMs: env.cancelPollMs,
      dispatcher,
    });
  } else {
    launcher = createQueueLauncher(createExtractionQueue(env.redisUrl));
    redis = createRedisClient(env.redisUrl);
  }

  const emergencyRedis = redis;
  const ctx: ApiContext = {
    store: stores.store,
    provider,
    extractionDefaults: env.extraction,
    launcher,
    dispatcher,
    apiKey: env.apiKey,
    emergencyStop: emergencyRedis
      ? {
          activate: () => setEmergencyStop(emergencyRedis),
          clear: () => clearEmergencyStop(emergencyRedis),
        }
      : undefined,
  };
  if (!ctx.apiKey && env.appEnv === "prod") {
    log.warn("API_KEY is not set; job routes are open to anyone who can reach the server");
  }

  const server = await buildServer(ctx);

  let isShuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (isShuttingDown) return;
    isShuttingDown = true;

    log.info({ signal }, "Received signal, shutting down");
    await server.close();
    await launcher.close();
    if (redis) await redis.quit();
    await stores.close();
    log.info("Shutdown complete");
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err: unknown) => {
      log.fatal({ err }, "Shutdown failed");
      process.exit(1);
    });
  };
  process.on("SIGTERM", () => onSignal("SIGTERM"));
  process.on("SIGINT", () => onSignal("SIGINT"));

  await server.listen({ port: env.apiPort, host: "0.0.0.0" });
  log.info({ port: env.apiPort }, "API server listening");
}

main().catch((err) => {
  log.fatal({ err }, "Fatal error");
  process.exit(1);
});
