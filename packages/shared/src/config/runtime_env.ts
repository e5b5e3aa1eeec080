export type JobStoreKind = "postgres" | "memory";

export interface ExtractionDefaults {
  concurrency: number;
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  timeoutMs: number;
  chunkMaxTokens: number;
  chunkOverlapChars: number;
}

export interface WebhookDefaults {
  maxRetries: number;
  timeoutMs: number;
}

export interface RuntimeEnv {
  appEnv: "local" | "dev" | "prod";
  jobStore: JobStoreKind;
  /** Set whenever jobStore is "postgres". */
  databaseUrl?: string;
  redisUrl: string;
  apiPort: number;
  /** When set, /api routes other than health and metrics require X-API-Key. */
  apiKey?: string;
  workerMetricsPort: number;
  /** Extraction jobs processed at once by one worker process. */
  workerConcurrency: number;
  cancelPollMs: number;
  extraction: ExtractionDefaults;
  webhook: WebhookDefaults;
}

function requireEnv(name: string, value: string | undefined): string {
  if (!value) {
    throw new Error(`Missing required env var: ${name}`);
  }
  return value;
}

/** Longest delay a Node.js timer honours; larger values fire after 1 ms. */
export const MAX_TIMER_MS = 2_147_483_647;

function intEnv(name: string, value: string | undefined, fallback: number, min = 0, max = Number.MAX_SAFE_INTEGER): number {
  if (value === undefined || value.trim().length === 0) return fallback;
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed < min || parsed > max) {
    throw new Error(`Invalid integer env var: ${name}=${value}`);
  }
  return parsed;
}

export function loadRuntimeEnv(env: NodeJS.ProcessEnv = process.env): RuntimeEnv {
  const appEnvRaw = env.APP_ENV ?? "local";
  const appEnv =
    appEnvRaw === "prod" || appEnvRaw === "dev" || appEnvRaw === "local" ? appEnvRaw : "local";

  const storeRaw = (env.JOB_STORE ?? "postgres").toLowerCase();
  if (storeRaw !== "postgres" && storeRaw !== "memory") {
    throw new Error(`Invalid JOB_STORE: ${storeRaw} (expected postgres or memory)`);
  }

  return {
    appEnv,
    jobStore: storeRaw,
    databaseUrl: storeRaw === "postgres" ? requireEnv("DATABASE_URL", env.DATABASE_URL) : env.DATABASE_URL,
    redisUrl: env.REDIS_URL ?? "redis://localhost:6379",
    apiPort: intEnv("API_PORT", env.API_PORT ?? env.PORT, 3001, 1),
    apiKey: env.API_KEY?.trim() || undefined,
    workerMetricsPort: intEnv("WORKER_METRICS_PORT", env.WORKER_METRICS_PORT, 9091, 1),
    workerConcurrency: intEnv("WORKER_CONCURRENCY", env.WORKER_CONCURRENCY, 2, 1),
    cancelPollMs: intEnv("CANCEL_POLL_MS", env.CANCEL_POLL_MS, 1000, 1, MAX_TIMER_MS),
    extraction: {
      concurrency: intEnv("EXTRACTION_CONCURRENCY", env.EXTRACTION_CONCURRENCY, 4, 1),
      maxRetries: intEnv("EXTRACTION_MAX_RETRIES", env.EXTRACTION_MAX_RETRIES, 3),
      baseDelayMs: intEnv("EXTRACTION_BASE_DELAY_MS", env.EXTRACTION_BASE_DELAY_MS, 500, 0, MAX_TIMER_MS),
      maxDelayMs: intEnv("EXTRACTION_MAX_DELAY_MS", env.EXTRACTION_MAX_DELAY_MS, 8000, 0, MAX_TIMER_MS),
      timeoutMs: intEnv("EXTRACTION_TIMEOUT_MS", env.EXTRACTION_TIMEOUT_MS, 60_000, 1, MAX_TIMER_MS),
      chunkMaxTokens: intEnv("CHUNK_MAX_TOKENS", env.CHUNK_MAX_TOKENS, 2000, 1),
      chunkOverlapChars: intEnv("CHUNK_OVERLAP_CHARS", env.CHUNK_OVERLAP_CHARS, 200),
    },
    webhook: {
      maxRetries: intEnv("WEBHOOK_MAX_RETRIES", env.WEBHOOK_MAX_RETRIES, 3),
      timeoutMs: intEnv("WEBHOOK_TIMEOUT_MS", env.WEBHOOK_TIMEOUT_MS, 10_000, 1, MAX_TIMER_MS),
    },
  };
}
