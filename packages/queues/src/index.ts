import type { ConnectionOptions } from "bullmq";
import { Queue } from "bullmq";
import Redis from "ioredis";

/**
 * Queue name for extraction jobs.
 */
export const EXTRACTION_QUEUE_NAME = "extraction";

/**
 * Job name for one stored extraction job run.
 */
export const RUN_EXTRACTION_JOB_NAME = "run_extraction";

/**
 * Queue payload. The job itself lives in the job store; the queue only
 * carries its id.
 */
export interface RunExtractionJobData {
  jobId: string;
}

export type ExtractionQueue = Queue<RunExtractionJobData>;

interface RedisTarget {
  host: string;
  port: number;
  password: string | undefined;
  db: number | undefined;
  tls: Record<string, never> | undefined;
}

function parseRedisUrl(redisUrl: string): RedisTarget {
  const url = new URL(redisUrl);
  const isTls = url.protocol === "rediss:";

  // Extract db from path (e.g., /1 -> db 1)
  const dbMatch = url.pathname.match(/^\/(\d+)$/);
  const db = dbMatch?.[1] ? Number.parseInt(dbMatch[1], 10) : undefined;

  return {
    host: url.hostname,
    port: Number.parseInt(url.port || "6379", 10),
    password: url.password ? decodeURIComponent(url.password) : undefined,
    db,
    tls: isTls ? {} : undefined,
  };
}

/**
 * Parse Redis URL into BullMQ connection options.
 * Supports: redis://[:password@]host:port[/db]
 *           rediss://... (TLS)
 */
export function parseRedisConnection(redisUrl: string): ConnectionOptions {
  return parseRedisUrl(redisUrl);
}

/**
 * Create the extraction queue. The API enqueues, the worker consumes.
 */
export function createExtractionQueue(redisUrl: string): ExtractionQueue {
  return new Queue<RunExtractionJobData>(EXTRACTION_QUEUE_NAME, {
    connection: parseRedisConnection(redisUrl),
  });
}

/**
 * Enqueue one run of a stored job. The BullMQ job id is the extraction job id,
 * so enqueueing the same job twice is a no-op. One attempt only: retries
 * happen per chunk inside the run.
 */
export async function enqueueExtractionJob(queue: ExtractionQueue, jobId: string): Promise<void> {
  await queue.add(
    RUN_EXTRACTION_JOB_NAME,
    { jobId },
    {
      jobId,
      attempts: 1,
      removeOnComplete: 1000,
      removeOnFail: 1000,
    },
  );
}

// ============================================================================
// Emergency Stop (Kill Switch)
// ============================================================================

const EMERGENCY_STOP_KEY = "extraction:emergency_stop";

/**
 * Create a Redis client for emergency stop operations.
 */
export function createRedisClient(redisUrl: string): Redis {
  return new Redis(parseRedisUrl(redisUrl));
}

/**
 * Set the emergency stop flag.
 * When set, workers stop taking jobs and exit.
 */
export async function setEmergencyStop(redis: Redis): Promise<void> {
  await redis.set(EMERGENCY_STOP_KEY, "1");
}

/**
 * Clear the emergency stop flag.
 */
export async function clearEmergencyStop(redis: Redis): Promise<void> {
  await redis.del(EMERGENCY_STOP_KEY);
}

/**
 * Check if emergency stop is active.
 */
export async function isEmergencyStopActive(redis: Redis): Promise<boolean> {
  const value = await redis.get(EMERGENCY_STOP_KEY);
  return value === "1";
}
