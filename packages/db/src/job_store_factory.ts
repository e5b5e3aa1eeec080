import type { JobStore, RuntimeEnv } from "@chunkwise/shared";

import { createDb } from "./db";
import { createMemoryJobStore } from "./memory_job_store";
import { createPostgresJobStore } from "./postgres_job_store";

export interface JobStoreHandle {
  store: JobStore;
  kind: RuntimeEnv["jobStore"];
  close(): Promise<void>;
}

/** The job store named by JOB_STORE, with a close hook for shutdown. */
export function createJobStoreFromEnv(env: Pick<RuntimeEnv, "jobStore" | "databaseUrl">): JobStoreHandle {
  if (env.jobStore === "memory") {
    return { store: createMemoryJobStore(), kind: "memory", close: async () => undefined };
  }
  if (!env.databaseUrl) {
    throw new Error("Missing required env var: DATABASE_URL");
  }
  const db = createDb(env.databaseUrl);
  return { store: createPostgresJobStore(db), kind: "postgres", close: () => db.close() };
}
