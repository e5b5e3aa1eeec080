export { createDb, createDbContext, type Db, type DbContext, type Queryable } from "./db";
export { createJobStoreFromEnv, type JobStoreHandle } from "./job_store_factory";
export { createMemoryJobStore, type MemoryJobStoreOptions } from "./memory_job_store";
export { listMigrationFiles, MIGRATIONS_DIR, runMigrations } from "./migrate";
export { clampListLimit, createPostgresJobStore, DEFAULT_LIST_LIMIT, MAX_LIST_LIMIT } from "./postgres_job_store";
export {
  createExtractionJobsRepo,
  type ExtractionJobRow,
  type ExtractionJobsRepo,
  isUuid,
  rowToJob,
} from "./repos/extraction_jobs";
export { createWebhookDeliveriesRepo, type WebhookDeliveriesRepo } from "./repos/webhook_deliveries";
