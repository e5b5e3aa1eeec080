import {
  AlreadyTerminalError,
  type CreateJobParams,
  InvalidTransitionError,
  type Job,
  JobNotFoundError,
  type JobStatus,
  type JobStore,
  type ListJobsParams,
  sourceStatesFor,
  type TransitionPatch,
  type WebhookDeliveryOutcome,
  type WebhookDeliveryRecord,
} from "@chunkwise/shared";

import type { Db } from "./db";
import { rowToJob } from "./repos/extraction_jobs";

export const DEFAULT_LIST_LIMIT = 20;
export const MAX_LIST_LIMIT = 100;

export function clampListLimit(limit: number | undefined): number {
  if (limit === undefined || !Number.isFinite(limit)) return DEFAULT_LIST_LIMIT;
  return Math.min(Math.max(Math.trunc(limit), 1), MAX_LIST_LIMIT);
}

/**
 * JobStore over Postgres. Every status change is one compare-and-swap update
 * whose WHERE clause names the legal source states, so concurrent writers for
 * the same job cannot both win.
 */
export function createPostgresJobStore(db: Db): JobStore {
  async function requireJob(id: string): Promise<Job> {
    const row = await db.extractionJobs.getById(id);
    if (!row) throw new JobNotFoundError(id);
    return rowToJob(row);
  }

  return {
    async create(params: CreateJobParams): Promise<Job> {
      return rowToJob(await db.extractionJobs.insert(params));
    },

    async get(id: string): Promise<Job | null> {
      const row = await db.extractionJobs.getById(id);
      return row ? rowToJob(row) : null;
    },

    async transition(id: string, status: JobStatus, patch: TransitionPatch = {}): Promise<Job> {
      const row = await db.extractionJobs.compareAndSetStatus({
        id,
        to: status,
        from: sourceStatesFor(status),
        result: patch.result,
        error: patch.error,
      });
      if (row) return rowToJob(row);
      const current = await requireJob(id);
      throw new InvalidTransitionError(id, current.status, status);
    },

    async cancel(id: string): Promise<Job> {
      const row = await db.extractionJobs.compareAndSetStatus({
        id,
        to: "cancelled",
        from: sourceStatesFor("cancelled"),
      });
      if (row) return rowToJob(row);
      const current = await requireJob(id);
      throw new AlreadyTerminalError(id, current.status);
    },

    async recordWebhookDelivery(id: string, outcome: WebhookDeliveryOutcome): Promise<void> {
      await db.tx(async (tx) => {
        const row = await tx.extractionJobs.getById(id);
        if (!row) throw new JobNotFoundError(id);
        await tx.extractionJobs.setWebhookDelivery(id, outcome);
        await tx.webhookDeliveries.insert({ jobId: id, url: row.webhook_json?.url ?? "", outcome });
      });
    },

    async listWebhookDeliveries(id: string): Promise<WebhookDeliveryRecord[]> {
      await requireJob(id);
      return db.webhookDeliveries.listForJob(id);
    },

    async list(params: ListJobsParams = {}): Promise<Job[]> {
      const rows = await db.extractionJobs.list({ limit: clampListLimit(params.limit), status: params.status });
      return rows.map(rowToJob);
    },
  };
}
