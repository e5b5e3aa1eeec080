import { randomUUID } from "crypto";

import {
  AlreadyTerminalError,
  canTransition,
  type CreateJobParams,
  InvalidTransitionError,
  isTerminalStatus,
  type Job,
  JobNotFoundError,
  type JobStatus,
  type JobStore,
  type ListJobsParams,
  type TransitionPatch,
  type WebhookDeliveryOutcome,
  type WebhookDeliveryRecord,
} from "@chunkwise/shared";

import { clampListLimit } from "./postgres_job_store";

export interface MemoryJobStoreOptions {
  now?: () => Date;
  generateId?: () => string;
}

/**
 * In-process JobStore for tests and single-process deployments
 * (JOB_STORE=memory). Operations on one job id run one after another;
 * callers always get copies, never the stored object.
 */
export function createMemoryJobStore(options: MemoryJobStoreOptions = {}): JobStore {
  const now = options.now ?? (() => new Date());
  const generateId = options.generateId ?? randomUUID;
  const jobs = new Map<string, Job>();
  const deliveries = new Map<string, WebhookDeliveryRecord[]>();
  const tails = new Map<string, Promise<unknown>>();
  // Tie-breaker for list ordering when timestamps collide.
  const sequence = new Map<string, number>();
  let created = 0;

  function serialized<T>(id: string, op: () => T): Promise<T> {
    const previous = tails.get(id) ?? Promise.resolve();
    const next = previous.then(op, op);
    // Errors reach the caller through `next`; the chain for this id keeps going.
    const tail = next.catch(() => undefined);
    tails.set(id, tail);
    void tail.then(() => {
      if (tails.get(id) === tail) tails.delete(id);
    });
    return next;
  }

  function requireJob(id: string): Job {
    const job = jobs.get(id);
    if (!job) throw new JobNotFoundError(id);
    return job;
  }

  function update(job: Job, status: JobStatus, patch: TransitionPatch = {}): Job {
    const next: Job = {
      ...job,
      status,
      updatedAt: now().toISOString(),
      result: patch.result ?? job.result,
      error: patch.error ?? job.error,
    };
    jobs.set(job.id, structuredClone(next));
    return next;
  }

  return {
    async create(params: CreateJobParams): Promise<Job> {
      const timestamp = now().toISOString();
      const job: Job = {
        id: generateId(),
        status: "pending",
        createdAt: timestamp,
        updatedAt: timestamp,
        input: { ...params.input },
        options: structuredClone(params.options),
        webhook: params.webhook ? { ...params.webhook } : null,
        result: null,
        error: null,
        webhookDelivery: null,
      };
      jobs.set(job.id, structuredClone(job));
      created += 1;
      sequence.set(job.id, created);
      return job;
    },

    async get(id: string): Promise<Job | null> {
      const job = jobs.get(id);
      return job ? structuredClone(job) : null;
    },

    transition(id: string, status: JobStatus, patch?: TransitionPatch): Promise<Job> {
      return serialized(id, () => {
        const job = requireJob(id);
        if (!canTransition(job.status, status)) {
          throw new InvalidTransitionError(id, job.status, status);
        }
        return update(job, status, patch);
      });
    },

    cancel(id: string): Promise<Job> {
      return serialized(id, () => {
        const job = requireJob(id);
        if (isTerminalStatus(job.status)) {
          throw new AlreadyTerminalError(id, job.status);
        }
        return update(job, "cancelled");
      });
    },

    recordWebhookDelivery(id: string, outcome: WebhookDeliveryOutcome): Promise<void> {
      return serialized(id, () => {
        const job = requireJob(id);
        jobs.set(id, { ...job, webhookDelivery: { ...outcome }, updatedAt: now().toISOString() });
        const log = deliveries.get(id) ?? [];
        log.push({ ...outcome, jobId: id, url: job.webhook?.url ?? "", recordedAt: now().toISOString() });
        deliveries.set(id, log);
      });
    },

    async listWebhookDeliveries(id: string): Promise<WebhookDeliveryRecord[]> {
      requireJob(id);
      return [...(deliveries.get(id) ?? [])].reverse().map((record) => ({ ...record }));
    },

    async list(params: ListJobsParams = {}): Promise<Job[]> {
      const limit = clampListLimit(params.limit);
      return [...jobs.values()]
        .filter((job) => !params.status || job.status === params.status)
        .sort(
          (a, b) =>
            b.createdAt.localeCompare(a.createdAt) || (sequence.get(b.id) ?? 0) - (sequence.get(a.id) ?? 0),
        )
        .slice(0, limit)
        .map((job) => structuredClone(job));
    },
  };
}
