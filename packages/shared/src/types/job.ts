import type { AggregateResult, DocumentInput, ExtractionOptions } from "./extraction";

export type JobStatus =
  | "pending"
  | "running"
  | "completed"
  | "partially_completed"
  | "failed"
  | "cancelled";

export type TerminalJobStatus = Exclude<JobStatus, "pending" | "running">;

export interface WebhookConfig {
  url: string;
  secret?: string;
  maxRetries?: number;
}

export interface WebhookDeliveryOutcome {
  delivered: boolean;
  attempts: number;
  lastStatusCode: number | null;
  error: string | null;
  deliveredAt: string | null;
}

/** One row of a job's webhook delivery log. */
export interface WebhookDeliveryRecord extends WebhookDeliveryOutcome {
  jobId: string;
  url: string;
  recordedAt: string;
}

export interface JobError {
  code: string;
  message: string;
}

export interface Job {
  id: string;
  status: JobStatus;
  createdAt: string;
  updatedAt: string;
  input: DocumentInput;
  options: ExtractionOptions;
  webhook: WebhookConfig | null;
  result: AggregateResult | null;
  error: JobError | null;
  webhookDelivery: WebhookDeliveryOutcome | null;
}

export interface CreateJobParams {
  input: DocumentInput;
  options: ExtractionOptions;
  webhook?: WebhookConfig | null;
}

export interface TransitionPatch {
  result?: AggregateResult;
  error?: JobError;
}

export interface ListJobsParams {
  limit?: number;
  status?: JobStatus;
}

/**
 * Durable record of extraction jobs. Implementations serialize transitions per
 * job id and reject any move that is not an edge of the job state graph.
 */
export interface JobStore {
  create(params: CreateJobParams): Promise<Job>;
  get(id: string): Promise<Job | null>;
  /** Throws JobNotFoundError or InvalidTransitionError. */
  transition(id: string, status: JobStatus, patch?: TransitionPatch): Promise<Job>;
  /** Throws JobNotFoundError or AlreadyTerminalError. */
  cancel(id: string): Promise<Job>;
  /** Stores the latest outcome on the job and appends it to the delivery log. Throws JobNotFoundError. */
  recordWebhookDelivery(id: string, outcome: WebhookDeliveryOutcome): Promise<void>;
  /** Delivery log for one job, newest first. */
  listWebhookDeliveries(id: string): Promise<WebhookDeliveryRecord[]>;
  list(params?: ListJobsParams): Promise<Job[]>;
}
