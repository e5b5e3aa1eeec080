import {
  type DocumentResultView,
  documentResultView,
  notifyJobWebhook,
  parseDocumentInput,
  parseWebhookConfig,
  resolveExtractionOptions,
} from "@chunkwise/pipeline";
import {
  CodedError,
  createLogger,
  errorMessage,
  isJobStatus,
  type Job,
  JOB_STATUSES,
  type JobError,
  JobNotFoundError,
  type JobStatus,
  ValidationError,
  type WebhookDeliveryOutcome,
  type WebhookDeliveryRecord,
} from "@chunkwise/shared";
import type { FastifyInstance } from "fastify";

import { requireJsonObject } from "../lib/body";
import type { RouteOptions } from "../lib/context";

const log = createLogger({ component: "jobs" });

interface WebhookDeliveryView {
  delivered: boolean;
  attempts: number;
  last_status_code: number | null;
  error: string | null;
  delivered_at: string | null;
}

interface JobSummaryView {
  task_id: string;
  status: JobStatus;
  created_at: string;
  updated_at: string;
  url: string;
}

interface JobDetailView extends JobSummaryView {
  ok: true;
  error?: JobError;
  webhook_delivery?: WebhookDeliveryView;
  result?: DocumentResultView;
}

function deliveryView(outcome: WebhookDeliveryOutcome): WebhookDeliveryView {
  return {
    delivered: outcome.delivered,
    attempts: outcome.attempts,
    last_status_code: outcome.lastStatusCode,
    error: outcome.error,
    delivered_at: outcome.deliveredAt,
  };
}

function summaryView(job: Job): JobSummaryView {
  return {
    task_id: job.id,
    status: job.status,
    created_at: job.createdAt,
    updated_at: job.updatedAt,
    url: job.input.url,
  };
}

function detailView(job: Job): JobDetailView {
  const view: JobDetailView = { ok: true, ...summaryView(job) };
  if (job.error) view.error = job.error;
  if (job.webhookDelivery) view.webhook_delivery = deliveryView(job.webhookDelivery);
  if (job.result) view.result = documentResultView(job.input.url, job.result);
  return view;
}

function parseLimit(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new ValidationError("limit must be a positive integer");
  }
  return parsed;
}

function parseStatus(value: string | undefined): JobStatus | undefined {
  if (value === undefined) return undefined;
  if (!isJobStatus(value)) {
    throw new ValidationError(`status must be one of: ${JOB_STATUSES.join(", ")}`);
  }
  return value;
}

export async function jobsRoutes(fastify: FastifyInstance, opts: RouteOptions): Promise<void> {
  const { store, launcher, extractionDefaults, dispatcher } = opts.ctx;

  // POST /jobs - Store a job and hand it to the runner
  fastify.post("/jobs", async (request, reply) => {
    const body = requireJsonObject(request.body);
    const input = parseDocumentInput(body, "body");
    const options = resolveExtractionOptions(
      { instruction: body.instruction, schema: body.schema, options: body.options },
      extractionDefaults,
    );
    const webhook = parseWebhookConfig(body.webhook);

    const job = await store.create({ input, options, webhook });
    try {
      await launcher.launch(job.id);
    } catch (err) {
      log.error({ jobId: job.id, err: errorMessage(err) }, "Failed to launch job");
      // Nothing will ever run it: cancel it here and send the webhook a runner would have sent.
      try {
        const cancelled = await store.cancel(job.id);
        await notifyJobWebhook({ store, dispatcher }, cancelled, log.child({ jobId: job.id }));
      } catch (cancelErr) {
        log.error({ jobId: job.id, err: errorMessage(cancelErr) }, "Failed to cancel unlaunched job");
      }
      throw new CodedError("Job queue unavailable", "QUEUE_UNAVAILABLE", 503);
    }

    return reply.code(202).send({ ok: true, task_id: job.id, status: job.status });
  });

  // GET /jobs - Recent jobs, newest first
  fastify.get<{ Querystring: { limit?: string; status?: string } }>("/jobs", async (request) => {
    const limit = parseLimit(request.query.limit);
    const status = parseStatus(request.query.status);
    const jobs = await store.list({ limit, status });
    return { ok: true, jobs: jobs.map(summaryView) };
  });

  // GET /jobs/:id - Status, and the result once the job finished
  fastify.get<{ Params: { id: string } }>("/jobs/:id", async (request) => {
    const job = await store.get(request.params.id);
    if (!job) throw new JobNotFoundError(request.params.id);
    return detailView(job);
  });

  // POST /jobs/:id/cancel
  fastify.post<{ Params: { id: string } }>("/jobs/:id/cancel", async (request) => {
    const job = await store.cancel(request.params.id);
    return { ok: true, task_id: job.id, status: job.status };
  });

  // GET /jobs/:id/webhook-deliveries - Delivery log, newest first
  fastify.get<{ Params: { id: string } }>("/jobs/:id/webhook-deliveries", async (request) => {
    const job = await store.get(request.params.id);
    if (!job) throw new JobNotFoundError(request.params.id);

    const deliveries = await store.listWebhookDeliveries(job.id);
    return {
      ok: true,
      task_id: job.id,
      deliveries: deliveries.map((d: WebhookDeliveryRecord) => ({
        url: d.url,
        recorded_at: d.recordedAt,
        ...deliveryView(d),
      })),
    };
  });
}
