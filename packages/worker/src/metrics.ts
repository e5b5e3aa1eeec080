import http from "node:http";

import type { AttemptEvent, WebhookAttemptEvent } from "@chunkwise/pipeline";
import {
  EXTRACTION_DURATION_BUCKETS,
  type JobStatus,
  MetricLabels,
  MetricNames,
  type TokenUsage,
} from "@chunkwise/shared";
import { Counter, collectDefaultMetrics, Gauge, Histogram, Registry } from "prom-client";

/** Global registry for Worker metrics */
export const registry = new Registry();

// Collect default Node.js metrics (memory, CPU, event loop, etc.)
collectDefaultMetrics({ register: registry });

/** Extraction job duration histogram */
export const extractionJobDuration = new Histogram({
  name: MetricNames.EXTRACTION_JOB_DURATION,
  help: "Duration of extraction jobs in seconds",
  labelNames: [MetricLabels.STATUS],
  buckets: EXTRACTION_DURATION_BUCKETS,
  registers: [registry],
});

/** Extraction jobs counter, by terminal status */
export const extractionJobsTotal = new Counter({
  name: MetricNames.EXTRACTION_JOBS_TOTAL,
  help: "Total number of extraction jobs processed",
  labelNames: [MetricLabels.STATUS],
  registers: [registry],
});

/** Provider calls counter, by outcome kind */
export const providerCallsTotal = new Counter({
  name: MetricNames.PROVIDER_CALLS_TOTAL,
  help: "Total number of provider calls",
  labelNames: [MetricLabels.PROVIDER, MetricLabels.MODEL, MetricLabels.KIND],
  registers: [registry],
});

/** Tokens reported by providers */
export const providerTokensTotal = new Counter({
  name: MetricNames.PROVIDER_TOKENS_TOTAL,
  help: "Total tokens reported by providers",
  labelNames: [MetricLabels.PROVIDER, MetricLabels.MODEL, MetricLabels.TOKEN_TYPE],
  registers: [registry],
});

/** Webhook delivery attempts counter */
export const webhookDeliveriesTotal = new Counter({
  name: MetricNames.WEBHOOK_DELIVERIES_TOTAL,
  help: "Total number of webhook delivery attempts",
  labelNames: [MetricLabels.OUTCOME],
  registers: [registry],
});

/** Queue depth gauge */
export const queueDepth = new Gauge({
  name: MetricNames.QUEUE_DEPTH,
  help: "Current queue depth",
  labelNames: [MetricLabels.QUEUE_NAME],
  registers: [registry],
});

export interface ProviderIdentity {
  name: string;
  model: string;
}

function recordTokens(provider: ProviderIdentity, usage: TokenUsage): void {
  if (usage.availability === "unavailable") return;
  const base = { [MetricLabels.PROVIDER]: provider.name, [MetricLabels.MODEL]: provider.model };
  providerTokensTotal.inc({ ...base, [MetricLabels.TOKEN_TYPE]: "prompt" }, usage.promptTokens);
  providerTokensTotal.inc({ ...base, [MetricLabels.TOKEN_TYPE]: "completion" }, usage.completionTokens);
}

/**
 * Record one provider attempt from the orchestrator's attempt hook.
 */
export function recordProviderAttempt(provider: ProviderIdentity, event: AttemptEvent): void {
  providerCallsTotal.inc({
    [MetricLabels.PROVIDER]: provider.name,
    [MetricLabels.MODEL]: provider.model,
    [MetricLabels.KIND]: event.outcome,
  });
  if (event.usage) recordTokens(provider, event.usage);
}

/**
 * Record extraction job metrics.
 */
export function recordExtractionJob(params: { status: JobStatus | "error"; durationSec: number }): void {
  const labels = { [MetricLabels.STATUS]: params.status };
  extractionJobDuration.observe(labels, params.durationSec);
  extractionJobsTotal.inc(labels);
}

export function recordWebhookAttempt(event: WebhookAttemptEvent): void {
  webhookDeliveriesTotal.inc({ [MetricLabels.OUTCOME]: event.ok ? "delivered" : "failed" });
}

/**
 * Update queue depth gauge.
 */
export function updateQueueDepth(queueName: string, depth: number): void {
  queueDepth.set({ [MetricLabels.QUEUE_NAME]: queueName }, depth);
}

// ============================================================================
// Health
// ============================================================================

export interface WorkerHealthStatus {
  startedAt: string | null;
  lastJobAt: string | null;
  emergencyStop: boolean;
}

const healthStatus: WorkerHealthStatus = {
  startedAt: null,
  lastJobAt: null,
  emergencyStop: false,
};

export function updateHealthStatus(patch: Partial<WorkerHealthStatus>): void {
  Object.assign(healthStatus, patch);
}

export function getHealthStatus(): WorkerHealthStatus {
  return { ...healthStatus };
}

/**
 * Get metrics in Prometheus text format.
 */
export async function getMetrics(): Promise<string> {
  return registry.metrics();
}

/**
 * Get the content type for Prometheus metrics.
 */
export function getMetricsContentType(): string {
  return registry.contentType;
}

/**
 * Start a small HTTP server exposing /metrics and /health.
 * Returns a function to close the server.
 */
export function startMetricsServer(port: number): { close: () => Promise<void> } {
  const server = http.createServer(async (req, res) => {
    if (req.url === "/metrics" && req.method === "GET") {
      try {
        const metrics = await getMetrics();
        res.setHeader("Content-Type", getMetricsContentType());
        res.end(metrics);
      } catch (err) {
        res.statusCode = 500;
        res.end(err instanceof Error ? err.message : "Failed to collect metrics");
      }
    } else if (req.url === "/health" && req.method === "GET") {
      res.setHeader("Content-Type", "application/json");
      res.end(JSON.stringify({ ok: true, ...getHealthStatus() }));
    } else {
      res.statusCode = 404;
      res.end("Not Found");
    }
  });

  server.listen(port);

  return {
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}
