import { HTTP_DURATION_BUCKETS, MetricLabels, MetricNames } from "@chunkwise/shared";
import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { Counter, collectDefaultMetrics, Gauge, Histogram, Registry } from "prom-client";

declare module "fastify" {
  interface FastifyRequest {
    metricsStartTime?: bigint;
  }
}

/** Global registry for API metrics */
export const registry = new Registry();

// Collect default Node.js metrics (memory, CPU, event loop, etc.)
collectDefaultMetrics({ register: registry });

/** HTTP request duration histogram */
export const httpRequestDuration = new Histogram({
  name: MetricNames.HTTP_REQUEST_DURATION,
  help: "Duration of HTTP requests in seconds",
  labelNames: [MetricLabels.METHOD, MetricLabels.ROUTE, MetricLabels.STATUS_CODE],
  buckets: HTTP_DURATION_BUCKETS,
  registers: [registry],
});

/** HTTP requests counter */
export const httpRequestsTotal = new Counter({
  name: MetricNames.HTTP_REQUESTS_TOTAL,
  help: "Total number of HTTP requests",
  labelNames: [MetricLabels.METHOD, MetricLabels.ROUTE, MetricLabels.STATUS_CODE],
  registers: [registry],
});

/** Active HTTP connections gauge */
export const httpActiveConnections = new Gauge({
  name: MetricNames.HTTP_ACTIVE_CONNECTIONS,
  help: "Number of active HTTP connections",
  registers: [registry],
});

/**
 * Route label for a request: the registered route pattern when Fastify
 * matched one, otherwise the path with id-like segments replaced.
 */
export function routeLabel(request: Pick<FastifyRequest, "url" | "routeOptions">): string {
  const pattern = request.routeOptions.url;
  if (pattern) return pattern;

  // Remove query string
  const path = request.url.split("?")[0] ?? request.url;
  return path
    .replace(/\/[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}/gi, "/:id")
    .replace(/\/\d+/g, "/:id");
}

/**
 * Register metrics hooks on a Fastify instance.
 */
export function registerMetricsHooks(fastify: FastifyInstance): void {
  fastify.addHook("onRequest", async (request: FastifyRequest) => {
    httpActiveConnections.inc();
    request.metricsStartTime = process.hrtime.bigint();
  });

  fastify.addHook("onResponse", async (request: FastifyRequest, reply: FastifyReply) => {
    httpActiveConnections.dec();

    const startTime = request.metricsStartTime;
    if (!startTime) return;

    const durationSec = Number(process.hrtime.bigint() - startTime) / 1e9;
    const labels = {
      [MetricLabels.METHOD]: request.method,
      [MetricLabels.ROUTE]: routeLabel(request),
      [MetricLabels.STATUS_CODE]: String(reply.statusCode),
    };

    httpRequestDuration.observe(labels, durationSec);
    httpRequestsTotal.inc(labels);
  });
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
