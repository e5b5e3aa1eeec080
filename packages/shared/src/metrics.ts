/**
 * Shared metric and label names for the API and worker Prometheus registries.
 */

export const MetricLabels = {
  // HTTP labels
  METHOD: "method",
  ROUTE: "route",
  STATUS_CODE: "status_code",

  // Extraction labels
  STATUS: "status",
  KIND: "kind",
  PROVIDER: "provider",
  MODEL: "model",
  TOKEN_TYPE: "token_type",

  // Webhook labels
  OUTCOME: "outcome",

  // Queue labels
  QUEUE_NAME: "queue_name",
} as const;

export const MetricNames = {
  // API metrics
  HTTP_REQUEST_DURATION: "http_request_duration_seconds",
  HTTP_REQUESTS_TOTAL: "http_requests_total",
  HTTP_ACTIVE_CONNECTIONS: "http_active_connections",

  // Extraction metrics
  EXTRACTION_JOB_DURATION: "extraction_job_duration_seconds",
  EXTRACTION_JOBS_TOTAL: "extraction_jobs_total",
  PROVIDER_CALLS_TOTAL: "provider_calls_total",
  PROVIDER_TOKENS_TOTAL: "provider_tokens_total",

  // Webhook metrics
  WEBHOOK_DELIVERIES_TOTAL: "webhook_deliveries_total",

  // Queue metrics
  QUEUE_DEPTH: "queue_depth",
} as const;

/** Histogram buckets for HTTP request duration (seconds) */
export const HTTP_DURATION_BUCKETS = [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30];

/** Histogram buckets for extraction job duration (seconds) */
export const EXTRACTION_DURATION_BUCKETS = [0.5, 1, 2.5, 5, 10, 30, 60, 120, 300, 600];
