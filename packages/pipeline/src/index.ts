export { CHARS_PER_TOKEN, chunkText, type TextChunk } from "./chunking/chunker";
export { type DocumentExtraction, type ExtractDocumentParams, extractDocument } from "./extraction/extract_document";
export {
  type AttemptEvent,
  type ChunkCaller,
  type OrchestrationOutcome,
  type OrchestratorParams,
  runChunkedExtraction,
} from "./extraction/orchestrator";
export { backoffDelayMs, DEFAULT_RETRY_POLICY, maxAttempts } from "./extraction/retry_policy";
export { accumulateUsage, type UsageAccumulation } from "./extraction/usage_accumulator";
export {
  type ExtractionRequestFields,
  parseDocumentInput,
  parseWebhookConfig,
  resolveExtractionOptions,
} from "./jobs/options";
export {
  DEFAULT_CANCEL_POLL_MS,
  type JobRunnerDeps,
  type JobRunResult,
  notifyJobWebhook,
  runExtractionJob,
  WORKER_LOST_CODE,
} from "./jobs/run_extraction_job";
export { Semaphore } from "./lib/semaphore";
export { sleep, type SleepFn } from "./lib/sleep";
export {
  buildWebhookPayload,
  type ChunkStatusView,
  type ChunkUsageView,
  type DocumentResultView,
  documentResultView,
  mergeExtractedContent,
  type TokenUsageView,
  tokenUsageView,
  type WebhookPayload,
} from "./views/response";
export {
  createWebhookDispatcher,
  DELIVERY_ID_HEADER,
  EVENT_HEADER,
  SIGNATURE_HEADER,
  type WebhookAttemptEvent,
  type WebhookDispatcher,
  type WebhookDispatcherOptions,
} from "./webhooks/dispatcher";
export { SIGNATURE_PREFIX, signPayload, verifySignature } from "./webhooks/signature";
