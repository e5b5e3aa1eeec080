export { type AnthropicConfig, createAnthropicProvider } from "./anthropic";
export {
  type ClassifiedProviderError,
  classifyProviderError,
  isAuthLikeMessage,
  isRetryableKind,
  MalformedResponseError,
} from "./error_classification";
export { callExtraction, type ExtractionCallOutcome, type ExtractionCallParams } from "./extraction_caller";
export { extractJsonValue, type JsonContainer } from "./json";
export {
  callOpenAiCompat,
  createOpenAiCompatProvider,
  extractAssistantContent,
  extractRawUsage,
  type OpenAiCompatConfig,
} from "./openai_compat";
export { buildExtractionRequest, type ExtractionPromptParams, type PromptChunk } from "./prompts";
export { createEnvExtractionProvider, type ProviderKind, resolveOpenAiEndpoint } from "./router";
export { TimeoutError, withTimeout } from "./timeout";
export type {
  ExtractionProvider,
  ExtractionRequest,
  ProviderHttpError,
  ProviderResponse,
} from "./types";
export { normalizeUsage } from "./usage";
