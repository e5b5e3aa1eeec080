import {
  type DocumentInput,
  type ExtractionDefaults,
  type ExtractionOptions,
  MAX_TIMER_MS,
  ValidationError,
  type WebhookConfig,
} from "@chunkwise/shared";

import { CHARS_PER_TOKEN } from "../chunking/chunker";

const MAX_WEBHOOK_RETRIES = 10;
const MAX_CONCURRENCY = 64;

export interface ExtractionRequestFields {
  instruction: unknown;
  schema?: unknown;
  options?: unknown;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalInt(
  source: Record<string, unknown>,
  key: string,
  range: { min: number; max?: number },
): number | undefined {
  const value = source[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "number" || !Number.isInteger(value) || value < range.min) {
    throw new ValidationError(`options.${key} must be an integer >= ${range.min}`);
  }
  if (range.max !== undefined && value > range.max) {
    throw new ValidationError(`options.${key} must be <= ${range.max}`);
  }
  return value;
}

function optionalFraction(source: Record<string, unknown>, key: string): number | undefined {
  const value = source[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "number" || !(value >= 0 && value <= 1)) {
    throw new ValidationError(`options.${key} must be a number between 0 and 1`);
  }
  return value;
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === "http:" || url.protocol === "https:";
  } catch {
    return false;
  }
}

/**
 * Merge per-request options (snake_case, all optional) over the configured
 * defaults. Throws ValidationError on anything malformed.
 */
export function resolveExtractionOptions(
  fields: ExtractionRequestFields,
  defaults: ExtractionDefaults,
): ExtractionOptions {
  const { instruction, schema } = fields;
  if (typeof instruction !== "string" || instruction.trim().length === 0) {
    throw new ValidationError("instruction must be a non-empty string");
  }
  if (schema !== undefined && schema !== null && !isPlainObject(schema)) {
    throw new ValidationError("schema must be a JSON object");
  }
  const raw = fields.options ?? {};
  if (!isPlainObject(raw)) {
    throw new ValidationError("options must be an object");
  }

  const maxChars = optionalInt(raw, "chunk_max_chars", { min: 1 });
  const maxTokens = optionalInt(raw, "chunk_max_tokens", { min: 1 }) ?? defaults.chunkMaxTokens;
  const budgetChars = maxChars ?? maxTokens * CHARS_PER_TOKEN;
  // A small explicit budget must not inherit a default overlap larger than itself.
  const overlapChars =
    optionalInt(raw, "overlap_chars", { min: 0 }) ?? Math.min(defaults.chunkOverlapChars, Math.floor(budgetChars / 10));
  if (overlapChars >= budgetChars) {
    throw new ValidationError(`options.overlap_chars must be smaller than the chunk budget (${budgetChars} chars)`);
  }

  const baseDelayMs = optionalInt(raw, "base_delay_ms", { min: 0, max: MAX_TIMER_MS }) ?? defaults.baseDelayMs;
  const maxDelayMs = optionalInt(raw, "max_delay_ms", { min: 0, max: MAX_TIMER_MS }) ?? defaults.maxDelayMs;
  if (maxDelayMs < baseDelayMs) {
    throw new ValidationError("options.max_delay_ms must be >= options.base_delay_ms");
  }

  const boundaryTolerance = optionalFraction(raw, "boundary_tolerance");
  const options: ExtractionOptions = {
    instruction: instruction.trim(),
    chunking: {
      ...(maxChars !== undefined ? { maxChars } : { maxTokens }),
      overlapChars,
      ...(boundaryTolerance !== undefined && { boundaryTolerance }),
    },
    concurrency: optionalInt(raw, "concurrency", { min: 1, max: MAX_CONCURRENCY }) ?? defaults.concurrency,
    retry: {
      maxRetries: optionalInt(raw, "max_retries", { min: 0 }) ?? defaults.maxRetries,
      baseDelayMs,
      maxDelayMs,
    },
    timeoutMs: optionalInt(raw, "timeout_ms", { min: 1, max: MAX_TIMER_MS }) ?? defaults.timeoutMs,
  };
  if (isPlainObject(schema)) options.schema = schema;
  return options;
}

export function parseDocumentInput(value: unknown, label = "document"): DocumentInput {
  if (!isPlainObject(value)) {
    throw new ValidationError(`${label} must be an object with url and content`);
  }
  const { url, content } = value;
  if (typeof url !== "string" || url.trim().length === 0) {
    throw new ValidationError(`${label}.url must be a non-empty string`);
  }
  if (typeof content !== "string") {
    throw new ValidationError(`${label}.content must be a string`);
  }
  return { url: url.trim(), content };
}

export function parseWebhookConfig(value: unknown): WebhookConfig | null {
  if (value === undefined || value === null) return null;
  if (!isPlainObject(value)) {
    throw new ValidationError("webhook must be an object");
  }
  const { url, secret } = value;
  if (typeof url !== "string" || !isHttpUrl(url)) {
    throw new ValidationError("webhook.url must be an http(s) URL");
  }
  if (secret !== undefined && (typeof secret !== "string" || secret.length === 0)) {
    throw new ValidationError("webhook.secret must be a non-empty string");
  }

  const config: WebhookConfig = { url };
  if (typeof secret === "string") config.secret = secret;
  const maxRetries = value.max_retries;
  if (maxRetries !== undefined) {
    if (typeof maxRetries !== "number" || !Number.isInteger(maxRetries) || maxRetries < 0 || maxRetries > MAX_WEBHOOK_RETRIES) {
      throw new ValidationError(`webhook.max_retries must be an integer between 0 and ${MAX_WEBHOOK_RETRIES}`);
    }
    config.maxRetries = maxRetries;
  }
  return config;
}
