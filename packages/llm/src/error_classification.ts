import type { ProviderErrorKind } from "@chunkwise/shared";

import { TimeoutError } from "./timeout";

/** Thrown when a provider answered but the output cannot be used. */
export class MalformedResponseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MalformedResponseError";
  }
}

export interface ClassifiedProviderError {
  kind: ProviderErrorKind;
  message: string;
  retryable: boolean;
  statusCode: number | null;
}

const RETRYABLE_KINDS: ReadonlySet<ProviderErrorKind> = new Set([
  "rate_limited",
  "timeout",
  "provider_error",
]);

const AUTH_ERROR_PATTERNS: RegExp[] = [
  /could not resolve authentication method/i,
  /invalid api key/i,
  /incorrect api key/i,
  /api key.*required/i,
  /missing.*api key/i,
  /authentication failed/i,
  /unauthorized/i,
  /forbidden/i,
  /permission denied/i,
];

const RATE_LIMIT_PATTERNS: RegExp[] = [/rate.?limit/i, /too many requests/i, /quota exceeded/i];

export function isAuthLikeMessage(message: string): boolean {
  return AUTH_ERROR_PATTERNS.some((pattern) => pattern.test(message));
}

export function isRetryableKind(kind: ProviderErrorKind): boolean {
  return RETRYABLE_KINDS.has(kind);
}

function statusCodeOf(error: unknown): number | null {
  if (!error || typeof error !== "object") return null;
  const rec = error as { statusCode?: unknown; status?: unknown };
  const status = rec.statusCode ?? rec.status;
  return typeof status === "number" ? status : null;
}

function kindFromStatus(status: number): ProviderErrorKind | null {
  if (status === 401 || status === 403) return "auth_error";
  if (status === 429) return "rate_limited";
  if (status === 408 || status === 504) return "timeout";
  if (status >= 400) return "provider_error";
  return null;
}

function isAbortLike(error: Error): boolean {
  return error.name === "AbortError" || error.name === "TimeoutError";
}

/**
 * Map anything a provider client throws onto the extraction error taxonomy.
 */
export function classifyProviderError(error: unknown): ClassifiedProviderError {
  const err = error instanceof Error ? error : new Error(String(error));
  const statusCode = statusCodeOf(err);
  const statusKind = statusCode === null ? null : kindFromStatus(statusCode);

  let kind: ProviderErrorKind;
  if (err instanceof MalformedResponseError) {
    kind = "malformed_response";
  } else if (err instanceof TimeoutError || isAbortLike(err)) {
    kind = "timeout";
  } else if (statusKind) {
    kind = statusKind;
  } else if (isAuthLikeMessage(err.message)) {
    kind = "auth_error";
  } else if (RATE_LIMIT_PATTERNS.some((pattern) => pattern.test(err.message))) {
    kind = "rate_limited";
  } else {
    kind = "provider_error";
  }

  return { kind, message: err.message, retryable: isRetryableKind(kind), statusCode };
}
