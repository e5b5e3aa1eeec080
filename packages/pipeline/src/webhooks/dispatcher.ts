/**
 * Webhook Dispatcher - at-least-once POST of job outcomes to a caller URL.
 *
 * Every attempt for one job carries the same delivery id so receivers can
 * dedupe. Non-2xx responses and network errors are retried with exponential
 * backoff; after the last attempt the failure is logged and reported through
 * the returned outcome and `onDeliveryFailed`. `deliver` never rejects.
 */

import {
  createLogger,
  errorMessage,
  type Logger,
  type RetryPolicy,
  type WebhookConfig,
  type WebhookDeliveryOutcome,
} from "@chunkwise/shared";

import { backoffDelayMs } from "../extraction/retry_policy";
import { sleep as defaultSleep, type SleepFn } from "../lib/sleep";
import type { WebhookPayload } from "../views/response";
import { signPayload } from "./signature";

export const DELIVERY_ID_HEADER = "x-chunkwise-delivery-id";
export const EVENT_HEADER = "x-chunkwise-event";
export const SIGNATURE_HEADER = "x-chunkwise-signature";

const RESPONSE_SNIPPET_CHARS = 200;

export interface WebhookAttemptEvent {
  taskId: string;
  attempt: number;
  statusCode: number | null;
  ok: boolean;
}

export interface WebhookDispatcherOptions {
  fetchImpl?: typeof fetch;
  /** Used when the webhook config does not set maxRetries. */
  defaultMaxRetries?: number;
  timeoutMs?: number;
  backoff?: Pick<RetryPolicy, "baseDelayMs" | "maxDelayMs">;
  sleep?: SleepFn;
  log?: Logger;
  now?: () => Date;
  onAttempt?: (event: WebhookAttemptEvent) => void;
  onDeliveryFailed?: (payload: WebhookPayload, outcome: WebhookDeliveryOutcome) => void;
}

export interface WebhookDispatcher {
  deliver(payload: WebhookPayload, config: WebhookConfig): Promise<WebhookDeliveryOutcome>;
}

type AttemptResult = { ok: true; statusCode: number } | { ok: false; statusCode: number | null; error: string };

export function createWebhookDispatcher(options: WebhookDispatcherOptions = {}): WebhookDispatcher {
  const fetchImpl = options.fetchImpl ?? globalThis.fetch;
  const defaultMaxRetries = options.defaultMaxRetries ?? 3;
  const timeoutMs = options.timeoutMs ?? 10_000;
  const backoff = options.backoff ?? { baseDelayMs: 1000, maxDelayMs: 30_000 };
  const sleep = options.sleep ?? defaultSleep;
  const now = options.now ?? (() => new Date());
  const log = options.log ?? createLogger({ component: "webhook" });

  async function attemptOnce(url: string, headers: Record<string, string>, body: string): Promise<AttemptResult> {
    try {
      const res = await fetchImpl(url, {
        method: "POST",
        headers,
        body,
        signal: AbortSignal.timeout(timeoutMs),
      });
      if (res.ok) {
        // The receiver's body is unused; cancelling it frees the connection.
        await res.body?.cancel().catch((err: unknown) => {
          log.debug({ url, err: errorMessage(err) }, "Failed to discard webhook response body");
        });
        return { ok: true, statusCode: res.status };
      }
      const text = await res.text().catch(() => "");
      const snippet = text.slice(0, RESPONSE_SNIPPET_CHARS);
      return { ok: false, statusCode: res.status, error: `HTTP ${res.status}${snippet ? `: ${snippet}` : ""}` };
    } catch (err) {
      return { ok: false, statusCode: null, error: errorMessage(err) };
    }
  }

  return {
    async deliver(payload, config) {
      const body = JSON.stringify(payload);
      const headers: Record<string, string> = {
        "content-type": "application/json",
        [DELIVERY_ID_HEADER]: payload.task_id,
        [EVENT_HEADER]: `job.${payload.status}`,
      };
      if (config.secret) headers[SIGNATURE_HEADER] = signPayload(body, config.secret);

      const totalAttempts = (config.maxRetries ?? defaultMaxRetries) + 1;
      let last: AttemptResult = { ok: false, statusCode: null, error: "No attempt made" };
      let attempts = 0;

      while (attempts < totalAttempts) {
        if (attempts > 0) {
          await sleep(backoffDelayMs({ ...backoff, maxRetries: totalAttempts - 1 }, attempts - 1));
        }
        attempts += 1;
        last = await attemptOnce(config.url, headers, body);
        options.onAttempt?.({ taskId: payload.task_id, attempt: attempts, statusCode: last.statusCode, ok: last.ok });

        if (last.ok) {
          log.info({ taskId: payload.task_id, attempts, statusCode: last.statusCode }, "Webhook delivered");
          return {
            delivered: true,
            attempts,
            lastStatusCode: last.statusCode,
            error: null,
            deliveredAt: now().toISOString(),
          };
        }
        log.debug({ taskId: payload.task_id, attempt: attempts, statusCode: last.statusCode }, "Webhook attempt failed");
      }

      const outcome: WebhookDeliveryOutcome = {
        delivered: false,
        attempts,
        lastStatusCode: last.statusCode,
        error: last.ok ? null : last.error,
        deliveredAt: null,
      };
      log.warn(
        { taskId: payload.task_id, url: config.url, attempts, statusCode: outcome.lastStatusCode, error: outcome.error },
        "Webhook delivery failed",
      );
      try {
        options.onDeliveryFailed?.(payload, outcome);
      } catch (err) {
        log.error({ taskId: payload.task_id, err: errorMessage(err) }, "onDeliveryFailed hook threw");
      }
      return outcome;
    },
  };
}
