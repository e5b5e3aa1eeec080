import type { WebhookDeliveryOutcome } from "@chunkwise/shared";
import { describe, expect, it, vi } from "vitest";

import type { SleepFn } from "../lib/sleep";
import type { WebhookPayload } from "../views/response";
import { createWebhookDispatcher, DELIVERY_ID_HEADER, EVENT_HEADER, SIGNATURE_HEADER } from "./dispatcher";
import { verifySignature } from "./signature";

const PAYLOAD: WebhookPayload = {
  task_id: "job-1",
  task_type: "llm_extraction",
  status: "completed",
  urls: ["https://example.com/doc"],
  result: null,
  token_usage: null,
  error: null,
};

const NOW = new Date("2026-03-01T10:00:00.000Z");

function recordingSleep(): { sleep: SleepFn; delays: number[] } {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms) => {
      delays.push(ms);
    },
  };
}

function headersOf(init: RequestInit | undefined): Record<string, string> {
  const headers = init?.headers;
  return headers && !(headers instanceof Headers) && !Array.isArray(headers) ? headers : {};
}

describe("webhook dispatcher", () => {
  it("posts the payload once on success", async () => {
    const response = new Response("ok", { status: 200 });
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(response);
    const dispatcher = createWebhookDispatcher({ fetchImpl, now: () => NOW });

    const outcome = await dispatcher.deliver(PAYLOAD, { url: "https://hooks.example.com/done" });

    expect(outcome).toEqual({
      delivered: true,
      attempts: 1,
      lastStatusCode: 200,
      error: null,
      deliveredAt: "2026-03-01T10:00:00.000Z",
    });
    const [url, init] = fetchImpl.mock.calls[0] ?? [];
    expect(url).toBe("https://hooks.example.com/done");
    expect(init?.method).toBe("POST");
    expect(init?.body).toBe(JSON.stringify(PAYLOAD));
    expect(headersOf(init)).toEqual({
      "content-type": "application/json",
      [DELIVERY_ID_HEADER]: "job-1",
      [EVENT_HEADER]: "job.completed",
    });
    expect(response.bodyUsed).toBe(true);
  });

  it("signs the body when a secret is configured", async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(new Response(null, { status: 204 }));
    const dispatcher = createWebhookDispatcher({ fetchImpl });

    await dispatcher.deliver(PAYLOAD, { url: "https://hooks.example.com/done", secret: "test-secret" });

    const init = fetchImpl.mock.calls[0]?.[1];
    const signature = headersOf(init)[SIGNATURE_HEADER];
    expect(signature).toMatch(/^sha256=[0-9a-f]{64}$/);
    expect(verifySignature(JSON.stringify(PAYLOAD), "test-secret", signature)).toBe(true);
    expect(verifySignature(JSON.stringify(PAYLOAD), "other-secret", signature)).toBe(false);
  });

  it("retries a failing endpoint maxRetries + 1 times, then reports the failure", async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockImplementation(async () => new Response("boom", { status: 500 }));
    const { sleep, delays } = recordingSleep();
    const failures: WebhookDeliveryOutcome[] = [];
    const dispatcher = createWebhookDispatcher({
      fetchImpl,
      sleep,
      backoff: { baseDelayMs: 100, maxDelayMs: 250 },
      onDeliveryFailed: (_payload, outcome) => failures.push(outcome),
    });

    const outcome = await dispatcher.deliver(PAYLOAD, { url: "https://hooks.example.com/done", maxRetries: 3 });

    expect(fetchImpl).toHaveBeenCalledTimes(4);
    expect(delays).toEqual([100, 200, 250]);
    expect(outcome).toEqual({
      delivered: false,
      attempts: 4,
      lastStatusCode: 500,
      error: "HTTP 500: boom",
      deliveredAt: null,
    });
    expect(failures).toEqual([outcome]);
  });

  it("keeps the same delivery id on every attempt", async () => {
    const fetchImpl = vi
      .fn<typeof fetch>()
      .mockRejectedValueOnce(new Error("ECONNRESET"))
      .mockResolvedValueOnce(new Response("", { status: 202 }));
    const dispatcher = createWebhookDispatcher({ fetchImpl, sleep: recordingSleep().sleep });

    const outcome = await dispatcher.deliver(PAYLOAD, { url: "https://hooks.example.com/done" });

    expect(outcome.delivered).toBe(true);
    expect(outcome.attempts).toBe(2);
    const ids = fetchImpl.mock.calls.map(([, init]) => headersOf(init)[DELIVERY_ID_HEADER]);
    expect(ids).toEqual(["job-1", "job-1"]);
  });

  it("uses the dispatcher default retry count and records network errors", async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockRejectedValue(new Error("getaddrinfo ENOTFOUND hooks.example.com"));
    const dispatcher = createWebhookDispatcher({ fetchImpl, defaultMaxRetries: 1, sleep: recordingSleep().sleep });

    const outcome = await dispatcher.deliver(PAYLOAD, { url: "https://hooks.example.com/done" });

    expect(fetchImpl).toHaveBeenCalledTimes(2);
    expect(outcome).toMatchObject({
      delivered: false,
      attempts: 2,
      lastStatusCode: null,
      error: "getaddrinfo ENOTFOUND hooks.example.com",
    });
  });
});
