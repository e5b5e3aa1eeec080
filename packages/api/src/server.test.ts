import { createMemoryJobStore } from "@chunkwise/db";
import type { ExtractionProvider, ProviderResponse } from "@chunkwise/llm";
import { createWebhookDispatcher } from "@chunkwise/pipeline";
import type { AggregateResult, ExtractionDefaults, ExtractionOptions, JobStore } from "@chunkwise/shared";
import { describe, expect, it, vi } from "vitest";

import type { ApiContext, JobLauncher } from "./lib/context";
import { buildServer } from "./server";

const DEFAULTS: ExtractionDefaults = {
  concurrency: 2,
  maxRetries: 0,
  baseDelayMs: 0,
  maxDelayMs: 0,
  timeoutMs: 1000,
  chunkMaxTokens: 2000,
  chunkOverlapChars: 200,
};

const OPTIONS: ExtractionOptions = {
  instruction: "List the animals",
  chunking: { maxChars: 1000, overlapChars: 0 },
  concurrency: 1,
  retry: { maxRetries: 0, baseDelayMs: 0, maxDelayMs: 0 },
  timeoutMs: 1000,
};

const FOX_RESULT: AggregateResult = {
  chunks: [
    {
      chunkIndex: 0,
      content: [{ animal: "fox" }],
      usage: { promptTokens: 10, completionTokens: 2, totalTokens: 12, availability: "available" },
      status: "success",
      error: null,
      attempts: 1,
    },
  ],
  usage: { promptTokens: 10, completionTokens: 2, totalTokens: 12, availability: "available" },
  overallStatus: "success",
};

function foxProvider(): ExtractionProvider {
  return {
    name: "fake",
    model: "fake-model",
    complete: vi.fn(
      async (): Promise<ProviderResponse> => ({
        outputText: '[{"animal":"fox"}]',
        usage: { promptTokens: 10, completionTokens: 2 },
        rawResponse: {},
        endpoint: "fake://",
      }),
    ),
  };
}

function fakeLauncher(launch: JobLauncher["launch"] = async () => undefined) {
  return { launch: vi.fn(launch), close: vi.fn(async () => undefined) };
}

async function setup(overrides: Partial<ApiContext> = {}) {
  let n = 0;
  const store = createMemoryJobStore({ generateId: () => `job-${++n}` });
  const launcher = fakeLauncher();
  const ctx: ApiContext = {
    store,
    provider: foxProvider(),
    extractionDefaults: DEFAULTS,
    launcher,
    ...overrides,
  };
  const server = await buildServer(ctx, { logger: false });
  return { server, store, launcher, ctx };
}

async function completedJob(store: JobStore) {
  const job = await store.create({ input: { url: "https://example.com/den", content: "A fox." }, options: OPTIONS });
  await store.transition(job.id, "running");
  return store.transition(job.id, "completed", { result: FOX_RESULT });
}

describe("GET /api/health", () => {
  it("reports the configured provider", async () => {
    const { server } = await setup();
    const res = await server.inject({ method: "GET", url: "/api/health" });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ ok: true, provider: "fake", model: "fake-model" });
  });
});

describe("POST /api/extract", () => {
  it("returns per-document results and keeps going past an unchunkable document", async () => {
    const { server, ctx } = await setup();

    const res = await server.inject({
      method: "POST",
      url: "/api/extract",
      payload: {
        documents: [
          { url: "https://example.com/den", content: "A fox sleeps in the den." },
          { url: "https://example.com/empty", content: "   " },
        ],
        instruction: "List the animals",
        schema: { type: "array" },
      },
    });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.success).toBe(false);
    expect(typeof body.server_processing_time_s).toBe("number");
    expect(typeof body.server_memory_delta_mb).toBe("number");
    expect(body.results).toEqual([
      {
        url: "https://example.com/den",
        success: true,
        overall_status: "success",
        extracted_content: [{ animal: "fox" }],
        chunks: [{ index: 0, status: "success", error: null }],
        token_usage: {
          prompt_tokens: 10,
          completion_tokens: 2,
          total_tokens: 12,
          availability: "available",
          chunks: [{ prompt_tokens: 10, completion_tokens: 2, total_tokens: 12 }],
        },
      },
      {
        url: "https://example.com/empty",
        success: false,
        overall_status: "failed",
        extracted_content: [],
        error: "Cannot chunk empty content",
        chunks: [],
      },
    ]);
    expect(ctx.provider.complete).toHaveBeenCalledTimes(1);
  });

  it("rejects a request without an instruction", async () => {
    const { server } = await setup();
    const res = await server.inject({
      method: "POST",
      url: "/api/extract",
      payload: { documents: [{ url: "https://example.com/den", content: "A fox." }] },
    });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({
      ok: false,
      error: { code: "INVALID_REQUEST", message: "instruction must be a non-empty string" },
    });
  });

  it("rejects an empty document list", async () => {
    const { server } = await setup();
    const res = await server.inject({
      method: "POST",
      url: "/api/extract",
      payload: { documents: [], instruction: "List the animals" },
    });
    expect(res.statusCode).toBe(400);
    expect(res.json().error).toEqual({ code: "INVALID_REQUEST", message: "documents must be a non-empty array" });
  });
});

describe("POST /api/jobs", () => {
  it("stores the job and launches it", async () => {
    const { server, store, launcher } = await setup();

    const res = await server.inject({
      method: "POST",
      url: "/api/jobs",
      payload: {
        url: "https://example.com/den",
        content: "A fox sleeps in the den.",
        instruction: "List the animals",
        options: { concurrency: 3 },
        webhook: { url: "https://hooks.example.com/done", secret: "test-secret" },
      },
    });

    expect(res.statusCode).toBe(202);
    expect(res.json()).toEqual({ ok: true, task_id: "job-1", status: "pending" });
    expect(launcher.launch).toHaveBeenCalledWith("job-1");

    const stored = await store.get("job-1");
    expect(stored?.options.concurrency).toBe(3);
    expect(stored?.webhook).toEqual({ url: "https://hooks.example.com/done", secret: "test-secret" });
  });

  it("rejects a webhook that is not an http(s) URL", async () => {
    const { server, launcher } = await setup();
    const res = await server.inject({
      method: "POST",
      url: "/api/jobs",
      payload: {
        url: "https://example.com/den",
        content: "A fox.",
        instruction: "List the animals",
        webhook: { url: "ftp://hooks.example.com" },
      },
    });
    expect(res.statusCode).toBe(400);
    expect(res.json().error).toEqual({ code: "INVALID_REQUEST", message: "webhook.url must be an http(s) URL" });
    expect(launcher.launch).not.toHaveBeenCalled();
  });

  it("cancels the job and answers 503 when it cannot be launched", async () => {
    const launcher = fakeLauncher(async () => {
      throw new Error("connect ECONNREFUSED");
    });
    const { server, store } = await setup({ launcher });

    const res = await server.inject({
      method: "POST",
      url: "/api/jobs",
      payload: { url: "https://example.com/den", content: "A fox.", instruction: "List the animals" },
    });

    expect(res.statusCode).toBe(503);
    expect(res.json().error).toEqual({ code: "QUEUE_UNAVAILABLE", message: "Job queue unavailable" });
    expect((await store.get("job-1"))?.status).toBe("cancelled");
  });
  it("sends the cancelled webhook for a job it could not launch", async () => {
    const launcher = fakeLauncher(async () => {
      throw new Error("connect ECONNREFUSED");
    });
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(new Response("ok", { status: 200 }));
    const { server, store } = await setup({ launcher, dispatcher: createWebhookDispatcher({ fetchImpl }) });

    const res = await server.inject({
      method: "POST",
      url: "/api/jobs",
      payload: {
        url: "https://example.com/den",
        content: "A fox.",
        instruction: "List the animals",
        webhook: { url: "https://hooks.example.com/done" },
      },
    });

    expect(res.statusCode).toBe(503);
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    const [url, init] = fetchImpl.mock.calls[0] ?? [];
    expect(url).toBe("https://hooks.example.com/done");
    expect(new Headers(init?.headers).get("x-chunkwise-event")).toBe("job.cancelled");
    const stored = await store.get("job-1");
    expect(stored?.status).toBe("cancelled");
    expect(stored?.webhookDelivery).toMatchObject({ delivered: true, attempts: 1, lastStatusCode: 200 });
  });
});

describe("GET /api/jobs/:id", () => {
  it("answers 404 for an unknown job", async () => {
    const { server } = await setup();
    const res = await server.inject({ method: "GET", url: "/api/jobs/missing" });
    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ ok: false, error: { code: "JOB_NOT_FOUND", message: "Job not found: missing" } });
  });

  it("includes the result of a finished job", async () => {
    const { server, store } = await setup();
    const job = await completedJob(store);

    const res = await server.inject({ method: "GET", url: `/api/jobs/${job.id}` });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      ok: true,
      task_id: "job-1",
      status: "completed",
      created_at: job.createdAt,
      updated_at: job.updatedAt,
      url: "https://example.com/den",
      result: {
        url: "https://example.com/den",
        success: true,
        overall_status: "success",
        extracted_content: [{ animal: "fox" }],
        chunks: [{ index: 0, status: "success", error: null }],
        token_usage: {
          prompt_tokens: 10,
          completion_tokens: 2,
          total_tokens: 12,
          availability: "available",
          chunks: [{ prompt_tokens: 10, completion_tokens: 2, total_tokens: 12 }],
        },
      },
    });
  });
});

describe("POST /api/jobs/:id/cancel", () => {
  it("cancels a pending job", async () => {
    const { server, store } = await setup();
    const job = await store.create({ input: { url: "https://example.com/den", content: "A fox." }, options: OPTIONS });

    const res = await server.inject({ method: "POST", url: `/api/jobs/${job.id}/cancel` });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ ok: true, task_id: "job-1", status: "cancelled" });
  });

  it("answers 409 for a finished job and leaves it alone", async () => {
    const { server, store } = await setup();
    const job = await completedJob(store);

    const res = await server.inject({ method: "POST", url: `/api/jobs/${job.id}/cancel` });

    expect(res.statusCode).toBe(409);
    expect(res.json().error).toEqual({
      code: "ALREADY_TERMINAL",
      message: "Job job-1 already finished with status completed",
    });
    expect((await store.get(job.id))?.status).toBe("completed");
  });
});

describe("GET /api/jobs", () => {
  it("lists recent jobs newest first", async () => {
    const { server, store } = await setup();
    await store.create({ input: { url: "https://example.com/a", content: "A." }, options: OPTIONS });
    await store.create({ input: { url: "https://example.com/b", content: "B." }, options: OPTIONS });

    const res = await server.inject({ method: "GET", url: "/api/jobs?limit=1" });

    expect(res.statusCode).toBe(200);
    expect(res.json().jobs).toEqual([expect.objectContaining({ task_id: "job-2", url: "https://example.com/b" })]);
  });

  it("rejects an unknown status filter", async () => {
    const { server } = await setup();
    const res = await server.inject({ method: "GET", url: "/api/jobs?status=done" });
    expect(res.statusCode).toBe(400);
    expect(res.json().error.code).toBe("INVALID_REQUEST");
  });
});

describe("GET /api/jobs/:id/webhook-deliveries", () => {
  it("returns the delivery log in wire shape", async () => {
    const { server, store } = await setup();
    const job = await store.create({
      input: { url: "https://example.com/den", content: "A fox." },
      options: OPTIONS,
      webhook: { url: "https://hooks.example.com/done" },
    });
    await store.recordWebhookDelivery(job.id, {
      delivered: false,
      attempts: 4,
      lastStatusCode: 500,
      error: "HTTP 500: down",
      deliveredAt: null,
    });

    const res = await server.inject({ method: "GET", url: `/api/jobs/${job.id}/webhook-deliveries` });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      ok: true,
      task_id: "job-1",
      deliveries: [
        {
          url: "https://hooks.example.com/done",
          recorded_at: expect.any(String),
          delivered: false,
          attempts: 4,
          last_status_code: 500,
          error: "HTTP 500: down",
          delivered_at: null,
        },
      ],
    });
  });
});

describe("API key", () => {
  it("guards job routes but not health", async () => {
    const { server } = await setup({ apiKey: "test-secret" });

    const health = await server.inject({ method: "GET", url: "/api/health" });
    expect(health.statusCode).toBe(200);

    const missing = await server.inject({ method: "GET", url: "/api/jobs" });
    expect(missing.statusCode).toBe(401);
    expect(missing.json().error.code).toBe("MISSING_API_KEY");

    const wrong = await server.inject({ method: "GET", url: "/api/jobs", headers: { "x-api-key": "not-it" } });
    expect(wrong.statusCode).toBe(401);
    expect(wrong.json().error.code).toBe("INVALID_API_KEY");

    const ok = await server.inject({ method: "GET", url: "/api/jobs", headers: { "x-api-key": "test-secret" } });
    expect(ok.statusCode).toBe(200);
  });
});

describe("POST /api/admin/emergency-stop", () => {
  it("is only mounted with an emergency stop control", async () => {
    const { server } = await setup();
    const res = await server.inject({ method: "POST", url: "/api/admin/emergency-stop" });
    expect(res.statusCode).toBe(404);
  });

  it("activates the kill switch", async () => {
    const emergencyStop = { activate: vi.fn(async () => undefined), clear: vi.fn(async () => undefined) };
    const { server } = await setup({ emergencyStop });

    const res = await server.inject({ method: "POST", url: "/api/admin/emergency-stop" });

    expect(res.statusCode).toBe(200);
    expect(res.json().ok).toBe(true);
    expect(emergencyStop.activate).toHaveBeenCalledTimes(1);
  });
});
