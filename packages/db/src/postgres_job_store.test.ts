import { AlreadyTerminalError, InvalidTransitionError, JobNotFoundError, type JobStatus } from "@chunkwise/shared";
import { describe, expect, it, type Mock, vi } from "vitest";

import { createDbContext, type Db, type Queryable } from "./db";
import { createPostgresJobStore } from "./postgres_job_store";
import type { ExtractionJobRow } from "./repos/extraction_jobs";

const JOB_ID = "7c9e6679-7425-40de-944b-e07fc1f90ae7";

function row(status: JobStatus): ExtractionJobRow {
  return {
    id: JOB_ID,
    status,
    url: "https://example.com/doc",
    content: "Body",
    options_json: {
      instruction: "Extract",
      chunking: { maxTokens: 10 },
      concurrency: 1,
      retry: { maxRetries: 0, baseDelayMs: 0, maxDelayMs: 0 },
      timeoutMs: 100,
    },
    webhook_json: { url: "https://hooks.example.com/x" },
    result_json: null,
    error_json: null,
    webhook_delivery_json: null,
    created_at: new Date("2026-01-01T00:00:00.000Z"),
    updated_at: new Date("2026-01-01T00:00:05.000Z"),
  };
}

function fakeDb(query: Mock): Db {
  const ctx = createDbContext({ query } as unknown as Queryable);
  return {
    ...ctx,
    tx: (fn) => fn(ctx),
    close: async () => undefined,
  };
}

describe("postgres job store", () => {
  it("maps rows to jobs", async () => {
    const query = vi.fn().mockResolvedValue({ rows: [row("pending")] });
    const job = await createPostgresJobStore(fakeDb(query)).get(JOB_ID);

    expect(job).toMatchObject({
      id: JOB_ID,
      status: "pending",
      createdAt: "2026-01-01T00:00:00.000Z",
      updatedAt: "2026-01-01T00:00:05.000Z",
      input: { url: "https://example.com/doc", content: "Body" },
      webhook: { url: "https://hooks.example.com/x" },
    });
  });

  it("transitions with a compare-and-swap on the legal source states", async () => {
    const query = vi.fn().mockResolvedValue({ rows: [row("running")] });
    const job = await createPostgresJobStore(fakeDb(query)).transition(JOB_ID, "running");

    expect(job.status).toBe("running");
    const [sql, params] = query.mock.calls[0] ?? [];
    expect(sql).toContain("where id = $1 and status = any($5::text[])");
    expect(params).toEqual([JOB_ID, "running", null, null, ["pending"]]);
  });

  it("reports the current status when the swap loses", async () => {
    const query = vi.fn().mockResolvedValueOnce({ rows: [] }).mockResolvedValueOnce({ rows: [row("cancelled")] });

    const attempt = createPostgresJobStore(fakeDb(query)).transition(JOB_ID, "completed");

    await expect(attempt).rejects.toBeInstanceOf(InvalidTransitionError);
    await expect(attempt).rejects.toMatchObject({ from: "cancelled", to: "completed" });
  });

  it("rejects cancelling a completed job", async () => {
    const query = vi.fn().mockResolvedValueOnce({ rows: [] }).mockResolvedValueOnce({ rows: [row("completed")] });

    await expect(createPostgresJobStore(fakeDb(query)).cancel(JOB_ID)).rejects.toBeInstanceOf(AlreadyTerminalError);
    expect(query).toHaveBeenCalledTimes(2);
    expect(query.mock.calls[0]?.[1]).toEqual([JOB_ID, "cancelled", null, null, ["pending", "running"]]);
  });

  it("never queries for ids that are not uuids", async () => {
    const query = vi.fn();
    const store = createPostgresJobStore(fakeDb(query));

    expect(await store.get("not-a-uuid")).toBeNull();
    await expect(store.transition("not-a-uuid", "running")).rejects.toBeInstanceOf(JobNotFoundError);
    expect(query).not.toHaveBeenCalled();
  });

  it("records a webhook delivery on the job and in the log", async () => {
    const query = vi
      .fn()
      .mockResolvedValueOnce({ rows: [row("completed")] })
      .mockResolvedValueOnce({ rows: [], rowCount: 1 })
      .mockResolvedValueOnce({ rows: [], rowCount: 1 });
    const outcome = { delivered: false, attempts: 4, lastStatusCode: 500, error: "HTTP 500", deliveredAt: null };

    await createPostgresJobStore(fakeDb(query)).recordWebhookDelivery(JOB_ID, outcome);

    expect(query).toHaveBeenCalledTimes(3);
    expect(query.mock.calls[1]?.[1]).toEqual([JOB_ID, JSON.stringify(outcome)]);
    expect(query.mock.calls[2]?.[1]).toEqual([JOB_ID, "https://hooks.example.com/x", false, 4, 500, "HTTP 500", null]);
  });

  it("lists with a status filter and a clamped limit", async () => {
    const query = vi.fn().mockResolvedValue({ rows: [row("failed")] });
    const jobs = await createPostgresJobStore(fakeDb(query)).list({ status: "failed", limit: 500 });

    expect(jobs).toHaveLength(1);
    const [sql, params] = query.mock.calls[0] ?? [];
    expect(sql).toContain("where status = $1");
    expect(params).toEqual(["failed", 100]);
  });
});
