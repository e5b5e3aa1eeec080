import { describe, expect, it } from "vitest";

import { loadRuntimeEnv } from "./runtime_env";

describe("loadRuntimeEnv", () => {
  it("applies defaults for the in-memory store", () => {
    const env = loadRuntimeEnv({ JOB_STORE: "memory" });

    expect(env.jobStore).toBe("memory");
    expect(env.databaseUrl).toBeUndefined();
    expect(env.redisUrl).toBe("redis://localhost:6379");
    expect(env.apiPort).toBe(3001);
    expect(env.apiKey).toBeUndefined();
    expect(env.cancelPollMs).toBe(1000);
    expect(env.extraction).toEqual({
      concurrency: 4,
      maxRetries: 3,
      baseDelayMs: 500,
      maxDelayMs: 8000,
      timeoutMs: 60_000,
      chunkMaxTokens: 2000,
      chunkOverlapChars: 200,
    });
    expect(env.webhook).toEqual({ maxRetries: 3, timeoutMs: 10_000 });
  });

  it("requires DATABASE_URL for the postgres store", () => {
    expect(() => loadRuntimeEnv({})).toThrow("Missing required env var: DATABASE_URL");
    expect(loadRuntimeEnv({ DATABASE_URL: "postgres://localhost/chunkwise" }).jobStore).toBe("postgres");
  });

  it("reads overrides and trims the API key", () => {
    const env = loadRuntimeEnv({
      JOB_STORE: "MEMORY",
      API_KEY: "  test-secret ",
      EXTRACTION_CONCURRENCY: "8",
      WORKER_CONCURRENCY: "3",
      APP_ENV: "prod",
    });

    expect(env.jobStore).toBe("memory");
    expect(env.apiKey).toBe("test-secret");
    expect(env.extraction.concurrency).toBe(8);
    expect(env.workerConcurrency).toBe(3);
    expect(env.appEnv).toBe("prod");
  });

  it("rejects timer settings Node.js would clamp", () => {
    expect(loadRuntimeEnv({ JOB_STORE: "memory", EXTRACTION_TIMEOUT_MS: "2147483647" }).extraction.timeoutMs).toBe(
      2_147_483_647,
    );
    expect(() => loadRuntimeEnv({ JOB_STORE: "memory", EXTRACTION_TIMEOUT_MS: "3000000000" })).toThrow(
      "Invalid integer env var: EXTRACTION_TIMEOUT_MS=3000000000",
    );
    expect(() => loadRuntimeEnv({ JOB_STORE: "memory", EXTRACTION_MAX_DELAY_MS: "2147483648" })).toThrow(
      "Invalid integer env var: EXTRACTION_MAX_DELAY_MS=2147483648",
    );
  });

  it("rejects bad values", () => {
    expect(() => loadRuntimeEnv({ JOB_STORE: "sqlite" })).toThrow("Invalid JOB_STORE: sqlite");
    expect(() => loadRuntimeEnv({ JOB_STORE: "memory", EXTRACTION_CONCURRENCY: "0" })).toThrow(
      "Invalid integer env var: EXTRACTION_CONCURRENCY=0",
    );
  });
});
