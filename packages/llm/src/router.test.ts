import { describe, expect, it } from "vitest";

import { createEnvExtractionProvider, resolveOpenAiEndpoint } from "./router";

describe("resolveOpenAiEndpoint", () => {
  it("prefers an explicit endpoint", () => {
    expect(
      resolveOpenAiEndpoint({ LLM_ENDPOINT: "https://llm.test/v1/responses", LLM_BASE_URL: "https://other.test" }),
    ).toBe("https://llm.test/v1/responses");
  });

  it("appends chat completions to a base URL with or without /v1", () => {
    expect(resolveOpenAiEndpoint({ LLM_BASE_URL: "https://llm.test/" })).toBe("https://llm.test/v1/chat/completions");
    expect(resolveOpenAiEndpoint({ LLM_BASE_URL: "https://llm.test/v1" })).toBe(
      "https://llm.test/v1/chat/completions",
    );
  });

  it("requires one of the two", () => {
    expect(() => resolveOpenAiEndpoint({})).toThrow("Missing required env var: LLM_ENDPOINT (or LLM_BASE_URL)");
  });
});

describe("createEnvExtractionProvider", () => {
  const base = { LLM_API_KEY: "test-key", LLM_MODEL: "test-model", LLM_BASE_URL: "https://llm.test" };

  it("defaults to the OpenAI-compatible client", () => {
    const provider = createEnvExtractionProvider(base);
    expect(provider.name).toBe("openai_compat");
    expect(provider.model).toBe("test-model");
  });

  it("builds the Anthropic client when asked", () => {
    const provider = createEnvExtractionProvider({ ...base, LLM_PROVIDER: "anthropic" });
    expect(provider.name).toBe("anthropic");
  });

  it("rejects unknown providers and missing keys", () => {
    expect(() => createEnvExtractionProvider({ ...base, LLM_PROVIDER: "mystery" })).toThrow(
      "Unsupported LLM_PROVIDER: mystery (expected openai_compat or anthropic)",
    );
    expect(() => createEnvExtractionProvider({ LLM_MODEL: "m" })).toThrow("Missing required env var: LLM_API_KEY");
  });
});
