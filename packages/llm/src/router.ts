import { createAnthropicProvider } from "./anthropic";
import { createOpenAiCompatProvider } from "./openai_compat";
import type { ExtractionProvider } from "./types";

export type ProviderKind = "openai_compat" | "anthropic";

function firstEnv(env: NodeJS.ProcessEnv, names: string[]): string | undefined {
  for (const name of names) {
    const value = env[name];
    if (typeof value === "string" && value.trim().length > 0) return value.trim();
  }
  return undefined;
}

function requireEnv(env: NodeJS.ProcessEnv, name: string): string {
  const value = firstEnv(env, [name]);
  if (!value) {
    throw new Error(`Missing required env var: ${name}`);
  }
  return value;
}

function withV1(baseUrl: string, pathAfterV1: string): string {
  const trimmed = baseUrl.replace(/\/+$/, "");
  if (trimmed.endsWith("/v1")) return `${trimmed}${pathAfterV1}`;
  return `${trimmed}/v1${pathAfterV1}`;
}

/**
 * LLM_ENDPOINT wins; otherwise Chat Completions under LLM_BASE_URL.
 * Responses API endpoints (`/v1/responses`) are accepted as given.
 */
export function resolveOpenAiEndpoint(env: NodeJS.ProcessEnv): string {
  const explicit = firstEnv(env, ["LLM_ENDPOINT"]);
  if (explicit) return explicit;
  const baseUrl = firstEnv(env, ["LLM_BASE_URL"]);
  if (!baseUrl) {
    throw new Error("Missing required env var: LLM_ENDPOINT (or LLM_BASE_URL)");
  }
  return withV1(baseUrl, "/chat/completions");
}

function parseProviderKind(value: string | undefined): ProviderKind {
  const raw = (value ?? "openai_compat").toLowerCase();
  if (raw === "openai_compat" || raw === "openai") return "openai_compat";
  if (raw === "anthropic") return "anthropic";
  throw new Error(`Unsupported LLM_PROVIDER: ${raw} (expected openai_compat or anthropic)`);
}

function parseMaxOutputTokens(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : undefined;
}

export function createEnvExtractionProvider(env: NodeJS.ProcessEnv = process.env): ExtractionProvider {
  const kind = parseProviderKind(firstEnv(env, ["LLM_PROVIDER"]));
  const apiKey = requireEnv(env, "LLM_API_KEY");
  const model = requireEnv(env, "LLM_MODEL");
  const maxOutputTokens = parseMaxOutputTokens(env.LLM_MAX_OUTPUT_TOKENS);

  if (kind === "anthropic") {
    return createAnthropicProvider({ apiKey, model, maxOutputTokens });
  }
  return createOpenAiCompatProvider({
    apiKey,
    endpoint: resolveOpenAiEndpoint(env),
    model,
    maxOutputTokens,
  });
}
