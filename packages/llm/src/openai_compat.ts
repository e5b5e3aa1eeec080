import type { RawUsage, TokenDetails } from "@chunkwise/shared";

import type {
  ExtractionProvider,
  ExtractionRequest,
  ProviderHttpError,
  ProviderResponse,
} from "./types";

export interface OpenAiCompatConfig {
  apiKey: string;
  endpoint: string;
  model: string;
  maxOutputTokens?: number;
  fetchImpl?: typeof fetch;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function asRecord(value: unknown): Record<string, unknown> {
  return isRecord(value) ? value : {};
}

function truncateString(value: string, maxChars: number): string {
  if (value.length <= maxChars) return value;
  return `${value.slice(0, maxChars)}…`;
}

function extractErrorDetail(response: unknown): string | null {
  if (typeof response === "string") return response;
  const obj = asRecord(response);
  const err = asRecord(obj.error);
  if (typeof err.message === "string") return err.message;
  if (typeof obj.message === "string") return obj.message;
  if (typeof obj.detail === "string") return obj.detail;
  if (typeof obj.error === "string") return obj.error;
  return null;
}

function responseSnippet(response: unknown): string | null {
  if (typeof response === "string") return truncateString(response, 800);
  try {
    return truncateString(JSON.stringify(response), 800);
  } catch {
    return null;
  }
}

/**
 * Assistant text from either a Responses API body (`output_text` / `output[]`)
 * or a Chat Completions body (`choices[0].message.content`).
 */
export function extractAssistantContent(response: unknown): string | null {
  const rec = asRecord(response);

  if (typeof rec.output_text === "string" && rec.output_text.length > 0) return rec.output_text;

  if (Array.isArray(rec.output)) {
    for (const item of rec.output) {
      const it = asRecord(item);
      if (it.type !== "message" || !Array.isArray(it.content)) continue;
      for (const part of it.content) {
        const p = asRecord(part);
        if ((p.type === "output_text" || p.type === "text") && typeof p.text === "string" && p.text.length > 0) {
          return p.text;
        }
      }
    }
  }

  if (Array.isArray(rec.choices) && rec.choices.length > 0) {
    const msg = asRecord(asRecord(rec.choices[0]).message);
    if (typeof msg.content === "string" && msg.content.length > 0) return msg.content;
  }

  return null;
}

function asNumber(value: unknown): number | undefined {
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

function numericDetails(value: unknown): TokenDetails | undefined {
  const entries = Object.entries(asRecord(value)).filter(
    (entry): entry is [string, number] => typeof entry[1] === "number" && Number.isFinite(entry[1]),
  );
  return entries.length > 0 ? Object.fromEntries(entries) : undefined;
}

/**
 * Read the `usage` block of either API flavour. Returns null when the provider
 * sent no usage block at all; individual counters stay undefined when absent.
 */
export function extractRawUsage(response: unknown): RawUsage | null {
  const usage = asRecord(response).usage;
  if (!isRecord(usage)) return null;
  const u = usage;

  return {
    promptTokens: asNumber(u.prompt_tokens) ?? asNumber(u.input_tokens),
    completionTokens: asNumber(u.completion_tokens) ?? asNumber(u.output_tokens),
    totalTokens: asNumber(u.total_tokens),
    promptTokensDetails: numericDetails(u.prompt_tokens_details ?? u.input_tokens_details),
    completionTokensDetails: numericDetails(u.completion_tokens_details ?? u.output_tokens_details),
  };
}

function buildBody(endpoint: string, model: string, request: ExtractionRequest, maxOutputTokens?: number) {
  const maxTokens = request.maxOutputTokens ?? maxOutputTokens;
  if (endpoint.includes("/responses")) {
    return {
      model,
      input: [
        { role: "system", content: request.system },
        { role: "user", content: request.user },
      ],
      temperature: request.temperature ?? 0,
      stream: false,
      ...(maxTokens ? { max_output_tokens: maxTokens } : {}),
    };
  }
  return {
    model,
    messages: [
      { role: "system", content: request.system },
      { role: "user", content: request.user },
    ],
    temperature: request.temperature ?? 0,
    stream: false,
    ...(maxTokens ? { max_tokens: maxTokens } : {}),
  };
}

export async function callOpenAiCompat(
  config: OpenAiCompatConfig,
  request: ExtractionRequest,
  signal?: AbortSignal,
): Promise<ProviderResponse> {
  const fetchImpl = config.fetchImpl ?? fetch;
  const res = await fetchImpl(config.endpoint, {
    method: "POST",
    headers: {
      "content-type": "application/json",
      authorization: `Bearer ${config.apiKey}`,
    },
    body: JSON.stringify(buildBody(config.endpoint, config.model, request, config.maxOutputTokens)),
    signal,
  });

  const contentType = res.headers.get("content-type") ?? "";
  const response: unknown = contentType.includes("application/json") ? await res.json() : await res.text();

  if (!res.ok) {
    const detail = extractErrorDetail(response);
    const snippet = responseSnippet(response);
    const suffix = detail ? `: ${truncateString(detail, 300)}` : snippet ? `: ${snippet}` : "";
    const err: ProviderHttpError = new Error(`LLM provider error (${res.status})${suffix}`);
    err.statusCode = res.status;
    err.statusText = res.statusText;
    err.endpoint = config.endpoint;
    err.model = config.model;
    err.responseSnippet = snippet;
    err.requestId = res.headers.get("x-request-id") ?? res.headers.get("cf-ray");
    throw err;
  }

  return {
    outputText: (extractAssistantContent(response) ?? "").trim(),
    usage: extractRawUsage(response),
    rawResponse: response,
    endpoint: config.endpoint,
  };
}

export function createOpenAiCompatProvider(config: OpenAiCompatConfig): ExtractionProvider {
  return {
    name: "openai_compat",
    model: config.model,
    complete: (request, signal) => callOpenAiCompat(config, request, signal),
  };
}
