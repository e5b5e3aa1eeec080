import { type DocumentResultView, documentResultView, extractDocument, parseDocumentInput, resolveExtractionOptions } from "@chunkwise/pipeline";
import { ChunkingError, createLogger, type DocumentInput, ValidationError } from "@chunkwise/shared";
import type { FastifyInstance } from "fastify";

import { requireJsonObject } from "../lib/body";
import type { RouteOptions } from "../lib/context";

const MAX_DOCUMENTS = 100;

const log = createLogger({ component: "extract" });

interface ExtractRequestBody {
  documents: unknown;
  instruction: unknown;
  schema?: unknown;
  options?: unknown;
}

interface ExtractResponse {
  success: boolean;
  results: DocumentResultView[];
  server_processing_time_s: number;
  server_memory_delta_mb: number;
}

function parseDocuments(value: unknown): DocumentInput[] {
  if (!Array.isArray(value) || value.length === 0) {
    throw new ValidationError("documents must be a non-empty array");
  }
  if (value.length > MAX_DOCUMENTS) {
    throw new ValidationError(`documents must contain at most ${MAX_DOCUMENTS} entries`);
  }
  return value.map((doc: unknown, i) => parseDocumentInput(doc, `documents[${i}]`));
}

function chunkingFailure(url: string, err: ChunkingError): DocumentResultView {
  return {
    url,
    success: false,
    overall_status: "failed",
    extracted_content: [],
    error: err.message,
    chunks: [],
  };
}

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

export async function extractRoutes(fastify: FastifyInstance, opts: RouteOptions): Promise<void> {
  const { ctx } = opts;

  // POST /extract - Run an extraction and wait for every document
  fastify.post<{ Body: ExtractRequestBody }>("/extract", async (request) => {
    const fields = requireJsonObject(request.body);
    const documents = parseDocuments(fields.documents);
    const options = resolveExtractionOptions(
      { instruction: fields.instruction, schema: fields.schema, options: fields.options },
      ctx.extractionDefaults,
    );

    const startedAt = process.hrtime.bigint();
    const heapBefore = process.memoryUsage().heapUsed;

    // Documents run one after another; chunks inside a document run concurrently.
    const results: DocumentResultView[] = [];
    for (const document of documents) {
      try {
        const extraction = await extractDocument({ document, options, provider: ctx.provider, log });
        results.push(documentResultView(document.url, extraction.result));
      } catch (err) {
        if (!(err instanceof ChunkingError)) throw err;
        log.warn({ url: document.url, err: err.message }, "Document could not be chunked");
        results.push(chunkingFailure(document.url, err));
      }
    }

    const response: ExtractResponse = {
      success: results.every((r) => r.success),
      results,
      server_processing_time_s: round(Number(process.hrtime.bigint() - startedAt) / 1e9, 3),
      server_memory_delta_mb: round((process.memoryUsage().heapUsed - heapBefore) / (1024 * 1024), 2),
    };
    return response;
  });
}
