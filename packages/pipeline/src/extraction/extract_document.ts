import { callExtraction, type ExtractionProvider } from "@chunkwise/llm";
import type { DocumentInput, ExtractionOptions, Logger } from "@chunkwise/shared";

import { chunkText, type TextChunk } from "../chunking/chunker";
import type { SleepFn } from "../lib/sleep";
import { type AttemptEvent, type OrchestrationOutcome, runChunkedExtraction } from "./orchestrator";

export interface ExtractDocumentParams {
  document: DocumentInput;
  options: ExtractionOptions;
  provider: ExtractionProvider;
  signal?: AbortSignal;
  log?: Logger;
  sleep?: SleepFn;
  maxOutputTokens?: number;
  onAttempt?: (event: AttemptEvent) => void;
}

export interface DocumentExtraction extends OrchestrationOutcome {
  url: string;
  chunks: TextChunk[];
}

/**
 * Chunk one document and run every chunk through the provider.
 * Throws ChunkingError for empty content or bad chunking options.
 */
export async function extractDocument(params: ExtractDocumentParams): Promise<DocumentExtraction> {
  const { document, options, provider } = params;
  const chunks = chunkText(document.content, options.chunking);
  params.log?.info(
    { url: document.url, chunks: chunks.length, provider: provider.name, model: provider.model },
    "Extracting document",
  );

  const outcome = await runChunkedExtraction({
    chunks,
    concurrency: options.concurrency,
    retry: options.retry,
    signal: params.signal,
    sleep: params.sleep,
    log: params.log,
    onAttempt: params.onAttempt,
    call: (chunk) =>
      callExtraction({
        provider,
        chunk,
        totalChunks: chunks.length,
        instruction: options.instruction,
        schema: options.schema,
        timeoutMs: options.timeoutMs,
        maxOutputTokens: params.maxOutputTokens,
      }),
  });

  return { ...outcome, url: document.url, chunks };
}
