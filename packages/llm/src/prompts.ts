import type { ExtractionRequest } from "./types";

export interface PromptChunk {
  index: number;
  text: string;
}

export interface ExtractionPromptParams {
  instruction: string;
  schema?: Record<string, unknown>;
  chunk: PromptChunk;
  totalChunks: number;
  maxOutputTokens?: number;
}

function buildSystemPrompt(schema: Record<string, unknown> | undefined): string {
  if (schema) {
    return (
      "You extract structured data from one fragment of a larger document.\n" +
      "Return ONLY JSON (no markdown, no commentary) conforming to this JSON Schema:\n" +
      `${JSON.stringify(schema, null, 2)}\n` +
      "When the fragment holds several matching records, return a JSON array of them. " +
      "When it holds none, return []."
    );
  }
  return (
    "You extract information from one fragment of a larger document.\n" +
    'Return a JSON array of objects shaped {"tag": string, "content": string}, one per ' +
    "distinct piece of relevant information. Return [] when nothing is relevant."
  );
}

export function buildExtractionRequest(params: ExtractionPromptParams): ExtractionRequest {
  const { chunk, totalChunks } = params;
  const user =
    `Instruction:\n${params.instruction.trim()}\n\n` +
    `Fragment ${chunk.index + 1} of ${totalChunks}:\n<fragment>\n${chunk.text}\n</fragment>`;
  return {
    system: buildSystemPrompt(params.schema),
    user,
    maxOutputTokens: params.maxOutputTokens,
    temperature: 0,
  };
}
