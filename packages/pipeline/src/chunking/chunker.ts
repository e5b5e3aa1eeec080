/**
 * Chunker - splits normalized document text into bounded, ordered fragments
 *
 * Each chunk ends at the strongest boundary found near the budget limit:
 * paragraph break, then sentence end, then any whitespace. Without one, the
 * chunk is cut hard at the limit. Chunks cover the input without gaps; with
 * overlap configured, the tail of chunk i is repeated at the head of chunk i+1.
 */

import { type ChunkingOptions, ChunkingError } from "@chunkwise/shared";

// ============================================================================
// Types
// ============================================================================

export interface TextChunk {
  index: number;
  text: string;
  /** Offset of the first character in the source text. */
  start: number;
  /** Offset one past the last character in the source text. */
  end: number;
}

interface ResolvedChunking {
  maxChars: number;
  overlapChars: number;
  boundaryTolerance: number;
}

// ============================================================================
// Constants
// ============================================================================

/** Rough characters-per-token ratio used to turn a token budget into characters. */
export const CHARS_PER_TOKEN = 4;

const DEFAULT_MAX_TOKENS = 2000;
const DEFAULT_BOUNDARY_TOLERANCE = 0.2;

/** Boundary patterns, strongest first. */
const BOUNDARIES: RegExp[] = [/\n[ \t]*\n\s*/g, /[.!?][)"'\]]*\s+/g, /\s+/g];

// ============================================================================
// Helpers
// ============================================================================

function resolveOptions(options: ChunkingOptions): ResolvedChunking {
  const maxChars = options.maxChars ?? (options.maxTokens ?? DEFAULT_MAX_TOKENS) * CHARS_PER_TOKEN;
  const overlapChars = options.overlapChars ?? 0;
  const boundaryTolerance = options.boundaryTolerance ?? DEFAULT_BOUNDARY_TOLERANCE;

  if (!Number.isInteger(maxChars) || maxChars < 1) {
    throw new ChunkingError(`Chunk budget must be a positive integer, got ${maxChars}`);
  }
  if (!Number.isInteger(overlapChars) || overlapChars < 0 || overlapChars >= maxChars) {
    throw new ChunkingError(`Chunk overlap must be between 0 and ${maxChars - 1}, got ${overlapChars}`);
  }
  if (!(boundaryTolerance >= 0 && boundaryTolerance <= 1)) {
    throw new ChunkingError(`Boundary tolerance must be within [0, 1], got ${boundaryTolerance}`);
  }
  return { maxChars, overlapChars, boundaryTolerance };
}

/**
 * End offset of the last boundary match inside text[from, to), or null.
 */
function findBoundary(text: string, from: number, to: number): number | null {
  const window = text.slice(from, to);
  for (const pattern of BOUNDARIES) {
    let end: number | null = null;
    for (const match of window.matchAll(pattern)) {
      end = from + (match.index ?? 0) + match[0].length;
    }
    if (end !== null) return end;
  }
  return null;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}

// ============================================================================
// Main Function
// ============================================================================

export function chunkText(text: string, options: ChunkingOptions = {}): TextChunk[] {
  if (text.trim().length === 0) {
    throw new ChunkingError("Cannot chunk empty content");
  }
  const { maxChars, overlapChars, boundaryTolerance } = resolveOptions(options);
  const searchSpan = Math.floor(maxChars * boundaryTolerance);

  const chunks: TextChunk[] = [];
  let start = 0;
  for (;;) {
    const limit = Math.min(start + maxChars, text.length);
    let end = limit;
    if (limit < text.length && searchSpan > 0) {
      const from = Math.max(start + 1, limit - searchSpan);
      end = findBoundary(text, from, limit) ?? limit;
    }
    // Keep surrogate pairs whole unless the pair alone exceeds the budget.
    if (end < text.length && end - 1 > start && isHighSurrogate(text.charCodeAt(end - 1))) {
      end -= 1;
    }

    chunks.push({ index: chunks.length, text: text.slice(start, end), start, end });
    if (end >= text.length) return chunks;

    // Overlap never moves the cursor backwards past the current chunk start.
    let next = end - overlapChars;
    if (next < end && isLowSurrogate(text.charCodeAt(next))) next += 1;
    start = next > start ? next : end;
  }
}
