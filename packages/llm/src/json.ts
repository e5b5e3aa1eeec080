export type JsonContainer = Record<string, unknown> | unknown[];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function parseContainer(candidate: string): JsonContainer | null {
  try {
    const parsed: unknown = JSON.parse(candidate);
    if (Array.isArray(parsed)) return parsed;
    if (isRecord(parsed)) return parsed;
  } catch {
    // not JSON; caller tries the next candidate
  }
  return null;
}

function outermost(text: string, open: string, close: string): string | null {
  const first = text.indexOf(open);
  const last = text.lastIndexOf(close);
  return first >= 0 && last > first ? text.slice(first, last + 1) : null;
}

/**
 * Extract a JSON object or array from model output that may wrap it in code
 * fences or surround it with prose. Returns null when nothing parses.
 */
export function extractJsonValue(text: string): JsonContainer | null {
  const trimmed = text.trim();

  if (trimmed.startsWith("{") || trimmed.startsWith("[")) {
    const direct = parseContainer(trimmed);
    if (direct) return direct;
  }

  // Last fenced block wins: models tend to restate the answer at the end.
  const fenced = [...trimmed.matchAll(/```(?:json)?\s*([\s\S]*?)```/g)]
    .map((match) => (match[1] ?? "").trim())
    .filter((content) => content.startsWith("{") || content.startsWith("["));
  const lastFenced = fenced.at(-1);
  if (lastFenced) {
    const parsed = parseContainer(lastFenced);
    if (parsed) return parsed;
  }

  const firstBrace = trimmed.indexOf("{");
  const firstBracket = trimmed.indexOf("[");
  const arrayFirst = firstBracket >= 0 && (firstBrace < 0 || firstBracket < firstBrace);
  const candidates = arrayFirst
    ? [outermost(trimmed, "[", "]"), outermost(trimmed, "{", "}")]
    : [outermost(trimmed, "{", "}"), outermost(trimmed, "[", "]")];
  for (const candidate of candidates) {
    if (!candidate) continue;
    const parsed = parseContainer(candidate);
    if (parsed) return parsed;
  }

  return null;
}
