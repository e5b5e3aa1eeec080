import type { RawUsage, TokenDetails, TokenUsage } from "@chunkwise/shared";
import { UNAVAILABLE_USAGE } from "@chunkwise/shared";

function isCount(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value) && value >= 0;
}

function cleanDetails(details: TokenDetails | undefined): TokenDetails | undefined {
  if (!details) return undefined;
  const entries = Object.entries(details).filter(([, value]) => isCount(value));
  if (entries.length === 0) return undefined;
  return Object.fromEntries(entries.sort(([a], [b]) => a.localeCompare(b)));
}

/**
 * Turn whatever counters a provider reported into a TokenUsage record.
 *
 * Missing usage never becomes a silent zero-cost record: it is marked
 * unavailable, and a record missing some counters is marked partial.
 */
export function normalizeUsage(raw: RawUsage | null | undefined): TokenUsage {
  if (!raw) return { ...UNAVAILABLE_USAGE };

  const hasPrompt = isCount(raw.promptTokens);
  const hasCompletion = isCount(raw.completionTokens);
  const hasTotal = isCount(raw.totalTokens);
  if (!hasPrompt && !hasCompletion && !hasTotal) return { ...UNAVAILABLE_USAGE };

  const promptTokens = hasPrompt ? raw.promptTokens ?? 0 : 0;
  const completionTokens = hasCompletion ? raw.completionTokens ?? 0 : 0;
  const totalTokens = hasPrompt || hasCompletion ? promptTokens + completionTokens : raw.totalTokens ?? 0;

  const usage: TokenUsage = {
    promptTokens,
    completionTokens,
    totalTokens,
    availability: hasPrompt && hasCompletion ? "available" : "partial",
  };
  const promptDetails = cleanDetails(raw.promptTokensDetails);
  const completionDetails = cleanDetails(raw.completionTokensDetails);
  if (promptDetails) usage.promptTokensDetails = promptDetails;
  if (completionDetails) usage.completionTokensDetails = completionDetails;
  return usage;
}
