import type { TokenDetails, TokenUsage, UsageAvailability } from "@chunkwise/shared";

export interface UsageAccumulation {
  /** Field-wise sum over the records that carry usage. */
  usage: TokenUsage;
  /** The input records, in chunk order, untouched. */
  chunks: ReadonlyArray<TokenUsage | null>;
}

function addDetails(target: Map<string, number>, details: TokenDetails | undefined): void {
  if (!details) return;
  for (const [key, value] of Object.entries(details)) {
    target.set(key, (target.get(key) ?? 0) + value);
  }
}

function sortedDetails(details: Map<string, number>): TokenDetails | undefined {
  if (details.size === 0) return undefined;
  return Object.fromEntries([...details.entries()].sort(([a], [b]) => a.localeCompare(b)));
}

/**
 * Merge per-chunk usage into one record.
 *
 * Pure: the sum does not depend on record order and detail keys come out
 * sorted, so equal inputs serialize identically.
 */
export function accumulateUsage(records: ReadonlyArray<TokenUsage | null>): UsageAccumulation {
  let promptTokens = 0;
  let completionTokens = 0;
  let totalTokens = 0;
  let contributing = 0;
  let complete = 0;
  const promptDetails = new Map<string, number>();
  const completionDetails = new Map<string, number>();

  for (const record of records) {
    if (!record || record.availability === "unavailable") continue;
    contributing += 1;
    if (record.availability === "available") complete += 1;
    promptTokens += record.promptTokens;
    completionTokens += record.completionTokens;
    totalTokens += record.totalTokens;
    addDetails(promptDetails, record.promptTokensDetails);
    addDetails(completionDetails, record.completionTokensDetails);
  }

  let availability: UsageAvailability;
  if (contributing === 0) availability = "unavailable";
  else if (complete === records.length) availability = "available";
  else availability = "partial";

  const usage: TokenUsage = { promptTokens, completionTokens, totalTokens, availability };
  const prompt = sortedDetails(promptDetails);
  const completion = sortedDetails(completionDetails);
  if (prompt) usage.promptTokensDetails = prompt;
  if (completion) usage.completionTokensDetails = completion;

  return { usage, chunks: records };
}
