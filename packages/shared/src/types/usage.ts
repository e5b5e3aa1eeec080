/**
 * How much of a usage record the provider actually reported.
 * - available: prompt and completion counters were both present
 * - partial: some counters were present, missing ones count as zero
 * - unavailable: the provider reported nothing; counters are zero placeholders
 */
export type UsageAvailability = "available" | "partial" | "unavailable";

export type TokenDetails = Record<string, number>;

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
  promptTokensDetails?: TokenDetails;
  completionTokensDetails?: TokenDetails;
  availability: UsageAvailability;
}

/**
 * Counters as read off a provider response, before normalization.
 * Every field is optional because providers may omit any of them.
 */
export interface RawUsage {
  promptTokens?: number;
  completionTokens?: number;
  totalTokens?: number;
  promptTokensDetails?: TokenDetails;
  completionTokensDetails?: TokenDetails;
}

export const UNAVAILABLE_USAGE: Readonly<TokenUsage> = Object.freeze({
  promptTokens: 0,
  completionTokens: 0,
  totalTokens: 0,
  availability: "unavailable",
});
