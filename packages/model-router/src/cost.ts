import type { ProviderDescriptor, TokenUsage } from "./types.js";

/** Alert when one generation costs more than this, in USD */
export const DEFAULT_COST_ALERT_THRESHOLD_USD = 0.15;

/**
 * Estimated spend for one generation from the descriptor's per-million prices.
 */
export function computeCostUsd(descriptor: ProviderDescriptor, usage: TokenUsage): number {
  const input = (usage.inputTokens / 1_000_000) * descriptor.costPerMillionInputTokens;
  const output = (usage.outputTokens / 1_000_000) * descriptor.costPerMillionOutputTokens;
  return input + output;
}
