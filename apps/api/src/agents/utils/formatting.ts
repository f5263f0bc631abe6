/**
 * Shared formatting utilities for agent prompts and fallback messages
 */

import type { PricePeriod } from "@counteroffer/shared";

const PERIOD_SUFFIX: Record<PricePeriod, string> = {
  monthly: "month",
  annual: "year",
};

/**
 * Format a price the way the prompts quote it
 * - 500, "monthly" → "$500/month"
 * - 6000, "annual" → "$6,000/year"
 */
export function formatPrice(amount: number, period: PricePeriod): string {
  const value = amount.toLocaleString("en-US", { maximumFractionDigits: 2 });
  return `$${value}/${PERIOD_SUFFIX[period]}`;
}

/** Truncate for prompt context, keeping whole words where possible */
export function truncate(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text;
  const cut = text.slice(0, maxChars);
  const lastSpace = cut.lastIndexOf(" ");
  return `${(lastSpace > maxChars / 2 ? cut.slice(0, lastSpace) : cut).trimEnd()}...`;
}
