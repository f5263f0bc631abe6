// ─── Savings Aggregation ────────────────────────────────────────────────────
//
// Read-time analytics over stored negotiations. Nothing here is persisted:
// the summary is recomputed from the full record set on every call.

import { roundCurrency } from "./records";
import { STRATEGIES } from "./schemas";
import type { SavingsBreakdown, SavingsSummary, StrategyTag } from "./types";

/** The subset of a stored negotiation the summary needs. */
export interface SavingsEntry {
  strategy: StrategyTag;
  serviceType: string;
  /** Kept as free text: stored rows may carry periods the inputs never produce */
  pricePeriod: string;
  savings: number;
  success: boolean;
}

const PERIODS_PER_YEAR: Record<string, number> = {
  monthly: 12,
  annual: 1,
};

export function isKnownPricePeriod(period: string): boolean {
  return period in PERIODS_PER_YEAR;
}

/**
 * Normalize a per-period saving to a yearly figure.
 * Unknown periods are treated as already annual.
 */
export function annualizeSavings(savings: number, period: string): number {
  const multiplier = PERIODS_PER_YEAR[period] ?? 1;
  return savings * multiplier;
}

interface Accumulator {
  count: number;
  successes: number;
  total: number;
}

function emptyAccumulator(): Accumulator {
  return { count: 0, successes: 0, total: 0 };
}

function add(acc: Accumulator, annual: number, success: boolean): void {
  acc.count++;
  acc.total += annual;
  if (success) acc.successes++;
}

function toBreakdown(acc: Accumulator): SavingsBreakdown {
  return {
    count: acc.count,
    totalAnnualSavings: roundCurrency(acc.total),
    averageAnnualSavings: acc.count === 0 ? 0 : roundCurrency(acc.total / acc.count),
    successRate: acc.count === 0 ? 0 : acc.successes / acc.count,
  };
}

export function summarizeSavings(entries: readonly SavingsEntry[]): SavingsSummary {
  const overall = emptyAccumulator();
  const byStrategy = new Map<StrategyTag, Accumulator>(
    STRATEGIES.map((strategy) => [strategy, emptyAccumulator()]),
  );
  const byServiceType = new Map<string, Accumulator>();

  for (const entry of entries) {
    const annual = annualizeSavings(entry.savings, entry.pricePeriod);
    add(overall, annual, entry.success);

    const strategyAcc = byStrategy.get(entry.strategy) ?? emptyAccumulator();
    add(strategyAcc, annual, entry.success);
    byStrategy.set(entry.strategy, strategyAcc);

    const serviceAcc = byServiceType.get(entry.serviceType) ?? emptyAccumulator();
    add(serviceAcc, annual, entry.success);
    byServiceType.set(entry.serviceType, serviceAcc);
  }

  const totals = toBreakdown(overall);

  return {
    totalAnnualSavings: totals.totalAnnualSavings,
    averageAnnualSavings: totals.averageAnnualSavings,
    negotiationCount: overall.count,
    successCount: overall.successes,
    successRate: totals.successRate,
    byStrategy: {
      polite: toBreakdown(byStrategy.get("polite") ?? emptyAccumulator()),
      firm: toBreakdown(byStrategy.get("firm") ?? emptyAccumulator()),
      term_swap: toBreakdown(byStrategy.get("term_swap") ?? emptyAccumulator()),
    },
    byServiceType: Object.fromEntries(
      [...byServiceType.entries()].map(([serviceType, acc]) => [serviceType, toBreakdown(acc)]),
    ),
  };
}
