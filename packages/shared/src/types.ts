import type { z } from "zod";
import type {
  negotiationContextSchema,
  pricePeriodSchema,
  proposalSchema,
  saveNegotiationRequestSchema,
  strategyTagSchema,
  vendorOutcomeSchema,
  vendorSimulationSchema,
} from "./schemas";

// ─── Negotiation Inputs ─────────────────────────────────────────────────────

export type StrategyTag = z.infer<typeof strategyTagSchema>;

export type PricePeriod = z.infer<typeof pricePeriodSchema>;

export type NegotiationContext = Readonly<z.infer<typeof negotiationContextSchema>>;

/** What callers send before defaults (e.g. pricePeriod) are applied. */
export type NegotiationContextInput = z.input<typeof negotiationContextSchema>;

// ─── Model Outputs ──────────────────────────────────────────────────────────

export type Proposal = z.infer<typeof proposalSchema>;

export interface ProposalSet {
  /** Always polite, firm, term_swap, in that order */
  proposals: [Proposal, Proposal, Proposal];
  /** Model text of the last attempt */
  rawOutput: string;
  /** A second, stricter generation was requested */
  regenerated: boolean;
  /** At least one proposal was synthesized from a fallback */
  degraded: boolean;
}

export type VendorOutcome = z.infer<typeof vendorOutcomeSchema>;

export type VendorSimulation = z.infer<typeof vendorSimulationSchema>;

export type DebateRecommendation = "polite" | "firm" | "hybrid";

export interface StrategyRecommendation {
  politeArgument: string;
  firmArgument: string;
  recommendation: DebateRecommendation;
  reasoning: string;
  degraded: boolean;
}

// ─── Persistence ────────────────────────────────────────────────────────────

export type SaveNegotiationRequest = z.input<typeof saveNegotiationRequestSchema>;

export interface NewNegotiationRecord {
  context: NegotiationContext;
  proposal: Proposal;
  simulation: VendorSimulation | null;
  finalPrice: number;
  /** currentPrice − finalPrice, in the context's price period */
  savings: number;
  success: boolean;
  createdAt: Date;
}

export interface NegotiationRecord extends NewNegotiationRecord {
  id: number;
  /** savings normalized to a yearly figure; derived on read, never stored */
  annualSavings: number;
}

export type NegotiationEventType = "saved" | "simulated" | "degraded";

export type FunnelAnalysis = Record<NegotiationEventType, number>;

// ─── Analytics ──────────────────────────────────────────────────────────────

export interface SavingsBreakdown {
  count: number;
  totalAnnualSavings: number;
  averageAnnualSavings: number;
  successRate: number;
}

export interface SavingsSummary {
  totalAnnualSavings: number;
  averageAnnualSavings: number;
  negotiationCount: number;
  successCount: number;
  /** Fraction in [0, 1]; 0 when there are no negotiations */
  successRate: number;
  byStrategy: Record<StrategyTag, SavingsBreakdown>;
  byServiceType: Record<string, SavingsBreakdown>;
}
