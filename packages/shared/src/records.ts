import { negotiationContextSchema } from "./schemas";
import type {
  NegotiationContext,
  NegotiationContextInput,
  NewNegotiationRecord,
  Proposal,
  VendorSimulation,
} from "./types";

/**
 * Validate raw input into a frozen NegotiationContext.
 * Throws a ZodError when a field is missing or a price is negative / not finite.
 */
export function buildNegotiationContext(input: NegotiationContextInput): NegotiationContext {
  return Object.freeze(negotiationContextSchema.parse(input));
}

export interface CompletedNegotiation {
  context: NegotiationContext;
  proposal: Proposal;
  simulation?: VendorSimulation | null;
  finalPrice: number;
  /** Defaults to finalPrice < currentPrice */
  success?: boolean;
  createdAt?: Date;
}

export function buildNegotiationRecord(input: CompletedNegotiation): NewNegotiationRecord {
  const { context, proposal, finalPrice } = input;
  const savings = roundCurrency(context.currentPrice - finalPrice);

  return {
    context,
    proposal,
    simulation: input.simulation ?? null,
    finalPrice,
    savings,
    success: input.success ?? finalPrice < context.currentPrice,
    createdAt: input.createdAt ?? new Date(),
  };
}

export function roundCurrency(value: number): number {
  return Math.round(value * 100) / 100;
}
