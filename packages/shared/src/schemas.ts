/**
 * Zod schemas for the negotiation data model.
 * Single source of truth: the TypeScript types in ./types are inferred from these.
 */

import { z } from "zod";

export const STRATEGIES = ["polite", "firm", "term_swap"] as const;

export const strategyTagSchema = z.enum(STRATEGIES);

export const pricePeriodSchema = z.enum(["monthly", "annual"]);

export const vendorOutcomeSchema = z.enum(["accepted", "countered", "rejected"]);

const priceSchema = z.number().finite().nonnegative();

export const negotiationContextSchema = z.object({
  vendorMessage: z.string().trim().min(1, "vendorMessage is required"),
  currentPrice: priceSchema.describe("What the vendor charges today (or quotes for renewal)"),
  // Not required to be below currentPrice: a negotiation may chase a non-price term
  targetPrice: priceSchema.describe("The price the user hopes to land"),
  pricePeriod: pricePeriodSchema.default("monthly"),
  serviceType: z.string().trim().min(1, "serviceType is required"),
  relationship: z.string().trim().min(1, "relationship is required").describe("e.g. '1-3 Years'"),
});

export const proposalSchema = z.object({
  strategy: strategyTagSchema,
  price: priceSchema,
  message: z.string().trim().min(1, "message is required"),
  terms: z.array(z.string()).default([]),
  degraded: z.boolean().default(false),
});

export const vendorSimulationSchema = z.object({
  outcome: vendorOutcomeSchema,
  counterPrice: priceSchema.nullable(),
  reply: z.string(),
  degraded: z.boolean().default(false),
});

export const saveNegotiationRequestSchema = z.object({
  context: negotiationContextSchema,
  proposal: proposalSchema,
  simulation: vendorSimulationSchema.nullable().optional(),
  finalPrice: priceSchema,
  success: z.boolean().optional(),
});

export const simulateRequestSchema = z.object({
  context: negotiationContextSchema,
  proposal: proposalSchema,
});

export const strategyRecommendationSchema = z.object({
  polite_argument: z.string().min(1),
  firm_argument: z.string().min(1),
  recommendation: z.enum(["polite", "firm", "hybrid"]),
  reasoning: z.string().min(1),
});
