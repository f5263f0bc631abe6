/**
 * Prompt templates for the negotiation agent.
 *
 * The proposal and vendor prompts ask for a plain labelled layout instead of
 * JSON; the parsers in ../agents read it back.
 */

import { STRATEGIES } from "@counteroffer/shared";
import type { NegotiationContext, Proposal, StrategyTag } from "@counteroffer/shared";
import { NEGOTIATION_RULES } from "../config/negotiation-rules";
import { formatPrice, truncate } from "../agents/utils/formatting";

export const SECTION_LABELS: Record<StrategyTag, string> = {
  polite: "POLITE",
  firm: "FIRM",
  term_swap: "TERM_SWAP",
};

export function sectionMarker(strategy: StrategyTag): string {
  return `=== ${SECTION_LABELS[strategy]} ===`;
}

export const SYSTEM_PROMPT = `You are an expert negotiation consultant with 20+ years of experience in B2B vendor negotiations.

Your expertise includes:
- SaaS and technology service negotiations
- Understanding vendor psychology and business pressures
- Crafting persuasive yet respectful communication
- Balancing relationship preservation with cost savings
- Recognizing negotiation leverage and timing

Follow the requested output layout exactly. Do not add commentary before or after it.`;

const STRATEGY_DEFINITIONS: Record<StrategyTag, string> = {
  polite:
    "Collaborative and warm. Thank the vendor, mention the value of the partnership, and ask whether there is flexibility toward the target price.",
  firm:
    "Direct and confident. State the budget that has been approved, reference market rates and alternatives, and ask the vendor to match the target price.",
  term_swap:
    "Trade non-price value for a better rate: a longer commitment, upfront payment, a case study or referral. Name the terms you offer in exchange.",
};

function formatContext(context: NegotiationContext): string {
  return `<vendor_message>${context.vendorMessage}</vendor_message>
<current_price>${formatPrice(context.currentPrice, context.pricePeriod)}</current_price>
<target_price>${formatPrice(context.targetPrice, context.pricePeriod)}</target_price>
<service_type>${context.serviceType}</service_type>
<relationship_length>${context.relationship}</relationship_length>`;
}

function layoutTemplate(): string {
  return STRATEGIES.map(
    (strategy) => `${sectionMarker(strategy)}
PRICE: $<amount you propose>
TERMS: <term>; <term> (or "none")
MESSAGE:
<the email text>`,
  ).join("\n");
}

export function buildProposalPrompt(context: NegotiationContext): string {
  const strategies = STRATEGIES.map(
    (strategy) => `  <strategy name="${SECTION_LABELS[strategy]}">${STRATEGY_DEFINITIONS[strategy]}</strategy>`,
  ).join("\n");

  return `Analyze this negotiation scenario and draft one counter-offer for each strategy.

<context>
${formatContext(context)}
</context>

<strategies>
${strategies}
</strategies>

<instructions>
Write three sections, one per strategy, in this exact order and layout:

${layoutTemplate()}

Rules:
- Every PRICE line holds one dollar amount, quoted per ${context.pricePeriod === "annual" ? "year" : "month"}.
- Keep each MESSAGE under ${NEGOTIATION_RULES.proposals.maxMessageWords} words. No invented facts.
- Only TERM_SWAP is expected to list terms; use "TERMS: none" when there are none.
</instructions>`;
}

export const STRICT_FORMAT_SUFFIX = `

IMPORTANT: Your previous answer could not be read. Output ONLY the three sections.
Each section starts with its marker line (${STRATEGIES.map(sectionMarker).join(", ")}),
followed by a PRICE: line with a dollar amount, a TERMS: line, and MESSAGE: with the text.
No other text.`;

// ─── Vendor Simulation ──────────────────────────────────────────────────────

export const VENDOR_SYSTEM_PROMPT =
  "You are simulating a vendor's response to a negotiation. Be realistic and consider business factors.";

export function buildVendorSimulationPrompt(
  context: NegotiationContext,
  proposal: Proposal,
): string {
  const terms = proposal.terms.length > 0 ? proposal.terms.join("; ") : "none";

  return `You are the vendor replying to a customer's counter-offer.

<context>
${formatContext(context)}
<customer_proposal price="${formatPrice(proposal.price, context.pricePeriod)}" terms="${terms}">
${proposal.message}
</customer_proposal>
</context>

<instructions>
As a vendor, consider:
- Your margins and flexibility
- The customer's value and the importance of retention
- Competitive pressure and market rates
- The length of the relationship and customer loyalty

Vendors typically concede 15-35% of the gap on the first reply; avoid going below the customer's price unless justified.

Answer in exactly this layout:
OUTCOME: ACCEPTED | COUNTERED | REJECTED
PRICE: $<the price you offer, or "none">
REPLY:
<your email reply>
</instructions>`;
}

// ─── Strategy Debate ────────────────────────────────────────────────────────

export const DEBATE_SYSTEM_PROMPT =
  "You are a negotiation strategy orchestrator conducting an expert debate.";

export function buildDebatePrompt(context: NegotiationContext): string {
  return `You are orchestrating a debate between two negotiation experts.

POLITE AGENT POSITION:
- Relationship-building leads to long-term success
- Collaborative language builds trust and goodwill
- Aggressive tactics can backfire and damage relationships

FIRM AGENT POSITION:
- Clear boundaries establish respect and credibility
- Market leverage should be used when available
- Vendors respect customers who know their value

CONTEXT:
- Service: ${context.serviceType}
- Current Price: ${formatPrice(context.currentPrice, context.pricePeriod)}
- Target Price: ${formatPrice(context.targetPrice, context.pricePeriod)}
- Relationship: ${context.relationship}
- Vendor Message: ${truncate(context.vendorMessage, 200)}

Have each agent make their case, then recommend the optimal strategy for this situation.

Return ONLY JSON:
{
  "polite_argument": "Key points for the collaborative approach",
  "firm_argument": "Key points for the direct approach",
  "recommendation": "polite | firm | hybrid",
  "reasoning": "Why this approach is best here"
}`;
}

// ─── Fallbacks ──────────────────────────────────────────────────────────────

interface FallbackTemplate {
  opening: string;
  transition: string;
  ask: string;
  closing: string;
}

export const FALLBACK_TEMPLATES: Record<StrategyTag, FallbackTemplate> = {
  polite: {
    opening: "Thank you for the renewal information. We've really valued our partnership",
    transition: "Given our current budget planning and the competitive landscape",
    ask: "I was wondering if there might be some flexibility in the pricing",
    closing: "I'd love to discuss options that work for both of us",
  },
  firm: {
    opening: "I've received your renewal quote",
    transition: "Based on our research of current market rates and competitive offerings",
    ask: "we have budget approval for this service",
    closing: "Please let me know if you can match this rate",
  },
  term_swap: {
    opening: "Thanks for the renewal information",
    transition: "Instead of the standard terms, would you consider a longer commitment or a case study",
    ask: "in exchange for a better rate",
    closing: "What creative options might work for both of us?",
  },
};

/** Message used when the model never produced a section for `strategy` */
export function fallbackMessage(strategy: StrategyTag, context: NegotiationContext): string {
  const t = FALLBACK_TEMPLATES[strategy];
  const closing = /[.?!]$/.test(t.closing) ? t.closing : `${t.closing}.`;
  return `${t.opening}. ${t.transition}, ${t.ask} around ${formatPrice(context.targetPrice, context.pricePeriod)}. ${closing}`;
}

export const FALLBACK_RECOMMENDATION = {
  politeArgument: "Building relationships leads to long-term success and repeat business.",
  firmArgument: "Clear boundaries establish respect and better outcomes in negotiations.",
  recommendation: "polite",
  reasoning: "Defaulting to the collaborative approach because the debate could not be read.",
} as const;
