/**
 * NEGOTIATION AGENT - counter-offer drafting and vendor role-play
 *
 * generateProposals():   one model call → three strategies (polite, firm, term_swap)
 *                        ↳ any section unreadable → one stricter regeneration
 *                        ↳ still unreadable → degraded fallback proposal
 * simulateVendorResponse(): one model call → ACCEPTED / COUNTERED / REJECTED
 * recommendStrategy():   polite-vs-firm debate → JSON recommendation
 *
 * Stateless: the caller passes the chosen proposal back in explicitly.
 * Engine errors (EngineUnavailable, EngineResponseError) propagate unchanged;
 * unreadable model text never throws.
 */

import { STRATEGIES, strategyRecommendationSchema } from "@counteroffer/shared";
import type {
  NegotiationContext,
  Proposal,
  ProposalSet,
  StrategyRecommendation,
  StrategyTag,
  VendorSimulation,
} from "@counteroffer/shared";
import { NEGOTIATION_RULES } from "../config/negotiation-rules";
import type { TextGenerator } from "../lib/engines/types";
import {
  DEBATE_SYSTEM_PROMPT,
  FALLBACK_RECOMMENDATION,
  STRICT_FORMAT_SUFFIX,
  SYSTEM_PROMPT,
  VENDOR_SYSTEM_PROMPT,
  buildDebatePrompt,
  buildProposalPrompt,
  buildVendorSimulationPrompt,
  fallbackMessage,
} from "../prompts/negotiation-prompts";
import { parseProposalSections, type ProposalParseResult } from "./proposal-parser";
import { parseVendorReply } from "./vendor-reply-parser";

function failedStrategies(result: ProposalParseResult): StrategyTag[] {
  return STRATEGIES.filter((strategy) => result[strategy].kind === "failed");
}

function describeFailures(result: ProposalParseResult): string {
  return STRATEGIES.map((strategy) => {
    const outcome = result[strategy];
    return outcome.kind === "failed" ? `${strategy} (${outcome.reason})` : null;
  })
    .filter((entry): entry is string => entry !== null)
    .join(", ");
}

/** First `{` to last `}`; models like to wrap JSON in prose or fences. */
function extractJsonObject(text: string): string | null {
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  return start >= 0 && end > start ? text.slice(start, end + 1) : null;
}

export class NegotiationAgent {
  constructor(private readonly generator: TextGenerator) {}

  // ─── Proposals ────────────────────────────────────────────────────────────

  async generateProposals(context: NegotiationContext): Promise<ProposalSet> {
    const startTime = Date.now();
    const prompt = buildProposalPrompt(context);

    const firstRaw = await this.generator.generate(SYSTEM_PROMPT, prompt, {
      temperature: NEGOTIATION_RULES.temperature.proposals,
      maxTokens: NEGOTIATION_RULES.maxTokens.proposals,
    });
    const first = parseProposalSections(firstRaw);

    if (failedStrategies(first).length === 0) {
      console.log(
        `negotiation-agent: Proposals for ${context.serviceType} parsed in ${Date.now() - startTime}ms`,
      );
      return {
        proposals: this.resolve(context, [first]),
        rawOutput: firstRaw,
        regenerated: false,
        degraded: false,
      };
    }

    console.warn(
      `negotiation-agent: Could not parse ${describeFailures(first)}; regenerating with strict format`,
    );
    console.debug(`negotiation-agent: Unparsed model output:\n${firstRaw}`);

    const secondRaw = await this.generator.generate(SYSTEM_PROMPT, prompt + STRICT_FORMAT_SUFFIX, {
      temperature: NEGOTIATION_RULES.temperature.strictRegeneration,
      maxTokens: NEGOTIATION_RULES.maxTokens.proposals,
    });
    const second = parseProposalSections(secondRaw);

    const proposals = this.resolve(context, [first, second]);
    const degraded = proposals.filter((p) => p.degraded).map((p) => p.strategy);
    if (degraded.length > 0) {
      console.warn(
        `negotiation-agent: Falling back for ${describeFailures(second)} after regeneration`,
      );
      console.debug(`negotiation-agent: Unparsed model output:\n${secondRaw}`);
    }

    console.log(
      `negotiation-agent: Proposals for ${context.serviceType} ready in ${Date.now() - startTime}ms (regenerated, ${degraded.length} degraded)`,
    );
    return {
      proposals,
      rawOutput: secondRaw,
      regenerated: true,
      degraded: degraded.length > 0,
    };
  }

  /** Per strategy the earliest successful parse wins; otherwise a degraded fallback. */
  private resolve(
    context: NegotiationContext,
    attempts: ProposalParseResult[],
  ): [Proposal, Proposal, Proposal] {
    const pick = (strategy: StrategyTag): Proposal => {
      let rawSection: string | null = null;
      for (const attempt of attempts) {
        const outcome = attempt[strategy];
        if (outcome.kind === "parsed") return outcome.proposal;
        if (outcome.rawSection) rawSection = outcome.rawSection;
      }
      return {
        strategy,
        price: context.targetPrice,
        message: rawSection ?? fallbackMessage(strategy, context),
        terms: [],
        degraded: true,
      };
    };

    return [pick("polite"), pick("firm"), pick("term_swap")];
  }

  // ─── Vendor Simulation ────────────────────────────────────────────────────

  async simulateVendorResponse(
    context: NegotiationContext,
    proposal: Proposal,
  ): Promise<VendorSimulation> {
    const startTime = Date.now();
    const raw = await this.generator.generate(
      VENDOR_SYSTEM_PROMPT,
      buildVendorSimulationPrompt(context, proposal),
      {
        temperature: NEGOTIATION_RULES.temperature.vendorSimulation,
        maxTokens: NEGOTIATION_RULES.maxTokens.vendorSimulation,
      },
    );

    const simulation = parseVendorReply(raw);
    if (simulation.degraded) {
      console.warn("negotiation-agent: Vendor reply had no recognizable outcome, treating as countered");
      console.debug(`negotiation-agent: Unparsed vendor reply:\n${raw}`);
    }
    console.log(
      `negotiation-agent: Vendor ${simulation.outcome} the ${proposal.strategy} proposal in ${Date.now() - startTime}ms`,
    );
    return simulation;
  }

  // ─── Strategy Debate ──────────────────────────────────────────────────────

  async recommendStrategy(context: NegotiationContext): Promise<StrategyRecommendation> {
    const raw = await this.generator.generate(DEBATE_SYSTEM_PROMPT, buildDebatePrompt(context), {
      temperature: NEGOTIATION_RULES.temperature.strategyDebate,
      maxTokens: NEGOTIATION_RULES.maxTokens.strategyDebate,
    });

    const json = extractJsonObject(raw);
    let data: unknown = null;
    if (json !== null) {
      try {
        data = JSON.parse(json);
      } catch (error) {
        console.warn(
          `negotiation-agent: Debate output is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
        );
      }
    }

    const parsed = strategyRecommendationSchema.safeParse(data);
    if (!parsed.success) {
      console.warn("negotiation-agent: Using fallback recommendation, debate output unreadable");
      console.debug(`negotiation-agent: Unparsed debate output:\n${raw}`);
      return { ...FALLBACK_RECOMMENDATION, degraded: true };
    }

    console.log(`negotiation-agent: Debate recommends ${parsed.data.recommendation}`);
    return {
      politeArgument: parsed.data.polite_argument,
      firmArgument: parsed.data.firm_argument,
      recommendation: parsed.data.recommendation,
      reasoning: parsed.data.reasoning,
      degraded: false,
    };
  }
}
