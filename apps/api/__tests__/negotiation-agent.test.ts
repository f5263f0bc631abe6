import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { NegotiationAgent } from "../src/agents/negotiation-agent";
import { EngineUnavailable } from "../src/lib/engines/errors";
import { STRICT_FORMAT_SUFFIX, fallbackMessage } from "../src/prompts/negotiation-prompts";
import { ScriptedGenerator, proposalOutput, testContext } from "./helpers/scripted-generator";

const GOOD = proposalOutput({ polite: 450, firm: 400, termSwap: 420 });

describe("NegotiationAgent", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "debug").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("generateProposals", () => {
    it("returns one proposal per strategy from a single call", async () => {
      const generator = new ScriptedGenerator([GOOD]);
      const agent = new NegotiationAgent(generator);

      const result = await agent.generateProposals(testContext());

      expect(result.proposals.map((p) => [p.strategy, p.price])).toEqual([
        ["polite", 450],
        ["firm", 400],
        ["term_swap", 420],
      ]);
      expect(result.proposals[2].terms).toEqual(["24-month commitment"]);
      expect(result).toMatchObject({ rawOutput: GOOD, regenerated: false, degraded: false });
      expect(generator.calls).toHaveLength(1);
      expect(generator.calls[0].options).toEqual({ temperature: 0.65, maxTokens: 1200 });
      expect(generator.calls[0].userPrompt).toContain("<target_price>$400/month</target_price>");
    });

    it("regenerates once with a stricter prompt when a section is missing", async () => {
      const missingFirm = GOOD.replace("=== FIRM ===", "FIRM:");
      const second = proposalOutput({ polite: 440, firm: 390, termSwap: 410 });
      const generator = new ScriptedGenerator([missingFirm, second]);
      const agent = new NegotiationAgent(generator);

      const result = await agent.generateProposals(testContext());

      expect(generator.calls).toHaveLength(2);
      expect(generator.calls[1].userPrompt).toBe(generator.calls[0].userPrompt + STRICT_FORMAT_SUFFIX);
      expect(generator.calls[1].options).toEqual({ temperature: 0.6, maxTokens: 1200 });
      // first successful parse wins per strategy
      expect(result.proposals.map((p) => p.price)).toEqual([450, 390, 420]);
      expect(result).toMatchObject({ rawOutput: second, regenerated: true, degraded: false });
    });

    it("degrades a section that fails twice to the target price and its raw text", async () => {
      const corrupted = GOOD.replace(
        "PRICE: $400\nTERMS: none\nMESSAGE:\nWe have budget approval for $400/month.",
        "MESSAGE:\nWe need a lower rate.",
      );
      const corruptedAgain = GOOD.replace(
        "PRICE: $400\nTERMS: none\nMESSAGE:\nWe have budget approval for $400/month.",
        "TERMS: none\nMESSAGE:\nPlease match our budget.",
      );
      const generator = new ScriptedGenerator([corrupted, corruptedAgain]);
      const agent = new NegotiationAgent(generator);

      const result = await agent.generateProposals(testContext());

      expect(result.proposals[1]).toEqual({
        strategy: "firm",
        price: 400,
        message: "TERMS: none\nMESSAGE:\nPlease match our budget.",
        terms: [],
        degraded: true,
      });
      expect(result.proposals[0].degraded).toBe(false);
      expect(result.proposals[2].degraded).toBe(false);
      expect(result.degraded).toBe(true);
      expect(generator.calls).toHaveLength(2);
    });

    it("falls back to templates when the model never produces the layout", async () => {
      const generator = new ScriptedGenerator([
        "I'm sorry, I can't help with that.",
        "Still not the layout you asked for.",
      ]);
      const agent = new NegotiationAgent(generator);
      const context = testContext();

      const result = await agent.generateProposals(context);

      expect(result.proposals).toHaveLength(3);
      for (const proposal of result.proposals) {
        expect(proposal.price).toBe(400);
        expect(proposal.degraded).toBe(true);
        expect(proposal.message).toBe(fallbackMessage(proposal.strategy, context));
      }
      expect(result.proposals[0].message).toBe(
        "Thank you for the renewal information. We've really valued our partnership. " +
          "Given our current budget planning and the competitive landscape, I was wondering if there " +
          "might be some flexibility in the pricing around $400/month. " +
          "I'd love to discuss options that work for both of us.",
      );
      expect(result).toMatchObject({ regenerated: true, degraded: true });
    });

    it("lets engine failures propagate", async () => {
      const down = new EngineUnavailable("Cannot connect to Ollama", { engine: "local" });
      const agent = new NegotiationAgent(new ScriptedGenerator([down]));

      await expect(agent.generateProposals(testContext())).rejects.toBe(down);
    });
  });

  describe("simulateVendorResponse", () => {
    const proposal = {
      strategy: "polite" as const,
      price: 450,
      message: "Could we settle at $450/month?",
      terms: [],
      degraded: false,
    };

    it("reads the vendor's counter-offer", async () => {
      const generator = new ScriptedGenerator(["OUTCOME: COUNTERED\nPRICE: $430\nREPLY:\nWe could do $430/month."]);
      const agent = new NegotiationAgent(generator);

      const simulation = await agent.simulateVendorResponse(testContext(), proposal);

      expect(simulation).toEqual({
        outcome: "countered",
        counterPrice: 430,
        reply: "We could do $430/month.",
        degraded: false,
      });
      expect(generator.calls[0].userPrompt).toContain("Could we settle at $450/month?");
      expect(generator.calls[0].options).toEqual({ temperature: 0.5, maxTokens: 500 });
    });

    it("never throws on unexpected vendor text", async () => {
      const agent = new NegotiationAgent(new ScriptedGenerator(["Hmm, interesting."]));

      await expect(agent.simulateVendorResponse(testContext(), proposal)).resolves.toEqual({
        outcome: "countered",
        counterPrice: null,
        reply: "Hmm, interesting.",
        degraded: true,
      });
    });
  });

  describe("recommendStrategy", () => {
    it("reads the debate verdict from fenced JSON", async () => {
      const raw =
        '```json\n{"polite_argument":"Long relationship","firm_argument":"Clear market rates",' +
        '"recommendation":"firm","reasoning":"The vendor raised prices sharply"}\n```';
      const agent = new NegotiationAgent(new ScriptedGenerator([raw]));

      await expect(agent.recommendStrategy(testContext())).resolves.toEqual({
        politeArgument: "Long relationship",
        firmArgument: "Clear market rates",
        recommendation: "firm",
        reasoning: "The vendor raised prices sharply",
        degraded: false,
      });
    });

    it("recommends the polite approach when the debate is unreadable", async () => {
      const agent = new NegotiationAgent(new ScriptedGenerator(['{"recommendation": "aggressive"']));

      const recommendation = await agent.recommendStrategy(testContext());

      expect(recommendation.recommendation).toBe("polite");
      expect(recommendation.degraded).toBe(true);
    });
  });
});
