import { buildNegotiationContext, type NegotiationContextInput } from "@counteroffer/shared";
import type {
  EngineInfo,
  GenerateOptions,
  SelfTestResult,
  TextGenerator,
} from "../../src/lib/engines/types";

export interface RecordedCall {
  systemPrompt: string;
  userPrompt: string;
  options: GenerateOptions | undefined;
}

/** TextGenerator that replays scripted outputs; an Error in the script is thrown instead */
export class ScriptedGenerator implements TextGenerator {
  readonly engine = "local" as const;
  readonly calls: RecordedCall[] = [];

  constructor(private readonly script: Array<string | Error>) {}

  async generate(systemPrompt: string, userPrompt: string, options?: GenerateOptions): Promise<string> {
    this.calls.push({ systemPrompt, userPrompt, options });
    const next = this.script.shift();
    if (next === undefined) throw new Error("ScriptedGenerator ran out of outputs");
    if (next instanceof Error) throw next;
    return next;
  }

  async selfTest(): Promise<SelfTestResult> {
    return { success: true, message: "scripted", engine: this.engine, model: "scripted-model" };
  }

  describe(): EngineInfo {
    return { engine: this.engine, model: "scripted-model", url: "http://localhost:11434" };
  }
}

export function testContext(overrides: Partial<NegotiationContextInput> = {}) {
  return buildNegotiationContext({
    vendorMessage: "Your renewal is coming up at $500/month.",
    currentPrice: 500,
    targetPrice: 400,
    pricePeriod: "monthly",
    serviceType: "SaaS Subscription",
    relationship: "1-3 Years",
    ...overrides,
  });
}

export function proposalOutput(prices: { polite: number; firm: number; termSwap: number }): string {
  return `=== POLITE ===
PRICE: $${prices.polite}
TERMS: none
MESSAGE:
Thank you for the renewal notice. Could we settle at $${prices.polite}/month?
=== FIRM ===
PRICE: $${prices.firm}
TERMS: none
MESSAGE:
We have budget approval for $${prices.firm}/month.
=== TERM_SWAP ===
PRICE: $${prices.termSwap}
TERMS: 24-month commitment
MESSAGE:
We can commit for two years at $${prices.termSwap}/month.`;
}
