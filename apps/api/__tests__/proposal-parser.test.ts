import { describe, expect, it } from "vitest";
import { parseProposalSections } from "../src/agents/proposal-parser";

const WELL_FORMED = `=== POLITE ===
PRICE: $450
TERMS: none
MESSAGE:
Thank you for the renewal notice. Could we settle at $450/month?
=== FIRM ===
PRICE: $400
TERMS: none
MESSAGE:
We have budget approval for $400/month.
=== TERM_SWAP ===
PRICE: $420
TERMS: 24-month commitment; annual upfront payment
MESSAGE:
We can commit for two years at $420/month.`;

describe("parseProposalSections", () => {
  it("parses all three sections of the requested layout", () => {
    const result = parseProposalSections(WELL_FORMED);

    expect(result.polite).toEqual({
      kind: "parsed",
      proposal: {
        strategy: "polite",
        price: 450,
        message: "Thank you for the renewal notice. Could we settle at $450/month?",
        terms: [],
        degraded: false,
      },
    });
    expect(result.firm).toEqual({
      kind: "parsed",
      proposal: {
        strategy: "firm",
        price: 400,
        message: "We have budget approval for $400/month.",
        terms: [],
        degraded: false,
      },
    });
    expect(result.term_swap).toEqual({
      kind: "parsed",
      proposal: {
        strategy: "term_swap",
        price: 420,
        message: "We can commit for two years at $420/month.",
        terms: ["24-month commitment", "annual upfront payment"],
        degraded: false,
      },
    });
  });

  it("tolerates markdown decoration, code fences and label casing", () => {
    const raw = [
      "```text",
      "## == Polite ==",
      "Price: $1,100",
      "Message: Happy to renew at $1,100/month.",
      "**=== FIRM ===**",
      "PRICE: 950",
      "TERMS: n/a",
      "MESSAGE:",
      "Our budget is $950/month.",
      "### === term-swap ===",
      "PRICE: $1,000/month",
      "TERMS: case study; referral.",
      "MESSAGE: Would $1,000/month work if we publish a case study?",
      "```",
    ].join("\n");

    const result = parseProposalSections(raw);

    expect(result.polite).toMatchObject({
      kind: "parsed",
      proposal: { price: 1100, message: "Happy to renew at $1,100/month.", terms: [] },
    });
    expect(result.firm).toMatchObject({
      kind: "parsed",
      proposal: { price: 950, message: "Our budget is $950/month.", terms: [] },
    });
    expect(result.term_swap).toMatchObject({
      kind: "parsed",
      proposal: {
        price: 1000,
        message: "Would $1,000/month work if we publish a case study?",
        terms: ["case study", "referral"],
      },
    });
  });

  it("keeps label-like lines inside the message body", () => {
    const raw = [
      "=== TERM_SWAP ===",
      "PRICE: $420",
      "TERMS: 24-month commitment; case study",
      "MESSAGE:",
      "Hi Dana,",
      "Here is what we propose:",
      "Term: 24 months",
      "Price: $420/month",
      "Thanks, Sam",
    ].join("\n");

    const result = parseProposalSections(raw);

    expect(result.term_swap).toEqual({
      kind: "parsed",
      proposal: {
        strategy: "term_swap",
        price: 420,
        message: "Hi Dana,\nHere is what we propose:\nTerm: 24 months\nPrice: $420/month\nThanks, Sam",
        terms: ["24-month commitment", "case study"],
        degraded: false,
      },
    });
  });

  it("keeps the first TERMS line above the message", () => {
    const result = parseProposalSections(
      "=== TERM_SWAP ===\nPRICE: $420\nTERMS: case study\nTERMS: referral\nMESSAGE: Deal at $420?",
    );

    expect(result.term_swap).toMatchObject({
      kind: "parsed",
      proposal: { terms: ["case study"], message: "Deal at $420?" },
    });
  });

  it("accepts Windows line endings", () => {
    const result = parseProposalSections(WELL_FORMED.replace(/\n/g, "\r\n"));

    expect(result.term_swap).toMatchObject({ kind: "parsed", proposal: { price: 420 } });
  });

  it("falls back to the first amount in the section when there is no PRICE line", () => {
    const result = parseProposalSections("=== FIRM ===\nWe can only pay $380/month going forward.");

    expect(result.firm).toMatchObject({
      kind: "parsed",
      proposal: { price: 380, message: "We can only pay $380/month going forward." },
    });
  });

  it("reports a missing section", () => {
    const result = parseProposalSections(WELL_FORMED.replace("=== FIRM ===", "FIRM"));

    expect(result.firm).toEqual({
      kind: "failed",
      strategy: "firm",
      reason: "missing_section",
      rawSection: null,
    });
  });

  it("reports a section without any price", () => {
    const result = parseProposalSections("=== FIRM ===\nTERMS: none\nMESSAGE:\nWe need a better rate.");

    expect(result.firm).toEqual({
      kind: "failed",
      strategy: "firm",
      reason: "missing_price",
      rawSection: "TERMS: none\nMESSAGE:\nWe need a better rate.",
    });
  });

  it("reports a section with a price but no message", () => {
    const result = parseProposalSections("=== POLITE ===\nPRICE: $450\nTERMS: none\nMESSAGE:");

    expect(result.polite).toMatchObject({ kind: "failed", reason: "empty_message" });
  });

  it("keeps the first occurrence of a repeated marker", () => {
    const result = parseProposalSections(
      "=== POLITE ===\nPRICE: $450\nMESSAGE: first\n=== POLITE ===\nPRICE: $300\nMESSAGE: second",
    );

    expect(result.polite).toMatchObject({ kind: "parsed", proposal: { price: 450, message: "first" } });
  });

  it("never throws on text without any markers", () => {
    const result = parseProposalSections("I'm sorry, I can't help with that.");

    expect(result.polite.kind).toBe("failed");
    expect(result.firm.kind).toBe("failed");
    expect(result.term_swap.kind).toBe("failed");
  });
});
