import { describe, expect, it } from "vitest";
import { classifyOutcome, parseVendorReply } from "../src/agents/vendor-reply-parser";

describe("parseVendorReply", () => {
  it("reads a countered reply with its price", () => {
    const simulation = parseVendorReply(
      "OUTCOME: COUNTERED\nPRICE: $470\nREPLY:\nWe can meet you at $470/month if you sign for a year.",
    );

    expect(simulation).toEqual({
      outcome: "countered",
      counterPrice: 470,
      reply: "We can meet you at $470/month if you sign for a year.",
      degraded: false,
    });
  });

  it("only keeps a counter price for countered replies", () => {
    const simulation = parseVendorReply("OUTCOME: ACCEPTED\nPRICE: $450\nREPLY:\nDeal. We'll update the invoice.");

    expect(simulation).toEqual({
      outcome: "accepted",
      counterPrice: null,
      reply: "Deal. We'll update the invoice.",
      degraded: false,
    });
  });

  it("reads a rejection", () => {
    const simulation = parseVendorReply(
      "OUTCOME: REJECTED\nPRICE: none\nREPLY:\nUnfortunately we cannot accept this.",
    );

    expect(simulation.outcome).toBe("rejected");
    expect(simulation.counterPrice).toBeNull();
  });

  it("reads a bare number on a COUNTER PRICE line", () => {
    const simulation = parseVendorReply("OUTCOME: countered\nCOUNTER PRICE: 480\nREPLY: How about 480?");

    expect(simulation).toEqual({
      outcome: "countered",
      counterPrice: 480,
      reply: "How about 480?",
      degraded: false,
    });
  });

  it("scans the whole text when there is no OUTCOME line", () => {
    const simulation = parseVendorReply("We could offer $460/month instead.");

    expect(simulation).toEqual({
      outcome: "countered",
      counterPrice: 460,
      reply: "We could offer $460/month instead.",
      degraded: false,
    });
  });

  it("reads a refusal followed by a new price as a counter-offer", () => {
    const simulation = parseVendorReply("We can't accept $400/month, but we could do $450/month.");

    expect(simulation).toEqual({
      outcome: "countered",
      counterPrice: 450,
      reply: "We can't accept $400/month, but we could do $450/month.",
      degraded: false,
    });
  });

  it("takes the last amount when the PRICE line has none", () => {
    const simulation = parseVendorReply(
      "OUTCOME: COUNTERED\nPRICE: none\nREPLY:\nYour $400 offer is below our floor. The best we can manage is $440/month.",
    );

    expect(simulation.outcome).toBe("countered");
    expect(simulation.counterPrice).toBe(440);
  });

  it("scans the whole text when the OUTCOME value is unknown", () => {
    const simulation = parseVendorReply("OUTCOME: MAYBE\nREPLY:\nWe agree to $450/month.");

    expect(simulation.outcome).toBe("accepted");
    expect(simulation.reply).toBe("We agree to $450/month.");
  });

  it("treats unrecognized text as a degraded counter and keeps it verbatim", () => {
    const simulation = parseVendorReply("  Let me check with my manager and get back to you.  ");

    expect(simulation).toEqual({
      outcome: "countered",
      counterPrice: null,
      reply: "Let me check with my manager and get back to you.",
      degraded: true,
    });
  });

  it("does not throw on empty text", () => {
    expect(parseVendorReply("")).toEqual({
      outcome: "countered",
      counterPrice: null,
      reply: "",
      degraded: true,
    });
  });
});

describe("classifyOutcome", () => {
  it("prefers rejection over acceptance words", () => {
    expect(classifyOutcome("Unfortunately we cannot accept $400, this is our best price.")).toBe(
      "rejected",
    );
  });

  it("prefers counter over rejection words", () => {
    expect(classifyOutcome("We cannot accept that, but we can offer $470 instead.")).toBe("countered");
  });

  it("returns null when nothing matches", () => {
    expect(classifyOutcome("Thanks for your note.")).toBeNull();
  });
});
