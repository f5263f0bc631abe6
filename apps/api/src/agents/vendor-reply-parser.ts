/**
 * VENDOR REPLY PARSER - simulated vendor text → VendorSimulation
 *
 * The outcome comes from the OUTCOME: line when there is one, otherwise from
 * the whole text. Vocabulary is checked counter first, then rejection, then
 * acceptance: "we can't accept $400, but we could do $450" is a counter-offer
 * and "we cannot accept" alone is a rejection.
 * Unrecognized text is a degraded "countered" with the raw reply kept.
 */

import type { VendorOutcome, VendorSimulation } from "@counteroffer/shared";
import { extractFirstPrice, extractPrices } from "./utils/currency";

const COUNTER_PHRASE =
  /\b(?:counter(?:s|ed|ing|-?offer)?|instead|revised|meet (?:you )?(?:in the )?middle|(?:can|could) (?:offer|do)|propose)\b/i;

const OUTCOME_VOCABULARY: Array<[VendorOutcome, RegExp]> = [
  ["countered", COUNTER_PHRASE],
  [
    "rejected",
    /\b(?:reject(?:s|ed|ing)?|declin(?:e|es|ed|ing)|refus(?:e|es|ed|ing)|no deal|(?:cannot|can't|can not|unable to|not able to) (?:accept|agree|lower|reduce|go lower|offer any))\b/i,
  ],
  [
    "accepted",
    /\b(?:accept(?:s|ed|ing)?|agree(?:s|d)?|approved?|deal|works for us|happy to proceed)\b/i,
  ],
];

const OUTCOME_LINE = /^[ \t*_]*OUTCOME[ \t*_]*:(.*)$/im;
const PRICE_LINE = /^[ \t*_]*(?:COUNTER[ _-]?)?PRICE[ \t*_]*:(.*)$/im;
const REPLY_LABEL = /^[ \t*_]*REPLY[ \t*_]*:/im;
const BARE_NUMBER = /^\s*(\d{1,3}(?:,\d{3})+(?:\.\d+)?|\d+(?:\.\d+)?)\b/;

export function classifyOutcome(text: string): VendorOutcome | null {
  for (const [outcome, pattern] of OUTCOME_VOCABULARY) {
    if (pattern.test(text)) return outcome;
  }
  return null;
}

function replyBody(text: string): string {
  const label = REPLY_LABEL.exec(text);
  if (label) {
    const body = text.slice(label.index + label[0].length).trim();
    if (body.length > 0) return body;
  }

  const withoutLabels = text
    .split("\n")
    .filter((line) => !OUTCOME_LINE.test(line) && !PRICE_LINE.test(line))
    .join("\n")
    .trim();
  return withoutLabels.length > 0 ? withoutLabels : text.trim();
}

/**
 * PRICE line first, then the first amount after a counter phrase, then the
 * last amount in the reply (earlier amounts tend to quote the customer back).
 */
function counterPriceFrom(text: string, reply: string): number | null {
  const priceLine = PRICE_LINE.exec(text);
  if (priceLine) {
    const value = priceLine[1];
    const price = extractFirstPrice(value);
    if (price !== null) return price;
    const bare = BARE_NUMBER.exec(value);
    if (bare) return Number(bare[1].replace(/,/g, ""));
  }

  const phrase = COUNTER_PHRASE.exec(reply);
  if (phrase) {
    const offered = extractFirstPrice(reply.slice(phrase.index + phrase[0].length));
    if (offered !== null) return offered;
  }

  const prices = extractPrices(reply);
  return prices.length > 0 ? prices[prices.length - 1] : null;
}

export function parseVendorReply(raw: string): VendorSimulation {
  const text = raw.replace(/\r\n?/g, "\n");

  const outcomeLine = OUTCOME_LINE.exec(text);
  const outcome =
    (outcomeLine ? classifyOutcome(outcomeLine[1]) : null) ?? classifyOutcome(text);

  if (outcome === null) {
    return { outcome: "countered", counterPrice: null, reply: raw.trim(), degraded: true };
  }

  const reply = replyBody(text);
  return {
    outcome,
    counterPrice: outcome === "countered" ? counterPriceFrom(text, reply) : null,
    reply,
    degraded: false,
  };
}
