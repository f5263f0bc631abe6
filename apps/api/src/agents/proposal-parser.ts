/**
 * PROPOSAL PARSER - Model text → one Proposal per strategy
 *
 * Expected layout (see prompts/negotiation-prompts.ts):
 *
 *   === POLITE ===
 *   PRICE: $450
 *   TERMS: none
 *   MESSAGE:
 *   Thank you for ...
 *
 * Markers are matched case-insensitively and may carry markdown decoration
 * ("## === Term Swap ===", "**==TERM-SWAP==**"). A section runs until the
 * next marker of any kind; when a marker repeats, its first section wins.
 *
 * Never throws: every strategy comes back as a tagged outcome.
 */

import type { Proposal, StrategyTag } from "@counteroffer/shared";
import { extractFirstPrice } from "./utils/currency";

export type ParseFailureReason = "missing_section" | "missing_price" | "empty_message";

export type SectionParse =
  | { kind: "parsed"; proposal: Proposal }
  | {
      kind: "failed";
      strategy: StrategyTag;
      reason: ParseFailureReason;
      /** Section text without its marker; null when the marker was absent */
      rawSection: string | null;
    };

export type ProposalParseResult = Record<StrategyTag, SectionParse>;

const MARKER_PATTERN = /^[ \t#*]*={2,}[ \t]*(POLITE|FIRM|TERM[ _-]?SWAP)[ \t]*={2,}[ \t#*]*$/gim;

const PRICE_LINE = /^[ \t*_]*PRICE[ \t*_]*:(.*)$/i;
const TERMS_LINE = /^[ \t*_]*TERMS?[ \t*_]*:(.*)$/i;
const MESSAGE_LINE = /^[ \t*_]*MESSAGE[ \t*_]*:(.*)$/i;
const CODE_FENCE = /^[ \t]*```.*$/gm;
const BARE_NUMBER = /^\s*(\d{1,3}(?:,\d{3})+(?:\.\d+)?|\d+(?:\.\d+)?)\b/;

const NO_TERMS = new Set(["none", "n/a", "na", "-", "nothing"]);

function toStrategy(label: string): StrategyTag {
  const normalized = label.toUpperCase().replace(/[ _-]/g, "");
  if (normalized === "POLITE") return "polite";
  if (normalized === "FIRM") return "firm";
  return "term_swap";
}

function normalize(raw: string): string {
  return raw.replace(/\r\n?/g, "\n").replace(CODE_FENCE, "");
}

/** Splits normalized text into the first section found for each strategy */
export function splitSections(text: string): Partial<Record<StrategyTag, string>> {
  const markers = [...text.matchAll(MARKER_PATTERN)].map((match) => ({
    strategy: toStrategy(match[1]),
    start: match.index ?? 0,
    end: (match.index ?? 0) + match[0].length,
  }));

  const sections: Partial<Record<StrategyTag, string>> = {};
  markers.forEach((marker, i) => {
    if (sections[marker.strategy] !== undefined) return;
    const next = markers[i + 1];
    sections[marker.strategy] = text.slice(marker.end, next ? next.start : text.length).trim();
  });
  return sections;
}

function priceFromLine(value: string): number | null {
  const price = extractFirstPrice(value);
  if (price !== null) return price;
  const bare = BARE_NUMBER.exec(value);
  return bare ? Number(bare[1].replace(/,/g, "")) : null;
}

function parseTerms(value: string): string[] {
  return value
    .split(";")
    .map((term) => term.trim().replace(/\.$/, "").trim())
    .filter((term) => term.length > 0 && !NO_TERMS.has(term.toLowerCase()));
}

function parseSection(strategy: StrategyTag, section: string): SectionParse {
  let linePrice: number | null = null;
  let terms: string[] | null = null;
  let inMessage = false;
  const messageLines: string[] = [];

  // Labels are only read above MESSAGE:; the body below it is kept verbatim
  for (const line of section.split("\n")) {
    if (inMessage) {
      messageLines.push(line);
      continue;
    }
    const price = PRICE_LINE.exec(line);
    if (price) {
      if (linePrice === null) linePrice = priceFromLine(price[1]);
      continue;
    }
    const termsLine = TERMS_LINE.exec(line);
    if (termsLine) {
      if (terms === null) terms = parseTerms(termsLine[1]);
      continue;
    }
    const messageLabel = MESSAGE_LINE.exec(line);
    if (messageLabel) {
      inMessage = true;
      messageLines.push(messageLabel[1]);
      continue;
    }
    messageLines.push(line);
  }

  const price = linePrice ?? extractFirstPrice(section);
  if (price === null) {
    return { kind: "failed", strategy, reason: "missing_price", rawSection: section };
  }

  const message = messageLines.join("\n").trim();
  if (message.length === 0) {
    return { kind: "failed", strategy, reason: "empty_message", rawSection: section };
  }

  return {
    kind: "parsed",
    proposal: { strategy, price, message, terms: terms ?? [], degraded: false },
  };
}

export function parseProposalSections(raw: string): ProposalParseResult {
  const sections = splitSections(normalize(raw));

  const parseOne = (strategy: StrategyTag): SectionParse => {
    const section = sections[strategy];
    if (section === undefined) {
      return { kind: "failed", strategy, reason: "missing_section", rawSection: null };
    }
    return parseSection(strategy, section);
  };

  return {
    polite: parseOne("polite"),
    firm: parseOne("firm"),
    term_swap: parseOne("term_swap"),
  };
}
