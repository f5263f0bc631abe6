/**
 * Currency amounts in free model text.
 *
 * Recognized: "$450", "$1,200.50", "US$ 99", "USD 450", "450 USD",
 * "450 dollars", "$12k". Bare numbers are ignored so that term lengths
 * ("24 months") and percentages never read as prices.
 */

const NUM = String.raw`\d{1,3}(?:,\d{3})+(?:\.\d+)?|\d+(?:\.\d+)?`;

const PRICE_PATTERN = new RegExp(
  [
    String.raw`(?:US)?\$\s*(${NUM})(\s*k\b)?`,
    String.raw`\bUSD\s*(${NUM})(\s*k\b)?`,
    String.raw`(${NUM})(\s*k)?\s*(?:USD\b|dollars?\b)`,
  ].join("|"),
  "gi",
);

function toAmount(digits: string, thousands: string | undefined): number {
  const value = Number(digits.replace(/,/g, ""));
  return thousands ? value * 1000 : value;
}

/** Every amount in order of appearance */
export function extractPrices(text: string): number[] {
  const prices: number[] = [];
  for (const match of text.matchAll(PRICE_PATTERN)) {
    const [, a, ak, b, bk, c, ck] = match;
    const digits = a ?? b ?? c;
    if (digits === undefined) continue;
    const amount = toAmount(digits, a !== undefined ? ak : b !== undefined ? bk : ck);
    if (Number.isFinite(amount)) prices.push(amount);
  }
  return prices;
}

export function extractFirstPrice(text: string): number | null {
  return extractPrices(text)[0] ?? null;
}
