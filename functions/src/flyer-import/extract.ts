import type { PatternLibrary, PriceUnit } from "./pattern-library";

export interface SpanMatch<T> {
  context: string;
  value: T;
  start: number;
  end: number;
}

/** Price in euros. */
export type PriceMatch = SpanMatch<number>;
/** Integer percent, 0-100. */
export type DiscountMatch = SpanMatch<number>;

const isHighSurrogate = (code: number) => code >= 0xd800 && code <= 0xdbff;
const isLowSurrogate = (code: number) => code >= 0xdc00 && code <= 0xdfff;

/** ±radius code units around the match, widened so no surrogate pair is cut in half. */
const contextAround = (text: string, start: number, end: number, radius: number): string => {
  let from = Math.max(0, start - radius);
  let to = Math.min(text.length, end + radius);
  if (from > 0 && isLowSurrogate(text.charCodeAt(from))) from--;
  if (to < text.length && isHighSurrogate(text.charCodeAt(to - 1))) to++;
  return text.slice(from, to).trim();
};

const parsePrice = (match: RegExpMatchArray, unit: PriceUnit): number | null => {
  const [, whole, fraction] = match;
  if (whole === undefined) return null;

  let price: number;
  if (unit === "cent") {
    price = Number(whole) / 100;
  } else {
    if (fraction === undefined) return null;
    price = Number(`${whole}.${fraction}`);
  }

  return Number.isFinite(price) && price >= 0 ? price : null;
};

const parseDiscount = (match: RegExpMatchArray): number | null => {
  const [, percent] = match;
  if (percent === undefined) return null;
  const discount = Number(percent);
  return Number.isInteger(discount) && discount >= 0 && discount <= 100 ? discount : null;
};

/**
 * Every price occurrence in the text, in pattern order and then left to right.
 * Patterns run independently, so one span can be reported by several patterns.
 */
export const extractPrices = (text: string, library: PatternLibrary): PriceMatch[] => {
  const prices: PriceMatch[] = [];

  for (const pattern of library.pricePatterns) {
    for (const match of text.matchAll(pattern.regex)) {
      const price = parsePrice(match, pattern.unit);
      if (price === null || match.index === undefined) continue;

      const start = match.index;
      const end = start + match[0].length;
      prices.push({
        context: contextAround(text, start, end, library.contextRadius),
        value: price,
        start,
        end,
      });
    }
  }

  return prices;
};

export const extractDiscounts = (text: string, library: PatternLibrary): DiscountMatch[] => {
  const discounts: DiscountMatch[] = [];

  for (const pattern of library.discountPatterns) {
    for (const match of text.matchAll(pattern.regex)) {
      const discount = parseDiscount(match);
      if (discount === null || match.index === undefined) continue;

      const start = match.index;
      const end = start + match[0].length;
      discounts.push({
        context: contextAround(text, start, end, library.contextRadius),
        value: discount,
        start,
        end,
      });
    }
  }

  return discounts;
};
