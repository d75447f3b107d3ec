import { type KeywordMatching, splitWords, tokenize } from "../util/tokens";
import type { DiscountMatch, PriceMatch } from "./extract";

export type AssociationStrategy = "token-overlap" | "nearest-offset";

export interface AssociationOptions {
  strategy?: AssociationStrategy;
  keywordMatching?: KeywordMatching;
  /** Leading words of a discount context compared against the price context. */
  tokenCount?: number;
  /** nearest-offset only: discounts further than this many characters are ignored. */
  maxDistance?: number;
}

const DEFAULT_TOKEN_COUNT = 5;
const DEFAULT_MAX_DISTANCE = 100;

const sharesLeadingToken = (
  priceContext: string,
  discountContext: string,
  tokenCount: number,
  keywordMatching: KeywordMatching,
): boolean => {
  const leadingWords = splitWords(discountContext.toLowerCase()).slice(0, tokenCount);

  if (keywordMatching === "substring") {
    const haystack = priceContext.toLowerCase();
    return leadingWords.some((word) => haystack.includes(word));
  }

  const priceTokens = new Set(tokenize(priceContext));
  return leadingWords.flatMap(tokenize).some((token) => priceTokens.has(token));
};

export const spanDistance = (a: { start: number; end: number }, b: { start: number; end: number }) => {
  if (b.start >= a.end) return b.start - a.end;
  if (a.start >= b.end) return a.start - b.end;
  return 0;
};

/**
 * Picks the discount percent for one price occurrence, or 0 when nothing matches.
 *
 * "token-overlap" takes the first discount whose leading words show up in the
 * price context. It ignores offsets, so a similar context elsewhere in the
 * flyer can win. "nearest-offset" binds the closest discount span instead;
 * ties go to the earlier discount.
 */
export const associateDiscount = (
  price: PriceMatch,
  discounts: readonly DiscountMatch[],
  options: AssociationOptions = {},
): number => {
  const {
    strategy = "token-overlap",
    keywordMatching = "substring",
    tokenCount = DEFAULT_TOKEN_COUNT,
    maxDistance = DEFAULT_MAX_DISTANCE,
  } = options;

  if (strategy === "nearest-offset") {
    let best: DiscountMatch | undefined;
    let bestDistance = Infinity;
    for (const discount of discounts) {
      const distance = spanDistance(price, discount);
      if (distance < bestDistance && distance <= maxDistance) {
        best = discount;
        bestDistance = distance;
      }
    }
    return best?.value ?? 0;
  }

  const match = discounts.find((discount) =>
    sharesLeadingToken(price.context, discount.context, tokenCount, keywordMatching),
  );
  return match?.value ?? 0;
};
