import type { ProductRecord } from "../types";
import { type AssociationOptions, associateDiscount } from "./associate";
import { categorize } from "./categorize";
import { extractDiscounts, extractPrices } from "./extract";
import type { PatternLibrary } from "./pattern-library";
import { buildRecord, dedupeRecords } from "./record-builder";

export interface ParseFlyerOptions {
  association?: Omit<AssociationOptions, "tokenCount">;
  now?: Date;
}

export interface ParsedFlyer {
  records: ProductRecord[];
  priceCount: number;
  discountCount: number;
}

/**
 * Runs one flyer's text through extraction, association, categorization and
 * record building. Deduplication is scoped to this flyer only.
 */
export const parseFlyerText = (
  text: string,
  retailer: string,
  sourceFile: string,
  library: PatternLibrary,
  options: ParseFlyerOptions = {},
): ParsedFlyer => {
  if (!text.trim()) {
    return { records: [], priceCount: 0, discountCount: 0 };
  }

  const now = options.now ?? new Date();
  const prices = extractPrices(text, library);
  const discounts = extractDiscounts(text, library);
  const associationOptions: AssociationOptions = {
    tokenCount: library.associationTokenCount,
    maxDistance: library.contextRadius * 2,
    ...options.association,
  };

  const records = prices.map((price) =>
    buildRecord(
      {
        context: price.context,
        price: price.value,
        discountPct: associateDiscount(price, discounts, associationOptions),
        category: categorize(price.context, library) ?? library.fallbackCategory,
        retailer,
        sourceFile,
      },
      library,
      now,
    ),
  );

  return {
    records: dedupeRecords(records),
    priceCount: prices.length,
    discountCount: discounts.length,
  };
};
