import type { ProductRecord } from "../types";
import { round2 } from "../util/money";
import { splitWords } from "../util/tokens";
import type { PatternLibrary } from "./pattern-library";

export interface RecordInput {
  context: string;
  price: number;
  discountPct: number;
  category: string;
  retailer: string;
  sourceFile: string;
}

export const deriveProductName = (context: string, library: PatternLibrary): string => {
  const words = splitWords(context).slice(0, library.nameTokenCount);
  return words.length > 0 ? words.join(" ") : library.unknownProductName;
};

/**
 * The printed price is the final price. A 100% discount leaves no way to
 * recover the shelf price, so base_price stays equal to final_price.
 */
export const derivePrices = (
  price: number,
  discountPct: number,
): { base_price: number; final_price: number } => {
  const finalPrice = round2(price);
  if (discountPct > 0 && discountPct < 100) {
    return { base_price: round2(price / (1 - discountPct / 100)), final_price: finalPrice };
  }
  return { base_price: finalPrice, final_price: finalPrice };
};

export const buildRecord = (
  input: RecordInput,
  library: PatternLibrary,
  now: Date = new Date(),
): Readonly<ProductRecord> =>
  Object.freeze({
    retailer: input.retailer,
    product_name: deriveProductName(input.context, library),
    category: input.category,
    ...derivePrices(input.price, input.discountPct),
    discount_pct: input.discountPct,
    is_promo: input.discountPct > 0,
    source_file: input.sourceFile,
    parsed_date: new Date(now.getTime()),
  });

export const recordKey = (record: Pick<ProductRecord, "product_name" | "final_price">) =>
  `${record.product_name}\u0000${record.final_price.toFixed(2)}`;

/** Keeps the first record per (product_name, final_price) within one flyer's batch. */
export const dedupeRecords = <T extends ProductRecord>(records: readonly T[]): T[] => {
  const seen = new Set<string>();
  return records.filter((record) => {
    const key = recordKey(record);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
};
