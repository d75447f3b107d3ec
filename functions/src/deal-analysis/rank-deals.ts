import { NoDataError } from "../errors";
import type { ProductRecord, RankedDeal } from "../types";
import { round2 } from "../util/money";

export interface BestDealsOptions {
  category?: string;
  topN?: number;
}

export const DEFAULT_TOP_N = 10;

/** discount_pct weighted 0.7, relative savings in percent weighted 0.3. */
export const dealScore = (record: ProductRecord): number => {
  const savings = record.base_price - record.final_price;
  const relativeSavings = record.base_price > 0 ? (savings / record.base_price) * 100 : 0;
  return record.discount_pct * 0.7 + relativeSavings * 0.3;
};

export const findBestDeals = (
  records: readonly ProductRecord[],
  { category, topN = DEFAULT_TOP_N }: BestDealsOptions = {},
): RankedDeal[] => {
  if (records.length === 0) {
    throw new NoDataError();
  }

  return records
    .filter((record) => record.is_promo && (!category || record.category === category))
    .map((record) => ({
      ...record,
      savings: round2(record.base_price - record.final_price),
      deal_score: dealScore(record),
    }))
    .sort((a, b) => b.deal_score - a.deal_score)
    .slice(0, Math.max(0, topN));
};
