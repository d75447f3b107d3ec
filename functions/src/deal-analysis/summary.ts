import type { ProductRecord, RetailerSummary, SummaryMetrics } from "../types";
import { round2 } from "../util/money";

const mean = (values: number[]) =>
  values.length === 0 ? 0 : values.reduce((sum, value) => sum + value, 0) / values.length;

/** Per-retailer counts and price stats, most promos first (ties stay alphabetical). */
export const summarizeByRetailer = (records: readonly ProductRecord[]): RetailerSummary[] => {
  const byRetailer = new Map<string, ProductRecord[]>();
  for (const record of records) {
    const group = byRetailer.get(record.retailer) ?? [];
    group.push(record);
    byRetailer.set(record.retailer, group);
  }

  return [...byRetailer.keys()]
    .sort()
    .map((retailer): RetailerSummary => {
      const group = byRetailer.get(retailer) ?? [];
      const prices = group.map((record) => record.final_price);
      return {
        retailer,
        total_products: group.length,
        avg_discount: round2(mean(group.map((record) => record.discount_pct))),
        avg_price: round2(mean(prices)),
        min_price: round2(Math.min(...prices)),
        max_price: round2(Math.max(...prices)),
        promo_count: group.filter((record) => record.is_promo).length,
      };
    })
    .sort((a, b) => b.promo_count - a.promo_count);
};

export type PriceComparisonRow = Pick<
  ProductRecord,
  "retailer" | "product_name" | "final_price" | "discount_pct" | "is_promo"
>;

/** Records whose name contains the term (case-insensitive), cheapest first. */
export const comparePrices = (
  records: readonly ProductRecord[],
  searchTerm: string,
): PriceComparisonRow[] => {
  const needle = searchTerm.toLowerCase();
  return records
    .filter((record) => record.product_name.toLowerCase().includes(needle))
    .map(({ retailer, product_name, final_price, discount_pct, is_promo }) => ({
      retailer,
      product_name,
      final_price,
      discount_pct,
      is_promo,
    }))
    .sort((a, b) => a.final_price - b.final_price);
};

export const summaryMetrics = (records: readonly ProductRecord[]): SummaryMetrics => {
  const promos = records.filter((record) => record.is_promo);
  return {
    total_products: records.length,
    avg_discount: round2(mean(promos.map((record) => record.discount_pct))),
    total_savings: round2(
      records.reduce((sum, record) => sum + (record.base_price - record.final_price), 0),
    ),
    retailer_count: new Set(records.map((record) => record.retailer)).size,
  };
};
