import { NoDataError } from "../errors";
import type { CartItem, CartResult, ProductRecord } from "../types";
import { round2, toCents } from "../util/money";

export type DesiredProducts = Readonly<Record<string, number>> | ReadonlyMap<string, number>;

const PROMO_NUDGE = 0.01;

/** Promo items sort a cent ahead of regular items at the same price. */
export const cartSortKey = (record: ProductRecord): number =>
  record.final_price - (record.is_promo ? PROMO_NUDGE : 0);

const desiredEntries = (desired: DesiredProducts): [string, number][] =>
  desired instanceof Map ? [...desired.entries()] : Object.entries(desired);

/**
 * Greedy cart: for each desired category, take the `qty` lowest sort keys,
 * then add them one at a time. An item that would push the total over the
 * budget is skipped and the walk moves on, so a category can come back short.
 * A budget of 0 means no budget.
 */
export const optimizeCart = (
  records: readonly ProductRecord[],
  desired: DesiredProducts,
  budget?: number,
): CartResult => {
  if (records.length === 0) {
    throw new NoDataError();
  }

  const items: CartItem[] = [];
  const budgetCents = budget ? toCents(budget) : undefined;
  let totalCents = 0;
  let totalSavings = 0;

  for (const [category, qty] of desiredEntries(desired)) {
    if (qty <= 0) continue;

    const picks = records
      .filter((record) => record.category === category)
      .sort((a, b) => cartSortKey(a) - cartSortKey(b))
      .slice(0, qty);

    for (const record of picks) {
      const itemCost = record.final_price;
      const itemCents = toCents(itemCost);
      if (budgetCents !== undefined && totalCents + itemCents > budgetCents) continue;

      items.push({
        retailer: record.retailer,
        product: record.product_name,
        category,
        price: itemCost,
        original_price: record.base_price,
        discount: record.discount_pct,
        is_promo: record.is_promo,
      });
      totalCents += itemCents;
      totalSavings += record.base_price - itemCost;
    }
  }

  return {
    items,
    total_cost: totalCents / 100,
    total_savings: round2(totalSavings),
    item_count: items.length,
    retailers: [...new Set(items.map((item) => item.retailer))],
  };
};
