import { InvalidStrategyError } from "../errors";
import { type ProductRecord, SHOPPING_STRATEGIES, type ShoppingStrategy } from "../types";
import { toCents } from "../util/money";

export const EARLY_STOP_PERCENT = 95;
const VARIETY_PER_CATEGORY = 2;

export const isShoppingStrategy = (value: unknown): value is ShoppingStrategy =>
  typeof value === "string" && SHOPPING_STRATEGIES.some((strategy) => strategy === value);

const byDiscountDesc = (promos: ProductRecord[]) =>
  [...promos].sort((a, b) => b.discount_pct - a.discount_pct);

const cheapestPerCategory = (promos: ProductRecord[]) => {
  const byCategory = new Map<string, ProductRecord[]>();
  for (const record of promos) {
    const group = byCategory.get(record.category) ?? [];
    group.push(record);
    byCategory.set(record.category, group);
  }

  return [...byCategory.keys()]
    .sort()
    .flatMap((category) =>
      (byCategory.get(category) ?? [])
        .sort((a, b) => a.final_price - b.final_price)
        .slice(0, VARIETY_PER_CATEGORY),
    );
};

const busiestRetailerOnly = (promos: ProductRecord[]) => {
  const counts = new Map<string, number>();
  for (const record of promos) {
    counts.set(record.retailer, (counts.get(record.retailer) ?? 0) + 1);
  }

  let best: string | undefined;
  let bestCount = 0;
  for (const [retailer, count] of counts) {
    if (count > bestCount) {
      best = retailer;
      bestCount = count;
    }
  }
  return promos.filter((record) => record.retailer === best);
};

export const orderCandidates = (
  promos: ProductRecord[],
  strategy: ShoppingStrategy,
): ProductRecord[] => {
  switch (strategy) {
    case "savings":
      return byDiscountDesc(promos);
    case "variety":
      return cheapestPerCategory(promos);
    case "single_retailer":
      return busiestRetailerOnly(promos);
  }
};

/**
 * Greedy list over promo items. Items are taken while they fit the budget;
 * the walk ends as soon as the total reaches 95% of it, even if cheaper
 * items further down would still fit.
 */
export const generateShoppingList = (
  records: readonly ProductRecord[],
  budget: number,
  strategy: string = "savings",
): ProductRecord[] => {
  if (!isShoppingStrategy(strategy)) {
    throw new InvalidStrategyError(strategy);
  }

  const promos = records.filter((record) => record.is_promo);
  const shoppingList: ProductRecord[] = [];
  const budgetCents = toCents(budget);
  let totalCents = 0;

  for (const record of orderCandidates(promos, strategy)) {
    const priceCents = toCents(record.final_price);
    if (totalCents + priceCents <= budgetCents) {
      shoppingList.push(record);
      totalCents += priceCents;
    }

    if (totalCents * 100 >= budgetCents * EARLY_STOP_PERCENT) break;
  }

  return shoppingList;
};
