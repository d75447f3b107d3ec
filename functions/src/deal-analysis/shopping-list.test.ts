import { describe, expect, it } from "vitest";
import { InvalidStrategyError } from "../errors";
import { makeRecord } from "../testing";
import type { ProductRecord } from "../types";
import { generateShoppingList, isShoppingStrategy } from "./shopping-list";

const promo = (
  name: string,
  discountPct: number,
  price: number,
  extra: Partial<ProductRecord> = {},
) =>
  makeRecord({ product_name: name, discount_pct: discountPct, final_price: price, ...extra });

describe("isShoppingStrategy", () => {
  it("accepts only the known strategies", () => {
    expect(isShoppingStrategy("savings")).toBe(true);
    expect(isShoppingStrategy("variety")).toBe(true);
    expect(isShoppingStrategy("single_retailer")).toBe(true);
    expect(isShoppingStrategy("cheapest")).toBe(false);
    expect(isShoppingStrategy(3)).toBe(false);
  });
});

describe("generateShoppingList", () => {
  it("takes the biggest discounts first and stops near the budget", () => {
    const records = [
      promo("p20", 20, 2.5),
      promo("p50", 50, 3),
      promo("p10", 10, 1),
      promo("p40", 40, 4),
      promo("p30", 30, 5),
    ];

    const list = generateShoppingList(records, 10);

    expect(list.map((r) => r.product_name)).toEqual(["p50", "p40", "p20"]);
  });

  it("accepts items that fill the budget to the cent", () => {
    const records = [promo("a", 10, 0.1), promo("b", 10, 0.2)];

    expect(generateShoppingList(records, 0.3).map((r) => r.product_name)).toEqual(["a", "b"]);
  });

  it("keeps walking past items that do not fit", () => {
    const records = [promo("big", 50, 20), promo("small", 10, 1)];

    expect(generateShoppingList(records, 10).map((r) => r.product_name)).toEqual(["small"]);
  });

  it("only lists promo items", () => {
    const records = [makeRecord({ product_name: "regular", final_price: 1 }), promo("deal", 10, 1)];

    expect(generateShoppingList(records, 50).map((r) => r.product_name)).toEqual(["deal"]);
  });

  it("returns an empty list when there is nothing to buy", () => {
    expect(generateShoppingList([], 10)).toEqual([]);
  });

  it("picks the two cheapest per category, categories in sorted order", () => {
    const records = [
      promo("b1", 10, 1, { category: "B" }),
      promo("b05", 10, 0.5, { category: "B" }),
      promo("b2", 10, 2, { category: "B" }),
      promo("a3", 10, 3, { category: "A" }),
    ];

    expect(generateShoppingList(records, 100, "variety").map((r) => r.product_name)).toEqual([
      "a3",
      "b05",
      "b1",
    ]);
  });

  it("keeps to the retailer with the most promos", () => {
    const records = [
      promo("x", 10, 1, { retailer: "Rimi" }),
      promo("y", 10, 1, { retailer: "Maxima" }),
      promo("z", 10, 1, { retailer: "Maxima" }),
    ];

    expect(
      generateShoppingList(records, 100, "single_retailer").map((r) => r.product_name),
    ).toEqual(["y", "z"]);
  });

  it("breaks a retailer tie in favour of the first one seen", () => {
    const records = [
      promo("x", 10, 1, { retailer: "Rimi" }),
      promo("y", 10, 1, { retailer: "Maxima" }),
      promo("z", 10, 1, { retailer: "Maxima" }),
      promo("w", 10, 1, { retailer: "Rimi" }),
    ];

    expect(
      generateShoppingList(records, 100, "single_retailer").map((r) => r.product_name),
    ).toEqual(["x", "w"]);
  });

  it("rejects unknown strategies", () => {
    expect(() => generateShoppingList([promo("x", 10, 1)], 10, "cheapest")).toThrow(
      InvalidStrategyError,
    );
  });
});
