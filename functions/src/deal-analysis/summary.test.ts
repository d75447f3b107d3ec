import { describe, expect, it } from "vitest";
import { makeRecord } from "../testing";
import { comparePrices, summarizeByRetailer, summaryMetrics } from "./summary";

const records = [
  makeRecord({ retailer: "Rimi", discount_pct: 10, final_price: 1, base_price: 1.11 }),
  makeRecord({ retailer: "Maxima", discount_pct: 10, final_price: 2, base_price: 2.22 }),
  makeRecord({ retailer: "IKI", final_price: 1.25 }),
  makeRecord({ retailer: "Rimi", discount_pct: 30, final_price: 3, base_price: 4.29 }),
  makeRecord({ retailer: "Maxima", final_price: 4 }),
];

describe("summarizeByRetailer", () => {
  it("orders retailers by promo count", () => {
    expect(summarizeByRetailer(records)).toEqual([
      {
        retailer: "Rimi",
        total_products: 2,
        avg_discount: 20,
        avg_price: 2,
        min_price: 1,
        max_price: 3,
        promo_count: 2,
      },
      {
        retailer: "Maxima",
        total_products: 2,
        avg_discount: 5,
        avg_price: 3,
        min_price: 2,
        max_price: 4,
        promo_count: 1,
      },
      {
        retailer: "IKI",
        total_products: 1,
        avg_discount: 0,
        avg_price: 1.25,
        min_price: 1.25,
        max_price: 1.25,
        promo_count: 0,
      },
    ]);
  });

  it("orders equal promo counts alphabetically", () => {
    const tied = [makeRecord({ retailer: "Norfa" }), makeRecord({ retailer: "Lidl" })];
    expect(summarizeByRetailer(tied).map((s) => s.retailer)).toEqual(["Lidl", "Norfa"]);
  });

  it("is empty without records", () => {
    expect(summarizeByRetailer([])).toEqual([]);
  });
});

describe("summaryMetrics", () => {
  it("aggregates over all records", () => {
    expect(summaryMetrics(records)).toEqual({
      total_products: 5,
      avg_discount: 16.67,
      total_savings: 1.62,
      retailer_count: 3,
    });
  });

  it("is all zeros without records", () => {
    expect(summaryMetrics([])).toEqual({
      total_products: 0,
      avg_discount: 0,
      total_savings: 0,
      retailer_count: 0,
    });
  });
});

describe("comparePrices", () => {
  it("finds matching names case-insensitively, cheapest first", () => {
    const catalog = [
      makeRecord({ retailer: "Rimi", product_name: "Pienas 1L", final_price: 0.99 }),
      makeRecord({ retailer: "IKI", product_name: "Kefyras", final_price: 0.79 }),
      makeRecord({
        retailer: "Maxima",
        product_name: "PIENAS 2.5%",
        final_price: 0.89,
        base_price: 1.11,
        discount_pct: 20,
      }),
    ];

    expect(comparePrices(catalog, "pienas")).toEqual([
      {
        retailer: "Maxima",
        product_name: "PIENAS 2.5%",
        final_price: 0.89,
        discount_pct: 20,
        is_promo: true,
      },
      {
        retailer: "Rimi",
        product_name: "Pienas 1L",
        final_price: 0.99,
        discount_pct: 0,
        is_promo: false,
      },
    ]);
  });
});
