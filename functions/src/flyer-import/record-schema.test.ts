import { describe, expect, it } from "vitest";
import { InvalidRecordError } from "../errors";
import { FIXED_NOW } from "../testing";
import { toProductRecord } from "./record-schema";

const fields = (overrides: Record<string, unknown> = {}): Record<string, unknown> => ({
  retailer: "Rimi",
  product_name: "Kefyras 1L",
  category: "Pieno produktai",
  base_price: 1.25,
  final_price: 1,
  discount_pct: 20,
  is_promo: true,
  source_file: "rimi.pdf",
  parsed_date: FIXED_NOW,
  ...overrides,
});

describe("toProductRecord", () => {
  it("accepts a valid record", () => {
    expect(toProductRecord(fields())).toEqual({
      retailer: "Rimi",
      product_name: "Kefyras 1L",
      category: "Pieno produktai",
      base_price: 1.25,
      final_price: 1,
      discount_pct: 20,
      is_promo: true,
      source_file: "rimi.pdf",
      parsed_date: FIXED_NOW,
    });
  });

  it("reads stored timestamps and ISO strings", () => {
    const stored = toProductRecord(fields({ parsed_date: { toDate: () => FIXED_NOW } }));
    const imported = toProductRecord(fields({ parsed_date: "2026-10-19T08:00:00.000Z" }));

    expect(stored.parsed_date).toEqual(FIXED_NOW);
    expect(imported.parsed_date).toEqual(FIXED_NOW);
  });

  it.each([
    [{ retailer: "" }, "retailer must be a non-empty string"],
    [{ final_price: "1.00" }, "final_price must be a finite number"],
    [{ parsed_date: "yesterday" }, "parsed_date must be a date"],
    [{ final_price: -1, base_price: 0 }, "final_price must not be negative"],
    [{ base_price: 0.5 }, "base_price must not be below final_price"],
    [{ discount_pct: 12.5 }, "discount_pct must be an integer between 0 and 100"],
    [{ is_promo: false }, "is_promo must be true exactly when discount_pct > 0"],
  ])("rejects %o", (overrides, message) => {
    expect(() => toProductRecord(fields(overrides))).toThrow(new InvalidRecordError(message));
  });
});
