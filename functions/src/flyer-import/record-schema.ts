import { InvalidRecordError } from "../errors";
import type { ProductRecord } from "../types";

type Fields = Record<string, unknown>;

const readString = (data: Fields, key: string): string => {
  const value = data[key];
  if (typeof value !== "string" || value.length === 0) {
    throw new InvalidRecordError(`${key} must be a non-empty string`);
  }
  return value;
};

const readNumber = (data: Fields, key: string): number => {
  const value = data[key];
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new InvalidRecordError(`${key} must be a finite number`);
  }
  return value;
};

const hasToDate = (value: unknown): value is { toDate: () => Date } =>
  typeof value === "object" &&
  value !== null &&
  "toDate" in value &&
  typeof value.toDate === "function";

const readDate = (data: Fields, key: string): Date => {
  const value = data[key];
  // Firestore hands back Timestamps; CSV hands back ISO strings.
  const date = hasToDate(value)
    ? value.toDate()
    : value instanceof Date
      ? value
      : typeof value === "string"
        ? new Date(value)
        : undefined;
  if (!date || Number.isNaN(date.getTime())) {
    throw new InvalidRecordError(`${key} must be a date`);
  }
  return date;
};

/** Reads a stored or imported row back into a record, enforcing the record invariants. */
export const toProductRecord = (data: Fields): ProductRecord => {
  const record: ProductRecord = {
    retailer: readString(data, "retailer"),
    product_name: readString(data, "product_name"),
    category: readString(data, "category"),
    base_price: readNumber(data, "base_price"),
    final_price: readNumber(data, "final_price"),
    discount_pct: readNumber(data, "discount_pct"),
    is_promo: data.is_promo === true,
    source_file: typeof data.source_file === "string" ? data.source_file : "",
    parsed_date: readDate(data, "parsed_date"),
  };

  if (record.final_price < 0) {
    throw new InvalidRecordError("final_price must not be negative");
  }
  if (record.base_price < record.final_price) {
    throw new InvalidRecordError("base_price must not be below final_price");
  }
  if (!Number.isInteger(record.discount_pct) || record.discount_pct < 0 || record.discount_pct > 100) {
    throw new InvalidRecordError("discount_pct must be an integer between 0 and 100");
  }
  if (record.is_promo !== record.discount_pct > 0) {
    throw new InvalidRecordError("is_promo must be true exactly when discount_pct > 0");
  }

  return record;
};
