import type { Response } from "express";
import type { Request } from "firebase-functions/v2/https";
import { CsvFormatError, InvalidStrategyError, NoDataError } from "../errors";
import { isShoppingStrategy } from "./shopping-list";
import type {
  BestDealsRequest,
  OptimizeCartRequest,
  ParseResult,
  ShoppingListRequest,
} from "./types";

type Body = Record<string, unknown>;

const ok = <T>(value: T): ParseResult<T> => ({ ok: true, value });
const fail = <T>(error: string): ParseResult<T> => ({ ok: false, error });

const isBody = (value: unknown): value is Body =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const asBody = (value: unknown): Body => (isBody(value) ? value : {});

const isNonNegativeNumber = (value: unknown): value is number =>
  typeof value === "number" && Number.isFinite(value) && value >= 0;

const parseRetailers = (value: unknown): ParseResult<string[] | undefined> => {
  if (value === undefined) return ok(undefined);
  if (!Array.isArray(value) || !value.every((id): id is string => typeof id === "string")) {
    return fail("retailers must be an array of strings");
  }
  return ok(value);
};

export function isValidMethod(request: Request, response: Response, method = "POST") {
  if (request.method !== method) {
    response.status(405).json({ error: "Method not allowed" });
    return false;
  }
  return true;
}

export const parseBestDealsRequest = (body: unknown): ParseResult<BestDealsRequest> => {
  const { category, top_n: topN, retailers } = asBody(body);
  const retailerFilter = parseRetailers(retailers);
  if (!retailerFilter.ok) return fail(retailerFilter.error);

  if (category !== undefined && typeof category !== "string") {
    return fail("category must be a string");
  }
  if (topN !== undefined && !(isNonNegativeNumber(topN) && Number.isInteger(topN))) {
    return fail("top_n must be a non-negative integer");
  }

  return ok({ category, top_n: topN, retailers: retailerFilter.value });
};

export const parseOptimizeCartRequest = (body: unknown): ParseResult<OptimizeCartRequest> => {
  const { desired_products: desiredProducts, budget, retailers } = asBody(body);
  if (!isBody(desiredProducts)) {
    return fail("desired_products is required and must be an object of category to quantity");
  }
  const retailerFilter = parseRetailers(retailers);
  if (!retailerFilter.ok) return fail(retailerFilter.error);

  const desired: Record<string, number> = {};
  for (const [category, qty] of Object.entries(desiredProducts)) {
    if (!(isNonNegativeNumber(qty) && Number.isInteger(qty))) {
      return fail(`quantity for ${category} must be a non-negative integer`);
    }
    desired[category] = qty;
  }
  if (budget !== undefined && !isNonNegativeNumber(budget)) {
    return fail("budget must be a non-negative number");
  }

  return ok({ desired_products: desired, budget, retailers: retailerFilter.value });
};

export const parseShoppingListRequest = (body: unknown): ParseResult<ShoppingListRequest> => {
  const { budget, optimize_for: optimizeFor = "savings", retailers } = asBody(body);
  if (!isNonNegativeNumber(budget)) {
    return fail("budget is required and must be a non-negative number");
  }
  const retailerFilter = parseRetailers(retailers);
  if (!retailerFilter.ok) return fail(retailerFilter.error);

  if (!isShoppingStrategy(optimizeFor)) {
    return fail("optimize_for must be one of savings, variety, single_retailer");
  }

  return ok({ budget, optimize_for: optimizeFor, retailers: retailerFilter.value });
};

/** ?retailers=Maxima,Rimi on GET endpoints. */
export const retailersFromQuery = (value: unknown): string[] | undefined => {
  if (typeof value !== "string" || !value.trim()) return undefined;
  return value
    .split(",")
    .map((id) => id.trim())
    .filter(Boolean);
};

export const errorStatus = (error: unknown): number => {
  if (error instanceof NoDataError) return 404;
  if (error instanceof InvalidStrategyError || error instanceof CsvFormatError) return 400;
  return 500;
};

export function sendError(response: Response, error: unknown) {
  const status = errorStatus(error);
  const message = error instanceof Error ? error.message : "Unknown error";
  response
    .status(status)
    .json(status === 500 ? { error: "Internal server error", details: message } : { error: message });
}
