import type { ShoppingStrategy } from "../types";
export * from "../types";

interface RetailerFilter {
  retailers?: string[];
}

export interface BestDealsRequest extends RetailerFilter {
  category?: string;
  top_n?: number;
}

export interface OptimizeCartRequest extends RetailerFilter {
  desired_products: Record<string, number>;
  budget?: number;
}

export interface ShoppingListRequest extends RetailerFilter {
  budget: number;
  optimize_for: ShoppingStrategy;
}

export type ParseResult<T> = { ok: true; value: T } | { ok: false; error: string };
