import type { FieldValue } from "firebase-admin/firestore";

export interface ProductRecord {
  retailer: string;
  product_name: string;
  category: string;
  base_price: number;
  final_price: number;
  discount_pct: number;
  is_promo: boolean;
  source_file: string;
  parsed_date: Date;
}

export interface StoredProductRecord extends ProductRecord {
  id: string;
  flyerId: string;
  createdAt: FieldValue;
}

export interface FlyerRecord {
  flyerId: string;
  retailer: string;
  filename: string;
  sourceUrl?: string;
  hasEncounteredError: boolean;
  lastRunId: string;
  numberOfItemsCollected: number;
}

export type FlyerRecordUpdate = Pick<
  FlyerRecord,
  "hasEncounteredError" | "lastRunId" | "numberOfItemsCollected"
>;

// Selection outputs
export interface RankedDeal extends ProductRecord {
  savings: number;
  deal_score: number;
}

export interface CartItem {
  retailer: string;
  product: string;
  category: string;
  price: number;
  original_price: number;
  discount: number;
  is_promo: boolean;
}

export interface CartResult {
  items: CartItem[];
  total_cost: number;
  total_savings: number;
  item_count: number;
  retailers: string[];
}

export const SHOPPING_STRATEGIES = ["savings", "variety", "single_retailer"] as const;
export type ShoppingStrategy = (typeof SHOPPING_STRATEGIES)[number];

export interface RetailerSummary {
  retailer: string;
  total_products: number;
  avg_discount: number;
  avg_price: number;
  min_price: number;
  max_price: number;
  promo_count: number;
}

export interface SummaryMetrics {
  total_products: number;
  avg_discount: number;
  total_savings: number;
  retailer_count: number;
}
