import type { KeywordMatching } from "../util/tokens";
import categoryKeywordsData from "./data/category-keywords.json";
import retailersData from "./data/retailers.json";

export type PriceUnit = "euro" | "cent";

export interface PricePattern {
  name: string;
  regex: RegExp;
  unit: PriceUnit;
}

export interface DiscountPattern {
  name: string;
  regex: RegExp;
}

export interface RetailerConfig {
  id: string;
  type: string;
  chainSize: string;
  baseUrl: string;
  flyerPage?: string;
  namePatterns: readonly string[];
}

export type CategoryKeywords = readonly (readonly [category: string, keywords: readonly string[]])[];

export interface PatternLibrary {
  pricePatterns: readonly PricePattern[];
  discountPatterns: readonly DiscountPattern[];
  categoryKeywords: CategoryKeywords;
  fallbackCategory: string;
  retailers: readonly RetailerConfig[];
  contextRadius: number;
  nameTokenCount: number;
  associationTokenCount: number;
  unknownProductName: string;
  categoryMatching: KeywordMatching;
}

// Patterns need the g flag for matchAll, which clones them, so a shared
// library never carries lastIndex state between calls.
export const DEFAULT_PRICE_PATTERNS: readonly PricePattern[] = [
  { name: "N,NN €", regex: /(\d+)[,.](\d{2})\s*€/gi, unit: "euro" },
  { name: "N,NN EUR", regex: /(\d+)[,.](\d{2})\s*EUR/gi, unit: "euro" },
  { name: "€ N,NN", regex: /€\s*(\d+)[,.](\d{2})/gi, unit: "euro" },
  { name: "N ct", regex: /(\d+)\s*ct/gi, unit: "cent" },
];

export const DEFAULT_DISCOUNT_PATTERNS: readonly DiscountPattern[] = [
  { name: "-N%", regex: /-(\d+)%/gi },
  { name: "N% nuolaida", regex: /(\d+)%\s*nuolaida/gi },
  { name: "taupyk iki N%", regex: /taupyk.*?(\d+)%/gi },
  { name: "iki -N%", regex: /iki\s*-(\d+)%/gi },
];

export const DEFAULT_FALLBACK_CATEGORY = "Kita";

const freezeDeep = <T extends object>(value: T): Readonly<T> => {
  for (const nested of Object.values(value)) {
    if (nested !== null && typeof nested === "object" && !(nested instanceof RegExp)) {
      freezeDeep(nested);
    }
  }
  return Object.freeze(value);
};

const withGlobalFlag = (regex: RegExp): RegExp =>
  regex.global ? regex : new RegExp(regex.source, `${regex.flags}g`);

const defaultCategoryKeywords = (): CategoryKeywords =>
  categoryKeywordsData.map(({ category, keywords }) => [category, [...keywords]] as const);

const defaultRetailers = (): RetailerConfig[] =>
  retailersData.map(({ flyerPage, namePatterns, ...rest }) => ({
    ...rest,
    ...(flyerPage ? { flyerPage } : {}),
    namePatterns: [...namePatterns],
  }));

/**
 * Builds the immutable pattern configuration the extractor, associator and
 * categorizer read. Build it once and pass it down; overrides replace whole
 * fields.
 */
export const createPatternLibrary = (overrides: Partial<PatternLibrary> = {}): PatternLibrary => {
  const library: PatternLibrary = {
    pricePatterns: DEFAULT_PRICE_PATTERNS,
    discountPatterns: DEFAULT_DISCOUNT_PATTERNS,
    categoryKeywords: defaultCategoryKeywords(),
    fallbackCategory: DEFAULT_FALLBACK_CATEGORY,
    retailers: defaultRetailers(),
    contextRadius: 50,
    nameTokenCount: 5,
    associationTokenCount: 5,
    unknownProductName: "Unknown Product",
    categoryMatching: "token",
    ...overrides,
  };

  return freezeDeep({
    ...library,
    pricePatterns: library.pricePatterns.map((p) => ({ ...p, regex: withGlobalFlag(p.regex) })),
    discountPatterns: library.discountPatterns.map((p) => ({
      ...p,
      regex: withGlobalFlag(p.regex),
    })),
  });
};

export const isKnownRetailer = (library: PatternLibrary, retailerId: string): boolean =>
  library.retailers.some((retailer) => retailer.id === retailerId);

export const getRetailerConfig = (
  library: PatternLibrary,
  retailerId: string,
): RetailerConfig | undefined => library.retailers.find((retailer) => retailer.id === retailerId);
