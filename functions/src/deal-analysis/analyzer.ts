import { logger } from "firebase-functions/v2";
import { NoDataError, UnknownRetailerError } from "../errors";
import { type ParseFlyerOptions, parseFlyerText } from "../flyer-import/parse-flyer";
import {
  type PatternLibrary,
  createPatternLibrary,
  isKnownRetailer,
} from "../flyer-import/pattern-library";
import type { CartResult, ProductRecord, RankedDeal, RetailerSummary, SummaryMetrics } from "../types";
import { buildShoppingGuide } from "./export";
import { type DesiredProducts, optimizeCart } from "./optimize-cart";
import { type BestDealsOptions, findBestDeals } from "./rank-deals";
import { generateShoppingList } from "./shopping-list";
import { type PriceComparisonRow, comparePrices, summarizeByRetailer, summaryMetrics } from "./summary";

/**
 * Owns the aggregate record collection. The collection is only ever replaced
 * wholesale or appended to; every query refuses to run on an empty one.
 */
export class PromoAnalyzer {
  private promoProducts: readonly ProductRecord[] = [];

  constructor(
    readonly library: PatternLibrary = createPatternLibrary(),
    private readonly parseOptions: ParseFlyerOptions = {},
  ) {}

  get records(): readonly ProductRecord[] {
    return this.promoProducts;
  }

  load(records: readonly ProductRecord[]): void {
    this.promoProducts = [...records];
  }

  append(records: readonly ProductRecord[]): void {
    this.promoProducts = [...this.promoProducts, ...records];
  }

  /** Parses one flyer into a private batch, then appends it. Returns the batch. */
  ingestFlyer(text: string, retailer: string, sourceFile: string): ProductRecord[] {
    if (!isKnownRetailer(this.library, retailer)) {
      throw new UnknownRetailerError(retailer);
    }

    const { records, priceCount, discountCount } = parseFlyerText(
      text,
      retailer,
      sourceFile,
      this.library,
      this.parseOptions,
    );
    if (priceCount === 0) {
      logger.warn("No prices found in flyer text", { retailer, sourceFile });
    } else {
      logger.info("Parsed flyer", { retailer, sourceFile, priceCount, discountCount, unique: records.length });
    }

    this.append(records);
    return records;
  }

  private requireData(): readonly ProductRecord[] {
    if (this.promoProducts.length === 0) {
      throw new NoDataError();
    }
    return this.promoProducts;
  }

  summarizeByRetailer(): RetailerSummary[] {
    return summarizeByRetailer(this.requireData());
  }

  summaryMetrics(): SummaryMetrics {
    return summaryMetrics(this.requireData());
  }

  findBestDeals(options?: BestDealsOptions): RankedDeal[] {
    return findBestDeals(this.requireData(), options);
  }

  comparePrices(searchTerm: string): PriceComparisonRow[] {
    return comparePrices(this.requireData(), searchTerm);
  }

  optimizeCart(desired: DesiredProducts, budget?: number): CartResult {
    return optimizeCart(this.requireData(), desired, budget);
  }

  generateShoppingList(budget: number, strategy?: string): ProductRecord[] {
    return generateShoppingList(this.requireData(), budget, strategy);
  }

  shoppingGuide(now?: Date): string {
    return buildShoppingGuide(this.requireData(), this.library.fallbackCategory, now);
  }
}
