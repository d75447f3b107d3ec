import { logger } from "firebase-functions/v2";
import { type HttpsOptions, onRequest } from "firebase-functions/v2/https";
import { FUNCTION_REGION } from "../constants";
import { createPatternLibrary } from "../flyer-import/pattern-library";
import { initializeAppIfNeeded } from "../util/firebase";
import { FirestoreRecordRepository } from "../util/firestore-repository";
import { round2 } from "../util/money";
import { PromoAnalyzer } from "./analyzer";
import { recordsFromCsv, recordsToCsv } from "./export";
import {
  isValidMethod,
  parseBestDealsRequest,
  parseOptimizeCartRequest,
  parseShoppingListRequest,
  retailersFromQuery,
  sendError,
} from "./http";

initializeAppIfNeeded();

const FUNCTION_CONFIG: HttpsOptions = {
  memory: "512MiB",
  timeoutSeconds: 120,
  region: FUNCTION_REGION,
  cors: true,
};

const library = createPatternLibrary();
const repository = new FirestoreRecordRepository();

const loadAnalyzer = async (retailers?: string[]): Promise<PromoAnalyzer> => {
  const analyzer = new PromoAnalyzer(library);
  analyzer.load(await repository.listRecords({ retailers }));
  logger.info("Loaded promo records", { count: analyzer.records.length, retailers });
  return analyzer;
};

export const findBestDeals = onRequest(FUNCTION_CONFIG, async (request, response) => {
  if (!isValidMethod(request, response)) return;

  const parsed = parseBestDealsRequest(request.body);
  if (!parsed.ok) {
    response.status(400).json({ error: parsed.error });
    return;
  }

  try {
    const { category, top_n: topN, retailers } = parsed.value;
    const analyzer = await loadAnalyzer(retailers);
    const deals = analyzer.findBestDeals({ category, topN });
    response.json({ deals, count: deals.length });
  } catch (error) {
    logger.error("Error finding best deals", {
      error: error instanceof Error ? error.message : "Unknown error",
    });
    sendError(response, error);
  }
});

export const optimizeCart = onRequest(FUNCTION_CONFIG, async (request, response) => {
  if (!isValidMethod(request, response)) return;

  const parsed = parseOptimizeCartRequest(request.body);
  if (!parsed.ok) {
    response.status(400).json({ error: parsed.error });
    return;
  }

  try {
    const { desired_products: desiredProducts, budget, retailers } = parsed.value;
    const analyzer = await loadAnalyzer(retailers);
    const cart = analyzer.optimizeCart(desiredProducts, budget);

    logger.info("Cart optimized", {
      requested: desiredProducts,
      budget,
      itemCount: cart.item_count,
      totalCost: cart.total_cost,
      totalSavings: cart.total_savings,
    });
    response.json(cart);
  } catch (error) {
    logger.error("Error optimizing cart", {
      error: error instanceof Error ? error.message : "Unknown error",
    });
    sendError(response, error);
  }
});

export const generateShoppingList = onRequest(FUNCTION_CONFIG, async (request, response) => {
  if (!isValidMethod(request, response)) return;

  const parsed = parseShoppingListRequest(request.body);
  if (!parsed.ok) {
    response.status(400).json({ error: parsed.error });
    return;
  }

  try {
    const { budget, optimize_for: strategy, retailers } = parsed.value;
    const analyzer = await loadAnalyzer(retailers);
    const items = analyzer.generateShoppingList(budget, strategy);
    const totalCost = items.reduce((sum, item) => sum + item.final_price, 0);

    logger.info("Shopping list generated", { budget, strategy, itemCount: items.length });
    response.json({ items, item_count: items.length, total_cost: round2(totalCost) });
  } catch (error) {
    logger.error("Error generating shopping list", {
      error: error instanceof Error ? error.message : "Unknown error",
    });
    sendError(response, error);
  }
});

export const promoSummary = onRequest(FUNCTION_CONFIG, async (request, response) => {
  if (!isValidMethod(request, response, "GET")) return;

  try {
    const analyzer = await loadAnalyzer(retailersFromQuery(request.query.retailers));
    const search = typeof request.query.search === "string" ? request.query.search : undefined;
    response.json({
      metrics: analyzer.summaryMetrics(),
      retailers: analyzer.summarizeByRetailer(),
      ...(search ? { price_comparison: analyzer.comparePrices(search) } : {}),
    });
  } catch (error) {
    logger.error("Error building promo summary", {
      error: error instanceof Error ? error.message : "Unknown error",
    });
    sendError(response, error);
  }
});

export const exportShoppingGuide = onRequest(FUNCTION_CONFIG, async (request, response) => {
  if (!isValidMethod(request, response, "GET")) return;

  try {
    const analyzer = await loadAnalyzer(retailersFromQuery(request.query.retailers));
    response.type("text/plain; charset=utf-8").send(analyzer.shoppingGuide());
  } catch (error) {
    logger.error("Error exporting shopping guide", {
      error: error instanceof Error ? error.message : "Unknown error",
    });
    sendError(response, error);
  }
});

export const exportRecordsCsv = onRequest(FUNCTION_CONFIG, async (request, response) => {
  if (!isValidMethod(request, response, "GET")) return;

  try {
    const analyzer = await loadAnalyzer(retailersFromQuery(request.query.retailers));
    response
      .type("text/csv; charset=utf-8")
      .set("Content-Disposition", 'attachment; filename="promo_products.csv"')
      .send(recordsToCsv(analyzer.records));
  } catch (error) {
    logger.error("Error exporting records", {
      error: error instanceof Error ? error.message : "Unknown error",
    });
    sendError(response, error);
  }
});

export const importRecordsCsv = onRequest(FUNCTION_CONFIG, async (request, response) => {
  if (!isValidMethod(request, response)) return;

  const csv = request.rawBody ? request.rawBody.toString("utf-8") : "";
  if (!csv.trim()) {
    response.status(400).json({ error: "Request body must be CSV text" });
    return;
  }

  try {
    const records = recordsFromCsv(csv);
    const runId = `csv_${Date.now()}`;
    const stored = await repository.saveRecords("csv-import", runId, records);
    logger.info("Imported records from CSV", { stored, runId });
    response.json({ imported: stored });
  } catch (error) {
    logger.error("Error importing records", {
      error: error instanceof Error ? error.message : "Unknown error",
    });
    sendError(response, error);
  }
});
