import { getStorage } from "firebase-admin/storage";
import { logger } from "firebase-functions/v2";
import { onRequest } from "firebase-functions/v2/https";
import { FLYERS_STORAGE_PREFIX, FUNCTION_REGION, flyerBucketName } from "../constants";
import {
  type RetailerConfig,
  createPatternLibrary,
  getRetailerConfig,
} from "../flyer-import/pattern-library";
import { notifyError } from "../util/error-notification";
import { initializeAppIfNeeded } from "../util/firebase";
import { FirestoreRecordRepository } from "../util/firestore-repository";
import { findFlyerUrls, flyerFileName } from "./find-flyer-urls";

initializeAppIfNeeded();

const library = createPatternLibrary();
const repository = new FirestoreRecordRepository();

const MAX_FLYERS_PER_RETAILER = 2;
const REQUEST_HEADERS = {
  "User-Agent": "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36",
};
const FETCH_TIMEOUT_MS = 30_000;

const fetchOk = async (url: string): Promise<Response> => {
  const response = await fetch(url, {
    headers: REQUEST_HEADERS,
    signal: AbortSignal.timeout(FETCH_TIMEOUT_MS),
  });
  if (!response.ok) {
    throw new Error(`GET ${url} failed with HTTP ${response.status}`);
  }
  return response;
};

const crawlRetailer = async (retailer: RetailerConfig, maxFlyers: number): Promise<string[]> => {
  if (!retailer.flyerPage) {
    logger.info("Retailer has no flyer page configured, skipping", { retailer: retailer.id });
    return [];
  }

  const page = await fetchOk(retailer.flyerPage);
  const flyerUrls = findFlyerUrls(await page.text(), retailer);
  logger.info(`Found ${flyerUrls.length} PDF flyer(s) for ${retailer.id}`);

  const bucket = getStorage().bucket(flyerBucketName.value());
  const stored: string[] = [];

  for (const url of flyerUrls.slice(0, maxFlyers)) {
    try {
      const pdf = Buffer.from(await (await fetchOk(url)).arrayBuffer());
      // Index keeps two flyers fetched within the same second apart.
      const filename = flyerFileName(`${retailer.id}-${stored.length + 1}`, new Date());
      await bucket
        .file(`${FLYERS_STORAGE_PREFIX}${filename}`)
        .save(pdf, { metadata: { contentType: "application/pdf" } });

      await repository.createFlyer({
        flyerId: filename.replace(/\.pdf$/, ""),
        retailer: retailer.id,
        filename,
        sourceUrl: url,
        hasEncounteredError: false,
        lastRunId: "",
        numberOfItemsCollected: 0,
      });

      logger.info(`Uploaded ${filename}`, {
        retailer: retailer.id,
        sizeKb: Math.round(pdf.length / 1024),
      });
      stored.push(filename);
    } catch (error) {
      logger.error("Failed to download flyer", {
        retailer: retailer.id,
        url,
        error: error instanceof Error ? error.message : "Unknown error",
      });
    }
  }

  return stored;
};

export const crawlRetailerFlyers = onRequest(
  { region: FUNCTION_REGION, timeoutSeconds: 540, memory: "512MiB" },
  async (request, response) => {
    const requested: unknown = request.body?.retailers;
    const retailerIds =
      Array.isArray(requested) && requested.length > 0
        ? requested.filter((id): id is string => typeof id === "string")
        : library.retailers.map((retailer) => retailer.id);

    const results: Record<string, string[]> = {};
    const failures: string[] = [];

    for (const retailerId of retailerIds) {
      const retailer = getRetailerConfig(library, retailerId);
      if (!retailer) {
        logger.warn(`Retailer ${retailerId} not configured`);
        failures.push(retailerId);
        continue;
      }

      try {
        results[retailerId] = await crawlRetailer(retailer, MAX_FLYERS_PER_RETAILER);
      } catch (error) {
        logger.error("Error finding flyers for retailer", {
          retailer: retailerId,
          error: error instanceof Error ? error.message : "Unknown error",
        });
        failures.push(retailerId);
      }
    }

    if (failures.length > 0) {
      await notifyError("Flyer crawl finished with failures", { failures });
    }
    response.status(200).send({ success: failures.length === 0, stored: results, failures });
  },
);
