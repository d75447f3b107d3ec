import { logger } from "firebase-functions/v2";
import { UnknownRetailerError } from "../errors";
import type { FlyerTextProvider } from "./flyer-text";
import { type ParseFlyerOptions, parseFlyerText } from "./parse-flyer";
import { type PatternLibrary, isKnownRetailer } from "./pattern-library";
import type { RecordRepository } from "./repository";

/** Gives the pipeline a local copy of a stored flyer and cleans it up afterwards. */
export interface FlyerFileStore {
  download(storagePath: string): Promise<string>;
  release(localPath: string): Promise<void>;
}

export interface FlyerIngestDeps {
  repository: RecordRepository;
  files: FlyerFileStore;
  textProvider: FlyerTextProvider;
  library: PatternLibrary;
  notifyError: (message: string, context?: Record<string, unknown>) => Promise<void>;
  parseOptions?: ParseFlyerOptions;
}

export interface FlyerIngestResult {
  flyerId: string;
  retailer: string;
  itemsCollected: number;
}

export const fileNameOf = (storagePath: string) => storagePath.split("/").pop() ?? storagePath;

/**
 * Parses one stored flyer and appends its records to the product collection.
 * The flyer record is marked with the outcome either way; failures are
 * reported and rethrown.
 */
export const ingestFlyerFile = async (
  storagePath: string,
  runId: string,
  deps: FlyerIngestDeps,
): Promise<FlyerIngestResult> => {
  const { repository, files, textProvider, library } = deps;
  const fileName = fileNameOf(storagePath);

  const flyer = await repository.getFlyer(fileName);
  if (!flyer) {
    throw new Error(`No flyer record found for file: ${fileName}`);
  }
  const { flyerId, retailer } = flyer;

  logger.info("Starting flyer processing", { flyerId, fileName, retailer, storagePath });

  let localPath: string | undefined;
  try {
    if (!isKnownRetailer(library, retailer)) {
      throw new UnknownRetailerError(retailer);
    }

    localPath = await files.download(storagePath);
    const text = await textProvider.extractText(localPath);
    if (!text.trim()) {
      logger.warn("No text extracted from flyer", { flyerId, fileName });
    }

    const { records, priceCount, discountCount } = parseFlyerText(
      text,
      retailer,
      fileName,
      library,
      deps.parseOptions,
    );
    logger.info("Found prices and discounts in flyer", {
      flyerId,
      priceCount,
      discountCount,
      uniqueProducts: records.length,
    });

    const itemsCollected =
      records.length > 0 ? await repository.saveRecords(flyerId, runId, records) : 0;

    await repository.updateFlyer(fileName, {
      hasEncounteredError: false,
      lastRunId: runId,
      numberOfItemsCollected: itemsCollected,
    });

    logger.info("Stored flyer products", { flyerId, fileName, retailer, itemsCollected });
    return { flyerId, retailer, itemsCollected };
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : "Unknown error";
    logger.error("FATAL: Error processing flyer", { flyerId, fileName, storagePath, error: errorMessage });

    await repository.updateFlyer(fileName, {
      hasEncounteredError: true,
      lastRunId: runId,
      numberOfItemsCollected: 0,
    });
    await deps.notifyError(`Flyer processing failed for ${flyerId}`, {
      flyerId,
      fileName,
      storagePath,
      retailer,
      error: errorMessage,
    });

    throw error;
  } finally {
    if (localPath) await files.release(localPath);
  }
};
