import { getStorage } from "firebase-admin/storage";
import { type GlobalOptions, logger } from "firebase-functions/v2";
import { HttpsError, onCall } from "firebase-functions/v2/https";
import { onObjectFinalized } from "firebase-functions/v2/storage";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { FLYERS_STORAGE_PREFIX, FUNCTION_REGION, flyerBucketName } from "../constants";
import { notifyError } from "../util/error-notification";
import { initializeAppIfNeeded } from "../util/firebase";
import { FirestoreRecordRepository } from "../util/firestore-repository";
import { API_KEY_SECRET } from "./constants";
import { GeminiFlyerTextProvider } from "./flyer-text";
import { type FlyerFileStore, type FlyerIngestResult, fileNameOf, ingestFlyerFile } from "./ingest";
import { createPatternLibrary } from "./pattern-library";

initializeAppIfNeeded();

const library = createPatternLibrary();

const storageFileStore = (bucketName: string): FlyerFileStore => ({
  async download(storagePath) {
    const localPath = path.join(os.tmpdir(), fileNameOf(storagePath));
    await getStorage().bucket(bucketName).file(storagePath).download({ destination: localPath });
    return localPath;
  },
  async release(localPath) {
    await fs.promises.rm(localPath, { force: true });
  },
});

const processFlyerFile = async (storagePath: string, runId: string): Promise<FlyerIngestResult> => {
  const apiKey = API_KEY_SECRET.value();
  if (!apiKey) throw new Error("API_KEY secret is not configured");

  return ingestFlyerFile(storagePath, runId, {
    repository: new FirestoreRecordRepository(),
    files: storageFileStore(flyerBucketName.value()),
    textProvider: GeminiFlyerTextProvider.fromApiKey(apiKey),
    library,
    notifyError,
  });
};

const FLYER_FUNCTION_OPTIONS: GlobalOptions = {
  memory: "1GiB",
  timeoutSeconds: 300,
  secrets: [API_KEY_SECRET],
  region: FUNCTION_REGION,
};

export const processFlyerOnUpload = onObjectFinalized(
  { ...FLYER_FUNCTION_OPTIONS, bucket: flyerBucketName },
  async (event) => {
    const { name: filePath, contentType } = event.data;

    if (!filePath.startsWith(FLYERS_STORAGE_PREFIX) || !contentType?.startsWith("application/pdf")) {
      logger.info("File is not a processable PDF flyer, skipping", { filePath, contentType });
      return;
    }

    try {
      await processFlyerFile(filePath, event.id);
    } catch (error: unknown) {
      // ingestFlyerFile already marked the flyer and sent the notification.
      logger.error("Flyer upload processing failed", {
        filePath,
        eventId: event.id,
        error: error instanceof Error ? error.message : "Unknown error",
      });
    }
  },
);

export const retryProcessFlyer = onCall<{ flyerPath?: unknown }>(
  FLYER_FUNCTION_OPTIONS,
  async (request) => {
    const { flyerPath } = request.data ?? {};

    if (typeof flyerPath !== "string" || !flyerPath) {
      throw new HttpsError("invalid-argument", "flyerPath is required");
    }

    if (!flyerPath.startsWith(FLYERS_STORAGE_PREFIX) || !flyerPath.endsWith(".pdf")) {
      throw new HttpsError(
        "invalid-argument",
        `Invalid flyer path. Must start with '${FLYERS_STORAGE_PREFIX}' and end with '.pdf'`,
      );
    }

    logger.info("Retrying flyer processing", { flyerPath });

    try {
      const result = await processFlyerFile(flyerPath, `retry_${Date.now()}`);
      return { success: true, message: "Flyer processed successfully", ...result };
    } catch (error: unknown) {
      const errorMessage = error instanceof Error ? error.message : "Unknown error";
      logger.error("Error retrying flyer processing", { flyerPath, error: errorMessage });
      throw new HttpsError("internal", `Failed to process flyer: ${errorMessage}`);
    }
  },
);
