import { FieldValue, type Firestore, getFirestore } from "firebase-admin/firestore";
import { logger } from "firebase-functions/v2";
import { FLYERS_COLLECTION, PRODUCTS_COLLECTION } from "../constants";
import type { RecordQuery, RecordRepository } from "../flyer-import/repository";
import { toProductRecord } from "../flyer-import/record-schema";
import type { FlyerRecord, FlyerRecordUpdate, ProductRecord, StoredProductRecord } from "../types";

// Firestore caps a write batch at 500 operations.
const MAX_BATCH_WRITES = 500;
// "in" filters take at most 30 values.
const MAX_IN_VALUES = 30;

const toFlyerRecord = (data: Record<string, unknown>): FlyerRecord | null => {
  const { flyerId, retailer, filename, sourceUrl } = data;
  if (typeof flyerId !== "string" || typeof retailer !== "string" || typeof filename !== "string") {
    return null;
  }
  return {
    flyerId,
    retailer,
    filename,
    ...(typeof sourceUrl === "string" ? { sourceUrl } : {}),
    hasEncounteredError: data.hasEncounteredError === true,
    lastRunId: typeof data.lastRunId === "string" ? data.lastRunId : "",
    numberOfItemsCollected:
      typeof data.numberOfItemsCollected === "number" ? data.numberOfItemsCollected : 0,
  };
};

export class FirestoreRecordRepository implements RecordRepository {
  constructor(private readonly db: Firestore = getFirestore()) {}

  private async findFlyerDoc(filename: string) {
    const flyerQuery = await this.db
      .collection(FLYERS_COLLECTION)
      .where("filename", "==", filename)
      .limit(1)
      .get();
    return flyerQuery.empty ? null : flyerQuery.docs[0];
  }

  async getFlyer(filename: string): Promise<FlyerRecord | null> {
    const flyerDoc = await this.findFlyerDoc(filename);
    if (!flyerDoc) {
      logger.error("No flyer record found for filename", { filename });
      return null;
    }

    const flyer = toFlyerRecord(flyerDoc.data());
    if (!flyer) {
      logger.error("Flyer record is missing required fields", { filename, docId: flyerDoc.id });
    }
    return flyer;
  }

  async createFlyer(flyer: FlyerRecord): Promise<void> {
    await this.db.collection(FLYERS_COLLECTION).doc(flyer.flyerId).set(flyer);
  }

  async updateFlyer(filename: string, updates: FlyerRecordUpdate): Promise<void> {
    const flyerDoc = await this.findFlyerDoc(filename);
    if (flyerDoc) {
      await flyerDoc.ref.update({ ...updates });
    }
  }

  async saveRecords(
    flyerId: string,
    runId: string,
    records: readonly ProductRecord[],
  ): Promise<number> {
    for (let offset = 0; offset < records.length; offset += MAX_BATCH_WRITES) {
      const batch = this.db.batch();
      records.slice(offset, offset + MAX_BATCH_WRITES).forEach((record, index) => {
        const docId = `${runId}_${String(offset + index).padStart(5, "0")}`;
        const stored: StoredProductRecord = {
          ...record,
          id: docId,
          flyerId,
          createdAt: FieldValue.serverTimestamp(),
        };
        batch.set(this.db.collection(PRODUCTS_COLLECTION).doc(docId), stored);
      });
      await batch.commit();
    }
    return records.length;
  }

  async listRecords({ retailers }: RecordQuery = {}): Promise<ProductRecord[]> {
    const collection = this.db.collection(PRODUCTS_COLLECTION);
    const queries =
      retailers && retailers.length > 0
        ? chunk(retailers, MAX_IN_VALUES).map((ids) => collection.where("retailer", "in", ids))
        : [collection];

    const records: ProductRecord[] = [];
    for (const query of queries) {
      const snapshot = await query.orderBy("createdAt").get();
      snapshot.forEach((doc) => {
        try {
          records.push(toProductRecord(doc.data()));
        } catch (error) {
          logger.warn("Skipping malformed product document", {
            docId: doc.id,
            error: error instanceof Error ? error.message : "Unknown error",
          });
        }
      });
    }
    return records;
  }
}

const chunk = <T>(items: readonly T[], size: number): T[][] => {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
};
