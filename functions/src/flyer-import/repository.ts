import type { FlyerRecord, FlyerRecordUpdate, ProductRecord } from "../types";

export interface RecordQuery {
  retailers?: string[];
}

/** Persistence seam for flyers and the aggregate product collection. */
export interface RecordRepository {
  getFlyer(filename: string): Promise<FlyerRecord | null>;
  createFlyer(flyer: FlyerRecord): Promise<void>;
  updateFlyer(filename: string, updates: FlyerRecordUpdate): Promise<void>;
  /** Writes one flyer's batch; returns how many records were stored. */
  saveRecords(flyerId: string, runId: string, records: readonly ProductRecord[]): Promise<number>;
  listRecords(query?: RecordQuery): Promise<ProductRecord[]>;
}
