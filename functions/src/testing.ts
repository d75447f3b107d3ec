import type { RecordQuery, RecordRepository } from "./flyer-import/repository";
import type { FlyerRecord, FlyerRecordUpdate, ProductRecord } from "./types";

export const FIXED_NOW = new Date("2026-10-19T08:00:00.000Z");

/** A consistent record; prices derive from final_price and discount_pct unless given. */
export const makeRecord = (overrides: Partial<ProductRecord> = {}): ProductRecord => {
  const discountPct = overrides.discount_pct ?? 0;
  const finalPrice = overrides.final_price ?? 1;
  return {
    retailer: "Maxima",
    product_name: "Produktas",
    category: "Kita",
    base_price: finalPrice,
    final_price: finalPrice,
    discount_pct: discountPct,
    is_promo: discountPct > 0,
    source_file: "test.pdf",
    parsed_date: FIXED_NOW,
    ...overrides,
  };
};

/** In-process stand-in for the Firestore repository. */
export class InMemoryRecordRepository implements RecordRepository {
  readonly flyers = new Map<string, FlyerRecord>();
  readonly saved: { flyerId: string; runId: string; records: ProductRecord[] }[] = [];

  async getFlyer(filename: string): Promise<FlyerRecord | null> {
    return this.flyers.get(filename) ?? null;
  }

  async createFlyer(flyer: FlyerRecord): Promise<void> {
    this.flyers.set(flyer.filename, flyer);
  }

  async updateFlyer(filename: string, updates: FlyerRecordUpdate): Promise<void> {
    const flyer = this.flyers.get(filename);
    if (flyer) this.flyers.set(filename, { ...flyer, ...updates });
  }

  async saveRecords(
    flyerId: string,
    runId: string,
    records: readonly ProductRecord[],
  ): Promise<number> {
    this.saved.push({ flyerId, runId, records: [...records] });
    return records.length;
  }

  async listRecords(query: RecordQuery = {}): Promise<ProductRecord[]> {
    const all = this.saved.flatMap((batch) => batch.records);
    const { retailers } = query;
    return retailers?.length ? all.filter((r) => retailers.includes(r.retailer)) : all;
  }
}
