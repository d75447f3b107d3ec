import { type Mock, beforeEach, describe, expect, it, vi } from "vitest";
import { UnknownRetailerError } from "../errors";
import { FIXED_NOW, InMemoryRecordRepository } from "../testing";
import type { FlyerTextProvider } from "./flyer-text";
import { type FlyerFileStore, type FlyerIngestDeps, fileNameOf, ingestFlyerFile } from "./ingest";
import { createPatternLibrary } from "./pattern-library";

const library = createPatternLibrary();

class FakeFileStore implements FlyerFileStore {
  readonly downloaded: string[] = [];
  readonly released: string[] = [];

  async download(storagePath: string): Promise<string> {
    this.downloaded.push(storagePath);
    return `/tmp/${fileNameOf(storagePath)}`;
  }

  async release(localPath: string): Promise<void> {
    this.released.push(localPath);
  }
}

const textOf = (text: string): FlyerTextProvider => ({ extractText: async () => text });

describe("fileNameOf", () => {
  it("takes the last path segment", () => {
    expect(fileNameOf("flyers/maxima_1.pdf")).toBe("maxima_1.pdf");
    expect(fileNameOf("maxima_1.pdf")).toBe("maxima_1.pdf");
  });
});

describe("ingestFlyerFile", () => {
  let repository: InMemoryRecordRepository;
  let files: FakeFileStore;
  let notifyError: Mock<FlyerIngestDeps["notifyError"]>;

  const deps = (textProvider: FlyerTextProvider): FlyerIngestDeps => ({
    repository,
    files,
    textProvider,
    library,
    notifyError,
    parseOptions: { now: FIXED_NOW },
  });

  beforeEach(async () => {
    repository = new InMemoryRecordRepository();
    files = new FakeFileStore();
    notifyError = vi.fn<FlyerIngestDeps["notifyError"]>(async () => undefined);

    await repository.createFlyer({
      flyerId: "flyer-1",
      retailer: "Maxima",
      filename: "maxima_1.pdf",
      hasEncounteredError: false,
      lastRunId: "",
      numberOfItemsCollected: 0,
    });
    await repository.createFlyer({
      flyerId: "flyer-2",
      retailer: "Aldi",
      filename: "aldi_1.pdf",
      hasEncounteredError: false,
      lastRunId: "",
      numberOfItemsCollected: 0,
    });
  });

  it("stores parsed records and marks the flyer as processed", async () => {
    const result = await ingestFlyerFile(
      "flyers/maxima_1.pdf",
      "run-1",
      deps(textOf("Pienas 2,5% 1,99 € -20% nuolaida")),
    );

    expect(result).toEqual({ flyerId: "flyer-1", retailer: "Maxima", itemsCollected: 1 });
    expect(repository.saved).toHaveLength(1);
    expect(repository.saved[0].flyerId).toBe("flyer-1");
    expect(repository.saved[0].runId).toBe("run-1");
    expect(repository.saved[0].records[0]).toMatchObject({
      retailer: "Maxima",
      product_name: "Pienas 2,5% 1,99 € -20%",
      source_file: "maxima_1.pdf",
      discount_pct: 20,
    });
    expect(repository.flyers.get("maxima_1.pdf")).toMatchObject({
      hasEncounteredError: false,
      lastRunId: "run-1",
      numberOfItemsCollected: 1,
    });
    expect(files.downloaded).toEqual(["flyers/maxima_1.pdf"]);
    expect(files.released).toEqual(["/tmp/maxima_1.pdf"]);
    expect(notifyError).not.toHaveBeenCalled();
  });

  it("writes nothing when the flyer has no prices", async () => {
    const result = await ingestFlyerFile("flyers/maxima_1.pdf", "run-2", deps(textOf("")));

    expect(result.itemsCollected).toBe(0);
    expect(repository.saved).toEqual([]);
    expect(repository.flyers.get("maxima_1.pdf")?.lastRunId).toBe("run-2");
  });

  it("rejects files without a flyer record", async () => {
    await expect(
      ingestFlyerFile("flyers/unknown.pdf", "run-3", deps(textOf(""))),
    ).rejects.toThrow("No flyer record found for file: unknown.pdf");
    expect(files.downloaded).toEqual([]);
  });

  it("marks and reports flyers from unknown retailers", async () => {
    await expect(
      ingestFlyerFile("flyers/aldi_1.pdf", "run-4", deps(textOf("Pienas 1,99 €"))),
    ).rejects.toBeInstanceOf(UnknownRetailerError);

    expect(files.downloaded).toEqual([]);
    expect(files.released).toEqual([]);
    expect(repository.flyers.get("aldi_1.pdf")).toMatchObject({
      hasEncounteredError: true,
      lastRunId: "run-4",
      numberOfItemsCollected: 0,
    });
    expect(notifyError).toHaveBeenCalledWith(
      "Flyer processing failed for flyer-2",
      expect.objectContaining({ retailer: "Aldi", fileName: "aldi_1.pdf" }),
    );
  });

  it("releases the local file when text extraction fails", async () => {
    const failing: FlyerTextProvider = {
      extractText: async () => {
        throw new Error("model unavailable");
      },
    };

    await expect(ingestFlyerFile("flyers/maxima_1.pdf", "run-5", deps(failing))).rejects.toThrow(
      "model unavailable",
    );

    expect(files.released).toEqual(["/tmp/maxima_1.pdf"]);
    expect(repository.flyers.get("maxima_1.pdf")?.hasEncounteredError).toBe(true);
    expect(notifyError).toHaveBeenCalledWith(
      "Flyer processing failed for flyer-1",
      expect.objectContaining({ error: "model unavailable" }),
    );
  });
});
