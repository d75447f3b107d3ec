import { describe, expect, it } from "vitest";
import { createPatternLibrary, getRetailerConfig, isKnownRetailer } from "./pattern-library";

describe("createPatternLibrary", () => {
  it("builds the default Lithuanian configuration", () => {
    const library = createPatternLibrary();

    expect(library.pricePatterns.map((p) => p.name)).toEqual([
      "N,NN €",
      "N,NN EUR",
      "€ N,NN",
      "N ct",
    ]);
    expect(library.discountPatterns).toHaveLength(4);
    expect(library.categoryKeywords[0][0]).toBe("Pieno produktai");
    expect(library.fallbackCategory).toBe("Kita");
    expect(library.contextRadius).toBe(50);
    expect(library.categoryMatching).toBe("token");
  });

  it("is frozen all the way down", () => {
    const library = createPatternLibrary();

    expect(Object.isFrozen(library)).toBe(true);
    expect(Object.isFrozen(library.pricePatterns)).toBe(true);
    expect(Object.isFrozen(library.categoryKeywords[0][1])).toBe(true);
    expect(Object.isFrozen(library.retailers[0])).toBe(true);
  });

  it("applies overrides and adds the global flag to patterns", () => {
    const library = createPatternLibrary({
      discountPatterns: [{ name: "sale N%", regex: /sale (\d+)%/i }],
      fallbackCategory: "uncategorized",
    });

    expect(library.discountPatterns[0].regex.flags).toBe("gi");
    expect(library.fallbackCategory).toBe("uncategorized");
    expect(library.pricePatterns).toHaveLength(4);
  });
});

describe("retailer registry", () => {
  const library = createPatternLibrary();

  it("knows the configured retailers", () => {
    expect(library.retailers.map((r) => r.id)).toEqual([
      "Maxima",
      "Rimi",
      "IKI",
      "Lidl",
      "Norfa",
      "Barbora",
    ]);
    expect(isKnownRetailer(library, "Rimi")).toBe(true);
    expect(isKnownRetailer(library, "rimi")).toBe(false);
    expect(isKnownRetailer(library, "Aldi")).toBe(false);
  });

  it("leaves flyerPage unset for retailers without one", () => {
    expect(getRetailerConfig(library, "Barbora")?.flyerPage).toBeUndefined();
    expect(getRetailerConfig(library, "Lidl")?.flyerPage).toBe("https://www.lidl.lt/akcijos");
  });
});
