import { describe, it, expect } from "vitest";
import { DCTERMS, NAKALA_TERMS, defaultPropertyCatalog } from "../src/catalog.js";
import { previewRows } from "../src/preview.js";
import { ENGINE_VERSION } from "../src/types.js";

describe("previewRows", () => {
  it("shows per-row metadata and batch totals", () => {
    const row = { title: "fr:Titre|en:Title", keywords: "fr:a;b", foo: "x" };
    const preview = previewRows([row, { title: "" }], defaultPropertyCatalog);

    expect(preview.engineVersion).toBe(ENGINE_VERSION);
    expect(preview.entries[0].entryNumber).toBe(1);
    expect(preview.entries[0].originalData).toBe(row);
    expect(preview.entries[0].metadataCount).toBe(4);
    expect(preview.entries[0].propertiesUsed).toEqual([`${NAKALA_TERMS}title`, `${DCTERMS}subject`]);
    expect(preview.entries[1]).toMatchObject({ entryNumber: 2, metadata: [], metadataCount: 0, propertiesUsed: [] });
    expect(preview.summary).toEqual({
      totalEntries: 2,
      totalMetadataFields: 4,
      uniqueProperties: 2,
      languagesUsed: ["fr", "en"],
    });
  });

  it("handles an empty batch", () => {
    expect(previewRows([], defaultPropertyCatalog).summary).toEqual({
      totalEntries: 0,
      totalMetadataFields: 0,
      uniqueProperties: 0,
      languagesUsed: [],
    });
  });
});
