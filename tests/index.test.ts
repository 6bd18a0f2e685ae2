import { describe, it, expect } from "vitest";
import { UnsupportedFileError, readMetadataFileFromBuffer, writeRowsToXlsx } from "../src/index.js";

const DATASET = "http://purl.org/coar/resource_type/c_ddb1";

describe("readMetadataFileFromBuffer", () => {
  it("reads a CSV file and validates it", async () => {
    const bytes = new TextEncoder().encode(`title,type,foo\nfr:A|en:B,${DATASET},x\n`);
    const result = await readMetadataFileFromBuffer(bytes, "Data.CSV");
    expect(result.sourceFormat).toBe("csv");
    expect(result.rows).toEqual([{ title: "fr:A|en:B", type: DATASET, foo: "x" }]);
    expect(result.report.unknownFields).toEqual(["foo"]);
    expect(result.report.missingRequired).toEqual([]);
  });

  it("reads a workbook", async () => {
    const bytes = writeRowsToXlsx([{ title: "Coll", data_items: "d1" }]);
    const result = await readMetadataFileFromBuffer(bytes, "collections.xlsx", { resourceKind: "collection" });
    expect(result.sourceFormat).toBe("xlsx");
    expect(result.rows).toEqual([{ title: "Coll", data_items: "d1" }]);
    expect(result.report.resourceKind).toBe("collection");
    expect(result.report.missingRequired).toEqual([]);
  });

  it("rejects other file types", async () => {
    await expect(readMetadataFileFromBuffer(new Uint8Array(), "notes.pdf")).rejects.toBeInstanceOf(UnsupportedFileError);
  });
});
