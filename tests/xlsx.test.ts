import { describe, it, expect } from "vitest";
import * as XLSX from "xlsx";
import { readXlsxToRows, writeRowsToXlsx } from "../src/xlsx.js";

describe("xlsx rows", () => {
  it("reads back rows written to a workbook", () => {
    const bytes = writeRowsToXlsx([
      { title: "fr:Données|en:Data", date: "2023" },
      { title: "Second", creator: "Dupont,Jean" },
    ]);
    expect(readXlsxToRows(bytes)).toEqual({
      sheetName: "metadata",
      rows: [
        { title: "fr:Données|en:Data", date: "2023", creator: "" },
        { title: "Second", date: "", creator: "Dupont,Jean" },
      ],
    });
  });

  it("prefers a sheet named metadata", () => {
    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet([["notes"], ["ignore me"]]), "Readme");
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet([["title"], ["Kept"]]), "Metadata");
    const out: ArrayBuffer = XLSX.write(workbook, { type: "array", bookType: "xlsx" });
    expect(readXlsxToRows(out)).toEqual({ sheetName: "Metadata", rows: [{ title: "Kept" }] });
  });
});
