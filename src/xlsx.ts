import * as XLSX from "xlsx";
import type { Row } from "./types.js";

/**
 * Read a workbook from bytes and return string-valued rows of its main sheet.
 * - Prefers a sheet named `metadata` (any case), otherwise the first sheet.
 * - Cells are read as formatted text so dates and numbers keep their displayed form.
 */
export function readXlsxToRows(fileBytes: ArrayBuffer | Uint8Array): { rows: Row[]; sheetName?: string } {
  const data = fileBytes instanceof Uint8Array ? fileBytes : new Uint8Array(fileBytes);
  const workbook = XLSX.read(data, { type: "array" });

  const sheetName = chooseMainSheet(workbook.SheetNames);
  if (!sheetName) return { rows: [] };
  const sheet = workbook.Sheets[sheetName];

  const matrix = XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, raw: false, defval: "", blankrows: false });
  const [headerRow, ...body] = matrix;
  const headers = (headerRow ?? []).map((h) => String(h ?? "").trim());

  const rows: Row[] = body.map((values) => {
    const out: Record<string, string> = {};
    headers.forEach((h, idx) => {
      if (!h) return;
      const v = values[idx];
      out[h] = v === undefined || v === null ? "" : String(v);
    });
    return Object.freeze(out);
  });

  return { rows, sheetName };
}

/**
 * Select the sheet to parse: `metadata` when present, otherwise the first sheet.
 */
function chooseMainSheet(sheetNames: string[]): string | undefined {
  const preferred = sheetNames.find((name) => name.toLowerCase() === "metadata");
  return preferred ?? sheetNames[0];
}

/** Write rows to an XLSX workbook (one `metadata` sheet), e.g. for templates. */
export function writeRowsToXlsx(rows: readonly Row[]): Uint8Array {
  const headers: string[] = [];
  for (const row of rows) {
    for (const key of Object.keys(row)) if (!headers.includes(key)) headers.push(key);
  }
  const matrix = [headers, ...rows.map((row) => headers.map((h) => row[h] ?? ""))];
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(matrix), "metadata");
  const out: unknown = XLSX.write(workbook, { type: "array", bookType: "xlsx" });
  if (out instanceof ArrayBuffer) return new Uint8Array(out);
  if (out instanceof Uint8Array) return out;
  throw new TypeError("Unexpected workbook output");
}
