import { defaultPropertyCatalog, type PropertyCatalog } from "./catalog.js";
import { parseCsvToRows } from "./csv.js";
import { UnsupportedFileError } from "./errors.js";
import { logger } from "./logger.js";
import { validateRows } from "./validate.js";
import { readXlsxToRows } from "./xlsx.js";
import type { ResourceKind, Row, ValidationReport } from "./types.js";

export * from "./types.js";
export * from "./errors.js";
export * from "./catalog.js";
export * from "./multilingual.js";
export * from "./persons.js";
export * from "./assemble.js";
export * from "./enhance.js";
export * from "./validate.js";
export * from "./preview.js";
export * from "./resourceTypes.js";
export * from "./transport.js";
export { toRow, toRows, cell, withFields } from "./row.js";
export { suggestHeaderMappings, type HeaderMappingHint } from "./semantics.js";
export { parseCsvToRows, parseCsvRaw, detectDelimiter, type Delimiter } from "./csv.js";
export { readXlsxToRows, writeRowsToXlsx } from "./xlsx.js";
export { loadConfig, getConfig, DEFAULT_CONFIG, COAR_RESOURCE_TYPE_NAMESPACE, type CoreConfig, type LogLevel } from "./config.js";
export { logger, configureLogger, getLogger, Logger, type LogContext } from "./logger.js";

/**
 * Module: Metadata Core Entry Point
 * Purpose: Read a CSV/XLSX description of research resources into typed rows
 * and the advisory validation report, ready for enhancement and assembly.
 */

export interface ReadOptions {
  catalog?: PropertyCatalog;
  resourceKind?: ResourceKind;
  resourceTypeNamespace?: string;
}

export interface ReadResult {
  rows: Row[];
  report: ValidationReport;
  sourceFormat: "csv" | "xlsx";
}

/**
 * Parse a metadata file from bytes.
 * - `.xlsx`/`.xls`/`.ods`: SheetJS workbook reader.
 * - `.csv`/`.tsv`/`.txt`: UTF-8 text with delimiter detection.
 * Other extensions throw `UnsupportedFileError`.
 */
export async function readMetadataFileFromBuffer(
  fileBytes: ArrayBuffer | Uint8Array,
  filename: string,
  options: ReadOptions = {}
): Promise<ReadResult> {
  const lower = filename.toLowerCase();
  const catalog = options.catalog ?? defaultPropertyCatalog;
  const log = logger.reader.child({ filename });
  const started = Date.now();

  let rows: Row[];
  let sourceFormat: ReadResult["sourceFormat"];
  if (/\.(xlsx|xls|ods)$/.test(lower)) {
    rows = readXlsxToRows(fileBytes).rows;
    sourceFormat = "xlsx";
  } else if (/\.(csv|tsv|txt)$/.test(lower)) {
    rows = parseCsvToRows(new TextDecoder("utf-8").decode(fileBytes));
    sourceFormat = "csv";
  } else {
    throw new UnsupportedFileError(`Unsupported metadata file type: ${filename}`, filename);
  }

  const report = validateRows(rows, catalog, {
    resourceKind: options.resourceKind,
    resourceTypeNamespace: options.resourceTypeNamespace,
  });
  log.timed("Metadata file read", started, { rows: rows.length, sourceFormat });
  return { rows, report, sourceFormat };
}
