import { z } from "zod";
import type { PropertyCatalog } from "./catalog.js";
import { parseMultilingualField, splitTerms } from "./multilingual.js";
import { formatPersonRecord, parsePersonNames } from "./persons.js";
import { cell, toRow } from "./row.js";
import { getConfig } from "./config.js";
import { RowShapeError } from "./errors.js";
import { logger } from "./logger.js";
import type { MetadataEntry, PropertyDescriptor, Row } from "./types.js";

/**
 * Module: Metadata Assembly
 * Purpose: Turn one row into the ordered `metas` list the repository API expects,
 * and wrap it in data-item or collection payloads.
 * Design:
 * - Column order drives output order; per-field language order follows the cell.
 *   Rows are plain objects, so integer-like headers (`2023`) enumerate first.
 * - The catalog is injected; unknown columns are skipped here and reported by the validator.
 * - Blank cells produce nothing, title included. Malformed dates and URIs pass through unchanged.
 */

const log = logger.assembler;

const entry = (d: PropertyDescriptor, value: string, lang?: string): MetadataEntry => {
  const out: MetadataEntry = { propertyUri: d.propertyUri, value };
  if (lang !== undefined) out.lang = lang;
  if (d.datatype) out.typeUri = d.datatype;
  return out;
};

/**
 * Expand a single cell according to its descriptor.
 * Person lists never carry `typeUri` or `lang`; multilingual fields always carry `lang`.
 */
export function assembleField(d: PropertyDescriptor, raw: string): MetadataEntry[] {
  switch (d.kind) {
    case "person-list":
      return parsePersonNames(raw).map((p) => ({ propertyUri: d.propertyUri, value: formatPersonRecord(p) }));
    case "uri":
    case "date":
      return [entry(d, raw)];
    case "free-text": {
      if (d.multilingual) {
        const out: MetadataEntry[] = [];
        for (const { lang, text } of parseMultilingualField(raw)) {
          if (d.multivalued) {
            for (const term of splitTerms(text)) out.push(entry(d, term, lang));
          } else {
            out.push(entry(d, text, lang));
          }
        }
        return out;
      }
      if (d.multivalued) return splitTerms(raw).map((term) => entry(d, term));
      return [entry(d, raw.trim())];
    }
  }
}

/**
 * Assemble one row. Never throws for string-valued rows: blank cells and
 * unknown columns are skipped, ambiguous cells follow the parser fallbacks.
 */
export function assembleMetadata(row: Row, catalog: PropertyCatalog): MetadataEntry[] {
  // Rows from untyped callers are checked here; a non-mapping or non-string cell throws RowShapeError
  const checked = toRow(row);
  const metas: MetadataEntry[] = [];
  for (const [field, raw] of Object.entries(checked)) {
    if (!raw || !raw.trim()) continue;
    const descriptor = catalog.lookup(field);
    if (!descriptor) continue;
    metas.push(...assembleField(descriptor, raw));
  }
  log.debug("Row assembled", { entries: metas.length });
  return metas;
}

export function assembleRows(rows: readonly Row[], catalog: PropertyCatalog): MetadataEntry[][] {
  return rows.map((row, i) => {
    try {
      return assembleMetadata(row, catalog);
    } catch (err) {
      if (err instanceof RowShapeError) throw new RowShapeError(err.message, err.field, i);
      throw err;
    }
  });
}

export interface DataItemPayload {
  status: string;
  files: string[];
  metas: MetadataEntry[];
}

export interface CollectionPayload {
  status: string;
  datas: string[];
  metas: MetadataEntry[];
}

export interface PayloadOptions {
  status?: string;
}

// File and data-item lists accept either separator
const splitList = (raw: string): string[] =>
  raw
    .split(/[|;]/)
    .map((s) => s.trim())
    .filter(Boolean);

/**
 * Data-item payload: `file` lists the files to attach, `status` falls back to the
 * configured data status.
 */
export function buildDataItemPayload(row: Row, catalog: PropertyCatalog, options: PayloadOptions = {}): DataItemPayload {
  const checked = toRow(row);
  return {
    status: cell(checked, "status").trim() || options.status || getConfig().dataStatus,
    files: splitList(cell(checked, "file")),
    metas: assembleMetadata(checked, catalog),
  };
}

/**
 * Collection payload: `data_items` lists member identifiers or folder patterns,
 * resolved to identifiers by the caller before submission.
 */
export function buildCollectionPayload(row: Row, catalog: PropertyCatalog, options: PayloadOptions = {}): CollectionPayload {
  const checked = toRow(row);
  return {
    status: cell(checked, "status").trim() || options.status || getConfig().collectionStatus,
    datas: splitList(cell(checked, "data_items")),
    metas: assembleMetadata(checked, catalog),
  };
}

/** JSON form sent under `metas`; `lang`/`typeUri` appear only when set. */
export function serializeMetadata(metas: readonly MetadataEntry[]): string {
  return JSON.stringify(metas);
}

const metadataListSchema = z.array(
  z.object({
    propertyUri: z.string(),
    value: z.string(),
    lang: z.string().optional(),
    typeUri: z.string().optional(),
  })
);

/** Parse a `metas` JSON document back into entries; throws on malformed input. */
export function deserializeMetadata(json: string): MetadataEntry[] {
  return metadataListSchema.parse(JSON.parse(json));
}
