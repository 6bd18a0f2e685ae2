import { assembleMetadata } from "./assemble.js";
import type { PropertyCatalog } from "./catalog.js";
import { ENGINE_VERSION, type MetadataEntry, type Row } from "./types.js";

export interface PreviewEntry {
  entryNumber: number; // 1-based, as researchers count CSV lines below the header
  originalData: Row;
  metadata: MetadataEntry[];
  metadataCount: number;
  propertiesUsed: string[];
}

export interface PreviewResult {
  entries: PreviewEntry[];
  summary: {
    totalEntries: number;
    totalMetadataFields: number;
    uniqueProperties: number;
    languagesUsed: string[];
  };
  engineVersion: string;
}

/**
 * Show exactly what would be sent for each row, plus batch totals.
 * Properties and languages are listed in first-seen order.
 */
export function previewRows(rows: readonly Row[], catalog: PropertyCatalog): PreviewResult {
  const properties = new Set<string>();
  const languages = new Set<string>();
  let totalMetadataFields = 0;

  const entries = rows.map((row, i): PreviewEntry => {
    const metadata = assembleMetadata(row, catalog);
    const used = new Set<string>();
    for (const meta of metadata) {
      used.add(meta.propertyUri);
      properties.add(meta.propertyUri);
      if (meta.lang !== undefined) languages.add(meta.lang);
    }
    totalMetadataFields += metadata.length;
    return {
      entryNumber: i + 1,
      originalData: row,
      metadata,
      metadataCount: metadata.length,
      propertiesUsed: [...used],
    };
  });

  return {
    entries,
    summary: {
      totalEntries: entries.length,
      totalMetadataFields,
      uniqueProperties: properties.size,
      languagesUsed: [...languages],
    },
    engineVersion: ENGINE_VERSION,
  };
}
