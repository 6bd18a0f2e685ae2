import { STRUCTURAL_FIELDS, defaultPropertyCatalog, type PropertyCatalog } from "./catalog.js";
import { getConfig } from "./config.js";
import { parseMultilingualField } from "./multilingual.js";
import { cell } from "./row.js";
import { suggestHeaderMappings } from "./semantics.js";
import { logger } from "./logger.js";
import { UNDETERMINED_LANG } from "./types.js";
import type { FieldIssue, MetadataEntry, ResourceKind, Row, ValidationReport } from "./types.js";

/**
 * Module: Row Validation
 * Purpose: Structural and per-value checks run before assembly. Every finding is
 * advisory: the report is returned to the caller and nothing here throws.
 * Checks:
 * - Required/recommended columns per resource kind; unknown columns against the catalog.
 * - Title language convention, resource type namespace, date shape, blank required values.
 */

export const REQUIRED_FIELDS: Record<ResourceKind, readonly string[]> = {
  data: ["title", "type"],
  collection: ["title", "data_items"],
};

export const RECOMMENDED_FIELDS: readonly string[] = ["description", "creator", "keywords"];

export interface ValidateOptions {
  resourceKind?: ResourceKind;
  resourceTypeNamespace?: string;
  // Resolves header variants (`Title`, ` type `) the way the assembler does
  catalog?: PropertyCatalog;
}

const canonicalField = (header: string, catalog: PropertyCatalog): string => catalog.lookup(header)?.field ?? header;

// First header resolving to a field wins, matching the assembler's column order
function canonicalRow(row: Row, catalog: PropertyCatalog): Row {
  const out: Record<string, string> = {};
  for (const [header, value] of Object.entries(row)) {
    const field = canonicalField(header, catalog);
    if (!Object.prototype.hasOwnProperty.call(out, field)) out[field] = value;
  }
  return out;
}

const MULTILINGUAL_HINT = 'Format: "fr:Titre français|en:English title"';

export function validateFieldValues(input: Row, rowIndex: number, options: ValidateOptions = {}): FieldIssue[] {
  const issues: FieldIssue[] = [];
  const row = canonicalRow(input, options.catalog ?? defaultPropertyCatalog);
  const kind = options.resourceKind ?? "data";
  const namespace = options.resourceTypeNamespace ?? getConfig().resourceTypeNamespace;
  const push = (field: string, severity: FieldIssue["severity"], message: string, suggestion?: string) =>
    issues.push({ row: rowIndex, field, severity, message, ...(suggestion ? { suggestion } : {}) });

  for (const field of REQUIRED_FIELDS[kind]) {
    if (Object.prototype.hasOwnProperty.call(row, field) && !cell(row, field).trim()) {
      push(field, "error", `Required field "${field}" is empty`);
    }
  }

  const title = cell(row, "title").trim();
  if (title) {
    const segments = parseMultilingualField(title);
    if (segments.length < 2) {
      push("title", "info", "Consider adding a bilingual title", MULTILINGUAL_HINT);
    } else if (segments.some((s) => s.lang === UNDETERMINED_LANG)) {
      push("title", "warning", "Multilingual title segments should start with a language tag", MULTILINGUAL_HINT);
    }
  }

  const type = cell(row, "type").trim();
  if (type && !type.startsWith(namespace)) {
    push("type", "error", "Invalid resource type URI", `Use a URI under ${namespace}, e.g. ${namespace}c_ddb1`);
  }

  const date = cell(row, "date").trim();
  if (date && !(/^\d+$/.test(date) || date.includes("-"))) {
    push("date", "warning", "Date format might be invalid", "Use YYYY or YYYY-MM-DD format");
  }

  return issues;
}

/**
 * Validate a batch of rows. Columns are the union of every row's headers in
 * first-seen order; required and per-value checks see headers as the catalog
 * resolves them.
 */
export function validateRows(rows: readonly Row[], catalog: PropertyCatalog, options: ValidateOptions = {}): ValidationReport {
  const resourceKind = options.resourceKind ?? "data";
  const fieldsFound: string[] = [];
  const seen = new Set<string>();
  const present = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      if (seen.has(key)) continue;
      seen.add(key);
      fieldsFound.push(key);
      present.add(canonicalField(key, catalog));
    }
  }

  const missingRequired = REQUIRED_FIELDS[resourceKind].filter((f) => !present.has(f));
  const missingRecommended = RECOMMENDED_FIELDS.filter((f) => !present.has(f));
  const unknownFields = fieldsFound.filter((f) => !STRUCTURAL_FIELDS.has(f) && !catalog.has(f));

  const issuesPerField: Record<string, FieldIssue[]> = {};
  const addIssue = (issue: FieldIssue) => {
    (issuesPerField[issue.field] ??= []).push(issue);
  };

  for (const hint of suggestHeaderMappings(unknownFields, catalog)) {
    addIssue({
      field: hint.header,
      severity: "warning",
      message: `Unknown column "${hint.header}" is ignored`,
      ...(hint.field ? { suggestion: `Did you mean "${hint.field}"?` } : {}),
    });
  }

  rows.forEach((row, i) => {
    for (const issue of validateFieldValues(row, i, { ...options, catalog })) addIssue(issue);
  });

  logger.validator.debug("Rows validated", {
    rows: rows.length,
    missingRequired: missingRequired.length,
    unknownFields: unknownFields.length,
  });

  return {
    resourceKind,
    entriesCount: rows.length,
    fieldsFound,
    missingRequired,
    missingRecommended,
    unknownFields,
    issuesPerField,
  };
}

/** True when any finding is an error. Callers decide whether that blocks an upload. */
export function hasBlockingIssues(report: ValidationReport): boolean {
  return (
    report.missingRequired.length > 0 ||
    Object.values(report.issuesPerField).some((list) => list.some((i) => i.severity === "error"))
  );
}

/**
 * Check an assembled `metas` list before submission: every entry needs a
 * property and a value, and properties the catalog marks single-language must
 * not carry `lang`.
 */
export function validatePayloadMetas(metas: readonly MetadataEntry[], catalog: PropertyCatalog): string[] {
  const errors: string[] = [];
  const singleLanguage = new Set(catalog.descriptors().filter((d) => !d.multilingual).map((d) => d.propertyUri));
  const multilingual = new Set(catalog.descriptors().filter((d) => d.multilingual).map((d) => d.propertyUri));
  if (metas.length === 0) errors.push("Metadata list is empty");
  metas.forEach((meta, i) => {
    if (!meta.propertyUri) errors.push(`Meta entry ${i} missing 'propertyUri'`);
    if (!meta.value.trim()) errors.push(`Meta entry ${i} has an empty 'value'`);
    if (meta.lang !== undefined && singleLanguage.has(meta.propertyUri) && !multilingual.has(meta.propertyUri)) {
      errors.push(`Property ${meta.propertyUri} cannot have 'lang' attribute`);
    }
  });
  return errors;
}
