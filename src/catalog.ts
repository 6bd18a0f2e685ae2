import type { PropertyDescriptor, PropertyKind } from "./types.js";

/**
 * Module: Property Catalog
 * Purpose: Map flat column names to semantic property URIs and value shapes.
 * The catalog is an immutable value built once and handed to the assembler, so
 * callers can supply their own mapping without touching module state.
 */

export const NAKALA_TERMS = "http://nakala.fr/terms#";
export const DCTERMS = "http://purl.org/dc/terms/";
export const XSD_STRING = "http://www.w3.org/2001/XMLSchema#string";
export const XSD_ANY_URI = "http://www.w3.org/2001/XMLSchema#anyURI";
export const XSD_DATE = "http://www.w3.org/2001/XMLSchema#date";

// Columns that describe the upload itself rather than the resource
export const STRUCTURAL_FIELDS: ReadonlySet<string> = new Set(["file", "status", "data_items"]);

const text = (field: string, propertyUri: string, multivalued = false): PropertyDescriptor => ({
  field,
  propertyUri,
  multilingual: true,
  multivalued,
  kind: "free-text",
  datatype: XSD_STRING,
});

const plain = (field: string, propertyUri: string, kind: PropertyKind, datatype: string, multivalued = false): PropertyDescriptor => ({
  field,
  propertyUri,
  multilingual: false,
  multivalued,
  kind,
  datatype,
});

const persons = (field: string, propertyUri: string): PropertyDescriptor => ({
  field,
  propertyUri,
  multilingual: false,
  multivalued: true,
  kind: "person-list",
});

export const DEFAULT_PROPERTY_DESCRIPTORS: readonly PropertyDescriptor[] = [
  text("title", `${NAKALA_TERMS}title`),
  text("alternative", `${DCTERMS}alternative`),
  persons("creator", `${NAKALA_TERMS}creator`),
  persons("contributor", `${DCTERMS}contributor`),
  plain("type", `${NAKALA_TERMS}type`, "uri", XSD_ANY_URI),
  text("description", `${DCTERMS}description`),
  text("keywords", `${DCTERMS}subject`, true),
  plain("license", `${NAKALA_TERMS}license`, "free-text", XSD_STRING),
  plain("date", `${NAKALA_TERMS}created`, "date", XSD_DATE),
  plain("language", `${DCTERMS}language`, "free-text", XSD_STRING, true),
  text("temporal", `${DCTERMS}temporal`),
  text("spatial", `${DCTERMS}spatial`),
  plain("accessRights", `${DCTERMS}accessRights`, "free-text", XSD_STRING),
  text("rights", `${DCTERMS}rights`),
  text("publisher", `${DCTERMS}publisher`),
  text("coverage", `${DCTERMS}coverage`),
  text("relation", `${DCTERMS}relation`),
  text("source", `${DCTERMS}source`),
  plain("identifier", `${DCTERMS}identifier`, "uri", XSD_ANY_URI),
  plain("format", `${DCTERMS}format`, "free-text", XSD_STRING),
];

export interface PropertyCatalog {
  lookup(field: string): PropertyDescriptor | undefined;
  has(field: string): boolean;
  fields(): string[];
  descriptors(): readonly PropertyDescriptor[];
}

const normalizeField = (s: string): string => s.trim().toLowerCase();

/**
 * Build a frozen catalog. Lookup is exact first, then case/whitespace-insensitive,
 * so `Title` or ` accessrights ` resolve to their descriptors.
 * Later descriptors for the same field replace earlier ones.
 */
export function createPropertyCatalog(
  descriptors: readonly PropertyDescriptor[] = DEFAULT_PROPERTY_DESCRIPTORS
): PropertyCatalog {
  const exact = new Map<string, PropertyDescriptor>();
  for (const d of descriptors) {
    exact.set(d.field, Object.freeze({ ...d }));
  }
  const folded = new Map<string, PropertyDescriptor>();
  for (const d of exact.values()) {
    folded.set(normalizeField(d.field), d);
  }
  const frozen = Object.freeze([...exact.values()]);

  const lookup = (field: string): PropertyDescriptor | undefined =>
    exact.get(field) ?? folded.get(normalizeField(field));

  return Object.freeze({
    lookup,
    has: (field: string) => lookup(field) !== undefined,
    fields: () => frozen.map((d) => d.field),
    descriptors: () => frozen,
  });
}

export type PropertyOverride = Partial<Omit<PropertyDescriptor, "field">> & { field: string };

/**
 * Derive a catalog with overridden or additional fields. Overrides merge onto the
 * base descriptor of the same field; unknown fields must carry a `propertyUri`
 * and default to single-language free text.
 */
export function extendPropertyCatalog(base: PropertyCatalog, overrides: readonly PropertyOverride[]): PropertyCatalog {
  const merged = new Map<string, PropertyDescriptor>();
  for (const d of base.descriptors()) merged.set(d.field, d);
  for (const o of overrides) {
    const current = base.lookup(o.field);
    if (current) {
      merged.set(current.field, { ...current, ...o, field: current.field });
      continue;
    }
    if (!o.propertyUri) continue;
    merged.set(o.field, {
      field: o.field,
      propertyUri: o.propertyUri,
      multilingual: o.multilingual ?? false,
      multivalued: o.multivalued ?? false,
      kind: o.kind ?? "free-text",
      datatype: o.datatype,
    });
  }
  return createPropertyCatalog([...merged.values()]);
}

/** Build a catalog from a plain `field -> propertyUri` mapping over the defaults. */
export function catalogFromFieldMapping(mapping: Readonly<Record<string, string>>): PropertyCatalog {
  const overrides = Object.entries(mapping).map(([field, propertyUri]) => ({ field, propertyUri }));
  return extendPropertyCatalog(createPropertyCatalog(), overrides);
}

export const defaultPropertyCatalog: PropertyCatalog = createPropertyCatalog();
