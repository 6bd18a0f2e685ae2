/**
 * Module: Public Types & Engine Version
 * Purpose: Define the row, metadata entry, catalog descriptor, person, enhancement
 * and validation contracts shared by every stage, plus the engine version exposed
 * in previews for diagnostics.
 */
// One CSV line: header -> raw cell text, in column order (integer-like headers sort first)
export type Row = Readonly<Record<string, string>>;

export const UNDETERMINED_LANG = "und";

export interface LocalizedText {
  lang: string; // ISO code or UNDETERMINED_LANG
  text: string;
}

export type PropertyKind = "free-text" | "person-list" | "uri" | "date";

export interface PropertyDescriptor {
  field: string;
  propertyUri: string;
  multilingual: boolean;
  multivalued: boolean;
  kind: PropertyKind;
  // Literal datatype emitted as `typeUri`; absent for structured values such as persons
  datatype?: string;
}

export type PersonRecord =
  | { kind: "person"; surname: string; givenname: string }
  | { kind: "organization"; fullname: string };

// Output unit handed to the repository API under `metas`
export interface MetadataEntry {
  propertyUri: string;
  value: string;
  lang?: string;
  typeUri?: string;
}

export type ContentType = "images" | "code" | "presentations" | "documents" | "data";

export interface ProposedFields {
  title: LocalizedText[];
  description: LocalizedText[];
  keywords: LocalizedText[];
}

export interface EnhancementSuggestion {
  entryIndex: number;
  originalTitle: string;
  contentType: ContentType;
  proposedFields: ProposedFields;
  confidence: number; // 0..95, one decimal
}

export type ResourceKind = "data" | "collection";
export type Severity = "info" | "warning" | "error";

export interface FieldIssue {
  row?: number;     // 0-based row index; absent for column-level findings
  field: string;
  severity: Severity;
  message: string;
  suggestion?: string;
}

export interface ValidationReport {
  resourceKind: ResourceKind;
  entriesCount: number;
  fieldsFound: string[];
  missingRequired: string[];
  missingRecommended: string[];
  unknownFields: string[];
  issuesPerField: Record<string, FieldIssue[]>;
}

export const ENGINE_VERSION = "0.1.0";
