import { z } from "zod";
import { RowShapeError } from "./errors.js";
import type { Row } from "./types.js";

/**
 * Boundary check for rows arriving from callers: a plain mapping of header to
 * string. Keys are trimmed; blank headers are dropped; column order is kept.
 * Anything else fails fast with `RowShapeError`.
 */
const rowSchema = z.record(z.string(), z.string());

const isPlainObject = (v: unknown): v is Record<string, unknown> =>
  typeof v === "object" && v !== null && !Array.isArray(v) && !(v instanceof Map);

export function toRow(input: unknown, rowIndex?: number): Row {
  if (!isPlainObject(input)) {
    const got = input === null ? "null" : Array.isArray(input) ? "array" : input instanceof Map ? "Map" : typeof input;
    throw new RowShapeError(`Row must be a mapping of column name to string, got ${got}`, undefined, rowIndex);
  }
  const parsed = rowSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.map(String).join(".");
    throw new RowShapeError(
      `Row value for "${field ?? "?"}" must be a string (${issue?.message ?? "invalid"})`,
      field,
      rowIndex
    );
  }
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(parsed.data)) {
    const header = key.trim();
    if (!header) continue;
    out[header] = value;
  }
  return Object.freeze(out);
}

export function toRows(inputs: readonly unknown[]): Row[] {
  return inputs.map((input, i) => toRow(input, i));
}

/** Explicit lookup for a column that may be absent: missing keys read as "". */
export function cell(row: Row, field: string): string {
  return Object.prototype.hasOwnProperty.call(row, field) ? row[field] : "";
}

/** Copy a row with some columns replaced; new columns are appended at the end. */
export function withFields(row: Row, updates: Readonly<Record<string, string>>): Row {
  return Object.freeze({ ...row, ...updates });
}
