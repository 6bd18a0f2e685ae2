import type { PersonRecord } from "./types.js";

/**
 * Split a creator/contributor cell (`Surname,Given;Surname2,Given2` or a bare
 * organization name) into person records.
 * - Exactly one comma: `surname, givenname`.
 * - No comma, or more than one: the trimmed piece is kept as a full name.
 * Empty pieces are dropped; never throws.
 */
export function parsePersonNames(raw: string): PersonRecord[] {
  const out: PersonRecord[] = [];
  if (!raw) return out;
  for (const piece of raw.split(";")) {
    const name = piece.trim();
    if (!name) continue;
    const commas = name.split(",").length - 1;
    if (commas === 1) {
      const [surname, givenname] = name.split(",");
      out.push({ kind: "person", surname: surname.trim(), givenname: givenname.trim() });
    } else {
      out.push({ kind: "organization", fullname: name });
    }
  }
  return out;
}

/** Stable display form: `Surname, Given` (blank parts omitted) or the full name. */
export function formatPersonRecord(record: PersonRecord): string {
  if (record.kind === "organization") return record.fullname;
  return [record.surname, record.givenname].filter(Boolean).join(", ");
}
