import type { Row } from "./types.js";

export type Delimiter = "," | ";" | "\t";

/**
 * Split CSV text into records with a small state machine: quoted fields may hold
 * delimiters, doubled quotes and line breaks; CR outside quotes is ignored.
 */
export function parseCsvRaw(csvText: string, delimiter: Delimiter = ","): string[][] {
  const text = csvText.charCodeAt(0) === 0xfeff ? csvText.slice(1) : csvText;
  const rows: string[][] = [];
  let current: string[] = [];
  let field = "";
  let inQuotes = false;

  const pushField = () => {
    current.push(field);
    field = "";
  };
  const pushRow = () => {
    rows.push(current);
    current = [];
  };

  for (let i = 0; i < text.length; i++) {
    const c = text[i];
    if (inQuotes) {
      if (c === `"`) {
        if (text[i + 1] === `"`) {
          field += `"`;
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        field += c;
      }
    } else if (c === `"`) {
      inQuotes = true;
    } else if (c === delimiter) {
      pushField();
    } else if (c === "\n") {
      pushField();
      pushRow();
    } else if (c !== "\r") {
      field += c;
    }
  }
  pushField();
  pushRow();
  return rows.filter((r) => r.some((v) => v.trim() !== ""));
}

/**
 * Guess the delimiter from the header line: the candidate that splits it into the
 * most columns wins, comma on ties.
 */
export function detectDelimiter(csvText: string): Delimiter {
  const firstLine = csvText.split(/\r?\n/, 1)[0] ?? "";
  const candidates: Delimiter[] = [",", ";", "\t"];
  let best: Delimiter = ",";
  let bestCount = 0;
  for (const d of candidates) {
    const count = firstLine.split(d).length - 1;
    if (count > bestCount) {
      best = d;
      bestCount = count;
    }
  }
  return best;
}

/**
 * Parse CSV text into rows keyed by the trimmed header cells. Missing trailing
 * cells read as "", blank headers are skipped.
 */
export function parseCsvToRows(csvText: string, delimiter: Delimiter = detectDelimiter(csvText)): Row[] {
  const raw = parseCsvRaw(csvText, delimiter);
  const headers = raw[0]?.map((h) => h.trim()) ?? [];
  const out: Row[] = [];
  for (let r = 1; r < raw.length; r++) {
    const values = raw[r];
    const obj: Record<string, string> = {};
    headers.forEach((h, idx) => {
      if (!h) return;
      obj[h] = values[idx] ?? "";
    });
    out.push(Object.freeze(obj));
  }
  return out;
}
