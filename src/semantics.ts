/**
 * Module: Header Semantics & Mapping
 * Purpose: Suggest catalog fields for headers the catalog does not know
 * (`Titre`, `mots-clés`, `Author`) with a confidence, so researchers can rename columns.
 */
import type { PropertyCatalog } from "./catalog.js";

interface FieldSynonyms {
  field: string;
  synonyms: string[];
}

const defs: FieldSynonyms[] = [
  { field: "title", synonyms: ["title", "titre", "name", "nom", "label", "intitule"] },
  { field: "alternative", synonyms: ["alternative", "alternative title", "subtitle", "sous titre", "titre alternatif"] },
  { field: "creator", synonyms: ["creator", "createur", "auteur", "author", "authors", "auteurs"] },
  { field: "contributor", synonyms: ["contributor", "contributeur", "contributors", "collaborator"] },
  { field: "type", synonyms: ["type", "resource type", "type de ressource", "coar type"] },
  { field: "description", synonyms: ["description", "abstract", "resume", "summary", "notes"] },
  { field: "keywords", synonyms: ["keywords", "keyword", "mots cles", "mot cle", "subject", "sujet", "tags"] },
  { field: "license", synonyms: ["license", "licence", "licensing"] },
  { field: "date", synonyms: ["date", "created", "creation date", "date de creation", "year", "annee"] },
  { field: "language", synonyms: ["language", "langue", "lang"] },
  { field: "temporal", synonyms: ["temporal", "period", "periode", "temporal coverage"] },
  { field: "spatial", synonyms: ["spatial", "place", "lieu", "location", "spatial coverage"] },
  { field: "accessRights", synonyms: ["access rights", "accessrights", "droits d acces", "access"] },
  { field: "rights", synonyms: ["rights", "droits", "copyright"] },
  { field: "publisher", synonyms: ["publisher", "editeur", "publisher name"] },
  { field: "coverage", synonyms: ["coverage", "couverture"] },
  { field: "relation", synonyms: ["relation", "related", "related resource"] },
  { field: "source", synonyms: ["source", "origin", "provenance"] },
  { field: "identifier", synonyms: ["identifier", "identifiant", "id", "doi", "handle"] },
];

const strongTokens = new Set(["title", "titre", "creator", "author", "auteur", "keywords", "license", "licence", "date", "language", "langue", "rights", "droits"]);
const secondaryTokens = new Set(["type", "coverage", "access"]);

// Accents folded so "mots-clés" and "mots cles" meet
const normalize = (s: string): string =>
  s
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/[^a-z0-9\s]/g, " ")
    .replace(/\s+/g, " ")
    .trim();

const tokenize = (s: string): string[] => normalize(s).split(" ").filter(Boolean);

const scoreHeader = (header: string, def: FieldSynonyms): number => {
  const norm = normalize(header);
  if (def.synonyms.includes(norm)) return 1.0;
  const hTokens = new Set(tokenize(header));
  let score = 0;
  for (const syn of def.synonyms) {
    for (const t of tokenize(syn)) {
      if (hTokens.has(t)) {
        score += strongTokens.has(t) ? 0.3 : secondaryTokens.has(t) ? 0.1 : 0.05;
      }
    }
  }
  return Math.max(0, Math.min(1, score));
};

export interface HeaderMappingHint {
  header: string;
  field?: string;
  confidence: number;
}

/**
 * Suggest a catalog field per header. Headers that resolve directly in the catalog
 * map to themselves with confidence 1; others take the best synonym score when it
 * reaches 0.6 and the field exists in the catalog.
 */
export function suggestHeaderMappings(headers: readonly string[], catalog: PropertyCatalog): HeaderMappingHint[] {
  const hints: HeaderMappingHint[] = [];
  for (const h of headers) {
    const direct = catalog.lookup(h);
    if (direct) {
      hints.push({ header: h, field: direct.field, confidence: 1 });
      continue;
    }
    let best: { field?: string; score: number } = { score: 0 };
    for (const def of defs) {
      if (!catalog.has(def.field)) continue;
      const s = scoreHeader(h, def);
      if (s > best.score) best = { field: def.field, score: s };
    }
    if (best.score >= 0.6) {
      hints.push({ header: h, field: best.field, confidence: best.score });
    } else {
      hints.push({ header: h, field: undefined, confidence: best.score });
    }
  }
  return hints;
}
