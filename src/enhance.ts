import { formatKeywordField, formatMultilingualField } from "./multilingual.js";
import { cell, withFields } from "./row.js";
import { logger } from "./logger.js";
import type { ContentType, EnhancementSuggestion, LocalizedText, ProposedFields, Row } from "./types.js";

export interface ContentTypeRule {
  id: ContentType;
  label: string;
  keywords: string[];
  enhanced: {
    title: LocalizedText[];
    description: LocalizedText[];
    keywords: LocalizedText[];
  };
}

const terms = (lang: string, list: string[]): LocalizedText[] => list.map((text) => ({ lang, text }));

/**
 * Content-type rules in tie-break order. Keywords are matched as substrings of the
 * lower-cased title/file/description blob, so short tokens such as "r" match widely.
 */
export const CONTENT_TYPE_RULES: readonly ContentTypeRule[] = [
  {
    id: "images",
    label: "Images",
    keywords: ["images", "photo", "picture", "visual", "jpg", "png"],
    enhanced: {
      title: [
        { lang: "fr", text: "Images de Site Web Optimisées" },
        { lang: "en", text: "Optimized Website Images" },
      ],
      description: [
        { lang: "fr", text: "Collection d'images photographiques professionnelles pour documentation de site" },
        { lang: "en", text: "Collection of professional photographic images for site documentation" },
      ],
      keywords: [
        ...terms("fr", ["images", "photographie", "site", "documentation"]),
        ...terms("en", ["images", "photography", "site", "documentation"]),
      ],
    },
  },
  {
    id: "code",
    label: "Code",
    keywords: ["code", "script", "python", "r", "analysis", ".py", ".r", "programming"],
    enhanced: {
      title: [
        { lang: "fr", text: "Scripts d'Analyse Professionnels" },
        { lang: "en", text: "Professional Analysis Scripts" },
      ],
      description: [
        { lang: "fr", text: "Scripts Python et R optimisés pour l'analyse de données de recherche avec documentation complète" },
        { lang: "en", text: "Optimized Python and R scripts for research data analysis with complete documentation" },
      ],
      keywords: [
        ...terms("fr", ["code", "scripts", "analyse", "recherche", "python", "r"]),
        ...terms("en", ["code", "scripts", "analysis", "research", "python", "r"]),
      ],
    },
  },
  {
    id: "presentations",
    label: "Presentations",
    keywords: ["presentation", "slide", "conference", "meeting", "ppt", "pptx"],
    enhanced: {
      title: [
        { lang: "fr", text: "Matériaux de Présentation Académiques" },
        { lang: "en", text: "Academic Presentation Materials" },
      ],
      description: [
        { lang: "fr", text: "Supports de communication pour conférences et réunions académiques professionnels" },
        { lang: "en", text: "Professional communication materials for academic conferences and meetings" },
      ],
      keywords: [
        ...terms("fr", ["présentations", "académique", "conférences", "communication"]),
        ...terms("en", ["presentations", "academic", "conferences", "communication"]),
      ],
    },
  },
  {
    id: "documents",
    label: "Documents",
    keywords: ["document", "paper", "report", "protocol", "methodology", ".doc", ".pdf", ".md"],
    enhanced: {
      title: [
        { lang: "fr", text: "Documentation de Recherche Complète" },
        { lang: "en", text: "Complete Research Documentation" },
      ],
      description: [
        { lang: "fr", text: "Documentation académique exhaustive incluant protocoles, méthodologie et analyses" },
        { lang: "en", text: "Comprehensive academic documentation including protocols, methodology and analyses" },
      ],
      keywords: [
        ...terms("fr", ["documentation", "recherche", "protocoles", "méthodologie"]),
        ...terms("en", ["documentation", "research", "protocols", "methodology"]),
      ],
    },
  },
  {
    id: "data",
    label: "Data",
    keywords: ["data", "dataset", "survey", "results", "csv", "excel", "statistics"],
    enhanced: {
      title: [
        { lang: "fr", text: "Données de Recherche Validées" },
        { lang: "en", text: "Validated Research Data" },
      ],
      description: [
        { lang: "fr", text: "Jeux de données collectés, traités et validés pour analyse statistique approfondie" },
        { lang: "en", text: "Data sets collected, processed and validated for in-depth statistical analysis" },
      ],
      keywords: [
        ...terms("fr", ["données", "recherche", "analyse", "statistiques", "validé"]),
        ...terms("en", ["data", "research", "analysis", "statistics", "validated"]),
      ],
    },
  },
];

export const CONTENT_TYPE_INDEX: Record<ContentType, ContentTypeRule> = CONTENT_TYPE_RULES.reduce(
  (acc, r) => {
    acc[r.id] = r;
    return acc;
  },
  {} as Record<ContentType, ContentTypeRule>
);

// Heuristic ceiling: a keyword match is never certain
const MAX_CONFIDENCE = 95;

export interface ContentClassification {
  contentType: ContentType;
  matches: number;
  confidence: number;
}

const countMatches = (blob: string, keywords: readonly string[]): number =>
  keywords.reduce((n, k) => (blob.includes(k) ? n + 1 : n), 0);

export const confidenceFor = (matches: number, keywordCount: number): number =>
  Math.round(Math.min((matches / keywordCount) * 100, MAX_CONFIDENCE) * 10) / 10;

/**
 * Pick the rule with the most keyword hits. Ties keep the earlier rule; no hits
 * means no classification.
 */
export function classifyContent(text: string): ContentClassification | undefined {
  const blob = text.toLowerCase();
  let best: ContentTypeRule | undefined;
  let bestScore = 0;
  for (const rule of CONTENT_TYPE_RULES) {
    const score = countMatches(blob, rule.keywords);
    if (score > bestScore) {
      bestScore = score;
      best = rule;
    }
  }
  if (!best) return undefined;
  return { contentType: best.id, matches: bestScore, confidence: confidenceFor(bestScore, best.keywords.length) };
}

const contentBlob = (row: Row): string =>
  `${cell(row, "title")} ${cell(row, "file")} ${cell(row, "description")}`.toLowerCase();

const proposedFor = (rule: ContentTypeRule): ProposedFields => ({
  title: rule.enhanced.title.map((t) => ({ ...t })),
  description: rule.enhanced.description.map((t) => ({ ...t })),
  keywords: rule.enhanced.keywords.map((t) => ({ ...t })),
});

export function suggestEnhancements(rows: readonly Row[]): EnhancementSuggestion[] {
  const suggestions: EnhancementSuggestion[] = [];
  rows.forEach((row, entryIndex) => {
    const hit = classifyContent(contentBlob(row));
    if (!hit) return;
    suggestions.push({
      entryIndex,
      originalTitle: cell(row, "title") || "Untitled",
      contentType: hit.contentType,
      proposedFields: proposedFor(CONTENT_TYPE_INDEX[hit.contentType]),
      confidence: hit.confidence,
    });
  });
  return suggestions;
}

export interface EnhancementSummary {
  totalEntries: number;
  enhancedEntries: number;
  suggestions: EnhancementSuggestion[];
}

export function summarizeEnhancements(rows: readonly Row[]): EnhancementSummary {
  const suggestions = suggestEnhancements(rows);
  return { totalEntries: rows.length, enhancedEntries: suggestions.length, suggestions };
}

/** Render proposed fields as row cells in the multilingual conventions. */
export function proposedFieldsToCells(fields: ProposedFields): { title: string; description: string; keywords: string } {
  return {
    title: formatMultilingualField(fields.title),
    description: formatMultilingualField(fields.description),
    keywords: formatKeywordField(fields.keywords),
  };
}

/**
 * Merge selected suggestions into a copy of `rows`. `selectedIndices` index the
 * output of `suggestEnhancements(rows)`; out-of-range indices are ignored.
 * Only title, description and keywords change; the input array and rows are
 * left as they were, so repeated calls with the same input give the same result.
 */
export function applyEnhancements(rows: readonly Row[], selectedIndices: readonly number[]): Row[] {
  const suggestions = suggestEnhancements(rows);
  const out = [...rows];
  for (const index of new Set(selectedIndices)) {
    const suggestion = suggestions[index];
    if (!suggestion) {
      logger.enhancer.warn("Ignoring unknown suggestion index", { index, available: suggestions.length });
      continue;
    }
    const target = out[suggestion.entryIndex];
    out[suggestion.entryIndex] = withFields(target, proposedFieldsToCells(suggestion.proposedFields));
  }
  return out;
}
