/**
 * Module: Resource Type Assistance
 * Purpose: Help researchers pick a COAR resource type and start from a filled-in
 * row for common kinds of deposit.
 */
import { COAR_RESOURCE_TYPE_NAMESPACE } from "./config.js";
import type { Row } from "./types.js";

export interface ResourceTypeOption {
  uri: string;
  label: string;
  description: string;
  keywords: string[];
}

export interface ResourceTypeSuggestion extends ResourceTypeOption {
  score: number;
}

export const COAR_RESOURCE_TYPES: readonly ResourceTypeOption[] = [
  {
    uri: `${COAR_RESOURCE_TYPE_NAMESPACE}c_ddb1`,
    label: "Dataset",
    description: "Research data, CSV files, survey results",
    keywords: ["data", "données", "csv", "results", "survey"],
  },
  {
    uri: `${COAR_RESOURCE_TYPE_NAMESPACE}c_5ce6`,
    label: "Software",
    description: "Code, scripts, programs, R/Python files",
    keywords: ["code", "script", "program", "python", "r", ".py", ".r"],
  },
  {
    uri: `${COAR_RESOURCE_TYPE_NAMESPACE}c_18cf`,
    label: "Text",
    description: "Documents, papers, reports, documentation",
    keywords: ["document", "paper", "report", "text", ".pdf", ".md"],
  },
  {
    uri: `${COAR_RESOURCE_TYPE_NAMESPACE}c_c513`,
    label: "Image",
    description: "Photos, figures, diagrams, visualizations",
    keywords: ["image", "photo", "figure", ".jpg", ".png", "visual"],
  },
  {
    uri: `${COAR_RESOURCE_TYPE_NAMESPACE}c_8544`,
    label: "Lecture",
    description: "Presentations, slides, conference materials",
    keywords: ["presentation", "slides", "lecture", "conference"],
  },
];

/**
 * Top three types for a free-text hint, by keyword hits (substring, case-insensitive).
 * Equal scores keep declaration order; an empty hint returns the first three.
 */
export function suggestResourceTypes(hint = "", limit = 3): ResourceTypeSuggestion[] {
  const lower = hint.toLowerCase();
  const scored = COAR_RESOURCE_TYPES.map((option) => ({
    ...option,
    keywords: [...option.keywords],
    score: lower ? option.keywords.filter((k) => lower.includes(k.toLowerCase())).length : 0,
  }));
  // Array.prototype.sort is stable, so ties stay in declaration order
  scored.sort((a, b) => b.score - a.score);
  return scored.slice(0, limit);
}

export type TemplateKind = "research_paper" | "dataset" | "code";

const TEMPLATES: Record<TemplateKind, Row> = {
  research_paper: {
    title: "fr:Titre de l'article de recherche|en:Research paper title",
    description: "fr:Résumé détaillé de la recherche et méthodologie|en:Detailed research abstract and methodology",
    keywords: "fr:recherche;méthodologie;analyse|en:research;methodology;analysis",
    type: `${COAR_RESOURCE_TYPE_NAMESPACE}c_18cf`,
  },
  dataset: {
    title: "fr:Jeu de données de recherche|en:Research dataset",
    description:
      "fr:Description des données collectées et méthodes de collecte|en:Description of collected data and collection methods",
    keywords: "fr:données;recherche;analyse|en:data;research;analysis",
    type: `${COAR_RESOURCE_TYPE_NAMESPACE}c_ddb1`,
  },
  code: {
    title: "fr:Scripts d'analyse et code source|en:Analysis scripts and source code",
    description: "fr:Scripts pour le traitement et l'analyse des données|en:Scripts for data processing and analysis",
    keywords: "fr:code;programmation;scripts;analyse|en:code;programming;scripts;analysis",
    type: `${COAR_RESOURCE_TYPE_NAMESPACE}c_5ce6`,
  },
};

export function getMetadataTemplate(kind: TemplateKind): Row {
  return { ...TEMPLATES[kind] };
}
