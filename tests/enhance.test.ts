import { describe, it, expect } from "vitest";
import {
  applyEnhancements,
  classifyContent,
  confidenceFor,
  proposedFieldsToCells,
  suggestEnhancements,
  summarizeEnhancements,
} from "../src/enhance.js";
import type { Row } from "../src/types.js";

const rows: Row[] = [
  { title: "Analysis scripts", file: "code/analysis.py", description: "" },
  { title: "Untitled thing", file: "", description: "" },
];

describe("classifyContent", () => {
  it("classifies analysis scripts as code", () => {
    expect(classifyContent("python script analysis")).toEqual({ contentType: "code", matches: 4, confidence: 50 });
  });

  it("is deterministic", () => {
    expect(classifyContent("Survey results.csv")).toEqual(classifyContent("Survey results.csv"));
  });

  it("returns undefined without keyword hits", () => {
    expect(classifyContent("hello")).toBeUndefined();
  });

  it("breaks ties in rule order", () => {
    expect(classifyContent("photo data")).toEqual({ contentType: "images", matches: 1, confidence: 16.7 });
  });

  it("caps confidence", () => {
    expect(classifyContent("images photo picture visual jpg png")).toEqual({
      contentType: "images",
      matches: 6,
      confidence: 95,
    });
    expect(confidenceFor(3, 3)).toBe(95);
  });
});

describe("suggestEnhancements", () => {
  it("suggests only for rows with hits", () => {
    const suggestions = suggestEnhancements(rows);
    expect(suggestions).toHaveLength(1);
    expect(suggestions[0]).toMatchObject({
      entryIndex: 0,
      originalTitle: "Analysis scripts",
      contentType: "code",
      confidence: 62.5,
    });
  });

  it("names untitled rows", () => {
    const [s] = suggestEnhancements([{ file: "slides.pptx" }]);
    expect(s.originalTitle).toBe("Untitled");
    expect(s.contentType).toBe("presentations");
  });

  it("summarizes the batch", () => {
    const summary = summarizeEnhancements(rows);
    expect(summary.totalEntries).toBe(2);
    expect(summary.enhancedEntries).toBe(1);
  });
});

describe("applyEnhancements", () => {
  it("replaces title, description and keywords of selected rows", () => {
    const out = applyEnhancements(rows, [0]);
    expect(out[0]).toEqual({
      title: "fr:Scripts d'Analyse Professionnels|en:Professional Analysis Scripts",
      file: "code/analysis.py",
      description:
        "fr:Scripts Python et R optimisés pour l'analyse de données de recherche avec documentation complète|en:Optimized Python and R scripts for research data analysis with complete documentation",
      keywords: "fr:code;scripts;analyse;recherche;python;r|en:code;scripts;analysis;research;python;r",
    });
    expect(out[1]).toBe(rows[1]);
  });

  it("leaves the input untouched", () => {
    applyEnhancements(rows, [0]);
    expect(rows[0].title).toBe("Analysis scripts");
    expect(rows[0]).not.toHaveProperty("keywords");
  });

  it("gives the same result on repeated calls", () => {
    expect(applyEnhancements(rows, [0, 0])).toEqual(applyEnhancements(rows, [0]));
  });

  it("ignores unknown indices", () => {
    const out = applyEnhancements(rows, [5]);
    expect(out).toEqual(rows);
    expect(out).not.toBe(rows);
  });
});

describe("proposedFieldsToCells", () => {
  it("renders fields in cell conventions", () => {
    expect(
      proposedFieldsToCells({
        title: [{ lang: "en", text: "T" }],
        description: [],
        keywords: [
          { lang: "en", text: "a" },
          { lang: "en", text: "b" },
        ],
      })
    ).toEqual({ title: "en:T", description: "", keywords: "en:a;b" });
  });
});
