import { describe, it, expect } from "vitest";
import {
  formatKeywordField,
  formatMultilingualField,
  languagesOf,
  parseMultilingualField,
  splitTerms,
} from "../src/multilingual.js";

describe("parseMultilingualField", () => {
  it("splits tagged segments in order", () => {
    expect(parseMultilingualField("fr:Titre|en:Title")).toEqual([
      { lang: "fr", text: "Titre" },
      { lang: "en", text: "Title" },
    ]);
  });

  it("drops empty segments", () => {
    expect(parseMultilingualField("fr:A||en:B")).toEqual([
      { lang: "fr", text: "A" },
      { lang: "en", text: "B" },
    ]);
  });

  it("treats untagged segments as undetermined", () => {
    expect(parseMultilingualField("en")).toEqual([{ lang: "und", text: "en" }]);
  });

  it("falls back to undetermined when the tag before the colon is empty", () => {
    expect(parseMultilingualField(":value")).toEqual([{ lang: "und", text: "value" }]);
  });

  it("returns nothing for empty or blank input", () => {
    expect(parseMultilingualField("")).toEqual([]);
    expect(parseMultilingualField("   ")).toEqual([]);
    expect(parseMultilingualField("|  |")).toEqual([]);
  });

  it("trims tags and text", () => {
    expect(parseMultilingualField(" fr : Bonjour | en:Hello ")).toEqual([
      { lang: "fr", text: "Bonjour" },
      { lang: "en", text: "Hello" },
    ]);
  });

  it("splits on the first colon only", () => {
    expect(parseMultilingualField("en:Time: 10:00")).toEqual([{ lang: "en", text: "Time: 10:00" }]);
  });

  it("drops a tag with no text", () => {
    expect(parseMultilingualField("fr:|en:Title")).toEqual([{ lang: "en", text: "Title" }]);
  });

  it("is deterministic", () => {
    const input = "fr:Données|en:Data|de:Daten";
    expect(parseMultilingualField(input)).toEqual(parseMultilingualField(input));
    expect(parseMultilingualField(input)).toHaveLength(3);
  });
});

describe("splitTerms", () => {
  it("splits on semicolons and drops blanks", () => {
    expect(splitTerms(" a ; ;b;")).toEqual(["a", "b"]);
  });
});

describe("formatting", () => {
  it("renders pairs back to the cell convention", () => {
    expect(
      formatMultilingualField([
        { lang: "fr", text: "Titre" },
        { lang: "en", text: "Title" },
      ])
    ).toBe("fr:Titre|en:Title");
  });

  it("prefixes untagged text containing a colon so it parses back untagged", () => {
    const cell = formatMultilingualField([{ lang: "und", text: "Note: draft" }]);
    expect(cell).toBe(":Note: draft");
    expect(parseMultilingualField(cell)).toEqual([{ lang: "und", text: "Note: draft" }]);
  });

  it("groups keyword terms by language in first-seen order", () => {
    expect(
      formatKeywordField([
        { lang: "fr", text: "a" },
        { lang: "en", text: "x" },
        { lang: "fr", text: "b" },
      ])
    ).toBe("fr:a;b|en:x");
  });

  it("lists languages once each", () => {
    expect(languagesOf("fr:a|en:b|fr:c|plain")).toEqual(["fr", "en", "und"]);
  });
});
