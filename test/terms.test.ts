/**
 * Tests for the word-character term scanner.
 */
import { describe, it, expect } from "vitest";
import { isWordChar, scanTerms, termText, type Term, type TermKind } from "../src/text/terms.js";

// Helper: scan and keep [kind, text] pairs
const scan = (text: string): Array<[TermKind, string]> =>
  [...scanTerms(text)].map((t) => [t.kind, termText(text, t)]);

const cp = (ch: string): number => ch.codePointAt(0) ?? -1;

describe("isWordChar", () => {
  it("accepts ASCII letters, digits, underscore and apostrophe", () => {
    for (const ch of ["a", "z", "A", "Z", "0", "9", "_", "'"]) {
      expect(isWordChar(cp(ch))).toBe(true);
    }
  });

  it("rejects ASCII punctuation and whitespace", () => {
    for (const ch of [" ", "\n", "\t", ".", "-", "(", ";", '"', "`"]) {
      expect(isWordChar(cp(ch))).toBe(false);
    }
  });

  it("accepts non-ASCII letters and numbers", () => {
    expect(isWordChar(cp("é"))).toBe(true);
    expect(isWordChar(cp("ж"))).toBe(true);
    expect(isWordChar(cp("日"))).toBe(true);
    expect(isWordChar(cp("٣"))).toBe(true); // Arabic-Indic digit three
    expect(isWordChar(cp("½"))).toBe(true);
    expect(isWordChar(cp("𝒳"))).toBe(true);
  });

  it("rejects typographic quotes and emoji", () => {
    expect(isWordChar(cp("’"))).toBe(false);
    expect(isWordChar(cp("😀"))).toBe(false);
  });
});

describe("scanTerms", () => {
  it("splits identifiers and punctuation", () => {
    expect(scan("_abc.words();")).toEqual([
      ["word", "_abc"],
      ["symbol", "."],
      ["word", "words"],
      ["symbol", "();"],
    ]);
  });

  it("yields nothing for empty input", () => {
    expect(scan("")).toEqual([]);
  });

  it("keeps apostrophes inside words", () => {
    expect(scan("can't stop")).toEqual([
      ["word", "can't"],
      ["symbol", " "],
      ["word", "stop"],
    ]);
  });

  it("keeps leading and trailing whitespace as symbols", () => {
    expect(scan("  hi  ")).toEqual([
      ["symbol", "  "],
      ["word", "hi"],
      ["symbol", "  "],
    ]);
  });

  it("yields a single symbol for symbol-only input", () => {
    expect(scan("!!! ... ;;;")).toEqual([["symbol", "!!! ... ;;;"]]);
  });

  it("handles accented and non-Latin words", () => {
    expect(scan("naïve café, жизнь")).toEqual([
      ["word", "naïve"],
      ["symbol", " "],
      ["word", "café"],
      ["symbol", ", "],
      ["word", "жизнь"],
    ]);
  });

  it("never splits a surrogate pair", () => {
    const text = "a😀b 𝒳y!";
    const terms = [...scanTerms(text)];
    expect(terms).toEqual<Term[]>([
      { kind: "word", start: 0, end: 1 },
      { kind: "symbol", start: 1, end: 3 },
      { kind: "word", start: 3, end: 4 },
      { kind: "symbol", start: 4, end: 5 },
      { kind: "word", start: 5, end: 8 },
      { kind: "symbol", start: 8, end: 9 },
    ]);
  });

  it("treats a lone surrogate as a symbol", () => {
    expect(scan("\uD800a")).toEqual([
      ["symbol", "\uD800"],
      ["word", "a"],
    ]);
  });

  it("covers the input exactly with alternating non-empty terms", () => {
    const samples = [
      "The quick brown fox; jumps over 13 lazy dogs!",
      "  line one\nline_two\t'quoted'  ",
      "a😀b 𝒳y! ½ x.y",
      "!!!",
      "word",
    ];

    for (const text of samples) {
      const terms = [...scanTerms(text)];
      expect(terms.map((t) => termText(text, t)).join("")).toBe(text);
      for (let i = 0; i < terms.length; i++) {
        expect(terms[i].end).toBeGreaterThan(terms[i].start);
        if (i > 0) {
          expect(terms[i].start).toBe(terms[i - 1].end);
          expect(terms[i].kind).not.toBe(terms[i - 1].kind);
        }
      }
    }
  });
});
