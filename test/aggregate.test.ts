/**
 * Tests for word counting under both case policies.
 */
import { describe, it, expect } from "vitest";
import { Aggregator } from "../src/core/aggregate.js";
import { Interner } from "../src/core/interner.js";

// Helper: record spellings through a shared interner
function recordAll(aggregator: Aggregator, words: string[]): void {
  const interner = new Interner();
  for (const w of words) aggregator.record(interner.intern(w));
}

const entries = (aggregator: Aggregator) =>
  [...aggregator.entries()].map((e) => ({ key: e.key, word: e.display.text, count: e.count }));

describe("Aggregator (case-insensitive)", () => {
  it("merges spellings that differ only in case", () => {
    const agg = new Aggregator();
    recordAll(agg, ["Foo", "foo"]);

    expect(agg.size).toBe(1);
    expect(entries(agg)).toEqual([{ key: "foo", word: "Foo", count: 2 }]);
  });

  it("displays the first spelling recorded", () => {
    const agg = new Aggregator(false);
    recordAll(agg, ["foo", "FOO", "Foo"]);

    expect(entries(agg)).toEqual([{ key: "foo", word: "foo", count: 3 }]);
  });

  it("merges sharp s with its upper-case expansion", () => {
    const agg = new Aggregator();
    recordAll(agg, ["straße", "STRASSE"]);

    expect(entries(agg)).toEqual([{ key: "strasse", word: "straße", count: 2 }]);
  });

  it("looks up counts ignoring case", () => {
    const agg = new Aggregator();
    recordAll(agg, ["Foo", "foo", "bar"]);

    expect(agg.countOf("FOO")).toBe(2);
    expect(agg.countOf("bar")).toBe(1);
    expect(agg.countOf("baz")).toBe(0);
  });
});

describe("Aggregator (case-sensitive)", () => {
  it("keeps differently-cased spellings apart", () => {
    const agg = new Aggregator(true);
    recordAll(agg, ["Foo", "foo"]);

    expect(agg.size).toBe(2);
    expect(entries(agg)).toEqual([
      { key: "Foo", word: "Foo", count: 1 },
      { key: "foo", word: "foo", count: 1 },
    ]);
  });

  it("looks up counts by exact spelling", () => {
    const agg = new Aggregator(true);
    recordAll(agg, ["Foo", "foo"]);

    expect(agg.countOf("Foo")).toBe(1);
    expect(agg.countOf("FOO")).toBe(0);
  });
});

describe("Aggregator totals", () => {
  it("starts empty", () => {
    const agg = new Aggregator();
    expect(agg.size).toBe(0);
    expect(agg.total).toBe(0);
    expect(entries(agg)).toEqual([]);
  });

  it("counts every occurrence", () => {
    const agg = new Aggregator();
    recordAll(agg, ["a", "a", "b", "A"]);

    expect(agg.total).toBe(4);
    expect(agg.size).toBe(2);
  });

  it("counts a re-recorded word instance each time", () => {
    const agg = new Aggregator();
    const word = new Interner().intern("again");
    agg.record(word);
    agg.record(word);
    agg.record(word);

    expect(agg.countOf("again")).toBe(3);
  });
});
