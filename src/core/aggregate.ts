/**
 * Word counting under a case policy.
 *
 * Case-sensitive: the count key is the exact spelling.
 * Case-insensitive: the count key is the case-folded spelling, and the entry
 * displays the first spelling recorded for that key.
 */

import type { CanonicalWord } from "./interner.js";
import { foldCase } from "../text/compare.js";

export interface CountEntry {
  /** Count key: exact or case-folded spelling */
  key: string;
  /** Spelling shown in the report */
  display: CanonicalWord;
  count: number;
}

export class Aggregator {
  private readonly byKey = new Map<string, CountEntry>();
  /** Identity cache: each interned word resolves its entry once */
  private readonly byWord = new Map<CanonicalWord, CountEntry>();
  private recorded = 0;

  constructor(readonly caseSensitive = false) {}

  /** Count key for a spelling under the active case policy. */
  keyOf(text: string): string {
    return this.caseSensitive ? text : foldCase(text);
  }

  record(word: CanonicalWord): void {
    let entry = this.byWord.get(word);
    if (entry === undefined) {
      const key = this.keyOf(word.text);
      entry = this.byKey.get(key);
      if (entry === undefined) {
        entry = { key, display: word, count: 0 };
        this.byKey.set(key, entry);
      }
      this.byWord.set(word, entry);
    }
    entry.count++;
    this.recorded++;
  }

  /** Count for `text` under the active case policy, 0 if never recorded. */
  countOf(text: string): number {
    return this.byKey.get(this.keyOf(text))?.count ?? 0;
  }

  entries(): IterableIterator<Readonly<CountEntry>> {
    return this.byKey.values();
  }

  /** Number of distinct count keys. */
  get size(): number {
    return this.byKey.size;
  }

  /** Number of recorded occurrences. */
  get total(): number {
    return this.recorded;
  }
}
