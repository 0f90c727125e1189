/**
 * Report ordering and rendering.
 *
 * Two orders are supported:
 * - lexicographic: ascending by count key (code point order)
 * - frequency: descending by count, ties ascending by count key
 */

import type { ReportOrder } from "../config.js";
import type { CountEntry } from "./aggregate.js";
import { alignRight, compareCodePoints, displayWidth } from "../text/compare.js";

export interface ReportRow {
  word: string;
  count: number;
}

type Comparator = (a: Readonly<CountEntry>, b: Readonly<CountEntry>) => number;

const byKey: Comparator = (a, b) => compareCodePoints(a.key, b.key);

const byFrequency: Comparator = (a, b) => b.count - a.count || byKey(a, b);

/**
 * Order the counting table's entries into report rows.
 */
export function buildReport(entries: Iterable<Readonly<CountEntry>>, order: ReportOrder): ReportRow[] {
  const sorted = Array.from(entries).sort(order === "frequency" ? byFrequency : byKey);
  return sorted.map((e) => ({ word: e.display.text, count: e.count }));
}

/**
 * Render rows as `word: count` lines, words right-aligned to the widest word.
 */
export function renderReport(rows: readonly ReportRow[]): string[] {
  let width = 0;
  for (const row of rows) {
    width = Math.max(width, displayWidth(row.word));
  }
  return rows.map((row) => `${alignRight(row.word, width)}: ${row.count}`);
}
