/**
 * Run summary formatting.
 */

import type { RunSummary } from "../core/run.js";
import { c } from "./colors.js";

function plural(n: number, one: string, many = `${one}s`): string {
  return `${n} ${n === 1 ? one : many}`;
}

export function formatSummary(summary: RunSummary): string {
  const parts: string[] = [`${c.bold}${plural(summary.filesRead, "file")}${c.reset} read`];

  if (summary.filesSkipped > 0) {
    parts.push(`${c.yellow}${summary.filesSkipped}${c.reset} skipped`);
  }

  if (summary.entriesSkipped > 0) {
    parts.push(`${c.yellow}${plural(summary.entriesSkipped, "entry", "entries")}${c.reset} ignored`);
  }

  parts.push(plural(summary.words, "word"), `${summary.distinctWords} distinct`);
  return parts.join(", ");
}
