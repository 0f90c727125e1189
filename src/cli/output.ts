/**
 * Report output.
 */

import { renderReport, type ReportRow } from "../core/report.js";

/**
 * Write the report as one chunk, one `word: count` line per row.
 * Nothing is written for an empty report.
 */
export function writeReport(rows: readonly ReportRow[], write: (text: string) => void): void {
  const lines = renderReport(rows);
  if (lines.length === 0) return;
  write(lines.join("\n") + "\n");
}
