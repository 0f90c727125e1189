/**
 * One counting run over a directory tree.
 *
 * Files are processed one at a time: read → scan → intern → count. A file that
 * can't be opened, read or decoded is reported through `onWarning` and skipped;
 * the words of every other file still count.
 */

import type { WordCountOptions } from "../config.js";
import { DEFAULT_OPTIONS } from "../config.js";
import { WordCountPipeline } from "./pipeline.js";
import type { ReportRow } from "./report.js";
import { FileReader } from "../fs/reader.js";
import { walkFiles, type WarningHandler } from "../fs/walk.js";
import { createDebugLogger, createTimer } from "../debug.js";

const debug = createDebugLogger("run");

export interface RunOptions extends Partial<WordCountOptions> {
  /** Directory to scan */
  root: string;
  onWarning: WarningHandler;
  /** Initial size of the shared read buffer (bytes) */
  readBufferSize?: number;
}

export interface RunSummary {
  filesRead: number;
  /** Files that could not be opened, read or decoded */
  filesSkipped: number;
  /** Directory entries skipped during traversal */
  entriesSkipped: number;
  /** Word occurrences counted */
  words: number;
  /** Distinct count keys */
  distinctWords: number;
}

export interface RunResult {
  rows: ReportRow[];
  summary: RunSummary;
}

/**
 * Count the words of every readable file under `options.root`.
 * @throws NotADirectoryError if the root is not a directory
 */
export function countWords(options: RunOptions): RunResult {
  const timer = createTimer(options.root);
  const pipeline = new WordCountPipeline(options);
  const reader = new FileReader(options.readBufferSize);

  const summary: RunSummary = {
    filesRead: 0,
    filesSkipped: 0,
    entriesSkipped: 0,
    words: 0,
    distinctWords: 0,
  };

  const onEntryWarning: WarningHandler = (warning) => {
    summary.entriesSkipped++;
    options.onWarning(warning);
  };

  timer.time("count", () => {
    for (const path of walkFiles(options.root, onEntryWarning)) {
      const result = reader.read(path);
      if (!result.ok) {
        summary.filesSkipped++;
        options.onWarning(result.error);
        continue;
      }
      const words = pipeline.ingest(result.text);
      debug("read", path, `${result.bytes} bytes, ${words} words`);
      summary.filesRead++;
      summary.words += words;
    }
  });

  const rows = timer.time("report", () => pipeline.report(options.order ?? DEFAULT_OPTIONS.order));
  summary.distinctWords = rows.length;
  timer.done();

  return { rows, summary };
}
