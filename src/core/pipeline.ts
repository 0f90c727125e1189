/**
 * Word count pipeline - explicit state for one counting run.
 *
 * Text flows through these stages:
 * 1. Scanning: split into word and symbol terms (per tokenizer policy)
 * 2. Interning: map each word spelling to its canonical instance
 * 3. Aggregation: count canonical words under the case policy
 * 4. Reporting: order the counting table into rows
 *
 * Symbol terms are dropped after stage 1.
 */
import type { ReportOrder, TokenizerPolicy, WordCountOptions } from "../config.js";
import { DEFAULT_OPTIONS } from "../config.js";
import { scanTerms, termText, type TermScanner } from "../text/terms.js";
import { segmentTerms } from "../text/segment.js";
import { Interner } from "./interner.js";
import { Aggregator } from "./aggregate.js";
import { buildReport, type ReportRow } from "./report.js";
import { createDebugLogger } from "../debug.js";

const debug = createDebugLogger("pipeline");

const SCANNERS: Record<TokenizerPolicy, TermScanner> = {
  "word-chars": scanTerms,
  unicode: segmentTerms,
};

export type PipelineConfig = Partial<Pick<WordCountOptions, "caseSensitive" | "tokenizer">>;

export class WordCountPipeline {
  readonly interner = new Interner();
  readonly aggregator: Aggregator;
  private readonly scan: TermScanner;

  constructor(config: PipelineConfig = {}) {
    const tokenizer = config.tokenizer ?? DEFAULT_OPTIONS.tokenizer;
    this.aggregator = new Aggregator(config.caseSensitive ?? DEFAULT_OPTIONS.caseSensitive);
    this.scan = SCANNERS[tokenizer];
    debug("tokenizer:", tokenizer, "caseSensitive:", this.aggregator.caseSensitive);
  }

  /**
   * Count every word in `text`.
   * @returns number of words recorded
   */
  ingest(text: string): number {
    let words = 0;
    for (const term of this.scan(text)) {
      if (term.kind !== "word") continue;
      this.aggregator.record(this.interner.intern(termText(text, term)));
      words++;
    }
    return words;
  }

  report(order: ReportOrder = DEFAULT_OPTIONS.order): ReportRow[] {
    debug("report:", this.aggregator.size, "distinct keys,", this.interner.size, "spellings");
    return buildReport(this.aggregator.entries(), order);
  }
}
