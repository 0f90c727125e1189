/**
 * Term scanning on Unicode word boundaries (UAX #29), using Intl.Segmenter.
 *
 * Word-like segments become word terms. Everything between them (spaces,
 * punctuation, emoji) is merged into a single symbol term. Two words may abut,
 * e.g. in CJK text where the segmenter splits a run of ideographs.
 */

import type { Term } from "./terms.js";

const segmenter = new Intl.Segmenter("en", { granularity: "word" });

export function* segmentTerms(text: string): Generator<Term, void, undefined> {
  let symbolStart = -1;

  for (const { segment, index, isWordLike } of segmenter.segment(text)) {
    if (isWordLike) {
      if (symbolStart >= 0) {
        yield { kind: "symbol", start: symbolStart, end: index };
        symbolStart = -1;
      }
      yield { kind: "word", start: index, end: index + segment.length };
    } else if (symbolStart < 0) {
      symbolStart = index;
    }
  }

  if (symbolStart >= 0) {
    yield { kind: "symbol", start: symbolStart, end: text.length };
  }
}
