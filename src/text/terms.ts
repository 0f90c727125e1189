/**
 * Term scanning: splits text into alternating runs of word and symbol characters.
 *
 * Terms are views (offsets) into the scanned text. Copy a term's text out with
 * `termText` before the text is discarded.
 */

export type TermKind = "word" | "symbol";

export interface Term {
  kind: TermKind;
  /** UTF-16 offset of the first character */
  start: number;
  /** UTF-16 offset one past the last character */
  end: number;
}

/** A tokenization policy: any function producing terms that cover `text` exactly. */
export type TermScanner = (text: string) => Iterable<Term>;

const NON_ASCII_WORD_CHAR = /^[\p{Alphabetic}\p{N}]$/u;

/**
 * Word characters: Unicode letters (Alphabetic) and numbers, `_` and `'`.
 */
export function isWordChar(codePoint: number): boolean {
  if (codePoint < 0x80) {
    return (
      (codePoint >= 0x61 && codePoint <= 0x7a) || // a-z
      (codePoint >= 0x41 && codePoint <= 0x5a) || // A-Z
      (codePoint >= 0x30 && codePoint <= 0x39) || // 0-9
      codePoint === 0x5f || // _
      codePoint === 0x27 // '
    );
  }
  return NON_ASCII_WORD_CHAR.test(String.fromCodePoint(codePoint));
}

/** Code point starting at `i`; a lone surrogate is returned as itself. */
function codePointAt(text: string, i: number): number {
  const unit = text.charCodeAt(i);
  if (unit >= 0xd800 && unit <= 0xdbff && i + 1 < text.length) {
    const next = text.charCodeAt(i + 1);
    if (next >= 0xdc00 && next <= 0xdfff) {
      return (unit - 0xd800) * 0x400 + (next - 0xdc00) + 0x10000;
    }
  }
  return unit;
}

/**
 * Scan `text` into terms using the word-character rule.
 * Each term is a maximal run, so two adjacent terms never share a kind.
 */
export function* scanTerms(text: string): Generator<Term, void, undefined> {
  const n = text.length;
  let start = 0;

  while (start < n) {
    const first = codePointAt(text, start);
    const wordLike = isWordChar(first);
    let end = start + (first > 0xffff ? 2 : 1);

    while (end < n) {
      const cp = codePointAt(text, end);
      if (isWordChar(cp) !== wordLike) break;
      end += cp > 0xffff ? 2 : 1;
    }

    yield { kind: wordLike ? "word" : "symbol", start, end };
    start = end;
  }
}

/**
 * Copy a term's characters out of the scanned text.
 */
export function termText(text: string, term: Term): string {
  return text.slice(term.start, term.end);
}
