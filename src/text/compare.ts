/**
 * String ordering and case folding shared by the aggregator and reporter.
 */

/**
 * Shift a UTF-16 code unit so that unit order matches code point order:
 * surrogates (supplementary planes) sort after U+E000..U+FFFF.
 */
function fixup(unit: number): number {
  if (unit >= 0xe000) return unit - 0x800;
  if (unit >= 0xd800) return unit + 0x2000;
  return unit;
}

/**
 * Compare two strings by Unicode code point (the same order as comparing their UTF-8 bytes).
 * Plain `<` compares UTF-16 code units, which misorders astral characters against U+E000..U+FFFF.
 */
export function compareCodePoints(a: string, b: string): number {
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    const ca = a.charCodeAt(i);
    const cb = b.charCodeAt(i);
    if (ca !== cb) return fixup(ca) - fixup(cb);
  }
  return a.length - b.length;
}

/**
 * Case-fold a word for case-insensitive grouping.
 * Upper-casing first expands characters such as `ß` to `SS`, so `straße` and `STRASSE` fold alike.
 */
export function foldCase(word: string): string {
  return word.toUpperCase().toLowerCase();
}

/** Display width of a word, counted in code points. */
export function displayWidth(word: string): number {
  let width = 0;
  for (let i = 0; i < word.length; i++) {
    const unit = word.charCodeAt(i);
    // a high surrogate followed by a low one is a single code point
    if (unit >= 0xd800 && unit <= 0xdbff && i + 1 < word.length) {
      const next = word.charCodeAt(i + 1);
      if (next >= 0xdc00 && next <= 0xdfff) i++;
    }
    width++;
  }
  return width;
}

/** Pad `word` on the left with spaces up to `width` code points. */
export function alignRight(word: string, width: number): string {
  const pad = width - displayWidth(word);
  return pad > 0 ? " ".repeat(pad) + word : word;
}
