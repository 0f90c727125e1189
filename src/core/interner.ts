/**
 * Word interning.
 *
 * Every distinct spelling maps to one frozen CanonicalWord object, so later
 * stages can key maps by object identity instead of re-hashing text.
 * Entries live as long as the Interner (one run); nothing is evicted.
 */

export interface CanonicalWord {
  readonly text: string;
}

/**
 * Copy `spelling` out of the text it was sliced from, so a stored entry never
 * keeps a whole file's text alive. Concatenation flattens into new storage.
 */
function ownedCopy(spelling: string): string {
  return (" " + spelling).slice(1);
}

export class Interner {
  private readonly words = new Map<string, CanonicalWord>();

  /**
   * Return the canonical instance for `spelling`, creating it on first sight.
   * Equal spellings always yield the same object.
   */
  intern(spelling: string): CanonicalWord {
    const existing = this.words.get(spelling);
    if (existing !== undefined) return existing;

    const text = ownedCopy(spelling);
    const word: CanonicalWord = Object.freeze({ text });
    this.words.set(text, word);
    return word;
  }

  has(spelling: string): boolean {
    return this.words.has(spelling);
  }

  /** Number of distinct spellings seen. */
  get size(): number {
    return this.words.size;
  }

  values(): IterableIterator<CanonicalWord> {
    return this.words.values();
  }
}
