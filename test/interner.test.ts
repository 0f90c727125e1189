/**
 * Tests for word interning.
 */
import { describe, it, expect } from "vitest";
import { Interner } from "../src/core/interner.js";

describe("Interner", () => {
  it("returns the same instance for the same spelling", () => {
    const interner = new Interner();
    const first = interner.intern("hello");
    const second = interner.intern("hello");

    expect(second).toBe(first);
    expect(first.text).toBe("hello");
  });

  it("returns the same instance for spellings sliced from different texts", () => {
    const interner = new Interner();
    const a = interner.intern("hello world".slice(0, 5));
    const b = interner.intern("say hello".slice(4));

    expect(b).toBe(a);
  });

  it("returns distinct instances for distinct spellings", () => {
    const interner = new Interner();
    const lower = interner.intern("word");
    const upper = interner.intern("Word");

    expect(upper).not.toBe(lower);
    expect(lower.text).toBe("word");
    expect(upper.text).toBe("Word");
  });

  it("counts distinct spellings", () => {
    const interner = new Interner();
    interner.intern("a");
    interner.intern("b");
    interner.intern("a");

    expect(interner.size).toBe(2);
    expect([...interner.values()].map((w) => w.text)).toEqual(["a", "b"]);
  });

  it("answers membership without interning", () => {
    const interner = new Interner();
    interner.intern("present");

    expect(interner.has("present")).toBe(true);
    expect(interner.has("absent")).toBe(false);
    expect(interner.size).toBe(1);
  });

  it("hands out frozen words", () => {
    const word = new Interner().intern("fixed");
    expect(Object.isFrozen(word)).toBe(true);
  });

  it("copies spellings with surrogate pairs intact", () => {
    const word = new Interner().intern("a😀b");
    expect(word.text).toBe("a😀b");
    expect(word.text).toHaveLength(4);
  });
});
