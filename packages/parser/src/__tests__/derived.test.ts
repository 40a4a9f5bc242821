import { describe, it, expect } from "vitest";
import {
  readchar,
  byte,
  byteRange,
  constant,
  eof,
  tag,
  process,
  oneof,
  pair,
  chain,
  plus,
  optional,
  times,
  sepBy,
  sepBy1,
  between,
  lazy,
  not,
  decode,
  encode,
  parseAll,
  ParseError,
} from "../index.js";
import type { Byte, Parser } from "../types.js";

const digits = process((ds: Byte[]) => Number(decode(ds)), plus(byteRange("0", "9")));

// ---------------------------------------------------------------------------
// Sequencing
// ---------------------------------------------------------------------------

describe("pair", () => {
  it("sequences two differently typed parsers", () => {
    const p = pair(byte("a"), digits);
    expect(p.parse(0, encode("a12"))).toEqual({ ok: true, pos: 3, value: [97, 12] });
  });

  it("fails if the second parser fails", () => {
    expect(pair(byte("a"), digits).parse(0, encode("ab")).ok).toBe(false);
  });
});

describe("chain", () => {
  // A length-prefixed field: one digit giving the count, then that many bytes.
  const field = chain(byteRange("0", "9"), (n) => process(decode, times(n - 48, readchar())));

  it("feeds the first result into the next parser", () => {
    expect(field.parse(0, encode("3abcd"))).toEqual({ ok: true, pos: 4, value: "abc" });
  });

  it("handles a zero count", () => {
    expect(field.parse(0, encode("0abc"))).toEqual({ ok: true, pos: 1, value: "" });
  });

  it("fails when the dependent parser fails", () => {
    expect(field.parse(0, encode("5ab")).ok).toBe(false);
  });

  it("fails when the first parser fails", () => {
    expect(field.parse(0, encode("x")).ok).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// Repetition variants
// ---------------------------------------------------------------------------

describe("plus", () => {
  it("fails on zero occurrences", () => {
    expect(plus(byte("a")).parse(0, encode("bbb")).ok).toBe(false);
  });

  it("matches one or more", () => {
    expect(plus(byte("a")).parse(0, encode("aab"))).toEqual({ ok: true, pos: 2, value: [97, 97] });
  });

  it("keeps a single zero-width match", () => {
    expect(plus(optional(byte("a"))).parse(0, encode("b"))).toEqual({ ok: true, pos: 0, value: [null] });
  });

  it("keeps the first match when a later one is zero-width", () => {
    expect(plus(optional(byte("a"))).parse(0, encode("ab"))).toEqual({ ok: true, pos: 1, value: [97] });
  });
});

describe("optional", () => {
  it("returns the value when present", () => {
    expect(optional(byte("a")).parse(0, encode("abc"))).toEqual({ ok: true, pos: 1, value: 97 });
  });

  it("returns null when absent", () => {
    expect(optional(byte("a")).parse(0, encode("xyz"))).toEqual({ ok: true, pos: 0, value: null });
  });
});

describe("times", () => {
  it("matches exactly n repetitions", () => {
    expect(times(2, byte("a")).parse(0, encode("aaa"))).toEqual({ ok: true, pos: 2, value: [97, 97] });
  });

  it("fails with fewer than n", () => {
    expect(times(3, byte("a")).parse(0, encode("aab")).ok).toBe(false);
  });

  it("rejects counts that are not non-negative integers", () => {
    expect(() => times(-1, byte("a"))).toThrow(RangeError);
    expect(() => times(1.5, byte("a"))).toThrow(RangeError);
    expect(() => times(Number.NaN, byte("a"))).toThrow(RangeError);
  });

  it("accepts a zero count", () => {
    expect(times(0, byte("a")).parse(0, encode("a"))).toEqual({ ok: true, pos: 0, value: [] });
  });
});

// ---------------------------------------------------------------------------
// Separation and delimiting
// ---------------------------------------------------------------------------

describe("sepBy", () => {
  it("matches zero items", () => {
    expect(sepBy(digits, byte(",")).parse(0, encode("abc"))).toEqual({ ok: true, pos: 0, value: [] });
  });

  it("matches one item", () => {
    expect(sepBy(digits, byte(",")).parse(0, encode("42"))).toEqual({ ok: true, pos: 2, value: [42] });
  });

  it("matches multiple items", () => {
    expect(sepBy(digits, byte(",")).parse(0, encode("1,2,3"))).toEqual({
      ok: true,
      pos: 5,
      value: [1, 2, 3],
    });
  });

  it("leaves a trailing separator unconsumed", () => {
    expect(sepBy(digits, byte(",")).parse(0, encode("1,2,"))).toEqual({
      ok: true,
      pos: 3,
      value: [1, 2],
    });
  });

  it("returns a fresh empty list each time", () => {
    const p = sepBy(digits, byte(","));
    const a = p.parse(0, encode("x"));
    const b = p.parse(0, encode("x"));
    expect(a.ok && b.ok && a.value !== b.value).toBe(true);
  });
});

describe("sepBy1", () => {
  it("fails on zero items", () => {
    expect(sepBy1(digits, byte(",")).parse(0, encode("abc")).ok).toBe(false);
  });

  it("matches one or more items", () => {
    expect(sepBy1(digits, byte(",")).parse(0, encode("10,20"))).toEqual({
      ok: true,
      pos: 5,
      value: [10, 20],
    });
  });
});

describe("between", () => {
  const parens = between(byte("("), digits, byte(")"));

  it("extracts content between delimiters", () => {
    expect(parens.parse(0, encode("(42)"))).toEqual({ ok: true, pos: 4, value: 42 });
  });

  it("fails on a missing open", () => {
    expect(parens.parse(0, encode("42)")).ok).toBe(false);
  });

  it("fails on a missing close", () => {
    expect(parens.parse(0, encode("(42")).ok).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// Recursion and lookahead
// ---------------------------------------------------------------------------

describe("lazy", () => {
  it("enables recursive grammars", () => {
    // depth = '(' depth ')' | ''  counts nesting
    const depth: Parser<number> = lazy(() =>
      oneof([process((d: number) => d + 1, between(byte("("), depth, byte(")"))), constant(0)]),
    );
    expect(depth.parse(0, encode("((()))"))).toEqual({ ok: true, pos: 6, value: 3 });
    expect(depth.parse(0, encode("x"))).toEqual({ ok: true, pos: 0, value: 0 });
  });

  it("builds the parser once", () => {
    let builds = 0;
    const p = lazy(() => {
      builds++;
      return byte("a");
    });
    const q = p.clone();
    p.parse(0, encode("a"));
    q.parse(0, encode("a"));
    p.parse(0, encode("a"));
    expect(builds).toBe(1);
  });

  it("does not build before the first parse", () => {
    let builds = 0;
    lazy(() => {
      builds++;
      return byte("a");
    });
    expect(builds).toBe(0);
  });
});

describe("not", () => {
  it("succeeds without consuming when the inner parser fails", () => {
    expect(not(byte("a")).parse(0, encode("xyz"))).toEqual({ ok: true, pos: 0, value: null });
  });

  it("fails when the inner parser succeeds", () => {
    expect(not(byte("a")).parse(0, encode("abc")).ok).toBe(false);
  });

  it("combines with a sequence as a guard", () => {
    const p = pair(not(tag("--")), byte("-"));
    expect(p.parse(0, encode("-x"))).toEqual({ ok: true, pos: 1, value: [null, 45] });
    expect(p.parse(0, encode("--")).ok).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// parseAll
// ---------------------------------------------------------------------------

describe("parseAll", () => {
  it("returns the value when all input is consumed", () => {
    expect(digits.parseAll(encode("123"))).toBe(123);
    expect(parseAll(digits, encode("7"))).toBe(7);
  });

  it("throws a no-match ParseError on failure", () => {
    expect(() => digits.parseAll(encode("abc"))).toThrow(ParseError);
    try {
      digits.parseAll(encode("abc"));
    } catch (e) {
      expect(e).toBeInstanceOf(ParseError);
      expect(e).toMatchObject({ name: "ParseError", reason: "no-match" });
    }
  });

  it("throws a trailing-input ParseError on partial consumption", () => {
    expect(() => parseAll(digits, encode("12x"))).toThrow("Parse failed: input not fully consumed");
  });

  it("accepts an empty grammar over empty input", () => {
    expect(eof().parseAll(new Uint8Array())).toBeNull();
  });
});
