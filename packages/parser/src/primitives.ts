/**
 * Primitive parsers: the leaves every grammar is built from.
 */

import { ParserBase, failure, success } from "./parser.js";
import { encode } from "./text.js";
import type { Byte, ByteSource, Outcome, ParseFn, Parser } from "./types.js";

// ---------------------------------------------------------------------------
// readchar
// ---------------------------------------------------------------------------

/** Consumes exactly one byte. */
export class ByteParser extends ParserBase<Byte> {
  parse(pos: number, source: ByteSource): Outcome<Byte> {
    if (pos < source.length) {
      return success(pos + 1, source[pos]);
    }
    return failure();
  }

  clone(): Parser<Byte> {
    return new ByteParser();
  }
}

/** Match any single byte. Fails only at end of input. */
export function readchar(): Parser<Byte> {
  return new ByteParser();
}

// ---------------------------------------------------------------------------
// Byte classes
// ---------------------------------------------------------------------------

/** Consumes one byte in the inclusive range [from, to]. */
export class ByteRangeParser extends ParserBase<Byte> {
  constructor(
    readonly from: Byte,
    readonly to: Byte,
  ) {
    super();
  }

  parse(pos: number, source: ByteSource): Outcome<Byte> {
    if (pos < source.length) {
      const b = source[pos];
      if (b >= this.from && b <= this.to) {
        return success(pos + 1, b);
      }
    }
    return failure();
  }

  clone(): Parser<Byte> {
    return new ByteRangeParser(this.from, this.to);
  }
}

/** Resolve a byte argument: an integer 0..255, or a single ASCII character. */
function toByte(b: Byte | string): Byte {
  if (typeof b === "string") {
    if (b.length !== 1 || b.charCodeAt(0) > 0x7f) {
      throw new RangeError(
        `Expected a single ASCII character, got ${JSON.stringify(b)}; use tag() for multi-byte text`,
      );
    }
    return b.charCodeAt(0);
  }
  if (!Number.isInteger(b) || b < 0 || b > 0xff) {
    throw new RangeError(`Expected a byte in 0..255, got ${b}`);
  }
  return b;
}

/** Match one specific byte, given as a number or a single ASCII character. */
export function byte(b: Byte | string): Parser<Byte> {
  const code = toByte(b);
  return new ByteRangeParser(code, code);
}

/** Match one byte in the inclusive range. Bounds are numbers or single ASCII characters. */
export function byteRange(from: Byte | string, to: Byte | string): Parser<Byte> {
  return new ByteRangeParser(toByte(from), toByte(to));
}

// ---------------------------------------------------------------------------
// Literals
// ---------------------------------------------------------------------------

/** Matches an exact byte sequence and yields a copy of it. */
export class TagParser extends ParserBase<Uint8Array> {
  private readonly bytes: Uint8Array;

  constructor(literal: ArrayLike<Byte>) {
    super();
    this.bytes = Uint8Array.from(literal);
  }

  parse(pos: number, source: ByteSource): Outcome<Uint8Array> {
    const n = this.bytes.length;
    if (pos + n > source.length) return failure();
    for (let i = 0; i < n; i++) {
      if (source[pos + i] !== this.bytes[i]) return failure();
    }
    return success(pos + n, this.bytes.slice());
  }

  clone(): Parser<Uint8Array> {
    return new TagParser(this.bytes);
  }
}

/** Match an exact literal. Strings are matched as their UTF-8 encoding. */
export function tag(literal: string | ArrayLike<Byte>): Parser<Uint8Array> {
  return new TagParser(typeof literal === "string" ? encode(literal) : literal);
}

// ---------------------------------------------------------------------------
// Zero-width parsers
// ---------------------------------------------------------------------------

/** Succeeds without consuming input. */
export class ConstantParser<T> extends ParserBase<T> {
  constructor(readonly value: T) {
    super();
  }

  parse(pos: number): Outcome<T> {
    return success(pos, this.value);
  }

  clone(): Parser<T> {
    return new ConstantParser(this.value);
  }
}

/**
 * Always succeed with `value`, consuming nothing. Every success carries the
 * same `value` reference; use `process(() => fresh(), constant(null))` when
 * each parse needs its own mutable value.
 */
export function constant<T>(value: T): Parser<T> {
  return new ConstantParser(value);
}

/** Succeeds with null only at end of input. */
export class EofParser extends ParserBase<null> {
  parse(pos: number, source: ByteSource): Outcome<null> {
    return pos >= source.length ? success(pos, null) : failure();
  }

  clone(): Parser<null> {
    return new EofParser();
  }
}

/** Match end of input. */
export function eof(): Parser<null> {
  return new EofParser();
}

// ---------------------------------------------------------------------------
// User-defined primitives
// ---------------------------------------------------------------------------

/** Adapts a raw parse function to the parser interface. */
export class FunctionParser<T> extends ParserBase<T> {
  constructor(private readonly parseFn: ParseFn<T>) {
    super();
  }

  parse(pos: number, source: ByteSource): Outcome<T> {
    return this.parseFn(pos, source);
  }

  clone(): Parser<T> {
    return new FunctionParser(this.parseFn);
  }
}

/** Create a parser from a pure `(pos, source) => Outcome` function. */
export function primitive<T>(parseFn: ParseFn<T>): Parser<T> {
  return new FunctionParser(parseFn);
}
