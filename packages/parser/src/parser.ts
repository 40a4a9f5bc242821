/**
 * Parser base class, outcome constructors and the boundary error type.
 */

import type { ByteSource, Failure, Outcome, Parser, Success } from "./types.js";

// ---------------------------------------------------------------------------
// Outcomes
// ---------------------------------------------------------------------------

const FAILURE: Failure = Object.freeze({ ok: false });

export function success<T>(pos: number, value: T): Success<T> {
  return { ok: true, pos, value };
}

export function failure(): Failure {
  return FAILURE;
}

// ---------------------------------------------------------------------------
// Error reporting
// ---------------------------------------------------------------------------

/** Why `parseAll` rejected an input. */
export type ParseErrorReason = "no-match" | "trailing-input";

/** Thrown by `parseAll`. Deliberately position-free: failure is a single signal. */
export class ParseError extends Error {
  readonly reason: ParseErrorReason;

  constructor(reason: ParseErrorReason) {
    super(reason === "no-match" ? "Parse failed: no match" : "Parse failed: input not fully consumed");
    this.name = "ParseError";
    this.reason = reason;
  }
}

/** Run `parser` from position 0 and require it to consume all of `source`. */
export function parseAll<T>(parser: Parser<T>, source: ByteSource): T {
  const result = parser.parse(0, source);
  if (!result.ok) {
    throw new ParseError("no-match");
  }
  if (result.pos !== source.length) {
    throw new ParseError("trailing-input");
  }
  return result.value;
}

// ---------------------------------------------------------------------------
// Base class
// ---------------------------------------------------------------------------

/**
 * Common base for every parser kind. Subclasses supply `parse` and `clone`;
 * new kinds can be added without touching the existing ones.
 */
export abstract class ParserBase<T> implements Parser<T> {
  abstract parse(pos: number, source: ByteSource): Outcome<T>;

  abstract clone(): Parser<T>;

  parseAll(source: ByteSource): T {
    return parseAll(this, source);
  }
}
