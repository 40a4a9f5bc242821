/**
 * The combinator algebra for @bytecomb/parser
 *
 * Five combinators over the `Parser<T>` interface: sequencing, ordered
 * alternation, filtering, transformation and repetition. Each combinator
 * keeps its own clones of the parsers it is built from.
 *
 * Failure carries no data, so every combinator either propagates it or
 * converts to it; a failed child never leaks a partial cursor.
 */

import { ParserBase, failure, success } from "./parser.js";
import type { ByteSource, Outcome, Parser, Predicate, Transform } from "./types.js";

// ---------------------------------------------------------------------------
// Sequence
// ---------------------------------------------------------------------------

export class SequenceParser<T> extends ParserBase<T[]> {
  private readonly parsers: readonly Parser<T>[];

  constructor(parsers: readonly Parser<T>[]) {
    super();
    this.parsers = parsers.map((p) => p.clone());
  }

  parse(pos: number, source: ByteSource): Outcome<T[]> {
    const values: T[] = [];
    let cur = pos;
    for (const p of this.parsers) {
      const r = p.parse(cur, source);
      if (!r.ok) return failure();
      values.push(r.value);
      cur = r.pos;
    }
    return success(cur, values);
  }

  clone(): Parser<T[]> {
    return new SequenceParser(this.parsers);
  }
}

/** Run `parsers` in order, threading the cursor. Empty list succeeds with `[]`. */
export function concat<T>(parsers: readonly Parser<T>[]): Parser<T[]> {
  return new SequenceParser(parsers);
}

// ---------------------------------------------------------------------------
// Alternation
// ---------------------------------------------------------------------------

export class AlternationParser<T> extends ParserBase<T> {
  private readonly parsers: readonly Parser<T>[];

  constructor(parsers: readonly Parser<T>[]) {
    super();
    this.parsers = parsers.map((p) => p.clone());
  }

  parse(pos: number, source: ByteSource): Outcome<T> {
    for (const p of this.parsers) {
      const r = p.parse(pos, source);
      if (r.ok) return r;
    }
    return failure();
  }

  clone(): Parser<T> {
    return new AlternationParser(this.parsers);
  }
}

/** Ordered choice (PEG): every branch starts at the same position, first success wins. */
export function oneof<T>(parsers: readonly Parser<T>[]): Parser<T> {
  return new AlternationParser(parsers);
}

// ---------------------------------------------------------------------------
// Filter
// ---------------------------------------------------------------------------

export class FilterParser<T> extends ParserBase<T> {
  private readonly parser: Parser<T>;

  constructor(
    private readonly predicate: Predicate<T>,
    parser: Parser<T>,
  ) {
    super();
    this.parser = parser.clone();
  }

  parse(pos: number, source: ByteSource): Outcome<T> {
    const r = this.parser.parse(pos, source);
    if (!r.ok) return r;
    return this.predicate(r.value) ? r : failure();
  }

  clone(): Parser<T> {
    return new FilterParser(this.predicate, this.parser);
  }
}

/** Accept `parser`'s result only when `predicate` holds for it. */
export function require<T>(predicate: Predicate<T>, parser: Parser<T>): Parser<T> {
  return new FilterParser(predicate, parser);
}

// ---------------------------------------------------------------------------
// Transform
// ---------------------------------------------------------------------------

export class TransformParser<T, U> extends ParserBase<U> {
  private readonly parser: Parser<T>;

  constructor(
    private readonly fn: Transform<T, U>,
    parser: Parser<T>,
  ) {
    super();
    this.parser = parser.clone();
  }

  parse(pos: number, source: ByteSource): Outcome<U> {
    const r = this.parser.parse(pos, source);
    if (!r.ok) return r;
    return success(r.pos, this.fn(r.value));
  }

  clone(): Parser<U> {
    return new TransformParser(this.fn, this.parser);
  }
}

/** Map a parser's result. `fn` must be pure and total. */
export function process<T, U>(fn: Transform<T, U>, parser: Parser<T>): Parser<U> {
  return new TransformParser(fn, parser);
}

// ---------------------------------------------------------------------------
// Repetition
// ---------------------------------------------------------------------------

export class RepetitionParser<T> extends ParserBase<T[]> {
  private readonly parser: Parser<T>;

  constructor(parser: Parser<T>) {
    super();
    this.parser = parser.clone();
  }

  parse(pos: number, source: ByteSource): Outcome<T[]> {
    const values: T[] = [];
    let cur = pos;
    for (;;) {
      const r = this.parser.parse(cur, source);
      if (!r.ok) break;
      if (r.pos === cur) break; // zero-width match would never terminate
      values.push(r.value);
      cur = r.pos;
    }
    return success(cur, values);
  }

  clone(): Parser<T[]> {
    return new RepetitionParser(this.parser);
  }
}

/** Zero or more repetitions, greedy. Always succeeds. */
export function star<T>(parser: Parser<T>): Parser<T[]> {
  return new RepetitionParser(parser);
}
