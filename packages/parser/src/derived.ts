/**
 * Convenience combinators built on top of the core algebra.
 */

import { concat, oneof, process, star } from "./combinators.js";
import { ParserBase, failure, success } from "./parser.js";
import { constant, primitive } from "./primitives.js";
import type { ByteSource, Outcome, Parser } from "./types.js";

// ---------------------------------------------------------------------------
// Sequencing of differently typed parsers
// ---------------------------------------------------------------------------

export class PairParser<A, B> extends ParserBase<[A, B]> {
  private readonly first: Parser<A>;
  private readonly second: Parser<B>;

  constructor(first: Parser<A>, second: Parser<B>) {
    super();
    this.first = first.clone();
    this.second = second.clone();
  }

  parse(pos: number, source: ByteSource): Outcome<[A, B]> {
    const ra = this.first.parse(pos, source);
    if (!ra.ok) return ra;
    const rb = this.second.parse(ra.pos, source);
    if (!rb.ok) return rb;
    return success(rb.pos, [ra.value, rb.value]);
  }

  clone(): Parser<[A, B]> {
    return new PairParser(this.first, this.second);
  }
}

/** Sequence two parsers of different result types. */
export function pair<A, B>(first: Parser<A>, second: Parser<B>): Parser<[A, B]> {
  return new PairParser(first, second);
}

/** Runs `parser`, then whichever parser `next` builds from its value. */
export class ChainParser<T, U> extends ParserBase<U> {
  private readonly parser: Parser<T>;

  constructor(
    parser: Parser<T>,
    private readonly next: (value: T) => Parser<U>,
  ) {
    super();
    this.parser = parser.clone();
  }

  parse(pos: number, source: ByteSource): Outcome<U> {
    const r = this.parser.parse(pos, source);
    if (!r.ok) return r;
    return this.next(r.value).parse(r.pos, source);
  }

  clone(): Parser<U> {
    return new ChainParser(this.parser, this.next);
  }
}

/** Context-sensitive sequencing: the second parser depends on the first result. */
export function chain<T, U>(parser: Parser<T>, next: (value: T) => Parser<U>): Parser<U> {
  return new ChainParser(parser, next);
}

// ---------------------------------------------------------------------------
// Repetition variants
// ---------------------------------------------------------------------------

/** One or more repetitions. */
export function plus<T>(parser: Parser<T>): Parser<T[]> {
  return process(([head, tail]: [T, T[]]) => [head, ...tail], pair(parser, star(parser)));
}

/** `parser`'s result, or null without consuming input. */
export function optional<T>(parser: Parser<T>): Parser<T | null> {
  return oneof<T | null>([parser, constant(null)]);
}

/** Exactly `count` repetitions. */
export function times<T>(count: number, parser: Parser<T>): Parser<T[]> {
  if (!Number.isInteger(count) || count < 0) {
    throw new RangeError(`Expected a non-negative integer count, got ${count}`);
  }
  return concat(Array.from({ length: count }, () => parser));
}

// ---------------------------------------------------------------------------
// Separation and delimiting
// ---------------------------------------------------------------------------

/** One or more items separated by `sep`. A trailing separator is left unconsumed. */
export function sepBy1<T, S>(item: Parser<T>, sep: Parser<S>): Parser<T[]> {
  const rest = star(process(([, value]: [S, T]) => value, pair(sep, item)));
  return process(([first, others]: [T, T[]]) => [first, ...others], pair(item, rest));
}

/** Zero or more items separated by `sep`. */
export function sepBy<T, S>(item: Parser<T>, sep: Parser<S>): Parser<T[]> {
  return oneof([sepBy1(item, sep), primitive((pos): Outcome<T[]> => success(pos, []))]);
}

/** Parse `parser` between `open` and `close`, returning only the inner result. */
export function between<O, T, C>(open: Parser<O>, parser: Parser<T>, close: Parser<C>): Parser<T> {
  return process(([[, value]]: [[O, T], C]) => value, pair(pair(open, parser), close));
}

// ---------------------------------------------------------------------------
// Recursion
// ---------------------------------------------------------------------------

interface LazyCell<T> {
  readonly build: () => Parser<T>;
  resolved: Parser<T> | null;
}

/** Defers construction until first parse; clones share the built parser. */
export class LazyParser<T> extends ParserBase<T> {
  constructor(private readonly cell: LazyCell<T>) {
    super();
  }

  parse(pos: number, source: ByteSource): Outcome<T> {
    if (!this.cell.resolved) this.cell.resolved = this.cell.build();
    return this.cell.resolved.parse(pos, source);
  }

  clone(): Parser<T> {
    return new LazyParser(this.cell);
  }
}

/** Lazy parser for recursive grammars. `build` runs once, on first use. */
export function lazy<T>(build: () => Parser<T>): Parser<T> {
  return new LazyParser({ build, resolved: null });
}

// ---------------------------------------------------------------------------
// Lookahead
// ---------------------------------------------------------------------------

/** Succeeds with null, consuming nothing, only where `parser` fails. */
export function not<T>(parser: Parser<T>): Parser<null> {
  const inner = parser.clone();
  return primitive((pos, source) => (inner.parse(pos, source).ok ? failure() : success(pos, null)));
}
