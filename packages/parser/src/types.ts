/**
 * Core types for @bytecomb/parser
 *
 * Defines the parse outcome, the byte source and the parser interface.
 */

/** A single byte, 0..255. */
export type Byte = number;

/** Read-only, randomly indexable byte input. A `Uint8Array` is the usual source. */
export type ByteSource = ArrayLike<Byte>;

/** Successful parse: `pos` is the cursor just past the consumed input. */
export interface Success<T> {
  readonly ok: true;
  readonly pos: number;
  readonly value: T;
}

/** Failed parse. Carries no data. */
export interface Failure {
  readonly ok: false;
}

/** Result of a parse attempt. */
export type Outcome<T> = Success<T> | Failure;

/** Pure predicate used by `require`. */
export type Predicate<T> = (value: T) => boolean;

/** Pure, total mapping used by `process`. */
export type Transform<T, U> = (value: T) => U;

/** A raw parse function, as accepted by `primitive`. */
export type ParseFn<T> = (pos: number, source: ByteSource) => Outcome<T>;

/** Anything that can attempt a parse and duplicate itself. */
export interface Parser<T> {
  /** Attempt to parse `source` starting at `pos`. */
  parse(pos: number, source: ByteSource): Outcome<T>;
  /** An independent, behaviourally identical copy. */
  clone(): Parser<T>;
  /** Parse the full input from 0, throwing `ParseError` unless it is consumed entirely. */
  parseAll(source: ByteSource): T;
}
