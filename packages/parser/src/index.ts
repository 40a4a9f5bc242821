/**
 * @bytecomb/parser
 *
 * Composable recursive-descent parsing over byte sequences.
 *
 * Provides:
 * - A uniform `Parser<T>` interface with a single, data-free failure outcome
 * - The core algebra: `readchar`, `concat`, `oneof`, `require`, `process`, `star`
 * - Derived combinators for everyday grammars and recursion via `lazy`
 * - Executable combinator laws
 *
 * @module
 */

// Core types
export type {
  Byte,
  ByteSource,
  Success,
  Failure,
  Outcome,
  Predicate,
  Transform,
  ParseFn,
  Parser,
} from "./types.js";

// Base class, outcomes, errors
export { ParserBase, ParseError, success, failure, parseAll } from "./parser.js";
export type { ParseErrorReason } from "./parser.js";

// Primitives
export {
  ByteParser,
  ByteRangeParser,
  TagParser,
  ConstantParser,
  EofParser,
  FunctionParser,
  readchar,
  byte,
  byteRange,
  tag,
  constant,
  eof,
  primitive,
} from "./primitives.js";

// Core combinators
export {
  SequenceParser,
  AlternationParser,
  FilterParser,
  TransformParser,
  RepetitionParser,
  concat,
  oneof,
  require,
  process,
  star,
} from "./combinators.js";

// Derived combinators
export {
  PairParser,
  ChainParser,
  LazyParser,
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
} from "./derived.js";

// Tracing
export { TraceParser, trace } from "./trace.js";
export type { TraceOptions } from "./trace.js";

// Text
export { encode, decode } from "./text.js";

// Laws
export {
  eqStrict,
  eqArray,
  sameOutcome,
  transformLaws,
  alternationLaws,
  sequenceLaws,
  filterLaws,
  repetitionLaws,
  textLaws,
  verifyLaws,
} from "./laws.js";
export type { Eq, Sample, Law, LawSet, LawVerificationResult } from "./laws.js";
