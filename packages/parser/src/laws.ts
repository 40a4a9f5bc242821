/**
 * Combinator Laws
 *
 * The algebra of the combinators stated as executable properties. Each law
 * compares two parsers that must agree on every input, or asserts a property
 * of one parser, at a given sample `(pos, source)`.
 *
 * Transform laws:
 *   - Identity: process(a => a, p) === p
 *   - Composition: process(g, process(f, p)) === process(a => g(f(a)), p)
 *
 * Alternation laws (oneof([]) is the empty parser):
 *   - Left identity: oneof([oneof([]), p]) === p
 *   - Right identity: oneof([p, oneof([])]) === p
 *   - Associativity: oneof([oneof([p, q]), r]) === oneof([p, oneof([q, r])])
 *
 * Sequence laws:
 *   - Unit: concat([]) succeeds in place with []
 *   - Singleton: concat([p]) === process(a => [a], p)
 *   - Associativity: flattening nested sequences preserves the result
 *
 * Filter laws:
 *   - Accept-all: require(() => true, p) === p
 *   - Reject-all: require(() => false, p) never succeeds
 *
 * Repetition laws (for parsers that advance on success):
 *   - Totality: star(p) never fails
 *   - Unfolding: star(p) === oneof([p :: star(p), []])
 *   - Maximal munch: p fails where star(p) stopped
 *
 * Text law:
 *   - Round trip: process(decode, star(readchar)) recovers encoded text
 *
 * @module
 */

import { concat, oneof, process, require, star } from "./combinators.js";
import { pair } from "./derived.js";
import { success } from "./parser.js";
import { readchar } from "./primitives.js";
import { decode, encode } from "./text.js";
import type { ByteSource, Outcome, Parser, Transform } from "./types.js";

// ============================================================================
// Types
// ============================================================================

/** Equality for law comparisons. */
export interface Eq<A> {
  readonly eqv: (x: A, y: A) => boolean;
}

/** One input to check a law against. */
export interface Sample {
  readonly pos: number;
  readonly source: ByteSource;
}

export interface Law {
  readonly name: string;
  readonly description: string;
  readonly check: (sample: Sample) => boolean;
}

export type LawSet = readonly Law[];

export interface LawVerificationResult {
  readonly law: string;
  readonly holds: boolean;
  /** First sample the law failed on. */
  readonly counterexample?: Sample;
}

// ============================================================================
// Equality helpers
// ============================================================================

export function eqStrict<A>(): Eq<A> {
  return { eqv: (x, y) => x === y };
}

export function eqArray<A>(eq: Eq<A>): Eq<readonly A[]> {
  return {
    eqv: (xs, ys) => xs.length === ys.length && xs.every((x, i) => eq.eqv(x, ys[i])),
  };
}

/** Outcomes agree: both fail, or both succeed at the same position with equal values. */
export function sameOutcome<A>(eq: Eq<A>, x: Outcome<A>, y: Outcome<A>): boolean {
  if (!x.ok || !y.ok) return x.ok === y.ok;
  return x.pos === y.pos && eq.eqv(x.value, y.value);
}

function equivalent<A>(eq: Eq<A>, p: Parser<A>, q: Parser<A>): (sample: Sample) => boolean {
  return ({ pos, source }) => sameOutcome(eq, p.parse(pos, source), q.parse(pos, source));
}

// ============================================================================
// Law sets
// ============================================================================

export function transformLaws<A, B, C>(
  p: Parser<A>,
  f: Transform<A, B>,
  g: Transform<B, C>,
  eqA: Eq<A>,
  eqC: Eq<C>,
): LawSet {
  return [
    {
      name: "transform identity",
      description: "Mapping identity changes nothing: process(a => a, p) === p",
      check: equivalent(eqA, process((a: A) => a, p), p),
    },
    {
      name: "transform composition",
      description: "process(g, process(f, p)) === process(a => g(f(a)), p)",
      check: equivalent(
        eqC,
        process(g, process(f, p)),
        process((a: A) => g(f(a)), p),
      ),
    },
  ];
}

export function alternationLaws<A>(p: Parser<A>, q: Parser<A>, r: Parser<A>, eq: Eq<A>): LawSet {
  const empty = oneof<A>([]);
  return [
    {
      name: "alternation left identity",
      description: "oneof([oneof([]), p]) === p",
      check: equivalent(eq, oneof([empty, p]), p),
    },
    {
      name: "alternation right identity",
      description: "oneof([p, oneof([])]) === p",
      check: equivalent(eq, oneof([p, empty]), p),
    },
    {
      name: "alternation associativity",
      description: "oneof([oneof([p, q]), r]) === oneof([p, oneof([q, r])])",
      check: equivalent(eq, oneof([oneof([p, q]), r]), oneof([p, oneof([q, r])])),
    },
  ];
}

export function sequenceLaws<A>(p: Parser<A>, q: Parser<A>, r: Parser<A>, eq: Eq<A>): LawSet {
  const eqList = eqArray(eq);
  return [
    {
      name: "sequence unit",
      description: "concat([]) succeeds at the input position with []",
      check: ({ pos, source }) =>
        sameOutcome(eqList, concat<A>([]).parse(pos, source), success(pos, [])),
    },
    {
      name: "sequence singleton",
      description: "concat([p]) === process(a => [a], p)",
      check: equivalent(
        eqList,
        concat([p]),
        process((a: A) => [a], p),
      ),
    },
    {
      name: "sequence associativity",
      description: "concat([p, q, r]) === flatten(concat([concat([p, q]), concat([r])]))",
      check: equivalent(
        eqList,
        concat([p, q, r]),
        process(
          (groups: A[][]) => groups.reduce<A[]>((acc, group) => acc.concat(group), []),
          concat([concat([p, q]), concat([r])]),
        ),
      ),
    },
  ];
}

export function filterLaws<A>(p: Parser<A>, eq: Eq<A>): LawSet {
  return [
    {
      name: "filter accept-all",
      description: "require(() => true, p) === p",
      check: equivalent(eq, require(() => true, p), p),
    },
    {
      name: "filter reject-all",
      description: "require(() => false, p) never succeeds",
      check: ({ pos, source }) => !require(() => false, p).parse(pos, source).ok,
    },
  ];
}

/** Only meaningful for parsers that advance the cursor whenever they succeed. */
export function repetitionLaws<A>(p: Parser<A>, eq: Eq<A>): LawSet {
  const many = star(p);
  const eqList = eqArray(eq);
  const unfolded = oneof<A[]>([
    process(([head, tail]: [A, A[]]) => [head, ...tail], pair(p, many)),
    process((): A[] => [], concat<A>([])),
  ]);
  return [
    {
      name: "repetition totality",
      description: "star(p) never fails",
      check: ({ pos, source }) => many.parse(pos, source).ok,
    },
    {
      name: "repetition unfolding",
      description: "star(p) === oneof([p :: star(p), []])",
      check: equivalent(eqList, many, unfolded),
    },
    {
      name: "repetition maximal munch",
      description: "p does not succeed where star(p) stopped",
      check: ({ pos, source }) => {
        const r = many.parse(pos, source);
        if (!r.ok) return false;
        const next = p.parse(r.pos, source);
        return !next.ok || next.pos === r.pos;
      },
    },
  ];
}

export function textLaws(): LawSet {
  const text = process(decode, star(readchar()));
  return [
    {
      name: "text round trip",
      description: "process(decode, star(readchar())).parse(0, encode(s)) === Success(encode(s).length, s)",
      check: ({ pos, source }) => {
        const s = decode(Array.from(source).slice(pos));
        const bytes = encode(s);
        return sameOutcome(eqStrict<string>(), text.parse(0, bytes), success(bytes.length, s));
      },
    },
  ];
}

// ============================================================================
// Verification
// ============================================================================

/** Check every law against every sample, keeping the first counterexample. */
export function verifyLaws(laws: LawSet, samples: readonly Sample[]): LawVerificationResult[] {
  return laws.map((law) => {
    const counterexample = samples.find((sample) => !law.check(sample));
    return counterexample === undefined
      ? { law: law.name, holds: true }
      : { law: law.name, holds: false, counterexample };
  });
}
