/**
 * Debug tracing for parsers.
 *
 * `trace` wraps a parser and logs every attempt without changing its outcome:
 *
 * ```typescript
 * const digits = trace("digits", plus(byteRange("0", "9")));
 * digits.parse(0, encode("42x"));
 * // [bytecomb:trace] digits @0: ok -> 2
 * ```
 */

import { ParserBase } from "./parser.js";
import type { ByteSource, Outcome, Parser } from "./types.js";

export interface TraceOptions {
  /** Log attempts. Default: true */
  readonly verbose?: boolean;
  /** Sink for log lines. Default: console.log */
  readonly log?: (message: string) => void;
}

export class TraceParser<T> extends ParserBase<T> {
  private readonly parser: Parser<T>;
  private readonly options: TraceOptions;

  constructor(
    private readonly label: string,
    parser: Parser<T>,
    options: TraceOptions,
  ) {
    super();
    this.parser = parser.clone();
    this.options = { ...options };
  }

  parse(pos: number, source: ByteSource): Outcome<T> {
    const r = this.parser.parse(pos, source);
    if (this.options.verbose !== false) {
      const log = this.options.log ?? console.log;
      log(`[bytecomb:trace] ${this.label} @${pos}: ${r.ok ? `ok -> ${r.pos}` : "fail"}`);
    }
    return r;
  }

  clone(): Parser<T> {
    return new TraceParser(this.label, this.parser, this.options);
  }
}

/** Log each attempt of `parser` under `label`. */
export function trace<T>(label: string, parser: Parser<T>, options: TraceOptions = {}): Parser<T> {
  return new TraceParser(label, parser, options);
}
