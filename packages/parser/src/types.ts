/**
 * Core types for @parsnip/parser
 *
 * Defines the source and position model, the result algebra, and the parser
 * contract every matcher implements.
 */

import type { ParseFailure } from "./errors.js";

/** Input text together with the name it came from. Never mutated. */
export interface Source {
  readonly text: string;
  readonly fileName: string;
}

/** A resolved location inside a source. `line` and `column` are 1-based. */
export interface Position {
  readonly offset: number;
  readonly line: number;
  readonly column: number;
}

/** Value produced by a successful match, plus the unconsumed suffix of the input. */
export interface Result<A> {
  readonly value: A;
  readonly remainder: string;
}

/** Outcome of a single `eat` call. */
export type EatResult<A> =
  | ({ readonly ok: true } & Result<A>)
  | { readonly ok: false; readonly error: ParseFailure };

/** Outcome of a whole-input parse that does not throw. */
export type ParseOutcome<A> =
  | { readonly ok: true; readonly value: A }
  | { readonly ok: false; readonly error: ParseFailure };

/** The raw matching function behind a parser. */
export type EatFn<A> = (source: Source, input: string) => EatResult<A>;

/**
 * A parser consumes a prefix of its input. `eat` is the only primitive; the
 * entry points are derived from it.
 */
export interface Parser<A> {
  /** What this parser expects, as shown in error messages. */
  readonly expectedDescription: string;
  /**
   * Consume a prefix of `input`, which is always a suffix of `source.text`.
   * Never throws for a mismatch; the failure is returned.
   */
  eat(source: Source, input: string): EatResult<A>;
  /** Parse an in-memory string, requiring the whole of it to be consumed. */
  parse(text: string): A;
  /** Read a file and parse its full contents. */
  parseFile(path: string): A;
  /** Parse a source, requiring the whole of its text to be consumed. */
  parseSource(source: Source): A;
  /** Like `parse`, but returns the failure instead of throwing it. */
  tryParse(text: string): ParseOutcome<A>;
  /** Like `parseSource`, but returns the failure instead of throwing it. */
  tryParseSource(source: Source): ParseOutcome<A>;
  toString(): string;
}
