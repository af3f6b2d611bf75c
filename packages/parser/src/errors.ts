/**
 * Error taxonomy for @parsnip/parser
 *
 * A failed match is described by a `ParseFailure` value. Matchers return it
 * inside an `EatResult`; the top-level entry points throw it wrapped in a
 * `ParseError` subclass.
 */

import { boundLength, errorPosition, offsetOf } from "./source.js";
import type { Position, Source } from "./types.js";

// ============================================================================
// Failure payloads
// ============================================================================

/** Input ended while the parser still required characters. */
export interface UnexpectedEOF {
  readonly kind: "UnexpectedEOF";
  readonly expected: string;
  readonly position: Position;
  readonly source: Source;
}

/** Input did not match what the parser required. */
export interface UnexpectedToken {
  readonly kind: "UnexpectedToken";
  /** The remaining input at the failure point, bounded to the preview length. */
  readonly found: string;
  readonly expected: string;
  readonly position: Position;
  readonly source: Source;
}

export type ParseFailure = UnexpectedEOF | UnexpectedToken;

/** Characters of remaining input quoted in an `UnexpectedToken`. */
export const PREVIEW_LENGTH = 20;

/** Failure at the very end of `source`, regardless of where the local cursor is. */
export function unexpectedEOF(source: Source, expected: string): UnexpectedEOF {
  return {
    kind: "UnexpectedEOF",
    expected,
    position: errorPosition(source.text, source.text.length),
    source,
  };
}

/** Failure at the start of `input`, which must be a suffix of `source.text`. */
export function unexpectedToken(source: Source, input: string, expected: string): UnexpectedToken {
  return {
    kind: "UnexpectedToken",
    found: boundLength(input, PREVIEW_LENGTH),
    expected,
    position: errorPosition(source.text, offsetOf(source, input)),
    source,
  };
}

/** What went wrong, without the location. */
export function failureMessage(failure: ParseFailure): string {
  switch (failure.kind) {
    case "UnexpectedEOF":
      return `unexpected end of input, expected ${failure.expected}`;
    case "UnexpectedToken":
      return `unexpected ${JSON.stringify(failure.found)}, expected ${failure.expected}`;
  }
}

/** One-line description of a failure, prefixed with `file:line:column`. */
export function describeFailure(failure: ParseFailure): string {
  const { position, source } = failure;
  return `${source.fileName}:${position.line}:${position.column}: ${failureMessage(failure)}`;
}

// ============================================================================
// Thrown errors
// ============================================================================

/** Base class of every error a top-level parse throws. */
export abstract class ParseError extends Error {
  readonly failure: ParseFailure;
  readonly expected: string;
  readonly position: Position;
  readonly source: Source;

  protected constructor(failure: ParseFailure) {
    super(describeFailure(failure));
    this.failure = failure;
    this.expected = failure.expected;
    this.position = failure.position;
    this.source = failure.source;
  }
}

export class UnexpectedEOFError extends ParseError {
  declare readonly failure: UnexpectedEOF;

  constructor(failure: UnexpectedEOF) {
    super(failure);
    this.name = "UnexpectedEOFError";
  }
}

export class UnexpectedTokenError extends ParseError {
  declare readonly failure: UnexpectedToken;
  readonly found: string;

  constructor(failure: UnexpectedToken) {
    super(failure);
    this.name = "UnexpectedTokenError";
    this.found = failure.found;
  }
}

export function toParseError(failure: ParseFailure): ParseError {
  switch (failure.kind) {
    case "UnexpectedEOF":
      return new UnexpectedEOFError(failure);
    case "UnexpectedToken":
      return new UnexpectedTokenError(failure);
  }
}

export function isParseError(value: unknown): value is ParseError {
  return value instanceof ParseError;
}
