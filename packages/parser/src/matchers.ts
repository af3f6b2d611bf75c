/**
 * Terminal matchers: parsers that inspect raw characters.
 *
 * Characters are UTF-16 code units, as `input[0]` sees them.
 */

import { unexpectedEOF, unexpectedToken } from "./errors.js";
import { createParser, failure, map, success } from "./parser.js";
import type { EatResult, Parser, Source } from "./types.js";

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/** Consume one character that satisfies `accepts`. */
function eatChar(
  source: Source,
  input: string,
  expected: string,
  accepts: (c: string) => boolean
): EatResult<string> {
  if (input.length === 0) {
    return failure(unexpectedEOF(source, expected));
  }
  const value = input.charAt(0);
  if (!accepts(value)) {
    return failure(unexpectedToken(source, input, expected));
  }
  return success(value, input.slice(1));
}

function toChars(args: ReadonlyArray<string | Iterable<string>>, fn: string): string[] {
  const chars: string[] = [];
  for (const arg of args) {
    if (typeof arg === "string") {
      chars.push(...arg.split(""));
      continue;
    }
    for (const c of arg) {
      if (c.length !== 1) {
        throw new RangeError(`${fn}() expects single characters, got ${JSON.stringify(c)}`);
      }
      chars.push(c);
    }
  }
  return chars;
}

function describeSet(chars: readonly string[]): string {
  return `{${chars.join(", ")}}`;
}

// ---------------------------------------------------------------------------
// Empty
// ---------------------------------------------------------------------------

/** Consume nothing and produce `null`. Never fails. */
export function empty(): Parser<null> {
  return createParser("empty string", (_source, input) => success(null, input));
}

/** Consume nothing and produce `""`. */
export function emptyString(): Parser<string> {
  return map(empty(), () => "");
}

// ---------------------------------------------------------------------------
// Strings
// ---------------------------------------------------------------------------

/**
 * Match `expected` exactly and produce it.
 *
 * Failures: empty input, or input that stops part-way through the literal
 * while still matching it (`string("abc")` on `"ab"`), is `UnexpectedEOF` at
 * the end of the source. Any other mismatch, including short input that
 * already differs (`"ax"`), is `UnexpectedToken` where the literal starts.
 */
export function string(expected: string): Parser<string> {
  switch (expected.length) {
    case 0:
      return emptyString();
    case 1: {
      // Same check as `char`, described as a string literal.
      const description = `"${expected}"`;
      return createParser(description, (source, input) =>
        eatChar(source, input, description, (c) => c === expected)
      );
    }
    default:
      return literal(expected);
  }
}

/** @see string */
export const str = string;

function literal(expected: string): Parser<string> {
  const description = `"${expected}"`;
  return createParser(description, (source, input) => {
    if (input.startsWith(expected)) {
      return success(expected, input.slice(expected.length));
    }
    // Input ran out part-way through an otherwise matching literal.
    if (input.length < expected.length && expected.startsWith(input)) {
      return failure(unexpectedEOF(source, description));
    }
    return failure(unexpectedToken(source, input, description));
  });
}

// ---------------------------------------------------------------------------
// Single characters
// ---------------------------------------------------------------------------

/** Match the single character `expected` and produce it. */
export function char(expected: string): Parser<string> {
  if (expected.length !== 1) {
    throw new RangeError(`char() expects a single character, got ${JSON.stringify(expected)}`);
  }
  const description = `'${expected}'`;
  return createParser(description, (source, input) =>
    eatChar(source, input, description, (c) => c === expected)
  );
}

/** @see char */
export const chr = char;

/**
 * Match one character from the given set. Each argument is either a string,
 * every character of which is a member, or an iterable of characters.
 *
 * @example
 * ```typescript
 * anyOf("+-");
 * anyOf("a", "b");
 * anyOf(new Set(["x", "y"]));
 * ```
 */
export function anyOf(...included: Array<string | Iterable<string>>): Parser<string> {
  const chars = toChars(included, "anyOf");
  const members = new Set(chars);
  const description = `any char of ${describeSet(chars)}`;
  return createParser(description, (source, input) =>
    eatChar(source, input, description, (c) => members.has(c))
  );
}

/** Match one character that is not in the given set. Arguments as for `anyOf`. */
export function except(...excluded: Array<string | Iterable<string>>): Parser<string> {
  const chars = toChars(excluded, "except");
  const members = new Set(chars);
  const description = `any char except ${describeSet(chars)}`;
  return createParser(description, (source, input) =>
    eatChar(source, input, description, (c) => !members.has(c))
  );
}

/** Match any single character. Fails only at end of input. */
export function anyChar(): Parser<string> {
  return createParser("any char", (source, input) => eatChar(source, input, "any char", () => true));
}
