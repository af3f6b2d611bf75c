/**
 * The parser contract and its entry points.
 *
 * Every parser is built by `createParser`: the caller supplies a description
 * and an `eat` function, and the whole-input entry points are derived here.
 */

import { readFileSync } from "fs";
import { resolve } from "path";
import { describeFailure, toParseError, unexpectedToken, type ParseFailure } from "./errors.js";
import { createSource } from "./source.js";
import { traceEvent } from "./trace.js";
import type { EatFn, EatResult, ParseOutcome, Parser, Source } from "./types.js";

/** What a whole-input parse expects once the parser itself is done. */
export const EOF_DESCRIPTION = "<EOF>";

export function success<A>(value: A, remainder: string): EatResult<A> {
  return { ok: true, value, remainder };
}

export function failure<A = never>(error: ParseFailure): EatResult<A> {
  return { ok: false, error };
}

/**
 * Build a parser from a description and a raw `eat` function.
 *
 * A function passed as `expectedDescription` is called on every read, so the
 * description can follow a target that is not known yet.
 */
export function createParser<A>(
  expectedDescription: string | (() => string),
  eat: EatFn<A>
): Parser<A> {
  const describe =
    typeof expectedDescription === "function" ? expectedDescription : () => expectedDescription;

  const parser: Parser<A> = {
    get expectedDescription(): string {
      return describe();
    },
    eat,
    parse(text: string): A {
      return parser.parseSource(createSource(text));
    },
    parseFile(path: string): A {
      const fileName = resolve(path);
      const text = readFileSync(fileName, "utf8");
      return parser.parseSource(createSource(text, fileName));
    },
    parseSource(source: Source): A {
      const outcome = parser.tryParseSource(source);
      if (!outcome.ok) {
        throw toParseError(outcome.error);
      }
      return outcome.value;
    },
    tryParse(text: string): ParseOutcome<A> {
      return parser.tryParseSource(createSource(text));
    },
    tryParseSource(source: Source): ParseOutcome<A> {
      traceEvent("parse", () => `${source.fileName} (${source.text.length} chars) as ${describe()}`);
      const result = eat(source, source.text);
      if (!result.ok) {
        traceEvent("fail", () => describeFailure(result.error));
        return result;
      }
      if (result.remainder.length > 0) {
        const error = unexpectedToken(source, result.remainder, EOF_DESCRIPTION);
        traceEvent("fail", () => describeFailure(error));
        return { ok: false, error };
      }
      return { ok: true, value: result.value };
    },
    toString(): string {
      return describe();
    },
  };

  return parser;
}

/** Transform a parser's value. Failures pass through untouched. */
export function map<A, B>(parser: Parser<A>, f: (value: A) => B): Parser<B> {
  return createParser(
    () => parser.expectedDescription,
    (source, input) => {
      const result = parser.eat(source, input);
      if (!result.ok) return result;
      return success(f(result.value), result.remainder);
    }
  );
}
