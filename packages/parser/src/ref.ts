/**
 * Lazy references for recursive grammars.
 */

import { createParser } from "./parser.js";
import { traceEvent } from "./trace.js";
import type { Parser } from "./types.js";

/**
 * A parser that stands in for `target()`. The target is looked up again on
 * every description read and every `eat`, so a rule may refer to rules
 * declared after it, or to itself.
 *
 * @example
 * ```typescript
 * const inner: Parser<number> = ref(() => groups);
 * const group = createParser("group", (source, input) => {
 *   // '(' then inner.eat(source, rest) then ')'
 * });
 * const groups = createParser("groups", (source, input) => {
 *   // group.eat(source, rest) until it stops matching
 * });
 * ```
 */
export function ref<A>(target: () => Parser<A>): Parser<A> {
  const resolve = (): Parser<A> => {
    const parser = target();
    traceEvent("ref", () => parser.expectedDescription);
    return parser;
  };

  return createParser(
    () => resolve().expectedDescription,
    (source, input) => resolve().eat(source, input)
  );
}
