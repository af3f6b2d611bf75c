/**
 * Balanced brackets
 *
 * A recursive grammar written against the core only: sequencing and
 * repetition are spelled out with `createParser`, and the cycle between
 * `group` and `groups` is closed with `ref`.
 *
 *   groups = group*
 *   group  = '(' groups ')' | '[' groups ']'
 *
 * The value of a parse is the deepest nesting level reached.
 */

import { anyOf, char, createParser, offsetOf, ref, success, type Parser } from "../src/index.js";

const open = anyOf("([");
const closeParen = char(")");
const closeBracket = char("]");

// `groups` is declared below; reach it through a reference.
const inner: Parser<number> = ref(() => groups);

export const group: Parser<number> = createParser("group", (source, input) => {
  const opened = open.eat(source, input);
  if (!opened.ok) return opened;

  const body = inner.eat(source, opened.remainder);
  if (!body.ok) return body;

  const close = opened.value === "(" ? closeParen : closeBracket;
  const closed = close.eat(source, body.remainder);
  if (!closed.ok) return closed;

  return success(body.value + 1, closed.remainder);
});

export const groups: Parser<number> = createParser("groups", (source, input) => {
  let depth = 0;
  let rest = input;
  for (;;) {
    const next = group.eat(source, rest);
    if (!next.ok) {
      // A failure past the start of this group is a real error, not the end of the list.
      if (next.error.position.offset !== offsetOf(source, rest)) return next;
      return success(depth, rest);
    }
    depth = Math.max(depth, next.value);
    rest = next.remainder;
  }
});

/** Deepest nesting level of a balanced bracket string. */
export function nestingDepth(text: string): number {
  return groups.parse(text);
}

