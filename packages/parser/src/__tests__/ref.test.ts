import { describe, expect, it, vi } from "vitest";
import { UnexpectedEOFError, UnexpectedTokenError, char, createSource, ref, type Parser } from "../index.js";
import { group, groups, nestingDepth } from "../../examples/nesting.js";

function caught(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("expected a throw");
}

describe("ref", () => {
  it("refers to a parser declared later", () => {
    const p: Parser<string> = ref(() => target);
    const target = char("a");
    expect(p.parse("a")).toBe("a");
    expect(p.expectedDescription).toBe("'a'");
    expect(String(p)).toBe("'a'");
  });

  it("resolves the target on every use", () => {
    let current = char("a");
    const resolve = vi.fn(() => current);
    const p = ref(resolve);

    expect(p.parse("a")).toBe("a");
    current = char("b");
    expect(p.parse("b")).toBe("b");
    expect(p.expectedDescription).toBe("'b'");
    expect(resolve).toHaveBeenCalledTimes(3);
  });

  it("passes the target's failures through", () => {
    const p = ref(() => char("a"));
    expect(p.eat(createSource("xb"), "b")).toMatchObject({
      ok: false,
      error: { kind: "UnexpectedToken", expected: "'a'", position: { offset: 1 } },
    });
  });

  it("overflows the stack on a rule with no base case", () => {
    const loop: Parser<string> = ref(() => loop);
    expect(() => loop.parse("x")).toThrow(RangeError);
  });
});

describe("balanced brackets", () => {
  it("parses nested groups", () => {
    expect(nestingDepth("")).toBe(0);
    expect(nestingDepth("()")).toBe(1);
    expect(nestingDepth("([])()")).toBe(2);
    expect(nestingDepth("[[()]]")).toBe(3);
  });

  it("parses a single group", () => {
    expect(group.parse("[()]")).toBe(2);
    expect(group.expectedDescription).toBe("group");
    expect(groups.expectedDescription).toBe("groups");
  });

  it("rejects a mismatched closer", () => {
    const error = caught(() => nestingDepth("(]"));
    expect(error).toBeInstanceOf(UnexpectedTokenError);
    expect(error).toMatchObject({ found: "]", expected: "')'", position: { offset: 1 } });
  });

  it("reports the innermost unclosed group", () => {
    const error = caught(() => nestingDepth("([)"));
    expect(error).toBeInstanceOf(UnexpectedTokenError);
    expect(error).toMatchObject({ found: ")", expected: "']'", position: { offset: 2, column: 3 } });
  });

  it("rejects an unclosed group at end of input", () => {
    const error = caught(() => nestingDepth("(()"));
    expect(error).toBeInstanceOf(UnexpectedEOFError);
    expect(error).toMatchObject({ expected: "')'", position: { offset: 3 } });
  });

  it("rejects an unmatched closer", () => {
    const error = caught(() => nestingDepth("())"));
    expect(error).toBeInstanceOf(UnexpectedTokenError);
    expect(error).toMatchObject({ found: ")", expected: "<EOF>", position: { offset: 2 } });
  });
});
