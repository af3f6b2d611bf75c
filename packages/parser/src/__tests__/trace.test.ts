import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { char, config, isTracing, ref, resetTraceWriter, setTraceWriter } from "../index.js";

describe("tracing", () => {
  let lines: string[];

  beforeEach(() => {
    config.reset();
    lines = [];
    setTraceWriter((line) => lines.push(line));
  });

  afterEach(() => {
    resetTraceWriter();
    config.reset();
  });

  it("is silent by default", () => {
    expect(isTracing()).toBe(false);
    char("a").parse("a");
    expect(lines).toEqual([]);
  });

  it("traces a parse", () => {
    config.set({ trace: true });
    expect(isTracing()).toBe(true);
    char("a").parse("a");
    expect(lines).toEqual(["[parsnip] parse: <inline> (1 chars) as 'a'"]);
  });

  it("traces a failure", () => {
    config.set({ trace: true });
    char("a").tryParse("b");
    expect(lines[1]).toBe(`[parsnip] fail: <inline>:1:1: unexpected "b", expected 'a'`);
  });

  it("traces reference resolution", () => {
    config.set({ trace: true });
    ref(() => char("a")).parse("a");
    expect(lines).toEqual([
      "[parsnip] ref: 'a'",
      "[parsnip] parse: <inline> (1 chars) as 'a'",
      "[parsnip] ref: 'a'",
    ]);
  });
});
