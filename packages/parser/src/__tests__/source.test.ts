import { afterEach, describe, expect, it } from "vitest";
import { INLINE_FILE_NAME, boundLength, config, createSource, errorPosition, offsetOf } from "../index.js";

describe("createSource", () => {
  afterEach(() => {
    config.reset();
  });

  it("names in-memory text as inline", () => {
    const source = createSource("abc");
    expect(source).toEqual({ text: "abc", fileName: "<inline>" });
    expect(INLINE_FILE_NAME).toBe("<inline>");
  });

  it("keeps an explicit file name", () => {
    expect(createSource("x", "/tmp/grammar.txt").fileName).toBe("/tmp/grammar.txt");
  });

  it("is frozen", () => {
    expect(Object.isFrozen(createSource("abc"))).toBe(true);
  });

  it("uses the inline name whatever the configuration", () => {
    config.set({ trace: true });
    expect(createSource("x").fileName).toBe("<inline>");
  });
});

describe("errorPosition", () => {
  const text = "ab\ncd";

  it("starts at line 1, column 1", () => {
    expect(errorPosition(text, 0)).toEqual({ offset: 0, line: 1, column: 1 });
  });

  it("counts columns within a line", () => {
    expect(errorPosition(text, 2)).toEqual({ offset: 2, line: 1, column: 3 });
  });

  it("moves to the next line after a newline", () => {
    expect(errorPosition(text, 3)).toEqual({ offset: 3, line: 2, column: 1 });
    expect(errorPosition(text, 5)).toEqual({ offset: 5, line: 2, column: 3 });
  });

  it("clamps offsets past the end", () => {
    expect(errorPosition(text, 99)).toEqual({ offset: 5, line: 2, column: 3 });
  });

  it("handles empty text", () => {
    expect(errorPosition("", 0)).toEqual({ offset: 0, line: 1, column: 1 });
  });
});

describe("offsetOf", () => {
  it("measures a suffix against the full text", () => {
    const source = createSource("hello world");
    expect(offsetOf(source, "world")).toBe(6);
    expect(offsetOf(source, "")).toBe(11);
    expect(offsetOf(source, source.text)).toBe(0);
  });
});

describe("boundLength", () => {
  it("truncates long text", () => {
    expect(boundLength("abcdef", 3)).toBe("abc");
  });

  it("leaves short text alone", () => {
    expect(boundLength("ab", 3)).toBe("ab");
  });
});
