/**
 * Source and position model.
 *
 * Positions are derived on demand from the full text and an offset; nothing
 * here caches line tables.
 */

import type { Position, Source } from "./types.js";

/** File name given to sources that were not read from disk. */
export const INLINE_FILE_NAME = "<inline>";

/** Wrap `text` as a source. `fileName` defaults to `INLINE_FILE_NAME`. */
export function createSource(text: string, fileName?: string): Source {
  return Object.freeze({ text, fileName: fileName ?? INLINE_FILE_NAME });
}

/** Absolute offset of `input` inside `source`, given that `input` is a suffix of its text. */
export function offsetOf(source: Source, input: string): number {
  return source.text.length - input.length;
}

/** Convert a zero-based offset to a 1-based line/column position. */
export function errorPosition(text: string, offset: number): Position {
  const clamped = Math.max(0, Math.min(offset, text.length));
  let line = 1;
  let column = 1;
  for (let i = 0; i < clamped; i++) {
    if (text[i] === "\n") {
      line++;
      column = 1;
    } else {
      column++;
    }
  }
  return { offset: clamped, line, column };
}

/** The first `max` characters of `text`. */
export function boundLength(text: string, max: number): string {
  return text.length <= max ? text : text.slice(0, max);
}
