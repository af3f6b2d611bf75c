/**
 * Human-readable rendering of parse errors as a code frame.
 *
 * @example Output:
 * ```
 * error: unexpected "b", expected <EOF>
 *   --> <inline>:1:2
 *      |
 *    1 | ab
 *      |  ^
 *      |
 * ```
 */

import { failureMessage, type ParseError, type ParseFailure } from "./errors.js";

export interface RenderOptions {
  /** Whether to use ANSI colors (default: false) */
  colors?: boolean;
  /** Number of source lines shown before and after the failing line (default: 2) */
  contextLines?: number;
  /** Custom writer function for `printParseError` (default: console.error) */
  writer?: (text: string) => void;
}

const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  red: "\x1b[31m",
  blue: "\x1b[34m",
} as const;

type Style = Exclude<keyof typeof COLORS, "reset">;

function lineNumberWidth(maxLine: number): number {
  return Math.max(3, String(maxLine).length);
}

/**
 * Render a failure, or a thrown `ParseError`, with the offending line and a
 * caret under the failing column.
 */
export function renderParseError(
  error: ParseError | ParseFailure,
  options: RenderOptions = {}
): string {
  const { colors = false, contextLines = 2 } = options;
  const failure = "failure" in error ? error.failure : error;
  const { position, source } = failure;

  const color = (text: string, ...styles: Style[]): string =>
    colors ? `${styles.map((s) => COLORS[s]).join("")}${text}${COLORS.reset}` : text;

  const lines: string[] = [];
  lines.push(`${color("error", "bold", "red")}: ${color(failureMessage(failure), "bold")}`);
  lines.push(`  ${color("-->", "blue")} ${source.fileName}:${position.line}:${position.column}`);

  const sourceLines = source.text.split("\n");
  const minLine = Math.max(1, position.line - contextLines);
  const maxLine = Math.min(sourceLines.length, position.line + contextLines);
  const numWidth = lineNumberWidth(maxLine);
  const gutter = " ".repeat(numWidth);
  const bar = color("|", "blue");

  lines.push(` ${gutter} ${bar}`);
  for (let lineNum = minLine; lineNum <= maxLine; lineNum++) {
    const lineNumStr = String(lineNum).padStart(numWidth, " ");
    lines.push(` ${color(lineNumStr, "blue")} ${bar} ${sourceLines[lineNum - 1] ?? ""}`);
    if (lineNum === position.line) {
      const caret = " ".repeat(position.column - 1) + "^";
      lines.push(` ${gutter} ${bar} ${color(caret, "red")}`);
    }
  }
  lines.push(` ${gutter} ${bar}`);

  return lines.join("\n");
}

/**
 * Print a rendered parse error (stderr by default).
 */
export function printParseError(error: ParseError | ParseFailure, options: RenderOptions = {}): void {
  const writer = options.writer ?? ((text: string) => console.error(text));
  writer(renderParseError(error, options));
}
