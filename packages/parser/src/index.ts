/**
 * @parsnip/parser
 *
 * Recursive-descent parsing primitives: a parser contract, terminal
 * matchers, and lazy references for recursive grammars.
 *
 * @module
 */

// Core types
export type {
  Source,
  Position,
  Result,
  EatResult,
  EatFn,
  ParseOutcome,
  Parser,
} from "./types.js";

// Source and position model
export { INLINE_FILE_NAME, createSource, errorPosition, offsetOf, boundLength } from "./source.js";

// Errors
export type { ParseFailure, UnexpectedEOF, UnexpectedToken } from "./errors.js";
export {
  PREVIEW_LENGTH,
  ParseError,
  UnexpectedEOFError,
  UnexpectedTokenError,
  unexpectedEOF,
  unexpectedToken,
  failureMessage,
  describeFailure,
  toParseError,
  isParseError,
} from "./errors.js";

// Parser contract
export { EOF_DESCRIPTION, createParser, success, failure, map } from "./parser.js";

// Terminal matchers
export { empty, emptyString, string, str, char, chr, anyOf, except, anyChar } from "./matchers.js";

// Lazy references
export { ref } from "./ref.js";

// Configuration, tracing, rendering
export type { ParsnipConfig, ConfigOrigin } from "./config.js";
export { config, loadConfig, ConfigError } from "./config.js";
export type { TraceEvent, TraceWriter } from "./trace.js";
export { setTraceWriter, resetTraceWriter, isTracing } from "./trace.js";
export type { RenderOptions } from "./render.js";
export { renderParseError, printParseError } from "./render.js";
