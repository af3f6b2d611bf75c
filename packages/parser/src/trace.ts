/**
 * Trace output. Silent unless the `trace` config flag is on.
 */

import { config } from "./config.js";

export type TraceEvent = "parse" | "ref" | "fail";

export type TraceWriter = (line: string) => void;

const defaultWriter: TraceWriter = (line) => console.error(line);

let writer: TraceWriter = defaultWriter;

/** Route trace lines somewhere other than stderr. */
export function setTraceWriter(next: TraceWriter): void {
  writer = next;
}

export function resetTraceWriter(): void {
  writer = defaultWriter;
}

export function isTracing(): boolean {
  return config.get("trace");
}

/**
 * Emit `[parsnip] <event>: <detail>`. `detail` may be a thunk so callers pay
 * for formatting only while tracing.
 */
export function traceEvent(event: TraceEvent, detail: string | (() => string)): void {
  if (!isTracing()) return;
  writer(`[parsnip] ${event}: ${typeof detail === "function" ? detail() : detail}`);
}
