/**
 * packages/node/src/callSite.ts — Call-site capture from V8 stack traces.
 *
 * JavaScript has no return addresses. The frame directly above the public
 * log method stands in for one: its "file:line:column" is interned as the
 * return address and its file as the module handle, so both survive in the
 * pack as 64-bit references.
 */

import {
  type CallSite,
  type CallSiteResolver,
  type TraceEntryPoint,
  type TraceSymbols,
  UNKNOWN_CALL_SITE,
  defaultTraceSymbols,
} from "@tracepack/core";

export type StackFrame = Readonly<{
  file: string;
  line: number;
  column: number;
}>;

const FRAME_WITH_NAME = /\((.+):(\d+):(\d+)\)$/;
const FRAME_BARE = /^\s*at (?:async )?(.+):(\d+):(\d+)$/;

/** Parse one "    at fn (file:line:col)" or "    at file:line:col" line. */
export function parseStackFrame(line: string): StackFrame | null {
  const m = FRAME_WITH_NAME.exec(line) ?? FRAME_BARE.exec(line);
  if (!m) return null;
  const [, file, lineText, columnText] = m;
  if (file === undefined || lineText === undefined || columnText === undefined) return null;
  return { file, line: Number(lineText), column: Number(columnText) };
}

export function firstStackFrame(stack: string | undefined): StackFrame | null {
  if (stack === undefined) return null;
  for (const line of stack.split("\n")) {
    if (!line.trimStart().startsWith("at ")) continue;
    const frame = parseStackFrame(line);
    if (frame) return frame;
  }
  return null;
}

export function formatCallSite(frame: StackFrame): string {
  return `${frame.file}:${String(frame.line)}:${String(frame.column)}`;
}

export function createStackCallSites(symbols: TraceSymbols = defaultTraceSymbols): CallSiteResolver {
  return Object.freeze({
    resolve(entry: TraceEntryPoint): CallSite {
      const holder: { stack?: string } = {};
      Error.captureStackTrace(holder, entry);
      const frame = firstStackFrame(holder.stack);
      if (frame === null) return UNKNOWN_CALL_SITE;
      return {
        moduleHandle: symbols.strings.intern(frame.file),
        returnAddress: symbols.strings.intern(formatCallSite(frame)),
      };
    },
  });
}
