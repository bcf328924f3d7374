/**
 * packages/node/src/backend/streamBackend.ts — LogBackend writing to a Node stream.
 *
 * Why: Under Node there is no system log to hand packs to. This backend
 * plays that role: it gates by level, decodes and renders packs to text
 * lines (or forwards them as binary frames), and keeps objects referenced
 * by OBJECT commands alive while a pack is being rendered.
 *
 * Every send method is fire-and-forget. Decode and write failures are
 * counted in stats() and forwarded to `onError`; they never reach the caller.
 */

import {
  type BackendCaps,
  COMMAND_TYPE_OBJECT,
  HEADER_FLAG_HAS_NON_SCALAR,
  LOG_TYPE_DEBUG,
  LOG_TYPE_DEFAULT,
  LOG_TYPE_ERROR,
  LOG_TYPE_FAULT,
  LOG_TYPE_INFO,
  type LegacyLogRecord,
  type LogBackend,
  type LogHandle,
  type LogType,
  PACK_FORMAT_VERSION,
  SIGNPOST_TYPE_EVENT,
  SIGNPOST_TYPE_INTERVAL_BEGIN,
  SIGNPOST_TYPE_INTERVAL_END,
  type SignpostType,
  TracepackError,
  type TraceSymbols,
  defaultTraceSymbols,
} from "@tracepack/core";
import { type MinLevel, type OutputMode, levelRank, minLevelRank } from "../config.js";
import {
  type DecodeError,
  type DecodedCommandStream,
  decodeCommandStream,
  decodePack,
  decodeSignpostPack,
} from "../packDecode.js";
import { renderMessage } from "../render.js";
import {
  FRAME_KIND_LEGACY,
  FRAME_KIND_LOG,
  FRAME_KIND_SIGNPOST,
  encodeFrame,
  legacyFrameBody,
} from "./binaryFrame.js";

/** Anything with a Node-style write(), such as process.stderr or a file stream. */
export type TraceSink = Readonly<{
  write(chunk: string | Uint8Array): unknown;
}>;

export type StreamBackendOpts = Readonly<{
  sink: TraceSink;
  mode?: OutputMode;
  minLevel?: MinLevel;
  /** Advertised pack format. 0 makes emitters fall back to legacy records. */
  packFormatVersion?: number;
  signposts?: boolean;
  redactPrivate?: boolean;
  /** Must be the same tables the emitting side interns into. */
  symbols?: TraceSymbols;
  /** Timestamp source for legacy records and decode failures, which carry no clock. */
  now?: () => Date;
  onError?: (err: Error) => void;
}>;

export type StreamBackendStats = Readonly<{
  packs: number;
  signposts: number;
  legacy: number;
  filtered: number;
  decodeErrors: number;
  writeErrors: number;
}>;

export type StreamBackend = LogBackend &
  Readonly<{
    mode: OutputMode;
    stats: () => StreamBackendStats;
  }>;

export const UNKNOWN_FORMAT = "<unknown format>";
export const UNKNOWN_NAME = "<unknown>";

export function logTypeName(type: LogType): string {
  switch (type) {
    case LOG_TYPE_DEFAULT:
      return "Default";
    case LOG_TYPE_INFO:
      return "Info";
    case LOG_TYPE_DEBUG:
      return "Debug";
    case LOG_TYPE_ERROR:
      return "Error";
    case LOG_TYPE_FAULT:
      return "Fault";
  }
}

export function signpostTypeName(type: SignpostType): string {
  switch (type) {
    case SIGNPOST_TYPE_EVENT:
      return "event";
    case SIGNPOST_TYPE_INTERVAL_BEGIN:
      return "begin";
    case SIGNPOST_TYPE_INTERVAL_END:
      return "end";
  }
}

function safeErr(err: unknown): Error {
  if (err instanceof Error) return err;
  return new Error(typeof err === "string" ? err : "non-Error thrown by sink");
}

function wallClockIso(seconds: bigint, nanos: number): string {
  const ms = Number(seconds) * 1000 + Math.floor(nanos / 1_000_000);
  const date = new Date(ms);
  return Number.isNaN(date.getTime()) ? "invalid-time" : date.toISOString();
}

function line(parts: readonly string[], message: string): string {
  return message.length > 0 ? `${parts.join(" ")} ${message}\n` : `${parts.join(" ")}\n`;
}

function objectHandles(stream: DecodedCommandStream): bigint[] {
  if ((stream.flags & HEADER_FLAG_HAS_NON_SCALAR) === 0) return [];
  const handles: bigint[] = [];
  for (const cmd of stream.commands) {
    if (cmd.type !== COMMAND_TYPE_OBJECT || cmd.payload.byteLength !== 8) continue;
    const p = cmd.payload;
    handles.push(new DataView(p.buffer, p.byteOffset, 8).getBigUint64(0, true));
  }
  return handles;
}

export function createStreamBackend(opts: StreamBackendOpts): StreamBackend {
  const sink = opts.sink;
  const mode = opts.mode ?? "text";
  const minRank = minLevelRank(opts.minLevel ?? "default");
  const packFormatVersion = opts.packFormatVersion ?? PACK_FORMAT_VERSION;
  if (!Number.isInteger(packFormatVersion) || packFormatVersion < 0) {
    throw new TracepackError(
      "TRACEPACK_INVALID_OPTIONS",
      `createStreamBackend: packFormatVersion must be a non-negative integer (got ${String(packFormatVersion)})`,
    );
  }
  const caps: BackendCaps = Object.freeze({
    packFormatVersion,
    signposts: opts.signposts ?? true,
  });
  const redactPrivate = opts.redactPrivate ?? true;
  const symbols = opts.symbols ?? defaultTraceSymbols;
  const now = opts.now ?? (() => new Date());
  const onError = opts.onError;

  const stats = {
    packs: 0,
    signposts: 0,
    legacy: 0,
    filtered: 0,
    decodeErrors: 0,
    writeErrors: 0,
  };

  function write(chunk: string | Uint8Array): void {
    try {
      sink.write(chunk);
    } catch (err: unknown) {
      stats.writeErrors++;
      onError?.(safeErr(err));
    }
  }

  function reportDecodeError(log: LogHandle, what: string, error: DecodeError): void {
    stats.decodeErrors++;
    onError?.(
      new TracepackError("TRACEPACK_BACKEND_ERROR", `${what}: ${error.code} (${error.detail})`),
    );
    if (mode === "text") {
      write(
        line(
          [now().toISOString(), "Error", `${log.subsystem}:${log.category}`],
          `<undecodable ${what}: ${error.code}>`,
        ),
      );
    }
  }

  function render(format: string, stream: DecodedCommandStream, savedErrno: number): string {
    const handles = objectHandles(stream);
    const pinned = handles.filter((h) => symbols.objects.retain(h));
    try {
      return renderMessage(format, stream.commands, {
        savedErrno,
        redactPrivate,
        objects: symbols.objects,
      });
    } finally {
      for (const h of pinned) symbols.objects.release(h);
    }
  }

  function isEnabled(_log: LogHandle, type: LogType): boolean {
    return levelRank(type) >= minRank;
  }

  function sendPack(pack: Uint8Array, log: LogHandle, type: LogType): void {
    if (!isEnabled(log, type)) {
      stats.filtered++;
      return;
    }
    if (mode === "binary") {
      stats.packs++;
      write(encodeFrame(FRAME_KIND_LOG, type, log, pack));
      return;
    }

    const decoded = decodePack(pack);
    if (!decoded.ok) {
      reportDecodeError(log, "pack", decoded.error);
      return;
    }
    const p = decoded.value;
    stats.packs++;
    const format = symbols.strings.lookup(p.formatRef) ?? UNKNOWN_FORMAT;
    write(
      line(
        [
          wallClockIso(p.wallSeconds, p.wallNanos),
          logTypeName(type),
          `${log.subsystem}:${log.category}`,
        ],
        render(format, p.stream, p.savedErrno),
      ),
    );
  }

  function sendSignpostPack(pack: Uint8Array, log: LogHandle, type: SignpostType): void {
    if (!caps.signposts) {
      stats.filtered++;
      return;
    }
    if (mode === "binary") {
      stats.signposts++;
      write(encodeFrame(FRAME_KIND_SIGNPOST, type, log, pack));
      return;
    }

    const decoded = decodeSignpostPack(pack);
    if (!decoded.ok) {
      reportDecodeError(log, "signpost pack", decoded.error);
      return;
    }
    const p = decoded.value;
    stats.signposts++;
    const format = symbols.strings.lookup(p.formatRef) ?? UNKNOWN_FORMAT;
    const name = symbols.strings.lookup(p.nameRef) ?? UNKNOWN_NAME;
    write(
      line(
        [
          wallClockIso(p.wallSeconds, p.wallNanos),
          "Signpost",
          `${log.subsystem}:${log.category}`,
          signpostTypeName(type),
          name,
          `id=0x${p.id.toString(16)}`,
        ],
        render(format, p.stream, p.savedErrno),
      ),
    );
  }

  function sendLegacy(record: LegacyLogRecord): void {
    if (!isEnabled(record.log, record.type)) {
      stats.filtered++;
      return;
    }
    if (mode === "binary") {
      stats.legacy++;
      write(
        encodeFrame(
          FRAME_KIND_LEGACY,
          record.type,
          record.log,
          legacyFrameBody(record.format, record.commands),
        ),
      );
      return;
    }

    const decoded = decodeCommandStream(record.commands);
    if (!decoded.ok) {
      reportDecodeError(record.log, "legacy record", decoded.error);
      return;
    }
    stats.legacy++;
    write(
      line(
        [
          now().toISOString(),
          logTypeName(record.type),
          `${record.log.subsystem}:${record.log.category}`,
        ],
        render(record.format, decoded.value, 0),
      ),
    );
  }

  return Object.freeze({
    caps,
    mode,
    isEnabled,
    sendPack,
    sendSignpostPack,
    sendLegacy,
    stats: (): StreamBackendStats => ({ ...stats }),
  });
}
