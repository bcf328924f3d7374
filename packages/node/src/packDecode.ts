/**
 * packages/node/src/packDecode.ts — Pack and command stream decoding.
 *
 * Why: The core only writes. Decoding belongs to the backend, and every
 * malformed input comes back as a result value; the backend is on the
 * logging path and must not throw.
 */

import {
  COMMAND_HEADER_SIZE,
  COMMAND_TAG_SIZE,
  COMMAND_TYPE_COUNT,
  COMMAND_TYPE_DATA,
  COMMAND_TYPE_ERRNO,
  COMMAND_TYPE_OBJECT,
  COMMAND_TYPE_SCALAR,
  COMMAND_TYPE_STRING,
  COMMAND_TYPE_WIDE_STRING,
  type CommandTypeCode,
  PACK_HEADER_SIZE,
  PACK_OFFSET_CONTINUOUS_TIME,
  PACK_OFFSET_FORMAT_REF,
  PACK_OFFSET_MODULE_HANDLE,
  PACK_OFFSET_RETURN_ADDRESS,
  PACK_OFFSET_SAVED_ERRNO,
  PACK_OFFSET_WALL_NANOS,
  PACK_OFFSET_WALL_SECONDS,
  SIGNPOST_OFFSET_ID,
  SIGNPOST_OFFSET_NAME_REF,
  SIGNPOST_PACK_HEADER_SIZE,
} from "@tracepack/core";

export type DecodeErrorCode =
  | "TRUNCATED_HEADER"
  | "TRUNCATED_COMMAND"
  | "UNKNOWN_COMMAND_TYPE"
  | "COUNT_MISMATCH";

export type DecodeError = Readonly<{ code: DecodeErrorCode; detail: string }>;

export type DecodeResult<T> =
  | Readonly<{ ok: true; value: T }>
  | Readonly<{ ok: false; error: DecodeError }>;

export type DecodedCommand = Readonly<{
  type: CommandTypeCode;
  flags: number;
  payload: Uint8Array;
}>;

export type DecodedCommandStream = Readonly<{
  flags: number;
  commands: readonly DecodedCommand[];
}>;

export type DecodedPack = Readonly<{
  continuousNs: bigint;
  wallSeconds: bigint;
  wallNanos: number;
  savedErrno: number;
  moduleHandle: bigint;
  returnAddress: bigint;
  formatRef: bigint;
  stream: DecodedCommandStream;
}>;

export type DecodedSignpostPack = DecodedPack &
  Readonly<{
    nameRef: bigint;
    id: bigint;
  }>;

const EMPTY_STREAM: DecodedCommandStream = Object.freeze({ flags: 0, commands: Object.freeze([]) });

function fail<T>(code: DecodeErrorCode, detail: string): DecodeResult<T> {
  return { ok: false, error: { code, detail } };
}

export function commandTypeOf(nibble: number): CommandTypeCode | null {
  switch (nibble) {
    case COMMAND_TYPE_SCALAR:
      return COMMAND_TYPE_SCALAR;
    case COMMAND_TYPE_COUNT:
      return COMMAND_TYPE_COUNT;
    case COMMAND_TYPE_STRING:
      return COMMAND_TYPE_STRING;
    case COMMAND_TYPE_DATA:
      return COMMAND_TYPE_DATA;
    case COMMAND_TYPE_OBJECT:
      return COMMAND_TYPE_OBJECT;
    case COMMAND_TYPE_WIDE_STRING:
      return COMMAND_TYPE_WIDE_STRING;
    case COMMAND_TYPE_ERRNO:
      return COMMAND_TYPE_ERRNO;
    default:
      return null;
  }
}

/**
 * Decode a command stream. Zero bytes is a valid, empty stream (no header).
 * Payload views alias `bytes`.
 */
export function decodeCommandStream(bytes: Uint8Array): DecodeResult<DecodedCommandStream> {
  if (bytes.byteLength === 0) return { ok: true, value: EMPTY_STREAM };
  if (bytes.byteLength < COMMAND_HEADER_SIZE) {
    return fail("TRUNCATED_HEADER", `command stream of ${String(bytes.byteLength)} bytes`);
  }

  const flags = bytes[0] ?? 0;
  const count = bytes[1] ?? 0;
  const commands: DecodedCommand[] = [];
  let off = COMMAND_HEADER_SIZE;

  while (off < bytes.byteLength) {
    if (off + COMMAND_TAG_SIZE > bytes.byteLength) {
      return fail("TRUNCATED_COMMAND", `tag at offset ${String(off)} is cut short`);
    }
    const tag = bytes[off] ?? 0;
    const size = bytes[off + 1] ?? 0;
    const type = commandTypeOf(tag >>> 4);
    if (type === null) {
      return fail("UNKNOWN_COMMAND_TYPE", `type ${String(tag >>> 4)} at offset ${String(off)}`);
    }
    const start = off + COMMAND_TAG_SIZE;
    if (start + size > bytes.byteLength) {
      return fail(
        "TRUNCATED_COMMAND",
        `payload of ${String(size)} bytes at offset ${String(start)} overruns the stream`,
      );
    }
    commands.push({ type, flags: tag & 0x0f, payload: bytes.subarray(start, start + size) });
    off = start + size;
  }

  if (commands.length !== count) {
    return fail(
      "COUNT_MISMATCH",
      `header declares ${String(count)} commands, stream holds ${String(commands.length)}`,
    );
  }
  return { ok: true, value: { flags, commands } };
}

function readHeader(dv: DataView, stream: DecodedCommandStream): DecodedPack {
  return {
    continuousNs: dv.getBigUint64(PACK_OFFSET_CONTINUOUS_TIME, true),
    wallSeconds: dv.getBigInt64(PACK_OFFSET_WALL_SECONDS, true),
    wallNanos: dv.getUint32(PACK_OFFSET_WALL_NANOS, true),
    savedErrno: dv.getInt32(PACK_OFFSET_SAVED_ERRNO, true),
    moduleHandle: dv.getBigUint64(PACK_OFFSET_MODULE_HANDLE, true),
    returnAddress: dv.getBigUint64(PACK_OFFSET_RETURN_ADDRESS, true),
    formatRef: dv.getBigUint64(PACK_OFFSET_FORMAT_REF, true),
    stream,
  };
}

export function decodePack(pack: Uint8Array): DecodeResult<DecodedPack> {
  if (pack.byteLength < PACK_HEADER_SIZE) {
    return fail("TRUNCATED_HEADER", `pack of ${String(pack.byteLength)} bytes`);
  }
  const stream = decodeCommandStream(pack.subarray(PACK_HEADER_SIZE));
  if (!stream.ok) return stream;
  const dv = new DataView(pack.buffer, pack.byteOffset, pack.byteLength);
  return { ok: true, value: readHeader(dv, stream.value) };
}

export function decodeSignpostPack(pack: Uint8Array): DecodeResult<DecodedSignpostPack> {
  if (pack.byteLength < SIGNPOST_PACK_HEADER_SIZE) {
    return fail("TRUNCATED_HEADER", `signpost pack of ${String(pack.byteLength)} bytes`);
  }
  const stream = decodeCommandStream(pack.subarray(SIGNPOST_PACK_HEADER_SIZE));
  if (!stream.ok) return stream;
  const dv = new DataView(pack.buffer, pack.byteOffset, pack.byteLength);
  return {
    ok: true,
    value: {
      ...readHeader(dv, stream.value),
      nameRef: dv.getBigUint64(SIGNPOST_OFFSET_NAME_REF, true),
      id: dv.getBigUint64(SIGNPOST_OFFSET_ID, true),
    },
  };
}
