/**
 * packages/core/src/encoder/commandBuffer.ts — Fixed-capacity command stream encoder.
 *
 * Why: A log statement's arguments are encoded into one small, fixed buffer
 * that a backend decodes later. The encoder never allocates per command and
 * never fails the log call: an argument that does not fit is dropped, and the
 * rest of the statement still encodes.
 *
 * Format:
 *   - Header: 2 bytes (flags u8, command count u8), written on first append
 *   - Commands: 2-byte tag ((flags & 0x0f) | type << 4, size u8) + `size` payload bytes
 *   - Numbers are little-endian
 *
 * Invariants:
 *   - length <= capacity; commandCount <= maxCommands
 *   - A dropped append leaves the buffer byte-identical
 *   - Only OBJECT commands set HEADER_FLAG_HAS_NON_SCALAR
 */

import {
  COMMAND_FLAG_PRIVATE,
  COMMAND_FLAG_PUBLIC,
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
  DEFAULT_COMMAND_BUFFER_SIZE,
  DEFAULT_MAX_COMMANDS,
  HEADER_FLAG_HAS_NON_SCALAR,
  HEADER_FLAG_HAS_PRIVATE,
  MAX_COMMAND_PAYLOAD,
  TracepackError,
  U64_MAX,
} from "../abi.js";
import {
  type BlobAllocator,
  type BlobAppendOutcome,
  type TraceBlobOpts,
  withTraceBlob,
} from "../blob/traceBlob.js";
import type {
  AppendOpts,
  AppendOutcome,
  Command,
  CommandBufferState,
  CommandHeader,
  CommandPrivacy,
  DropReason,
} from "./types.js";

export type CommandBufferOpts = Readonly<{
  /** Total bytes, header included. Defaults to room for 48 commands of 16-byte payloads. */
  capacity?: number;
  /** Defaults to 48. At most 255: the count is stored in a single byte. */
  maxCommands?: number;
  /** Heap source for strings and data that outgrow the inline staging area. */
  allocator?: BlobAllocator;
}>;

/** Largest scalar payload (a 128-bit integer or long double). */
export const MAX_SCALAR_BYTES = 16;

/** Inline staging size for in-place payloads; longer ones grow into the allocator. */
const INLINE_PAYLOAD_BYTES = 64;

/** Non-binary string blobs hold the NUL inside the 255-byte payload ceiling. */
const STRING_BLOB_MAX = MAX_COMMAND_PAYLOAD;
const STRING_TEXT_MAX = STRING_BLOB_MAX - 1;
const DATA_BLOB_MAX = MAX_COMMAND_PAYLOAD;
/** COUNT payload: an i32. */
const COUNT_PAYLOAD_BYTES = 4;
/** Wide strings keep whole UTF-16 code units. */
const WIDE_STRING_BLOB_MAX = MAX_COMMAND_PAYLOAD - 1;

const EMPTY_STATE: CommandBufferState = Object.freeze({ status: "empty" });

const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;

function dropped(reason: DropReason): AppendOutcome {
  return { status: "dropped", reason };
}

export function privacyFlags(privacy: CommandPrivacy | undefined): number {
  switch (privacy) {
    case "private":
      return COMMAND_FLAG_PRIVATE;
    case "public":
      return COMMAND_FLAG_PUBLIC;
    default:
      return 0;
  }
}

function isI32(v: number): boolean {
  return Number.isInteger(v) && v >= INT32_MIN && v <= INT32_MAX;
}

function toBigInt(v: number | bigint): bigint | null {
  if (typeof v === "bigint") return v;
  if (!Number.isSafeInteger(v)) return null;
  return BigInt(v);
}

function typeCodeOf(kind: Command["kind"]): CommandTypeCode {
  switch (kind) {
    case "scalar":
      return COMMAND_TYPE_SCALAR;
    case "count":
      return COMMAND_TYPE_COUNT;
    case "string":
      return COMMAND_TYPE_STRING;
    case "data":
      return COMMAND_TYPE_DATA;
    case "object":
      return COMMAND_TYPE_OBJECT;
    case "wideString":
      return COMMAND_TYPE_WIDE_STRING;
    case "errno":
      return COMMAND_TYPE_ERRNO;
  }
}

function requireIntInRange(name: string, v: number, min: number, max: number): number {
  if (!Number.isFinite(v) || !Number.isInteger(v) || v < min || v > max) {
    throw new TracepackError(
      "TRACEPACK_INVALID_OPTIONS",
      `CommandBuffer: ${name} must be an integer in [${String(min)}, ${String(max)}] (got ${String(v)})`,
    );
  }
  return v;
}

function withTruncation(outcome: AppendOutcome, clipped: boolean): AppendOutcome {
  if (outcome.status === "written" && clipped) {
    return { status: "truncated", bytes: outcome.bytes };
  }
  return outcome;
}

function isClipped(staged: BlobAppendOutcome): boolean {
  return staged.status === "truncated";
}

/** Longest prefix of `utf8` no longer than `max` bytes that ends on a code point. */
function utf8Boundary(utf8: Uint8Array, max: number): number {
  if (utf8.byteLength <= max) return utf8.byteLength;
  let cut = max;
  while (cut > 0 && ((utf8[cut] ?? 0) & 0xc0) === 0x80) cut--;
  return cut;
}

/** Code units to keep so a surrogate pair is never split. */
function utf16Boundary(text: string, maxUnits: number): number {
  if (text.length <= maxUnits) return text.length;
  const last = text.charCodeAt(maxUnits - 1);
  return last >= 0xd800 && last <= 0xdbff ? maxUnits - 1 : maxUnits;
}

function encodeUtf16le(text: string, units: number): Uint8Array {
  const out = new Uint8Array(units * 2);
  for (let i = 0; i < units; i++) {
    const cu = text.charCodeAt(i);
    out[i * 2] = cu & 0xff;
    out[i * 2 + 1] = cu >>> 8;
  }
  return out;
}

export class CommandBuffer {
  readonly capacity: number;
  readonly maxCommands: number;

  private readonly buf: Uint8Array;
  private readonly scratch = new Uint8Array(8);
  private readonly scratchDv: DataView;
  private readonly staging = new Uint8Array(INLINE_PAYLOAD_BYTES);
  private readonly allocator: BlobAllocator | undefined;
  private readonly utf8 = new TextEncoder();
  private state: CommandBufferState = EMPTY_STATE;

  constructor(opts: CommandBufferOpts = {}) {
    this.capacity = requireIntInRange(
      "capacity",
      opts.capacity ?? DEFAULT_COMMAND_BUFFER_SIZE,
      COMMAND_HEADER_SIZE,
      0xffff,
    );
    this.maxCommands = requireIntInRange(
      "maxCommands",
      opts.maxCommands ?? DEFAULT_MAX_COMMANDS,
      1,
      0xff,
    );
    this.allocator = opts.allocator;
    this.buf = new Uint8Array(this.capacity);
    this.scratchDv = new DataView(this.scratch.buffer);
  }

  get status(): CommandBufferState["status"] {
    return this.state.status;
  }

  get length(): number {
    return this.state.status === "empty" ? 0 : this.state.length;
  }

  get commandCount(): number {
    return this.state.status === "empty" ? 0 : this.state.header.commandCount;
  }

  get flags(): number {
    return this.state.status === "empty" ? 0 : this.state.header.flags;
  }

  header(): CommandHeader | null {
    return this.state.status === "empty" ? null : this.state.header;
  }

  /** Bytes still free for commands (tags included). */
  remaining(): number {
    const used = this.state.status === "empty" ? COMMAND_HEADER_SIZE : this.state.length;
    return this.capacity - used;
  }

  /** View of the encoded stream: header + commands, or empty if nothing was appended. */
  bytes(): Uint8Array {
    return this.buf.subarray(0, this.length);
  }

  reset(): void {
    this.buf.fill(0, 0, this.length);
    this.state = EMPTY_STATE;
  }

  append(command: Command): AppendOutcome {
    const payload = this.payloadOf(command);
    if (payload === null) return dropped("invalid");

    const rejection = this.admit(1, COMMAND_TAG_SIZE + payload.byteLength);
    if (rejection) return dropped(rejection);

    const bytes = this.writeCommand(typeCodeOf(command.kind), command.flags, payload);
    return { status: "written", bytes };
  }

  appendScalar(bytes: Uint8Array, opts?: AppendOpts): AppendOutcome {
    if (bytes.byteLength === 0 || bytes.byteLength > MAX_SCALAR_BYTES) return dropped("invalid");
    return this.append({ kind: "scalar", flags: privacyFlags(opts?.privacy), payload: bytes });
  }

  appendInt32(value: number, opts?: AppendOpts): AppendOutcome {
    if (!isI32(value)) return dropped("invalid");
    this.scratchDv.setInt32(0, value, true);
    return this.appendScalar(this.scratch.subarray(0, 4), opts);
  }

  /** Stores the 32-bit pattern of an unsigned value. */
  appendUint32(value: number, opts?: AppendOpts): AppendOutcome {
    if (!Number.isInteger(value) || value < 0 || value > 0xffff_ffff) return dropped("invalid");
    this.scratchDv.setUint32(0, value, true);
    return this.appendScalar(this.scratch.subarray(0, 4), opts);
  }

  appendInt64(value: number | bigint, opts?: AppendOpts): AppendOutcome {
    const v = toBigInt(value);
    if (v === null || v !== BigInt.asIntN(64, v)) return dropped("invalid");
    this.scratchDv.setBigInt64(0, v, true);
    return this.appendScalar(this.scratch.subarray(0, 8), opts);
  }

  appendUint64(value: number | bigint, opts?: AppendOpts): AppendOutcome {
    const v = toBigInt(value);
    if (v === null || v < 0n || v > U64_MAX) return dropped("invalid");
    this.scratchDv.setBigUint64(0, v, true);
    return this.appendScalar(this.scratch.subarray(0, 8), opts);
  }

  /** Pointer-sized integer: 8 bytes on every supported backend. */
  appendIntPtr(value: number | bigint, opts?: AppendOpts): AppendOutcome {
    return this.appendInt64(value, opts);
  }

  /**
   * Precision hint (i32) followed by the IEEE-754 double.
   * Both commands are admitted together or not at all.
   */
  appendFloat(value: number, precision: number, opts?: AppendOpts): AppendOutcome {
    if (!isI32(precision)) return dropped("invalid");

    const rejection = this.admit(2, COMMAND_TAG_SIZE + 4 + COMMAND_TAG_SIZE + 8);
    if (rejection) return dropped(rejection);

    const flags = privacyFlags(opts?.privacy);
    this.scratchDv.setInt32(0, precision, true);
    let bytes = this.writeCommand(COMMAND_TYPE_SCALAR, flags, this.scratch.subarray(0, 4));
    this.scratchDv.setFloat64(0, value, true);
    bytes += this.writeCommand(COMMAND_TYPE_SCALAR, flags, this.scratch.subarray(0, 8));
    return { status: "written", bytes };
  }

  appendCount(value: number, opts?: AppendOpts): AppendOutcome {
    return this.append({ kind: "count", flags: privacyFlags(opts?.privacy), value });
  }

  appendObject(handle: bigint, opts?: AppendOpts): AppendOutcome {
    return this.append({ kind: "object", flags: privacyFlags(opts?.privacy), handle });
  }

  appendErrno(opts?: AppendOpts): AppendOutcome {
    return this.append({ kind: "errno", flags: privacyFlags(opts?.privacy) });
  }

  /**
   * UTF-8 in place with a trailing NUL; clipped to 254 bytes of text, cut
   * back to the last whole code point.
   */
  appendString(text: string, opts?: AppendOpts): AppendOutcome {
    const flags = privacyFlags(opts?.privacy);
    // Every code unit is at least one byte, so this prefix still overflows when the whole would.
    const head = text.length > STRING_BLOB_MAX ? text.slice(0, STRING_BLOB_MAX) : text;
    const utf8 = this.utf8.encode(head);
    const fit = utf8Boundary(utf8, STRING_TEXT_MAX);
    return withTraceBlob(this.blobOpts(STRING_BLOB_MAX, false), (blob) => {
      const staged = blob.append(utf8.subarray(0, fit));
      const outcome = this.append({ kind: "string", flags, payload: blob.terminatedBytes() });
      return withTruncation(outcome, fit < utf8.byteLength || isClipped(staged));
    });
  }

  /** UTF-16LE code units in place, no terminator; clipped to 127 units. */
  appendWideString(text: string, opts?: AppendOpts): AppendOutcome {
    const flags = privacyFlags(opts?.privacy);
    const keep = utf16Boundary(text, WIDE_STRING_BLOB_MAX / 2);
    const units = encodeUtf16le(text, keep);
    return withTraceBlob(this.blobOpts(WIDE_STRING_BLOB_MAX, true), (blob) => {
      const staged = blob.append(units);
      const outcome = this.append({ kind: "wideString", flags, payload: blob.bytes() });
      return withTruncation(outcome, keep < text.length || isClipped(staged));
    });
  }

  /** Raw bytes in place; clipped to 255 bytes. */
  appendData(bytes: Uint8Array, opts?: AppendOpts): AppendOutcome {
    const flags = privacyFlags(opts?.privacy);
    return withTraceBlob(this.blobOpts(DATA_BLOB_MAX, true), (blob) => {
      const staged = blob.append(bytes);
      const outcome = this.append({ kind: "data", flags, payload: blob.bytes() });
      return withTruncation(outcome, isClipped(staged));
    });
  }

  /**
   * COUNT followed by DATA of that many bytes, clipped to 255.
   * Both commands are admitted together or not at all.
   */
  appendCountedData(bytes: Uint8Array, opts?: AppendOpts): AppendOutcome {
    const count = Math.min(bytes.byteLength, DATA_BLOB_MAX);
    const rejection = this.admit(
      2,
      COMMAND_TAG_SIZE + COUNT_PAYLOAD_BYTES + COMMAND_TAG_SIZE + count,
    );
    if (rejection) return dropped(rejection);

    const countOutcome = this.appendCount(count, opts);
    const dataOutcome = this.appendData(bytes.subarray(0, count), opts);
    if (countOutcome.status === "dropped") return countOutcome;
    if (dataOutcome.status === "dropped") return dataOutcome;
    const total = countOutcome.bytes + dataOutcome.bytes;
    return withTruncation({ status: "written", bytes: total }, count < bytes.byteLength);
  }

  private blobOpts(maxCapacity: number, binary: boolean): TraceBlobOpts {
    return { inline: this.staging, maxCapacity, binary, allocator: this.allocator };
  }

  private admit(commands: number, bytes: number): DropReason | null {
    if (this.commandCount + commands > this.maxCommands) return "maxCommands";
    if (this.remaining() < bytes) return "capacity";
    return null;
  }

  private payloadOf(command: Command): Uint8Array | null {
    switch (command.kind) {
      case "scalar":
        if (command.payload.byteLength === 0 || command.payload.byteLength > MAX_SCALAR_BYTES) {
          return null;
        }
        return command.payload;
      case "string":
      case "data":
      case "wideString":
        return command.payload.byteLength > MAX_COMMAND_PAYLOAD ? null : command.payload;
      case "count":
        if (!isI32(command.value)) return null;
        this.scratchDv.setInt32(0, command.value, true);
        return this.scratch.subarray(0, 4);
      case "object":
        if (command.handle < 0n || command.handle > U64_MAX) return null;
        this.scratchDv.setBigUint64(0, command.handle, true);
        return this.scratch.subarray(0, 8);
      case "errno":
        return this.scratch.subarray(0, 0);
    }
  }

  private writeCommand(type: CommandTypeCode, flags: number, payload: Uint8Array): number {
    const prev = this.state;
    let length = COMMAND_HEADER_SIZE;
    let headerFlags = 0;
    let commandCount = 0;
    if (prev.status === "initialized") {
      length = prev.length;
      headerFlags = prev.header.flags;
      commandCount = prev.header.commandCount;
    } else {
      this.buf.fill(0, 0, COMMAND_HEADER_SIZE);
    }

    const cmdFlags = flags & 0x0f;
    this.buf[length] = cmdFlags | (type << 4);
    this.buf[length + 1] = payload.byteLength;
    this.buf.set(payload, length + COMMAND_TAG_SIZE);

    if ((cmdFlags & COMMAND_FLAG_PRIVATE) !== 0) headerFlags |= HEADER_FLAG_HAS_PRIVATE;
    if (type === COMMAND_TYPE_OBJECT) headerFlags |= HEADER_FLAG_HAS_NON_SCALAR;
    commandCount += 1;

    this.buf[0] = headerFlags;
    this.buf[1] = commandCount;

    const written = COMMAND_TAG_SIZE + payload.byteLength;
    this.state = {
      status: "initialized",
      header: { flags: headerFlags, commandCount },
      length: length + written,
    };
    return written;
  }
}

export function createCommandBuffer(opts: CommandBufferOpts = {}): CommandBuffer {
  return new CommandBuffer(opts);
}
