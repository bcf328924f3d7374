/**
 * packages/node/src/backend/binaryFrame.ts — Length-prefixed frames for binary output.
 *
 * Frame layout (little-endian):
 *   u32 length of everything after this field
 *   u8  kind (FRAME_KIND_*)
 *   u8  log or signpost type
 *   u16 subsystem byte length, subsystem UTF-8
 *   u16 category byte length, category UTF-8
 *   body:
 *     log, signpost: the pack bytes as sent
 *     legacy:        u32 format byte length, format UTF-8, command stream bytes
 */

import type { LogHandle } from "@tracepack/core";
import type { DecodeResult } from "../packDecode.js";

export const FRAME_KIND_LOG = 0;
export const FRAME_KIND_SIGNPOST = 1;
export const FRAME_KIND_LEGACY = 2;

export type FrameKind = typeof FRAME_KIND_LOG | typeof FRAME_KIND_SIGNPOST | typeof FRAME_KIND_LEGACY;

export type TraceFrame = Readonly<{
  kind: FrameKind;
  type: number;
  log: LogHandle;
  body: Uint8Array;
}>;

const FRAME_PREFIX_SIZE = 4;
const MAX_NAME_BYTES = 0xffff;

const utf8Encoder = new TextEncoder();
const utf8Decoder = new TextDecoder();

function nameBytes(name: string): Uint8Array {
  const bytes = utf8Encoder.encode(name);
  return bytes.byteLength > MAX_NAME_BYTES ? bytes.subarray(0, MAX_NAME_BYTES) : bytes;
}

export function encodeFrame(
  kind: FrameKind,
  type: number,
  log: LogHandle,
  body: Uint8Array,
): Uint8Array {
  const sub = nameBytes(log.subsystem);
  const cat = nameBytes(log.category);
  const total = FRAME_PREFIX_SIZE + 2 + 2 + sub.byteLength + 2 + cat.byteLength + body.byteLength;
  const out = new Uint8Array(total);
  const dv = new DataView(out.buffer);

  let off = 0;
  dv.setUint32(off, total - FRAME_PREFIX_SIZE, true);
  off += 4;
  out[off++] = kind;
  out[off++] = type & 0xff;
  dv.setUint16(off, sub.byteLength, true);
  off += 2;
  out.set(sub, off);
  off += sub.byteLength;
  dv.setUint16(off, cat.byteLength, true);
  off += 2;
  out.set(cat, off);
  off += cat.byteLength;
  out.set(body, off);
  return out;
}

export function legacyFrameBody(format: string, commands: Uint8Array): Uint8Array {
  const fmt = utf8Encoder.encode(format);
  const out = new Uint8Array(4 + fmt.byteLength + commands.byteLength);
  new DataView(out.buffer).setUint32(0, fmt.byteLength, true);
  out.set(fmt, 4);
  out.set(commands, 4 + fmt.byteLength);
  return out;
}

function frameKindOf(v: number): FrameKind | null {
  if (v === FRAME_KIND_LOG) return FRAME_KIND_LOG;
  if (v === FRAME_KIND_SIGNPOST) return FRAME_KIND_SIGNPOST;
  if (v === FRAME_KIND_LEGACY) return FRAME_KIND_LEGACY;
  return null;
}

/**
 * Split a byte stream of concatenated frames. Body views alias `bytes`.
 */
export function decodeFrames(bytes: Uint8Array): DecodeResult<readonly TraceFrame[]> {
  const dv = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const frames: TraceFrame[] = [];
  let off = 0;

  const truncated = (what: string): DecodeResult<readonly TraceFrame[]> => ({
    ok: false,
    error: { code: "TRUNCATED_COMMAND", detail: `${what} at offset ${String(off)}` },
  });

  while (off < bytes.byteLength) {
    if (off + FRAME_PREFIX_SIZE + 2 > bytes.byteLength) return truncated("frame header");
    const end = off + FRAME_PREFIX_SIZE + dv.getUint32(off, true);
    if (end > bytes.byteLength) return truncated("frame body");

    const kind = frameKindOf(bytes[off + 4] ?? 0xff);
    if (kind === null) {
      return {
        ok: false,
        error: { code: "UNKNOWN_COMMAND_TYPE", detail: `frame kind at offset ${String(off)}` },
      };
    }
    const type = bytes[off + 5] ?? 0;

    let p = off + 6;
    if (p + 2 > end) return truncated("subsystem length");
    const subLen = dv.getUint16(p, true);
    p += 2;
    if (p + subLen + 2 > end) return truncated("subsystem");
    const subsystem = utf8Decoder.decode(bytes.subarray(p, p + subLen));
    p += subLen;
    const catLen = dv.getUint16(p, true);
    p += 2;
    if (p + catLen > end) return truncated("category");
    const category = utf8Decoder.decode(bytes.subarray(p, p + catLen));
    p += catLen;

    frames.push({ kind, type, log: { subsystem, category }, body: bytes.subarray(p, end) });
    off = end;
  }
  return { ok: true, value: frames };
}
