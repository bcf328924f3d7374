/**
 * packages/core/src/pack/layout.ts — Pack sizing and header fill.
 *
 * Why: A pack is one contiguous block (metadata header + command stream)
 * allocated exactly once. Sizing is a pure function of the command stream
 * length, and filling writes only inside the `size` the caller sized for.
 *
 * Layout: see PACK_OFFSET_* and SIGNPOST_OFFSET_* in abi.ts.
 */

import {
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
} from "../abi.js";
import type { PackClock } from "../clock.js";

export type PackFields = Readonly<{
  clock: PackClock;
  /** errno captured at the call site; ERRNO commands resolve against it. */
  savedErrno: number;
  moduleHandle: bigint;
  formatRef: bigint;
}>;

export type SignpostPackFields = PackFields &
  Readonly<{
    nameRef: bigint;
    id: bigint;
  }>;

function commandBytes(n: number): number {
  return Number.isInteger(n) && n > 0 ? n : 0;
}

export function requiredPackSize(commandBytesLength: number): number {
  return PACK_HEADER_SIZE + commandBytes(commandBytesLength);
}

export function requiredSignpostPackSize(commandBytesLength: number): number {
  return SIGNPOST_PACK_HEADER_SIZE + commandBytes(commandBytesLength);
}

function u64(v: bigint): bigint {
  return BigInt.asUintN(64, v);
}

function writePackHeader(dv: DataView, fields: PackFields): void {
  const wall = fields.clock.wallTime();
  const nanos = Number.isInteger(wall.nanos) && wall.nanos >= 0 ? wall.nanos % 1_000_000_000 : 0;

  dv.setBigUint64(PACK_OFFSET_CONTINUOUS_TIME, u64(fields.clock.continuousNs()), true);
  dv.setBigInt64(PACK_OFFSET_WALL_SECONDS, BigInt.asIntN(64, wall.seconds), true);
  dv.setUint32(PACK_OFFSET_WALL_NANOS, nanos, true);
  dv.setInt32(PACK_OFFSET_SAVED_ERRNO, fields.savedErrno | 0, true);
  dv.setBigUint64(PACK_OFFSET_MODULE_HANDLE, u64(fields.moduleHandle), true);
  // Patched by setPackReturnAddress once the caller frame is known.
  dv.setBigUint64(PACK_OFFSET_RETURN_ADDRESS, 0n, true);
  dv.setBigUint64(PACK_OFFSET_FORMAT_REF, u64(fields.formatRef), true);
}

function writeSignpostHeader(dv: DataView, fields: SignpostPackFields): void {
  writePackHeader(dv, fields);
  dv.setBigUint64(SIGNPOST_OFFSET_NAME_REF, u64(fields.nameRef), true);
  dv.setBigUint64(SIGNPOST_OFFSET_ID, u64(fields.id), true);
}

function viewFor(pack: Uint8Array, size: number, headerSize: number): DataView | null {
  if (!Number.isInteger(size) || size < headerSize || size > pack.byteLength) return null;
  pack.fill(0, headerSize, size);
  return new DataView(pack.buffer, pack.byteOffset, size);
}

/**
 * Write the log pack header into `pack[0, size)`.
 *
 * @returns offset where command bytes go, or null if `size` cannot hold the
 *   header or exceeds `pack`
 */
export function fillPack(pack: Uint8Array, size: number, fields: PackFields): number | null {
  const dv = viewFor(pack, size, PACK_HEADER_SIZE);
  if (dv === null) return null;
  writePackHeader(dv, fields);
  return PACK_HEADER_SIZE;
}

export function fillSignpostPack(
  pack: Uint8Array,
  size: number,
  fields: SignpostPackFields,
): number | null {
  const dv = viewFor(pack, size, SIGNPOST_PACK_HEADER_SIZE);
  if (dv === null) return null;
  writeSignpostHeader(dv, fields);
  return SIGNPOST_PACK_HEADER_SIZE;
}

export function setPackReturnAddress(pack: Uint8Array, address: bigint): boolean {
  if (pack.byteLength < PACK_HEADER_SIZE) return false;
  const dv = new DataView(pack.buffer, pack.byteOffset, PACK_HEADER_SIZE);
  dv.setBigUint64(PACK_OFFSET_RETURN_ADDRESS, u64(address), true);
  return true;
}
