/**
 * packages/core/src/blob/traceBlob.ts — Growable byte blob for variable-length payloads.
 *
 * Why: Strings and raw data are written in place rather than as fixed-size
 * scalars. The blob starts over caller-supplied inline storage so short
 * payloads never allocate, grows at most up to `maxCapacity`, and clips the
 * payload instead of growing without bound.
 *
 * Invariants:
 *   - TRUNCATED is sticky: once set, every append writes 0 bytes
 *   - Non-binary blobs keep one byte reserved for a trailing NUL, rewritten on every append
 *   - NEEDS_FREE is set iff the current storage came from the allocator
 *   - destroy() releases owned storage exactly once
 */

import { BLOB_FLAG_NEEDS_FREE, BLOB_FLAG_TRUNCATED, TracepackError } from "../abi.js";

export type BlobAllocator = Readonly<{
  allocate(size: number): Uint8Array;
  release(bytes: Uint8Array): void;
}>;

export type TraceBlobOpts = Readonly<{
  /** Inline storage owned by the caller. Its full length is the initial capacity. */
  inline?: Uint8Array;
  /** Hard ceiling for the storage size, NUL reservation included. */
  maxCapacity: number;
  /** Raw byte sequence (no NUL terminator). Defaults to false. */
  binary?: boolean;
  allocator?: BlobAllocator;
}>;

export type BlobAppendOutcome =
  | Readonly<{ status: "written"; written: number }>
  | Readonly<{ status: "truncated"; written: number }>
  | Readonly<{ status: "dropped"; written: 0 }>;

const DROPPED: BlobAppendOutcome = Object.freeze({ status: "dropped", written: 0 });

export const heapBlobAllocator: BlobAllocator = Object.freeze({
  allocate(size: number): Uint8Array {
    return new Uint8Array(size);
  },
  release(_bytes: Uint8Array): void {},
});

function requireCapacity(name: string, v: number, min: number): number {
  if (!Number.isFinite(v) || !Number.isInteger(v) || v < min || v > 0xffff_ffff) {
    throw new TracepackError(
      "TRACEPACK_INVALID_OPTIONS",
      `TraceBlob: ${name} must be an integer in [${String(min)}, 4294967295] (got ${String(v)})`,
    );
  }
  return v;
}

export class TraceBlob {
  readonly maxCapacity: number;
  readonly binary: boolean;

  private buf: Uint8Array;
  private len = 0;
  private blobFlags = 0;
  private destroyed = false;
  private readonly allocator: BlobAllocator;
  private readonly encoder = new TextEncoder();

  constructor(opts: TraceBlobOpts) {
    this.binary = opts.binary === true;
    this.maxCapacity = requireCapacity("maxCapacity", opts.maxCapacity, this.binary ? 0 : 1);
    this.allocator = opts.allocator ?? heapBlobAllocator;
    this.buf = opts.inline ?? new Uint8Array(0);
    if (this.buf.byteLength > this.maxCapacity) {
      this.buf = this.buf.subarray(0, this.maxCapacity);
    }
    if (!this.binary && this.buf.byteLength > 0) {
      this.buf[0] = 0;
    }
  }

  get length(): number {
    return this.len;
  }

  get capacity(): number {
    return this.buf.byteLength;
  }

  get flags(): number {
    return this.blobFlags;
  }

  get truncated(): boolean {
    return (this.blobFlags & BLOB_FLAG_TRUNCATED) !== 0;
  }

  get needsFree(): boolean {
    return (this.blobFlags & BLOB_FLAG_NEEDS_FREE) !== 0;
  }

  isEmpty(): boolean {
    return this.len === 0;
  }

  /** Payload bytes, excluding the NUL terminator of non-binary blobs. */
  bytes(): Uint8Array {
    return this.buf.subarray(0, this.len);
  }

  /** Payload bytes plus the NUL terminator for non-binary blobs with room for it. */
  terminatedBytes(): Uint8Array {
    if (this.binary || this.len >= this.buf.byteLength) return this.bytes();
    return this.buf.subarray(0, this.len + 1);
  }

  text(): string {
    return new TextDecoder().decode(this.bytes());
  }

  append(bytes: Uint8Array): BlobAppendOutcome {
    if (this.destroyed || this.truncated) return DROPPED;

    const size = bytes.byteLength;
    if (size <= this.available()) {
      this.buf.set(bytes, this.len);
      return { status: "written", written: this.growLength(size) };
    }
    return this.appendSlow(bytes);
  }

  appendUtf8(text: string): BlobAppendOutcome {
    if (this.destroyed || this.truncated) return DROPPED;
    return this.append(this.encoder.encode(text));
  }

  destroy(): void {
    if (this.destroyed) return;
    this.destroyed = true;
    if (this.needsFree) {
      const owned = this.buf;
      this.buf = new Uint8Array(0);
      this.len = 0;
      this.blobFlags = 0;
      this.allocator.release(owned);
    }
  }

  private available(): number {
    const reserved = this.binary ? 0 : 1;
    return Math.max(0, this.buf.byteLength - reserved - this.len);
  }

  private used(): number {
    return this.len + (this.binary ? 0 : 1);
  }

  private growLength(extra: number): number {
    this.len += extra;
    if (!this.binary) this.buf[this.len] = 0;
    return extra;
  }

  private grow(hint: number): number {
    const used = this.used();
    const wanted = Math.max(used + hint, this.buf.byteLength * 2);
    const size = Math.min(this.maxCapacity, wanted);

    if (size > this.buf.byteLength) {
      const next = this.allocator.allocate(size);
      next.set(this.buf.subarray(0, Math.min(used, this.buf.byteLength)), 0);
      const previous = this.buf;
      const previousOwned = this.needsFree;
      this.buf = next;
      this.blobFlags |= BLOB_FLAG_NEEDS_FREE;
      if (previousOwned) this.allocator.release(previous);
    }

    return this.available();
  }

  private appendSlow(bytes: Uint8Array): BlobAppendOutcome {
    let size = bytes.byteLength;
    let avail = this.available();
    let truncated = false;

    if (avail < size) {
      if (this.buf.byteLength < this.maxCapacity) {
        avail = this.grow(size);
      }
      if (avail < size) {
        this.blobFlags |= BLOB_FLAG_TRUNCATED;
        truncated = true;
        size = avail;
      }
    }

    if (size > 0) {
      this.buf.set(bytes.subarray(0, size), this.len);
    }
    const written = this.growLength(size);
    return truncated ? { status: "truncated", written } : { status: "written", written };
  }
}

/**
 * Run `fn` with a fresh blob and destroy it on every exit path.
 */
export function withTraceBlob<T>(opts: TraceBlobOpts, fn: (blob: TraceBlob) => T): T {
  const blob = new TraceBlob(opts);
  try {
    return fn(blob);
  } finally {
    blob.destroy();
  }
}
