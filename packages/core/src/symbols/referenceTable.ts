/**
 * packages/core/src/symbols/referenceTable.ts — Interned string references.
 *
 * Why: A pack carries 64-bit references where a native caller would store
 * pointers (format string, signpost name, module, call site). Interned
 * strings live as long as the table, so a reference written into a pack
 * stays resolvable after the send call returns.
 */

import { NULL_REF, TracepackError } from "../abi.js";

export type ReferenceTableOpts = Readonly<{
  /** Upper bound on distinct strings. Past it, intern() returns NULL_REF. */
  maxEntries?: number;
}>;

export const DEFAULT_MAX_REFERENCES = 65_536;

export class ReferenceTable {
  readonly maxEntries: number;

  private readonly refByValue = new Map<string, bigint>();
  private readonly values: string[] = [];

  constructor(opts: ReferenceTableOpts = {}) {
    const maxEntries = opts.maxEntries ?? DEFAULT_MAX_REFERENCES;
    if (!Number.isInteger(maxEntries) || maxEntries <= 0) {
      throw new TracepackError(
        "TRACEPACK_INVALID_OPTIONS",
        `ReferenceTable: maxEntries must be a positive integer (got ${String(maxEntries)})`,
      );
    }
    this.maxEntries = maxEntries;
  }

  get size(): number {
    return this.values.length;
  }

  intern(value: string): bigint {
    const existing = this.refByValue.get(value);
    if (existing !== undefined) return existing;
    if (this.values.length >= this.maxEntries) return NULL_REF;

    this.values.push(value);
    const ref = BigInt(this.values.length);
    this.refByValue.set(value, ref);
    return ref;
  }

  lookup(ref: bigint): string | undefined {
    if (ref <= NULL_REF || ref > BigInt(this.values.length)) return undefined;
    return this.values[Number(ref) - 1];
  }
}
