/**
 * packages/core/src/symbols/objectHandles.ts — Stable handles for logged objects.
 *
 * Why: An OBJECT command carries a pointer-sized identity, not the object.
 * Handles are weak by default so logging an object never keeps it alive; a
 * backend that renders after the log call returns pins it with retain() for
 * as long as the pack is in flight. A slot is removed when its object is
 * collected.
 */

import { NULL_REF } from "../abi.js";

type Slot = {
  readonly ref: WeakRef<object>;
  strong: object | null;
  pins: number;
};

function describeError(err: Error): string {
  return err.message.length > 0 ? `${err.name}: ${err.message}` : err.name;
}

function hasOwnToString(value: object): boolean {
  const fn: unknown = Reflect.get(value, "toString");
  return typeof fn === "function" && fn !== Object.prototype.toString;
}

/**
 * Text form of an object, close to what a `%@` conversion prints.
 */
export function describeObject(value: object): string {
  if (value instanceof Error) return describeError(value);
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? "Invalid Date" : value.toISOString();
  }
  if (hasOwnToString(value)) return String(value);
  try {
    const json = JSON.stringify(value);
    if (typeof json === "string") return json;
  } catch (err: unknown) {
    const name = value.constructor?.name ?? "Object";
    return `<${name}: ${err instanceof Error ? err.message : "unserializable"}>`;
  }
  return `<${value.constructor?.name ?? "Object"}>`;
}

/** Calls back with a handle once the object registered under it is collected. */
export type CollectionWatcher = Readonly<{
  register(target: object, handle: bigint): void;
}>;

export type ObjectHandleTableOpts = Readonly<{
  watchCollection?: (onCollected: (handle: bigint) => void) => CollectionWatcher;
}>;

function finalizationWatcher(onCollected: (handle: bigint) => void): CollectionWatcher {
  const registry = new FinalizationRegistry<bigint>(onCollected);
  return { register: (target, handle) => registry.register(target, handle) };
}

export class ObjectHandleTable {
  private readonly handleByObject = new WeakMap<object, bigint>();
  private readonly slots = new Map<bigint, Slot>();
  private readonly watcher: CollectionWatcher;
  private nextHandle = 1n;

  constructor(opts: ObjectHandleTableOpts = {}) {
    const watch = opts.watchCollection ?? finalizationWatcher;
    this.watcher = watch((handle) => {
      this.slots.delete(handle);
    });
  }

  /** Handles whose objects have not been collected yet. */
  get size(): number {
    return this.slots.size;
  }

  handleFor(value: object): bigint {
    const existing = this.handleByObject.get(value);
    if (existing !== undefined) return existing;

    const handle = this.nextHandle;
    this.nextHandle += 1n;
    this.handleByObject.set(value, handle);
    this.slots.set(handle, { ref: new WeakRef(value), strong: null, pins: 0 });
    this.watcher.register(value, handle);
    return handle;
  }

  resolve(handle: bigint): object | undefined {
    if (handle === NULL_REF) return undefined;
    const slot = this.slots.get(handle);
    if (!slot) return undefined;
    const value = slot.strong ?? slot.ref.deref();
    if (value === undefined) this.slots.delete(handle);
    return value;
  }

  describe(handle: bigint): string | undefined {
    const value = this.resolve(handle);
    return value === undefined ? undefined : describeObject(value);
  }

  /** Pin the object behind `handle`. Returns false if it was already collected. */
  retain(handle: bigint): boolean {
    const slot = this.slots.get(handle);
    if (!slot) return false;
    const value = slot.strong ?? slot.ref.deref();
    if (value === undefined) {
      this.slots.delete(handle);
      return false;
    }
    slot.strong = value;
    slot.pins += 1;
    return true;
  }

  release(handle: bigint): void {
    const slot = this.slots.get(handle);
    if (!slot || slot.pins === 0) return;
    slot.pins -= 1;
    if (slot.pins === 0) slot.strong = null;
  }

  pinCount(handle: bigint): number {
    return this.slots.get(handle)?.pins ?? 0;
  }
}
