/**
 * packages/core/src/pack/assembler.ts — Size, fill and hand off a pack.
 *
 * Why: This is the only place the core talks to a backend. It runs the
 * two-phase protocol (size exactly, fill the header, copy the commands at the
 * returned cursor, patch the caller's return address) and branches to the
 * legacy record when the resolved capability says packs are not understood.
 */

import type { LogType, SignpostType } from "../abi.js";
import type { LogBackend, LogHandle, PackCapability, PackMode } from "../backend.js";
import type { PackClock } from "../clock.js";
import type { CommandBuffer } from "../encoder/commandBuffer.js";
import type { TraceSymbols } from "../symbols/index.js";
import {
  fillPack,
  fillSignpostPack,
  requiredPackSize,
  requiredSignpostPackSize,
  setPackReturnAddress,
} from "./layout.js";

export type CallSite = Readonly<{
  moduleHandle: bigint;
  returnAddress: bigint;
}>;

export const UNKNOWN_CALL_SITE: CallSite = Object.freeze({ moduleHandle: 0n, returnAddress: 0n });

export type PackEvent = Readonly<{
  log: LogHandle;
  type: LogType;
  format: string;
  savedErrno: number;
}>;

export type SignpostEvent = Readonly<{
  log: LogHandle;
  type: SignpostType;
  name: string;
  id: bigint;
  format: string;
  savedErrno: number;
}>;

/** Returns storage for a pack of at least `size` bytes. */
export type PackAllocator = (size: number) => Uint8Array;

export const defaultPackAllocator: PackAllocator = (size) => new Uint8Array(size);

export type PackContext = Readonly<{
  backend: LogBackend;
  capability: PackCapability;
  symbols: TraceSymbols;
  clock: PackClock;
  callSite: CallSite;
  allocate?: PackAllocator;
}>;

export type PackSkipReason = "signpostsUnavailable" | "packUnfillable";

export type PackSendOutcome =
  | Readonly<{ status: "sent"; mode: PackMode; size: number }>
  | Readonly<{ status: "skipped"; reason: PackSkipReason }>;

const UNFILLABLE: PackSendOutcome = Object.freeze({ status: "skipped", reason: "packUnfillable" });

function allocateFor(context: PackContext, size: number): Uint8Array {
  return (context.allocate ?? defaultPackAllocator)(size);
}

export function packAndSend(
  encoder: CommandBuffer,
  event: PackEvent,
  context: PackContext,
): PackSendOutcome {
  const commands = encoder.bytes();

  if (context.capability.mode === "legacy") {
    context.backend.sendLegacy({
      moduleHandle: context.callSite.moduleHandle,
      log: event.log,
      type: event.type,
      format: event.format,
      commands: commands.slice(),
    });
    return { status: "sent", mode: "legacy", size: commands.byteLength };
  }

  const size = requiredPackSize(commands.byteLength);
  const storage = allocateFor(context, size);
  const cursor = fillPack(storage, size, {
    clock: context.clock,
    savedErrno: event.savedErrno,
    moduleHandle: context.callSite.moduleHandle,
    formatRef: context.symbols.strings.intern(event.format),
  });
  if (cursor === null) return UNFILLABLE;

  const pack = storage.subarray(0, size);
  pack.set(commands, cursor);
  setPackReturnAddress(pack, context.callSite.returnAddress);

  context.backend.sendPack(pack, event.log, event.type);
  return { status: "sent", mode: "packed", size };
}

export function packAndSendSignpost(
  encoder: CommandBuffer,
  event: SignpostEvent,
  context: PackContext,
): PackSendOutcome {
  if (!context.capability.signposts) {
    return { status: "skipped", reason: "signpostsUnavailable" };
  }

  const commands = encoder.bytes();
  const size = requiredSignpostPackSize(commands.byteLength);
  const storage = allocateFor(context, size);
  const cursor = fillSignpostPack(storage, size, {
    clock: context.clock,
    savedErrno: event.savedErrno,
    moduleHandle: context.callSite.moduleHandle,
    formatRef: context.symbols.strings.intern(event.format),
    nameRef: context.symbols.strings.intern(event.name),
    id: event.id,
  });
  if (cursor === null) return UNFILLABLE;

  const pack = storage.subarray(0, size);
  pack.set(commands, cursor);
  setPackReturnAddress(pack, context.callSite.returnAddress);

  context.backend.sendSignpostPack(pack, event.log, event.type);
  return { status: "sent", mode: "packed", size };
}
