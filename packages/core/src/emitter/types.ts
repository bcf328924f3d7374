/**
 * packages/core/src/emitter/types.ts — Trace log emitter contracts.
 */

import type { LogType, SignpostType } from "../abi.js";
import type { LogBackend, LogHandle, PackCapability, PackMode } from "../backend.js";
import type { PackClock } from "../clock.js";
import type { CommandBufferOpts } from "../encoder/commandBuffer.js";
import type { DropReason } from "../encoder/types.js";
import type { CallSite, PackAllocator, PackSkipReason } from "../pack/assembler.js";
import type { TraceSymbols } from "../symbols/index.js";
import type { LogStatement } from "../statement/statement.js";

/**
 * A tagged-template statement, or plain text printed as is. Plain text is
 * sent as the argument of one shared `%{public}s` format.
 */
export type TraceStatement = LogStatement | string;

/** The public method a caller invoked; stack capture starts above it. */
export type TraceEntryPoint = (...args: never[]) => unknown;

export interface CallSiteResolver {
  resolve(entry: TraceEntryPoint): CallSite;
}

/**
 * Degraded outcomes and hand-offs, reported to an optional observer.
 * Nothing here is ever thrown at the caller.
 */
export type TraceAuditEvent =
  | Readonly<{ kind: "argument.dropped"; log: LogHandle; index: number; reason: DropReason }>
  | Readonly<{ kind: "argument.truncated"; log: LogHandle; index: number; bytes: number }>
  | Readonly<{
      kind: "pack.sent";
      log: LogHandle;
      type: LogType;
      mode: PackMode;
      size: number;
      commandCount: number;
    }>
  | Readonly<{
      kind: "signpost.sent";
      log: LogHandle;
      type: SignpostType;
      size: number;
      commandCount: number;
    }>
  | Readonly<{ kind: "pack.skipped"; log: LogHandle; type: LogType; reason: PackSkipReason }>
  | Readonly<{ kind: "signpost.skipped"; log: LogHandle; reason: PackSkipReason }>
  | Readonly<{ kind: "capability.legacy"; log: LogHandle; packFormatVersion: number }>;

export type TraceAuditObserver = (event: TraceAuditEvent) => void;

export type TraceLogOpts = Readonly<{
  subsystem: string;
  category: string;
  backend: LogBackend;
  symbols?: TraceSymbols;
  clock?: PackClock;
  callSites?: CallSiteResolver;
  audit?: TraceAuditObserver;
  /** Sizing for the per-call command buffer. */
  encoder?: CommandBufferOpts;
  /** Storage for each pack; defaults to a fresh array of the exact size. */
  allocatePack?: PackAllocator;
}>;

export interface TraceLog {
  readonly handle: LogHandle;
  readonly capability: PackCapability;

  isEnabled(type: LogType): boolean;

  log(statement: TraceStatement): void;
  info(statement: TraceStatement): void;
  debug(statement: TraceStatement): void;
  error(statement: TraceStatement): void;
  fault(statement: TraceStatement): void;

  /**
   * Emit a signpost. Skipped (and reported to the audit observer) when the
   * backend does not accept signpost packs or the pack cannot be filled.
   */
  signpost(type: SignpostType, name: string, id: bigint, statement?: TraceStatement): void;
}
