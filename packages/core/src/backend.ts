/**
 * Backend interface and capability types for pack hand-off.
 *
 * The core never persists or transmits anything itself. A LogBackend receives
 * fully assembled packs (or legacy records) and owns decoding, rendering and
 * any lifetime extension of objects referenced by OBJECT commands.
 */

import { type LogType, PACK_FORMAT_VERSION, type SignpostType } from "./abi.js";

// =============================================================================
// Destination handle
// =============================================================================

/**
 * Destination of an event. Backends filter and label by these two strings.
 */
export type LogHandle = Readonly<{
  subsystem: string;
  category: string;
}>;

// =============================================================================
// Capabilities
// =============================================================================

/**
 * Capability snapshot a backend declares about itself.
 */
export type BackendCaps = Readonly<{
  /** Highest pack format understood. 0 means legacy records only. */
  packFormatVersion: number;

  /** Whether signpost packs are accepted. */
  signposts: boolean;
}>;

export type PackMode = "packed" | "legacy";

/**
 * Resolved capability, computed once per emitter and threaded through every send.
 */
export type PackCapability = Readonly<{
  mode: PackMode;
  /** True only for packed backends that accept signposts. */
  signposts: boolean;
}>;

export function detectPackCapability(caps: BackendCaps): PackCapability {
  const packed =
    Number.isInteger(caps.packFormatVersion) && caps.packFormatVersion >= PACK_FORMAT_VERSION;
  return Object.freeze({
    mode: packed ? "packed" : "legacy",
    signposts: packed && caps.signposts,
  });
}

// =============================================================================
// Legacy record
// =============================================================================

/**
 * Unstructured fallback: format text plus the raw command stream, no pack wrapper.
 */
export type LegacyLogRecord = Readonly<{
  moduleHandle: bigint;
  log: LogHandle;
  type: LogType;
  format: string;
  /** Command stream bytes (header + commands), possibly empty. */
  commands: Uint8Array;
}>;

// =============================================================================
// LogBackend Interface
// =============================================================================

/**
 * Receiver of assembled packs.
 *
 * Rules:
 * - Every method is fire-and-forget and MUST NOT throw into the caller.
 * - A pack's bytes are only valid for the duration of the send call; a
 *   backend that defers work copies them.
 * - When the command header has HAS_NON_SCALAR set, the backend is
 *   responsible for keeping referenced objects alive until it is done.
 */
export interface LogBackend {
  readonly caps: BackendCaps;

  /** Level gate consulted before any encoding happens. */
  isEnabled(log: LogHandle, type: LogType): boolean;

  sendPack(pack: Uint8Array, log: LogHandle, type: LogType): void;

  sendSignpostPack(pack: Uint8Array, log: LogHandle, type: SignpostType): void;

  sendLegacy(record: LegacyLogRecord): void;
}
