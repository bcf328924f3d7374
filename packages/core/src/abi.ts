/**
 * ABI constants and error types for tracepack.
 *
 * Everything here is part of the in-memory contract between the encoder and a
 * logging backend. The values are pinned: a backend decoding a pack relies on
 * the exact numbers below.
 */

// =============================================================================
// Pack format version
// =============================================================================

/**
 * Packed representation version produced by this core.
 * Backends that report a lower `packFormatVersion` only accept legacy records.
 */
export const PACK_FORMAT_VERSION = 1;

// =============================================================================
// Command buffer sizing
// =============================================================================

/** Size of the command-stream header: flags (u8) + command count (u8). */
export const COMMAND_HEADER_SIZE = 2;

/** Size of the tag preceding every command payload: flags/type (u8) + size (u8). */
export const COMMAND_TAG_SIZE = 2;

/** Largest payload a single command can describe (size is a u8). */
export const MAX_COMMAND_PAYLOAD = 0xff;

/** Largest payload the reference sizing budgets for per command. */
export const COMMAND_SLOT_PAYLOAD = 16;

export const DEFAULT_MAX_COMMANDS = 48;

export const DEFAULT_COMMAND_BUFFER_SIZE =
  COMMAND_HEADER_SIZE + (COMMAND_TAG_SIZE + COMMAND_SLOT_PAYLOAD) * DEFAULT_MAX_COMMANDS;

// =============================================================================
// Header and command flags
// =============================================================================

export const HEADER_FLAG_HAS_PRIVATE = 0x01;
export const HEADER_FLAG_HAS_NON_SCALAR = 0x02;

export const COMMAND_FLAG_PRIVATE = 0x1;
export const COMMAND_FLAG_PUBLIC = 0x2;

// =============================================================================
// Command types (high nibble of the tag byte)
// =============================================================================

export const COMMAND_TYPE_SCALAR = 0;
export const COMMAND_TYPE_COUNT = 1;
export const COMMAND_TYPE_STRING = 2;
export const COMMAND_TYPE_DATA = 3;
export const COMMAND_TYPE_OBJECT = 4;
export const COMMAND_TYPE_WIDE_STRING = 5;
export const COMMAND_TYPE_ERRNO = 6;

export type CommandTypeCode = 0 | 1 | 2 | 3 | 4 | 5 | 6;

// =============================================================================
// Blob flags
// =============================================================================

export const BLOB_FLAG_NEEDS_FREE = 0x1;
export const BLOB_FLAG_TRUNCATED = 0x2;

// =============================================================================
// Pack layout
// =============================================================================

/**
 * Log pack header layout (little-endian):
 *   - continuous time ns: u64 (bytes 0-7)
 *   - wall clock seconds: i64 (bytes 8-15)
 *   - wall clock nanoseconds: u32 (bytes 16-19)
 *   - saved errno: i32 (bytes 20-23)
 *   - module handle: u64 (bytes 24-31)
 *   - return address: u64 (bytes 32-39)
 *   - format reference: u64 (bytes 40-47)
 */
export const PACK_OFFSET_CONTINUOUS_TIME = 0;
export const PACK_OFFSET_WALL_SECONDS = 8;
export const PACK_OFFSET_WALL_NANOS = 16;
export const PACK_OFFSET_SAVED_ERRNO = 20;
export const PACK_OFFSET_MODULE_HANDLE = 24;
export const PACK_OFFSET_RETURN_ADDRESS = 32;
export const PACK_OFFSET_FORMAT_REF = 40;
export const PACK_HEADER_SIZE = 48;

/** Signpost packs append the name reference and correlation id to the log header. */
export const SIGNPOST_OFFSET_NAME_REF = 48;
export const SIGNPOST_OFFSET_ID = 56;
export const SIGNPOST_PACK_HEADER_SIZE = 64;

// =============================================================================
// Event kinds
// =============================================================================

export const LOG_TYPE_DEFAULT = 0x00;
export const LOG_TYPE_INFO = 0x01;
export const LOG_TYPE_DEBUG = 0x02;
export const LOG_TYPE_ERROR = 0x10;
export const LOG_TYPE_FAULT = 0x11;

export type LogType = 0x00 | 0x01 | 0x02 | 0x10 | 0x11;

export const SIGNPOST_TYPE_EVENT = 0;
export const SIGNPOST_TYPE_INTERVAL_BEGIN = 1;
export const SIGNPOST_TYPE_INTERVAL_END = 2;

export type SignpostType = 0 | 1 | 2;

export const SIGNPOST_ID_NULL = 0n;
export const SIGNPOST_ID_INVALID = 0xffff_ffff_ffff_ffffn;
export const SIGNPOST_ID_EXCLUSIVE = 0xeeee_b0b5_b2b2_eeeen;

/** Reference value meaning "no symbol" for format, name, module and call-site fields. */
export const NULL_REF = 0n;

export const U64_MAX = 0xffff_ffff_ffff_ffffn;

// =============================================================================
// TracepackError
// =============================================================================

/**
 * Error codes for construction-time failures.
 *
 * The logging path itself never throws; these surface only when a component
 * is created with options or configuration it cannot honor.
 */
export type TracepackErrorCode =
  | "TRACEPACK_INVALID_OPTIONS"
  | "TRACEPACK_INVALID_CONFIG"
  | "TRACEPACK_BACKEND_ERROR";

export class TracepackError extends Error {
  override readonly name = "TracepackError";
  readonly code: TracepackErrorCode;

  constructor(code: TracepackErrorCode, message?: string) {
    super(message ?? code);
    this.code = code;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TracepackError);
    }
  }
}
