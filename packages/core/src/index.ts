/**
 * @tracepack/core
 *
 * Runtime-agnostic TypeScript core for tracepack.
 * This package MUST NOT use Node-specific APIs (Buffer, worker_threads, node:* imports).
 */

// =============================================================================
// ABI constants and errors
// =============================================================================

export {
  PACK_FORMAT_VERSION,
  COMMAND_HEADER_SIZE,
  COMMAND_TAG_SIZE,
  MAX_COMMAND_PAYLOAD,
  COMMAND_SLOT_PAYLOAD,
  DEFAULT_MAX_COMMANDS,
  DEFAULT_COMMAND_BUFFER_SIZE,
  HEADER_FLAG_HAS_PRIVATE,
  HEADER_FLAG_HAS_NON_SCALAR,
  COMMAND_FLAG_PRIVATE,
  COMMAND_FLAG_PUBLIC,
  COMMAND_TYPE_SCALAR,
  COMMAND_TYPE_COUNT,
  COMMAND_TYPE_STRING,
  COMMAND_TYPE_DATA,
  COMMAND_TYPE_OBJECT,
  COMMAND_TYPE_WIDE_STRING,
  COMMAND_TYPE_ERRNO,
  type CommandTypeCode,
  BLOB_FLAG_NEEDS_FREE,
  BLOB_FLAG_TRUNCATED,
  PACK_OFFSET_CONTINUOUS_TIME,
  PACK_OFFSET_WALL_SECONDS,
  PACK_OFFSET_WALL_NANOS,
  PACK_OFFSET_SAVED_ERRNO,
  PACK_OFFSET_MODULE_HANDLE,
  PACK_OFFSET_RETURN_ADDRESS,
  PACK_OFFSET_FORMAT_REF,
  PACK_HEADER_SIZE,
  SIGNPOST_OFFSET_NAME_REF,
  SIGNPOST_OFFSET_ID,
  SIGNPOST_PACK_HEADER_SIZE,
  LOG_TYPE_DEFAULT,
  LOG_TYPE_INFO,
  LOG_TYPE_DEBUG,
  LOG_TYPE_ERROR,
  LOG_TYPE_FAULT,
  type LogType,
  SIGNPOST_TYPE_EVENT,
  SIGNPOST_TYPE_INTERVAL_BEGIN,
  SIGNPOST_TYPE_INTERVAL_END,
  type SignpostType,
  SIGNPOST_ID_NULL,
  SIGNPOST_ID_INVALID,
  SIGNPOST_ID_EXCLUSIVE,
  NULL_REF,
  U64_MAX,
  TracepackError,
  type TracepackErrorCode,
} from "./abi.js";

// =============================================================================
// Backend contract and capability
// =============================================================================

export {
  detectPackCapability,
  type BackendCaps,
  type LegacyLogRecord,
  type LogBackend,
  type LogHandle,
  type PackCapability,
  type PackMode,
} from "./backend.js";

export { createFixedPackClock, defaultPackClock, type PackClock, type WallTime } from "./clock.js";

// =============================================================================
// Encoder, blob, pack
// =============================================================================

export * from "./encoder/index.js";
export * from "./blob/index.js";
export * from "./pack/index.js";

// =============================================================================
// Symbols, statements, emitter
// =============================================================================

export * from "./symbols/index.js";
export * from "./statement/index.js";
export * from "./emitter/index.js";
