/**
 * packages/core/src/encoder/types.ts — Command stream type definitions.
 *
 * Why: The bit-packed tag (4-bit flags, 4-bit type, u8 size) only exists at
 * the serialization boundary. Everywhere else a command is a closed tagged
 * union, and every append reports what happened to it instead of mutating
 * silently.
 */

export type CommandKind =
  | "scalar"
  | "count"
  | "string"
  | "data"
  | "object"
  | "wideString"
  | "errno";

/**
 * One encoded argument.
 *
 * `flags` holds the redaction hints (COMMAND_FLAG_PRIVATE / COMMAND_FLAG_PUBLIC).
 * String payloads include their trailing NUL when one fit.
 */
export type Command =
  | Readonly<{ kind: "scalar"; flags: number; payload: Uint8Array }>
  | Readonly<{ kind: "count"; flags: number; value: number }>
  | Readonly<{ kind: "string"; flags: number; payload: Uint8Array }>
  | Readonly<{ kind: "data"; flags: number; payload: Uint8Array }>
  | Readonly<{ kind: "object"; flags: number; handle: bigint }>
  | Readonly<{ kind: "wideString"; flags: number; payload: Uint8Array }>
  | Readonly<{ kind: "errno"; flags: number }>;

export type CommandPrivacy = "auto" | "private" | "public";

export type AppendOpts = Readonly<{ privacy?: CommandPrivacy }>;

export type DropReason = "maxCommands" | "capacity" | "invalid";

/**
 * Result of an append.
 *
 * - written: the whole argument landed; `bytes` counts tags + payloads
 * - truncated: a variable-length payload was clipped to fit its ceiling
 * - dropped: nothing was written and the buffer is byte-identical to before
 */
export type AppendOutcome =
  | Readonly<{ status: "written"; bytes: number }>
  | Readonly<{ status: "truncated"; bytes: number }>
  | Readonly<{ status: "dropped"; reason: DropReason }>;

export type CommandHeader = Readonly<{ flags: number; commandCount: number }>;

/**
 * Lazily initialized header state.
 * A buffer that never received a command stays `empty` and has zero length.
 */
export type CommandBufferState =
  | Readonly<{ status: "empty" }>
  | Readonly<{ status: "initialized"; header: CommandHeader; length: number }>;
