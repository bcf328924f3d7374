import {
  type PackClock,
  type TraceLog,
  type TraceSymbols,
  createTraceLog,
  defaultTraceSymbols,
} from "@tracepack/core";
import { type TraceAudit, createTraceAudit } from "./audit.js";
import {
  type StreamBackend,
  type TraceSink,
  createStreamBackend,
} from "./backend/streamBackend.js";
import { createStackCallSites } from "./callSite.js";
import { hrtimePackClock } from "./clock.js";
import { type EnvSource, type NodeTraceConfig, readNodeTraceConfig } from "./config.js";

export {
  auditFields,
  createTraceAudit,
  type TraceAudit,
} from "./audit.js";
export {
  FRAME_KIND_LEGACY,
  FRAME_KIND_LOG,
  FRAME_KIND_SIGNPOST,
  decodeFrames,
  encodeFrame,
  legacyFrameBody,
  type FrameKind,
  type TraceFrame,
} from "./backend/binaryFrame.js";
export {
  UNKNOWN_FORMAT,
  UNKNOWN_NAME,
  createStreamBackend,
  logTypeName,
  signpostTypeName,
  type StreamBackend,
  type StreamBackendOpts,
  type StreamBackendStats,
  type TraceSink,
} from "./backend/streamBackend.js";
export {
  createStackCallSites,
  firstStackFrame,
  formatCallSite,
  parseStackFrame,
  type StackFrame,
} from "./callSite.js";
export { hrtimePackClock } from "./clock.js";
export {
  readNodeTraceConfig,
  type AuditConfig,
  type EnvSource,
  type MinLevel,
  type NodeTraceConfig,
  type OutputMode,
} from "./config.js";
export {
  commandTypeOf,
  decodeCommandStream,
  decodePack,
  decodeSignpostPack,
  type DecodeError,
  type DecodeErrorCode,
  type DecodeResult,
  type DecodedCommand,
  type DecodedCommandStream,
  type DecodedPack,
  type DecodedSignpostPack,
} from "./packDecode.js";
export {
  COLLECTED_PLACEHOLDER,
  INVALID_PLACEHOLDER,
  MISSING_PLACEHOLDER,
  PRIVATE_PLACEHOLDER,
  describeErrno,
  renderMessage,
  type RenderContext,
} from "./render.js";

export type CreateNodeTraceLogOptions = Readonly<{
  subsystem: string;
  category: string;
  /** Defaults to process.stderr. */
  sink?: TraceSink;
  /** Defaults to process.env. */
  env?: EnvSource;
  /** Applied over the values read from `env`. */
  config?: Partial<NodeTraceConfig>;
  symbols?: TraceSymbols;
  clock?: PackClock;
  /** Timestamp source for legacy lines. */
  now?: () => Date;
}>;

export type NodeTraceLog = TraceLog &
  Readonly<{
    backend: StreamBackend;
    audit: TraceAudit;
    config: NodeTraceConfig;
  }>;

/**
 * Create a trace log wired to a stream backend, configured from the environment.
 *
 * Throws TracepackError("TRACEPACK_INVALID_CONFIG") for unknown mode or level values.
 */
export function createNodeTraceLog(opts: CreateNodeTraceLogOptions): NodeTraceLog {
  const config: NodeTraceConfig = Object.freeze({
    ...readNodeTraceConfig(opts.env ?? process.env),
    ...opts.config,
  });
  const symbols = opts.symbols ?? defaultTraceSymbols;

  const backend = createStreamBackend({
    sink: opts.sink ?? process.stderr,
    mode: config.mode,
    minLevel: config.minLevel,
    packFormatVersion: config.legacy ? 0 : undefined,
    signposts: config.signposts,
    redactPrivate: config.redactPrivate,
    symbols,
    now: opts.now,
  });
  const audit = createTraceAudit(config.audit);

  const log = createTraceLog({
    subsystem: opts.subsystem,
    category: opts.category,
    backend,
    symbols,
    clock: opts.clock ?? hrtimePackClock,
    callSites: createStackCallSites(symbols),
    audit: audit.enabled ? audit.observer : undefined,
    encoder: { maxCommands: config.maxCommands },
  });

  return Object.freeze({ ...log, backend, audit, config });
}
