/**
 * packages/core/src/emitter/traceLog.ts — Trace log emitter.
 *
 * Why: Ties the pieces of one log call together. The backend's level gate
 * runs before anything is encoded; the capability is resolved once at
 * construction; each call gets its own command buffer, which is consumed by
 * exactly one pack and then dropped.
 */

import {
  LOG_TYPE_DEBUG,
  LOG_TYPE_DEFAULT,
  LOG_TYPE_ERROR,
  LOG_TYPE_FAULT,
  LOG_TYPE_INFO,
  type LogType,
  type SignpostType,
  TracepackError,
} from "../abi.js";
import { type LogHandle, detectPackCapability } from "../backend.js";
import { defaultPackClock } from "../clock.js";
import { CommandBuffer } from "../encoder/commandBuffer.js";
import {
  type PackContext,
  UNKNOWN_CALL_SITE,
  packAndSend,
  packAndSendSignpost,
} from "../pack/assembler.js";
import {
  type EncodedStatement,
  type LogStatement,
  encodeStatement,
  literal,
  publicValue,
  trace,
} from "../statement/statement.js";
import { defaultTraceSymbols } from "../symbols/index.js";
import type {
  CallSiteResolver,
  TraceAuditObserver,
  TraceEntryPoint,
  TraceLog,
  TraceLogOpts,
  TraceStatement,
} from "./types.js";

const unknownCallSites: CallSiteResolver = Object.freeze({
  resolve: () => UNKNOWN_CALL_SITE,
});

function requireName(field: string, value: string): string {
  if (typeof value !== "string" || value.length === 0) {
    throw new TracepackError(
      "TRACEPACK_INVALID_OPTIONS",
      `createTraceLog: ${field} must be a non-empty string`,
    );
  }
  return value;
}

const NO_MESSAGE = literal("");

function toStatement(statement: TraceStatement): LogStatement {
  return typeof statement === "string" ? trace`${publicValue(statement)}` : statement;
}

function reportIssues(
  audit: TraceAuditObserver | undefined,
  log: LogHandle,
  encoded: EncodedStatement,
): void {
  if (!audit) return;
  for (const issue of encoded.issues) {
    if (issue.status === "dropped") {
      audit({ kind: "argument.dropped", log, index: issue.index, reason: issue.reason });
    } else {
      audit({ kind: "argument.truncated", log, index: issue.index, bytes: issue.bytes });
    }
  }
}

export function createTraceLog(opts: TraceLogOpts): TraceLog {
  const handle: LogHandle = Object.freeze({
    subsystem: requireName("subsystem", opts.subsystem),
    category: requireName("category", opts.category),
  });
  const backend = opts.backend;
  const capability = detectPackCapability(backend.caps);
  const symbols = opts.symbols ?? defaultTraceSymbols;
  const clock = opts.clock ?? defaultPackClock;
  const callSites = opts.callSites ?? unknownCallSites;
  const audit = opts.audit;
  const encoderOpts = opts.encoder ?? {};

  // Surface bad sizing at construction rather than on the first log call.
  new CommandBuffer(encoderOpts);

  if (capability.mode === "legacy" && audit) {
    audit({
      kind: "capability.legacy",
      log: handle,
      packFormatVersion: backend.caps.packFormatVersion,
    });
  }

  const encode = (
    statement: TraceStatement,
    entry: TraceEntryPoint,
  ): Readonly<{ buffer: CommandBuffer; encoded: EncodedStatement; context: PackContext }> => {
    const context: PackContext = {
      backend,
      capability,
      symbols,
      clock,
      callSite: callSites.resolve(entry),
      allocate: opts.allocatePack,
    };
    const buffer = new CommandBuffer(encoderOpts);
    const encoded = encodeStatement(buffer, toStatement(statement), symbols);
    reportIssues(audit, handle, encoded);
    return { buffer, encoded, context };
  };

  const emit = (type: LogType, statement: TraceStatement, entry: TraceEntryPoint): void => {
    if (!backend.isEnabled(handle, type)) return;

    const { buffer, encoded, context } = encode(statement, entry);
    const outcome = packAndSend(
      buffer,
      { log: handle, type, format: encoded.format, savedErrno: encoded.savedErrno },
      context,
    );
    if (!audit) return;
    if (outcome.status === "sent") {
      audit({
        kind: "pack.sent",
        log: handle,
        type,
        mode: outcome.mode,
        size: outcome.size,
        commandCount: buffer.commandCount,
      });
    } else {
      audit({ kind: "pack.skipped", log: handle, type, reason: outcome.reason });
    }
  };

  const isEnabled = (type: LogType): boolean => backend.isEnabled(handle, type);

  const log = (statement: TraceStatement): void => {
    emit(LOG_TYPE_DEFAULT, statement, log);
  };
  const info = (statement: TraceStatement): void => {
    emit(LOG_TYPE_INFO, statement, info);
  };
  const debug = (statement: TraceStatement): void => {
    emit(LOG_TYPE_DEBUG, statement, debug);
  };
  const error = (statement: TraceStatement): void => {
    emit(LOG_TYPE_ERROR, statement, error);
  };
  const fault = (statement: TraceStatement): void => {
    emit(LOG_TYPE_FAULT, statement, fault);
  };

  const signpost = (
    type: SignpostType,
    name: string,
    id: bigint,
    statement: TraceStatement = NO_MESSAGE,
  ): void => {
    if (!capability.signposts) {
      audit?.({ kind: "signpost.skipped", log: handle, reason: "signpostsUnavailable" });
      return;
    }
    if (!backend.isEnabled(handle, LOG_TYPE_DEFAULT)) return;

    const { buffer, encoded, context } = encode(statement, signpost);
    const outcome = packAndSendSignpost(
      buffer,
      {
        log: handle,
        type,
        name,
        id,
        format: encoded.format,
        savedErrno: encoded.savedErrno,
      },
      context,
    );
    if (!audit) return;
    if (outcome.status === "sent") {
      audit({
        kind: "signpost.sent",
        log: handle,
        type,
        size: outcome.size,
        commandCount: buffer.commandCount,
      });
    } else {
      audit({ kind: "signpost.skipped", log: handle, reason: outcome.reason });
    }
  };

  return Object.freeze({
    handle,
    capability,
    isEnabled,
    log,
    info,
    debug,
    error,
    fault,
    signpost,
  });
}
