/**
 * packages/node/src/audit.ts — Optional NDJSON audit trail for trace emitters.
 *
 * Enable with:
 *   TRACEPACK_AUDIT=1
 *
 * Optional:
 *   TRACEPACK_AUDIT_LOG=/tmp/tracepack-audit.ndjson
 *   TRACEPACK_AUDIT_STDERR=1
 *
 * Records one line per degraded argument (dropped or truncated), per pack or
 * signpost hand-off, and once per emitter that falls back to legacy records.
 */

import { appendFileSync } from "node:fs";
import { performance } from "node:perf_hooks";
import type { TraceAuditEvent, TraceAuditObserver } from "@tracepack/core";
import type { AuditConfig } from "./config.js";

type AuditRecord = Readonly<Record<string, string | number | boolean>>;

export type TraceAudit = Readonly<{
  enabled: boolean;
  observer: TraceAuditObserver;
  /** Lines that could not be written. */
  failures: () => number;
}>;

function nowUs(): number {
  return Math.round(performance.now() * 1000);
}

export function auditFields(event: TraceAuditEvent): AuditRecord {
  const base = { subsystem: event.log.subsystem, category: event.log.category };
  switch (event.kind) {
    case "argument.dropped":
      return { ...base, index: event.index, reason: event.reason };
    case "argument.truncated":
      return { ...base, index: event.index, bytes: event.bytes };
    case "pack.sent":
      return {
        ...base,
        type: event.type,
        mode: event.mode,
        size: event.size,
        commandCount: event.commandCount,
      };
    case "pack.skipped":
      return { ...base, type: event.type, reason: event.reason };
    case "signpost.sent":
      return { ...base, type: event.type, size: event.size, commandCount: event.commandCount };
    case "signpost.skipped":
      return { ...base, reason: event.reason };
    case "capability.legacy":
      return { ...base, packFormatVersion: event.packFormatVersion };
  }
}

export function createTraceAudit(config: AuditConfig): TraceAudit {
  if (!config.enabled) {
    return Object.freeze({
      enabled: false,
      observer: () => {},
      failures: () => 0,
    });
  }

  let failures = 0;
  const writeLine = (line: string): void => {
    try {
      if (config.logPath !== null) {
        appendFileSync(config.logPath, `${line}\n`, "utf8");
      }
      if (config.stderrMirror || config.logPath === null) {
        process.stderr.write(`${line}\n`);
      }
    } catch {
      // Optional diagnostics must never affect the logging call.
      failures++;
    }
  };

  return Object.freeze({
    enabled: true,
    observer: (event: TraceAuditEvent) => {
      writeLine(
        JSON.stringify({
          ts: new Date().toISOString(),
          tUs: nowUs(),
          pid: process.pid,
          kind: event.kind,
          ...auditFields(event),
        }),
      );
    },
    failures: () => failures,
  });
}
