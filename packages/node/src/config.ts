/**
 * packages/node/src/config.ts — Environment configuration for the Node backend.
 *
 * Recognized variables:
 *   TRACEPACK_MODE=text|binary            (default text)
 *   TRACEPACK_MIN_LEVEL=debug|info|default|error|fault   (default default)
 *   TRACEPACK_LEGACY=1                    force the legacy record path
 *   TRACEPACK_SIGNPOSTS=0                 refuse signpost packs
 *   TRACEPACK_REDACT_PRIVATE=0            print private arguments
 *   TRACEPACK_MAX_COMMANDS=<1..255>       arguments kept per statement (default 48)
 *   TRACEPACK_AUDIT=1                     enable the NDJSON audit trail
 *   TRACEPACK_AUDIT_LOG=<path>            (default <tmpdir>/tracepack-audit.ndjson)
 *   TRACEPACK_AUDIT_STDERR=1              mirror audit lines to stderr
 */

import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  DEFAULT_MAX_COMMANDS,
  LOG_TYPE_DEBUG,
  LOG_TYPE_DEFAULT,
  LOG_TYPE_ERROR,
  LOG_TYPE_FAULT,
  LOG_TYPE_INFO,
  type LogType,
  TracepackError,
} from "@tracepack/core";

export type OutputMode = "text" | "binary";
export type MinLevel = "debug" | "info" | "default" | "error" | "fault";

export type AuditConfig = Readonly<{
  enabled: boolean;
  logPath: string | null;
  stderrMirror: boolean;
}>;

export type NodeTraceConfig = Readonly<{
  mode: OutputMode;
  minLevel: MinLevel;
  legacy: boolean;
  signposts: boolean;
  redactPrivate: boolean;
  maxCommands: number;
  audit: AuditConfig;
}>;

export type EnvSource = Readonly<Record<string, string | undefined>>;

export const ENV_MODE = "TRACEPACK_MODE" as const;
export const ENV_MIN_LEVEL = "TRACEPACK_MIN_LEVEL" as const;
export const ENV_LEGACY = "TRACEPACK_LEGACY" as const;
export const ENV_SIGNPOSTS = "TRACEPACK_SIGNPOSTS" as const;
export const ENV_REDACT_PRIVATE = "TRACEPACK_REDACT_PRIVATE" as const;
export const ENV_MAX_COMMANDS = "TRACEPACK_MAX_COMMANDS" as const;
export const ENV_AUDIT = "TRACEPACK_AUDIT" as const;
export const ENV_AUDIT_LOG = "TRACEPACK_AUDIT_LOG" as const;
export const ENV_AUDIT_STDERR = "TRACEPACK_AUDIT_STDERR" as const;

export const DEFAULT_AUDIT_FILE = "tracepack-audit.ndjson";

export function readEnv(env: EnvSource, name: string): string | null {
  const raw = env[name];
  if (typeof raw !== "string") return null;
  const value = raw.trim();
  return value.length > 0 ? value : null;
}

export function envFlag(env: EnvSource, name: string, fallback = false): boolean {
  const value = readEnv(env, name);
  if (value === null) return fallback;
  const norm = value.toLowerCase();
  return norm === "1" || norm === "true" || norm === "yes" || norm === "on";
}

export function envPositiveInt(env: EnvSource, name: string, fallback: number): number {
  const value = readEnv(env, name);
  if (value === null) return fallback;
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || !Number.isInteger(parsed) || parsed <= 0) return fallback;
  return parsed;
}

export function parseOutputMode(raw: string): OutputMode | null {
  const value = raw.trim().toLowerCase();
  if (value === "text") return "text";
  if (value === "binary") return "binary";
  return null;
}

export function parseMinLevel(raw: string): MinLevel | null {
  switch (raw.trim().toLowerCase()) {
    case "debug":
      return "debug";
    case "info":
      return "info";
    case "default":
      return "default";
    case "error":
      return "error";
    case "fault":
      return "fault";
    default:
      return null;
  }
}

/** Severity rank of a log type; the debug < info < default < error < fault order. */
export function levelRank(type: LogType): number {
  switch (type) {
    case LOG_TYPE_DEBUG:
      return 0;
    case LOG_TYPE_INFO:
      return 1;
    case LOG_TYPE_DEFAULT:
      return 2;
    case LOG_TYPE_ERROR:
      return 3;
    case LOG_TYPE_FAULT:
      return 4;
  }
}

export function minLevelRank(level: MinLevel): number {
  switch (level) {
    case "debug":
      return 0;
    case "info":
      return 1;
    case "default":
      return 2;
    case "error":
      return 3;
    case "fault":
      return 4;
  }
}

export function readNodeTraceConfig(env: EnvSource = process.env): NodeTraceConfig {
  const rawMode = readEnv(env, ENV_MODE);
  const mode = rawMode === null ? "text" : parseOutputMode(rawMode);
  if (mode === null) {
    throw new TracepackError(
      "TRACEPACK_INVALID_CONFIG",
      `${ENV_MODE} must be "text" or "binary" (got ${JSON.stringify(rawMode)})`,
    );
  }

  const rawLevel = readEnv(env, ENV_MIN_LEVEL);
  const minLevel = rawLevel === null ? "default" : parseMinLevel(rawLevel);
  if (minLevel === null) {
    throw new TracepackError(
      "TRACEPACK_INVALID_CONFIG",
      `${ENV_MIN_LEVEL} must be one of debug, info, default, error, fault (got ${JSON.stringify(rawLevel)})`,
    );
  }

  const maxCommands = envPositiveInt(env, ENV_MAX_COMMANDS, DEFAULT_MAX_COMMANDS);
  if (maxCommands > 0xff) {
    throw new TracepackError(
      "TRACEPACK_INVALID_CONFIG",
      `${ENV_MAX_COMMANDS} must be at most 255 (got ${String(maxCommands)})`,
    );
  }

  const auditEnabled = envFlag(env, ENV_AUDIT, false);
  const logPath =
    readEnv(env, ENV_AUDIT_LOG) ?? (auditEnabled ? join(tmpdir(), DEFAULT_AUDIT_FILE) : null);

  return Object.freeze({
    mode,
    minLevel,
    legacy: envFlag(env, ENV_LEGACY, false),
    signposts: envFlag(env, ENV_SIGNPOSTS, true),
    redactPrivate: envFlag(env, ENV_REDACT_PRIVATE, true),
    maxCommands,
    audit: Object.freeze({
      enabled: auditEnabled,
      logPath,
      stderrMirror: envFlag(env, ENV_AUDIT_STDERR, false),
    }),
  });
}
