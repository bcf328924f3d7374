import {
  type BackendCaps,
  type LegacyLogRecord,
  type LogBackend,
  type LogHandle,
  type LogType,
  PACK_FORMAT_VERSION,
  type SignpostType,
} from "@tracepack/core";

export type RecordedEvent =
  | Readonly<{ kind: "pack"; pack: Uint8Array; log: LogHandle; type: LogType }>
  | Readonly<{ kind: "signpost"; pack: Uint8Array; log: LogHandle; type: SignpostType }>
  | Readonly<{ kind: "legacy"; record: LegacyLogRecord }>;

export type RecordingBackendOpts = Readonly<{
  packFormatVersion?: number;
  signposts?: boolean;
  /** Log types isEnabled() accepts. Defaults to every type. */
  enabledTypes?: readonly LogType[];
}>;

export type RecordingBackend = LogBackend &
  Readonly<{
    events: readonly RecordedEvent[];
    /** Number of isEnabled() calls; lets tests check the gate runs before encoding. */
    enabledChecks: () => number;
    clear: () => void;
  }>;

/**
 * In-process stand-in for a system logging backend. Packs are copied so a
 * test can inspect them after the send call returns.
 */
export function createRecordingBackend(opts: RecordingBackendOpts = {}): RecordingBackend {
  const caps: BackendCaps = Object.freeze({
    packFormatVersion: opts.packFormatVersion ?? PACK_FORMAT_VERSION,
    signposts: opts.signposts ?? true,
  });
  const enabledTypes = opts.enabledTypes ?? null;
  const events: RecordedEvent[] = [];
  let checks = 0;

  return Object.freeze({
    caps,
    events,
    isEnabled(_log: LogHandle, type: LogType): boolean {
      checks++;
      return enabledTypes === null || enabledTypes.includes(type);
    },
    sendPack(pack: Uint8Array, log: LogHandle, type: LogType): void {
      events.push({ kind: "pack", pack: pack.slice(), log, type });
    },
    sendSignpostPack(pack: Uint8Array, log: LogHandle, type: SignpostType): void {
      events.push({ kind: "signpost", pack: pack.slice(), log, type });
    },
    sendLegacy(record: LegacyLogRecord): void {
      events.push({ kind: "legacy", record: { ...record, commands: record.commands.slice() } });
    },
    enabledChecks: () => checks,
    clear: () => {
      events.length = 0;
      checks = 0;
    },
  });
}
