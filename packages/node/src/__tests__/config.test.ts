import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  LOG_TYPE_DEBUG,
  LOG_TYPE_DEFAULT,
  LOG_TYPE_ERROR,
  LOG_TYPE_FAULT,
  LOG_TYPE_INFO,
  type LogType,
  TracepackError,
} from "@tracepack/core";
import { assert, describe, test } from "@tracepack/testkit";
import {
  envFlag,
  envPositiveInt,
  levelRank,
  minLevelRank,
  readEnv,
  readNodeTraceConfig,
} from "../config.js";

describe("readNodeTraceConfig", () => {
  test("defaults with an empty environment", () => {
    assert.deepEqual(readNodeTraceConfig({}), {
      mode: "text",
      minLevel: "default",
      legacy: false,
      signposts: true,
      redactPrivate: true,
      maxCommands: 48,
      audit: { enabled: false, logPath: null, stderrMirror: false },
    });
  });

  test("every variable is honored", () => {
    const config = readNodeTraceConfig({
      TRACEPACK_MODE: " Binary ",
      TRACEPACK_MIN_LEVEL: "ERROR",
      TRACEPACK_LEGACY: "yes",
      TRACEPACK_SIGNPOSTS: "0",
      TRACEPACK_REDACT_PRIVATE: "off",
      TRACEPACK_MAX_COMMANDS: "8",
      TRACEPACK_AUDIT: "1",
      TRACEPACK_AUDIT_STDERR: "true",
    });
    assert.deepEqual(config, {
      mode: "binary",
      minLevel: "error",
      legacy: true,
      signposts: false,
      redactPrivate: false,
      maxCommands: 8,
      audit: {
        enabled: true,
        logPath: join(tmpdir(), "tracepack-audit.ndjson"),
        stderrMirror: true,
      },
    });
  });

  test("an explicit audit path is kept even when audit is off", () => {
    const config = readNodeTraceConfig({ TRACEPACK_AUDIT_LOG: "/var/tmp/a.ndjson" });
    assert.deepEqual(config.audit, {
      enabled: false,
      logPath: "/var/tmp/a.ndjson",
      stderrMirror: false,
    });
  });

  test("unknown mode or level is a configuration error", () => {
    for (const env of [{ TRACEPACK_MODE: "json" }, { TRACEPACK_MIN_LEVEL: "trace" }]) {
      assert.throws(
        () => readNodeTraceConfig(env),
        (err: unknown) => err instanceof TracepackError && err.code === "TRACEPACK_INVALID_CONFIG",
      );
    }
  });

  test("command ceiling above one byte is rejected; garbage falls back", () => {
    assert.throws(() => readNodeTraceConfig({ TRACEPACK_MAX_COMMANDS: "256" }), TracepackError);
    assert.equal(readNodeTraceConfig({ TRACEPACK_MAX_COMMANDS: "lots" }).maxCommands, 48);
  });
});

describe("env helpers", () => {
  test("blank values read as unset", () => {
    assert.equal(readEnv({ A: "  " }, "A"), null);
    assert.equal(readEnv({ A: " x " }, "A"), "x");
    assert.equal(readEnv({}, "A"), null);
  });

  test("flags and positive integers", () => {
    assert.equal(envFlag({ F: "ON" }, "F"), true);
    assert.equal(envFlag({ F: "nope" }, "F", true), false);
    assert.equal(envFlag({}, "F", true), true);
    assert.equal(envPositiveInt({ N: "12" }, "N", 3), 12);
    assert.equal(envPositiveInt({ N: "-1" }, "N", 3), 3);
    assert.equal(envPositiveInt({ N: "1.5" }, "N", 3), 3);
  });
});

describe("level ranks", () => {
  test("debug < info < default < error < fault", () => {
    const types: LogType[] = [LOG_TYPE_DEBUG, LOG_TYPE_INFO, LOG_TYPE_DEFAULT, LOG_TYPE_ERROR, LOG_TYPE_FAULT];
    const ranks = types.map(levelRank);
    assert.deepEqual(ranks, [0, 1, 2, 3, 4]);
    assert.equal(minLevelRank("default"), levelRank(LOG_TYPE_DEFAULT));
  });
});
