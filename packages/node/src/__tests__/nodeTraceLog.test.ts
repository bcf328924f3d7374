import { createFixedPackClock, createTraceSymbols, trace } from "@tracepack/core";
import { assert, describe, test } from "@tracepack/testkit";
import { createNodeTraceLog } from "../index.js";

const clock = createFixedPackClock(1n, { seconds: 0n, nanos: 0 });

function capture(): { chunks: Array<string | Uint8Array>; write: (c: string | Uint8Array) => boolean } {
  const chunks: Array<string | Uint8Array> = [];
  return {
    chunks,
    write: (c) => {
      chunks.push(c);
      return true;
    },
  };
}

describe("createNodeTraceLog", () => {
  test("environment defaults give text output at the default level", () => {
    const sink = capture();
    const tl = createNodeTraceLog({
      subsystem: "com.example.svc",
      category: "http",
      sink,
      env: {},
      symbols: createTraceSymbols(),
      clock,
    });

    tl.debug("hidden");
    tl.log(trace`status ${200}`);

    assert.equal(tl.config.mode, "text");
    assert.equal(tl.capability.mode, "packed");
    assert.equal(tl.audit.enabled, false);
    assert.deepEqual(sink.chunks, ["1970-01-01T00:00:00.000Z Default com.example.svc:http status 200\n"]);
  });

  test("explicit config overrides the environment", () => {
    const sink = capture();
    const tl = createNodeTraceLog({
      subsystem: "s",
      category: "c",
      sink,
      env: { TRACEPACK_MIN_LEVEL: "fault" },
      config: { minLevel: "debug" },
      symbols: createTraceSymbols(),
      clock,
    });
    tl.debug("seen");
    assert.deepEqual(sink.chunks, ["1970-01-01T00:00:00.000Z Debug s:c seen\n"]);
  });

  test("legacy mode from the environment", () => {
    const sink = capture();
    const tl = createNodeTraceLog({
      subsystem: "s",
      category: "c",
      sink,
      env: { TRACEPACK_LEGACY: "1" },
      symbols: createTraceSymbols(),
      now: () => new Date(1000),
    });
    tl.error(trace`v=${1.5}`);

    assert.equal(tl.capability.mode, "legacy");
    assert.equal(tl.capability.signposts, false);
    assert.deepEqual(sink.chunks, ["1970-01-01T00:00:01.000Z Error s:c v=1.5\n"]);
    assert.deepEqual(tl.backend.stats(), {
      packs: 0,
      signposts: 0,
      legacy: 1,
      filtered: 0,
      decodeErrors: 0,
      writeErrors: 0,
    });
  });

  test("the command ceiling comes from the environment", () => {
    const sink = capture();
    const tl = createNodeTraceLog({
      subsystem: "s",
      category: "c",
      sink,
      env: { TRACEPACK_MAX_COMMANDS: "1" },
      symbols: createTraceSymbols(),
      clock,
    });
    tl.log(trace`${1} ${2}`);
    assert.deepEqual(sink.chunks, ["1970-01-01T00:00:00.000Z Default s:c 1 <dropped>\n"]);
  });
});
