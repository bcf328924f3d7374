import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { assert, describe, test } from "@tracepack/testkit";
import { auditFields, createTraceAudit } from "../audit.js";

const log = { subsystem: "com.example.app", category: "db" };

describe("auditFields", () => {
  test("flattens each event kind", () => {
    assert.deepEqual(auditFields({ kind: "argument.dropped", log, index: 2, reason: "capacity" }), {
      subsystem: "com.example.app",
      category: "db",
      index: 2,
      reason: "capacity",
    });
    assert.deepEqual(
      auditFields({
        kind: "pack.sent",
        log,
        type: 0x10,
        mode: "packed",
        size: 56,
        commandCount: 1,
      }),
      {
        subsystem: "com.example.app",
        category: "db",
        type: 16,
        mode: "packed",
        size: 56,
        commandCount: 1,
      },
    );
    assert.deepEqual(
      auditFields({ kind: "pack.skipped", log, type: 0x11, reason: "packUnfillable" }),
      { subsystem: "com.example.app", category: "db", type: 17, reason: "packUnfillable" },
    );
    assert.deepEqual(auditFields({ kind: "capability.legacy", log, packFormatVersion: 0 }), {
      subsystem: "com.example.app",
      category: "db",
      packFormatVersion: 0,
    });
  });
});

describe("createTraceAudit", () => {
  test("disabled audit is a no-op", () => {
    const audit = createTraceAudit({ enabled: false, logPath: null, stderrMirror: false });
    audit.observer({ kind: "signpost.skipped", log, reason: "signpostsUnavailable" });
    assert.equal(audit.enabled, false);
    assert.equal(audit.failures(), 0);
  });

  test("enabled audit appends one JSON line per event", () => {
    const dir = mkdtempSync(join(tmpdir(), "tracepack-audit-"));
    try {
      const logPath = join(dir, "audit.ndjson");
      const audit = createTraceAudit({ enabled: true, logPath, stderrMirror: false });
      audit.observer({ kind: "argument.truncated", log, index: 0, bytes: 257 });
      audit.observer({ kind: "signpost.skipped", log, reason: "signpostsUnavailable" });

      const lines = readFileSync(logPath, "utf8").trimEnd().split("\n");
      assert.equal(lines.length, 2);
      const first: unknown = JSON.parse(lines[0] ?? "");
      assert.ok(typeof first === "object" && first !== null);
      assert.equal(Reflect.get(first, "kind"), "argument.truncated");
      assert.equal(Reflect.get(first, "bytes"), 257);
      assert.equal(Reflect.get(first, "pid"), process.pid);
      assert.equal(typeof Reflect.get(first, "ts"), "string");
      assert.equal(audit.failures(), 0);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  test("write failures are counted, never thrown", () => {
    const dir = mkdtempSync(join(tmpdir(), "tracepack-audit-"));
    try {
      const audit = createTraceAudit({
        enabled: true,
        logPath: join(dir, "missing", "audit.ndjson"),
        stderrMirror: false,
      });
      audit.observer({ kind: "signpost.skipped", log, reason: "signpostsUnavailable" });
      assert.equal(audit.failures(), 1);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
