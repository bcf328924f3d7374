import { assert, describe, test } from "@tracepack/testkit";
import {
  COMMAND_FLAG_PRIVATE,
  COMMAND_FLAG_PUBLIC,
  COMMAND_TYPE_COUNT,
  COMMAND_TYPE_DATA,
  COMMAND_TYPE_ERRNO,
  COMMAND_TYPE_OBJECT,
  COMMAND_TYPE_SCALAR,
  COMMAND_TYPE_STRING,
} from "../../abi.js";
import { createCommandBuffer } from "../../encoder/commandBuffer.js";
import { createTraceSymbols } from "../../symbols/index.js";
import { f64le, i32le, i64le, parseCommands, u64le } from "../../__tests__/commandDecode.js";
import {
  type LogStatement,
  encodeStatement,
  errno,
  literal,
  privateValue,
  publicValue,
  trace,
} from "../statement.js";

function encode(stmt: LogStatement, maxCommands?: number) {
  const buffer = createCommandBuffer({ maxCommands });
  const symbols = createTraceSymbols();
  const encoded = encodeStatement(buffer, stmt, symbols);
  return { ...encoded, symbols, parsed: parseCommands(buffer.bytes()) };
}

describe("trace - format derivation", () => {
  test("int32 maps to %d with a 4-byte scalar", () => {
    const r = encode(trace`n=${42}`);
    assert.equal(r.format, "n=%d");
    assert.equal(r.parsed.commands.length, 1);
    assert.equal(r.parsed.commands[0]?.size, 4);
    assert.equal(i32le(r.parsed.commands[0]?.payload ?? new Uint8Array(4)), 42);
  });

  test("larger safe integers map to %lld", () => {
    const r = encode(trace`${2 ** 40}`);
    assert.equal(r.format, "%lld");
    assert.equal(i64le(r.parsed.commands[0]?.payload ?? new Uint8Array(8)), 1_099_511_627_776n);
  });

  test("bigints pick signed, unsigned or text by range", () => {
    const r = encode(trace`${-5n} ${2n ** 63n} ${2n ** 64n}`);
    assert.equal(r.format, "%lld %llu %s");
    const [signed, unsigned, text] = r.parsed.commands;
    assert.equal(i64le(signed?.payload ?? new Uint8Array(8)), -5n);
    assert.equal(u64le(unsigned?.payload ?? new Uint8Array(8)), 2n ** 63n);
    assert.equal(text?.type, COMMAND_TYPE_STRING);
    assert.equal(
      new TextDecoder().decode(text?.payload.subarray(0, -1)),
      "18446744073709551616",
    );
  });

  test("fractional numbers carry precision 15 then the double", () => {
    const r = encode(trace`t=${3.14}s`);
    assert.equal(r.format, "t=%.*gs");
    const [precision, value] = r.parsed.commands;
    assert.equal(precision?.type, COMMAND_TYPE_SCALAR);
    assert.equal(i32le(precision?.payload ?? new Uint8Array(4)), 15);
    assert.equal(f64le(value?.payload ?? new Uint8Array(8)), 3.14);
  });

  test("non-finite numbers use the float path", () => {
    assert.equal(encode(trace`${Number.NaN}|${Number.POSITIVE_INFINITY}`).format, "%.*g|%.*g");
  });

  test("booleans are annotated integers", () => {
    const r = encode(trace`ok=${true}`);
    assert.equal(r.format, "ok=%{bool}d");
    assert.equal(i32le(r.parsed.commands[0]?.payload ?? new Uint8Array(4)), 1);
  });

  test("strings map to %s with a NUL-terminated payload", () => {
    const r = encode(trace`path ${"/tmp"}`);
    assert.equal(r.format, "path %s");
    assert.deepEqual([...(r.parsed.commands[0]?.payload ?? [])], [0x2f, 0x74, 0x6d, 0x70, 0]);
  });

  test("bytes become a count and a data command", () => {
    const r = encode(trace`${new Uint8Array([0xde, 0xad])}`);
    assert.equal(r.format, "%.*P");
    const [count, data] = r.parsed.commands;
    assert.equal(count?.type, COMMAND_TYPE_COUNT);
    assert.equal(i32le(count?.payload ?? new Uint8Array(4)), 2);
    assert.equal(data?.type, COMMAND_TYPE_DATA);
    assert.deepEqual([...(data?.payload ?? [])], [0xde, 0xad]);
  });

  test("objects are interned as handles", () => {
    const peer = { host: "db", port: 5432 };
    const r = encode(trace`peer ${peer}`);
    assert.equal(r.format, "peer %@");
    assert.equal(r.parsed.flags, 0x02);
    const cmd = r.parsed.commands[0];
    assert.equal(cmd?.type, COMMAND_TYPE_OBJECT);
    assert.equal(r.symbols.objects.resolve(u64le(cmd?.payload ?? new Uint8Array(8))), peer);
  });

  test("errno records the saved code and an ERRNO command", () => {
    const r = encode(trace`open failed: ${errno(2)}`);
    assert.equal(r.format, "open failed: %m");
    assert.equal(r.savedErrno, 2);
    assert.equal(r.parsed.commands[0]?.type, COMMAND_TYPE_ERRNO);
    assert.equal(r.parsed.commands[0]?.size, 0);
  });

  test("null and undefined are printed into the format", () => {
    const r = encode(trace`a=${null} b=${undefined}`);
    assert.equal(r.format, "a=null b=undefined");
    assert.equal(r.parsed.commands.length, 0);
  });

  test("literal percent signs are escaped", () => {
    assert.equal(encode(trace`100% of ${"x"}`).format, "100%% of %s");
    assert.equal(encode(literal("50% off")).format, "50%% off");
  });
});

describe("trace - privacy", () => {
  test("private and public wrappers annotate and flag", () => {
    const r = encode(trace`${privateValue("alice")} ${publicValue(7)} ${privateValue(false)}`);
    assert.equal(r.format, "%{private}s %{public}d %{private,bool}d");
    assert.deepEqual(
      r.parsed.commands.map((c) => c.flags),
      [COMMAND_FLAG_PRIVATE, COMMAND_FLAG_PUBLIC, COMMAND_FLAG_PRIVATE],
    );
    assert.equal(r.parsed.flags, 0x01);
  });

  test("nested wrappers keep the outer privacy", () => {
    const r = encode(trace`${publicValue(privateValue(1))}`);
    assert.equal(r.format, "%{public}d");
  });
});

describe("trace - degraded arguments", () => {
  test("an argument past the command ceiling is replaced by a placeholder", () => {
    const r = encode(trace`${1} ${2} ${3}`, 2);
    assert.equal(r.format, "%d %d <dropped>");
    assert.deepEqual(r.issues, [{ index: 2, status: "dropped", reason: "maxCommands" }]);
    assert.equal(r.parsed.commands.length, 2);
  });

  test("arguments after a dropped one keep their own conversions", () => {
    const big = "x".repeat(300);
    const r = encode(trace`${big} ${big} ${big} ${big} n=${42}`);
    assert.equal(r.format, "%s %s %s <dropped> n=%d");
    assert.deepEqual(r.issues, [
      { index: 0, status: "truncated", bytes: 257 },
      { index: 1, status: "truncated", bytes: 257 },
      { index: 2, status: "truncated", bytes: 257 },
      { index: 3, status: "dropped", reason: "capacity" },
    ]);
    assert.deepEqual(
      r.parsed.commands.map((c) => c.type),
      [COMMAND_TYPE_STRING, COMMAND_TYPE_STRING, COMMAND_TYPE_STRING, COMMAND_TYPE_SCALAR],
    );
    assert.equal(i32le(r.parsed.commands[3]?.payload ?? new Uint8Array(4)), 42);
  });

  test("a dropped errno leaves no %m behind", () => {
    const r = encode(trace`${1} ${errno(5)}`, 1);
    assert.equal(r.format, "%d <dropped>");
    assert.equal(r.savedErrno, 5);
  });

  test("bytes that only half fit are dropped whole", () => {
    const r = encode(trace`${1} ${new Uint8Array([7])} ${2}`, 2);
    assert.equal(r.format, "%d <dropped> %d");
    assert.deepEqual(
      r.parsed.commands.map((c) => c.type),
      [COMMAND_TYPE_SCALAR, COMMAND_TYPE_SCALAR],
    );
    assert.equal(i32le(r.parsed.commands[1]?.payload ?? new Uint8Array(4)), 2);
  });

  test("oversized byte arrays are clipped and reported as truncated", () => {
    const r = encode(trace`${new Uint8Array(300)}`);
    assert.deepEqual(r.issues, [{ index: 0, status: "truncated", bytes: 263 }]);
    assert.equal(i32le(r.parsed.commands[0]?.payload ?? new Uint8Array(4)), 255);
    assert.equal(r.parsed.commands[1]?.size, 255);
  });

  test("oversized strings are reported as truncated", () => {
    const r = encode(trace`${"z".repeat(400)}`);
    assert.deepEqual(r.issues, [{ index: 0, status: "truncated", bytes: 257 }]);
  });
});

describe("trace - negative zero", () => {
  test("-0 takes the float path and keeps its sign", () => {
    const r = encode(trace`${-0}`);
    assert.equal(r.format, "%.*g");
    assert.equal(f64le(r.parsed.commands[1]?.payload ?? new Uint8Array(8)), -0);
  });

  test("+0 stays an int32", () => {
    assert.equal(encode(trace`${0}`).format, "%d");
  });
});
