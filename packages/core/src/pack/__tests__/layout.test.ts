import { assert, describe, test } from "@tracepack/testkit";
import { createFixedPackClock } from "../../clock.js";
import { i64le, u64le } from "../../__tests__/commandDecode.js";
import {
  fillPack,
  fillSignpostPack,
  requiredPackSize,
  requiredSignpostPackSize,
  setPackReturnAddress,
} from "../layout.js";

const clock = createFixedPackClock(123_456_789n, { seconds: 1_700_000_000n, nanos: 42 });

const fields = {
  clock,
  savedErrno: -2,
  moduleHandle: 5n,
  formatRef: 9n,
} as const;

describe("pack sizing", () => {
  test("header plus command bytes", () => {
    assert.equal(requiredPackSize(0), 48);
    assert.equal(requiredPackSize(8), 56);
    assert.equal(requiredSignpostPackSize(0), 64);
    assert.equal(requiredSignpostPackSize(8), 72);
  });

  test("sizes never decrease as the command stream grows", () => {
    let prev = requiredPackSize(0);
    let prevSignpost = requiredSignpostPackSize(0);
    for (let n = 1; n <= 866; n++) {
      const size = requiredPackSize(n);
      const signpost = requiredSignpostPackSize(n);
      assert.ok(size >= prev);
      assert.ok(signpost >= prevSignpost);
      prev = size;
      prevSignpost = signpost;
    }
  });

  test("bad lengths count as an empty command stream", () => {
    assert.equal(requiredPackSize(-4), 48);
    assert.equal(requiredPackSize(2.5), 48);
    assert.equal(requiredSignpostPackSize(Number.NaN), 64);
  });
});

describe("fillPack", () => {
  test("writes every header field little-endian", () => {
    const pack = new Uint8Array(56);
    assert.equal(fillPack(pack, 56, fields), 48);

    assert.equal(u64le(pack, 0), 123_456_789n);
    assert.equal(i64le(pack, 8), 1_700_000_000n);
    assert.deepEqual([...pack.subarray(16, 20)], [42, 0, 0, 0]);
    assert.deepEqual([...pack.subarray(20, 24)], [0xfe, 0xff, 0xff, 0xff]);
    assert.equal(u64le(pack, 24), 5n);
    assert.equal(u64le(pack, 32), 0n);
    assert.equal(u64le(pack, 40), 9n);
  });

  test("never writes past size", () => {
    const pack = new Uint8Array(64).fill(0xcd);
    assert.equal(fillPack(pack, 50, fields), 48);

    assert.deepEqual([...pack.subarray(48, 50)], [0, 0]);
    assert.ok(pack.subarray(50).every((b) => b === 0xcd));
  });

  test("rejects a size that cannot hold the header or exceeds the buffer", () => {
    const pack = new Uint8Array(48).fill(0xcd);
    assert.equal(fillPack(pack, 47, fields), null);
    assert.equal(fillPack(pack, 49, fields), null);
    assert.equal(fillPack(pack, 48.5, fields), null);
    assert.ok(pack.every((b) => b === 0xcd));
  });

  test("wall-clock nanoseconds wrap into range", () => {
    const pack = new Uint8Array(48);
    const wrapping = createFixedPackClock(0n, { seconds: 0n, nanos: 1_000_000_007 });
    fillPack(pack, 48, { ...fields, clock: wrapping });
    assert.deepEqual([...pack.subarray(16, 20)], [7, 0, 0, 0]);
  });
});

describe("fillSignpostPack", () => {
  test("adds name reference and id after the log header", () => {
    const pack = new Uint8Array(64);
    const offset = fillSignpostPack(pack, 64, { ...fields, nameRef: 3n, id: 0xeeee_b0b5_b2b2_eeeen });

    assert.equal(offset, 64);
    assert.equal(u64le(pack, 40), 9n);
    assert.equal(u64le(pack, 48), 3n);
    assert.equal(u64le(pack, 56), 0xeeee_b0b5_b2b2_eeeen);
  });

  test("a log-sized buffer is too small", () => {
    const pack = new Uint8Array(48);
    assert.equal(fillSignpostPack(pack, 48, { ...fields, nameRef: 1n, id: 1n }), null);
  });
});

describe("setPackReturnAddress", () => {
  test("patches bytes 32-39 only", () => {
    const pack = new Uint8Array(56);
    fillPack(pack, 56, fields);
    const before = pack.slice();

    assert.equal(setPackReturnAddress(pack, 0x1122_3344n), true);
    assert.equal(u64le(pack, 32), 0x1122_3344n);
    for (let i = 0; i < 56; i++) {
      if (i >= 32 && i < 40) continue;
      assert.equal(pack[i], before[i]);
    }
  });

  test("refuses a buffer shorter than the header", () => {
    assert.equal(setPackReturnAddress(new Uint8Array(40), 1n), false);
  });
});
