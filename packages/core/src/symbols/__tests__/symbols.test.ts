import { assert, describe, test } from "@tracepack/testkit";
import { TracepackError } from "../../abi.js";
import { ObjectHandleTable, ReferenceTable, createTraceSymbols, describeObject } from "../index.js";

describe("ReferenceTable", () => {
  test("references start at 1 and repeat for equal strings", () => {
    const t = new ReferenceTable();
    assert.equal(t.intern("a"), 1n);
    assert.equal(t.intern("b"), 2n);
    assert.equal(t.intern("a"), 1n);
    assert.equal(t.size, 2);
    assert.equal(t.lookup(2n), "b");
  });

  test("unknown and null references resolve to undefined", () => {
    const t = new ReferenceTable();
    t.intern("only");
    assert.equal(t.lookup(0n), undefined);
    assert.equal(t.lookup(2n), undefined);
    assert.equal(t.lookup(-1n), undefined);
  });

  test("a full table returns the null reference for new strings", () => {
    const t = new ReferenceTable({ maxEntries: 1 });
    assert.equal(t.intern("first"), 1n);
    assert.equal(t.intern("second"), 0n);
    assert.equal(t.intern("first"), 1n);
  });

  test("maxEntries must be a positive integer", () => {
    assert.throws(() => new ReferenceTable({ maxEntries: 0 }), TracepackError);
  });
});

describe("ObjectHandleTable", () => {
  test("an object keeps one handle", () => {
    const t = new ObjectHandleTable();
    const o = { id: 1 };
    const h = t.handleFor(o);
    assert.equal(h, 1n);
    assert.equal(t.handleFor(o), 1n);
    assert.equal(t.handleFor({ id: 1 }), 2n);
    assert.equal(t.resolve(h), o);
    assert.equal(t.describe(h), '{"id":1}');
  });

  test("handle 0 and unknown handles resolve to nothing", () => {
    const t = new ObjectHandleTable();
    assert.equal(t.resolve(0n), undefined);
    assert.equal(t.resolve(99n), undefined);
    assert.equal(t.describe(99n), undefined);
  });

  test("retain and release pin the object", () => {
    const t = new ObjectHandleTable();
    const h = t.handleFor(new Map());
    assert.equal(t.retain(h), true);
    assert.equal(t.retain(h), true);
    assert.equal(t.pinCount(h), 2);
    t.release(h);
    t.release(h);
    t.release(h);
    assert.equal(t.pinCount(h), 0);
    assert.equal(t.retain(5n), false);
  });
});

describe("ObjectHandleTable - collection", () => {
  function watched() {
    const registered: Array<[object, bigint]> = [];
    let collect: (handle: bigint) => void = () => {};
    const table = new ObjectHandleTable({
      watchCollection(onCollected) {
        collect = onCollected;
        return { register: (target, handle) => registered.push([target, handle]) };
      },
    });
    return { table, registered, collect: (handle: bigint) => collect(handle) };
  }

  test("every new object is registered once under its handle", () => {
    const { table, registered } = watched();
    const a = { a: 1 };
    const h = table.handleFor(a);
    table.handleFor(a);
    table.handleFor({ b: 2 });

    assert.deepEqual(registered, [
      [a, h],
      [{ b: 2 }, 2n],
    ]);
    assert.equal(table.size, 2);
  });

  test("a collected object's slot is removed", () => {
    const { table, collect } = watched();
    for (let i = 0; i < 100; i++) table.handleFor({ i });
    for (let h = 1n; h <= 100n; h++) collect(h);

    assert.equal(table.size, 0);
    assert.equal(table.resolve(1n), undefined);
    assert.equal(table.pinCount(1n), 0);
  });

  test("the default table watches through a FinalizationRegistry", () => {
    const table = new ObjectHandleTable();
    const kept = { kept: true };
    assert.equal(table.handleFor(kept), 1n);
    assert.equal(table.size, 1);
    assert.equal(table.resolve(1n), kept);
  });
});

describe("describeObject", () => {
  test("errors print name and message", () => {
    assert.equal(describeObject(new TypeError("bad input")), "TypeError: bad input");
    assert.equal(describeObject(new RangeError()), "RangeError");
  });

  test("dates print ISO text", () => {
    assert.equal(describeObject(new Date(0)), "1970-01-01T00:00:00.000Z");
    assert.equal(describeObject(new Date(Number.NaN)), "Invalid Date");
  });

  test("own toString wins over JSON", () => {
    class Endpoint {
      toString(): string {
        return "tcp://localhost:7000";
      }
    }
    assert.equal(describeObject(new Endpoint()), "tcp://localhost:7000");
    assert.equal(describeObject([1, "a"]), "1,a");
  });

  test("plain and unserializable objects", () => {
    assert.equal(describeObject({ a: [1, 2] }), '{"a":[1,2]}');
    const cyclic: { self?: unknown } = {};
    cyclic.self = cyclic;
    assert.match(describeObject(cyclic), /^<Object: /);
  });
});

describe("createTraceSymbols", () => {
  test("tables are independent per instance", () => {
    const a = createTraceSymbols();
    const b = createTraceSymbols({ maxEntries: 4 });
    a.strings.intern("x");
    assert.equal(b.strings.size, 0);
    assert.equal(b.strings.maxEntries, 4);
  });
});
