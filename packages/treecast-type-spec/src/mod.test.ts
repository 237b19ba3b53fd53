// Descriptor builders, cache keys and runtime inference

import assert from "node:assert/strict";
import { test } from "node:test";
import {
  describeClass,
  describeValue,
  descriptorKey,
  enumValues,
  Kind,
  param,
  t,
  typeName,
} from "./mod.ts";

class Point {
  constructor(readonly x: number, readonly y: number) {}
}
const Point$ = t.object(Point, [param("x", t.number()), param("y", t.number())]);

test("descriptorKey - structural kinds share a key", () => {
  assert.equal(
    descriptorKey(t.array(t.integer())),
    descriptorKey(t.array(t.integer())),
  );
  assert.equal(descriptorKey(t.array(t.integer())), "array<integer>");
  assert.equal(
    descriptorKey(t.tuple(t.string(), t.optional(t.integer()))),
    "tuple<string,union<integer|null>>",
  );
  assert.equal(descriptorKey(t.literal("a")), 'literal:"a"');
});

test("descriptorKey - objects and tokens hash by identity", () => {
  class Other {}
  const a = t.object(Other, []);
  const b = t.object(Other, []);
  assert.notEqual(descriptorKey(a), descriptorKey(b));
  assert.equal(descriptorKey(a), descriptorKey(a));
  assert.notEqual(descriptorKey(t.token("db")), descriptorKey(t.token("db")));
});

test("descriptorKey - plain and flag enums over one table differ", () => {
  const Perm = { R: 1, W: 2 };
  assert.equal(descriptorKey(t.enum(Perm, "Perm")), descriptorKey(t.enum(Perm, "Perm")));
  assert.notEqual(descriptorKey(t.enum(Perm, "Perm")), descriptorKey(t.flags(Perm, "Perm")));
  assert.match(descriptorKey(t.flags(Perm, "Perm")), /^flags:Perm#/);
});

test("descriptorKey - lazy reference hashes as its target", () => {
  assert.equal(descriptorKey(t.lazy(() => Point$)), descriptorKey(Point$));
});

test("descriptorKey - structural cycle terminates", () => {
  type Json = ReturnType<typeof t.union>;
  const json: Json = t.union(
    t.string(),
    t.array(t.lazy(() => json)),
  );
  const key = descriptorKey(json);
  assert.match(key, /^union<string\|array<union<string\|array<lazy#\d+>>>>$/);
});

test("typeName - readable names", () => {
  assert.equal(typeName(t.array(Point$)), "Array<Point>");
  assert.equal(typeName(t.map(t.integer())), "Map<string, integer>");
  assert.equal(typeName(t.optional(t.string())), "string | null");
  assert.equal(typeName(t.tuple(t.integer(), t.boolean())), "[integer, boolean]");
  assert.equal(typeName(t.token("clock")), "token(clock)");
});

test("describeValue - runtime types", () => {
  assert.equal(describeValue(null)?.kind, Kind.NULL);
  assert.equal(describeValue(3)?.kind, Kind.INTEGER);
  assert.equal(describeValue(3.5)?.kind, Kind.NUMBER);
  assert.equal(describeValue("x")?.kind, Kind.STRING);
  assert.equal(describeValue(new Date(0))?.kind, Kind.TIMESTAMP);
  assert.equal(describeValue(new Uint8Array(1))?.kind, Kind.BYTES);
  assert.equal(describeValue({ a: 1 })?.kind, Kind.RECORD);
  assert.equal(describeValue(new Point(1, 2)), Point$);
  assert.equal(describeValue(() => 1), undefined);
});

test("describeClass - registered through t.object", () => {
  assert.equal(describeClass(Point), Point$);
  class Unregistered {}
  assert.equal(describeClass(Unregistered), undefined);
});

test("param - defaults and options", () => {
  const plain = param("a", t.integer());
  assert.equal(plain.hasDefault, false);

  const withUndefinedDefault = param("b", t.integer(), { default: undefined });
  assert.equal(withUndefinedDefault.hasDefault, true);

  let calls = 0;
  const withFactory = param("c", t.array(t.integer()), {
    defaultFactory: () => {
      calls++;
      return [];
    },
  });
  assert.equal(withFactory.hasDefault, true);
  assert.notEqual(withFactory.defaultValue(), withFactory.defaultValue());
  assert.equal(calls, 2);

  assert.deepEqual(param("d", t.string(), { aliases: ["x", "x", "y"] }).aliases, [
    "x",
    "y",
  ]);
  assert.deepEqual(param("e", t.record(t.any()), { extras: true }).extras, {});
  assert.throws(
    () => param("f", undefined, { extras: { include: ["a"], exclude: ["b"] } }),
    /not both/,
  );
});

test("param - string getter reads the named property", () => {
  const spec = param("x", t.number(), { getter: "y" });
  assert.equal(spec.getter?.(new Point(1, 2)), 2);
});

test("enumValues - skips numeric reverse entries", () => {
  enum Color {
    RED = 1,
    GREEN = 2,
  }
  assert.deepEqual(enumValues(Color), [1, 2]);
  assert.deepEqual(enumValues({ A: "a", B: "b" }), ["a", "b"]);
});
