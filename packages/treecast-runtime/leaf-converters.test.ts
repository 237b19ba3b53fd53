import assert from "node:assert/strict";
import { test } from "node:test";
import type { ConversionContext } from "./contract.ts";
import { createSerializationContext } from "./context.ts";
import { DumpError, LoadError } from "./errors.ts";
import {
  anyConverter,
  bytesConverter,
  exactConverter,
  literalConverter,
  nullConverter,
  scalarConverter,
  timestampConverter,
} from "./leaf-converters.ts";

const ctx: ConversionContext = createSerializationContext();

function loadError(fn: () => unknown): LoadError {
  try {
    fn();
  } catch (err) {
    if (err instanceof LoadError) return err;
    throw err;
  }
  assert.fail("expected a LoadError");
}

test("scalar - integer accepts numbers and truncates", () => {
  const integer = scalarConverter("integer", "number");
  assert.equal(integer.load(42, undefined, ctx), 42);
  assert.equal(integer.load(42.456, undefined, ctx), 42);
  assert.equal(integer.load(1e-4, undefined, ctx), 0);
  assert.equal(integer.load(-2.9, undefined, ctx), -2);
});

test("scalar - wrong type is invalid_type with the key", () => {
  const integer = scalarConverter("integer", "number");
  const err = loadError(() => integer.load("42", "age", ctx));
  assert.equal(err.code, "invalid_type");
  assert.equal(err.target, "age");
  assert.equal(err.info.message, "Invalid type, expected integer, got string");
});

test("scalar - string refuses numbers, number accepts integers", () => {
  assert.equal(loadError(() => scalarConverter("string").load(1, undefined, ctx)).code, "invalid_type");
  assert.equal(scalarConverter("number").load(3, undefined, ctx), 3);
  assert.equal(scalarConverter("boolean").dump(true, ctx), true);
});

test("null - only null loads", () => {
  const conv = nullConverter();
  assert.equal(conv.load(null, undefined, ctx), null);
  assert.equal(conv.dump(undefined, ctx), null);
  assert.equal(loadError(() => conv.load(0, undefined, ctx)).code, "invalid_type");
});

test("bytes - utf-8 text both ways", () => {
  const conv = bytesConverter();
  const loaded = conv.load("héllo", undefined, ctx);
  assert.deepEqual(loaded, new Uint8Array([104, 195, 169, 108, 108, 111]));
  assert.equal(conv.dump(loaded, ctx), "héllo");
  assert.throws(() => conv.dump("héllo", ctx), DumpError);
});

test("bytes - configured encoding", () => {
  const conv = bytesConverter("base64");
  assert.deepEqual(conv.load("AQID", undefined, ctx), new Uint8Array([1, 2, 3]));
  assert.equal(conv.dump(new Uint8Array([1, 2, 3]), ctx), "AQID");
});

test("timestamp - seconds since epoch", () => {
  const conv = timestampConverter();
  const date = new Date(Date.UTC(2021, 0, 23, 19, 21, 28, 704));
  const dumped = conv.dump(date, ctx);
  assert.equal(dumped, 1611429688.704);
  assert.deepEqual(conv.load(dumped, undefined, ctx), date);
});

test("timestamp - invalid input", () => {
  const err = loadError(() => timestampConverter().load("yesterday", "at", ctx));
  assert.equal(err.code, "invalid_datetime");
  assert.equal(err.target, "at");
  assert.equal(err.info.details[0].code, "TypeError");
  assert.throws(() => timestampConverter().dump(new Date(NaN), ctx), DumpError);
});

test("any - pass through by default", () => {
  const conv = anyConverter();
  const value = { a: [1, 2] };
  assert.equal(conv.load(value, undefined, ctx), value);
  assert.equal(conv.dump(value, ctx), value);
});

test("any - raise_error policies", () => {
  const conv = anyConverter("raise_error", "raise_error");
  assert.equal(loadError(() => conv.load(1, "k", ctx)).code, "any_load_forbidden");
  assert.throws(
    () => conv.dump(1, ctx),
    (err: unknown) => err instanceof DumpError && err.code === "any_dump_forbidden",
  );
});

test("literal - exact value only", () => {
  const conv = literalConverter("circle");
  assert.equal(conv.load("circle", undefined, ctx), "circle");
  const err = loadError(() => conv.load("square", "shape", ctx));
  assert.equal(err.code, "invalid_literal");
  assert.equal(
    err.info.message,
    'Invalid literal value, expected "circle", got "square"',
  );
});

test("exact - identity", () => {
  const conv = exactConverter();
  const value = new Map([["a", 1]]);
  assert.equal(conv.load(value, undefined, ctx), value);
  assert.equal(conv.dump(value, ctx), value);
});
