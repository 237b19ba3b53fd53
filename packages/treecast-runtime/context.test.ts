import assert from "node:assert/strict";
import { test } from "node:test";
import {
  Kind,
  type ObjectDescriptor,
  param,
  t,
  type TypeDescriptor,
} from "../treecast-type-spec/src/mod.ts";
import type { Converter, ConverterFactory } from "./contract.ts";
import {
  createSerializationContext,
  proxyConverter,
  type ResolutionEvent,
} from "./context.ts";
import { LoadError, ResolutionError } from "./errors.ts";

test("getConverter - same descriptor, same converter", () => {
  const ctx = createSerializationContext();
  const first = ctx.getConverter(t.array(t.integer()));
  assert.equal(ctx.getConverter(t.array(t.integer())), first);
  assert.equal(ctx.getConverter(t.integer()), ctx.getConverter(t.integer()));
});

test("getConverter - scalars are pre-registered", () => {
  const ctx = createSerializationContext();
  assert.equal(ctx.getConverter(t.string()).kind, "string");
  assert.equal(ctx.getConverter(t.number()).kind, "number");
  assert.equal(ctx.getConverter(t.integer()).kind, "integer");
  assert.equal(ctx.getConverter(t.boolean()).kind, "boolean");
  assert.equal(ctx.getConverter(t.bytes()).kind, "bytes");
  assert.equal(ctx.getConverter(t.null()).kind, "null");
  assert.equal(ctx.getConverter(t.timestamp()).kind, "timestamp");
});

test("getConverter - any follows the context policy", () => {
  const strict = createSerializationContext({ anyLoadPolicy: "raise_error" });
  assert.throws(
    () => strict.getConverter(t.any()).load(1, undefined, strict),
    (err: unknown) => err instanceof LoadError && err.code === "any_load_forbidden",
  );
  const loose = createSerializationContext();
  assert.equal(loose.getConverter(t.any()).load(1, undefined, loose), 1);
});

test("getConverter - lazy resolves to its target's converter", () => {
  const ctx = createSerializationContext();
  const target = t.array(t.string());
  assert.equal(ctx.getConverter(t.lazy(() => target)), ctx.getConverter(target));
});

test("getConverter - no converter names the type", () => {
  const ctx = createSerializationContext();
  assert.throws(
    () => ctx.getConverter(t.array(t.token("session"))),
    (err: unknown) =>
      err instanceof ResolutionError && err.code === "no_converter" &&
      err.typeName === "token(session)",
  );
  assert.throws(() => ctx.getConverter(t.union()), ResolutionError);
});

test("getConverter - resolution stack cleared after success and failure", () => {
  const ctx = createSerializationContext();
  const seen: boolean[] = [];
  const spy: ConverterFactory = {
    name: "spy",
    tryCreate: (tp) => {
      seen.push(ctx.isResolving(tp));
      return undefined;
    },
  };
  ctx.converterFactories.unshift(spy);
  const list = t.array(t.integer());
  ctx.getConverter(list);
  assert.deepEqual(seen, [true]);
  assert.equal(ctx.isResolving(list), false);

  const bad = t.token("missing");
  assert.throws(() => ctx.getConverter(bad), ResolutionError);
  assert.equal(ctx.isResolving(bad), false);
});

test("converterFactories - earlier factories take precedence", () => {
  const ctx = createSerializationContext();
  const upper: Converter = {
    kind: "upper",
    dump: (value) => String(value).toUpperCase(),
    load: (data) => String(data).toLowerCase(),
  };
  ctx.converterFactories.unshift({
    name: "upper",
    tryCreate: (tp) => tp.kind === Kind.ARRAY ? upper : undefined,
  });
  assert.equal(ctx.getConverter(t.array(t.string())), upper);
});

test("options.factories - replaces the default chain", () => {
  const ctx = createSerializationContext({ factories: [] });
  assert.throws(() => ctx.getConverter(t.array(t.integer())), ResolutionError);
  assert.equal(ctx.getConverter(t.integer()).kind, "integer");
});

test("addConverter - overrides resolution", () => {
  const ctx = createSerializationContext();
  const exact: Converter = { kind: "exact", dump: (v) => v, load: (d) => d };
  ctx.addConverter(t.timestamp(), exact);
  assert.equal(ctx.getConverter(t.timestamp()), exact);
});

class ListNode {
  constructor(readonly value: number, readonly next: ListNode | null = null) {}
}

const ListNode$: ObjectDescriptor = t.object(ListNode, () => [
  param("value", t.integer()),
  param("next", t.optional(ListNode$), { default: null }),
]);

function chain(depth: number): ListNode {
  let node = new ListNode(depth - 1);
  for (let i = depth - 2; i >= 0; i--) node = new ListNode(i, node);
  return node;
}

function nestedData(depth: number, innermost: unknown): Record<string, unknown> {
  let data: Record<string, unknown> = { value: innermost, next: null };
  for (let i = depth - 2; i >= 0; i--) data = { value: i, next: data };
  return data;
}

test("recursive type - resolves once and round-trips deep data", () => {
  const ctx = createSerializationContext();
  const conv = ctx.getConverter(ListNode$);
  assert.equal(ctx.getConverter(ListNode$), conv);

  const depth = 3000;
  const data = nestedData(depth, depth - 1);
  const loaded = conv.load(data, undefined, ctx);

  let node: unknown = loaded;
  for (let i = 0; i < depth; i++) {
    assert.ok(node instanceof ListNode);
    assert.equal(node.value, i);
    node = node.next;
  }
  assert.equal(node, null);

  assert.equal(JSON.stringify(conv.dump(loaded, ctx)), JSON.stringify(data));
});

test("recursive type - deep invalid data fails fast", () => {
  const ctx = createSerializationContext();
  const conv = ctx.getConverter(ListNode$);
  const started = performance.now();
  assert.throws(
    () => conv.load(nestedData(2000, "x"), undefined, ctx),
    (err: unknown) =>
      err instanceof LoadError &&
      err.code === "object_load_error" &&
      err.message === "Failed to load object",
  );
  assert.ok(performance.now() - started < 5000);
});

test("recursive type - through a lazy structural alias", () => {
  type Tree = string | Tree[];
  const Tree$: TypeDescriptor = t.union(t.string(), t.array(t.lazy(() => Tree$)));
  const ctx = createSerializationContext();
  const conv = ctx.getConverter(Tree$);
  const data: Tree = ["a", ["b", ["c"]], "d"];
  assert.deepEqual(conv.load(data, undefined, ctx), data);
  assert.throws(() => conv.load(["a", [1]], undefined, ctx), LoadError);
});

test("proxyConverter - resolves through the context once", () => {
  const ctx = createSerializationContext();
  let lookups = 0;
  const counting = {
    ...ctx,
    getConverter: (tp: TypeDescriptor) => {
      lookups++;
      return ctx.getConverter(tp);
    },
  };
  const proxy = proxyConverter(t.integer());
  assert.equal(proxy.load(1.5, undefined, counting), 1);
  assert.equal(proxy.dump(2, counting), 2);
  assert.equal(lookups, 1);
});

test("inspectResolution - hooks see factory-built converters", () => {
  const ctx = createSerializationContext();
  const events: ResolutionEvent[] = [];
  const failures: string[] = [];
  ctx.inspectResolution((hooks) => {
    hooks.onResolved((event) => events.push(event));
    hooks.onFailure((error) => failures.push(error.typeName));
  });

  ctx.getConverter(t.array(t.integer()));
  ctx.getConverter(t.array(t.integer()));
  assert.deepEqual(
    events.map((e) => [e.typeName, e.factory, e.converter.kind]),
    [["Array<integer>", "array", "list"]],
  );

  assert.throws(() => ctx.getConverter(t.token("db")), ResolutionError);
  assert.deepEqual(failures, ["token(db)"]);
});

test("inspectResolution - a throwing hook does not break resolution", (t2) => {
  const ctx = createSerializationContext();
  const logged: unknown[] = [];
  t2.mock.method(console, "error", (...args: unknown[]) => {
    logged.push(args[0]);
  });
  ctx.inspectResolution((hooks) => {
    hooks.onResolved(() => {
      throw new Error("hook failed");
    });
  });
  assert.equal(ctx.getConverter(t.set(t.string())).kind, "set");
  assert.deepEqual(logged, ["Error in onResolved hook:"]);
});
