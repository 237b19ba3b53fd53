// packages/treecast-type-spec/src/keys.ts
// Hashing, naming and runtime inference for descriptors.

import { match as patternMatch } from "ts-pattern";
import {
  describeClass,
  type EnumTable,
  Kind,
  t,
  type TypeDescriptor,
} from "./mod.ts";

const identities = new WeakMap<object, number>();
let nextIdentity = 1;

/** Stable per-process number for an object, used where types hash by identity. */
export function identityOf(o: object): number {
  let id = identities.get(o);
  if (id === undefined) {
    id = nextIdentity++;
    identities.set(o, id);
  }
  return id;
}

/**
 * Canonical cache key of a descriptor.
 *
 * Structural kinds hash by shape, so two `t.array(t.integer())` calls share a
 * key. Objects, enums and tokens hash by identity. A forward reference hashes
 * as its target; a cycle that never crosses an identity-hashed type is cut at
 * the reference (`lazy#<id>`).
 */
export function descriptorKey(d: TypeDescriptor): string {
  return keyOf(d, new Set());
}

function keyOf(d: TypeDescriptor, visiting: Set<object>): string {
  return patternMatch<TypeDescriptor, string>(d)
    .with({ kind: Kind.STRING }, () => "string")
    .with({ kind: Kind.NUMBER }, () => "number")
    .with({ kind: Kind.INTEGER }, () => "integer")
    .with({ kind: Kind.BOOLEAN }, () => "boolean")
    .with({ kind: Kind.NULL }, () => "null")
    .with({ kind: Kind.BYTES }, () => "bytes")
    .with({ kind: Kind.TIMESTAMP }, () => "timestamp")
    .with({ kind: Kind.ANY }, () => "any")
    .with({ kind: Kind.LITERAL }, (l) => `literal:${JSON.stringify(l.value)}`)
    .with({ kind: Kind.ARRAY }, (a) => `array<${keyOf(a.element, visiting)}>`)
    .with({ kind: Kind.SET }, (s) => `set<${keyOf(s.element, visiting)}>`)
    .with({ kind: Kind.RECORD }, (r) => `record<${keyOf(r.value, visiting)}>`)
    .with({ kind: Kind.MAP }, (m) => `map<${keyOf(m.value, visiting)}>`)
    .with(
      { kind: Kind.TUPLE },
      (tp) => `tuple<${tp.elements.map((e) => keyOf(e, visiting)).join(",")}>`,
    )
    .with(
      { kind: Kind.UNION },
      (u) => `union<${u.members.map((m) => keyOf(m, visiting)).join("|")}>`,
    )
    .with(
      { kind: Kind.ENUM },
      (e) => `${e.flags ? "flags" : "enum"}:${e.name}#${identityOf(e.members)}`,
    )
    .with({ kind: Kind.OBJECT }, (o) => `object:${o.name}#${identityOf(o)}`)
    .with({ kind: Kind.TOKEN }, (tk) => `token:${tk.name}#${identityOf(tk)}`)
    .with({ kind: Kind.LAZY }, (l) => {
      if (visiting.has(l)) return `lazy#${identityOf(l)}`;
      visiting.add(l);
      const key = keyOf(l.resolve(), visiting);
      visiting.delete(l);
      return key;
    })
    .exhaustive();
}

/** Human-readable name used in diagnostics. */
export function typeName(d: TypeDescriptor): string {
  return nameOf(d, new Set());
}

function nameOf(d: TypeDescriptor, visiting: Set<object>): string {
  return patternMatch<TypeDescriptor, string>(d)
    .with({ kind: Kind.LITERAL }, (l) => JSON.stringify(l.value))
    .with({ kind: Kind.ARRAY }, (a) => `Array<${nameOf(a.element, visiting)}>`)
    .with({ kind: Kind.SET }, (s) => `Set<${nameOf(s.element, visiting)}>`)
    .with(
      { kind: Kind.RECORD },
      (r) => `Record<string, ${nameOf(r.value, visiting)}>`,
    )
    .with({ kind: Kind.MAP }, (m) => `Map<string, ${nameOf(m.value, visiting)}>`)
    .with(
      { kind: Kind.TUPLE },
      (tp) => `[${tp.elements.map((e) => nameOf(e, visiting)).join(", ")}]`,
    )
    .with(
      { kind: Kind.UNION },
      (u) => u.members.map((m) => nameOf(m, visiting)).join(" | "),
    )
    .with({ kind: Kind.ENUM }, (e) => e.name)
    .with({ kind: Kind.OBJECT }, (o) => o.name)
    .with({ kind: Kind.TOKEN }, (tk) => `token(${tk.name})`)
    .with({ kind: Kind.LAZY }, (l) => {
      if (visiting.has(l)) return "<recursive>";
      visiting.add(l);
      const name = nameOf(l.resolve(), visiting);
      visiting.delete(l);
      return name;
    })
    .otherwise(() => keyOf(d, visiting));
}

/**
 * Descriptor of a value's exact runtime type, or `undefined` when there is
 * none (functions, symbols, objects of unregistered classes).
 */
export function describeValue(value: unknown): TypeDescriptor | undefined {
  if (value === null || value === undefined) return t.null();
  switch (typeof value) {
    case "string":
      return t.string();
    case "number":
      return Number.isInteger(value) ? t.integer() : t.number();
    case "boolean":
      return t.boolean();
    case "object":
      break;
    default:
      return undefined;
  }

  if (value instanceof Date) return t.timestamp();
  if (value instanceof Uint8Array) return t.bytes();
  if (Array.isArray(value)) return t.array(t.any());
  if (value instanceof Set) return t.set(t.any());
  if (value instanceof Map) return t.map(t.any());

  const proto: unknown = Object.getPrototypeOf(value);
  if (proto === null || proto === Object.prototype) return t.record(t.any());
  if (typeof proto !== "object") return undefined;
  const ctor: unknown = Reflect.get(proto, "constructor");
  return typeof ctor === "function" ? describeClass(ctor) : undefined;
}

/**
 * Member values of an enum table, skipping the reverse entries TypeScript
 * emits for numeric members.
 */
export function enumValues(members: EnumTable): (string | number)[] {
  return Object.keys(members)
    .filter((name) => Number.isNaN(Number(name)))
    .map((name) => members[name]);
}
