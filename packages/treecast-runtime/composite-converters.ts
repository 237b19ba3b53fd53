// packages/treecast-runtime/composite-converters.ts
// Converters built from other converters: containers, unions and enums.

import {
  describeValue,
  descriptorKey,
  type EnumDescriptor,
  enumValues,
} from "../treecast-type-spec/src/mod.ts";
import { type ConversionContext, type Converter, isRecord } from "./contract.ts";
import {
  type CollectionKey,
  DumpError,
  errorInfo,
  type ErrorInfo,
  invalidType,
  LoadError,
  runtimeTypeName,
  wrapErrorInfo,
} from "./errors.ts";

function noneLoad(expected: string, key: CollectionKey | undefined): LoadError {
  return new LoadError(
    errorInfo("none_load", `Expected ${expected}, got null`, { target: key }),
  );
}

// Two-level wrap: container node naming the container, child node naming
// the element that failed.
function elementLoadError(
  err: LoadError,
  container: { code: string; message: string; key: CollectionKey | undefined },
  element: { code: string; message: string; key: CollectionKey },
): LoadError {
  const inner = wrapErrorInfo(err.info, element.code, element.message, element.key);
  return new LoadError(
    wrapErrorInfo(inner, container.code, container.message, container.key),
    { cause: err },
  );
}

function elementDumpError(
  err: DumpError,
  code: string,
  message: string,
  key: CollectionKey,
): DumpError {
  return new DumpError(wrapErrorInfo(err.info, code, message, key), {
    cause: err,
  });
}

function loadElements(
  items: readonly unknown[],
  itemConverter: (index: number) => Converter,
  key: CollectionKey | undefined,
  context: ConversionContext,
  codes: { container: string; element: string; noun: string },
): unknown[] {
  return items.map((item, index) => {
    try {
      return itemConverter(index).load(item, index, context);
    } catch (err) {
      if (!(err instanceof LoadError)) throw err;
      throw elementLoadError(
        err,
        { code: codes.container, message: `Failed to load ${codes.noun}`, key },
        {
          code: codes.element,
          message: `Failed to load ${codes.noun} element at index ${index}`,
          key: index,
        },
      );
    }
  });
}

function dumpElements(
  items: Iterable<unknown>,
  itemConverter: (index: number) => Converter,
  context: ConversionContext,
  code: string,
  noun: string,
): unknown[] {
  const out: unknown[] = [];
  let index = 0;
  for (const item of items) {
    try {
      out.push(itemConverter(index).dump(item, context));
    } catch (err) {
      if (!(err instanceof DumpError)) throw err;
      throw elementDumpError(
        err,
        code,
        `Failed to dump ${noun} element at index ${index}`,
        index,
      );
    }
    index++;
  }
  return out;
}

const LIST_CODES = {
  container: "list_load_error",
  element: "list_element_load_error",
  noun: "list",
};

export function listConverter(item: Converter): Converter {
  return {
    kind: "list",
    dump: (value, context) => {
      if (!Array.isArray(value)) {
        throw new DumpError(invalidType("array", value));
      }
      return dumpElements(value, () => item, context, "list_dump_error", "list");
    },
    load: (data, key, context) => {
      if (data === null) throw noneLoad("list", key);
      if (!Array.isArray(data)) {
        throw new LoadError(invalidType("list", data, key));
      }
      return loadElements(data, () => item, key, context, LIST_CODES);
    },
  };
}

/** Loads a list into a `Set`; duplicates collapse by SameValueZero. */
export function setConverter(item: Converter): Converter {
  return {
    kind: "set",
    dump: (value, context) => {
      if (!(value instanceof Set) && !Array.isArray(value)) {
        throw new DumpError(invalidType("Set", value));
      }
      return dumpElements(value, () => item, context, "list_dump_error", "set");
    },
    load: (data, key, context) => {
      if (data === null) throw noneLoad("list", key);
      if (!Array.isArray(data)) {
        throw new LoadError(invalidType("list", data, key));
      }
      return new Set(loadElements(data, () => item, key, context, LIST_CODES));
    },
  };
}

function loadEntries(
  data: unknown,
  valueConverter: Converter,
  key: CollectionKey | undefined,
  context: ConversionContext,
): [string, unknown][] {
  if (data === null) throw noneLoad("mapping", key);
  if (!isRecord(data)) throw new LoadError(invalidType("mapping", data, key));
  return Object.entries(data).map(([k, v]) => {
    try {
      return [k, valueConverter.load(v, k, context)];
    } catch (err) {
      if (!(err instanceof LoadError)) throw err;
      throw elementLoadError(
        err,
        { code: "dict_load_error", message: "Failed to load dict", key },
        {
          code: "dict_value_load_error",
          message: `Failed to load dict value for key ${k}`,
          key: k,
        },
      );
    }
  });
}

function dumpEntries(
  entries: Iterable<[unknown, unknown]>,
  valueConverter: Converter,
  context: ConversionContext,
): Record<string, unknown> {
  const out: [string, unknown][] = [];
  for (const [k, v] of entries) {
    const name = String(k);
    try {
      out.push([name, valueConverter.dump(v, context)]);
    } catch (err) {
      if (!(err instanceof DumpError)) throw err;
      throw elementDumpError(
        err,
        "dict_dump_error",
        `Failed to dump dict value for key ${name}`,
        name,
      );
    }
  }
  return Object.fromEntries(out);
}

/** String-keyed plain object. */
export function recordConverter(value: Converter): Converter {
  return {
    kind: "record",
    dump: (v, context) => {
      if (!isRecord(v)) throw new DumpError(invalidType("mapping", v));
      return dumpEntries(Object.entries(v), value, context);
    },
    load: (data, key, context) =>
      Object.fromEntries(loadEntries(data, value, key, context)),
  };
}

/** `Map` instance, carried as a plain object in the tree. */
export function mapConverter(value: Converter): Converter {
  return {
    kind: "map",
    dump: (v, context) => {
      if (!(v instanceof Map)) throw new DumpError(invalidType("Map", v));
      return dumpEntries(v.entries(), value, context);
    },
    load: (data, key, context) =>
      new Map(loadEntries(data, value, key, context)),
  };
}

/** Fixed-length heterogeneous list. */
export function tupleConverter(...items: Converter[]): Converter {
  return {
    kind: "tuple",
    dump: (value, context) => {
      if (!Array.isArray(value)) {
        throw new DumpError(invalidType("array", value));
      }
      const paired = value.slice(0, items.length);
      return dumpElements(
        paired,
        (i) => items[i],
        context,
        "tuple_dump_error",
        "tuple",
      );
    },
    load: (data, key, context) => {
      if (data === null) throw noneLoad("list", key);
      if (!Array.isArray(data)) {
        throw new LoadError(invalidType("list", data, key));
      }
      if (data.length !== items.length) {
        throw new LoadError(
          errorInfo(
            "invalid_tuple_len",
            `Expected ${items.length} values in tuple, got ${data.length}`,
            { target: key },
          ),
        );
      }
      return loadElements(data, (i) => items[i], key, context, {
        container: "tuple_load_error",
        element: "tuple_element_load_error",
        noun: "tuple",
      });
    },
  };
}

/**
 * Ordered union: the first member that succeeds wins.
 *
 * With `memberKeys` (the descriptor keys of the members, in order), dump
 * first tries the member whose key equals the exact runtime type of the
 * value, so `1` under `number | string` is not claimed by a pass-through
 * member listed earlier.
 */
export function unionConverter(
  members: readonly Converter[],
  memberKeys?: readonly string[],
): Converter {
  return {
    kind: "union",
    dump: (value, context) => {
      const errors: ErrorInfo[] = [];
      let exact = -1;
      if (memberKeys) {
        const runtime = describeValue(value);
        if (runtime) exact = memberKeys.indexOf(descriptorKey(runtime));
      }
      const order = exact < 0
        ? members
        : [members[exact], ...members.filter((_, i) => i !== exact)];
      for (const member of order) {
        try {
          return member.dump(value, context);
        } catch (err) {
          if (!(err instanceof DumpError)) throw err;
          errors.push(err.info);
        }
      }
      throw new DumpError(
        errorInfo(
          "union_dump_error",
          `Unable to dump union type: no suitable converter found for ${
            runtimeTypeName(value)
          }`,
          { details: errors },
        ),
      );
    },
    load: (data, key, context) => {
      const errors: ErrorInfo[] = [];
      for (const member of members) {
        try {
          return member.load(data, key, context);
        } catch (err) {
          if (!(err instanceof LoadError)) throw err;
          errors.push(err.info);
        }
      }
      throw new LoadError(
        errorInfo("union_load_error", "Unable to load union type", {
          target: key,
          details: errors,
        }),
      );
    },
  };
}

// ============================================================================
// Discriminated unions
// ============================================================================

export type DiscriminatedConverter = Converter & {
  readonly tagKey: string;
  readonly tags: readonly string[];
  /** Map `tag` to instances of `target`, converted by `converter`. */
  register(tag: string, target: object, converter: Converter): void;
};

export type DiscriminatedEntry = {
  readonly tag: string;
  readonly target: object;
  readonly converter: Converter;
};

/**
 * Tagged union keyed on `tagKey`. Members are registered after creation so
 * a member may refer back to the union it belongs to.
 */
export function createDiscriminatedConverter(
  tagKey = "type",
): DiscriminatedConverter {
  const byTag = new Map<string, Converter>();
  const byTarget = new Map<object, { tag: string; converter: Converter }>();
  const tags: string[] = [];

  return {
    kind: "discriminated",
    tagKey,
    tags,
    register(tag, target, converter) {
      if (!byTag.has(tag)) tags.push(tag);
      byTag.set(tag, converter);
      byTarget.set(target, { tag, converter });
    },
    load(data, key, context) {
      if (data === null) throw noneLoad("mapping", key);
      if (!isRecord(data)) {
        throw new LoadError(invalidType("mapping", data, key));
      }
      const tag = data[tagKey];
      const converter = typeof tag === "string" ? byTag.get(tag) : undefined;
      if (!converter) {
        throw new LoadError(
          errorInfo(
            "unknown_discriminator",
            `No registered converter found for discriminator ${tagKey}=${
              JSON.stringify(tag) ?? "undefined"
            }; expected one of: ${tags.map((t) => JSON.stringify(t)).join(", ")}`,
            { target: key },
          ),
        );
      }
      return converter.load(data, key, context);
    },
    dump(value, context) {
      const proto: unknown = typeof value === "object" && value !== null
        ? Object.getPrototypeOf(value)
        : undefined;
      const ctor: unknown = typeof proto === "object" && proto !== null
        ? Reflect.get(proto, "constructor")
        : undefined;
      const entry = typeof ctor === "function" ? byTarget.get(ctor) : undefined;
      if (!entry) {
        throw new DumpError(
          errorInfo(
            "unknown_discriminator_type",
            `Cannot determine discriminator value for type ${
              runtimeTypeName(value)
            }`,
          ),
        );
      }
      const dumped = entry.converter.dump(value, context);
      if (!isRecord(dumped)) {
        throw new DumpError(invalidType("mapping", dumped));
      }
      return { ...dumped, [tagKey]: entry.tag };
    },
  };
}

export function discriminatedConverter(
  entries: readonly DiscriminatedEntry[],
  tagKey = "type",
): DiscriminatedConverter {
  const converter = createDiscriminatedConverter(tagKey);
  for (const entry of entries) {
    converter.register(entry.tag, entry.target, entry.converter);
  }
  return converter;
}

// ============================================================================
// Enums
// ============================================================================

function isFlagValue(v: unknown): v is number {
  return typeof v === "number" && Number.isSafeInteger(v) && v >= 0;
}

/**
 * Enumeration by value. A flag enum also accepts any non-negative integer
 * made only of its member bits, so `RED | GREEN | BLUE` loads as `7`.
 */
export function enumConverter(descriptor: EnumDescriptor): Converter {
  const values = enumValues(descriptor.members);
  // BigInt keeps the bit test exact past 32 bits.
  const allBits = values.reduce<bigint>(
    (bits, v) => (isFlagValue(v) ? bits | BigInt(v) : bits),
    0n,
  );

  const isMember = (v: unknown): boolean => {
    if (descriptor.flags) {
      return isFlagValue(v) && (BigInt(v) & ~allBits) === 0n;
    }
    return (typeof v === "string" || typeof v === "number") &&
      values.includes(v);
  };

  const invalid = (v: unknown, key?: CollectionKey): ErrorInfo =>
    errorInfo("invalid_enum_value", `Invalid ${descriptor.name} value`, {
      target: key,
      details: [
        errorInfo(
          "RangeError",
          `${JSON.stringify(v) ?? String(v)} is not a valid ${descriptor.name}`,
        ),
      ],
    });

  return {
    kind: "enum",
    dump: (value) => {
      if (isMember(value)) return value;
      throw new DumpError(invalid(value));
    },
    load: (data, key) => {
      if (isMember(data)) return data;
      throw new LoadError(invalid(data, key));
    },
  };
}
