// packages/treecast-runtime/factories.ts
// The default factory chain and the discriminated-union factory.

import {
  descriptorKey,
  Kind,
  type ObjectDescriptor,
} from "../treecast-type-spec/src/mod.ts";
import type { ConversionContext, ConverterFactory } from "./contract.ts";
import {
  createDiscriminatedConverter,
  type DiscriminatedConverter,
  enumConverter,
  listConverter,
  mapConverter,
  recordConverter,
  setConverter,
  tupleConverter,
  unionConverter,
} from "./composite-converters.ts";
import { ResolutionError } from "./errors.ts";
import { literalConverter } from "./leaf-converters.ts";
import {
  objectConverterFactory,
  type ObjectConverterFactoryOptions,
} from "./object-converter.ts";

export const tupleConverterFactory: ConverterFactory = {
  name: "tuple",
  tryCreate: (tp, context) =>
    tp.kind === Kind.TUPLE
      ? tupleConverter(...tp.elements.map((e) => context.getConverter(e)))
      : undefined,
};

export const arrayConverterFactory: ConverterFactory = {
  name: "array",
  tryCreate: (tp, context) =>
    tp.kind === Kind.ARRAY
      ? listConverter(context.getConverter(tp.element))
      : undefined,
};

/** Records and maps: string keys, converted values. */
export const mappingConverterFactory: ConverterFactory = {
  name: "mapping",
  tryCreate: (tp, context) => {
    if (tp.kind === Kind.RECORD) {
      return recordConverter(context.getConverter(tp.value));
    }
    if (tp.kind === Kind.MAP) return mapConverter(context.getConverter(tp.value));
    return undefined;
  },
};

export const setConverterFactory: ConverterFactory = {
  name: "set",
  tryCreate: (tp, context) =>
    tp.kind === Kind.SET
      ? setConverter(context.getConverter(tp.element))
      : undefined,
};

export const enumConverterFactory: ConverterFactory = {
  name: "enum",
  tryCreate: (tp) => tp.kind === Kind.ENUM ? enumConverter(tp) : undefined,
};

/** Declines an empty union. */
export const unionConverterFactory: ConverterFactory = {
  name: "union",
  tryCreate: (tp, context) => {
    if (tp.kind !== Kind.UNION || tp.members.length === 0) return undefined;
    return unionConverter(
      tp.members.map((m) => context.getConverter(m)),
      tp.members.map(descriptorKey),
    );
  },
};

export const literalConverterFactory: ConverterFactory = {
  name: "literal",
  tryCreate: (tp) =>
    tp.kind === Kind.LITERAL ? literalConverter(tp.value) : undefined,
};

/**
 * Default chain, in precedence order: tuple, array, record/map, set, enum,
 * object, union, literal.
 */
export function defaultConverterFactories(
  options: ObjectConverterFactoryOptions = {},
): ConverterFactory[] {
  return [
    tupleConverterFactory,
    arrayConverterFactory,
    mappingConverterFactory,
    setConverterFactory,
    enumConverterFactory,
    objectConverterFactory(options),
    unionConverterFactory,
    literalConverterFactory,
  ];
}

/**
 * Tagged union over the object types in `tagMap`.
 *
 * Claims every mapped object type and every union whose members are all
 * mapped, and hands all of them the same converter (one per context). The
 * converter is cached before its members are built, so a member that refers
 * back to the union reaches it instead of recursing.
 *
 * Prepend to a context's `converterFactories`; `inner` builds the member
 * converters (usually an object factory).
 *
 * @example
 * ```ts
 * ctx.converterFactories.unshift(
 *   discriminatedConverterFactory({ circle: Circle$, square: Square$ }, objectConverterFactory()),
 * );
 * ```
 */
export function discriminatedConverterFactory(
  tagMap: Readonly<Record<string, ObjectDescriptor>>,
  inner: ConverterFactory,
  tagKey = "type",
): ConverterFactory {
  const built = new WeakMap<ConversionContext, DiscriminatedConverter>();
  let mapped: Set<string> | undefined;
  const mappedKeys = () =>
    mapped ??= new Set(Object.values(tagMap).map(descriptorKey));

  return {
    name: "discriminated",
    tryCreate(tp, context) {
      const keys = mappedKeys();
      const claims = tp.kind === Kind.UNION
        ? tp.members.length > 0 &&
          tp.members.every((m) => keys.has(descriptorKey(m)))
        : keys.has(descriptorKey(tp));
      if (!claims) return undefined;

      const existing = built.get(context);
      if (existing) return existing;

      const converter = createDiscriminatedConverter(tagKey);
      built.set(context, converter);
      try {
        for (const [tag, objectType] of Object.entries(tagMap)) {
          const member = inner.tryCreate(objectType, context);
          if (!member) {
            throw new ResolutionError(
              "no_converter",
              objectType.name,
              `Factory "${inner.name}" cannot build a converter for ${objectType.name} (${tagKey}=${tag})`,
            );
          }
          converter.register(tag, objectType.target, member);
        }
      } catch (err) {
        built.delete(context);
        throw err;
      }
      return converter;
    },
  };
}
