// packages/treecast-runtime/object-converter.ts
// Constructed objects: data fields become constructor arguments, attributes
// are read back through getters on dump.

import {
  describeValue,
  type ExtrasOptions,
  Kind,
  type ObjectDescriptor,
  type ParamSpec,
  readProperty,
  t,
  type TypeDescriptor,
  type ValueGetter,
} from "../treecast-type-spec/src/mod.ts";
import {
  type ConversionContext,
  type Converter,
  type ConverterFactory,
  isRecord,
  type Provider,
} from "./contract.ts";
import {
  DumpError,
  errorInfo,
  fromThrown,
  invalidType,
  LoadError,
  ResolutionError,
  wrapDumpError,
  wrapErrorInfo,
} from "./errors.ts";

export type MissingTypePolicy = "raise" | "use_any" | "from_default";

/** Everything the object converter needs to know about one parameter. */
export type AttributeDefinition = {
  readonly name: string;
  readonly dataKey: string;
  readonly aliases: readonly string[];
  readonly extras?: ExtrasOptions;
  readonly injectKey: boolean;
  readonly provider?: Provider;
  readonly converter?: Converter;
  readonly getter: ValueGetter;
  readonly hasDefault: boolean;
  readonly defaultValue: () => unknown;
};

/**
 * Resolve one parameter. A registered provider takes precedence; only when
 * there is none is a converter requested.
 */
export function buildAttributeDefinition(
  spec: ParamSpec,
  type: TypeDescriptor,
  context: ConversionContext,
): AttributeDefinition {
  const provider = context.getProvider(type);
  return {
    name: spec.name,
    dataKey: spec.name,
    aliases: spec.aliases,
    extras: spec.extras,
    injectKey: spec.injectKey,
    provider,
    converter: provider ? undefined : context.getConverter(type),
    getter: spec.getter ?? ((instance) => readProperty(instance, spec.name)),
    hasDefault: spec.hasDefault,
    defaultValue: spec.defaultValue,
  };
}

export type ObjectConverterOptions = {
  /** Write attributes whose dumped value is `null`. Defaults to `true`. */
  readonly dumpNullValues?: boolean;
};

function lookup(
  data: Record<string, unknown>,
  attr: AttributeDefinition,
): { value: unknown } | undefined {
  for (const k of [attr.dataKey, ...attr.aliases]) {
    if (Object.hasOwn(data, k)) return { value: data[k] };
  }
  return undefined;
}

function selectExtras(
  leftovers: readonly [string, unknown][],
  extras: ExtrasOptions,
): Record<string, unknown> {
  const { include, exclude } = extras;
  return Object.fromEntries(
    leftovers.filter(([k]) =>
      include ? include.includes(k) : !exclude?.includes(k)
    ),
  );
}

function construct(descriptor: ObjectDescriptor, args: unknown[]): unknown {
  return descriptor.isClass
    ? Reflect.construct(descriptor.target, args)
    : Reflect.apply(descriptor.target, undefined, args);
}

export function objectConverter(
  descriptor: ObjectDescriptor,
  attributes: readonly AttributeDefinition[],
  options: ObjectConverterOptions = {},
): Converter {
  const dumpNullValues = options.dumpNullValues ?? true;
  const consumed = new Set(attributes.flatMap((a) => [a.dataKey, ...a.aliases]));

  const objectLoadError = (err: unknown): LoadError =>
    new LoadError(
      errorInfo("object_load_error", "Failed to load object", {
        target: descriptor.name,
        details: [fromThrown(err)],
      }),
      { cause: err },
    );

  return {
    kind: "object",

    load(data, key, context) {
      if (data === null || data === undefined) {
        throw new LoadError(
          errorInfo("none_load", `Cannot load ${descriptor.name} from null`, {
            target: key,
          }),
        );
      }
      if (!isRecord(data)) {
        throw new LoadError(invalidType("mapping", data, key));
      }

      const args: unknown[] = [];
      const supplied: boolean[] = [];
      for (const [i, attr] of attributes.entries()) {
        const found = lookup(data, attr);
        if (found && attr.converter) {
          try {
            args[i] = attr.converter.load(found.value, attr.name, context);
          } catch (err) {
            if (!(err instanceof LoadError)) throw err;
            const node = wrapErrorInfo(
              err.info,
              "attr_load_error",
              `Failed to load object attribute ${attr.name}`,
              attr.name,
            );
            throw new LoadError(
              wrapErrorInfo(
                node,
                "object_load_error",
                "Failed to load object",
                descriptor.name,
              ),
              { cause: err },
            );
          }
        } else if (attr.provider) {
          args[i] = attr.provider.provide(context);
        } else if (attr.injectKey && key !== undefined) {
          args[i] = key;
        } else {
          continue;
        }
        supplied[i] = true;
      }

      if (attributes.some((a) => a.extras)) {
        const leftovers = Object.entries(data).filter(([k]) => !consumed.has(k));
        for (const [i, attr] of attributes.entries()) {
          if (!attr.extras) continue;
          args[i] = selectExtras(leftovers, attr.extras);
          supplied[i] = true;
        }
      }

      try {
        for (const [i, attr] of attributes.entries()) {
          if (supplied[i]) continue;
          if (!attr.hasDefault) {
            throw new TypeError(
              `${descriptor.name}() missing required argument: '${attr.name}'`,
            );
          }
          args[i] = attr.defaultValue();
        }
        return construct(descriptor, args);
      } catch (err) {
        throw objectLoadError(err);
      }
    },

    dump(value, context) {
      if (value === null || value === undefined) {
        throw new DumpError(
          errorInfo("none_dump", `Cannot dump null as ${descriptor.name}`),
        );
      }
      const out: Record<string, unknown> = {};
      const merged: Record<string, unknown>[] = [];
      for (const attr of attributes) {
        if (!attr.converter) continue;
        const v = attr.getter(value);
        if (v === undefined) continue;
        let raw: unknown;
        try {
          raw = attr.converter.dump(v, context);
        } catch (err) {
          if (!(err instanceof DumpError)) throw err;
          throw wrapDumpError(
            err,
            "attribute_dump_error",
            `Failed to dump object attribute ${attr.name}`,
            attr.name,
          );
        }
        if (attr.extras && isRecord(raw)) {
          merged.push(raw);
          continue;
        }
        if (raw === null && !dumpNullValues) continue;
        out[attr.dataKey] = raw;
      }
      for (const extras of merged) {
        for (const [k, v] of Object.entries(extras)) {
          if (!Object.hasOwn(out, k)) out[k] = v;
        }
      }
      return out;
    },
  };
}

export type ObjectConverterFactoryOptions = ObjectConverterOptions & {
  readonly missingTypePolicy?: MissingTypePolicy;
};

function paramType(
  descriptor: ObjectDescriptor,
  spec: ParamSpec,
  policy: MissingTypePolicy,
): TypeDescriptor {
  if (spec.type) return spec.type;
  if (policy === "use_any") return t.any();
  if (policy === "from_default" && spec.hasDefault) {
    const inferred = describeValue(spec.defaultValue());
    if (inferred) return inferred;
  }
  throw new ResolutionError(
    "missing_type",
    descriptor.name,
    `Missing type for parameter '${spec.name}' of ${descriptor.name}`,
  );
}

/** Claims OBJECT descriptors. */
export function objectConverterFactory(
  options: ObjectConverterFactoryOptions = {},
): ConverterFactory {
  const policy = options.missingTypePolicy ?? "raise";
  return {
    name: "object",
    tryCreate(tp, context) {
      if (tp.kind !== Kind.OBJECT) return undefined;
      const attributes = tp.params().map((spec) =>
        buildAttributeDefinition(spec, paramType(tp, spec, policy), context)
      );
      return objectConverter(tp, attributes, options);
    },
  };
}
