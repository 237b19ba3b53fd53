// packages/treecast-runtime/context.ts
// Registry of converters and providers, with cached on-demand resolution.

import {
  descriptorKey,
  Kind,
  t,
  type TypeDescriptor,
  typeName,
} from "../treecast-type-spec/src/mod.ts";
import type {
  ConversionContext,
  Converter,
  ConverterFactory,
  Provider,
  ProviderFactory,
} from "./contract.ts";
import { ResolutionError } from "./errors.ts";
import { defaultConverterFactories } from "./factories.ts";
import {
  anyConverter,
  type AnyDumpPolicy,
  type AnyLoadPolicy,
  bytesConverter,
  nullConverter,
  scalarConverter,
  timestampConverter,
} from "./leaf-converters.ts";
import type { MissingTypePolicy } from "./object-converter.ts";

export type SerializationContextOptions = {
  readonly anyLoadPolicy?: AnyLoadPolicy;
  readonly anyDumpPolicy?: AnyDumpPolicy;
  readonly missingTypePolicy?: MissingTypePolicy;
  /** Write object attributes whose dumped value is `null`. Default `true`. */
  readonly dumpNullValues?: boolean;
  readonly bytesEncoding?: BufferEncoding;
  /** Replaces the default factory chain. */
  readonly factories?: readonly ConverterFactory[];
};

export type ResolutionEvent = {
  readonly descriptor: TypeDescriptor;
  readonly key: string;
  readonly typeName: string;
  readonly factory: string;
  readonly converter: Converter;
};

export type ResolutionHooks = {
  onResolved(callback: (event: ResolutionEvent) => void): void;
  onFailure(
    callback: (error: ResolutionError, descriptor: TypeDescriptor) => void,
  ): void;
};

export type SerializationContext = ConversionContext & {
  /** Consulted in order; the first factory to return a converter wins. */
  readonly converterFactories: ConverterFactory[];
  readonly providerFactories: ProviderFactory[];
  addConverter(tp: TypeDescriptor, converter: Converter): void;
  addProvider(tp: TypeDescriptor, provider: Provider): void;
  /** Whether a converter for `tp` is currently being built. */
  isResolving(tp: TypeDescriptor): boolean;
  /**
   * Attach resolution hooks. Hooks fire for converters built by a factory;
   * an exception thrown by a hook is reported and otherwise ignored.
   */
  inspectResolution(configure: (hooks: ResolutionHooks) => void): void;
};

/**
 * Stand-in handed out while the real converter for `tp` is still being
 * built. On first use it resolves through the context and replaces its own
 * `dump` and `load` with the resolved converter's, so later calls go
 * straight to the target.
 */
export function proxyConverter(tp: TypeDescriptor): Converter {
  const proxy: { kind: string; dump: Converter["dump"]; load: Converter["load"] } = {
    kind: "proxy",
    dump(value, context) {
      return bind(context).dump(value, context);
    },
    load(data, key, context) {
      return bind(context).load(data, key, context);
    },
  };
  const bind = (context: ConversionContext): Converter => {
    const target = context.getConverter(tp);
    proxy.dump = target.dump.bind(target);
    proxy.load = target.load.bind(target);
    return target;
  };
  return proxy;
}

/**
 * Create a context with the scalar converters registered and the default
 * factory chain (or `options.factories`) installed.
 *
 * @example
 * ```ts
 * const ctx = createSerializationContext({ anyLoadPolicy: "raise_error" });
 * const user = ctx.getConverter(User$).load({ name: "Ada" }, undefined, ctx);
 * ```
 */
export function createSerializationContext(
  options: SerializationContextOptions = {},
): SerializationContext {
  const converters = new Map<string, Converter>();
  const providers = new Map<string, Provider>();
  const resolving = new Set<string>();
  // Keys cached by factories during the outermost getConverter call.
  const added: string[] = [];
  const any = anyConverter(options.anyLoadPolicy, options.anyDumpPolicy);

  const resolvedCallbacks: Array<(event: ResolutionEvent) => void> = [];
  const failureCallbacks: Array<
    (error: ResolutionError, descriptor: TypeDescriptor) => void
  > = [];

  const notifyResolved = (event: ResolutionEvent) => {
    for (const callback of resolvedCallbacks) {
      try {
        callback(event);
      } catch (hookError) {
        console.error("Error in onResolved hook:", hookError);
      }
    }
  };

  const notifyFailure = (error: ResolutionError, descriptor: TypeDescriptor) => {
    for (const callback of failureCallbacks) {
      try {
        callback(error, descriptor);
      } catch (hookError) {
        console.error("Error in onFailure hook:", hookError);
      }
    }
  };

  const build = (tp: TypeDescriptor, key: string): Converter => {
    for (const factory of context.converterFactories) {
      const converter = factory.tryCreate(tp, context);
      if (!converter) continue;
      converters.set(key, converter);
      added.push(key);
      notifyResolved({
        descriptor: tp,
        key,
        typeName: typeName(tp),
        factory: factory.name,
        converter,
      });
      return converter;
    }
    const name = typeName(tp);
    throw new ResolutionError(
      "no_converter",
      name,
      `No converter found for type: ${name}`,
    );
  };

  const context: SerializationContext = {
    converterFactories: [
      ...(options.factories ?? defaultConverterFactories(options)),
    ],
    providerFactories: [],

    getConverter(tp) {
      if (tp.kind === Kind.ANY) return any;
      if (tp.kind === Kind.LAZY) return context.getConverter(tp.resolve());

      const key = descriptorKey(tp);
      const cached = converters.get(key);
      if (cached) return cached;
      if (resolving.has(key)) return proxyConverter(tp);

      resolving.add(key);
      const mark = added.length;
      try {
        return build(tp, key);
      } catch (err) {
        // Converters cached during a failed build may hold unfinished parts.
        for (const stale of added.splice(mark)) converters.delete(stale);
        if (err instanceof ResolutionError) notifyFailure(err, tp);
        throw err;
      } finally {
        resolving.delete(key);
        if (resolving.size === 0) added.length = 0;
      }
    },

    getProvider(tp) {
      const key = descriptorKey(tp);
      const registered = providers.get(key);
      if (registered) return registered;
      const factory = context.providerFactories.find((f) => f.canProvide(tp));
      if (!factory) return undefined;
      const provider = factory.createProvider(tp, context);
      providers.set(key, provider);
      return provider;
    },

    addConverter(tp, converter) {
      converters.set(descriptorKey(tp), converter);
    },

    addProvider(tp, provider) {
      providers.set(descriptorKey(tp), provider);
    },

    isResolving: (tp) => resolving.has(descriptorKey(tp)),

    inspectResolution(configure) {
      configure({
        onResolved: (callback) => {
          resolvedCallbacks.push(callback);
        },
        onFailure: (callback) => {
          failureCallbacks.push(callback);
        },
      });
    },
  };

  context.addConverter(t.string(), scalarConverter("string"));
  context.addConverter(t.number(), scalarConverter("number"));
  context.addConverter(t.integer(), scalarConverter("integer", "number"));
  context.addConverter(t.boolean(), scalarConverter("boolean"));
  context.addConverter(t.bytes(), bytesConverter(options.bytesEncoding));
  context.addConverter(t.null(), nullConverter());
  context.addConverter(t.timestamp(), timestampConverter());

  return context;
}
