// packages/treecast-runtime/mod.ts
import type { TypeDescriptor } from "../treecast-type-spec/src/mod.ts";
import { describeValue } from "../treecast-type-spec/src/mod.ts";
import type { ConversionContext, Result } from "./contract.ts";
import { createSerializationContext, type SerializationContext } from "./context.ts";
import {
  type CollectionKey,
  DumpError,
  type ErrorInfo,
  LoadError,
  ResolutionError,
  runtimeTypeName,
} from "./errors.ts";

// ============================================================================
// Re-exports
// ============================================================================

export type {
  ConversionContext,
  Converter,
  ConverterFactory,
  Provider,
  ProviderFactory,
  Result,
} from "./contract.ts";
export { factoryProvider, isRecord, valueProvider } from "./contract.ts";

export type { CollectionKey, ErrorInfo, PlainErrorInfo } from "./errors.ts";
export {
  ConversionError,
  DumpError,
  errorCodes,
  errorInfo,
  errorInfoToPlain,
  errorTargets,
  formatErrorInfo,
  fromThrown,
  invalidType,
  LoadError,
  ResolutionError,
  runtimeTypeName,
  wrapDumpError,
  wrapErrorInfo,
  wrapLoadError,
} from "./errors.ts";

export type { AnyDumpPolicy, AnyLoadPolicy, ScalarType } from "./leaf-converters.ts";
export {
  anyConverter,
  bytesConverter,
  exactConverter,
  literalConverter,
  nullConverter,
  scalarConverter,
  timestampConverter,
} from "./leaf-converters.ts";

export type {
  DiscriminatedConverter,
  DiscriminatedEntry,
} from "./composite-converters.ts";
export {
  createDiscriminatedConverter,
  discriminatedConverter,
  enumConverter,
  listConverter,
  mapConverter,
  recordConverter,
  setConverter,
  tupleConverter,
  unionConverter,
} from "./composite-converters.ts";

export type {
  AttributeDefinition,
  MissingTypePolicy,
  ObjectConverterFactoryOptions,
  ObjectConverterOptions,
} from "./object-converter.ts";
export {
  buildAttributeDefinition,
  objectConverter,
  objectConverterFactory,
} from "./object-converter.ts";

export {
  arrayConverterFactory,
  defaultConverterFactories,
  discriminatedConverterFactory,
  enumConverterFactory,
  literalConverterFactory,
  mappingConverterFactory,
  setConverterFactory,
  tupleConverterFactory,
  unionConverterFactory,
} from "./factories.ts";

export type {
  ResolutionEvent,
  ResolutionHooks,
  SerializationContext,
  SerializationContextOptions,
} from "./context.ts";
export { createSerializationContext, proxyConverter } from "./context.ts";
export { createObservableContext } from "./observable-context.ts";

// ============================================================================
// Entry points
// ============================================================================

let sharedContext: SerializationContext | undefined;

/** Context used when an entry point is not given one; created on first use. */
export function defaultContext(): SerializationContext {
  return sharedContext ??= createSerializationContext();
}

export type LoadOptions = {
  /** Collection key handed to the top-level converter. */
  readonly key?: CollectionKey;
  readonly context?: ConversionContext;
};

/**
 * Convert a value to tree data using the converter for its exact runtime
 * type. Objects must be of a class registered through `t.object`.
 */
export function dump(
  value: unknown,
  context: ConversionContext = defaultContext(),
): unknown {
  const tp = describeValue(value);
  if (!tp) {
    const name = runtimeTypeName(value);
    throw new ResolutionError(
      "no_converter",
      name,
      `No converter found for type: ${name}`,
    );
  }
  return context.getConverter(tp).dump(value, context);
}

/** Convert a value to tree data as `tp`, whatever its runtime type. */
export function dumpAs(
  tp: TypeDescriptor,
  value: unknown,
  context: ConversionContext = defaultContext(),
): unknown {
  return context.getConverter(tp).dump(value, context);
}

/**
 * Build a value of type `tp` from tree data.
 *
 * @throws LoadError when the data does not fit `tp`
 * @throws ResolutionError when no converter exists for `tp`
 */
export function load<T = unknown>(
  tp: TypeDescriptor,
  data: unknown,
  options: LoadOptions = {},
): T {
  const context = options.context ?? defaultContext();
  return context.getConverter(tp).load(data, options.key, context) as T;
}

/**
 * Like `load`, but data failures come back as a Result. Resolution failures
 * still throw: they are programming errors, not bad input.
 *
 * @example
 * const result = loadSafe<User>(User$, input);
 * if (!result.ok) console.error(formatErrorInfo(result.error));
 */
export function loadSafe<T = unknown>(
  tp: TypeDescriptor,
  data: unknown,
  options: LoadOptions = {},
): Result<T, ErrorInfo> {
  try {
    return { ok: true, value: load<T>(tp, data, options) };
  } catch (err) {
    if (err instanceof LoadError) return { ok: false, error: err.info };
    throw err;
  }
}

export function dumpSafe(
  value: unknown,
  context?: ConversionContext,
): Result<unknown, ErrorInfo> {
  try {
    return { ok: true, value: dump(value, context) };
  } catch (err) {
    if (err instanceof DumpError) return { ok: false, error: err.info };
    throw err;
  }
}
