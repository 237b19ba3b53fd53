// packages/treecast-runtime/contract.ts
// Shapes shared by every converter, factory and provider.

import type { TypeDescriptor } from "../treecast-type-spec/src/mod.ts";
import type { CollectionKey } from "./errors.ts";

// Result type for functional error handling
export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

/** What converters and factories may ask of the context they run in. */
export type ConversionContext = {
  getConverter(tp: TypeDescriptor): Converter;
  getProvider(tp: TypeDescriptor): Provider | undefined;
};

/**
 * Bidirectional conversion for one type. `key` is the collection key (list
 * index or mapping key) the data was found under, when there is one.
 */
export type Converter = {
  readonly kind: string;
  dump(value: unknown, context: ConversionContext): unknown;
  load(
    data: unknown,
    key: CollectionKey | undefined,
    context: ConversionContext,
  ): unknown;
};

/**
 * Builds converters on demand. Returns `undefined` to decline a descriptor
 * whose shape it does not handle, letting the chain fall through.
 */
export type ConverterFactory = {
  readonly name: string;
  tryCreate(tp: TypeDescriptor, context: ConversionContext): Converter | undefined;
};

/** Supplies a value from the context rather than from input data. */
export type Provider = {
  provide(context: ConversionContext): unknown;
};

export type ProviderFactory = {
  canProvide(tp: TypeDescriptor): boolean;
  createProvider(tp: TypeDescriptor, context: ConversionContext): Provider;
};

export function valueProvider(value: unknown): Provider {
  return { provide: () => value };
}

export function factoryProvider(
  create: (context: ConversionContext) => unknown,
): Provider {
  return { provide: create };
}

/** Plain mapping node of a data tree (not `null`, not an array). */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
