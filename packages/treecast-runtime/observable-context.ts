// packages/treecast-runtime/observable-context.ts
// Serialization context that logs every converter resolution to the console.

import {
  createSerializationContext,
  type SerializationContext,
  type SerializationContextOptions,
} from "./context.ts";

/**
 * @example
 * ```ts
 * const ctx = createObservableContext("api");
 * ctx.getConverter(t.array(User$));
 * // ✓ api: resolved Array<User> { factory: "array", converter: "list" }
 * ```
 */
export function createObservableContext(
  name: string,
  options: SerializationContextOptions = {},
): SerializationContext {
  const context = createSerializationContext(options);
  context.inspectResolution((hooks) => {
    hooks.onResolved((event) => {
      console.log(`✓ ${name}: resolved ${event.typeName}`, {
        factory: event.factory,
        converter: event.converter.kind,
      });
    });
    hooks.onFailure((error) => {
      console.error(`✗ ${name}: resolution failed`, {
        type: error.typeName,
        code: error.code,
        error: error.message,
      });
    });
  });
  return context;
}
