// packages/treecast-runtime/leaf-converters.ts
// Converters for values that map to a single tree node.

import { Buffer } from "node:buffer";
import { match as patternMatch } from "ts-pattern";
import type { LiteralValue } from "../treecast-type-spec/src/mod.ts";
import type { Converter } from "./contract.ts";
import {
  DumpError,
  errorInfo,
  invalidType,
  LoadError,
  runtimeTypeName,
} from "./errors.ts";

export type ScalarType = "string" | "number" | "integer" | "boolean";

export type AnyLoadPolicy = "load_as_is" | "raise_error";
export type AnyDumpPolicy = "dump_as_is" | "raise_error";

/** Passes values through unchanged in both directions. */
export function exactConverter(kind = "exact"): Converter {
  return {
    kind,
    dump: (value) => value,
    load: (data) => data,
  };
}

function isScalar(type: ScalarType, data: unknown): boolean {
  return patternMatch<ScalarType, boolean>(type)
    .with("string", () => typeof data === "string")
    .with("number", () => typeof data === "number")
    .with(
      "integer",
      () => typeof data === "number" && Number.isInteger(data),
    )
    .with("boolean", () => typeof data === "boolean")
    .exhaustive();
}

function coerceScalar(type: ScalarType, data: unknown): unknown {
  return patternMatch<ScalarType, unknown>(type)
    .with("string", () => String(data))
    .with("number", () => Number(data))
    .with("integer", () => Math.trunc(Number(data)))
    .with("boolean", () => Boolean(data))
    .exhaustive();
}

/**
 * Scalar of one primitive type. Data of a `fallback` type is accepted and
 * coerced, so `scalarConverter("integer", "number")` loads `42.456` as `42`.
 * Dump passes the value through.
 */
export function scalarConverter(
  type: ScalarType,
  ...fallback: ScalarType[]
): Converter {
  return {
    kind: type,
    dump: (value) => value,
    load: (data, key) => {
      if (isScalar(type, data)) return data;
      if (fallback.some((f) => isScalar(f, data))) {
        return coerceScalar(type, data);
      }
      throw new LoadError(invalidType(type, data, key));
    },
  };
}

export function nullConverter(): Converter {
  return {
    kind: "null",
    dump: (value) => value ?? null,
    load: (data, key) => {
      if (data === null) return null;
      throw new LoadError(invalidType("null", data, key));
    },
  };
}

/** `Uint8Array` ↔ text in `encoding`. */
export function bytesConverter(encoding: BufferEncoding = "utf-8"): Converter {
  return {
    kind: "bytes",
    dump: (value) => {
      if (!(value instanceof Uint8Array)) {
        throw new DumpError(invalidType("bytes", value));
      }
      return Buffer.from(value.buffer, value.byteOffset, value.byteLength)
        .toString(encoding);
    },
    load: (data, key) => {
      if (typeof data !== "string") {
        throw new LoadError(invalidType("string", data, key));
      }
      return Uint8Array.from(Buffer.from(data, encoding));
    },
  };
}

/** `Date` ↔ seconds since the epoch, fractional part kept to the millisecond. */
export function timestampConverter(): Converter {
  return {
    kind: "timestamp",
    dump: (value) => {
      if (!(value instanceof Date)) {
        throw new DumpError(invalidType("Date", value));
      }
      const ms = value.getTime();
      if (Number.isNaN(ms)) {
        throw new DumpError(
          errorInfo("invalid_datetime", "Cannot dump an invalid Date"),
        );
      }
      return ms / 1000;
    },
    load: (data, key) => {
      if (typeof data === "number" && Number.isFinite(data)) {
        const date = new Date(Math.round(data * 1000));
        if (!Number.isNaN(date.getTime())) return date;
      }
      throw new LoadError(
        errorInfo("invalid_datetime", "Invalid datetime timestamp", {
          target: key,
          details: [
            errorInfo(
              "TypeError",
              `expected a finite number of seconds, got ${
                typeof data === "number" ? String(data) : runtimeTypeName(data)
              }`,
            ),
          ],
        }),
      );
    },
  };
}

/** Untyped values, passed through or refused depending on the policies. */
export function anyConverter(
  loadPolicy: AnyLoadPolicy = "load_as_is",
  dumpPolicy: AnyDumpPolicy = "dump_as_is",
): Converter {
  return {
    kind: "any",
    dump: (value) => {
      if (dumpPolicy === "dump_as_is") return value;
      throw new DumpError(
        errorInfo(
          "any_dump_forbidden",
          `Cannot dump an untyped value of type ${runtimeTypeName(value)}`,
        ),
      );
    },
    load: (data, key) => {
      if (loadPolicy === "load_as_is") return data;
      throw new LoadError(
        errorInfo("any_load_forbidden", "Loading an untyped value is not allowed", {
          target: key,
        }),
      );
    },
  };
}

export function literalConverter(value: LiteralValue): Converter {
  return {
    kind: "literal",
    dump: (v) => v,
    load: (data, key) => {
      if (data === value) return data;
      throw new LoadError(
        errorInfo(
          "invalid_literal",
          `Invalid literal value, expected ${JSON.stringify(value)}, got ${
            describeData(data)
          }`,
          { target: key },
        ),
      );
    },
  };
}

function describeData(data: unknown): string {
  if (
    typeof data === "string" || typeof data === "number" ||
    typeof data === "boolean"
  ) {
    return JSON.stringify(data);
  }
  return runtimeTypeName(data);
}
