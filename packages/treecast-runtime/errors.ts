// packages/treecast-runtime/errors.ts
// Diagnostic tree and the exceptions that carry it.

export type CollectionKey = string | number;

/**
 * One node of a diagnostic tree. Every layer that adds context wraps the
 * failure it caught as a child, so the path from the root object down to the
 * failing leaf can always be read back.
 */
export type ErrorInfo = {
  readonly message: string;
  readonly code: string;
  readonly target?: string;
  readonly details: readonly ErrorInfo[];
};

/** Machine-readable form of an ErrorInfo tree. */
export type PlainErrorInfo = {
  readonly code: string;
  readonly message: string;
  readonly target: string | null;
  readonly details: readonly PlainErrorInfo[];
};

export function errorInfo(
  code: string,
  message: string,
  options: {
    readonly target?: CollectionKey;
    readonly details?: readonly ErrorInfo[];
  } = {},
): ErrorInfo {
  return {
    code,
    message,
    target: options.target === undefined ? undefined : String(options.target),
    details: options.details ?? [],
  };
}

export function invalidType(
  expected: string,
  actual: unknown,
  target?: CollectionKey,
): ErrorInfo {
  return errorInfo(
    "invalid_type",
    `Invalid type, expected ${expected}, got ${runtimeTypeName(actual)}`,
    { target },
  );
}

/** New node with `child` as its only detail. */
export function wrapErrorInfo(
  child: ErrorInfo,
  code: string,
  message: string,
  target?: CollectionKey,
): ErrorInfo {
  return errorInfo(code, message, { target, details: [child] });
}

/** Leaf node for an arbitrary thrown value; the code is the error's name. */
export function fromThrown(err: unknown): ErrorInfo {
  if (err instanceof ConversionError) return err.info;
  if (err instanceof Error) return errorInfo(err.name, err.message);
  return errorInfo("Error", String(err));
}

export function runtimeTypeName(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (typeof value !== "object") return typeof value;
  const proto: unknown = Object.getPrototypeOf(value);
  if (proto === null || proto === Object.prototype) return "object";
  const ctor: unknown = typeof proto === "object"
    ? Reflect.get(proto, "constructor")
    : undefined;
  return typeof ctor === "function" && ctor.name ? ctor.name : "object";
}

/**
 * Indented multi-line trace, one tab per level:
 *
 * ```text
 * (User): Failed to load object
 * 	(age): Failed to load object attribute age
 * 		(age): Invalid type, expected integer, got string
 * ```
 */
export function formatErrorInfo(info: ErrorInfo, indent = 0): string {
  const head = info.target ? `(${info.target}): ${info.message}` : info.message;
  if (info.details.length === 0) return head;
  const detailsIndent = "\t".repeat(indent + 1);
  const details = info.details
    .map((d) => `${detailsIndent}${formatErrorInfo(d, indent + 1)}`)
    .join("\n");
  return `${head}\n${details}`;
}

export function errorInfoToPlain(info: ErrorInfo): PlainErrorInfo {
  return {
    code: info.code,
    message: info.message,
    target: info.target ?? null,
    details: info.details.map(errorInfoToPlain),
  };
}

/** Codes along the first-child chain, root first. */
export function errorCodes(info: ErrorInfo): string[] {
  const codes: string[] = [];
  for (let node: ErrorInfo | undefined = info; node; node = node.details[0]) {
    codes.push(node.code);
  }
  return codes;
}

/** Targets along the first-child chain, root first, skipping untargeted nodes. */
export function errorTargets(info: ErrorInfo): string[] {
  const targets: string[] = [];
  for (let node: ErrorInfo | undefined = info; node; node = node.details[0]) {
    if (node.target !== undefined) targets.push(node.target);
  }
  return targets;
}

// ============================================================================
// Exceptions
// ============================================================================

export class ConversionError extends Error {
  readonly info: ErrorInfo;

  constructor(info: ErrorInfo, options?: { cause?: unknown }) {
    super(info.message, options);
    this.name = "ConversionError";
    this.info = info;
  }

  /** Indented trace of the whole error tree, rendered on each access. */
  get trace(): string {
    return formatErrorInfo(this.info);
  }

  get code(): string {
    return this.info.code;
  }

  get target(): string | undefined {
    return this.info.target;
  }

  toJSON(): PlainErrorInfo {
    return errorInfoToPlain(this.info);
  }
}

/** Raised while turning tree data into objects. */
export class LoadError extends ConversionError {
  constructor(info: ErrorInfo, options?: { cause?: unknown }) {
    super(info, options);
    this.name = "LoadError";
  }
}

/** Raised while turning objects into tree data. */
export class DumpError extends ConversionError {
  constructor(info: ErrorInfo, options?: { cause?: unknown }) {
    super(info, options);
    this.name = "DumpError";
  }
}

/**
 * No converter can be built for a type. Raised when the converter is
 * requested, never deferred to load or dump time.
 */
export class ResolutionError extends Error {
  readonly code: "no_converter" | "missing_type";
  readonly typeName: string;

  constructor(
    code: "no_converter" | "missing_type",
    typeName: string,
    message: string,
  ) {
    super(message);
    this.name = "ResolutionError";
    this.code = code;
    this.typeName = typeName;
  }
}

/** Wrap a caught load failure as the single child of a new node. */
export function wrapLoadError(
  err: LoadError,
  code: string,
  message: string,
  target?: CollectionKey,
): LoadError {
  return new LoadError(wrapErrorInfo(err.info, code, message, target), {
    cause: err,
  });
}

/** Wrap a caught dump failure as the single child of a new node. */
export function wrapDumpError(
  err: DumpError,
  code: string,
  message: string,
  target?: CollectionKey,
): DumpError {
  return new DumpError(wrapErrorInfo(err.info, code, message, target), {
    cause: err,
  });
}
