// packages/treecast-type-spec/src/mod.ts
// Closed descriptor variant: every convertible type is one of these shapes.
export enum Kind {
  // scalars
  STRING,
  NUMBER,
  INTEGER,
  BOOLEAN,
  NULL,
  BYTES,
  TIMESTAMP,
  ANY,
  LITERAL,
  // containers
  ARRAY,
  SET,
  RECORD,
  MAP,
  TUPLE,
  // sums
  UNION,
  ENUM,
  // constructed targets
  OBJECT,
  // indirection
  LAZY,
  TOKEN,
}

export type ScalarKind =
  | Kind.STRING
  | Kind.NUMBER
  | Kind.INTEGER
  | Kind.BOOLEAN
  | Kind.NULL
  | Kind.BYTES
  | Kind.TIMESTAMP
  | Kind.ANY;

export type LiteralValue = string | number | boolean | null;

export type EnumTable = Readonly<Record<string, string | number>>;

export type ClassTarget<T = unknown> = new (...args: never[]) => T;
export type FactoryTarget<T = unknown> = (...args: never[]) => T;

// Bivariant parameter so `(p: Point) => p.x` is accepted as a getter.
export type ValueGetter = {
  bivarianceHack(instance: unknown): unknown;
}["bivarianceHack"];

export type ScalarDescriptor = {
  readonly [K in ScalarKind]: { readonly kind: K };
}[ScalarKind];

export type LiteralDescriptor = {
  readonly kind: Kind.LITERAL;
  readonly value: LiteralValue;
};

export type ArrayDescriptor = {
  readonly kind: Kind.ARRAY;
  readonly element: TypeDescriptor;
};

export type SetDescriptor = {
  readonly kind: Kind.SET;
  readonly element: TypeDescriptor;
};

export type RecordDescriptor = {
  readonly kind: Kind.RECORD;
  readonly value: TypeDescriptor;
};

export type MapDescriptor = {
  readonly kind: Kind.MAP;
  readonly value: TypeDescriptor;
};

export type TupleDescriptor = {
  readonly kind: Kind.TUPLE;
  readonly elements: readonly TypeDescriptor[];
};

export type UnionDescriptor = {
  readonly kind: Kind.UNION;
  readonly members: readonly TypeDescriptor[];
};

export type EnumDescriptor = {
  readonly kind: Kind.ENUM;
  readonly name: string;
  readonly members: EnumTable;
  /** Flag enums accept any bitwise combination of their members. */
  readonly flags: boolean;
};

export type ObjectDescriptor = {
  readonly kind: Kind.OBJECT;
  readonly name: string;
  readonly target: ClassTarget | FactoryTarget;
  /** `true` when the target is invoked with `new`. */
  readonly isClass: boolean;
  /** Ordered constructor parameters; a thunk so a type may refer to itself. */
  readonly params: () => readonly ParamSpec[];
};

export type LazyDescriptor = {
  readonly kind: Kind.LAZY;
  readonly resolve: () => TypeDescriptor;
};

export type TokenDescriptor = {
  readonly kind: Kind.TOKEN;
  readonly name: string;
  readonly id: symbol;
};

export type TypeDescriptor =
  | ScalarDescriptor
  | LiteralDescriptor
  | ArrayDescriptor
  | SetDescriptor
  | RecordDescriptor
  | MapDescriptor
  | TupleDescriptor
  | UnionDescriptor
  | EnumDescriptor
  | ObjectDescriptor
  | LazyDescriptor
  | TokenDescriptor;

// ============================================================================
// Parameters
// ============================================================================

export type ExtrasOptions = {
  readonly include?: readonly string[];
  readonly exclude?: readonly string[];
};

export type ParamOptions = {
  readonly default?: unknown;
  readonly defaultFactory?: () => unknown;
  /** Additional data keys tried, in order, when the primary key is absent. */
  readonly aliases?: readonly string[];
  /** Receive the collection key (list index or mapping key) of the object. */
  readonly injectKey?: boolean;
  /** Receive the input fields no other parameter consumed. */
  readonly extras?: boolean | ExtrasOptions;
  /** Attribute name or function used to read the value back when dumping. */
  readonly getter?: string | ValueGetter;
};

export type ParamSpec = {
  readonly name: string;
  /** Absent when the parameter carries no type information. */
  readonly type?: TypeDescriptor;
  readonly hasDefault: boolean;
  readonly defaultValue: () => unknown;
  readonly aliases: readonly string[];
  readonly injectKey: boolean;
  readonly extras?: ExtrasOptions;
  readonly getter?: ValueGetter;
};

/**
 * Declare one constructor parameter.
 *
 * @example
 * ```ts
 * const User$ = t.object(User, [
 *   param("name", t.string(), { aliases: ["legacy_name"] }),
 *   param("age", t.integer(), { default: 0 }),
 * ]);
 * ```
 */
export function param(
  name: string,
  type?: TypeDescriptor,
  options: ParamOptions = {},
): ParamSpec {
  const { defaultFactory } = options;
  const hasDefault = Object.prototype.hasOwnProperty.call(options, "default") ||
    defaultFactory !== undefined;

  let extras: ExtrasOptions | undefined;
  if (options.extras === true) {
    extras = {};
  } else if (options.extras) {
    if (options.extras.include && options.extras.exclude) {
      throw new Error(
        `param "${name}": specify extras "include" or "exclude", but not both`,
      );
    }
    extras = options.extras;
  }

  const getterOption = options.getter;
  let getter: ValueGetter | undefined;
  if (typeof getterOption === "string") {
    getter = (instance) => readProperty(instance, getterOption);
  } else {
    getter = getterOption;
  }

  return {
    name,
    type,
    hasDefault,
    defaultValue: defaultFactory ?? (() => options.default),
    aliases: [...new Set(options.aliases ?? [])],
    injectKey: options.injectKey === true,
    extras,
    getter,
  };
}

/** Read `name` off an object; `undefined` when it is not there. */
export function readProperty(instance: unknown, name: string): unknown {
  if (
    (typeof instance !== "object" && typeof instance !== "function") ||
    instance === null
  ) {
    return undefined;
  }
  return Reflect.get(instance, name);
}

// ============================================================================
// Builders
// ============================================================================

const STRING = { kind: Kind.STRING } as const;
const NUMBER = { kind: Kind.NUMBER } as const;
const INTEGER = { kind: Kind.INTEGER } as const;
const BOOLEAN = { kind: Kind.BOOLEAN } as const;
const NULL = { kind: Kind.NULL } as const;
const BYTES = { kind: Kind.BYTES } as const;
const TIMESTAMP = { kind: Kind.TIMESTAMP } as const;
const ANY = { kind: Kind.ANY } as const;

// Class → descriptor, so a value's runtime type can be looked up on dump.
const classDescriptors = new WeakMap<object, ObjectDescriptor>();

type TargetOptions = { readonly name?: string };

function normalizeParams(
  params: readonly ParamSpec[] | (() => readonly ParamSpec[]),
): () => readonly ParamSpec[] {
  if (typeof params === "function") {
    let cached: readonly ParamSpec[] | undefined;
    return () => (cached ??= params());
  }
  return () => params;
}

/**
 * Descriptor builders.
 *
 * @example
 * ```ts
 * class Point {
 *   constructor(readonly x: number, readonly y: number) {}
 * }
 * const Point$ = t.object(Point, [param("x", t.number()), param("y", t.number())]);
 * const Path$ = t.array(Point$);
 * ```
 */
export const t = {
  string: (): ScalarDescriptor => STRING,
  number: (): ScalarDescriptor => NUMBER,
  integer: (): ScalarDescriptor => INTEGER,
  boolean: (): ScalarDescriptor => BOOLEAN,
  null: (): ScalarDescriptor => NULL,
  bytes: (): ScalarDescriptor => BYTES,
  timestamp: (): ScalarDescriptor => TIMESTAMP,
  any: (): ScalarDescriptor => ANY,
  literal: (value: LiteralValue): LiteralDescriptor => ({
    kind: Kind.LITERAL,
    value,
  }),

  array: (element: TypeDescriptor): ArrayDescriptor => ({
    kind: Kind.ARRAY,
    element,
  }),
  set: (element: TypeDescriptor): SetDescriptor => ({
    kind: Kind.SET,
    element,
  }),
  record: (value: TypeDescriptor): RecordDescriptor => ({
    kind: Kind.RECORD,
    value,
  }),
  map: (value: TypeDescriptor): MapDescriptor => ({ kind: Kind.MAP, value }),
  tuple: (...elements: TypeDescriptor[]): TupleDescriptor => ({
    kind: Kind.TUPLE,
    elements,
  }),

  union: (...members: TypeDescriptor[]): UnionDescriptor => ({
    kind: Kind.UNION,
    members,
  }),
  optional: (inner: TypeDescriptor): UnionDescriptor => ({
    kind: Kind.UNION,
    members: [inner, NULL],
  }),
  enum: (members: EnumTable, name = "enum"): EnumDescriptor => ({
    kind: Kind.ENUM,
    name,
    members,
    flags: false,
  }),
  flags: (members: EnumTable, name = "flags"): EnumDescriptor => ({
    kind: Kind.ENUM,
    name,
    members,
    flags: true,
  }),

  /**
   * Class target, constructed with `new` and its parameters in order.
   * Registers the class so `dump()` can find the descriptor from an instance.
   */
  object: (
    target: ClassTarget,
    params: readonly ParamSpec[] | (() => readonly ParamSpec[]),
    options: TargetOptions = {},
  ): ObjectDescriptor => {
    const descriptor: ObjectDescriptor = {
      kind: Kind.OBJECT,
      name: options.name ?? target.name,
      target,
      isClass: true,
      params: normalizeParams(params),
    };
    classDescriptors.set(target, descriptor);
    return descriptor;
  },

  /** Callable target, invoked with its parameters in order. */
  factory: (
    target: FactoryTarget,
    params: readonly ParamSpec[] | (() => readonly ParamSpec[]),
    options: TargetOptions = {},
  ): ObjectDescriptor => ({
    kind: Kind.OBJECT,
    name: options.name ?? (target.name || "factory"),
    target,
    isClass: false,
    params: normalizeParams(params),
  }),

  /** Forward reference, resolved when a converter is first requested. */
  lazy: (resolve: () => TypeDescriptor): LazyDescriptor => ({
    kind: Kind.LAZY,
    resolve,
  }),

  /** Injection point satisfied by a provider instead of input data. */
  token: (name: string): TokenDescriptor => ({
    kind: Kind.TOKEN,
    name,
    id: Symbol(name),
  }),
};

/** Descriptor registered for a class through `t.object`. */
export function describeClass(target: object): ObjectDescriptor | undefined {
  return classDescriptors.get(target);
}

export {
  describeValue,
  descriptorKey,
  enumValues,
  identityOf,
  typeName,
} from "./keys.ts";
