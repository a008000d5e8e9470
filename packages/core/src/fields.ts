/**
 * Field builder API for declaring reflectable members.
 * Exports a global `f` object for concise shape definitions.
 *
 * Every field carries a descriptor from a closed set of categories; the
 * codec, the string-path parser and schema generators all switch on
 * `descriptor.kind`.
 *
 * @example
 * ```ts
 * import { defineReflectable, f } from "@reflectable/core";
 *
 * const Endpoint = defineReflectable("Endpoint", {
 *   host: f.string().required(),
 *   port: f.uint16().default(8080),
 *   tags: f.set(f.string()),
 *   timeout: f.optional(f.duration("ms")),
 * });
 * ```
 */

import { Ignore, Required } from "./attributes";
import type { Attribute, LoaderScope } from "./attributes";
import { ReflectDefinitionError } from "./errors";
import type { InstanceRecord, ReflectableType } from "./registry";
import { Timestamp } from "./timestamp";

// ============================================================
// Descriptors
// ============================================================

export type IntegerName = "int8" | "int16" | "int32" | "uint8" | "uint16" | "uint32" | "int64" | "uint64";
export type FloatName = "float32" | "float64";
export type DurationUnit = "ns" | "us" | "ms" | "s" | "min" | "h";

export type FieldKind = FieldDescriptor["kind"];

export interface BooleanDescriptor {
  kind: "boolean";
}

export interface IntegerDescriptor {
  kind: "integer";
  name: IntegerName;
  min: bigint;
  max: bigint;
  /** Values are held as `bigint` rather than `number` */
  bigint: boolean;
}

export interface FloatDescriptor {
  kind: "float";
  name: FloatName;
  /** Largest finite magnitude the field holds */
  max: number;
}

export interface EnumDescriptor {
  kind: "enum";
  /** Declared member names and their underlying values, in declaration order */
  members: ReadonlyArray<readonly [string, number | string]>;
}

export interface StringDescriptor {
  kind: "string";
}

/** Converts a value to and from its lossless string form. */
export interface StringConverter<T> {
  /** Name used in error messages */
  label: string;
  format(value: T): string;
  /** Returns `undefined` when the text is not a valid representation */
  parse(text: string): T | undefined;
  create(): T;
}

export interface StringLikeDescriptor {
  kind: "string-like";
  converter: StringConverter<unknown>;
}

export interface NestedDescriptor {
  kind: "nested";
  type: ReflectableType<InstanceRecord>;
}

export interface OptionalDescriptor {
  kind: "optional";
  inner: FieldType<unknown>;
}

export interface VariantDescriptor {
  kind: "variant";
  alternatives: readonly FieldType<unknown>[];
}

export interface SequenceDescriptor {
  kind: "sequence";
  element: FieldType<unknown>;
  /** Fixed element count; variable-size when absent */
  length?: number;
}

export interface SetDescriptor {
  kind: "set";
  element: FieldType<unknown>;
}

export interface MapDescriptor {
  kind: "map";
  key: FieldType<unknown>;
  value: FieldType<unknown>;
  /** Several values per key */
  multi: boolean;
}

export interface TupleDescriptor {
  kind: "tuple";
  elements: readonly FieldType<unknown>[];
}

export interface TimestampDescriptor {
  kind: "timestamp";
}

export interface DurationDescriptor {
  kind: "duration";
  unit: DurationUnit;
}

export type FieldDescriptor =
  | BooleanDescriptor
  | IntegerDescriptor
  | FloatDescriptor
  | EnumDescriptor
  | StringDescriptor
  | StringLikeDescriptor
  | NestedDescriptor
  | OptionalDescriptor
  | VariantDescriptor
  | SequenceDescriptor
  | SetDescriptor
  | MapDescriptor
  | TupleDescriptor
  | TimestampDescriptor
  | DurationDescriptor;

// ============================================================
// Field Types
// ============================================================

/** A field definition with fluent modifiers */
export interface FieldType<T> {
  /** Phantom type for inference */
  readonly _type?: T;
  readonly descriptor: FieldDescriptor;
  /** Attributes the owning member carries */
  readonly attributes: readonly Attribute<unknown>[];
  /** Produces the default value for a fresh instance */
  create(): T;
  /** A copy of `value` that shares no mutable part with it */
  clone(value: T): T;
  /** Set the default value; every instance receives its own copy */
  default(value: T): FieldType<T>;
  /** Set a factory for the default value (use for mutable values) */
  defaultWith(factory: () => T): FieldType<T>;
  /** Mark the member as required for a complete load */
  required(): FieldType<T>;
  /** Leave the member out of loader dispatch (all loaders when no scope is given) */
  ignore(...scopes: LoaderScope[]): FieldType<T>;
  /** Attach custom attributes */
  with(...attributes: Attribute<unknown>[]): FieldType<T>;
}

export type FieldValue<F> = F extends FieldType<infer V> ? V : never;

export interface VariantValue<TIndex extends number, TValue> {
  index: TIndex;
  value: TValue;
}

export type VariantOf<Ts extends readonly FieldType<unknown>[]> = {
  [I in keyof Ts]: I extends `${infer N extends number}` ? VariantValue<N, FieldValue<Ts[I]>> : never;
}[number];

export type TupleOf<Ts extends readonly FieldType<unknown>[]> = {
  -readonly [I in keyof Ts]: FieldValue<Ts[I]>;
};

/** Clone for immutable values */
function same<T>(value: T): T {
  return value;
}

function createField<T>(
  descriptor: FieldDescriptor,
  create: () => T,
  clone: (value: T) => T,
  attributes: readonly Attribute<unknown>[] = [],
): FieldType<T> {
  const withAttributes = (extra: readonly Attribute<unknown>[]) =>
    createField<T>(descriptor, create, clone, [...attributes, ...extra]);

  return {
    descriptor,
    attributes,
    create,
    clone,
    default: (value) => createField<T>(descriptor, () => clone(value), clone, attributes),
    defaultWith: (factory) => createField<T>(descriptor, factory, clone, attributes),
    required: () => withAttributes([Required()]),
    ignore: (...scopes) => withAttributes([scopes.length > 0 ? Ignore(scopes) : Ignore()]),
    with: (...extra) => withAttributes(extra),
  };
}

// ============================================================
// Numeric ranges
// ============================================================

const INTEGER_RANGES: Record<IntegerName, readonly [bigint, bigint]> = {
  int8: [-(2n ** 7n), 2n ** 7n - 1n],
  int16: [-(2n ** 15n), 2n ** 15n - 1n],
  int32: [-(2n ** 31n), 2n ** 31n - 1n],
  uint8: [0n, 2n ** 8n - 1n],
  uint16: [0n, 2n ** 16n - 1n],
  uint32: [0n, 2n ** 32n - 1n],
  int64: [-(2n ** 63n), 2n ** 63n - 1n],
  uint64: [0n, 2n ** 64n - 1n],
};

export const FLOAT32_MAX = 3.4028234663852886e38;

function integer(name: Exclude<IntegerName, "int64" | "uint64">): FieldType<number> {
  const [min, max] = INTEGER_RANGES[name];
  return createField<number>({ kind: "integer", name, min, max, bigint: false }, () => 0, same);
}

function bigInteger(name: "int64" | "uint64"): FieldType<bigint> {
  const [min, max] = INTEGER_RANGES[name];
  return createField<bigint>({ kind: "integer", name, min, max, bigint: true }, () => 0n, same);
}

// ============================================================
// Enumerations
// ============================================================

/** Shape of a TypeScript `enum` object, numeric or string */
export interface EnumLike {
  [key: string]: string | number;
  [index: number]: string;
}

export type EnumValue<E extends EnumLike> = E[Exclude<keyof E, number>];

/** Declared members of an enum object, skipping the reverse mappings of numeric enums. */
export function enumMembers(enumObject: EnumLike): Array<readonly [string, number | string]> {
  return Object.keys(enumObject)
    .filter((key) => typeof enumObject[enumObject[key]] !== "number")
    .map((key) => [key, enumObject[key]] as const);
}

function enumeration<E extends EnumLike>(enumObject: E): FieldType<EnumValue<E>> {
  const members = enumMembers(enumObject);
  const values = members.map(([, value]) => value);
  const isMember = (value: unknown): value is EnumValue<E> =>
    (typeof value === "number" || typeof value === "string") && values.includes(value);

  const first = values[0];
  if (!isMember(first)) {
    throw new ReflectDefinitionError("Enumeration fields need at least one member");
  }
  return createField<EnumValue<E>>({ kind: "enum", members }, () => first, same);
}

// ============================================================
// Composite builders
// ============================================================

function isVariantValue(value: unknown): value is VariantValue<number, unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    "index" in value &&
    "value" in value &&
    typeof value.index === "number"
  );
}

function variant<const Ts extends readonly FieldType<unknown>[]>(...alternatives: Ts): FieldType<VariantOf<Ts>> {
  const first = alternatives[0];
  if (first === undefined) {
    throw new ReflectDefinitionError("Variant fields need at least one alternative");
  }
  const isVariant = (value: unknown): value is VariantOf<Ts> =>
    isVariantValue(value) && Number.isInteger(value.index) && value.index >= 0 && value.index < alternatives.length;

  const clone = (value: VariantOf<Ts>): VariantOf<Ts> => {
    const source: unknown = value;
    if (!isVariantValue(source)) {
      return value;
    }
    const copy = { index: source.index, value: alternatives[source.index]?.clone(source.value) };
    return isVariant(copy) ? copy : value;
  };

  return createField<VariantOf<Ts>>(
    { kind: "variant", alternatives },
    () => {
      const value = { index: 0, value: first.create() };
      if (!isVariant(value)) {
        throw new ReflectDefinitionError("Variant default does not select a declared alternative");
      }
      return value;
    },
    clone,
  );
}

function tuple<const Ts extends readonly FieldType<unknown>[]>(...elements: Ts): FieldType<TupleOf<Ts>> {
  const isTuple = (value: unknown): value is TupleOf<Ts> => Array.isArray(value) && value.length === elements.length;

  const clone = (value: TupleOf<Ts>): TupleOf<Ts> => {
    const source: readonly unknown[] = Array.isArray(value) ? value : [];
    const copy = elements.map((element, index) => element.clone(source[index]));
    return isTuple(copy) ? copy : value;
  };

  return createField<TupleOf<Ts>>(
    { kind: "tuple", elements },
    () => {
      const value = elements.map((element) => element.create());
      if (!isTuple(value)) {
        throw new ReflectDefinitionError("Tuple default does not match the declared element count");
      }
      return value;
    },
    clone,
  );
}

function stringLike<T>(converter: StringConverter<T>): FieldType<T> {
  return createField<T>(
    { kind: "string-like", converter },
    () => converter.create(),
    (value) => converter.parse(converter.format(value)) ?? value,
  );
}

function nested<T extends InstanceRecord>(type: ReflectableType<T>): FieldType<T> {
  const clone = (value: T): T => {
    const copy = type.create();
    type.forEachMember((member) => {
      member.set(copy, member.field.clone(member.get(value)));
    });
    return copy;
  };
  return createField<T>({ kind: "nested", type }, () => type.create(), clone);
}

function optional<T>(inner: FieldType<T>): FieldType<T | undefined> {
  return createField<T | undefined>(
    { kind: "optional", inner },
    () => undefined,
    (value) => (value === undefined ? undefined : inner.clone(value)),
  );
}

function array<T>(element: FieldType<T>): FieldType<T[]> {
  return createField<T[]>(
    { kind: "sequence", element },
    () => [],
    (value) => value.map((item) => element.clone(item)),
  );
}

function set<T>(element: FieldType<T>): FieldType<Set<T>> {
  return createField<Set<T>>(
    { kind: "set", element },
    () => new Set<T>(),
    (value) => new Set(Array.from(value, (item) => element.clone(item))),
  );
}

function map<K, V>(key: FieldType<K>, value: FieldType<V>): FieldType<Map<K, V>> {
  return createField<Map<K, V>>(
    { kind: "map", key, value, multi: false },
    () => new Map<K, V>(),
    (entries) => new Map(Array.from(entries, ([k, v]) => [key.clone(k), value.clone(v)] as const)),
  );
}

function multimap<K, V>(key: FieldType<K>, value: FieldType<V>): FieldType<Map<K, V[]>> {
  return createField<Map<K, V[]>>(
    { kind: "map", key, value, multi: true },
    () => new Map<K, V[]>(),
    (entries) =>
      new Map(Array.from(entries, ([k, values]) => [key.clone(k), values.map((v) => value.clone(v))] as const)),
  );
}

function fixedArray<T>(element: FieldType<T>, length: number): FieldType<T[]> {
  if (!Number.isInteger(length) || length < 0) {
    throw new ReflectDefinitionError(`Fixed array length must be a non-negative integer, got ${length}`);
  }
  return createField<T[]>(
    { kind: "sequence", element, length },
    () => Array.from({ length }, () => element.create()),
    (value) => value.map((item) => element.clone(item)),
  );
}

// ============================================================
// Field Builder Interface
// ============================================================

/**
 * Interface for the field builder.
 * Each method creates a new field definition of the matching category.
 */
export interface FieldBuilder {
  bool(): FieldType<boolean>;
  int8(): FieldType<number>;
  int16(): FieldType<number>;
  int32(): FieldType<number>;
  uint8(): FieldType<number>;
  uint16(): FieldType<number>;
  uint32(): FieldType<number>;
  /** 64-bit signed integer held as `bigint` */
  int64(): FieldType<bigint>;
  /** 64-bit unsigned integer held as `bigint` */
  uint64(): FieldType<bigint>;
  float32(): FieldType<number>;
  float64(): FieldType<number>;
  /** TypeScript `enum` stored as its underlying value */
  enumeration<E extends EnumLike>(enumObject: E): FieldType<EnumValue<E>>;
  string(): FieldType<string>;
  /** Any value with a lossless string round trip */
  stringLike<T>(converter: StringConverter<T>): FieldType<T>;
  /** Another reflectable record */
  nested<T extends InstanceRecord>(type: ReflectableType<T>): FieldType<T>;
  optional<T>(inner: FieldType<T>): FieldType<T | undefined>;
  /** Exactly one of the alternatives, identified by position */
  variant<const Ts extends readonly FieldType<unknown>[]>(...alternatives: Ts): FieldType<VariantOf<Ts>>;
  array<T>(element: FieldType<T>): FieldType<T[]>;
  fixedArray<T>(element: FieldType<T>, length: number): FieldType<T[]>;
  set<T>(element: FieldType<T>): FieldType<Set<T>>;
  map<K, V>(key: FieldType<K>, value: FieldType<V>): FieldType<Map<K, V>>;
  multimap<K, V>(key: FieldType<K>, value: FieldType<V>): FieldType<Map<K, V[]>>;
  tuple<const Ts extends readonly FieldType<unknown>[]>(...elements: Ts): FieldType<TupleOf<Ts>>;
  /** Absolute time point, microseconds since the Unix epoch on the wire */
  timestamp(): FieldType<Timestamp>;
  /** Span held as a number of `unit`, microseconds on the wire */
  duration(unit: DurationUnit): FieldType<number>;
}

// ============================================================
// Global Field Builder
// ============================================================

export const f: FieldBuilder = {
  bool: () => createField<boolean>({ kind: "boolean" }, () => false, same),
  int8: () => integer("int8"),
  int16: () => integer("int16"),
  int32: () => integer("int32"),
  uint8: () => integer("uint8"),
  uint16: () => integer("uint16"),
  uint32: () => integer("uint32"),
  int64: () => bigInteger("int64"),
  uint64: () => bigInteger("uint64"),
  float32: () => createField<number>({ kind: "float", name: "float32", max: FLOAT32_MAX }, () => 0, same),
  float64: () => createField<number>({ kind: "float", name: "float64", max: Number.MAX_VALUE }, () => 0, same),
  enumeration,
  string: () => createField<string>({ kind: "string" }, () => "", same),
  stringLike,
  nested,
  optional,
  variant,
  array,
  fixedArray,
  set,
  map,
  multimap,
  tuple,
  timestamp: () => createField<Timestamp>({ kind: "timestamp" }, () => Timestamp.EPOCH, same),
  duration: (unit) => createField<number>({ kind: "duration", unit }, () => 0, same),
};

/**
 * Short description of a field for error messages, e.g. `array<int32>`.
 */
export function describeField(field: FieldType<unknown>): string {
  const descriptor = field.descriptor;
  switch (descriptor.kind) {
    case "boolean":
      return "bool";
    case "integer":
    case "float":
      return descriptor.name;
    case "enum":
      return "enum";
    case "string":
      return "string";
    case "string-like":
      return descriptor.converter.label;
    case "nested":
      return descriptor.type.name;
    case "optional":
      return `optional<${describeField(descriptor.inner)}>`;
    case "variant":
      return `variant<${descriptor.alternatives.map(describeField).join(", ")}>`;
    case "sequence":
      return descriptor.length === undefined
        ? `array<${describeField(descriptor.element)}>`
        : `array<${describeField(descriptor.element)}, ${descriptor.length}>`;
    case "set":
      return `set<${describeField(descriptor.element)}>`;
    case "map":
      return `${descriptor.multi ? "multimap" : "map"}<${describeField(descriptor.key)}, ${describeField(descriptor.value)}>`;
    case "tuple":
      return `tuple<${descriptor.elements.map(describeField).join(", ")}>`;
    case "timestamp":
      return "timestamp";
    case "duration":
      return `duration<${descriptor.unit}>`;
    default:
      descriptor satisfies never;
      return "unknown";
  }
}
