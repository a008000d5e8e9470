/**
 * Tree-value codec.
 *
 * Every field category has one wire form (see `f` in ./fields). Saving a
 * value that does not belong to its field's category is a programmer error
 * and throws {@link ReflectEncodeError}. Loading never throws: failures are
 * returned, propagation stops at the first failing element, and members
 * written before the failure stay written.
 *
 * @example
 * ```ts
 * const config = Endpoint.create();
 * const result = loadTree(Endpoint, { host: "localhost", tags: ["a"] }, config);
 * if (!result.success) {
 *   console.error(result.error.code, result.error.message);
 * }
 * saveTree(Endpoint, config); // { host: "localhost", port: 8080, tags: ["a"], timeout: null }
 * ```
 */

import { childContext, resolveLoadOptions } from "./config";
import type { CodecContext, LoadOptions } from "./config";
import { dispatchTableCache } from "./dispatch";
import {
  LOADED,
  ReflectDefinitionError,
  ReflectEncodeError,
  RangeOverflowError,
  ShapeMismatchError,
  VariantTagError,
  failed,
  loaded,
} from "./errors";
import type { LoadFailure, LoadOutcome, LoadResult } from "./errors";
import { describeField } from "./fields";
import type { DurationUnit, FieldType } from "./fields";
import type { InstanceRecord, ReflectableType } from "./registry";
import { RequiredTracker } from "./tracker";
import { Timestamp } from "./timestamp";
import { canonicalTreeText, isTreeArray, isTreeObject, readTreeInteger, treeKind } from "./tree";
import type { TreeObject, TreeValue } from "./tree";

// ============================================================
// Helpers
// ============================================================

export function isRecord(value: unknown): value is InstanceRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** The record to load into: `current` when it is already an instance of `type`, a fresh one otherwise. */
export function reuseOrCreate(type: ReflectableType<InstanceRecord>, current: unknown): InstanceRecord {
  return isRecord(current) && type.hasMembers(current) ? current : type.create();
}

const MICROS_PER_UNIT: Record<DurationUnit, number> = {
  ns: 0.001,
  us: 1,
  ms: 1_000,
  s: 1_000_000,
  min: 60_000_000,
  h: 3_600_000_000,
};

/** Whole microseconds in `value` units, truncated toward zero. */
export function durationToMicros(value: number, unit: DurationUnit): number {
  return unit === "ns" ? Math.trunc(value / 1_000) : Math.trunc(value * MICROS_PER_UNIT[unit]);
}

export function durationFromMicros(micros: number, unit: DurationUnit): number {
  return unit === "ns" ? micros * 1_000 : micros / MICROS_PER_UNIT[unit];
}

/**
 * Identity of a set element or map key. Scalars compare as themselves;
 * composite values compare by their saved tree, so equal tuples or records
 * are one element.
 */
export function valueKey(field: FieldType<unknown>, value: unknown): unknown {
  switch (field.descriptor.kind) {
    case "boolean":
    case "integer":
    case "float":
    case "enum":
    case "string":
    case "duration":
      return value;
    default:
      return canonicalTreeText(saveValue(field, value));
  }
}

function shapeMismatch(field: FieldType<unknown>, tree: TreeValue, context: CodecContext): LoadFailure {
  const expected = describeField(field);
  const actual = treeKind(tree);
  return failed(
    new ShapeMismatchError(`${context.path}: expected ${expected}, got ${actual}`, {
      path: context.path,
      expected,
      actual,
    }),
  );
}

function encodeError(field: FieldType<unknown>, value: unknown, path: string): ReflectEncodeError {
  const expected = describeField(field);
  return new ReflectEncodeError(`${path}: value is not a valid ${expected}`, {
    path,
    expected,
    actual: value === null ? "null" : typeof value,
  });
}

// ============================================================
// Save
// ============================================================

/**
 * Encodes one value of `field` to its tree form.
 * @param path - location used in error messages
 */
export function saveValue(field: FieldType<unknown>, value: unknown, path = "value"): TreeValue {
  const descriptor = field.descriptor;

  switch (descriptor.kind) {
    case "boolean":
      if (typeof value !== "boolean") throw encodeError(field, value, path);
      return value;

    case "integer": {
      const integral = descriptor.bigint
        ? typeof value === "bigint"
          ? value
          : undefined
        : typeof value === "number" && Number.isInteger(value)
          ? BigInt(value)
          : undefined;
      if (integral === undefined) throw encodeError(field, value, path);
      if (integral < descriptor.min || integral > descriptor.max) {
        throw new ReflectEncodeError(`${path}: ${integral} is outside the ${descriptor.name} range`, {
          path,
          value: integral.toString(),
        });
      }
      return descriptor.bigint ? integral : Number(integral);
    }

    case "float":
      if (typeof value !== "number") throw encodeError(field, value, path);
      return value;

    case "enum": {
      const member = descriptor.members.find(([, memberValue]) => memberValue === value);
      if (!member) throw encodeError(field, value, path);
      return member[1];
    }

    case "string":
      if (typeof value !== "string") throw encodeError(field, value, path);
      return value;

    case "string-like":
      return descriptor.converter.format(value);

    case "nested":
      if (!isRecord(value) || !descriptor.type.hasMembers(value)) throw encodeError(field, value, path);
      return saveRecord(descriptor.type, value, path);

    case "optional":
      return value === undefined ? null : saveValue(descriptor.inner, value, path);

    case "variant": {
      const index = isRecord(value) ? value.index : undefined;
      if (!isRecord(value) || typeof index !== "number") throw encodeError(field, value, path);
      const alternative = Number.isInteger(index) ? descriptor.alternatives[index] : undefined;
      if (alternative === undefined) {
        throw new ReflectEncodeError(`${path}: variant index ${index} selects no alternative`, { path, index });
      }
      return [index, saveValue(alternative, value.value, `${path}[1]`)];
    }

    case "sequence": {
      if (!Array.isArray(value)) throw encodeError(field, value, path);
      if (descriptor.length !== undefined && value.length !== descriptor.length) {
        throw new ReflectEncodeError(`${path}: expected ${descriptor.length} elements, got ${value.length}`, {
          path,
          expected: descriptor.length,
          actual: value.length,
        });
      }
      const elements: readonly unknown[] = value;
      return elements.map((element, index) => saveValue(descriptor.element, element, `${path}[${index}]`));
    }

    case "set": {
      if (!(value instanceof Set)) throw encodeError(field, value, path);
      const elements: unknown[] = [...value];
      return elements.map((element, index) => saveValue(descriptor.element, element, `${path}[${index}]`));
    }

    case "map": {
      if (!(value instanceof Map)) throw encodeError(field, value, path);
      const pairs: TreeValue[] = [];
      for (const [key, mapped] of value) {
        if (descriptor.multi && !Array.isArray(mapped)) throw encodeError(field, value, path);
        const values: readonly unknown[] = descriptor.multi && Array.isArray(mapped) ? mapped : [mapped];
        for (const entry of values) {
          const entryPath = `${path}[${pairs.length}]`;
          pairs.push([
            saveValue(descriptor.key, key, `${entryPath}[0]`),
            saveValue(descriptor.value, entry, `${entryPath}[1]`),
          ]);
        }
      }
      return pairs;
    }

    case "tuple": {
      if (!Array.isArray(value) || value.length !== descriptor.elements.length) throw encodeError(field, value, path);
      const elements: readonly unknown[] = value;
      return descriptor.elements.map((element, index) => saveValue(element, elements[index], `${path}[${index}]`));
    }

    case "timestamp": {
      if (!(value instanceof Timestamp)) throw encodeError(field, value, path);
      const micros = value.epochMicros;
      return Number.isSafeInteger(Number(micros)) ? Number(micros) : micros;
    }

    case "duration":
      if (typeof value !== "number" || !Number.isFinite(value)) throw encodeError(field, value, path);
      return durationToMicros(value, descriptor.unit);

    default:
      descriptor satisfies never;
      throw encodeError(field, value, path);
  }
}

function saveRecord(type: ReflectableType<InstanceRecord>, record: InstanceRecord, path: string): TreeObject {
  const tree: TreeObject = {};
  type.forEachMember((member) => {
    tree[member.name] = saveValue(member.field, member.get(record), `${path}.${member.name}`);
  });
  return tree;
}

/**
 * Encodes every member of `value`, ignored members included, into an
 * object keyed by member name.
 */
export function saveTree<T extends InstanceRecord>(type: ReflectableType<T>, value: T): TreeObject {
  return saveRecord(type, value, type.name);
}

// ============================================================
// Load
// ============================================================

/**
 * Decodes `tree` as a value of `field`.
 *
 * `current` is the value the target holds now. Records inside it (a nested
 * member, the elements of a sequence or tuple) are loaded in place; every
 * other container is built fresh and only handed back on success.
 */
export function loadValue(
  field: FieldType<unknown>,
  tree: TreeValue,
  current: unknown,
  context: CodecContext,
): LoadOutcome<unknown> {
  const descriptor = field.descriptor;

  switch (descriptor.kind) {
    case "boolean":
      return typeof tree === "boolean" ? loaded(tree) : shapeMismatch(field, tree, context);

    case "integer": {
      const integral = readTreeInteger(tree);
      if (integral === undefined) {
        return shapeMismatch(field, tree, context);
      }
      if (integral < descriptor.min || integral > descriptor.max) {
        return failed(
          new RangeOverflowError(`${context.path}: ${integral} does not fit in ${descriptor.name}`, {
            path: context.path,
            value: integral.toString(),
          }),
        );
      }
      return loaded(descriptor.bigint ? integral : Number(integral));
    }

    case "float":
      if (typeof tree !== "number") {
        return shapeMismatch(field, tree, context);
      }
      if (Number.isFinite(tree) && Math.abs(tree) > descriptor.max) {
        return failed(
          new RangeOverflowError(`${context.path}: ${tree} does not fit in ${descriptor.name}`, {
            path: context.path,
            value: tree,
          }),
        );
      }
      return loaded(tree);

    case "enum": {
      if (typeof tree !== "number" && typeof tree !== "string") {
        return shapeMismatch(field, tree, context);
      }
      const member = descriptor.members.find(([, value]) => value === tree);
      if (!member) {
        return failed(
          new RangeOverflowError(`${context.path}: ${JSON.stringify(tree)} is not a declared enum value`, {
            path: context.path,
            value: tree,
          }),
        );
      }
      return loaded(member[1]);
    }

    case "string":
      return typeof tree === "string" ? loaded(tree) : shapeMismatch(field, tree, context);

    case "string-like": {
      if (typeof tree !== "string") {
        return shapeMismatch(field, tree, context);
      }
      const value = descriptor.converter.parse(tree);
      if (value === undefined) {
        return failed(
          new ShapeMismatchError(`${context.path}: '${tree}' is not a valid ${descriptor.converter.label}`, {
            path: context.path,
            value: tree,
          }),
        );
      }
      return loaded(value);
    }

    case "nested": {
      if (!isTreeObject(tree)) {
        return shapeMismatch(field, tree, context);
      }
      const record = reuseOrCreate(descriptor.type, current);
      const result = loadRecord(descriptor.type, tree, record, new RequiredTracker(descriptor.type), context);
      return result.success ? loaded(record) : result;
    }

    case "optional":
      return tree === null ? loaded(undefined) : loadValue(descriptor.inner, tree, current, context);

    case "variant": {
      if (!isTreeArray(tree) || tree.length !== 2) {
        return shapeMismatch(field, tree, context);
      }
      const tag = readTreeInteger(tree[0]);
      const alternative =
        tag !== undefined && tag >= 0n && tag < BigInt(descriptor.alternatives.length)
          ? descriptor.alternatives[Number(tag)]
          : undefined;
      if (tag === undefined || alternative === undefined) {
        return failed(
          new VariantTagError(
            `${context.path}: variant tag must be an alternative index below ${descriptor.alternatives.length}`,
            { path: context.path, tag: tag === undefined ? treeKind(tree[0]) : tag.toString() },
          ),
        );
      }
      const index = Number(tag);
      const outcome = loadValue(alternative, tree[1], alternative.create(), childContext(context, 1));
      return outcome.success ? loaded({ index, value: outcome.value }) : outcome;
    }

    case "sequence": {
      if (!isTreeArray(tree)) {
        return shapeMismatch(field, tree, context);
      }
      if (descriptor.length !== undefined && tree.length !== descriptor.length) {
        return failed(
          new ShapeMismatchError(`${context.path}: expected ${descriptor.length} elements, got ${tree.length}`, {
            path: context.path,
            expected: descriptor.length,
            actual: tree.length,
          }),
        );
      }
      const existing: readonly unknown[] = Array.isArray(current) ? current : [];
      const elements: unknown[] = [];
      for (let index = 0; index < tree.length; index++) {
        const previous = index < existing.length ? existing[index] : descriptor.element.create();
        const outcome = loadValue(descriptor.element, tree[index], previous, childContext(context, index));
        if (!outcome.success) {
          return outcome;
        }
        elements.push(outcome.value);
      }
      return loaded(elements);
    }

    case "set": {
      if (!isTreeArray(tree)) {
        return shapeMismatch(field, tree, context);
      }
      const elements = new Set<unknown>();
      const keys = new Set<unknown>();
      for (let index = 0; index < tree.length; index++) {
        const outcome = loadValue(
          descriptor.element,
          tree[index],
          descriptor.element.create(),
          childContext(context, index),
        );
        if (!outcome.success) {
          return outcome;
        }
        const key = valueKey(descriptor.element, outcome.value);
        if (!keys.has(key)) {
          keys.add(key);
          elements.add(outcome.value);
        }
      }
      return loaded(elements);
    }

    case "map":
      if (!isTreeArray(tree)) {
        return shapeMismatch(field, tree, context);
      }
      return loadMap(field, descriptor.key, descriptor.value, descriptor.multi, tree, context);

    case "tuple": {
      if (!isTreeArray(tree) || tree.length !== descriptor.elements.length) {
        return shapeMismatch(field, tree, context);
      }
      const existing: readonly unknown[] = Array.isArray(current) ? current : [];
      const elements: unknown[] = [];
      for (const [index, element] of descriptor.elements.entries()) {
        const previous = index < existing.length ? existing[index] : element.create();
        const outcome = loadValue(element, tree[index], previous, childContext(context, index));
        if (!outcome.success) {
          return outcome;
        }
        elements.push(outcome.value);
      }
      return loaded(elements);
    }

    case "timestamp": {
      const micros = readTreeInteger(tree);
      if (micros === undefined) {
        return shapeMismatch(field, tree, context);
      }
      if (!Timestamp.isValidMicros(micros)) {
        return failed(
          new RangeOverflowError(`${context.path}: ${micros}us is outside the representable time range`, {
            path: context.path,
            value: micros.toString(),
          }),
        );
      }
      return loaded(Timestamp.fromEpochMicros(micros));
    }

    case "duration": {
      const micros = readTreeInteger(tree);
      if (micros === undefined) {
        return shapeMismatch(field, tree, context);
      }
      return loaded(durationFromMicros(Number(micros), descriptor.unit));
    }

    default:
      descriptor satisfies never;
      return shapeMismatch(field, tree, context);
  }
}

function loadMap(
  field: FieldType<unknown>,
  keyField: FieldType<unknown>,
  valueField: FieldType<unknown>,
  multi: boolean,
  tree: TreeValue[],
  context: CodecContext,
): LoadOutcome<unknown> {
  const single = new Map<unknown, unknown>();
  const grouped = new Map<unknown, unknown[]>();
  // by valueKey
  const groups = new Map<unknown, unknown[]>();

  for (let index = 0; index < tree.length; index++) {
    const pair = tree[index];
    const pairContext = childContext(context, index);
    if (!isTreeArray(pair) || pair.length !== 2) {
      return failed(
        new ShapeMismatchError(`${pairContext.path}: expected a [key, value] pair in ${describeField(field)}`, {
          path: pairContext.path,
          actual: treeKind(pair),
        }),
      );
    }
    const key = loadValue(keyField, pair[0], keyField.create(), childContext(pairContext, 0));
    if (!key.success) {
      return key;
    }
    const value = loadValue(valueField, pair[1], valueField.create(), childContext(pairContext, 1));
    if (!value.success) {
      return value;
    }

    const identity = valueKey(keyField, key.value);
    const values = groups.get(identity);
    if (values) {
      if (multi) {
        values.push(value.value);
      }
      continue;
    }
    const created = [value.value];
    groups.set(identity, created);
    if (multi) {
      grouped.set(key.value, created);
    } else {
      single.set(key.value, value.value);
    }
  }

  return loaded(multi ? grouped : single);
}

// ============================================================
// Records
// ============================================================

type TreeHandlerArgs = [tree: TreeValue, context: CodecContext];

const treeDispatchTable = dispatchTableCache<TreeHandlerArgs>("tree", (member) => (instance, tree, context) => {
  const outcome = loadValue(member.field, tree, member.get(instance), childContext(context, member.name));
  if (!outcome.success) {
    return outcome;
  }
  member.set(instance, outcome.value);
  return LOADED;
});

function loadRecord(
  type: ReflectableType<InstanceRecord>,
  tree: TreeObject,
  record: InstanceRecord,
  tracker: RequiredTracker,
  context: CodecContext,
): LoadResult {
  const table = treeDispatchTable(type);

  for (const key of Object.keys(tree)) {
    const entry = table.find(key);
    if (!entry) {
      context.options.logger.debug("Skipping unknown key", { path: context.path, key });
      continue;
    }
    const result = tracker.handle(entry, record, tree[key], context);
    if (!result.success) {
      return result;
    }
  }

  return context.options.requireAll ? tracker.check() : LOADED;
}

/**
 * Loads the members present in `tree` into `target`; absent members keep
 * their current values and unknown keys are skipped.
 */
export function loadTree<T extends InstanceRecord>(
  type: ReflectableType<T>,
  tree: TreeValue,
  target: T,
  options: LoadOptions<T> = {},
): LoadResult {
  const context: CodecContext = { path: type.name, options: resolveLoadOptions(options) };

  if (!isTreeObject(tree)) {
    return failed(
      new ShapeMismatchError(`${type.name} loads from an object, got ${treeKind(tree)}`, {
        path: context.path,
        expected: "object",
        actual: treeKind(tree),
      }),
    );
  }

  const result = loadRecord(type, tree, target, trackerFor(type, options.tracker), context);
  if (!result.success) {
    context.options.logger.debug("Tree load failed", { type: type.name, code: result.error.code });
  }
  return result;
}

/** Returns `tracker` after checking it accounts for `type`, or a fresh tracker. */
export function trackerFor<T extends InstanceRecord>(
  type: ReflectableType<T>,
  tracker: RequiredTracker<T> | undefined,
): RequiredTracker<T> {
  if (!tracker) {
    return new RequiredTracker(type);
  }
  if (tracker.type !== type) {
    throw new ReflectDefinitionError(`Tracker for ${tracker.type.name} cannot account a load of ${type.name}`, {
      typeName: type.name,
      trackerType: tracker.type.name,
    });
  }
  return tracker;
}
