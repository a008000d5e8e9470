/**
 * Dotted string-path loader.
 *
 * `"server.port.8080"` walks `server`, then sets its `port` member from the
 * text after the last member segment. Each segment is resolved through the
 * type's path dispatch table, so `max-retries` matches `max_retries`.
 * The value text itself may contain dots: `"ratio.0.5"` parses `0.5`.
 */

import { childContext, resolveLoadOptions } from "./config";
import type { CodecContext, LoadOptions } from "./config";
import { dispatchTableCache } from "./dispatch";
import { LOADED, NameUnresolvedError, RangeOverflowError, ShapeMismatchError, failed, loaded } from "./errors";
import type { LoadFailure, LoadOutcome, LoadResult } from "./errors";
import { describeField } from "./fields";
import type { FieldType } from "./fields";
import type { InstanceRecord, ReflectableType } from "./registry";
import { RequiredTracker } from "./tracker";
import { reuseOrCreate, trackerFor, valueKey } from "./tree-codec";

const INTEGER_TEXT = /^\s*([+-]?)(\d+)$/;
const FLOAT_PREFIX = /^\s*([+-]?)(inf(?:inity)?|nan|(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?)/i;

// ============================================================
// Capability
// ============================================================

/** Whether values of `field` can be set from a single path string. */
export function supportsStringParse(field: FieldType<unknown>): boolean {
  const descriptor = field.descriptor;
  switch (descriptor.kind) {
    case "boolean":
    case "integer":
    case "float":
    case "enum":
    case "string":
    case "string-like":
    case "nested":
      return true;
    case "optional":
      return supportsStringParse(descriptor.inner);
    case "sequence":
      return descriptor.length === undefined && supportsStringParse(descriptor.element);
    case "set":
      return supportsStringParse(descriptor.element);
    case "variant":
    case "map":
    case "tuple":
    case "timestamp":
    case "duration":
      return false;
    default:
      descriptor satisfies never;
      return false;
  }
}

// ============================================================
// Scalar parsers
// ============================================================

function notParsable(field: FieldType<unknown>, text: string, context: CodecContext): LoadFailure {
  const expected = describeField(field);
  return failed(
    new ShapeMismatchError(`${context.path}: '${text}' is not a valid ${expected}`, {
      path: context.path,
      expected,
      text,
    }),
  );
}

/** Decimal integer, optionally preceded by whitespace and a sign. */
export function parseIntegerText(text: string): bigint | undefined {
  const match = INTEGER_TEXT.exec(text);
  if (!match) {
    return undefined;
  }
  const magnitude = BigInt(match[2]);
  return match[1] === "-" ? -magnitude : magnitude;
}

/**
 * Parses the longest floating-point prefix of `text`, like `%lf`:
 * `"2.5kg"` gives 2.5, `"-inf"` gives -Infinity.
 */
export function parseFloatText(text: string): number | undefined {
  const match = FLOAT_PREFIX.exec(text);
  if (!match) {
    return undefined;
  }
  const body = match[2].toLowerCase();
  const magnitude = body === "nan" ? Number.NaN : body.startsWith("inf") ? Number.POSITIVE_INFINITY : Number(body);
  return match[1] === "-" ? -magnitude : magnitude;
}

function parseBoolean(text: string): boolean | undefined {
  switch (text) {
    case "true":
    case "1":
      return true;
    case "false":
    case "0":
      return false;
    default:
      return undefined;
  }
}

/**
 * Parses `text` as a value of `field`. Collections receive one parsed
 * element on top of `current`; nested records take the text as a path.
 */
export function parseValue(
  field: FieldType<unknown>,
  text: string,
  current: unknown,
  context: CodecContext,
): LoadOutcome<unknown> {
  const descriptor = field.descriptor;

  switch (descriptor.kind) {
    case "boolean": {
      const value = parseBoolean(text);
      return value === undefined ? notParsable(field, text, context) : loaded(value);
    }

    case "integer": {
      const value = parseIntegerText(text);
      if (value === undefined) {
        return notParsable(field, text, context);
      }
      if (value < descriptor.min || value > descriptor.max) {
        return failed(
          new RangeOverflowError(`${context.path}: ${value} does not fit in ${descriptor.name}`, {
            path: context.path,
            value: value.toString(),
          }),
        );
      }
      return loaded(descriptor.bigint ? value : Number(value));
    }

    case "float": {
      const value = parseFloatText(text);
      if (value === undefined) {
        return notParsable(field, text, context);
      }
      if (Number.isFinite(value) && Math.abs(value) > descriptor.max) {
        return failed(
          new RangeOverflowError(`${context.path}: ${value} does not fit in ${descriptor.name}`, {
            path: context.path,
            value,
          }),
        );
      }
      return loaded(value);
    }

    case "enum": {
      const integral = parseIntegerText(text);
      const member = descriptor.members.find(([name, value]) =>
        typeof value === "number"
          ? name === text || (integral !== undefined && Number(integral) === value)
          : name === text || value === text,
      );
      if (!member) {
        return failed(
          new RangeOverflowError(`${context.path}: '${text}' is not a declared enum member or value`, {
            path: context.path,
            text,
          }),
        );
      }
      return loaded(member[1]);
    }

    case "string":
      return loaded(text);

    case "string-like": {
      const value = descriptor.converter.parse(text);
      return value === undefined ? notParsable(field, text, context) : loaded(value);
    }

    case "nested": {
      const record = reuseOrCreate(descriptor.type, current);
      const result = loadPathInto(descriptor.type, text, record, new RequiredTracker(descriptor.type), context);
      return result.success ? loaded(record) : result;
    }

    case "optional":
      return parseValue(descriptor.inner, text, current, context);

    case "sequence": {
      if (descriptor.length !== undefined) {
        return notParsable(field, text, context);
      }
      const existing: readonly unknown[] = Array.isArray(current) ? current : [];
      const element = parseValue(
        descriptor.element,
        text,
        descriptor.element.create(),
        childContext(context, existing.length),
      );
      return element.success ? loaded([...existing, element.value]) : element;
    }

    case "set": {
      const existing: Iterable<unknown> = current instanceof Set ? current : [];
      const elements = new Set<unknown>(existing);
      const element = parseValue(
        descriptor.element,
        text,
        descriptor.element.create(),
        childContext(context, elements.size),
      );
      if (!element.success) {
        return element;
      }
      const key = valueKey(descriptor.element, element.value);
      const present = [...elements].some((item) => valueKey(descriptor.element, item) === key);
      if (!present) {
        elements.add(element.value);
      }
      return loaded(elements);
    }

    case "variant":
    case "map":
    case "tuple":
    case "timestamp":
    case "duration":
      return failed(
        new ShapeMismatchError(`${context.path}: ${describeField(field)} cannot be set from a path string`, {
          path: context.path,
          expected: describeField(field),
          text,
        }),
      );

    default:
      descriptor satisfies never;
      return notParsable(field, text, context);
  }
}

// ============================================================
// Paths
// ============================================================

type PathHandlerArgs = [text: string, context: CodecContext];

const pathDispatchTable = dispatchTableCache<PathHandlerArgs>("path", (member) => (instance, text, context) => {
  const outcome = parseValue(member.field, text, member.get(instance), childContext(context, member.name));
  if (!outcome.success) {
    return outcome;
  }
  member.set(instance, outcome.value);
  return LOADED;
});

function loadPathInto(
  type: ReflectableType<InstanceRecord>,
  text: string,
  record: InstanceRecord,
  tracker: RequiredTracker,
  context: CodecContext,
): LoadResult {
  const dot = text.indexOf(".");
  if (dot < 0) {
    return failed(
      new ShapeMismatchError(`${context.path}: '${text}' does not name a member of ${type.name}`, {
        path: context.path,
        text,
      }),
    );
  }

  const segment = text.slice(0, dot);
  const entry = pathDispatchTable(type).find(segment);
  if (!entry) {
    return failed(
      new NameUnresolvedError(`${context.path}: ${type.name} has no member matching '${segment}'`, {
        path: context.path,
        segment,
      }),
    );
  }

  return tracker.handle(entry, record, text.slice(dot + 1), context);
}

/**
 * Sets one member of `target` from a dotted path string whose last part is
 * the value text. A path that stops at a nested member fails; collections
 * gain one element per call.
 */
export function loadPath<T extends InstanceRecord>(
  type: ReflectableType<T>,
  text: string,
  target: T,
  options: LoadOptions<T> = {},
): LoadResult {
  const context: CodecContext = { path: type.name, options: resolveLoadOptions(options) };
  const tracker = trackerFor(type, options.tracker);

  const result = loadPathInto(type, text, target, tracker, context);
  if (!result.success) {
    context.options.logger.debug("Path load failed", { type: type.name, text, code: result.error.code });
    return result;
  }
  return context.options.requireAll ? tracker.check() : LOADED;
}
