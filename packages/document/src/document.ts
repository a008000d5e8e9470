/**
 * YAML and JSON documents for reflectable types.
 *
 * Both formats are read with the YAML parser (JSON is a subset). Integers
 * are read as `bigint` and narrowed to `number` when that is exact, so
 * 64-bit members keep their full value.
 *
 * @example
 * ```ts
 * const server = Server.create();
 * const result = loadDocument(Server, "host: localhost\nport: 9000\n", server, { validate: true });
 * stringifyDocument(Server, server, { format: "json" });
 * ```
 */

import YAML from "yaml";
import {
  failed,
  loaded,
  loadTree,
  NOOP_LOGGER,
  ReflectEncodeError,
  saveTree,
  ShapeMismatchError,
} from "@reflectable/core";
import type {
  InstanceRecord,
  LoadOptions,
  LoadOutcome,
  LoadResult,
  ReflectableType,
  TreeValue,
} from "@reflectable/core";
import { DocumentParseError } from "./errors";
import { treeValueSchema } from "./tree-schema";
import { validateTree } from "./wire-schema";

export type DocumentFormat = "yaml" | "json";

/**
 * Options for loading a document into a target.
 */
export interface DocumentLoadOptions<T extends InstanceRecord = InstanceRecord> extends LoadOptions<T> {
  /** Name of the document in error messages (default: the type name) */
  label?: string;

  /**
   * Check the whole document against the type's wire schema before loading,
   * reporting every mismatch instead of the first. With a shared `tracker`
   * the type's required members may come from other sources and are not
   * required here.
   * @default false
   */
  validate?: boolean;
}

/**
 * Options for writing a document.
 */
export interface StringifyOptions {
  /** Output format (default: "yaml") */
  format?: DocumentFormat;

  /** Indentation width (default: 2) */
  indent?: number;
}

/**
 * Parses YAML or JSON text into a tree value.
 */
export function parseDocument(text: string, label = "document"): LoadOutcome<TreeValue> {
  let parsed: unknown;
  try {
    parsed = YAML.parse(text, { intAsBigInt: true });
  } catch (error) {
    return failed(
      new DocumentParseError(`Failed to parse ${label}`, {
        label,
        cause: error instanceof Error ? error.message : String(error),
      }),
    );
  }

  const result = treeValueSchema.safeParse(parsed);
  if (!result.success) {
    return failed(
      new DocumentParseError(`${label} holds values that have no tree form`, {
        label,
        issues: result.error.errors.map((e) => `${e.path.join(".")}: ${e.message}`),
      }),
    );
  }
  return loaded(result.data);
}

/**
 * Parses `text` and loads it into `target` like {@link loadTree}.
 */
export function loadDocument<T extends InstanceRecord>(
  type: ReflectableType<T>,
  text: string,
  target: T,
  options: DocumentLoadOptions<T> = {},
): LoadResult {
  const label = options.label ?? type.name;
  const logger = options.logger ?? NOOP_LOGGER;

  const parsed = parseDocument(text, label);
  if (!parsed.success) {
    logger.debug("Document parse failed", { label, code: parsed.error.code });
    return parsed;
  }

  if (options.validate) {
    const validation = validateTree(type, parsed.value, label, { partial: options.tracker !== undefined });
    if (!validation.success) {
      return failed(new ShapeMismatchError(validation.error, { label }));
    }
  }

  return loadTree(type, parsed.value, target, options);
}

function jsonReplacer(key: string, value: unknown): unknown {
  if (typeof value === "number" && !Number.isFinite(value)) {
    throw new ReflectEncodeError(`${key || "value"}: ${value} cannot be written to JSON`, { key, value: String(value) });
  }
  if (typeof value !== "bigint") {
    return value;
  }
  const asNumber = Number(value);
  if (!Number.isSafeInteger(asNumber)) {
    throw new ReflectEncodeError(`${key || "value"}: ${value} cannot be written to JSON without losing precision`, {
      key,
      value: value.toString(),
    });
  }
  return asNumber;
}

/**
 * Saves `value` with {@link saveTree} and writes it as YAML or JSON.
 * JSON cannot hold integers beyond 2^53 exactly; writing one throws.
 */
export function stringifyDocument<T extends InstanceRecord>(
  type: ReflectableType<T>,
  value: T,
  options: StringifyOptions = {},
): string {
  const tree = saveTree(type, value);
  const indent = options.indent ?? 2;

  switch (options.format ?? "yaml") {
    case "yaml":
      return YAML.stringify(tree, { indent });
    case "json":
      return `${JSON.stringify(tree, jsonReplacer, indent)}\n`;
  }
}
