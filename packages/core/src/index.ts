/**
 * @reflectable/core - Declare a record's fields once, load and save it generically
 *
 * A type declared with `defineReflectable` gains a tree-value codec with
 * partial-update loading, required-member tracking, and loading of single
 * members from dotted path strings.
 *
 * @example
 * ```ts
 * import { defineReflectable, f, loadTree, loadPath, saveTree } from "@reflectable/core";
 *
 * const Server = defineReflectable("Server", {
 *   host: f.string().required(),
 *   port: f.uint16().default(8080),
 * });
 *
 * const server = Server.create();
 * loadTree(Server, { host: "localhost" }, server, { requireAll: true });
 * loadPath(Server, "port.9000", server);
 * saveTree(Server, server); // { host: "localhost", port: 9000 }
 * ```
 */

// ============================================================
// Registry
// ============================================================

export { defineReflectable, isReflectable, ReflectableType } from "./registry";
export type { InstanceOf, InstanceRecord, Member, MemberVisitor, Shape, ShapeInstance } from "./registry";

// ============================================================
// Attributes
// ============================================================

export {
  ALL_LOADER_SCOPES,
  AttributeSet,
  defineAttribute,
  defineMarker,
  Ignore,
  isIgnoredFor,
  Required,
  type Attribute,
  type AttributeKind,
  type LoaderScope,
} from "./attributes";

// ============================================================
// Fields
// ============================================================

export { describeField, enumMembers, f, FLOAT32_MAX } from "./fields";
export type {
  DurationUnit,
  EnumLike,
  EnumValue,
  FieldBuilder,
  FieldDescriptor,
  FieldKind,
  FieldType,
  FieldValue,
  FloatName,
  IntegerName,
  StringConverter,
  TupleOf,
  VariantOf,
  VariantValue,
} from "./fields";

export { Timestamp } from "./timestamp";

// ============================================================
// Tree Values
// ============================================================

export { canonicalTreeText, isTreeArray, isTreeObject, readTreeInteger, treeKind } from "./tree";
export type { TreeKind, TreeObject, TreeScalar, TreeValue } from "./tree";

// ============================================================
// Codec & Loaders
// ============================================================

export { durationFromMicros, durationToMicros, loadTree, loadValue, saveTree, saveValue, valueKey } from "./tree-codec";
export { loadPath, parseFloatText, parseIntegerText, parseValue, supportsStringParse } from "./path-loader";
export { RequiredTracker } from "./tracker";
export {
  buildDispatchTable,
  NameDispatcher,
  NameMatcher,
  type DispatchEntry,
  type DispatchHandler,
  type NamedEntry,
} from "./dispatch";

// ============================================================
// Configuration
// ============================================================

export { DEFAULT_LOAD_OPTIONS, resolveLoadOptions } from "./config";
export type { CodecContext, LoadOptions, ResolvedLoadOptions } from "./config";

// ============================================================
// Logging
// ============================================================

export { createConsoleLogger, NOOP_LOGGER } from "./logger";
export type { LogLevel, ReflectLogger } from "./logger";

// ============================================================
// Errors
// ============================================================

export {
  failed,
  LOADED,
  loaded,
  NameUnresolvedError,
  RangeOverflowError,
  ReflectDefinitionError,
  ReflectEncodeError,
  ReflectError,
  RequiredMissingError,
  ShapeMismatchError,
  VariantTagError,
} from "./errors";
export type { LoadFailure, LoadOutcome, LoadResult, ReflectErrorCode } from "./errors";
