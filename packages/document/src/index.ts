/**
 * @reflectable/document - YAML/JSON documents for reflectable types
 *
 * @example
 * ```ts
 * import { loadLayered, stringifyDocument } from "@reflectable/document";
 *
 * const result = loadLayered(Server, { documents: [text], overrides: ["port.9000"] });
 * ```
 */

// ============================================================
// Documents
// ============================================================

export { loadDocument, parseDocument, stringifyDocument } from "./document";
export type { DocumentFormat, DocumentLoadOptions, StringifyOptions } from "./document";

// ============================================================
// Layered Loading
// ============================================================

export { loadLayered } from "./layered";
export type { DocumentSource, LayeredLoadOptions } from "./layered";

// ============================================================
// Validation
// ============================================================

export { generateFieldSchema, generateWireSchema, validateTree } from "./wire-schema";
export type { WireSchemaOptions } from "./wire-schema";
export { treeValueSchema } from "./tree-schema";

// ============================================================
// Errors
// ============================================================

export { DocumentParseError } from "./errors";
