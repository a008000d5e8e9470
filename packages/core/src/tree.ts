/**
 * Generic tree values: the intermediate form every field is encoded to.
 * Objects are string-keyed, arrays are ordered, scalars cover the JSON
 * scalars plus `bigint` for 64-bit integers.
 */

export type TreeScalar = null | boolean | number | bigint | string;

export interface TreeObject {
  [key: string]: TreeValue;
}

export type TreeValue = TreeScalar | TreeValue[] | TreeObject;

export type TreeKind = "null" | "boolean" | "number" | "bigint" | "string" | "array" | "object";

export function isTreeObject(value: TreeValue): value is TreeObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isTreeArray(value: TreeValue): value is TreeValue[] {
  return Array.isArray(value);
}

export function treeKind(value: TreeValue): TreeKind {
  if (value === null) {
    return "null";
  }
  if (Array.isArray(value)) {
    return "array";
  }
  switch (typeof value) {
    case "boolean":
      return "boolean";
    case "number":
      return "number";
    case "bigint":
      return "bigint";
    case "string":
      return "string";
    default:
      return "object";
  }
}

/**
 * Reads an integral scalar. Numbers must be integers; bigints pass through.
 */
export function readTreeInteger(value: TreeValue): bigint | undefined {
  if (typeof value === "bigint") {
    return value;
  }
  if (typeof value === "number" && Number.isInteger(value)) {
    return BigInt(value);
  }
  return undefined;
}

/**
 * Deterministic text for a tree value: equal trees give equal text.
 */
export function canonicalTreeText(value: TreeValue): string {
  if (value === null || typeof value === "boolean" || typeof value === "number" || typeof value === "bigint") {
    return String(value);
  }
  if (typeof value === "string") {
    return JSON.stringify(value);
  }
  if (isTreeArray(value)) {
    return `[${value.map(canonicalTreeText).join(",")}]`;
  }
  const entries = Object.keys(value).map((key) => `${JSON.stringify(key)}:${canonicalTreeText(value[key])}`);
  return `{${entries.join(",")}}`;
}
