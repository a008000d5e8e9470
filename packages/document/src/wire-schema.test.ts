/**
 * Unit tests for wire-schema.ts
 */

import { describe, it, expect } from "vitest";
import { defineReflectable, f } from "@reflectable/core";
import type { StringConverter } from "@reflectable/core";
import { generateFieldSchema, generateWireSchema, validateTree } from "./wire-schema";

enum Level {
  Low = 1,
  High = 9,
}

const hexColor: StringConverter<number> = {
  label: "hex color",
  format: (value) => `#${value.toString(16).padStart(6, "0")}`,
  parse: (text) => (/^#[0-9a-f]{6}$/.test(text) ? Number.parseInt(text.slice(1), 16) : undefined),
  create: () => 0,
};

const Endpoint = defineReflectable("Endpoint", {
  host: f.string().required(),
  port: f.uint16().default(8080),
  cache: f.string().ignore("tree"),
});

function accepts(field: Parameters<typeof generateFieldSchema>[0], value: unknown): boolean {
  return generateFieldSchema(field).safeParse(value).success;
}

describe("generateFieldSchema", () => {
  it("bounds integers by their declared width", () => {
    expect(accepts(f.int8(), 127)).toBe(true);
    expect(accepts(f.int8(), 128)).toBe(false);
    expect(accepts(f.int8(), -129)).toBe(false);
    expect(accepts(f.int8(), 1.5)).toBe(false);
  });

  it("accepts bigint only for 64-bit integers", () => {
    expect(accepts(f.int64(), 2n ** 62n)).toBe(true);
    expect(accepts(f.int64(), 2n ** 63n)).toBe(false);
    expect(accepts(f.int64(), 12)).toBe(true);
    expect(accepts(f.int32(), 12n)).toBe(false);
  });

  it("bounds finite floats and passes infinities and NaN", () => {
    expect(accepts(f.float32(), 1e39)).toBe(false);
    expect(accepts(f.float64(), 1e39)).toBe(true);
    expect(accepts(f.float32(), Number.POSITIVE_INFINITY)).toBe(true);
    expect(accepts(f.float32(), Number.NaN)).toBe(true);
  });

  it("accepts declared enum values only", () => {
    expect(accepts(f.enumeration(Level), 9)).toBe(true);
    expect(accepts(f.enumeration(Level), 2)).toBe(false);
  });

  it("checks string-like text with the converter", () => {
    expect(accepts(f.stringLike(hexColor), "#00ff00")).toBe(true);
    expect(accepts(f.stringLike(hexColor), "green")).toBe(false);
  });

  it("accepts null for optional fields", () => {
    expect(accepts(f.optional(f.int32()), null)).toBe(true);
    expect(accepts(f.optional(f.int32()), "1")).toBe(false);
  });

  it("checks variant tags against their alternative", () => {
    const choice = f.variant(f.int32(), f.string());
    expect(accepts(choice, [0, 5])).toBe(true);
    expect(accepts(choice, [1, "five"])).toBe(true);
    expect(accepts(choice, [0, "five"])).toBe(false);
    expect(accepts(choice, [2, 5])).toBe(false);
  });

  it("checks the length of fixed arrays", () => {
    expect(accepts(f.fixedArray(f.uint8(), 2), [1, 2])).toBe(true);
    expect(accepts(f.fixedArray(f.uint8(), 2), [1])).toBe(false);
    expect(accepts(f.array(f.uint8()), [])).toBe(true);
  });

  it("expects maps as key/value pairs", () => {
    const limits = f.map(f.string(), f.int32());
    expect(accepts(limits, [["cpu", 4]])).toBe(true);
    expect(accepts(limits, { cpu: 4 })).toBe(false);
    expect(accepts(limits, [["cpu"]])).toBe(false);
  });

  it("checks tuple elements by position", () => {
    expect(accepts(f.tuple(f.string(), f.bool()), ["a", true])).toBe(true);
    expect(accepts(f.tuple(f.string(), f.bool()), [true, "a"])).toBe(false);
  });

  it("expects microsecond counts for time fields", () => {
    expect(accepts(f.timestamp(), 1_700_000_000_000_000)).toBe(true);
    expect(accepts(f.duration("s"), 2n ** 60n)).toBe(true);
    expect(accepts(f.duration("s"), "5s")).toBe(false);
  });
});

describe("generateWireSchema", () => {
  const schema = generateWireSchema(Endpoint);

  it("requires required members only", () => {
    expect(schema.safeParse({ host: "a" }).success).toBe(true);
    expect(schema.safeParse({ port: 1 }).success).toBe(false);
  });

  it("makes required members optional for partial trees", () => {
    expect(generateWireSchema(Endpoint, { partial: true }).safeParse({ port: 1 }).success).toBe(true);
  });

  it("lets unknown keys through", () => {
    expect(schema.safeParse({ host: "a", extra: [1, 2] })).toEqual({
      success: true,
      data: { host: "a", extra: [1, 2] },
    });
  });

  it("does not check members ignored by the tree loader", () => {
    expect(schema.safeParse({ host: "a", cache: 5 }).success).toBe(true);
  });

  it("checks nested records", () => {
    const Service = defineReflectable("Service", { endpoint: f.nested(Endpoint) });
    const nested = generateWireSchema(Service);

    expect(nested.safeParse({ endpoint: { host: "a" } }).success).toBe(true);
    expect(nested.safeParse({ endpoint: {} }).success).toBe(false);
  });
});

describe("validateTree", () => {
  it("returns the tree when it matches", () => {
    const tree = { host: "a", port: 80 };
    expect(validateTree(Endpoint, tree, "endpoint.yaml")).toEqual({ success: true, data: tree });
  });

  it("lists every problem", () => {
    expect(validateTree(Endpoint, { port: "80" }, "endpoint.yaml")).toEqual({
      success: false,
      error: "endpoint.yaml does not match Endpoint:\n  - host: Required\n  - port: Expected number, received string",
    });
  });
});
