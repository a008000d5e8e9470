/**
 * Unit tests for document.ts
 */

import { describe, it, expect, vi } from "vitest";
import { defineReflectable, f, ReflectEncodeError, RequiredTracker } from "@reflectable/core";
import type { LoadResult, ReflectLogger } from "@reflectable/core";
import { loadDocument, parseDocument, stringifyDocument } from "./document";

const Point = defineReflectable("Point", {
  x: f.int32().default(42),
  y: f.float64().default(1.1),
});

const Account = defineReflectable("Account", {
  id: f.uint64(),
  owner: f.string().required(),
  points: f.array(f.nested(Point)),
});

function errorOf(result: LoadResult) {
  if (result.success) {
    throw new Error("expected the load to fail");
  }
  return result.error;
}

function recordingLogger(): ReflectLogger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe("parseDocument", () => {
  it("parses YAML into tree values", () => {
    expect(parseDocument("name: gauge\nflags: [true, null]\nratio: 0.5\n")).toEqual({
      success: true,
      value: { name: "gauge", flags: [true, null], ratio: 0.5 },
    });
  });

  it("parses JSON text", () => {
    expect(parseDocument('{"a": 1, "b": ["x", 2.5]}')).toEqual({
      success: true,
      value: { a: 1, b: ["x", 2.5] },
    });
  });

  it("keeps integers beyond 2^53 as bigint", () => {
    expect(parseDocument("big: 18446744073709551615\nsmall: 7\n")).toEqual({
      success: true,
      value: { big: 18446744073709551615n, small: 7 },
    });
  });

  it("reports malformed text as a parse error", () => {
    const result = parseDocument("items: [1, 2", "broken.yaml");
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe("PARSE_ERROR");
      expect(result.error.message).toBe("Failed to parse broken.yaml");
      expect(result.error.details?.label).toBe("broken.yaml");
    }
  });
});

describe("loadDocument", () => {
  it("loads a YAML document into the target", () => {
    const target = Account.create();
    const text = "owner: ada\nid: 7\npoints:\n  - x: 1\n  - y: 2.5\n";

    expect(loadDocument(Account, text, target)).toEqual({ success: true });
    expect(target).toEqual({
      id: 7n,
      owner: "ada",
      points: [
        { x: 1, y: 1.1 },
        { x: 42, y: 2.5 },
      ],
    });
  });

  it("loads unsigned 64-bit values exactly", () => {
    const target = Account.create();
    expect(loadDocument(Account, "owner: ada\nid: 18446744073709551615\n", target).success).toBe(true);
    expect(target.id).toBe(18446744073709551615n);
  });

  it("labels parse errors with the type name by default", () => {
    const error = errorOf(loadDocument(Account, "owner: [", Account.create()));
    expect(error.code).toBe("PARSE_ERROR");
    expect(error.message).toBe("Failed to parse Account");
  });

  it("labels parse errors with the given label", () => {
    const logger = recordingLogger();
    const error = errorOf(loadDocument(Account, "owner: [", Account.create(), { label: "account.yaml", logger }));
    expect(error.message).toBe("Failed to parse account.yaml");
    expect(logger.debug).toHaveBeenCalledWith("Document parse failed", {
      label: "account.yaml",
      code: "PARSE_ERROR",
    });
  });

  it("reports the first codec error without validation", () => {
    const error = errorOf(loadDocument(Account, "owner: ada\nid: -1\n", Account.create()));
    expect(error.code).toBe("RANGE_OVERFLOW");
    expect(error.message).toBe("Account.id: -1 does not fit in uint64");
  });

  it("reports a kind mismatch without validation", () => {
    const error = errorOf(loadDocument(Account, "owner: 5\n", Account.create()));
    expect(error.code).toBe("SHAPE_MISMATCH");
    expect(error.message).toBe("Account.owner: expected string, got number");
  });

  it("reports every wire-shape problem when validating", () => {
    const target = Account.create();
    const error = errorOf(loadDocument(Account, "owner: 5\npoints:\n  - x: a\n", target, { validate: true }));

    expect(error.code).toBe("SHAPE_MISMATCH");
    expect(error.message).toBe(
      "Account does not match Account:\n" +
        "  - owner: Expected string, received number\n" +
        "  - points.0.x: Expected number, received string",
    );
    expect(target.points).toEqual([]);
  });

  it("requires required members when validating", () => {
    const error = errorOf(loadDocument(Account, "id: 1\n", Account.create(), { validate: true, label: "a.yaml" }));
    expect(error.message).toBe("a.yaml does not match Account:\n  - owner: Required");
  });

  it("leaves required members to a shared tracker when validating", () => {
    const tracker = new RequiredTracker(Account);
    const target = Account.create();

    expect(loadDocument(Account, "id: 1\n", target, { validate: true, tracker })).toEqual({ success: true });
    expect(tracker.missing()).toEqual(["owner"]);
  });

  it("checks required members when asked", () => {
    const error = errorOf(loadDocument(Account, "id: 1\n", Account.create(), { requireAll: true }));
    expect(error.code).toBe("REQUIRED_MISSING");
    expect(error.message).toBe("Account is missing required members: owner");
  });
});

describe("stringifyDocument", () => {
  it("writes YAML by default", () => {
    expect(stringifyDocument(Point, Point.create())).toBe("x: 42\ny: 1.1\n");
  });

  it("writes JSON with two-space indentation", () => {
    expect(stringifyDocument(Point, Point.create(), { format: "json" })).toBe('{\n  "x": 42,\n  "y": 1.1\n}\n');
  });

  it("writes compact JSON with zero indentation", () => {
    const account = Account.create();
    account.id = 7n;
    account.owner = "ada";

    expect(stringifyDocument(Account, account, { format: "json", indent: 0 })).toBe(
      '{"id":7,"owner":"ada","points":[]}\n',
    );
  });

  it("keeps large integers in YAML", () => {
    const account = Account.create();
    account.id = 2n ** 60n;
    account.owner = "ada";

    expect(stringifyDocument(Account, account)).toBe("id: 1152921504606846976\nowner: ada\npoints: []\n");
  });

  it("refuses to write large integers to JSON", () => {
    const account = Account.create();
    account.id = 2n ** 60n;

    expect(() => stringifyDocument(Account, account, { format: "json" })).toThrow(ReflectEncodeError);
    expect(() => stringifyDocument(Account, account, { format: "json" })).toThrow(
      "id: 1152921504606846976 cannot be written to JSON without losing precision",
    );
  });

  it("refuses to write NaN and infinities to JSON", () => {
    const point = Point.create();
    point.y = Number.NaN;
    expect(() => stringifyDocument(Point, point, { format: "json" })).toThrow(ReflectEncodeError);
    expect(() => stringifyDocument(Point, point, { format: "json" })).toThrow("y: NaN cannot be written to JSON");

    point.y = Number.NEGATIVE_INFINITY;
    expect(() => stringifyDocument(Point, point, { format: "json" })).toThrow("y: -Infinity cannot be written to JSON");
  });

  it("keeps NaN and infinities in YAML", () => {
    const point = Point.create();
    point.y = Number.POSITIVE_INFINITY;
    expect(stringifyDocument(Point, point)).toBe("x: 42\ny: .inf\n");
  });

  it("reads back what it writes", () => {
    const account = Account.create();
    account.id = 2n ** 60n;
    account.owner = "ada";
    account.points = [{ x: -3, y: 0.25 }];

    const copy = Account.create();
    expect(loadDocument(Account, stringifyDocument(Account, account), copy).success).toBe(true);
    expect(copy).toEqual(account);
  });
});
