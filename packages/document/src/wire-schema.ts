/**
 * Zod schemas for the wire shape of reflectable types.
 * Validating a tree before loading reports every problem at once, where the
 * loader stops at the first one.
 */

import { z } from "zod";
import { isIgnoredFor, Required } from "@reflectable/core";
import type { FieldType, InstanceRecord, ReflectableType, TreeValue } from "@reflectable/core";

function unionOf(schemas: readonly z.ZodTypeAny[]): z.ZodTypeAny {
  const [first, second, ...rest] = schemas;
  if (!first) {
    return z.never();
  }
  return second ? z.union([first, second, ...rest]) : first;
}

function wireInteger(min: bigint, max: bigint, bigint: boolean): z.ZodTypeAny {
  const asNumber = z.number().int().min(Number(min)).max(Number(max));
  return bigint ? z.union([asNumber, z.bigint().min(min).max(max)]) : asNumber;
}

const microseconds = z.union([z.number().int(), z.bigint()]);

/**
 * Generate a Zod schema for one field's wire form.
 */
export function generateFieldSchema(field: FieldType<unknown>): z.ZodTypeAny {
  const descriptor = field.descriptor;

  switch (descriptor.kind) {
    case "boolean":
      return z.boolean();
    case "integer":
      return wireInteger(descriptor.min, descriptor.max, descriptor.bigint);
    case "float":
      return z
        .number()
        .or(z.nan())
        .refine((value) => !Number.isFinite(value) || Math.abs(value) <= descriptor.max, {
          message: `Outside the ${descriptor.name} range`,
        });
    case "enum": {
      const values = descriptor.members.map(([, value]) => value);
      return z.union([z.number(), z.string()]).refine((value) => values.includes(value), {
        message: `Expected one of ${values.join(", ")}`,
      });
    }
    case "string":
      return z.string();
    case "string-like": {
      const converter = descriptor.converter;
      return z.string().refine((text) => converter.parse(text) !== undefined, {
        message: `Invalid ${converter.label}`,
      });
    }
    case "nested":
      return generateWireSchema(descriptor.type);
    case "optional":
      return generateFieldSchema(descriptor.inner).nullable();
    case "variant":
      return unionOf(
        descriptor.alternatives.map((alternative, index) =>
          z.tuple([z.literal(index), generateFieldSchema(alternative)]),
        ),
      );
    case "sequence": {
      const elements = z.array(generateFieldSchema(descriptor.element));
      return descriptor.length === undefined ? elements : elements.length(descriptor.length);
    }
    case "set":
      return z.array(generateFieldSchema(descriptor.element));
    case "map":
      return z.array(z.tuple([generateFieldSchema(descriptor.key), generateFieldSchema(descriptor.value)]));
    case "tuple": {
      const [first, ...rest] = descriptor.elements.map(generateFieldSchema);
      return first ? z.tuple([first, ...rest]) : z.tuple([]);
    }
    case "timestamp":
    case "duration":
      return microseconds;
    default:
      descriptor satisfies never;
      return z.unknown();
  }
}

export interface WireSchemaOptions {
  /**
   * Treat the type's own required members as optional, for a tree that is
   * one of several sources. Nested records keep their required members.
   * @default false
   */
  partial?: boolean;
}

/**
 * Generate a Zod schema for the tree a type loads from.
 * Required members must be present; other members are optional and
 * unknown keys pass through, as they do in the loader.
 */
export function generateWireSchema(
  type: ReflectableType<InstanceRecord>,
  options: WireSchemaOptions = {},
): z.ZodTypeAny {
  const shape: Record<string, z.ZodTypeAny> = {};

  type.forEachMember((member) => {
    if (isIgnoredFor(member.attributes, "tree")) {
      shape[member.name] = z.unknown();
      return;
    }
    const schema = generateFieldSchema(member.field);
    shape[member.name] = member.attributes.has(Required) && !options.partial ? schema : schema.optional();
  });

  return z.object(shape).passthrough();
}

/**
 * Validate a tree against a type's wire schema.
 * Returns validation result with one line per problem.
 */
export function validateTree(
  type: ReflectableType<InstanceRecord>,
  tree: TreeValue,
  label: string,
  options: WireSchemaOptions = {},
): { success: true; data: TreeValue } | { success: false; error: string } {
  const result = generateWireSchema(type, options).safeParse(tree);

  if (result.success) {
    return { success: true, data: tree };
  }

  const errorMessages = result.error.errors.map((e) => `  - ${e.path.join(".")}: ${e.message}`).join("\n");

  return {
    success: false,
    error: `${label} does not match ${type.name}:\n${errorMessages}`,
  };
}
