/**
 * Zod schema for the tree-value model. Parsed documents pass through it
 * before they reach the codec.
 */

import { z } from "zod";
import type { TreeValue } from "@reflectable/core";

/** Integers the parser read as `bigint` stay `bigint` only when a `number` would lose precision. */
function narrowInteger(value: bigint): number | bigint {
  const asNumber = Number(value);
  return Number.isSafeInteger(asNumber) ? asNumber : value;
}

export const treeValueSchema: z.ZodType<TreeValue, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.union([
    z.null(),
    z.boolean(),
    z.number(),
    z.nan(),
    z.bigint().transform(narrowInteger),
    z.string(),
    z.array(treeValueSchema),
    z.record(z.string(), treeValueSchema),
  ]),
);
