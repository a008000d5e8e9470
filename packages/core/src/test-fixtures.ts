/**
 * Record types shared by the unit tests.
 */

import { defineReflectable } from "./registry";
import { f } from "./fields";
import type { StringConverter } from "./fields";

export const TwoMember = defineReflectable("TwoMember", {
  foo: f.int32().default(42),
  bar: f.float32().default(1.1),
});

export const Wrapper = defineReflectable("Wrapper", {
  nested: f.nested(TwoMember),
});

export const ArrayHolder = defineReflectable("ArrayHolder", {
  arr: f.array(f.nested(TwoMember)),
});

export const Credentials = defineReflectable("Credentials", {
  user: f.string().required(),
  token: f.string(),
});

export const Session = defineReflectable("Session", {
  credentials: f.nested(Credentials),
  max_retries: f.uint8().default(3),
});

export enum Color {
  Red,
  Green = 5,
  Blue,
}

export enum Mode {
  Fast = "fast",
  Safe = "safe",
}

export interface Version {
  major: number;
  minor: number;
}

export const versionConverter: StringConverter<Version> = {
  label: "version",
  format: (value) => `${value.major}.${value.minor}`,
  parse: (text) => {
    const match = /^(\d+)\.(\d+)$/.exec(text);
    return match ? { major: Number(match[1]), minor: Number(match[2]) } : undefined;
  },
  create: () => ({ major: 0, minor: 0 }),
};

export const Everything = defineReflectable("Everything", {
  flag: f.bool(),
  small: f.int8(),
  count: f.uint32(),
  big: f.int64(),
  ratio: f.float64(),
  color: f.enumeration(Color),
  mode: f.enumeration(Mode),
  label: f.string(),
  version: f.stringLike(versionConverter),
  inner: f.nested(TwoMember),
  maybe: f.optional(f.int32()),
  choice: f.variant(f.int32(), f.string()),
  list: f.array(f.int32()),
  triple: f.fixedArray(f.uint8(), 3),
  tags: f.set(f.string()),
  limits: f.map(f.string(), f.int32()),
  aliases: f.multimap(f.string(), f.string()),
  pair: f.tuple(f.string(), f.bool()),
  created_at: f.timestamp(),
  timeout: f.duration("ms"),
});
