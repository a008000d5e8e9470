/**
 * Member registry for reflectable record types.
 *
 * A type is declared once from a shape of fields and keeps a flat, frozen,
 * ordinal-ordered member list. Derived types copy their base's list and
 * append their own members, so ordinals run 0..N-1 across the whole chain.
 *
 * @example
 * ```ts
 * const TwoMember = defineReflectable("TwoMember", {
 *   foo: f.int32().default(42),
 *   bar: f.float32().default(1.1),
 * });
 * type TwoMember = InstanceOf<typeof TwoMember>;
 *
 * const Labelled = TwoMember.extend("Labelled", { label: f.string().required() });
 * Labelled.members.map((member) => member.name); // ["foo", "bar", "label"]
 * ```
 */

import { AttributeSet, Required } from "./attributes";
import { ReflectDefinitionError } from "./errors";
import type { FieldType, FieldValue } from "./fields";

// ============================================================
// Types
// ============================================================

/** Runtime form of every reflectable instance */
export type InstanceRecord = Record<string, unknown>;

/** A shape is a record of field definitions */
export type Shape = Record<string, FieldType<unknown>>;

/** Infer the instance type from a shape */
export type ShapeInstance<S extends Shape> = {
  -readonly [K in keyof S]: FieldValue<S[K]>;
};

/** Infer the instance type of a reflectable type */
export type InstanceOf<R> = R extends ReflectableType<infer T extends InstanceRecord> ? T : never;

export interface Member {
  /** Position in the flattened member list */
  readonly ordinal: number;
  readonly name: string;
  readonly field: FieldType<unknown>;
  readonly attributes: AttributeSet;
  get(instance: InstanceRecord): unknown;
  set(instance: InstanceRecord, value: unknown): void;
}

/** Return `false` to stop enumeration early */
export type MemberVisitor = (member: Member) => boolean | void;

const RESERVED_NAMES = new Set(["__proto__"]);

function validateMemberName(typeName: string, name: string) {
  if (name.length === 0) {
    throw new ReflectDefinitionError(`Type '${typeName}' declares a member with an empty name`, { typeName });
  }
  if (name.includes(".") || name.includes("-")) {
    throw new ReflectDefinitionError(`Member '${typeName}.${name}' must not contain '.' or '-'`, {
      typeName,
      member: name,
    });
  }
  if (RESERVED_NAMES.has(name)) {
    throw new ReflectDefinitionError(`Member name '${name}' is reserved`, { typeName, member: name });
  }
}

function createMember(ordinal: number, name: string, field: FieldType<unknown>): Member {
  return Object.freeze({
    ordinal,
    name,
    field,
    attributes: new AttributeSet(field.attributes),
    get: (instance: InstanceRecord) => instance[name],
    set: (instance: InstanceRecord, value: unknown) => {
      instance[name] = value;
    },
  });
}

// ============================================================
// Reflectable Type
// ============================================================

export class ReflectableType<T extends InstanceRecord> {
  readonly name: string;
  readonly base?: ReflectableType<InstanceRecord>;
  readonly members: readonly Member[];
  readonly memberCount: number;
  /** Number of members carrying `Required` */
  readonly requiredCount: number;
  private readonly membersByName: ReadonlyMap<string, Member>;

  /** Use {@link defineReflectable} or {@link ReflectableType.extend}. */
  constructor(name: string, shape: Shape, base?: ReflectableType<InstanceRecord>) {
    this.name = name;
    this.base = base;

    const members: Member[] = base ? [...base.members] : [];
    const membersByName = new Map<string, Member>(members.map((member) => [member.name, member]));

    for (const [memberName, field] of Object.entries(shape)) {
      validateMemberName(name, memberName);
      if (membersByName.has(memberName)) {
        throw new ReflectDefinitionError(`Type '${name}' declares member '${memberName}' more than once`, {
          typeName: name,
          member: memberName,
        });
      }
      const member = createMember(members.length, memberName, field);
      members.push(member);
      membersByName.set(memberName, member);
    }

    this.members = Object.freeze(members);
    this.membersByName = membersByName;
    this.memberCount = members.length;

    let requiredCount = 0;
    this.forEachMember((member) => {
      if (member.attributes.has(Required)) {
        requiredCount += 1;
      }
    });
    this.requiredCount = requiredCount;
  }

  /**
   * Visits every member in ordinal order, base members first.
   * Returns `false` as soon as the visitor does, `true` otherwise.
   */
  forEachMember(visitor: MemberVisitor): boolean {
    for (const member of this.members) {
      if (visitor(member) === false) {
        return false;
      }
    }
    return true;
  }

  member(name: string): Member | undefined {
    return this.membersByName.get(name);
  }

  /** Every member name is an own property of the record. */
  hasMembers(value: InstanceRecord): value is T {
    return this.members.every((member) => Object.hasOwn(value, member.name));
  }

  /** A fresh instance with every member at its default. */
  create(): T {
    const instance: InstanceRecord = {};
    for (const member of this.members) {
      member.set(instance, member.field.create());
    }
    if (!this.hasMembers(instance)) {
      throw new ReflectDefinitionError(`Type '${this.name}' could not build a default instance`, {
        typeName: this.name,
      });
    }
    return instance;
  }

  /** Derives a type whose members follow this type's members. */
  extend<S extends Shape>(name: string, shape: S): ReflectableType<T & ShapeInstance<S>> {
    return new ReflectableType<T & ShapeInstance<S>>(name, shape, this);
  }
}

// ============================================================
// Registration
// ============================================================

export function defineReflectable<S extends Shape>(name: string, shape: S): ReflectableType<ShapeInstance<S>> {
  return new ReflectableType<ShapeInstance<S>>(name, shape);
}

export function isReflectable(value: unknown): value is ReflectableType<InstanceRecord> {
  return value instanceof ReflectableType;
}
