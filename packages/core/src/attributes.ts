/**
 * Member attributes: typed tags attached to a field when it is declared.
 *
 * An attribute kind is created once and called to produce instances. Lookup
 * is by kind, never by value, and a member carries at most one instance of
 * each kind.
 *
 * @example
 * ```ts
 * const Decimals = defineAttribute("Decimals", 2);
 *
 * const Reading = defineReflectable("Reading", {
 *   celsius: f.float64().with(Decimals(4)),
 * });
 *
 * Reading.member("celsius")?.attributes.get(Decimals); // 4
 * ```
 */

import { ReflectDefinitionError } from "./errors";

/** Loaders that consult the dispatch table and can therefore ignore a member. */
export type LoaderScope = "tree" | "path";

export const ALL_LOADER_SCOPES: readonly LoaderScope[] = Object.freeze(["tree", "path"]);

export interface Attribute<T> {
  readonly kindId: symbol;
  readonly attributeName: string;
  readonly value: T;
}

export interface AttributeKind<T> {
  (value?: T): Attribute<T>;
  readonly kindId: symbol;
  readonly attributeName: string;
  readonly defaultValue: T;
  /** Narrows an attribute of unknown kind to this kind. */
  owns(attribute: Attribute<unknown>): attribute is Attribute<T>;
}

/**
 * Defines a value-carrying attribute. Calling the kind without an argument
 * uses `defaultValue`.
 */
export function defineAttribute<T>(attributeName: string, defaultValue: T): AttributeKind<T> {
  const kindId = Symbol(attributeName);
  const create = (value?: T): Attribute<T> => ({
    kindId,
    attributeName,
    value: value === undefined ? defaultValue : value,
  });
  return Object.assign(create, {
    kindId,
    attributeName,
    defaultValue,
    owns: (attribute: Attribute<unknown>): attribute is Attribute<T> => attribute.kindId === kindId,
  });
}

/** Defines a marker attribute whose presence is all that matters. */
export function defineMarker(attributeName: string): AttributeKind<true> {
  return defineAttribute<true>(attributeName, true);
}

/** Member must be supplied for a load to be complete. */
export const Required = defineMarker("Required");

/** Member is left out of the dispatch tables of the listed loaders. It is still saved. */
export const Ignore = defineAttribute<readonly LoaderScope[]>("Ignore", ALL_LOADER_SCOPES);

export class AttributeSet implements Iterable<Attribute<unknown>> {
  private readonly attributes: readonly Attribute<unknown>[];

  constructor(attributes: Iterable<Attribute<unknown>> = []) {
    const list = [...attributes];
    const seen = new Set<symbol>();
    for (const attribute of list) {
      if (seen.has(attribute.kindId)) {
        throw new ReflectDefinitionError(`Attribute '${attribute.attributeName}' is attached more than once`, {
          attribute: attribute.attributeName,
        });
      }
      seen.add(attribute.kindId);
    }
    this.attributes = Object.freeze(list);
  }

  get size(): number {
    return this.attributes.length;
  }

  has<T>(kind: AttributeKind<T>): boolean {
    return this.attributes.some((attribute) => kind.owns(attribute));
  }

  get<T>(kind: AttributeKind<T>): T | undefined {
    for (const attribute of this.attributes) {
      if (kind.owns(attribute)) {
        return attribute.value;
      }
    }
    return undefined;
  }

  [Symbol.iterator](): Iterator<Attribute<unknown>> {
    return this.attributes[Symbol.iterator]();
  }
}

export function isIgnoredFor(attributes: AttributeSet, scope: LoaderScope): boolean {
  const scopes = attributes.get(Ignore);
  return scopes !== undefined && scopes.includes(scope);
}
