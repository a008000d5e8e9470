/**
 * Name dispatch over a sorted member table.
 *
 * A name is matched one character at a time. The matcher keeps a candidate
 * range `[lo, hi)` into the sorted entries and narrows it to the entries
 * whose name has the same character at the current position, by equal-range
 * binary search. After the last character the implicit terminator is
 * matched; the name resolves only if exactly one entry is left.
 * `-` in the input is compared as `_`.
 */

import { isIgnoredFor, Required } from "./attributes";
import type { LoaderScope } from "./attributes";
import { ReflectDefinitionError } from "./errors";
import type { LoadResult } from "./errors";
import type { InstanceRecord, Member, ReflectableType } from "./registry";

/** Below every UTF-16 code unit, so no input character matches it */
const TERMINATOR = -1;
const DASH = "-".charCodeAt(0);
const UNDERSCORE = "_".charCodeAt(0);

export interface NamedEntry {
  readonly name: string;
}

export type DispatchHandler<TArgs extends unknown[]> = (instance: InstanceRecord, ...args: TArgs) => LoadResult;

export interface DispatchEntry<TArgs extends unknown[]> extends NamedEntry {
  readonly ordinal: number;
  readonly isRequired: boolean;
  /** Applies the codec to this member's field of `instance` */
  readonly handler: DispatchHandler<TArgs>;
}

function codeAt(name: string, position: number): number {
  return position < name.length ? name.charCodeAt(position) : TERMINATOR;
}

function compareNames(left: string, right: string): number {
  if (left < right) {
    return -1;
  }
  return left > right ? 1 : 0;
}

/**
 * Incremental matching state. One matcher per lookup; the dispatcher it
 * came from is never written to.
 */
export class NameMatcher<TEntry extends NamedEntry> {
  private lo = 0;
  private hi: number;
  private position = 0;
  private matched: TEntry | undefined;

  constructor(private readonly entries: readonly TEntry[]) {
    this.hi = entries.length;
  }

  /** Number of entries still matching the characters seen so far. */
  get candidates(): number {
    return this.hi - this.lo;
  }

  /** Narrows the candidate range with the next character code. */
  update(code: number): void {
    const target = code === DASH ? UNDERSCORE : code;
    const position = this.position;

    let lo = this.lo;
    let hi = this.hi;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (codeAt(this.entries[mid].name, position) < target) {
        lo = mid + 1;
      } else {
        hi = mid;
      }
    }
    const first = lo;

    hi = this.hi;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (codeAt(this.entries[mid].name, position) <= target) {
        lo = mid + 1;
      } else {
        hi = mid;
      }
    }

    this.lo = first;
    this.hi = lo;
    this.position = position + 1;
    this.matched = target === TERMINATOR && this.hi - this.lo === 1 ? this.entries[this.lo] : undefined;
  }

  /** Matches the terminator and returns the unique entry, if any. */
  end(): TEntry | undefined {
    this.update(TERMINATOR);
    return this.matched;
  }
}

export class NameDispatcher<TEntry extends NamedEntry> {
  readonly entries: readonly TEntry[];

  constructor(entries: Iterable<TEntry>) {
    const sorted = [...entries].sort((left, right) => compareNames(left.name, right.name));
    for (let index = 1; index < sorted.length; index++) {
      if (sorted[index - 1].name === sorted[index].name) {
        throw new ReflectDefinitionError(`Dispatch table lists '${sorted[index].name}' more than once`, {
          name: sorted[index].name,
        });
      }
    }
    this.entries = Object.freeze(sorted);
  }

  get size(): number {
    return this.entries.length;
  }

  matcher(): NameMatcher<TEntry> {
    return new NameMatcher(this.entries);
  }

  find(name: string): TEntry | undefined {
    const matcher = this.matcher();
    for (let index = 0; index < name.length && matcher.candidates > 0; index++) {
      matcher.update(name.charCodeAt(index));
    }
    return matcher.end();
  }
}

// ============================================================
// Dispatch tables
// ============================================================

/**
 * Builds the dispatch table of `type` for one loader: every member not
 * ignored for `scope`, with the handler `createHandler` makes for it.
 */
export function buildDispatchTable<TArgs extends unknown[]>(
  type: ReflectableType<InstanceRecord>,
  scope: LoaderScope,
  createHandler: (member: Member) => DispatchHandler<TArgs>,
): NameDispatcher<DispatchEntry<TArgs>> {
  const entries: DispatchEntry<TArgs>[] = [];
  type.forEachMember((member) => {
    if (!isIgnoredFor(member.attributes, scope)) {
      entries.push({
        name: member.name,
        ordinal: member.ordinal,
        isRequired: member.attributes.has(Required),
        handler: createHandler(member),
      });
    }
  });
  return new NameDispatcher(entries);
}

/**
 * Returns a lookup that builds each type's table on first use and reuses it
 * for the lifetime of the type.
 */
export function dispatchTableCache<TArgs extends unknown[]>(
  scope: LoaderScope,
  createHandler: (member: Member) => DispatchHandler<TArgs>,
): (type: ReflectableType<InstanceRecord>) => NameDispatcher<DispatchEntry<TArgs>> {
  const tables = new WeakMap<ReflectableType<InstanceRecord>, NameDispatcher<DispatchEntry<TArgs>>>();
  return (type) => {
    let table = tables.get(type);
    if (!table) {
      table = buildDispatchTable(type, scope, createHandler);
      tables.set(type, table);
    }
    return table;
  };
}
