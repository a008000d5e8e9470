import { Required } from "./attributes";
import type { DispatchEntry } from "./dispatch";
import { LOADED, RequiredMissingError, failed } from "./errors";
import type { LoadResult } from "./errors";
import type { InstanceRecord, ReflectableType } from "./registry";

/**
 * Accounts for the required members of `type` supplied during a load.
 *
 * A member counts once however many times its key is presented. The tracker
 * never fails a load by itself; call {@link RequiredTracker.check} (or pass
 * `requireAll`) to turn an incomplete load into a failure.
 */
export class RequiredTracker<T extends InstanceRecord = InstanceRecord> {
  readonly type: ReflectableType<T>;
  private readonly seen: boolean[];
  private uniqueRequiredSeen = 0;

  constructor(type: ReflectableType<T>) {
    this.type = type;
    this.seen = new Array<boolean>(type.memberCount).fill(false);
  }

  /** Runs the entry's handler and marks its member seen on success. */
  handle<TArgs extends unknown[]>(entry: DispatchEntry<TArgs>, instance: InstanceRecord, ...args: TArgs): LoadResult {
    const result = entry.handler(instance, ...args);
    if (!result.success) {
      return result;
    }
    if (entry.isRequired && !this.seen[entry.ordinal]) {
      this.seen[entry.ordinal] = true;
      this.uniqueRequiredSeen += 1;
    }
    return result;
  }

  seenAll(): boolean {
    return this.uniqueRequiredSeen === this.type.requiredCount;
  }

  /** Names of required members not yet supplied, in ordinal order. */
  missing(): string[] {
    const names: string[] = [];
    this.type.forEachMember((member) => {
      if (member.attributes.has(Required) && !this.seen[member.ordinal]) {
        names.push(member.name);
      }
    });
    return names;
  }

  check(): LoadResult {
    if (this.seenAll()) {
      return LOADED;
    }
    const missing = this.missing();
    return failed(
      new RequiredMissingError(`${this.type.name} is missing required members: ${missing.join(", ")}`, {
        typeName: this.type.name,
        missing,
      }),
    );
  }
}
