/**
 * Load configuration types.
 */

import { NOOP_LOGGER } from "./logger";
import type { ReflectLogger } from "./logger";
import type { InstanceRecord } from "./registry";
import type { RequiredTracker } from "./tracker";

/**
 * Options accepted by every load entry point.
 */
export interface LoadOptions<T extends InstanceRecord = InstanceRecord> {
  /**
   * Tracker to account required members in. Pass the same tracker to
   * several loads into one target to check completeness once at the end.
   * (default: a fresh tracker per call)
   */
  tracker?: RequiredTracker<T>;

  /**
   * Fail with `REQUIRED_MISSING` when a required member was not supplied.
   * Applies to nested records as well.
   * @default false
   */
  requireAll?: boolean;

  /** Logger for skipped keys and failures (default: NOOP_LOGGER) */
  logger?: ReflectLogger;
}

export interface ResolvedLoadOptions {
  requireAll: boolean;
  logger: ReflectLogger;
}

export const DEFAULT_LOAD_OPTIONS: Readonly<ResolvedLoadOptions> = Object.freeze({
  requireAll: false,
  logger: NOOP_LOGGER,
});

export function resolveLoadOptions(options: LoadOptions<InstanceRecord> = {}): ResolvedLoadOptions {
  return {
    requireAll: options.requireAll ?? DEFAULT_LOAD_OPTIONS.requireAll,
    logger: options.logger ?? DEFAULT_LOAD_OPTIONS.logger,
  };
}

/** Where a value sits in the input, and how the load was configured. */
export interface CodecContext {
  /** Dotted location used in error messages, e.g. `Config.servers[1].port` */
  readonly path: string;
  readonly options: ResolvedLoadOptions;
}

export function childContext(context: CodecContext, segment: string | number): CodecContext {
  const path = typeof segment === "number" ? `${context.path}[${segment}]` : `${context.path}.${segment}`;
  return { path, options: context.options };
}
