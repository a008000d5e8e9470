/**
 * Layered loading: a fresh instance built from defaults, then documents in
 * order, then path overrides. Required members may come from any layer;
 * completeness is checked once, after the last one.
 *
 * @example
 * ```ts
 * const result = loadLayered(Server, {
 *   documents: [{ label: "defaults.yaml", text: defaultsText }, { label: "local.yaml", text: localText }],
 *   overrides: ["port.9000", "tls.enabled.true"],
 * });
 * if (result.success) {
 *   start(result.value);
 * }
 * ```
 */

import { loaded, loadPath, NOOP_LOGGER, RequiredTracker } from "@reflectable/core";
import type { InstanceRecord, LoadOutcome, ReflectableType, ReflectLogger } from "@reflectable/core";
import { loadDocument } from "./document";

export interface DocumentSource {
  /** Name in error messages, e.g. a file path */
  label: string;
  text: string;
}

/**
 * Sources and settings for {@link loadLayered}.
 */
export interface LayeredLoadOptions {
  /** YAML or JSON documents, applied in order (default: none) */
  documents?: ReadonlyArray<string | DocumentSource>;

  /** Dotted path assignments applied after every document, e.g. `server.port.9000` (default: none) */
  overrides?: readonly string[];

  /**
   * Fail when no layer supplied a required member.
   * @default true
   */
  requireAll?: boolean;

  /**
   * Validate each document against the type's wire schema first.
   * @default false
   */
  validate?: boolean;

  /** Logger (default: NOOP_LOGGER) */
  logger?: ReflectLogger;
}

export function loadLayered<T extends InstanceRecord>(
  type: ReflectableType<T>,
  options: LayeredLoadOptions = {},
): LoadOutcome<T> {
  const logger = options.logger ?? NOOP_LOGGER;
  const target = type.create();
  const tracker = new RequiredTracker(type);

  const documents = options.documents ?? [];
  for (const [index, document] of documents.entries()) {
    const source = typeof document === "string" ? { label: `${type.name} document ${index}`, text: document } : document;
    const result = loadDocument(type, source.text, target, {
      tracker,
      label: source.label,
      validate: options.validate,
      logger,
    });
    if (!result.success) {
      return result;
    }
  }

  const overrides = options.overrides ?? [];
  for (const override of overrides) {
    const result = loadPath(type, override, target, { tracker, logger });
    if (!result.success) {
      return result;
    }
  }

  if (options.requireAll ?? true) {
    const check = tracker.check();
    if (!check.success) {
      return check;
    }
  }

  logger.debug("Loaded layered sources", {
    type: type.name,
    documents: documents.length,
    overrides: overrides.length,
  });
  return loaded(target);
}
