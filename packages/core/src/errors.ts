export type ReflectErrorCode =
  | "SHAPE_MISMATCH"
  | "RANGE_OVERFLOW"
  | "VARIANT_TAG_INVALID"
  | "NAME_UNRESOLVED"
  | "REQUIRED_MISSING"
  | "DEFINITION_ERROR"
  | "ENCODE_ERROR"
  | "PARSE_ERROR";

export class ReflectError extends Error {
  readonly code: ReflectErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: ReflectErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.code = code;
    this.details = details;
    this.name = this.constructor.name;
  }
}

/** Input kind does not match the field category, or a fixed-size container has the wrong length. */
export class ShapeMismatchError extends ReflectError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("SHAPE_MISMATCH", message, details);
  }
}

export class RangeOverflowError extends ReflectError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("RANGE_OVERFLOW", message, details);
  }
}

export class VariantTagError extends ReflectError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("VARIANT_TAG_INVALID", message, details);
  }
}

export class NameUnresolvedError extends ReflectError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("NAME_UNRESOLVED", message, details);
  }
}

export class RequiredMissingError extends ReflectError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("REQUIRED_MISSING", message, details);
  }
}

/** Thrown while registering a type whose declaration is unusable. */
export class ReflectDefinitionError extends ReflectError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("DEFINITION_ERROR", message, details);
  }
}

/** Thrown when a value does not belong to its declared field category. */
export class ReflectEncodeError extends ReflectError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("ENCODE_ERROR", message, details);
  }
}

// ============================================================
// Load results
// ============================================================

export interface LoadFailure {
  success: false;
  error: ReflectError;
}

/** Result of loading into an existing target. */
export type LoadResult = { success: true } | LoadFailure;

/** Result of loading a value that the caller stores. */
export type LoadOutcome<T> = { success: true; value: T } | LoadFailure;

export const LOADED: LoadResult = Object.freeze({ success: true });

export function loaded<T>(value: T): LoadOutcome<T> {
  return { success: true, value };
}

export function failed(error: ReflectError): LoadFailure {
  return { success: false, error };
}
