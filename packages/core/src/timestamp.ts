/**
 * Absolute time points at microsecond resolution. `Date` holds whole
 * milliseconds only, so time points keep their own microsecond count and
 * convert to `Date` on request.
 *
 * @example
 * ```ts
 * const at = Timestamp.fromEpochMicros(1_700_000_000_123_456n);
 * at.toDate(); // 2023-11-14T22:13:20.123Z
 * at.toISOString(); // "2023-11-14T22:13:20.123456Z"
 * ```
 */

const MICROS_PER_MILLI = 1000n;

export class Timestamp {
  /** Bounds of a signed 64-bit microsecond count */
  static readonly MIN_MICROS = -(2n ** 63n);
  static readonly MAX_MICROS = 2n ** 63n - 1n;

  /** 1970-01-01T00:00:00Z */
  static readonly EPOCH = new Timestamp(0n);

  /** Microseconds since 1970-01-01T00:00:00Z */
  readonly epochMicros: bigint;

  private constructor(epochMicros: bigint) {
    this.epochMicros = epochMicros;
  }

  static isValidMicros(micros: bigint): boolean {
    return micros >= Timestamp.MIN_MICROS && micros <= Timestamp.MAX_MICROS;
  }

  /**
   * @throws RangeError when `micros` is not an integer or outside the signed 64-bit range
   */
  static fromEpochMicros(micros: bigint | number): Timestamp {
    if (typeof micros === "number" && !Number.isInteger(micros)) {
      throw new RangeError(`Timestamp needs a whole number of microseconds, got ${micros}`);
    }
    const value = BigInt(micros);
    if (!Timestamp.isValidMicros(value)) {
      throw new RangeError(`${value}us is outside the representable time range`);
    }
    return new Timestamp(value);
  }

  /** @throws RangeError for an invalid `Date` */
  static fromDate(date: Date): Timestamp {
    const millis = date.getTime();
    if (Number.isNaN(millis)) {
      throw new RangeError("Invalid Date");
    }
    return new Timestamp(BigInt(millis) * MICROS_PER_MILLI);
  }

  static now(): Timestamp {
    return Timestamp.fromDate(new Date());
  }

  /** The whole millisecond at or before this time point. */
  toDate(): Date {
    return new Date(Number(this.wholeMillis()));
  }

  /** Microseconds past {@link toDate}, from 0 to 999. */
  get subMillisecondMicros(): number {
    return Number(this.epochMicros - this.wholeMillis() * MICROS_PER_MILLI);
  }

  equals(other: Timestamp): boolean {
    return this.epochMicros === other.epochMicros;
  }

  /** ISO 8601 with six fractional digits. Throws outside the `Date` range. */
  toISOString(): string {
    const iso = this.toDate().toISOString();
    return `${iso.slice(0, -1)}${String(this.subMillisecondMicros).padStart(3, "0")}Z`;
  }

  private wholeMillis(): bigint {
    const quotient = this.epochMicros / MICROS_PER_MILLI;
    return this.epochMicros % MICROS_PER_MILLI < 0n ? quotient - 1n : quotient;
  }
}
