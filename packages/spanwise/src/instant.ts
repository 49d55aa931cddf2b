/**
 * spanwise/instant (internal)
 *
 * Opaque point on a monotonic clock. Only differences between instants read
 * from the same clock are meaningful.
 */

import {
  ZERO,
  fromHrTime,
  fromWideNanoseconds,
  isDuration,
  isNegative,
  isZero,
  negate,
  unsignedNanoseconds,
  type Duration,
  type HrTime,
} from "./duration";
import { systemClock, type MonotonicClock } from "./clock";
import { ConversionRangeError, OverflowError } from "./errors";

// =============================================================================
// Types
// =============================================================================

export interface Instant {
  readonly _tag: "Instant";
  /** Nanoseconds from the clock's origin, within the unsigned 64-bit range */
  readonly reading: bigint;
}

const U64_MAX = (1n << 64n) - 1n;

const make = (reading: bigint): Instant => {
  const instant: Instant = { _tag: "Instant", reading };
  return Object.freeze(instant);
};

const inU64 = (value: bigint): boolean => value >= 0n && value <= U64_MAX;

// =============================================================================
// Construction
// =============================================================================

/**
 * Wrap a raw clock reading. Throws `ConversionRangeError` outside the
 * unsigned 64-bit range.
 */
export function fromReading(reading: bigint): Instant {
  if (!inU64(reading)) {
    throw new ConversionRangeError({
      target: "Instant",
      reason: "readings must be in the unsigned 64-bit range",
      value: reading,
    });
  }
  return make(reading);
}

/**
 * Current instant of `clock`.
 */
export const now = (clock: MonotonicClock = systemClock): Instant =>
  fromReading(clock.now());

export function isInstant(value: unknown): value is Instant {
  return (
    typeof value === "object" &&
    value !== null &&
    "_tag" in value &&
    value._tag === "Instant"
  );
}

// =============================================================================
// Arithmetic
// =============================================================================

const between = (a: Instant, b: Instant): Duration => {
  if (a.reading === b.reading) return ZERO;
  const later = a.reading > b.reading;
  const magnitude = fromWideNanoseconds(
    later ? a.reading - b.reading : b.reading - a.reading
  );
  if (!magnitude.ok) throw new OverflowError({ operation: "Instant.sub" });
  return later ? magnitude.value : negate(magnitude.value);
};

/** Moves `i` by `|d|`, later when `forward` matches the sign of `d`. */
const shift = (i: Instant, d: Duration, forward: boolean): Instant | undefined => {
  if (isZero(d)) return i;
  const magnitude = unsignedNanoseconds(d);
  const later = isNegative(d) !== forward;
  const reading = later ? i.reading + magnitude : i.reading - magnitude;
  return inU64(reading) ? make(reading) : undefined;
};

const toDuration = (d: Duration | HrTime): Duration => {
  if (isDuration(d)) return d;
  const converted = fromHrTime(d);
  if (!converted.ok) throw converted.error;
  return converted.value;
};

/**
 * `i + d`, or `undefined` when the result leaves the clock's range.
 */
export const tryAdd = (i: Instant, d: Duration): Instant | undefined =>
  shift(i, d, true);

export const trySub = (i: Instant, d: Duration): Instant | undefined =>
  shift(i, d, false);

/**
 * `i + d`. Throws `OverflowError` when the result leaves the clock's range.
 */
export function add(i: Instant, d: Duration | HrTime): Instant {
  const shifted = shift(i, toDuration(d), true);
  if (shifted === undefined) throw new OverflowError({ operation: "Instant.add" });
  return shifted;
}

/**
 * Signed duration from `b` to `a`, negative when `a` is earlier.
 *
 * @example
 * ```typescript
 * const start = Instant.now();
 * doWork();
 * const took = Instant.sub(Instant.now(), start);
 * ```
 */
export function sub(a: Instant, b: Instant): Duration;
/**
 * `i - d`. Throws `OverflowError` when the result leaves the clock's range.
 */
export function sub(i: Instant, d: Duration | HrTime): Instant;
export function sub(a: Instant, b: Instant | Duration | HrTime): Duration | Instant {
  if (isInstant(b)) return between(a, b);
  const shifted = shift(a, toDuration(b), false);
  if (shifted === undefined) throw new OverflowError({ operation: "Instant.sub" });
  return shifted;
}

/**
 * Time passed since `i` on `clock`. Negative if the clock reads earlier than
 * `i`.
 */
export const elapsed = (i: Instant, clock: MonotonicClock = systemClock): Duration =>
  between(now(clock), i);

// =============================================================================
// Comparison
// =============================================================================

export const compare = (a: Instant, b: Instant): -1 | 0 | 1 =>
  a.reading < b.reading ? -1 : a.reading > b.reading ? 1 : 0;

export const equals = (a: Instant, b: Instant): boolean => a.reading === b.reading;

export const lessThan = (a: Instant, b: Instant): boolean => a.reading < b.reading;

export const greaterThan = (a: Instant, b: Instant): boolean => a.reading > b.reading;

// =============================================================================
// Namespace
// =============================================================================

/**
 * Instant namespace for grouped access.
 */
export const Instant = {
  now,
  elapsed,
  fromReading,
  isInstant,
  add,
  sub,
  tryAdd,
  trySub,
  compare,
  equals,
  lessThan,
  greaterThan,
} as const;
