/**
 * spanwise/duration (internal)
 *
 * Signed span of time with nanosecond resolution, stored as whole seconds
 * (signed 64-bit range, as a bigint) plus sub-second nanoseconds.
 *
 * Invariant: `nanoseconds` is zero or has the sign of `seconds`, and
 * `|nanoseconds| < 1_000_000_000`.
 *
 * Arithmetic that can overflow comes in three flavours:
 * - `add`, `sub`, `mul`, `div`, `negate` throw (`OverflowError` and friends)
 * - `tryAdd`, `trySub`, `tryMul`, `tryDiv`, `tryNegate` return `undefined`
 * - `addSaturating`, `subSaturating`, `mulSaturating`, `negateSaturating`
 *   clamp to `MIN` / `MAX`
 */

import { ok, err, type Result } from "./result";
import {
  ConversionRangeError,
  DivisionByZeroError,
  InvalidFloatError,
  OverflowError,
} from "./errors";

// =============================================================================
// Types
// =============================================================================

/**
 * A signed span of time.
 */
export interface Duration {
  readonly _tag: "Duration";
  /** Whole seconds, within the signed 64-bit range */
  readonly seconds: bigint;
  /** Sub-second part, same sign as `seconds` */
  readonly nanoseconds: number;
}

/**
 * Node's high-resolution time tuple (`process.hrtime()`): an unsigned
 * duration as `[seconds, nanoseconds]`.
 */
export type HrTime = readonly [seconds: number, nanoseconds: number];

/**
 * Integer argument. A `number` must be an integer to be accepted.
 */
export type IntegerLike = number | bigint;

/** Side of the range an overflowing result fell off. */
export type OverflowDirection = "positive" | "negative";

// =============================================================================
// Limits
// =============================================================================

export const I64_MIN = -(1n << 63n);
export const I64_MAX = (1n << 63n) - 1n;

const NANOS_PER_SECOND = 1_000_000_000;
const NANOS_PER_SECOND_N = 1_000_000_000n;
const TWO_POW_63 = 2 ** 63;
const MAX_SAFE_SECONDS = BigInt(Number.MAX_SAFE_INTEGER);

const SECONDS_PER_MINUTE = 60n;
const SECONDS_PER_HOUR = 3_600n;
const SECONDS_PER_DAY = 86_400n;
const SECONDS_PER_WEEK = 604_800n;

const inI64 = (value: bigint): boolean => value >= I64_MIN && value <= I64_MAX;

const directionOf = (value: bigint): OverflowDirection =>
  value > 0n ? "positive" : "negative";

/** Truncating integer division of two numbers, never yielding -0. */
const truncDiv = (a: number, b: number): number => {
  const q = Math.trunc(a / b);
  return q === 0 ? 0 : q;
};

// =============================================================================
// Construction helpers
// =============================================================================

const make = (seconds: bigint, nanoseconds: number): Duration => {
  const duration: Duration = {
    _tag: "Duration",
    seconds,
    nanoseconds: nanoseconds === 0 ? 0 : nanoseconds,
  };
  return Object.freeze(duration);
};

const toInteger = (value: IntegerLike): bigint | undefined => {
  if (typeof value === "bigint") return value;
  return Number.isInteger(value) ? BigInt(value) : undefined;
};

const toI64 = (value: IntegerLike): bigint | undefined => {
  const integer = toInteger(value);
  return integer !== undefined && inI64(integer) ? integer : undefined;
};

const requireI64 = (value: IntegerLike, operation: string): bigint => {
  const integer = toI64(value);
  if (integer === undefined) {
    throw new ConversionRangeError({
      target: "i64",
      reason: `${operation} expects an integer in the signed 64-bit range`,
      value,
    });
  }
  return integer;
};

const boundary = (direction: OverflowDirection): Duration =>
  direction === "positive" ? MAX : MIN;

const orThrow = (
  result: Result<Duration, OverflowDirection>,
  operation: string
): Duration => {
  if (!result.ok) throw new OverflowError({ operation });
  return result.value;
};

/**
 * Splits an arbitrary-precision nanosecond count into a Duration.
 * Used for values assembled from wide products and quotients.
 * @internal
 */
export const fromWideNanoseconds = (
  nanoseconds: bigint
): Result<Duration, OverflowDirection> => {
  const seconds = nanoseconds / NANOS_PER_SECOND_N;
  if (!inI64(seconds)) return err(directionOf(seconds));
  return ok(make(seconds, Number(nanoseconds % NANOS_PER_SECOND_N)));
};

/**
 * Re-establishes sign consistency after a seconds/nanoseconds combination,
 * checking the seconds range before and after the carry.
 */
const normalize = (
  seconds: bigint,
  nanoseconds: number
): Result<Duration, OverflowDirection> => {
  if (!inI64(seconds)) return err(directionOf(seconds));

  if (nanoseconds >= NANOS_PER_SECOND || (seconds < 0n && nanoseconds > 0)) {
    const carried = seconds + 1n;
    if (carried > I64_MAX) return err("positive");
    return ok(make(carried, nanoseconds - NANOS_PER_SECOND));
  }
  if (nanoseconds <= -NANOS_PER_SECOND || (seconds > 0n && nanoseconds < 0)) {
    const borrowed = seconds - 1n;
    if (borrowed < I64_MIN) return err("negative");
    return ok(make(borrowed, nanoseconds + NANOS_PER_SECOND));
  }
  return ok(make(seconds, nanoseconds));
};

// =============================================================================
// Constants
// =============================================================================

export const ZERO: Duration = make(0n, 0);
export const NANOSECOND: Duration = make(0n, 1);
export const MICROSECOND: Duration = make(0n, 1_000);
export const MILLISECOND: Duration = make(0n, 1_000_000);
export const SECOND: Duration = make(1n, 0);
export const MINUTE: Duration = make(SECONDS_PER_MINUTE, 0);
export const HOUR: Duration = make(SECONDS_PER_HOUR, 0);
export const DAY: Duration = make(SECONDS_PER_DAY, 0);
export const WEEK: Duration = make(SECONDS_PER_WEEK, 0);
/** Adding any negative duration to this overflows. */
export const MIN: Duration = make(I64_MIN, -(NANOS_PER_SECOND - 1));
/** Adding any positive duration to this overflows. */
export const MAX: Duration = make(I64_MAX, NANOS_PER_SECOND - 1);

// =============================================================================
// Constructors
// =============================================================================

/**
 * Create a Duration from seconds and nanoseconds. Nanoseconds of at least
 * ±10^9 carry into the seconds.
 *
 * @example
 * ```typescript
 * fromParts(1, 2_000_000_000); // 3 seconds
 * fromParts(1, -1);            // 0.999999999 seconds
 * ```
 */
export function fromParts(
  seconds: IntegerLike,
  nanoseconds: IntegerLike
): Duration {
  let s = requireI64(seconds, "fromParts");
  let ns = requireI64(nanoseconds, "fromParts");

  s += ns / NANOS_PER_SECOND_N;
  ns %= NANOS_PER_SECOND_N;

  if (s > 0n && ns < 0n) {
    s -= 1n;
    ns += NANOS_PER_SECOND_N;
  } else if (s < 0n && ns > 0n) {
    s += 1n;
    ns -= NANOS_PER_SECOND_N;
  }

  if (!inI64(s)) throw new OverflowError({ operation: "fromParts" });
  return make(s, Number(ns));
}

const scaledSeconds = (
  value: IntegerLike,
  factor: bigint,
  operation: string
): Duration => {
  const seconds = requireI64(value, operation) * factor;
  if (!inI64(seconds)) throw new OverflowError({ operation });
  return make(seconds, 0);
};

export const fromWeeks = (weeks: IntegerLike): Duration =>
  scaledSeconds(weeks, SECONDS_PER_WEEK, "fromWeeks");

export const fromDays = (days: IntegerLike): Duration =>
  scaledSeconds(days, SECONDS_PER_DAY, "fromDays");

export const fromHours = (hours: IntegerLike): Duration =>
  scaledSeconds(hours, SECONDS_PER_HOUR, "fromHours");

export const fromMinutes = (minutes: IntegerLike): Duration =>
  scaledSeconds(minutes, SECONDS_PER_MINUTE, "fromMinutes");

export const fromSeconds = (seconds: IntegerLike): Duration =>
  scaledSeconds(seconds, 1n, "fromSeconds");

const fromSubsecondUnit = (
  value: IntegerLike,
  perSecond: bigint,
  operation: string
): Duration => {
  const count = requireI64(value, operation);
  const nanosPerUnit = NANOS_PER_SECOND_N / perSecond;
  return make(count / perSecond, Number((count % perSecond) * nanosPerUnit));
};

/**
 * Truncating: `fromMilliseconds(-1500)` is -1s and -500ms.
 */
export const fromMilliseconds = (milliseconds: IntegerLike): Duration =>
  fromSubsecondUnit(milliseconds, 1_000n, "fromMilliseconds");

export const fromMicroseconds = (microseconds: IntegerLike): Duration =>
  fromSubsecondUnit(microseconds, 1_000_000n, "fromMicroseconds");

export const fromNanoseconds = (nanoseconds: IntegerLike): Duration =>
  fromSubsecondUnit(nanoseconds, NANOS_PER_SECOND_N, "fromNanoseconds");

// =============================================================================
// Float constructors
// =============================================================================

type Precision = "f64" | "f32";

const identity = (x: number): number => x;

/**
 * Integer part to seconds, fractional part times 10^9 truncated toward zero.
 * In f32 mode the input and every intermediate are rounded to single
 * precision.
 */
const splitFloatSeconds = (
  value: number,
  precision: Precision
): Result<Duration, "nan" | OverflowDirection> => {
  const round = precision === "f32" ? Math.fround : identity;
  const x = round(value);
  if (Number.isNaN(x)) return err("nan");
  if (x >= TWO_POW_63) return err("positive");
  if (x < -TWO_POW_63) return err("negative");

  const fraction = round(x % 1);
  const nanoseconds = Math.trunc(round(fraction * NANOS_PER_SECOND));
  return normalize(BigInt(Math.trunc(x)), nanoseconds);
};

const fromFloat = (
  value: number,
  precision: Precision,
  operation: string
): Duration => {
  const result = splitFloatSeconds(value, precision);
  if (result.ok) return result.value;
  if (result.error === "nan") throw new InvalidFloatError({ operation, value });
  throw new OverflowError({ operation });
};

/**
 * Create a Duration from floating-point seconds. The sub-second part is
 * truncated toward zero, not rounded.
 *
 * @example
 * ```typescript
 * fromSecondsF64(0.5);  // 0s 500_000_000ns
 * fromSecondsF64(-0.5); // 0s -500_000_000ns
 * ```
 */
export const fromSecondsF64 = (seconds: number): Duration =>
  fromFloat(seconds, "f64", "fromSecondsF64");

export const fromSecondsF32 = (seconds: number): Duration =>
  fromFloat(seconds, "f32", "fromSecondsF32");

/** `undefined` for NaN or out-of-range input. */
export const tryFromSecondsF64 = (seconds: number): Duration | undefined => {
  const result = splitFloatSeconds(seconds, "f64");
  return result.ok ? result.value : undefined;
};

export const tryFromSecondsF32 = (seconds: number): Duration | undefined => {
  const result = splitFloatSeconds(seconds, "f32");
  return result.ok ? result.value : undefined;
};

const saturateFloat = (seconds: number, precision: Precision): Duration => {
  const result = splitFloatSeconds(seconds, precision);
  if (result.ok) return result.value;
  return result.error === "nan" ? ZERO : boundary(result.error);
};

/** NaN becomes `ZERO`; out-of-range input clamps to `MIN` / `MAX`. */
export const fromSecondsF64Saturating = (seconds: number): Duration =>
  saturateFloat(seconds, "f64");

export const fromSecondsF32Saturating = (seconds: number): Duration =>
  saturateFloat(seconds, "f32");

// =============================================================================
// Accessors
// =============================================================================

export const wholeWeeks = (d: Duration): bigint => d.seconds / SECONDS_PER_WEEK;
export const wholeDays = (d: Duration): bigint => d.seconds / SECONDS_PER_DAY;
export const wholeHours = (d: Duration): bigint => d.seconds / SECONDS_PER_HOUR;
export const wholeMinutes = (d: Duration): bigint => d.seconds / SECONDS_PER_MINUTE;
export const wholeSeconds = (d: Duration): bigint => d.seconds;

export const wholeMilliseconds = (d: Duration): bigint =>
  d.seconds * 1_000n + BigInt(d.nanoseconds) / 1_000_000n;

export const wholeMicroseconds = (d: Duration): bigint =>
  d.seconds * 1_000_000n + BigInt(d.nanoseconds) / 1_000n;

export const wholeNanoseconds = (d: Duration): bigint =>
  d.seconds * NANOS_PER_SECOND_N + BigInt(d.nanoseconds);

/** Sub-second milliseconds, in (-1000, 1000). */
export const subsecMilliseconds = (d: Duration): number =>
  truncDiv(d.nanoseconds, 1_000_000);

export const subsecMicroseconds = (d: Duration): number =>
  truncDiv(d.nanoseconds, 1_000);

export const subsecNanoseconds = (d: Duration): number => d.nanoseconds;

export const asSecondsF64 = (d: Duration): number =>
  Number(d.seconds) + d.nanoseconds / NANOS_PER_SECOND;

/**
 * Single-precision seconds. Loses sub-second precision quickly as the
 * seconds grow.
 */
export const asSecondsF32 = (d: Duration): number =>
  Math.fround(
    Math.fround(Number(d.seconds)) +
      Math.fround(Math.fround(d.nanoseconds) / NANOS_PER_SECOND)
  );

// =============================================================================
// Predicates
// =============================================================================

export function isDuration(value: unknown): value is Duration {
  return (
    typeof value === "object" &&
    value !== null &&
    "_tag" in value &&
    value._tag === "Duration"
  );
}

export const isZero = (d: Duration): boolean =>
  d.seconds === 0n && d.nanoseconds === 0;

export const isNegative = (d: Duration): boolean =>
  d.seconds < 0n || d.nanoseconds < 0;

export const isPositive = (d: Duration): boolean =>
  d.seconds > 0n || d.nanoseconds > 0;

// =============================================================================
// Sign
// =============================================================================

/**
 * Magnitude of the duration. `MIN` (and anything else with seconds of
 * -2^63) has no positive counterpart and saturates to `MAX`.
 */
export const abs = (d: Duration): Duration => {
  if (d.seconds === I64_MIN) return MAX;
  return make(d.seconds < 0n ? -d.seconds : d.seconds, Math.abs(d.nanoseconds));
};

/**
 * Exact magnitude as a nanosecond count, without saturation.
 * @internal
 */
export const unsignedNanoseconds = (d: Duration): bigint => {
  const total = wholeNanoseconds(d);
  return total < 0n ? -total : total;
};

/**
 * Magnitude as an HrTime, without saturation. Fails when the magnitude's
 * seconds exceed `Number.MAX_SAFE_INTEGER`.
 */
export function unsignedAbs(d: Duration): Result<HrTime, ConversionRangeError> {
  const seconds = d.seconds < 0n ? -d.seconds : d.seconds;
  if (seconds > MAX_SAFE_SECONDS) {
    return err(
      new ConversionRangeError({
        target: "HrTime",
        reason: "seconds exceed Number.MAX_SAFE_INTEGER",
        value: d,
      })
    );
  }
  const hrTime: HrTime = [Number(seconds), Math.abs(d.nanoseconds)];
  return ok(hrTime);
}

const negateResult = (d: Duration): Result<Duration, OverflowDirection> =>
  d.seconds === I64_MIN ? err("positive") : ok(make(-d.seconds, -d.nanoseconds));

/**
 * Flip the sign of both fields. Throws `OverflowError` when seconds are
 * -2^63, whose negation does not fit.
 */
export const negate = (d: Duration): Duration => orThrow(negateResult(d), "negate");

export const tryNegate = (d: Duration): Duration | undefined => {
  const result = negateResult(d);
  return result.ok ? result.value : undefined;
};

export const negateSaturating = (d: Duration): Duration => {
  const result = negateResult(d);
  return result.ok ? result.value : boundary(result.error);
};

// =============================================================================
// Core arithmetic (exact result or overflow direction)
// =============================================================================

const addResult = (a: Duration, b: Duration) =>
  normalize(a.seconds + b.seconds, a.nanoseconds + b.nanoseconds);

const subResult = (a: Duration, b: Duration) =>
  normalize(a.seconds - b.seconds, a.nanoseconds - b.nanoseconds);

const mulResult = (
  d: Duration,
  rhs: bigint
): Result<Duration, OverflowDirection> => {
  const totalNanos = BigInt(d.nanoseconds) * rhs;
  const extraSeconds = totalNanos / NANOS_PER_SECOND_N;
  const nanoseconds = Number(totalNanos % NANOS_PER_SECOND_N);

  const scaled = d.seconds * rhs;
  if (!inI64(scaled)) return err(directionOf(scaled));
  const seconds = scaled + extraSeconds;
  if (!inI64(seconds)) return err(directionOf(seconds));
  return ok(make(seconds, nanoseconds));
};

// =============================================================================
// Checked arithmetic
// =============================================================================

/**
 * `a + b`, or `undefined` on overflow.
 *
 * @example
 * ```typescript
 * tryAdd(MAX, NANOSECOND); // undefined
 * ```
 */
export const tryAdd = (a: Duration, b: Duration): Duration | undefined => {
  const result = addResult(a, b);
  return result.ok ? result.value : undefined;
};

export const trySub = (a: Duration, b: Duration): Duration | undefined => {
  const result = subResult(a, b);
  return result.ok ? result.value : undefined;
};

/**
 * `d * rhs` for an integer `rhs` in the signed 64-bit range; `undefined` on
 * overflow or for any other `rhs`.
 */
export const tryMul = (d: Duration, rhs: IntegerLike): Duration | undefined => {
  const scalar = toI64(rhs);
  if (scalar === undefined) return undefined;
  const result = mulResult(d, scalar);
  return result.ok ? result.value : undefined;
};

/**
 * `d / rhs` for a non-zero integer `rhs` in the signed 64-bit range. The
 * seconds are divided first and their remainder is spread into the
 * nanoseconds. `undefined` for a zero divisor, overflow (`MIN / -1`) or any
 * other `rhs`.
 */
export const tryDiv = (d: Duration, rhs: IntegerLike): Duration | undefined => {
  const scalar = toI64(rhs);
  if (scalar === undefined || scalar === 0n) return undefined;

  const seconds = d.seconds / scalar;
  if (!inI64(seconds)) return undefined;
  const carry = d.seconds - seconds * scalar;
  const extraNanos = (carry * NANOS_PER_SECOND_N) / scalar;
  const nanoseconds = BigInt(d.nanoseconds) / scalar + extraNanos;
  return make(seconds, Number(nanoseconds));
};

// =============================================================================
// Saturating arithmetic
// =============================================================================

/**
 * `a + b`, clamped to `MIN` / `MAX`.
 *
 * @example
 * ```typescript
 * addSaturating(MAX, NANOSECOND);          // MAX
 * addSaturating(MIN, negate(NANOSECOND));  // MIN
 * ```
 */
export const addSaturating = (a: Duration, b: Duration): Duration => {
  const result = addResult(a, b);
  return result.ok ? result.value : boundary(result.error);
};

export const subSaturating = (a: Duration, b: Duration): Duration => {
  const result = subResult(a, b);
  return result.ok ? result.value : boundary(result.error);
};

/**
 * `d * rhs`, clamped to `MIN` / `MAX`. Throws `ConversionRangeError` when
 * `rhs` is not an integer in the signed 64-bit range.
 */
export const mulSaturating = (d: Duration, rhs: IntegerLike): Duration => {
  const result = mulResult(d, requireI64(rhs, "mulSaturating"));
  return result.ok ? result.value : boundary(result.error);
};

// =============================================================================
// HrTime interop
// =============================================================================

/**
 * Convert an HrTime into a Duration. Nanoseconds of 10^9 or more carry into
 * the seconds. Fails for a tuple with negative or fractional components, or
 * seconds beyond the signed 64-bit range.
 */
export function fromHrTime(hrTime: HrTime): Result<Duration, ConversionRangeError> {
  const [seconds, nanoseconds] = hrTime;
  if (
    !Number.isInteger(seconds) ||
    !Number.isInteger(nanoseconds) ||
    seconds < 0 ||
    nanoseconds < 0
  ) {
    return err(
      new ConversionRangeError({
        target: "Duration",
        reason: "HrTime components must be non-negative integers",
        value: hrTime,
      })
    );
  }

  const nanos = BigInt(nanoseconds);
  const wholeSeconds = BigInt(seconds) + nanos / NANOS_PER_SECOND_N;
  if (wholeSeconds > I64_MAX) {
    return err(
      new ConversionRangeError({
        target: "Duration",
        reason: "HrTime seconds exceed the signed 64-bit range",
        value: hrTime,
      })
    );
  }
  return ok(make(wholeSeconds, Number(nanos % NANOS_PER_SECOND_N)));
}

/**
 * Convert a Duration into an HrTime. Fails for a negative duration, or one
 * whose seconds exceed `Number.MAX_SAFE_INTEGER`.
 *
 * @example
 * ```typescript
 * toHrTime(fromMilliseconds(1500)); // ok([1, 500_000_000])
 * toHrTime(fromSeconds(-1));        // err(ConversionRangeError)
 * ```
 */
export function toHrTime(d: Duration): Result<HrTime, ConversionRangeError> {
  if (isNegative(d)) {
    return err(
      new ConversionRangeError({
        target: "HrTime",
        reason: "negative durations have no HrTime representation",
        value: d,
      })
    );
  }
  return unsignedAbs(d);
}

const hrTimeSecondsF64 = ([seconds, nanoseconds]: HrTime): number =>
  seconds + nanoseconds / NANOS_PER_SECOND;

const toDuration = (value: Duration | HrTime): Duration => {
  if (isDuration(value)) return value;
  const result = fromHrTime(value);
  if (!result.ok) throw result.error;
  return result.value;
};

// =============================================================================
// Panicking arithmetic
// =============================================================================

/**
 * `a + b`. `b` may be an HrTime. Throws `OverflowError` on overflow and
 * `ConversionRangeError` for an HrTime that does not convert.
 *
 * @example
 * ```typescript
 * add(fromSeconds(5), fromSeconds(5)); // 10 seconds
 * add(fromSeconds(1), [0, 250_000_000]); // 1.25 seconds
 * ```
 */
export const add = (a: Duration, b: Duration | HrTime): Duration =>
  orThrow(addResult(a, toDuration(b)), "add");

export const sub = (a: Duration, b: Duration | HrTime): Duration =>
  orThrow(subResult(a, toDuration(b)), "sub");

/**
 * `hrTime - d`, yielding a signed Duration.
 */
export const hrTimeSub = (hrTime: HrTime, d: Duration): Duration =>
  sub(toDuration(hrTime), d);

/**
 * `d * rhs`.
 *
 * An integer `rhs` (bigint, or a number without a fractional part) scales
 * the whole nanosecond count exactly. A fractional `rhs` goes through
 * floating-point seconds, truncating the result's sub-second part.
 *
 * @example
 * ```typescript
 * mul(fromSeconds(2), 3);   // 6 seconds
 * mul(fromSeconds(2), 1.5); // 3 seconds
 * ```
 */
export const mul = (d: Duration, rhs: IntegerLike): Duration => {
  const scalar = toInteger(rhs);
  if (scalar !== undefined) {
    return orThrow(fromWideNanoseconds(wholeNanoseconds(d) * scalar), "mul");
  }
  return fromFloat(asSecondsF64(d) * Number(rhs), "f64", "mul");
};

/** `d * rhs` in single precision. */
export const mulF32 = (d: Duration, rhs: number): Duration =>
  fromFloat(Math.fround(asSecondsF32(d) * Math.fround(rhs)), "f32", "mulF32");

/**
 * `d / rhs`. An integer `rhs` truncates the whole nanosecond count and
 * throws `DivisionByZeroError` for zero; a fractional `rhs` goes through
 * floating-point seconds.
 */
export const div = (d: Duration, rhs: IntegerLike): Duration => {
  const scalar = toInteger(rhs);
  if (scalar !== undefined) {
    if (scalar === 0n) throw new DivisionByZeroError({ operation: "div" });
    return orThrow(fromWideNanoseconds(wholeNanoseconds(d) / scalar), "div");
  }
  return fromFloat(asSecondsF64(d) / Number(rhs), "f64", "div");
};

/** `d / rhs` in single precision. */
export const divF32 = (d: Duration, rhs: number): Duration =>
  fromFloat(Math.fround(asSecondsF32(d) / Math.fround(rhs)), "f32", "divF32");

/**
 * Dimensionless ratio of two spans, as floating-point seconds.
 *
 * @example
 * ```typescript
 * ratio(fromSeconds(3), fromSeconds(2)); // 1.5
 * ```
 */
export const ratio = (a: Duration, b: Duration | HrTime): number =>
  asSecondsF64(a) / (isDuration(b) ? asSecondsF64(b) : hrTimeSecondsF64(b));

/**
 * Sum of the durations; `ZERO` when empty. Throws `OverflowError` on
 * overflow.
 */
export function sum(durations: Iterable<Duration>): Duration {
  let total = ZERO;
  for (const d of durations) total = add(total, d);
  return total;
}

// =============================================================================
// Comparison
// =============================================================================

const compareDurations = (a: Duration, b: Duration): number => {
  if (a.seconds !== b.seconds) return a.seconds < b.seconds ? -1 : 1;
  if (a.nanoseconds !== b.nanoseconds) return a.nanoseconds < b.nanoseconds ? -1 : 1;
  return 0;
};

const sign = (n: number): -1 | 0 | 1 => (n < 0 ? -1 : n > 0 ? 1 : 0);

/**
 * -1, 0 or 1, ordering by seconds then nanoseconds. An HrTime that does not
 * convert to a Duration compares greater.
 */
export function compare(a: Duration, b: Duration | HrTime): -1 | 0 | 1 {
  if (isDuration(b)) return sign(compareDurations(a, b));
  const converted = fromHrTime(b);
  return converted.ok ? sign(compareDurations(a, converted.value)) : -1;
}

export const equals = (a: Duration, b: Duration | HrTime): boolean =>
  compare(a, b) === 0;

export const lessThan = (a: Duration, b: Duration | HrTime): boolean =>
  compare(a, b) < 0;

export const lessThanOrEqual = (a: Duration, b: Duration | HrTime): boolean =>
  compare(a, b) <= 0;

export const greaterThan = (a: Duration, b: Duration | HrTime): boolean =>
  compare(a, b) > 0;

export const greaterThanOrEqual = (a: Duration, b: Duration | HrTime): boolean =>
  compare(a, b) >= 0;

export const min = (a: Duration, b: Duration): Duration =>
  compareDurations(a, b) <= 0 ? a : b;

export const max = (a: Duration, b: Duration): Duration =>
  compareDurations(a, b) >= 0 ? a : b;

export const clamp = (d: Duration, lower: Duration, upper: Duration): Duration =>
  min(max(d, lower), upper);

// =============================================================================
// Namespace
// =============================================================================

/**
 * Duration namespace for grouped access.
 *
 * @example
 * ```typescript
 * const timeout = Duration.fromSeconds(30);
 * const remaining = Duration.subSaturating(timeout, Duration.fromMilliseconds(250));
 * ```
 */
export const Duration = {
  ZERO,
  NANOSECOND,
  MICROSECOND,
  MILLISECOND,
  SECOND,
  MINUTE,
  HOUR,
  DAY,
  WEEK,
  MIN,
  MAX,
  fromParts,
  fromWeeks,
  fromDays,
  fromHours,
  fromMinutes,
  fromSeconds,
  fromMilliseconds,
  fromMicroseconds,
  fromNanoseconds,
  fromSecondsF64,
  fromSecondsF32,
  tryFromSecondsF64,
  tryFromSecondsF32,
  fromSecondsF64Saturating,
  fromSecondsF32Saturating,
  wholeWeeks,
  wholeDays,
  wholeHours,
  wholeMinutes,
  wholeSeconds,
  wholeMilliseconds,
  wholeMicroseconds,
  wholeNanoseconds,
  subsecMilliseconds,
  subsecMicroseconds,
  subsecNanoseconds,
  asSecondsF64,
  asSecondsF32,
  isDuration,
  isZero,
  isNegative,
  isPositive,
  abs,
  unsignedAbs,
  negate,
  tryNegate,
  negateSaturating,
  add,
  sub,
  hrTimeSub,
  mul,
  mulF32,
  div,
  divF32,
  ratio,
  sum,
  tryAdd,
  trySub,
  tryMul,
  tryDiv,
  addSaturating,
  subSaturating,
  mulSaturating,
  fromHrTime,
  toHrTime,
  compare,
  equals,
  lessThan,
  lessThanOrEqual,
  greaterThan,
  greaterThanOrEqual,
  min,
  max,
  clamp,
} as const;
