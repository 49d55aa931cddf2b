/**
 * spanwise/duration
 *
 * Signed nanosecond-precision durations.
 *
 * @example
 * ```typescript
 * import { Duration, type DurationType } from 'spanwise/duration';
 *
 * const timeout: DurationType = Duration.fromSeconds(30);
 * Duration.tryAdd(timeout, Duration.MAX); // undefined
 * Duration.addSaturating(timeout, Duration.MAX); // Duration.MAX
 * ```
 */

export {
  // Namespace
  type Duration as DurationType,
  Duration,

  // Types
  type HrTime,
  type IntegerLike,
  type OverflowDirection,

  // Constants
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

  // Constructors
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

  // Accessors
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

  // Predicates
  isDuration,
  isZero,
  isNegative,
  isPositive,

  // Sign
  abs,
  unsignedAbs,
  negate,
  tryNegate,
  negateSaturating,

  // Arithmetic
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

  // HrTime
  fromHrTime,
  toHrTime,

  // Comparison
  compare,
  equals,
  lessThan,
  lessThanOrEqual,
  greaterThan,
  greaterThanOrEqual,
  min,
  max,
  clamp,
} from "./duration";
