/**
 * spanwise
 *
 * Signed nanosecond durations and monotonic instants.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { Spanwise } from 'spanwise';
 *
 * const { Duration, Instant } = Spanwise;
 *
 * const start = Instant.now();
 * await work();
 * const took = Instant.elapsed(start);
 *
 * if (Duration.greaterThan(took, Duration.fromMilliseconds(200))) {
 *   console.warn(`slow: ${Duration.asSecondsF64(took)}s`);
 * }
 * ```
 *
 * ## Entry Points
 *
 * - `spanwise` - Spanwise namespace plus named exports
 * - `spanwise/duration` - Duration values and arithmetic
 * - `spanwise/instant` - Monotonic instants
 * - `spanwise/clock` - Reading sources and regression guarding
 * - `spanwise/measure` - timeFn / timeAsync
 * - `spanwise/result` - Result primitives used by the conversions
 * - `spanwise/errors` - Error classes and guards
 * - `spanwise/tagged-error` - TaggedError factory
 * - `spanwise/testing` - Deterministic test clock
 */

import * as result from "./result";
import { Duration } from "./duration";
import { Instant } from "./instant";
import { TaggedError } from "./tagged-error";
import { systemClock, createMonotonicClock } from "./clock";
import { timeFn, timeAsync } from "./measure";

// =============================================================================
// Spanwise namespace
// =============================================================================

const Spanwise = {
  // Result (all value exports)
  ...result,
  Duration,
  Instant,
  TaggedError,
  systemClock,
  createMonotonicClock,
  timeFn,
  timeAsync,
} as const;

export { Spanwise };

// =============================================================================
// Named value exports (tree-shake friendly)
// =============================================================================

export {
  ok,
  err,
  UnwrapError,
  unwrap,
} from "./result";

export { Duration } from "./duration";
export { Instant } from "./instant";
export { TaggedError } from "./tagged-error";
export { systemClock, createMonotonicClock } from "./clock";
export { timeFn, timeAsync } from "./measure";
export {
  ConversionRangeError,
  OverflowError,
  DivisionByZeroError,
  InvalidFloatError,
  isSpanwiseError,
} from "./errors";

// =============================================================================
// Type exports
// =============================================================================

export type { Ok, Err, Result } from "./result";
export type {
  Duration as DurationType,
  HrTime,
  IntegerLike,
} from "./duration";
export type { Instant as InstantType } from "./instant";
export type {
  MonotonicClock,
  MonotonicClockOptions,
  ClockEvent,
} from "./clock";
export type { SpanwiseError } from "./errors";
export type {
  TaggedErrorBase,
  TagOf,
  ErrorByTag,
  PropsOf,
} from "./tagged-error";
