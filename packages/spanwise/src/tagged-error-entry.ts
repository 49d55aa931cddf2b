/**
 * spanwise/tagged-error
 *
 * Tagged error classes: type-safe errors with discriminated unions.
 *
 * @example
 * ```typescript
 * import { TaggedError, type TagOf, type PropsOf } from 'spanwise/tagged-error';
 *
 * class DeadlineMissed extends TaggedError('DeadlineMissed')<{ late: DurationType }> {}
 * class ClockDrift extends TaggedError('ClockDrift', {
 *   message: (p: { skewNs: bigint }) => `clock drifted by ${p.skewNs}ns`,
 * }) {}
 *
 * const error = new ClockDrift({ skewNs: 1_500n });
 * error._tag // 'ClockDrift'
 * error.message // 'clock drifted by 1500ns'
 * ```
 */

export {
  // Factory function
  TaggedError,

  // Types
  type TaggedErrorBase,
  type TaggedErrorOptions,
  type TaggedErrorCreateOptions,
  type TaggedErrorConstructor,
  type TaggedErrorGenericConstructor,

  // Type utilities
  type TagOf,
  type ErrorByTag,
  type PropsOf,
} from "./tagged-error";
