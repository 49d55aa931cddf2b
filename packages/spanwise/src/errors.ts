/**
 * spanwise/errors
 *
 * Error types raised by the panicking side of the Duration and Instant APIs,
 * and carried inside the `Err` of the conversion Results.
 *
 * @example
 * ```typescript
 * import { TaggedError } from 'spanwise/tagged-error';
 * import { isSpanwiseError } from 'spanwise/errors';
 *
 * try {
 *   Duration.add(Duration.MAX, Duration.NANOSECOND);
 * } catch (error) {
 *   if (!isSpanwiseError(error)) throw error;
 *   TaggedError.match(error, {
 *     OverflowError: (e) => `overflow in ${e.operation}`,
 *     ConversionRangeError: (e) => e.reason,
 *     DivisionByZeroError: (e) => `${e.operation} by zero`,
 *     InvalidFloatError: (e) => `bad float ${e.value}`,
 *   });
 * }
 * ```
 */

import { TaggedError } from "./tagged-error";

/**
 * A value cannot be represented in the target type of a conversion: a
 * negative Duration into an HrTime, an HrTime beyond the signed 64-bit
 * seconds range, or a fractional number where an integer is required.
 *
 * @example
 * ```typescript
 * const error = new ConversionRangeError({
 *   target: 'HrTime',
 *   reason: 'negative durations have no HrTime representation',
 * });
 * console.log(error.message);
 * // "ConversionRangeError: negative durations have no HrTime representation (target: HrTime)"
 * ```
 */
export class ConversionRangeError extends TaggedError("ConversionRangeError", {
  message: (p: {
    /** Type the value was being converted into */
    target: string;
    /** Why the value does not fit */
    reason: string;
    /** Offending input */
    value?: unknown;
  }) => `ConversionRangeError: ${p.reason} (target: ${p.target})`,
}) {}

/**
 * Arithmetic left the representable range.
 *
 * @example
 * ```typescript
 * const error = new OverflowError({ operation: 'add' });
 * console.log(error.message); // "OverflowError: add overflowed the representable range"
 * ```
 */
export class OverflowError extends TaggedError("OverflowError", {
  message: (p: {
    /** Operation that overflowed */
    operation: string;
  }) => `OverflowError: ${p.operation} overflowed the representable range`,
}) {}

/**
 * Integer division by zero.
 */
export class DivisionByZeroError extends TaggedError("DivisionByZeroError", {
  message: (p: {
    /** Operation that received the zero divisor */
    operation: string;
  }) => `DivisionByZeroError: ${p.operation} divided by zero`,
}) {}

/**
 * A float constructor received NaN.
 */
export class InvalidFloatError extends TaggedError("InvalidFloatError", {
  message: (p: { operation: string; value: number }) =>
    `InvalidFloatError: ${p.operation} received ${p.value}`,
}) {}

/**
 * Union of every error this package raises.
 */
export type SpanwiseError =
  | ConversionRangeError
  | OverflowError
  | DivisionByZeroError
  | InvalidFloatError;

const SPANWISE_TAGS: ReadonlySet<string> = new Set([
  "ConversionRangeError",
  "OverflowError",
  "DivisionByZeroError",
  "InvalidFloatError",
]);

export function isConversionRangeError(
  error: unknown
): error is ConversionRangeError {
  return (
    TaggedError.isTaggedError(error) && error._tag === "ConversionRangeError"
  );
}

export function isOverflowError(error: unknown): error is OverflowError {
  return TaggedError.isTaggedError(error) && error._tag === "OverflowError";
}

export function isDivisionByZeroError(
  error: unknown
): error is DivisionByZeroError {
  return (
    TaggedError.isTaggedError(error) && error._tag === "DivisionByZeroError"
  );
}

export function isInvalidFloatError(error: unknown): error is InvalidFloatError {
  return TaggedError.isTaggedError(error) && error._tag === "InvalidFloatError";
}

/**
 * Check if an error is any SpanwiseError.
 */
export function isSpanwiseError(error: unknown): error is SpanwiseError {
  return TaggedError.isTaggedError(error) && SPANWISE_TAGS.has(error._tag);
}
