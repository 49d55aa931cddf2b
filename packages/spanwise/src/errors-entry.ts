/**
 * spanwise/errors entry point
 *
 * Errors raised by the Duration and Instant APIs.
 */
export {
  // Errors
  ConversionRangeError,
  OverflowError,
  DivisionByZeroError,
  InvalidFloatError,
  // Union type
  type SpanwiseError,
  // Type guards
  isConversionRangeError,
  isOverflowError,
  isDivisionByZeroError,
  isInvalidFloatError,
  isSpanwiseError,
} from "./errors";
