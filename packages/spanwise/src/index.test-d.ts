/**
 * Type tests for spanwise
 * Checked by `tsc --noEmit`.
 */
/* eslint-disable @typescript-eslint/no-unused-vars */
import { expectType } from "tsd";
import {
  Spanwise,
  type DurationType,
  type InstantType,
  type HrTime,
  type Result,
  type SpanwiseError,
  type TagOf,
} from "./index";
import { ConversionRangeError, OverflowError } from "./errors";

const { Duration, Instant, TaggedError } = Spanwise;

// =============================================================================
// Duration
// =============================================================================

const second = Duration.fromSeconds(1);
expectType<DurationType>(second);
expectType<bigint>(second.seconds);
expectType<number>(second.nanoseconds);
expectType<"Duration">(second._tag);

// Integer arguments take numbers or bigints
expectType<DurationType>(Duration.fromParts(1n, 500));
expectType<DurationType>(Duration.mul(second, 2n));

// Checked and saturating families
expectType<DurationType | undefined>(Duration.tryAdd(second, second));
expectType<DurationType | undefined>(Duration.tryDiv(second, 2));
expectType<DurationType>(Duration.addSaturating(second, Duration.MAX));

// Accessors
expectType<bigint>(Duration.wholeMilliseconds(second));
expectType<number>(Duration.subsecMicroseconds(second));

// HrTime conversions return Results
expectType<Result<HrTime, ConversionRangeError>>(Duration.toHrTime(second));
expectType<Result<DurationType, ConversionRangeError>>(Duration.fromHrTime([1, 0]));

// Comparison accepts an HrTime on the right
expectType<-1 | 0 | 1>(Duration.compare(second, [1, 0]));

// =============================================================================
// Instant
// =============================================================================

const start = Instant.now();
expectType<InstantType>(start);

// sub is overloaded on its right-hand side
expectType<DurationType>(Instant.sub(start, start));
expectType<InstantType>(Instant.sub(start, second));
expectType<InstantType>(Instant.sub(start, [0, 5]));
expectType<InstantType | undefined>(Instant.tryAdd(start, second));

// =============================================================================
// Errors
// =============================================================================

declare const failure: SpanwiseError;
expectType<"ConversionRangeError" | "OverflowError" | "DivisionByZeroError" | "InvalidFloatError">(
  failure._tag
);

const overflow = new OverflowError({ operation: "add" });
expectType<string>(overflow.operation);
expectType<TagOf<OverflowError>>("OverflowError");

const label = TaggedError.match(failure, {
  ConversionRangeError: (e) => e.target,
  OverflowError: (e) => e.operation,
  DivisionByZeroError: (e) => e.operation,
  InvalidFloatError: (e) => e.value.toString(),
});
expectType<string>(label);

const partial = TaggedError.matchPartial(
  failure,
  { OverflowError: (e) => e.operation },
  (e) => e._tag.length
);
expectType<string | number>(partial);
