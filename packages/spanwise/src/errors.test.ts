/**
 * Tests for errors.ts
 */
import { describe, it, expect } from "vitest";
import { TaggedError } from "./tagged-error";
import {
  ConversionRangeError,
  OverflowError,
  DivisionByZeroError,
  InvalidFloatError,
  isConversionRangeError,
  isOverflowError,
  isDivisionByZeroError,
  isInvalidFloatError,
  isSpanwiseError,
  type SpanwiseError,
} from "./errors";

describe("Errors", () => {
  describe("ConversionRangeError", () => {
    it("creates error with target and reason", () => {
      const error = new ConversionRangeError({
        target: "HrTime",
        reason: "negative durations have no HrTime representation",
        value: -1,
      });
      expect(error._tag).toBe("ConversionRangeError");
      expect(error.target).toBe("HrTime");
      expect(error.value).toBe(-1);
      expect(error.message).toBe(
        "ConversionRangeError: negative durations have no HrTime representation (target: HrTime)"
      );
    });

    it("is instance of TaggedError", () => {
      const error = new ConversionRangeError({ target: "i64", reason: "too big" });
      expect(error instanceof TaggedError).toBe(true);
      expect(error instanceof Error).toBe(true);
      expect(error.name).toBe("ConversionRangeError");
    });
  });

  describe("OverflowError", () => {
    it("names the operation in the message", () => {
      const error = new OverflowError({ operation: "add" });
      expect(error.operation).toBe("add");
      expect(error.message).toBe(
        "OverflowError: add overflowed the representable range"
      );
    });

    it("keeps a cause", () => {
      const cause = new Error("root");
      const error = new OverflowError({ operation: "mul" }, { cause });
      expect(error.cause).toBe(cause);
    });
  });

  describe("DivisionByZeroError", () => {
    it("creates error with operation", () => {
      const error = new DivisionByZeroError({ operation: "div" });
      expect(error.message).toBe("DivisionByZeroError: div divided by zero");
    });
  });

  describe("InvalidFloatError", () => {
    it("includes the offending value", () => {
      const error = new InvalidFloatError({
        operation: "fromSecondsF64",
        value: Number.NaN,
      });
      expect(error.message).toBe(
        "InvalidFloatError: fromSecondsF64 received NaN"
      );
    });
  });

  describe("type guards", () => {
    const errors: SpanwiseError[] = [
      new ConversionRangeError({ target: "HrTime", reason: "r" }),
      new OverflowError({ operation: "add" }),
      new DivisionByZeroError({ operation: "div" }),
      new InvalidFloatError({ operation: "mul", value: Number.NaN }),
    ];

    it("each guard matches only its own error", () => {
      expect(errors.map(isConversionRangeError)).toEqual([true, false, false, false]);
      expect(errors.map(isOverflowError)).toEqual([false, true, false, false]);
      expect(errors.map(isDivisionByZeroError)).toEqual([false, false, true, false]);
      expect(errors.map(isInvalidFloatError)).toEqual([false, false, false, true]);
    });

    it("isSpanwiseError matches all package errors", () => {
      expect(errors.every(isSpanwiseError)).toBe(true);
    });

    it("rejects foreign errors", () => {
      class Other extends TaggedError("Other") {}
      expect(isSpanwiseError(new Other())).toBe(false);
      expect(isSpanwiseError(new Error("plain"))).toBe(false);
      expect(isSpanwiseError({ _tag: "OverflowError" })).toBe(false);
      expect(isSpanwiseError(null)).toBe(false);
    });
  });

  describe("TaggedError.match", () => {
    it("dispatches on the tag", () => {
      const label = (error: SpanwiseError): string =>
        TaggedError.match(error, {
          ConversionRangeError: (e) => `range:${e.target}`,
          OverflowError: (e) => `overflow:${e.operation}`,
          DivisionByZeroError: (e) => `zero:${e.operation}`,
          InvalidFloatError: (e) => `float:${e.operation}`,
        });

      expect(label(new OverflowError({ operation: "sub" }))).toBe("overflow:sub");
      expect(
        label(new ConversionRangeError({ target: "Duration", reason: "r" }))
      ).toBe("range:Duration");
    });
  });
});
