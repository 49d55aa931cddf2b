import { describe, it, expect } from "vitest";
import { Instant } from "./instant";
import { Duration } from "./duration";
import { ConversionRangeError, OverflowError } from "./errors";
import { createTestClock } from "./testing";

const U64_MAX = 2n ** 64n - 1n;

describe("Instant", () => {
  describe("now", () => {
    it("samples the system clock by default", () => {
      const instant = Instant.now();
      expect(Instant.isInstant(instant)).toBe(true);
      expect(instant.reading >= 0n).toBe(true);
    });

    it("samples the given clock", () => {
      const clock = createTestClock({ start: 42n });
      expect(Instant.now(clock).reading).toBe(42n);
    });
  });

  describe("sub between instants", () => {
    it("is non-negative for a later instant and antisymmetric", () => {
      const b = Instant.now();
      let a = Instant.now();
      while (a.reading === b.reading) a = Instant.now();

      const forward = Instant.sub(a, b);
      expect(Duration.isNegative(forward)).toBe(false);
      expect(Instant.sub(b, a)).toEqual(Duration.negate(forward));
    });

    it("measures deterministic gaps", () => {
      const clock = createTestClock({ start: 1_000n });
      const b = Instant.now(clock);
      clock.advance(Duration.fromMilliseconds(1500));
      const a = Instant.now(clock);

      expect(Instant.sub(a, b)).toEqual(Duration.fromMilliseconds(1500));
      expect(Instant.sub(b, a)).toEqual(Duration.fromMilliseconds(-1500));
      expect(Instant.sub(a, a)).toBe(Duration.ZERO);
    });

    it("covers the whole reading range", () => {
      expect(Instant.sub(Instant.fromReading(U64_MAX), Instant.fromReading(0n))).toEqual(
        Duration.fromParts(18_446_744_073n, 709_551_615)
      );
    });
  });

  describe("fromReading", () => {
    it("accepts the unsigned 64-bit range", () => {
      expect(Instant.fromReading(0n).reading).toBe(0n);
      expect(Instant.fromReading(U64_MAX).reading).toBe(U64_MAX);
    });

    it("rejects readings outside it", () => {
      expect(() => Instant.fromReading(-1n)).toThrow(ConversionRangeError);
      expect(() => Instant.fromReading(2n ** 64n)).toThrow(
        "ConversionRangeError: readings must be in the unsigned 64-bit range (target: Instant)"
      );
    });
  });

  describe("tryAdd / trySub", () => {
    const ten = Instant.fromReading(10n);

    it("moves by the duration in either direction", () => {
      expect(Instant.tryAdd(ten, Duration.NANOSECOND)?.reading).toBe(11n);
      expect(Instant.tryAdd(ten, Duration.fromNanoseconds(-10))?.reading).toBe(0n);
      expect(Instant.trySub(ten, Duration.fromNanoseconds(-5))?.reading).toBe(15n);
      expect(Instant.trySub(ten, Duration.fromNanoseconds(4))?.reading).toBe(6n);
    });

    it("returns the same instant for a zero duration", () => {
      expect(Instant.tryAdd(ten, Duration.ZERO)).toBe(ten);
      expect(Instant.trySub(ten, Duration.ZERO)).toBe(ten);
    });

    it("returns undefined outside the reading range", () => {
      expect(Instant.tryAdd(ten, Duration.fromNanoseconds(-11))).toBeUndefined();
      expect(Instant.trySub(ten, Duration.fromNanoseconds(11))).toBeUndefined();
      expect(Instant.tryAdd(Instant.fromReading(U64_MAX), Duration.NANOSECOND)).toBeUndefined();
      expect(Instant.tryAdd(ten, Duration.MAX)).toBeUndefined();
    });
  });

  describe("add / sub with a duration", () => {
    it("accepts Durations and HrTimes", () => {
      const start = Instant.fromReading(100n);
      expect(Instant.add(start, [1, 5]).reading).toBe(1_000_000_105n);
      expect(Instant.sub(start, Duration.fromNanoseconds(40)).reading).toBe(60n);
      expect(Instant.sub(start, [0, 100]).reading).toBe(0n);
    });

    it("throws OverflowError outside the reading range", () => {
      expect(() => Instant.add(Instant.fromReading(0n), Duration.fromNanoseconds(-1))).toThrow(
        "OverflowError: Instant.add overflowed the representable range"
      );
      expect(() => Instant.sub(Instant.fromReading(0n), Duration.NANOSECOND)).toThrow(
        OverflowError
      );
    });
  });

  describe("elapsed", () => {
    it("measures against the clock", () => {
      const clock = createTestClock();
      const start = Instant.now(clock);
      clock.advance(Duration.SECOND);
      expect(Instant.elapsed(start, clock)).toEqual(Duration.SECOND);
    });

    it("is negative when the clock is behind the instant", () => {
      const clock = createTestClock({ start: 500n });
      const later = Instant.fromReading(800n);
      expect(Instant.elapsed(later, clock)).toEqual(Duration.fromNanoseconds(-300));
    });
  });

  describe("comparison", () => {
    const early = Instant.fromReading(1n);
    const late = Instant.fromReading(2n);

    it("orders by reading", () => {
      expect(Instant.compare(early, late)).toBe(-1);
      expect(Instant.compare(late, early)).toBe(1);
      expect(Instant.compare(early, Instant.fromReading(1n))).toBe(0);
      expect(Instant.equals(early, Instant.fromReading(1n))).toBe(true);
      expect(Instant.lessThan(early, late)).toBe(true);
      expect(Instant.greaterThan(early, late)).toBe(false);
    });
  });

  it("isInstant rejects other values", () => {
    expect(Instant.isInstant(Duration.ZERO)).toBe(false);
    expect(Instant.isInstant({ reading: 1n })).toBe(false);
    expect(Instant.isInstant(undefined)).toBe(false);
  });
});
