/**
 * spanwise/clock
 *
 * Monotonic reading sources for `Instant`. A reading is an unsigned
 * nanosecond count from an arbitrary, process-local origin.
 */

// =============================================================================
// Types
// =============================================================================

/**
 * Source of monotonic nanosecond readings.
 */
export interface MonotonicClock {
  now(): bigint;
}

/**
 * Events emitted by a clock created with `createMonotonicClock`.
 */
export type ClockEvent =
  | {
      type: "clock_regression";
      /** Last reading handed out */
      previous: bigint;
      /** Reading the source returned, lower than `previous` */
      reading: bigint;
      ts: number;
    }
  | { type: "clock_sample"; reading: bigint; ts: number };

export interface MonotonicClockOptions {
  /** Underlying source. Defaults to `systemClock`. */
  source?: MonotonicClock;
  onEvent?: (event: ClockEvent) => void;
  /** Emit a `clock_sample` event for every reading */
  emitSamples?: boolean;
}

// =============================================================================
// Clocks
// =============================================================================

/**
 * Process clock backed by `process.hrtime.bigint()`.
 */
export const systemClock: MonotonicClock = {
  now: () => process.hrtime.bigint(),
};

/**
 * Wrap a reading source so the readings it hands out never decrease. A
 * reading below the previous one is reported as `clock_regression` and
 * replaced by the previous reading.
 *
 * @example
 * ```typescript
 * const clock = createMonotonicClock({
 *   onEvent: (e) => {
 *     if (e.type === 'clock_regression') metrics.increment('clock.regression');
 *   },
 * });
 * const start = Instant.now(clock);
 * ```
 */
export function createMonotonicClock(
  options: MonotonicClockOptions = {}
): MonotonicClock {
  const { source = systemClock, onEvent, emitSamples = false } = options;
  let previous: bigint | undefined;

  return {
    now(): bigint {
      const reading = source.now();

      if (previous !== undefined && reading < previous) {
        onEvent?.({
          type: "clock_regression",
          previous,
          reading,
          ts: Date.now(),
        });
        return previous;
      }

      previous = reading;
      if (emitSamples) {
        onEvent?.({ type: "clock_sample", reading, ts: Date.now() });
      }
      return reading;
    },
  };
}
