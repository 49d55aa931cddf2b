/**
 * spanwise/testing
 *
 * Deterministic clocks for tests.
 *
 * @example
 * ```typescript
 * import { createTestClock } from 'spanwise/testing';
 *
 * const clock = createTestClock({ start: 1_000n });
 * const [took] = timeFn(() => clock.advance(Duration.SECOND), clock);
 * expect(took).toEqual(Duration.SECOND);
 * ```
 */

export {
  type TestClock,
  type TestClockOptions,
  createTestClock,
} from "./testing";
