/**
 * spanwise/measure
 *
 * Time a function call on a monotonic clock.
 */

import type { Duration } from "./duration";
import { systemClock, type MonotonicClock } from "./clock";
import { elapsed, now } from "./instant";

/**
 * Run `fn` and return how long it took alongside its result.
 *
 * @example
 * ```typescript
 * const [took, rows] = timeFn(() => parse(input));
 * console.log(`parsed ${rows.length} rows in ${Duration.asSecondsF64(took)}s`);
 * ```
 */
export function timeFn<T>(
  fn: () => T,
  clock: MonotonicClock = systemClock
): [Duration, T] {
  const start = now(clock);
  const value = fn();
  return [elapsed(start, clock), value];
}

/**
 * Await `fn` and return how long it took alongside its result. A rejection
 * propagates unchanged.
 */
export async function timeAsync<T>(
  fn: () => Promise<T>,
  clock: MonotonicClock = systemClock
): Promise<[Duration, T]> {
  const start = now(clock);
  const value = await fn();
  return [elapsed(start, clock), value];
}
