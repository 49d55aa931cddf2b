/**
 * spanwise/instant
 *
 * Monotonic instants and the signed durations between them.
 *
 * @example
 * ```typescript
 * import { Instant } from 'spanwise/instant';
 *
 * const start = Instant.now();
 * await handle(request);
 * const took = Instant.elapsed(start);
 * ```
 */

export {
  type Instant as InstantType,
  Instant,
  now,
  elapsed,
  fromReading,
  isInstant,
} from "./instant";
