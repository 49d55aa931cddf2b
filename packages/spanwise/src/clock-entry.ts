/**
 * spanwise/clock
 */

export {
  type MonotonicClock,
  type MonotonicClockOptions,
  type ClockEvent,
  systemClock,
  createMonotonicClock,
} from "./clock";
