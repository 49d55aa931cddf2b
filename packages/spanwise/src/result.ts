/**
 * spanwise/result
 *
 * Result primitives returned by the fallible conversions (`Duration.toHrTime`,
 * `Duration.fromHrTime`, `Duration.unsignedAbs`). Arithmetic uses its own
 * policies instead: throwing, `undefined`, or saturating.
 */

// =============================================================================
// Core Result Types
// =============================================================================

/**
 * Represents a successful result.
 * Use `ok(value)` to create instances.
 */
export type Ok<T> = { ok: true; value: T };

/**
 * Represents a failed result.
 * Use `err(error)` to create instances.
 */
export type Err<E, C = unknown> = { ok: false; error: E; cause?: C };

/**
 * Represents a successful computation or a failed one.
 */
export type Result<T, E = unknown, C = unknown> = Ok<T> | Err<E, C>;

// =============================================================================
// Result Constructors
// =============================================================================

/**
 * Creates a successful Result.
 */
export const ok = <T>(value: T): Ok<T> => ({ ok: true, value });

/**
 * Creates a failed Result.
 */
export const err = <E, C = unknown>(
  error: E,
  options?: { cause?: C }
): Err<E, C> =>
  options?.cause !== undefined
    ? { ok: false, error, cause: options.cause }
    : { ok: false, error };

// =============================================================================
// Unwrap Utilities
// =============================================================================

const describe = (value: unknown): string => {
  if (typeof value === "string") return value;
  if (value instanceof Error) return value.message;
  return JSON.stringify(value, (_key, v: unknown) =>
    typeof v === "bigint" ? `${v}n` : v
  );
};

/**
 * Error thrown when attempting to unwrap an Err result.
 */
export class UnwrapError extends Error {
  public readonly error: unknown;

  constructor(result: Err<unknown, unknown>) {
    super(`Attempted to unwrap an Err: ${describe(result.error)}`, {
      cause: result.cause,
    });
    this.name = "UnwrapError";
    this.error = result.error;
  }
}

/**
 * Extracts the value from an Ok result, or throws UnwrapError if it's an Err.
 *
 * @example
 * ```typescript
 * const [seconds, nanos] = unwrap(Duration.toHrTime(Duration.fromSeconds(3)));
 * ```
 */
export const unwrap = <T, E, C>(r: Result<T, E, C>): T => {
  if (r.ok) return r.value;
  throw new UnwrapError(r);
};
