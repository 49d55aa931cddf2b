/**
 * spanwise/tagged-error (internal)
 *
 * Error classes carrying a string `_tag` discriminant, so a union of them can
 * be narrowed with `switch (error._tag)` or `TaggedError.match`.
 */

// =============================================================================
// Types
// =============================================================================

/**
 * Instance shape shared by every tagged error.
 */
export interface TaggedErrorBase<Tag extends string = string> extends Error {
  readonly _tag: Tag;
}

/**
 * Options accepted when defining a tagged error class.
 */
export interface TaggedErrorOptions<P> {
  /** Builds the `message` from the constructor props */
  message?: (props: P) => string;
}

/**
 * Options accepted when constructing a tagged error instance.
 */
export interface TaggedErrorCreateOptions {
  /** Underlying cause, forwarded to `Error.cause` */
  cause?: unknown;
}

/**
 * Constructor returned by `TaggedError(tag, { message })`.
 */
export type TaggedErrorConstructor<Tag extends string, P extends object> = new (
  props: P,
  options?: TaggedErrorCreateOptions
) => TaggedErrorBase<Tag> & Readonly<P>;

/**
 * Constructor returned by `TaggedError(tag)`; props are supplied as a type
 * argument at the `extends` site.
 */
export type TaggedErrorGenericConstructor<Tag extends string> = new <
  P extends object = Record<never, never>,
>(
  props?: P,
  options?: TaggedErrorCreateOptions
) => TaggedErrorBase<Tag> & Readonly<P>;

/** Extracts the `_tag` literal of a tagged error (or union of them). */
export type TagOf<E> = E extends { readonly _tag: infer T } ? T : never;

/** Picks the variant of a tagged error union with the given tag. */
export type ErrorByTag<E, T extends string> = Extract<E, { readonly _tag: T }>;

/** Props a tagged error was constructed with. */
export type PropsOf<E> = Omit<E, keyof TaggedErrorBase>;

type MatchHandlers<E extends TaggedErrorBase, R> = {
  [K in E["_tag"]]: (error: ErrorByTag<E, K>) => R;
};

type HandlerResult<H> = {
  [K in keyof H]-?: H[K] extends (...args: never[]) => infer R ? R : never;
}[keyof H];

// =============================================================================
// Factory
// =============================================================================

const TAGGED: unique symbol = Symbol.for("spanwise/tagged-error");

/**
 * Define an error class with a literal `_tag`.
 *
 * @example
 * ```typescript
 * class ClockDrift extends TaggedError('ClockDrift', {
 *   message: (p: { skewNs: bigint }) => `clock drifted by ${p.skewNs}ns`,
 * }) {}
 *
 * class Unsupported extends TaggedError('Unsupported')<{ feature: string }> {}
 * ```
 */
export function TaggedError<Tag extends string>(
  tag: Tag
): TaggedErrorGenericConstructor<Tag>;
export function TaggedError<Tag extends string, P extends object>(
  tag: Tag,
  options: TaggedErrorOptions<P>
): TaggedErrorConstructor<Tag, P>;
export function TaggedError<Tag extends string, P extends object>(
  tag: Tag,
  options?: TaggedErrorOptions<P>
): TaggedErrorConstructor<Tag, P> | TaggedErrorGenericConstructor<Tag> {
  class Tagged extends Error {
    readonly _tag: Tag = tag;
    readonly [TAGGED] = true;

    constructor(props?: P, createOptions?: TaggedErrorCreateOptions) {
      super(
        props && options?.message ? options.message(props) : tag,
        createOptions?.cause !== undefined ? { cause: createOptions.cause } : undefined
      );
      this.name = tag;
      if (props) Object.assign(this, props);
    }
  }
  // Props are assigned at runtime; the instance type is widened to carry them.
  return Tagged as unknown as TaggedErrorConstructor<Tag, P>;
}

/**
 * Checks whether a value was created by a `TaggedError` class.
 */
function isTaggedError(value: unknown): value is TaggedErrorBase {
  return (
    value instanceof Error &&
    TAGGED in value &&
    "_tag" in value &&
    typeof value._tag === "string"
  );
}

/**
 * Exhaustive dispatch on `_tag`. The result is the union of the handlers'
 * return types.
 */
function match<E extends TaggedErrorBase, H extends MatchHandlers<E, unknown>>(
  error: E,
  handlers: H
): HandlerResult<H> {
  const lookup = handlers as unknown as Record<string, (e: E) => HandlerResult<H>>;
  return lookup[error._tag](error);
}

/**
 * Dispatch on `_tag` with a fallback for tags without a handler.
 */
function matchPartial<
  E extends TaggedErrorBase,
  H extends Partial<MatchHandlers<E, unknown>>,
  F,
>(error: E, handlers: H, fallback: (error: E) => F): HandlerResult<H> | F {
  const lookup = handlers as unknown as Partial<
    Record<string, (e: E) => HandlerResult<H>>
  >;
  const handler = lookup[error._tag];
  return handler ? handler(error) : fallback(error);
}

TaggedError.isTaggedError = isTaggedError;
TaggedError.match = match;
TaggedError.matchPartial = matchPartial;

// `error instanceof TaggedError` holds for every tagged error class.
Object.defineProperty(TaggedError, Symbol.hasInstance, {
  value: isTaggedError,
});
