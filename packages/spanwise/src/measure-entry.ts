/**
 * spanwise/measure
 *
 * @example
 * ```typescript
 * import { timeAsync } from 'spanwise/measure';
 *
 * const [took, user] = await timeAsync(() => fetchUser(id));
 * ```
 */

export { timeFn, timeAsync } from "./measure";
