/**
 * Runtime Safety Primitives
 *
 * - `invariant(condition, error)` - Runtime assertion
 * - `debugOnly(fn)` - Code that only runs while `config.debug` is on
 * - `debugWarn(scope, message)` - Diagnostic line on stderr in debug mode
 *
 * @example
 * ```typescript
 * invariant(row < rows, () => new IndexOutOfBoundsError(row, col, "2x2"));
 *
 * debugOnly(() => {
 *   console.log("entries:", Array.from(m));
 * });
 * ```
 */

import { config } from "./config.js";

/**
 * Runtime invariant check.
 *
 * @param condition - The condition that must be true
 * @param error - Message, or a factory for the error to throw
 * @throws Error (or the produced error) if condition is false
 */
export function invariant(
  condition: boolean,
  error?: string | (() => Error)
): asserts condition {
  if (!condition) {
    throw typeof error === "function" ? error() : new Error(error ?? "Invariant violation");
  }
}

/**
 * Code that only runs in debug mode.
 */
export function debugOnly(fn: () => void): void {
  if (config.settings().debug) {
    fn();
  }
}

/**
 * Report a degenerate input without altering any result.
 *
 * @param scope - Package or module reporting, e.g. `"quaternion"`
 */
export function debugWarn(scope: string, message: string): void {
  debugOnly(() => {
    console.warn(`[fixalg:${scope}] ${message}`);
  });
}
