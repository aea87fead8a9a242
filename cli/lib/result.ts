/**
 * Result type for collecting trial successes and failures without
 * collapsing the entire run.
 *
 * @module
 */

import type { Operation } from "effection";
import { toError } from "./errors.ts";

/**
 * A discriminated union representing success or failure.
 */
export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: Error; context: string };

/**
 * Wrap an operation to catch errors and return a Result instead of throwing.
 * This allows collecting results from multiple operations even when some fail.
 *
 * @param context - Identifier for error reporting (e.g., trial label)
 * @param op - The operation to execute
 * @returns Result indicating success or failure
 */
export function* wrapResult<T>(
  context: string,
  op: Operation<T>,
): Operation<Result<T>> {
  try {
    const value = yield* op;
    return { ok: true, value };
  } catch (error: unknown) {
    return { ok: false, error: toError(error), context };
  }
}

/**
 * Check if a result is successful.
 */
export function isOk<T>(result: Result<T>): result is { ok: true; value: T } {
  return result.ok;
}

