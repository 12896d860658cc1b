/**
 * Result type for reporting a failure without throwing.
 *
 * @module
 */

/**
 * A discriminated union representing success or failure.
 */
export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: Error; context: string };

/**
 * Safely convert an unknown caught value to an Error.
 * Narrows unknown instead of asserting.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Build a successful result.
 */
export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

/**
 * Build a failed result.
 *
 * @param context - What was being attempted (e.g., "run arguments")
 */
export function err<T>(context: string, error: unknown): Result<T> {
  return { ok: false, error: toError(error), context };
}
