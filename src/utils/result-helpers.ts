/**
 * Result Type Helpers
 *
 * Result types for explicit error handling on fallible parsing paths.
 *
 * Usage:
 * ```typescript
 * const parsed = parseProcesses(text);
 * if (parsed.err) {
 *   // parsed.val is a SchedulerError
 * } else {
 *   const processes = parsed.val;
 * }
 * ```
 */

import { Ok, Err, type Result } from 'ts-results';

/**
 * Helper to unwrap Result or throw
 *
 * Use when you want to convert Result back to exception-based flow.
 */
export function unwrap<T, E extends Error>(result: Result<T, E>): T {
  if (result.ok) {
    return result.val;
  }
  throw result.val;
}

/**
 * Collect an array of Results into a Result of an array, stopping at the
 * first error.
 */
export function collectResults<T, E extends Error>(results: Iterable<Result<T, E>>): Result<T[], E> {
  const values: T[] = [];
  for (const result of results) {
    if (result.err) {
      return result;
    }
    values.push(result.val);
  }
  return Ok(values);
}

// Re-export Result types for convenience
export { Ok, Err };
export type { Result };
