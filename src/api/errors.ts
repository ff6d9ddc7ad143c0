/**
 * Scheduler error utilities.
 *
 * Provides a consistent error type for every public surface (core,
 * loader, CLI) and helpers to convert foreign errors into SchedulerError
 * instances that callers can reason about.
 */

import type { ZodError } from 'zod';

/**
 * Error codes surfaced to API consumers.
 */
export type SchedulerErrorCode =
  | 'InvalidArgs'
  | 'FileNotFound'
  | 'FileReadError'
  | 'MalformedCsv'
  | 'InvalidInteger'
  | 'InvalidProcess'
  | 'InvalidQuantum'
  | 'UnknownAlgorithm'
  | 'InvariantViolation'
  | 'ConfigError'
  | 'UnknownError';

/**
 * Plain shape of a scheduler error (for JSON output)
 */
export interface SchedulerErrorShape {
  code: SchedulerErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

export class SchedulerError extends Error implements SchedulerErrorShape {
  public readonly code: SchedulerErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(
    code: SchedulerErrorCode,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'SchedulerError';
    this.code = code;
    this.details = details;
  }

  /**
   * Serialize error into plain shape.
   */
  public toObject(): SchedulerErrorShape {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Map unknown errors into SchedulerError instances.
 *
 * @param error - Error thrown by a lower layer
 * @param fallbackCode - Code to use when we cannot infer a specific one
 */
export function toSchedulerError(
  error: unknown,
  fallbackCode: SchedulerErrorCode = 'UnknownError'
): SchedulerError {
  if (error instanceof SchedulerError) {
    return error;
  }

  if (error instanceof Error) {
    const errno = 'code' in error ? error.code : undefined;
    if (errno === 'ENOENT') {
      return new SchedulerError('FileNotFound', error.message);
    }
    if (errno === 'EACCES' || errno === 'EISDIR') {
      return new SchedulerError('FileReadError', error.message);
    }

    return new SchedulerError(fallbackCode, error.message);
  }

  return new SchedulerError(fallbackCode, 'Unknown scheduler error');
}

/**
 * Convert Zod validation error to SchedulerError
 *
 * Reports the first issue with its field path and keeps every issue in
 * `details.issues`.
 *
 * @example
 * ```typescript
 * const result = ProcessTableSchema.safeParse([{ id: 1, arrival: 0, burst: 0, priority: 0 }]);
 * if (!result.success) {
 *   throw zodErrorToSchedulerError(result.error);
 * }
 * // Throws: "Validation error on field '0.burst': Must be a positive integer"
 * ```
 */
export function zodErrorToSchedulerError(
  error: ZodError,
  code: SchedulerErrorCode = 'InvalidProcess'
): SchedulerError {
  const firstIssue = error.issues[0];
  const field = firstIssue && firstIssue.path.length > 0 ? firstIssue.path.join('.') : 'root';
  const message = `Validation error on field '${field}': ${firstIssue?.message ?? 'Invalid input'}`;

  return new SchedulerError(code, message, {
    field,
    issues: error.issues.map((issue) => ({
      path: issue.path,
      message: issue.message,
      code: issue.code,
    })),
  });
}
