/**
 * Zod schema exports
 *
 * These schemas provide runtime validation for the process table and the
 * configuration file.
 *
 * @example
 * ```typescript
 * import { ProcessSchema } from 'cpu-schedule-sim';
 *
 * const result = ProcessSchema.safeParse({ id: 1, arrival: 0, burst: 0, priority: 0 });
 * if (!result.success) {
 *   console.error(result.error.issues);
 * }
 * ```
 */

// Common primitives
export * from './common.js';

// Process table schemas
export * from './process.js';

// Config schemas
export * from './config.js';
