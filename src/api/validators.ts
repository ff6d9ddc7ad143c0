/**
 * Input validators for the simulation core.
 *
 * Every algorithm validates its process table before the simulation loop
 * starts, so a malformed record can never make a loop spin.
 */

import type { Process } from '../types/scheduling.js';
import { ProcessTableSchema, QuantumSchema } from '../types/schemas/process.js';
import { SchedulerError, zodErrorToSchedulerError } from './errors.js';

/**
 * Validation result type
 */
export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

/**
 * Validate a process table without throwing.
 *
 * @returns Validation result with one message per issue
 */
export function validateProcessTable(processes: readonly Process[]): ValidationResult {
  const parsed = ProcessTableSchema.safeParse(processes);
  if (parsed.success) {
    return { valid: true, errors: [] };
  }

  return {
    valid: false,
    errors: parsed.error.issues.map((issue) => {
      const field = issue.path.length > 0 ? issue.path.join('.') : 'root';
      return `${field}: ${issue.message}`;
    }),
  };
}

/**
 * Throw a SchedulerError if the process table is not schedulable.
 */
export function assertValidProcessTable(processes: readonly Process[]): void {
  const parsed = ProcessTableSchema.safeParse(processes);
  if (!parsed.success) {
    throw zodErrorToSchedulerError(parsed.error, 'InvalidProcess');
  }
}

/**
 * Throw a SchedulerError unless quantum is a positive integer or Infinity.
 */
export function assertValidQuantum(quantum: number): void {
  if (!QuantumSchema.safeParse(quantum).success) {
    throw new SchedulerError(
      'InvalidQuantum',
      `Quantum must be a positive integer or Infinity, got ${quantum}`,
      { quantum }
    );
  }
}
