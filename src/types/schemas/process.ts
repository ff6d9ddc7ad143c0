/**
 * Process table schemas
 *
 * Runtime validation for the process records the simulator consumes.
 */

import { z } from 'zod';
import { NonNegativeInteger, PositiveInteger } from './common.js';

/**
 * Single process record
 */
export const ProcessSchema = z.object({
  id: z.number().int('Process id must be an integer'),
  arrival: NonNegativeInteger,
  burst: PositiveInteger,
  priority: z.number().int('Priority must be an integer'),
});

/**
 * Whole process table: ids must be unique
 */
export const ProcessTableSchema = z.array(ProcessSchema).superRefine((processes, ctx) => {
  const seen = new Set<number>();
  processes.forEach((process, index) => {
    if (seen.has(process.id)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Duplicate process id ${process.id}`,
        path: [index, 'id'],
      });
    }
    seen.add(process.id);
  });
});

/**
 * Round-Robin quantum: a positive integer, or Infinity for run-to-completion
 */
export const QuantumSchema = z.union([
  PositiveInteger,
  z.literal(Number.POSITIVE_INFINITY),
]);
