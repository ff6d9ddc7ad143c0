/**
 * Scheduler Configuration Schemas
 *
 * Zod schemas for validating config/scheduler.yaml.
 *
 * @module schemas/config
 */

import { z } from 'zod';
import { PositiveInteger } from './common.js';
import { QuantumSchema } from './process.js';

export const AlgorithmNameSchema = z.enum(['fcfs', 'sjf', 'priority', 'rr']);

/**
 * Scheduling Configuration
 */
export const SchedulingConfigSchema = z.object({
  round_robin: z.object({
    quantum: QuantumSchema,
  }),
  algorithms: z.array(AlgorithmNameSchema).min(1, 'At least one algorithm is required'),
});

/**
 * Report Configuration
 */
export const ReportConfigSchema = z.object({
  format: z.enum(['text', 'json']),
  gantt_cell_width: PositiveInteger,
  decimals: z.number().int().min(0, 'must be >= 0').max(10, 'must be <= 10'),
});

/**
 * Logging Configuration
 */
export const LoggingConfigSchema = z.object({
  level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']),
});

/**
 * Scheduler Configuration Schema (environments already merged)
 */
export const SchedulerConfigSchema = z.object({
  scheduling: SchedulingConfigSchema,
  report: ReportConfigSchema,
  logging: LoggingConfigSchema,
});

export type SchedulerConfig = z.infer<typeof SchedulerConfigSchema>;

export const ENVIRONMENTS = ['production', 'development', 'test'] as const;
export type Environment = (typeof ENVIRONMENTS)[number];
