/**
 * Default Configuration Constants
 *
 * Compile-time fallbacks for values that can also be set in
 * config/scheduler.yaml.
 */

/**
 * Scheduling Configuration
 */
export const SCHEDULING = {
  /** Round-Robin time slice (simulated time units) */
  DEFAULT_QUANTUM: 2,
} as const;

/**
 * Report Configuration
 */
export const REPORT = {
  /** Width of one Gantt cell, process id centred inside */
  GANTT_CELL_WIDTH: 8,

  /** Decimal places for averages and throughput */
  DECIMALS: 2,
} as const;
