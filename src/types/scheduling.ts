/**
 * Scheduling types
 *
 * Defines the process table, execution timeline, per-process results and
 * batch summary shared by every scheduling algorithm.
 */

import type { Logger } from 'pino';

/**
 * A single CPU-bound process in the batch.
 *
 * Created once at load time and never mutated by an algorithm; algorithms
 * keep their own remaining-burst state.
 */
export interface Process {
  /**
   * Unique process identifier
   */
  readonly id: number;

  /**
   * Time unit at which the process becomes ready (>= 0)
   */
  readonly arrival: number;

  /**
   * Total CPU time required (> 0)
   */
  readonly burst: number;

  /**
   * Lower value = more urgent. Only read by the priority scheduler.
   */
  readonly priority: number;
}

/**
 * One contiguous, uninterrupted run of a process on the CPU: [start, stop)
 */
export interface ExecutionInterval {
  processId: number;
  start: number;
  stop: number;
}

/**
 * Timing metrics derived for one process
 */
export interface ProcessResult {
  processId: number;
  priority: number;
  burst: number;
  arrival: number;

  /**
   * Time spent ready but not running (completion - arrival - burst, never negative)
   */
  waitTime: number;

  /**
   * burst + waitTime
   */
  turnaroundTime: number;

  /**
   * Absolute time the remaining burst reached zero
   */
  completionTime: number;
}

/**
 * Aggregate metrics over the whole batch
 */
export interface ScheduleSummary {
  averageWait: number;
  averageTurnaround: number;

  /**
   * Completed processes per unit of simulated time
   */
  throughput: number;
}

/**
 * Algorithm identifiers
 */
export type AlgorithmName = 'fcfs' | 'sjf' | 'priority' | 'rr';

/**
 * Output of one algorithm run, handed as-is to the report renderer
 */
export interface ScheduleResult {
  algorithm: AlgorithmName;
  title: string;
  timeline: ExecutionInterval[];
  results: ProcessResult[];
  summary: ScheduleSummary;
}

/**
 * Options accepted by every algorithm
 */
export interface SimulationOptions {
  /**
   * Round-Robin time slice. Ignored by the other algorithms.
   */
  quantum?: number;

  /**
   * Report title override
   */
  title?: string;

  logger?: Logger;
}

/**
 * Scheduling algorithm signature
 */
export type SchedulingAlgorithm = (
  processes: readonly Process[],
  options?: SimulationOptions
) => ScheduleResult;

/**
 * Registry entry for an algorithm
 */
export interface AlgorithmDescriptor {
  name: AlgorithmName;
  title: string;
  run: SchedulingAlgorithm;
}
