/**
 * Metrics Accumulator
 *
 * Collects one completion time per process during a simulation run and
 * derives wait, turnaround, batch averages and throughput from them.
 */

import { SchedulerError } from '../api/errors.js';
import { safeAverage, safeDivide } from '../utils/math-helpers.js';
import type { Process, ProcessResult, ScheduleSummary } from '../types/scheduling.js';

export class MetricsAccumulator {
  private readonly completions: Array<number | undefined>;
  private completedCount = 0;

  constructor(private readonly processes: readonly Process[]) {
    this.completions = new Array<number | undefined>(processes.length).fill(undefined);
  }

  /**
   * Record that the process at `index` finished at `completionTime`.
   */
  public complete(index: number, completionTime: number): void {
    const process = this.processes[index];
    if (!process) {
      throw new SchedulerError('InvariantViolation', `No process at index ${index}`, { index });
    }
    if (this.completions[index] !== undefined) {
      throw new SchedulerError(
        'InvariantViolation',
        `Process ${process.id} completed twice`,
        { processId: process.id, first: this.completions[index], second: completionTime }
      );
    }

    this.completions[index] = completionTime;
    this.completedCount++;
  }

  public isComplete(index: number): boolean {
    return this.completions[index] !== undefined;
  }

  /**
   * True once every process has a completion time
   */
  public get done(): boolean {
    return this.completedCount === this.processes.length;
  }

  /**
   * Per-process results in input order.
   */
  public results(): ProcessResult[] {
    return this.processes.map((process, index) => {
      const completionTime = this.completions[index];
      if (completionTime === undefined) {
        throw new SchedulerError(
          'InvariantViolation',
          `Process ${process.id} never completed`,
          { processId: process.id }
        );
      }

      // A process can never be served before it is ready
      const waitTime = Math.max(0, completionTime - process.arrival - process.burst);

      return {
        processId: process.id,
        priority: process.priority,
        burst: process.burst,
        arrival: process.arrival,
        waitTime,
        turnaroundTime: process.burst + waitTime,
        completionTime,
      };
    });
  }

  /**
   * Batch averages and throughput.
   *
   * @param elapsed - Throughput denominator; defaults to the latest completion
   */
  public summary(elapsed?: number): ScheduleSummary {
    const results = this.results();
    const lastCompletion = results.reduce((max, result) => Math.max(max, result.completionTime), 0);

    return {
      averageWait: safeAverage(results.map((result) => result.waitTime)),
      averageTurnaround: safeAverage(results.map((result) => result.turnaroundTime)),
      throughput: safeDivide(results.length, elapsed ?? lastCompletion),
    };
  }
}
