/**
 * Timeline Recorder
 *
 * Accumulates the ordered execution intervals of one simulation run.
 * Consecutive intervals of the same process that touch end-to-start are
 * merged, so the recorded timeline only changes entry on a context switch
 * or after idle time.
 */

import { SchedulerError } from '../api/errors.js';
import type { ExecutionInterval } from '../types/scheduling.js';

export class TimelineRecorder {
  private readonly entries: ExecutionInterval[] = [];

  /**
   * Record that `processId` ran on the CPU during [start, stop).
   *
   * Zero-length intervals are ignored. Intervals must be recorded in
   * chronological order and may not overlap.
   */
  public record(processId: number, start: number, stop: number): void {
    if (stop < start) {
      throw new SchedulerError(
        'InvariantViolation',
        `Interval for process ${processId} stops before it starts (${start} > ${stop})`,
        { processId, start, stop }
      );
    }
    if (stop === start) {
      return;
    }

    const last = this.entries[this.entries.length - 1];
    if (last && start < last.stop) {
      throw new SchedulerError(
        'InvariantViolation',
        `Interval [${start}, ${stop}) for process ${processId} overlaps [${last.start}, ${last.stop}) for process ${last.processId}`,
        { processId, start, stop, previous: { ...last } }
      );
    }

    if (last && last.processId === processId && last.stop === start) {
      last.stop = stop;
      return;
    }

    this.entries.push({ processId, start, stop });
  }

  /**
   * Recorded intervals, oldest first
   */
  public intervals(): ExecutionInterval[] {
    return this.entries.map((entry) => ({ ...entry }));
  }

  /**
   * Total CPU time recorded for a process
   */
  public durationOf(processId: number): number {
    let total = 0;
    for (const entry of this.entries) {
      if (entry.processId === processId) {
        total += entry.stop - entry.start;
      }
    }
    return total;
  }

  /**
   * Stop time of the last interval (0 when nothing ran)
   */
  public get end(): number {
    return this.entries[this.entries.length - 1]?.stop ?? 0;
  }

  public get size(): number {
    return this.entries.length;
  }
}
