/**
 * Round-Robin scheduling (preemptive, fixed time quantum)
 *
 * Processes wait in a FIFO ready queue and run for at most one quantum per
 * turn. Arrivals are admitted to the tail in arrival order; those that
 * arrived during a slice are queued ahead of the process that was just
 * preempted.
 */

import { assertValidProcessTable, assertValidQuantum } from '../api/validators.js';
import { SCHEDULING } from '../config/defaults.js';
import type { Process, ScheduleResult, SimulationOptions } from '../types/scheduling.js';
import { lazyLog } from '../utils/logger-helpers.js';
import { MetricsAccumulator } from './metrics.js';
import { TimelineRecorder } from './timeline.js';

export const RR_TITLE = 'Round-robin';

/**
 * FIFO of process indices with a moving head
 */
export class ReadyQueue {
  private items: number[] = [];
  private head = 0;

  public enqueue(index: number): void {
    this.items.push(index);
  }

  public dequeue(): number | undefined {
    if (this.head >= this.items.length) {
      return undefined;
    }
    const index = this.items[this.head++];

    // Drop the consumed prefix once it dominates the backing array
    if (this.head > 32 && this.head * 2 > this.items.length) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }
    return index;
  }

  public get length(): number {
    return this.items.length - this.head;
  }

  public toArray(): number[] {
    return this.items.slice(this.head);
  }
}

export function scheduleRoundRobin(
  processes: readonly Process[],
  options: SimulationOptions = {}
): ScheduleResult {
  assertValidProcessTable(processes);

  const quantum = options.quantum ?? SCHEDULING.DEFAULT_QUANTUM;
  assertValidQuantum(quantum);

  const { logger } = options;
  const timeline = new TimelineRecorder();
  const metrics = new MetricsAccumulator(processes);
  const remaining = processes.map((process) => process.burst);
  const queue = new ReadyQueue();

  // Admission order: by arrival, table order among equal arrivals
  const arrivalOrder = processes
    .map((_, index) => index)
    .sort((a, b) => processes[a].arrival - processes[b].arrival || a - b);
  let admitted = 0;

  const admitUntil = (now: number): void => {
    while (admitted < arrivalOrder.length && processes[arrivalOrder[admitted]].arrival <= now) {
      queue.enqueue(arrivalOrder[admitted]);
      admitted++;
    }
  };

  let time = 0;
  admitUntil(time);

  while (!metrics.done) {
    const current = queue.dequeue();

    if (current === undefined) {
      // Everything unfinished arrives later
      const wakeUp = processes[arrivalOrder[admitted]].arrival;
      lazyLog(logger, 'debug', () => ({ from: time, until: wakeUp }), 'idle');
      time = wakeUp;
      admitUntil(time);
      continue;
    }

    const process = processes[current];
    const slice = Math.min(quantum, remaining[current]);
    const start = time;

    timeline.record(process.id, start, start + slice);
    lazyLog(logger, 'debug', () => ({ processId: process.id, start, stop: start + slice }), 'dispatch');

    remaining[current] -= slice;
    time += slice;
    admitUntil(time);

    if (remaining[current] === 0) {
      metrics.complete(current, time);
      lazyLog(logger, 'debug', () => ({ processId: process.id, completion: time }), 'completion');
    } else {
      queue.enqueue(current);
    }
  }

  return {
    algorithm: 'rr',
    title: options.title ?? RR_TITLE,
    timeline: timeline.intervals(),
    results: metrics.results(),
    summary: metrics.summary(),
  };
}
