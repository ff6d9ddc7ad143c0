/**
 * Preemptive selection engine
 *
 * Shared simulation loop for the preemptive, selection-based schedulers
 * (shortest-remaining-time and priority). At every instant the CPU runs the
 * best ready process according to a comparator. On a tie the running
 * process keeps the CPU; otherwise the process that appears first in the
 * table wins.
 *
 * The loop is event-driven. A selection can only change when a process
 * arrives or completes (the running process's remaining burst only
 * shrinks, so it stays best), so the engine jumps from one such instant to
 * the next instead of stepping one time unit at a time. The intervals and
 * metrics are identical to a unit-step simulation.
 */

import type { Logger } from 'pino';
import type { Process } from '../types/scheduling.js';
import { lazyLog } from '../utils/logger-helpers.js';
import { MetricsAccumulator } from './metrics.js';
import { TimelineRecorder } from './timeline.js';

/**
 * A ready process as seen by the selection comparator
 */
export interface ReadyCandidate {
  readonly process: Process;
  readonly remaining: number;
}

/**
 * Negative when `a` should run before `b`
 */
export type CandidateComparator = (a: ReadyCandidate, b: ReadyCandidate) => number;

export interface PreemptiveRun {
  timeline: TimelineRecorder;
  metrics: MetricsAccumulator;

  /**
   * Simulated time when the last process completed
   */
  elapsed: number;
}

export function runPreemptive(
  processes: readonly Process[],
  compare: CandidateComparator,
  logger?: Logger
): PreemptiveRun {
  const timeline = new TimelineRecorder();
  const metrics = new MetricsAccumulator(processes);
  const remaining = processes.map((process) => process.burst);

  let time = 0;
  let running = -1;

  while (!metrics.done) {
    const selected = selectReady(processes, remaining, time, compare, running);
    running = selected;

    if (selected === -1) {
      const wakeUp = nextArrival(processes, remaining, time);
      lazyLog(logger, 'debug', () => ({ from: time, until: wakeUp }), 'idle');
      time = wakeUp;
      continue;
    }

    const process = processes[selected];
    const slice = Math.min(remaining[selected], nextArrival(processes, remaining, time) - time);

    timeline.record(process.id, time, time + slice);
    lazyLog(logger, 'debug', () => ({ processId: process.id, start: time, stop: time + slice }), 'dispatch');

    remaining[selected] -= slice;
    time += slice;

    if (remaining[selected] === 0) {
      running = -1;
      metrics.complete(selected, time);
      lazyLog(logger, 'debug', () => ({ processId: process.id, completion: time }), 'completion');
    }
  }

  return { timeline, metrics, elapsed: time };
}

/**
 * Index of the best ready process at `time`, or -1 when the CPU is idle.
 * The running process is the initial best and only a strictly better
 * candidate replaces it.
 */
function selectReady(
  processes: readonly Process[],
  remaining: readonly number[],
  time: number,
  compare: CandidateComparator,
  running: number
): number {
  let best = running !== -1 && remaining[running] > 0 ? running : -1;

  processes.forEach((process, index) => {
    if (process.arrival > time || remaining[index] === 0) {
      return;
    }
    if (
      best === -1 ||
      compare(
        { process, remaining: remaining[index] },
        { process: processes[best], remaining: remaining[best] }
      ) < 0
    ) {
      best = index;
    }
  });

  return best;
}

/**
 * Earliest arrival strictly after `time` among unfinished processes
 * (Infinity when nobody else is coming).
 */
function nextArrival(
  processes: readonly Process[],
  remaining: readonly number[],
  time: number
): number {
  let next = Number.POSITIVE_INFINITY;
  processes.forEach((process, index) => {
    if (remaining[index] > 0 && process.arrival > time && process.arrival < next) {
      next = process.arrival;
    }
  });
  return next;
}
