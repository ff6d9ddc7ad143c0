/**
 * Priority scheduling (preemptive)
 *
 * Lower priority number wins; among equal priorities the process with the
 * least remaining burst runs. A less urgent process is never picked over a
 * more urgent ready one, however little work it has left.
 */

import { assertValidProcessTable } from '../api/validators.js';
import type { Process, ScheduleResult, SimulationOptions } from '../types/scheduling.js';
import { runPreemptive, type CandidateComparator } from './preemptive.js';

export const PRIORITY_TITLE = 'Priority';

export const byPriorityThenRemaining: CandidateComparator = (a, b) =>
  a.process.priority - b.process.priority || a.remaining - b.remaining;

export function schedulePrioritySjf(
  processes: readonly Process[],
  options: SimulationOptions = {}
): ScheduleResult {
  assertValidProcessTable(processes);

  const { timeline, metrics, elapsed } = runPreemptive(
    processes,
    byPriorityThenRemaining,
    options.logger
  );

  return {
    algorithm: 'priority',
    title: options.title ?? PRIORITY_TITLE,
    timeline: timeline.intervals(),
    results: metrics.results(),
    summary: metrics.summary(elapsed),
  };
}
