/**
 * Shortest-job-first scheduling (preemptive, shortest remaining time)
 */

import { assertValidProcessTable } from '../api/validators.js';
import type { Process, ScheduleResult, SimulationOptions } from '../types/scheduling.js';
import { runPreemptive, type CandidateComparator } from './preemptive.js';

export const SJF_TITLE = 'Shortest-job-first';

export const byRemainingBurst: CandidateComparator = (a, b) => a.remaining - b.remaining;

export function scheduleSjf(
  processes: readonly Process[],
  options: SimulationOptions = {}
): ScheduleResult {
  assertValidProcessTable(processes);

  const { timeline, metrics, elapsed } = runPreemptive(processes, byRemainingBurst, options.logger);

  return {
    algorithm: 'sjf',
    title: options.title ?? SJF_TITLE,
    timeline: timeline.intervals(),
    results: metrics.results(),
    summary: metrics.summary(elapsed),
  };
}
