/**
 * Scheduling module exports
 *
 * Each algorithm is a pure function of the process table; the registry
 * below runs them by name or all four in report order.
 */

import { SchedulerError } from '../api/errors.js';
import type {
  AlgorithmDescriptor,
  AlgorithmName,
  Process,
  ScheduleResult,
  SimulationOptions,
} from '../types/scheduling.js';
import { FCFS_TITLE, scheduleFcfs } from './fcfs.js';
import { PRIORITY_TITLE, schedulePrioritySjf } from './priority-sjf.js';
import { RR_TITLE, scheduleRoundRobin } from './round-robin.js';
import { SJF_TITLE, scheduleSjf } from './sjf.js';

export { scheduleFcfs, FCFS_TITLE } from './fcfs.js';
export { scheduleSjf, byRemainingBurst, SJF_TITLE } from './sjf.js';
export { schedulePrioritySjf, byPriorityThenRemaining, PRIORITY_TITLE } from './priority-sjf.js';
export { scheduleRoundRobin, ReadyQueue, RR_TITLE } from './round-robin.js';
export { runPreemptive, type ReadyCandidate, type CandidateComparator } from './preemptive.js';
export { TimelineRecorder } from './timeline.js';
export { MetricsAccumulator } from './metrics.js';

/**
 * Registered algorithms, in report order
 */
export const ALGORITHMS: readonly AlgorithmDescriptor[] = [
  { name: 'fcfs', title: FCFS_TITLE, run: scheduleFcfs },
  { name: 'sjf', title: SJF_TITLE, run: scheduleSjf },
  { name: 'priority', title: PRIORITY_TITLE, run: schedulePrioritySjf },
  { name: 'rr', title: RR_TITLE, run: scheduleRoundRobin },
];

export function isAlgorithmName(value: string): value is AlgorithmName {
  return ALGORITHMS.some((algorithm) => algorithm.name === value);
}

export function getAlgorithm(name: string): AlgorithmDescriptor {
  const descriptor = ALGORITHMS.find((algorithm) => algorithm.name === name);
  if (!descriptor) {
    throw new SchedulerError(
      'UnknownAlgorithm',
      `Unknown algorithm '${name}'. Expected one of: ${ALGORITHMS.map((a) => a.name).join(', ')}`,
      { name }
    );
  }
  return descriptor;
}

/**
 * Run one algorithm by name.
 */
export function simulate(
  name: AlgorithmName,
  processes: readonly Process[],
  options: SimulationOptions = {}
): ScheduleResult {
  return getAlgorithm(name).run(processes, options);
}

/**
 * Run several algorithms (all four by default) independently over the same
 * table. Titles always come from the registry.
 */
export function simulateAll(
  processes: readonly Process[],
  options: Omit<SimulationOptions, 'title'> = {},
  names: readonly AlgorithmName[] = ALGORITHMS.map((algorithm) => algorithm.name)
): ScheduleResult[] {
  return names.map((name) => {
    const { run, title } = getAlgorithm(name);
    const logger = options.logger?.child({ algorithm: name });
    return run(processes, { ...options, title, logger });
  });
}
