/**
 * First-come, first-serve scheduling
 *
 * Non-preemptive: processes run to completion in the order given, which
 * callers supply sorted by ascending arrival.
 */

import { assertValidProcessTable } from '../api/validators.js';
import type { Process, ScheduleResult, SimulationOptions } from '../types/scheduling.js';
import { lazyLog } from '../utils/logger-helpers.js';
import { MetricsAccumulator } from './metrics.js';
import { TimelineRecorder } from './timeline.js';

export const FCFS_TITLE = 'First-come, first-serve';

export function scheduleFcfs(
  processes: readonly Process[],
  options: SimulationOptions = {}
): ScheduleResult {
  assertValidProcessTable(processes);

  const { logger } = options;
  const timeline = new TimelineRecorder();
  const metrics = new MetricsAccumulator(processes);

  // Instant the CPU becomes free
  let serviceTime = 0;

  processes.forEach((process, index) => {
    const wait = Math.max(0, serviceTime - process.arrival);
    const start = process.arrival + wait;
    const completion = start + process.burst;

    if (start > serviceTime) {
      lazyLog(logger, 'debug', () => ({ from: serviceTime, until: start }), 'idle');
    }

    timeline.record(process.id, start, completion);
    metrics.complete(index, completion);
    lazyLog(logger, 'debug', () => ({ processId: process.id, start, stop: completion }), 'dispatch');

    serviceTime = completion;
  });

  return {
    algorithm: 'fcfs',
    title: options.title ?? FCFS_TITLE,
    timeline: timeline.intervals(),
    results: metrics.results(),
    summary: metrics.summary(),
  };
}
