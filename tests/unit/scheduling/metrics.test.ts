import { describe, it, expect } from 'vitest';
import { MetricsAccumulator } from '../../../src/scheduling/metrics.js';
import { SchedulerError } from '../../../src/api/errors.js';
import { STAGGERED, proc } from '../../helpers/process-tables.js';

describe('MetricsAccumulator', () => {
  it('should derive wait and turnaround from completion times', () => {
    const metrics = new MetricsAccumulator(STAGGERED);
    metrics.complete(0, 5);
    metrics.complete(1, 14);
    metrics.complete(2, 20);

    expect(metrics.done).toBe(true);
    expect(metrics.results()).toEqual([
      { processId: 1, priority: 2, burst: 5, arrival: 0, waitTime: 0, turnaroundTime: 5, completionTime: 5 },
      { processId: 2, priority: 1, burst: 9, arrival: 3, waitTime: 2, turnaroundTime: 11, completionTime: 14 },
      { processId: 3, priority: 3, burst: 6, arrival: 6, waitTime: 8, turnaroundTime: 14, completionTime: 20 },
    ]);
  });

  it('should compute averages and throughput over the last completion', () => {
    const metrics = new MetricsAccumulator(STAGGERED);
    metrics.complete(0, 5);
    metrics.complete(1, 14);
    metrics.complete(2, 20);

    const summary = metrics.summary();
    expect(summary.averageWait).toBeCloseTo(10 / 3, 10);
    expect(summary.averageTurnaround).toBe(10);
    expect(summary.throughput).toBe(0.15);
  });

  it('should use an explicit throughput denominator when given', () => {
    const metrics = new MetricsAccumulator([proc(1, 0, 4)]);
    metrics.complete(0, 4);

    expect(metrics.summary(8).throughput).toBe(0.125);
  });

  it('should clamp negative waits to zero', () => {
    const metrics = new MetricsAccumulator([proc(1, 2, 5)]);
    metrics.complete(0, 6);

    const [row] = metrics.results();
    expect(row.waitTime).toBe(0);
    expect(row.turnaroundTime).toBe(5);
  });

  it('should produce a zero summary for an empty batch', () => {
    const metrics = new MetricsAccumulator([]);

    expect(metrics.done).toBe(true);
    expect(metrics.results()).toEqual([]);
    expect(metrics.summary()).toEqual({ averageWait: 0, averageTurnaround: 0, throughput: 0 });
  });

  it('should reject a second completion for the same process', () => {
    const metrics = new MetricsAccumulator([proc(1, 0, 1)]);
    metrics.complete(0, 1);

    expect(() => metrics.complete(0, 2)).toThrow(/completed twice/);
  });

  it('should reject results while a process is unfinished', () => {
    const metrics = new MetricsAccumulator([proc(1, 0, 1), proc(2, 0, 1)]);
    metrics.complete(0, 1);

    expect(metrics.done).toBe(false);
    expect(metrics.isComplete(1)).toBe(false);
    expect(() => metrics.results()).toThrow(SchedulerError);
  });

  it('should reject unknown indices', () => {
    const metrics = new MetricsAccumulator([proc(1, 0, 1)]);
    expect(() => metrics.complete(3, 1)).toThrow(/No process at index 3/);
  });
});
