import { describe, it, expect, beforeEach } from 'vitest';
import { TimelineRecorder } from '../../../src/scheduling/timeline.js';
import { SchedulerError } from '../../../src/api/errors.js';

describe('TimelineRecorder', () => {
  let timeline: TimelineRecorder;

  beforeEach(() => {
    timeline = new TimelineRecorder();
  });

  it('should start empty', () => {
    expect(timeline.intervals()).toEqual([]);
    expect(timeline.size).toBe(0);
    expect(timeline.end).toBe(0);
  });

  it('should record intervals in order', () => {
    timeline.record(1, 0, 3);
    timeline.record(2, 3, 5);

    expect(timeline.intervals()).toEqual([
      { processId: 1, start: 0, stop: 3 },
      { processId: 2, start: 3, stop: 5 },
    ]);
    expect(timeline.end).toBe(5);
  });

  it('should merge contiguous intervals of the same process', () => {
    timeline.record(1, 0, 2);
    timeline.record(1, 2, 4);
    timeline.record(1, 4, 5);

    expect(timeline.intervals()).toEqual([{ processId: 1, start: 0, stop: 5 }]);
  });

  it('should keep same-process intervals separate across idle time', () => {
    timeline.record(1, 0, 2);
    timeline.record(1, 4, 6);

    expect(timeline.size).toBe(2);
    expect(timeline.durationOf(1)).toBe(4);
  });

  it('should ignore zero-length intervals', () => {
    timeline.record(1, 3, 3);
    expect(timeline.size).toBe(0);
  });

  it('should reject overlapping intervals', () => {
    timeline.record(1, 0, 4);

    expect(() => timeline.record(2, 3, 6)).toThrow(SchedulerError);
    expect(() => timeline.record(2, 3, 6)).toThrow(/overlaps/);
  });

  it('should reject reversed intervals', () => {
    try {
      timeline.record(1, 5, 2);
      expect.unreachable('record should throw');
    } catch (error) {
      expect(error).toBeInstanceOf(SchedulerError);
      expect(error).toMatchObject({ code: 'InvariantViolation' });
    }
  });

  it('should return copies of recorded intervals', () => {
    timeline.record(1, 0, 2);
    const snapshot = timeline.intervals();
    snapshot[0].stop = 100;

    expect(timeline.intervals()[0].stop).toBe(2);
  });
});
