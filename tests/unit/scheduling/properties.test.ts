/**
 * Schedule invariants checked for every algorithm over every sample table
 */

import { describe, it, expect } from 'vitest';
import { ALGORITHMS, scheduleFcfs, scheduleRoundRobin, scheduleSjf } from '../../../src/scheduling/index.js';
import { TABLES, expectValidSchedule, proc } from '../../helpers/process-tables.js';

describe('schedule invariants', () => {
  for (const algorithm of ALGORITHMS) {
    describe(algorithm.name, () => {
      for (const [name, processes] of Object.entries(TABLES)) {
        it(`should produce a valid schedule for the ${name} table`, () => {
          expectValidSchedule(algorithm.run(processes), processes);
        });
      }

      it('should give a lone process zero wait', () => {
        const [row] = algorithm.run([proc(1, 0, 5)]).results;

        expect(row.waitTime).toBe(0);
        expect(row.turnaroundTime).toBe(5);
      });
    });
  }
});

describe('algorithm equivalences', () => {
  for (const [name, processes] of Object.entries(TABLES)) {
    it(`should match FCFS with round-robin at an infinite quantum (${name})`, () => {
      const fcfs = scheduleFcfs(processes);
      const rr = scheduleRoundRobin(processes, { quantum: Number.POSITIVE_INFINITY });

      expect(rr.timeline).toEqual(fcfs.timeline);
      expect(rr.results).toEqual(fcfs.results);
      expect(rr.summary).toEqual(fcfs.summary);
    });
  }

  it('should match FCFS with SJF when bursts are already ascending', () => {
    const processes = [proc(1, 0, 1), proc(2, 0, 2), proc(3, 0, 4)];
    const fcfs = scheduleFcfs(processes);
    const sjf = scheduleSjf(processes);

    expect(sjf.timeline).toEqual(fcfs.timeline);
    expect(sjf.results).toEqual(fcfs.results);
    expect(sjf.summary).toEqual(fcfs.summary);
  });

  it.each([
    ['at time zero', proc(1, 0, 5, 3)],
    ['after idle time', proc(7, 4, 3, 1)],
  ])('should schedule a single process identically everywhere (%s)', (_, process) => {
    const [first, ...rest] = ALGORITHMS.map((algorithm) => algorithm.run([process]));

    for (const result of rest) {
      expect(result.timeline).toEqual(first.timeline);
      expect(result.results).toEqual(first.results);
      expect(result.summary).toEqual(first.summary);
    }
  });
});
