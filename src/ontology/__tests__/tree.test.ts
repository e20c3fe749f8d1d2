import { describe, expect, it } from 'vitest';
import { createRun, findStep, isRunComplete, walkSteps } from '../index.js';

const T0 = '2026-03-01T10:00:00Z';
const T1 = '2026-03-01T10:00:05Z';

function nestedRun(endTimes: { c?: string } = {}) {
  return createRun({
    id: 'run-tree',
    name: 'tree',
    start_time: T0,
    steps: [
      {
        id: 'a',
        name: 'A',
        start_time: T0,
        end_time: T1,
        sub_steps: [
          {
            id: 'b',
            name: 'B',
            start_time: T0,
            end_time: T1,
            sub_steps: [{ id: 'c', name: 'C', start_time: T0, end_time: endTimes.c }],
          },
          { id: 'd', name: 'D', start_time: T0, end_time: T1 },
        ],
      },
      { id: 'e', name: 'E', start_time: T0, end_time: T1 },
    ],
  });
}

describe('walkSteps', () => {
  it('visits every step once in pre-order', () => {
    const visits = walkSteps(nestedRun());

    expect(visits.map((visit) => visit.step.id)).toEqual(['a', 'b', 'c', 'd', 'e']);
    expect(visits.map((visit) => visit.depth)).toEqual([0, 1, 2, 1, 0]);
    expect(visits.map((visit) => visit.parentId)).toEqual([null, 'a', 'b', 'a', null]);
    expect(visits.map((visit) => visit.index)).toEqual([0, 0, 0, 1, 1]);
  });

  it('returns nothing for a run without steps', () => {
    expect(walkSteps(createRun({ id: 'r', name: 'r', start_time: T0 }))).toEqual([]);
  });
});

describe('findStep', () => {
  it('finds nested steps by id', () => {
    expect(findStep(nestedRun(), 'c')?.name).toBe('C');
  });

  it('returns null for unknown ids', () => {
    expect(findStep(nestedRun(), 'missing')).toBeNull();
  });
});

describe('isRunComplete', () => {
  it('is false while any nested step is open', () => {
    expect(isRunComplete(nestedRun())).toBe(false);
  });

  it('is true once every step has ended', () => {
    expect(isRunComplete(nestedRun({ c: T1 }))).toBe(true);
  });

  it('treats a run without steps as complete', () => {
    expect(isRunComplete(createRun({ id: 'r', name: 'r', start_time: T0 }))).toBe(true);
  });
});
