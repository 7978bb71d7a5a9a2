import { describe, it, expect } from 'vitest';
import { checkNesting, loopIntervals, intervalsCross } from '../../../src/application/services/sequence/check-nesting.js';
import { rest, resolvedLoop } from '../../helpers/protocol-builders.js';
import { expectErr, isOk } from '../../helpers/result-helpers.js';

describe('loopIntervals', () => {
  it('lists [target, position] per loop, sorted by start then end', () => {
    const steps = [rest(), rest(), rest(), rest(), resolvedLoop(2, 2), rest(), resolvedLoop(1, 2), resolvedLoop(2, 2)];

    expect(loopIntervals(steps)).toEqual([
      { start: 1, end: 7 },
      { start: 2, end: 5 },
      { start: 2, end: 8 },
    ]);
  });
});

describe('intervalsCross', () => {
  it.each([
    [{ start: 1, end: 5 }, { start: 3, end: 7 }, true],
    [{ start: 3, end: 7 }, { start: 1, end: 5 }, true],
    [{ start: 1, end: 3 }, { start: 3, end: 5 }, true],
    [{ start: 1, end: 7 }, { start: 2, end: 5 }, false],
    [{ start: 1, end: 2 }, { start: 3, end: 4 }, false],
    [{ start: 1, end: 4 }, { start: 1, end: 6 }, false],
  ])('%o and %o cross: %s', (a, b, expected) => {
    expect(intervalsCross(a, b)).toBe(expected);
  });
});

describe('checkNesting', () => {
  it('rejects partially overlapping loops', () => {
    const steps = [rest(), rest(), rest(), rest(), resolvedLoop(1, 2), rest(), resolvedLoop(3, 2)];

    const error = expectErr(checkNesting(steps), 'partial overlap');

    expect(error).toEqual({
      _tag: 'IntersectingLoops',
      first: { start: 1, end: 5 },
      second: { start: 3, end: 7 },
      message: 'Protocol has intersecting loops: [1, 5] and [3, 7].',
    });
  });

  it('accepts nested loops', () => {
    const steps = [rest(), rest(), rest(), rest(), resolvedLoop(2, 2), rest(), resolvedLoop(1, 2)];

    expect(isOk(checkNesting(steps))).toBe(true);
  });

  it('accepts loops side by side', () => {
    expect(isOk(checkNesting([rest(), resolvedLoop(1, 2), rest(), resolvedLoop(3, 2)]))).toBe(true);
  });

  it('rejects a loop whose body starts on another loop step', () => {
    const error = expectErr(
      checkNesting([rest(), rest(), resolvedLoop(1, 2), rest(), resolvedLoop(3, 2)]),
      'shared endpoint'
    );

    expect(error.message).toBe('Protocol has intersecting loops: [1, 3] and [3, 5].');
  });

  it('finds a crossing past a disjoint neighbour', () => {
    // [1, 9] contains [2, 3]; [5, 10] crosses [1, 9].
    const steps = [
      rest(), rest(), resolvedLoop(2, 2), rest(), rest(), rest(), rest(), rest(), resolvedLoop(1, 2), resolvedLoop(5, 2),
    ];

    const error = expectErr(checkNesting(steps), 'later crossing');

    expect(error.message).toBe('Protocol has intersecting loops: [1, 9] and [5, 10].');
  });
});
