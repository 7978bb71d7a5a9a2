import { describe, it, expect } from 'vitest';
import { unroll, DEFAULT_MAX_UNROLL_STEPS } from '../../../src/application/services/sequence/unroll.js';
import { rest, loop, tag, nested, nestedResolved, resolvedLoop } from '../../helpers/protocol-builders.js';
import { expectOk, expectErr } from '../../helpers/result-helpers.js';

describe('unroll', () => {
  it('returns a loop-free sequence as is', () => {
    expect(expectOk(unroll(nestedResolved([rest(), rest(), rest()])), 'no loops')).toEqual([0, 1, 2]);
  });

  it('runs a loop body repeatCount times in total', () => {
    const steps = nested([tag('a'), rest(1), rest(2), loop('a', 3)]);

    expect(expectOk(unroll(steps), 'simple loop')).toEqual([0, 1, 0, 1, 0, 1]);
  });

  it('runs a loop with repeatCount 1 once', () => {
    expect(expectOk(unroll(nestedResolved([rest(), resolvedLoop(1, 1), rest()])), 'single pass')).toEqual([0, 2]);
  });

  it('multiplies nested repeat counts', () => {
    const steps = nested([tag('A'), tag('B'), rest(), loop('B', 12), loop('A', 34)]);

    const trace = expectOk(unroll(steps), 'nested loops');

    expect(trace).toHaveLength(408);
    expect(new Set(trace)).toEqual(new Set([0]));
  });

  it('resets an inner loop on every outer pass', () => {
    // outer: [1, 5], inner: [2, 3]
    const steps = nestedResolved([rest(), rest(), resolvedLoop(2, 2), rest(), resolvedLoop(1, 2)]);

    expect(expectOk(unroll(steps), 'inner reset')).toEqual([0, 1, 1, 3, 0, 1, 1, 3]);
  });

  it('stops runaway expansion at the ceiling', () => {
    const steps = nested([
      tag('t1'), tag('t2'), tag('t3'), tag('t4'), tag('t5'),
      rest(),
      loop('t5', 100), loop('t4', 100), loop('t3', 100), loop('t2', 100), loop('t1', 100),
    ]);

    const error = expectErr(unroll(steps, { maxIterations: 10_000 }), 'runaway');

    expect(error).toEqual({
      _tag: 'RunawayExpansion',
      maxIterations: 10_000,
      stepsTaken: 10_001,
      message: 'Unrolling stopped after 10001 steps (limit 10000), likely a loop definition error.',
    });
  });

  it('counts loop steps toward the ceiling', () => {
    // rest, loop, rest, loop, rest, loop: six executed elements
    const steps = nestedResolved([rest(), resolvedLoop(1, 3)]);

    expect(expectOk(unroll(steps, { maxIterations: 6 }), 'exactly at the ceiling')).toEqual([0, 0, 0]);
    expect(expectErr(unroll(steps, { maxIterations: 5 }), 'one over')).toMatchObject({
      _tag: 'RunawayExpansion',
      stepsTaken: 6,
    });
  });

  it('defaults the ceiling to 10 000 executed elements', () => {
    expect(DEFAULT_MAX_UNROLL_STEPS).toBe(10_000);

    const steps = nestedResolved([rest(), resolvedLoop(1, 5001)]);
    const error = expectErr(unroll(steps), 'default ceiling');

    expect(error).toMatchObject({ _tag: 'RunawayExpansion', maxIterations: 10_000 });
  });
});
