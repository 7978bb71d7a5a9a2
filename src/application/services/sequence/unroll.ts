/**
 * Loop Unroller
 *
 * Expands a nested-checked sequence into the list of executable steps one run
 * actually performs, for exporters with no looping primitive.
 *
 * Simulates a program counter. A loop with repeatCount n sends execution back
 * to its target n - 1 times, so its body runs n times in total. Jumping back
 * over an inner loop resets that loop's counter, otherwise inner loops would
 * run short on every outer pass after the first.
 */

import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import { type ProtocolError, Err } from '../../../domain/protocol/error.js';
import type { NestedSequence } from './check-nesting.js';

export const DEFAULT_MAX_UNROLL_STEPS = 10_000;

export interface UnrollOptions {
  /** Ceiling on executed elements (loop steps included). */
  readonly maxIterations?: number;
}

/** Returns 0-based indices into `steps`; loop steps are left out. */
export function unroll(steps: NestedSequence, options: UnrollOptions = {}): Result<readonly number[], ProtocolError> {
  const maxIterations = options.maxIterations ?? DEFAULT_MAX_UNROLL_STEPS;

  // Jumps already taken, per loop index.
  const jumps = new Map<number, number>();
  steps.forEach((step, index) => {
    if (step.kind === 'loop') jumps.set(index, 0);
  });

  const trace: number[] = [];
  let stepsTaken = 0;
  let index = 0;

  while (index < steps.length) {
    stepsTaken += 1;
    if (stepsTaken > maxIterations) {
      return err(Err.runawayExpansion(maxIterations, stepsTaken));
    }

    const step = steps[index];
    if (step.kind !== 'loop') {
      trace.push(index);
      index += 1;
      continue;
    }

    const taken = jumps.get(index) ?? 0;
    if (taken < step.repeatCount - 1) {
      const start = step.target - 1;
      for (const loopIndex of jumps.keys()) {
        if (loopIndex >= start && loopIndex < index) jumps.set(loopIndex, 0);
      }
      jumps.set(index, taken + 1);
      index = start;
    } else {
      index += 1;
    }
  }

  return ok(trace);
}
