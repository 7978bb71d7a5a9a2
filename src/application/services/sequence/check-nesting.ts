/**
 * Interval Nesting Check
 *
 * A loop at position p targeting t covers [t, p]. Exporters can only express
 * loops that nest: any two intervals must be disjoint or one must contain the
 * other. Partial overlap is rejected, never repaired.
 */

import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { Brand } from '../../../runtime/brand.js';
import type { ResolvedStep } from '../../../domain/protocol/steps.js';
import { type ProtocolError, type LoopInterval, Err } from '../../../domain/protocol/error.js';

/** A resolved sequence whose loops are known to nest. */
export type NestedSequence = Brand<readonly ResolvedStep[], 'NestedSequence'>;

/** Loop intervals of a resolved sequence, sorted by start then end (1-based). */
export function loopIntervals(steps: readonly ResolvedStep[]): readonly LoopInterval[] {
  const intervals: LoopInterval[] = [];
  steps.forEach((step, index) => {
    if (step.kind === 'loop') intervals.push({ start: step.target, end: index + 1 });
  });
  return intervals.sort((a, b) => a.start - b.start || a.end - b.end);
}

/** True when the intervals overlap without one containing the other. */
export function intervalsCross(a: LoopInterval, b: LoopInterval): boolean {
  const [first, second] = a.start <= b.start ? [a, b] : [b, a];
  return first.start < second.start && second.start <= first.end && first.end < second.end;
}

export function checkNesting(steps: readonly ResolvedStep[]): Result<NestedSequence, ProtocolError> {
  const intervals = loopIntervals(steps);

  for (let i = 0; i < intervals.length; i++) {
    const current = intervals[i];
    for (let j = i + 1; j < intervals.length; j++) {
      const later = intervals[j];
      // Sorted by start: nothing further along can reach back into `current`.
      if (later.start > current.end) break;
      if (intervalsCross(current, later)) {
        return err(Err.intersectingLoops(current, later));
      }
    }
  }

  return ok(steps as NestedSequence);
}
