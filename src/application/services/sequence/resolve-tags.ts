/**
 * Tag Resolution Pass
 *
 * Rewrites every loop target to a 1-based position in a tag-free sequence and
 * drops the tag steps. Numeric targets refer to positions in the input (tags
 * counted), so they go through an old -> new position map; a tag anchors the
 * step that follows it.
 *
 * Pure: builds a new sequence and leaves the input untouched.
 * Idempotent: a sequence without tags and with numeric targets comes back equal.
 */

import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { Brand } from '../../../runtime/brand.js';
import type { Step, LoopStep, ResolvedStep } from '../../../domain/protocol/steps.js';
import { type ProtocolError, Err } from '../../../domain/protocol/error.js';
import { assertNever } from '../../../runtime/assert-never.js';

export type ResolvedSequence = Brand<readonly ResolvedStep[], 'ResolvedSequence'>;

export function resolveTags(steps: readonly Step[]): Result<ResolvedSequence, ProtocolError> {
  const tagAnchors = new Map<string, number>();
  // newPositions[i] is the resolved position of input element i.
  const newPositions: number[] = [];
  const resolved: ResolvedStep[] = [];
  let emitted = 0;

  for (const [index, step] of steps.entries()) {
    switch (step.kind) {
      case 'tag':
        tagAnchors.set(step.name, emitted + 1);
        newPositions.push(emitted + 1);
        break;

      case 'loop': {
        emitted += 1;
        newPositions.push(emitted);
        const target = resolveLoopTarget(step, index + 1, tagAnchors, newPositions);
        if (target.isErr()) return err(target.error);
        if (target.value >= emitted) return err(Err.emptyLoopBody(index + 1));
        resolved.push({ ...step, target: target.value });
        break;
      }

      case 'rest':
      case 'constant_current':
      case 'constant_voltage':
      case 'impedance_sweep':
        emitted += 1;
        newPositions.push(emitted);
        resolved.push({ ...step });
        break;

      default:
        return assertNever(step);
    }
  }

  const sequence: readonly ResolvedStep[] = resolved;
  return ok(sequence as ResolvedSequence);
}

function resolveLoopTarget(
  loop: LoopStep,
  position: number,
  tagAnchors: ReadonlyMap<string, number>,
  newPositions: readonly number[],
): Result<number, ProtocolError> {
  if (typeof loop.target === 'string') {
    // Only tags seen so far are in the map: a tag after its loop is as good as missing.
    const anchor = tagAnchors.get(loop.target);
    return anchor === undefined ? err(Err.missingTag(loop.target, position)) : ok(anchor);
  }

  const mapped = loop.target < position ? newPositions[loop.target - 1] : undefined;
  return mapped === undefined ? err(Err.loopStartNotBefore(loop.target, position)) : ok(mapped);
}
