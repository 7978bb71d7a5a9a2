import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { Step } from './steps.js';
import { isLoopStep, isTagStep, isExecutableStep } from './steps.js';
import { type StructuralError, Err } from './error.js';

/**
 * Structural checks on loops and tags, run when a protocol is constructed.
 *
 * Works on the method as written: positions are 1-based and count tags.
 * Nesting of loop intervals is not checked here; that needs resolved
 * positions (see checkNesting).
 */
export function validateStructure(method: readonly Step[]): Result<void, StructuralError> {
  if (!method.some(isExecutableStep)) {
    return err(Err.emptyMethod());
  }

  const duplicates = findDuplicateTags(method);
  if (duplicates.length > 0) {
    return err(Err.duplicateTags(duplicates));
  }

  const tagPositions = new Map<string, number>();
  method.forEach((step, index) => {
    if (isTagStep(step)) tagPositions.set(step.name, index + 1);
  });

  for (const [index, step] of method.entries()) {
    if (!isLoopStep(step)) continue;
    const position = index + 1;

    if (typeof step.target === 'number') {
      if (step.target >= position) {
        return err(Err.loopStartNotBefore(step.target, position));
      }
      if (!hasExecutableBetween(method, step.target, position)) {
        return err(Err.emptyLoopBody(position));
      }
      continue;
    }

    const tagPosition = tagPositions.get(step.target);
    if (tagPosition === undefined) {
      return err(Err.missingTag(step.target, position));
    }
    if (position <= tagPosition) {
      return err(Err.loopGoesForwards(step.target, position, tagPosition));
    }
    if (!hasExecutableBetween(method, tagPosition + 1, position)) {
      return err(Err.loopStartsAfterTag(step.target, position));
    }
  }

  return ok(undefined);
}

/** Every duplicated tag name, once each, in order of first appearance. */
function findDuplicateTags(method: readonly Step[]): readonly string[] {
  const seen = new Set<string>();
  const duplicates: string[] = [];
  for (const step of method) {
    if (!isTagStep(step)) continue;
    if (seen.has(step.name) && !duplicates.includes(step.name)) {
      duplicates.push(step.name);
    }
    seen.add(step.name);
  }
  return duplicates;
}

// Positions are 1-based; `from` inclusive, `to` exclusive.
function hasExecutableBetween(method: readonly Step[], from: number, to: number): boolean {
  return method.slice(from - 1, to - 1).some(isExecutableStep);
}
