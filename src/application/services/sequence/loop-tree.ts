/**
 * Loop Tree Builder
 *
 * Turns a flat, nested-checked sequence into a tree for exporters that need
 * iteration blocks: plain steps are leaves, each loop wraps the steps it
 * repeats. Document order is preserved.
 *
 * Walks backwards: meeting a loop first means its whole body is still ahead
 * in the walk, so the body is grouped recursively and then skipped at this
 * depth. Recursion depth equals loop nesting depth.
 */

import type { ExecutableStep } from '../../../domain/protocol/steps.js';
import type { NestedSequence } from './check-nesting.js';

export type LoopTreeNode =
  | { readonly kind: 'step'; readonly index: number; readonly step: ExecutableStep }
  | {
      readonly kind: 'repeat';
      readonly count: number;
      readonly loopIndex: number;
      readonly body: readonly LoopTreeNode[];
    };

export function buildLoopTree(steps: NestedSequence): readonly LoopTreeNode[] {
  return groupRange(steps, 0, steps.length);
}

/** Leaf indices in order: the executable steps of one pass, loops not taken. */
export function flattenLoopTree(nodes: readonly LoopTreeNode[]): readonly number[] {
  return nodes.flatMap((node) => (node.kind === 'step' ? [node.index] : flattenLoopTree(node.body)));
}

/**
 * Executable steps a full run performs, counted without expanding: the
 * length `unroll` would return, free of any ceiling.
 */
export function unrolledLength(nodes: readonly LoopTreeNode[]): number {
  return nodes.reduce((total, node) => total + (node.kind === 'step' ? 1 : node.count * unrolledLength(node.body)), 0);
}

/**
 * Elements a full run executes, loop steps included (a loop step runs once
 * per pass). This is what the unroll ceiling is measured against.
 */
export function executedElementCount(nodes: readonly LoopTreeNode[]): number {
  return nodes.reduce(
    (total, node) => total + (node.kind === 'step' ? 1 : node.count * (executedElementCount(node.body) + 1)),
    0
  );
}

// Indices are 0-based; `from` inclusive, `to` exclusive.
function groupRange(steps: NestedSequence, from: number, to: number): LoopTreeNode[] {
  const nodes: LoopTreeNode[] = [];
  let skipFrom: number | undefined;

  for (let index = to - 1; index >= from; index--) {
    if (skipFrom !== undefined && index >= skipFrom) continue;

    const step = steps[index];
    if (step.kind === 'loop') {
      const start = step.target - 1;
      if (start < from) {
        throw new Error(`Loop at index ${index} reaches outside its enclosing range; sequence was not nesting-checked`);
      }
      nodes.push({
        kind: 'repeat',
        count: step.repeatCount,
        loopIndex: index,
        body: groupRange(steps, start, index),
      });
      skipFrom = start;
    } else {
      nodes.push({ kind: 'step', index, step });
    }
  }

  return nodes.reverse();
}
