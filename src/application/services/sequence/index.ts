export { resolveTags, type ResolvedSequence } from './resolve-tags.js';
export { checkNesting, loopIntervals, intervalsCross, type NestedSequence } from './check-nesting.js';
export { buildLoopTree, flattenLoopTree, unrolledLength, executedElementCount, type LoopTreeNode } from './loop-tree.js';
export { unroll, DEFAULT_MAX_UNROLL_STEPS, type UnrollOptions } from './unroll.js';
export { requireCapacityIfRateUsed } from './capacity.js';
