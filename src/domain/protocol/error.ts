/**
 * Protocol errors are data. Every failure of construction, resolution or export
 * is one of these, returned through a Result and never thrown.
 *
 * Positions are 1-based. Construction-time errors use positions in the method
 * as written (tags included); resolution-time errors use positions in the
 * resolved, tag-free sequence.
 */

import type { StepKind } from './steps.js';

export interface SchemaIssue {
  readonly path: string;
  readonly message: string;
}

export interface LoopInterval {
  readonly start: number;
  readonly end: number;
}

export type StructuralError =
  | { readonly _tag: 'EmptyMethod'; readonly message: string }
  | { readonly _tag: 'DuplicateTags'; readonly tags: readonly string[]; readonly message: string }
  | {
      readonly _tag: 'LoopNotBackwards';
      readonly loopPosition: number;
      readonly target: number | string;
      readonly targetPosition: number;
      readonly message: string;
    }
  | { readonly _tag: 'MissingTag'; readonly tag: string; readonly loopPosition: number; readonly message: string }
  | {
      readonly _tag: 'EmptyLoopBody';
      readonly loopPosition: number;
      readonly tag?: string;
      readonly message: string;
    };

export type ProtocolError =
  | { readonly _tag: 'SchemaInvalid'; readonly issues: readonly SchemaIssue[]; readonly message: string }
  | StructuralError
  | {
      readonly _tag: 'IntersectingLoops';
      readonly first: LoopInterval;
      readonly second: LoopInterval;
      readonly message: string;
    }
  | {
      readonly _tag: 'RunawayExpansion';
      readonly maxIterations: number;
      readonly stepsTaken: number;
      readonly message: string;
    }
  | { readonly _tag: 'MissingCapacity'; readonly positions: readonly number[]; readonly message: string }
  | { readonly _tag: 'MissingSampleName'; readonly message: string }
  | {
      readonly _tag: 'UnsupportedStep';
      readonly kind: StepKind;
      readonly format: string;
      readonly position: number;
      readonly message: string;
    };

export type ProtocolErrorTag = ProtocolError['_tag'];

const formatInterval = (interval: LoopInterval): string => `[${interval.start}, ${interval.end}]`;

export const Err = {
  schemaInvalid: (issues: readonly SchemaIssue[]): ProtocolError => ({
    _tag: 'SchemaInvalid',
    issues,
    message: `Protocol does not match the schema:\n${issues.map((i) => `  - ${i.path}: ${i.message}`).join('\n')}`,
  }),

  emptyMethod: (): StructuralError => ({
    _tag: 'EmptyMethod',
    message: 'Protocol method contains no executable steps, only tags.',
  }),

  duplicateTags: (tags: readonly string[]): StructuralError => ({
    _tag: 'DuplicateTags',
    tags,
    message: `Duplicate tags: ${tags.map((t) => `'${t}'`).join(', ')}`,
  }),

  loopStartNotBefore: (target: number, loopPosition: number): StructuralError => ({
    _tag: 'LoopNotBackwards',
    loopPosition,
    target,
    targetPosition: target,
    message: `Loop start index ${target} cannot be on or after the loop index ${loopPosition}.`,
  }),

  loopGoesForwards: (tag: string, loopPosition: number, tagPosition: number): StructuralError => ({
    _tag: 'LoopNotBackwards',
    loopPosition,
    target: tag,
    targetPosition: tagPosition,
    message: `Loops must go backwards, '${tag}' goes forwards (${loopPosition}->${tagPosition}).`,
  }),

  missingTag: (tag: string, loopPosition: number): StructuralError => ({
    _tag: 'MissingTag',
    tag,
    loopPosition,
    message: `Tag '${tag}' is missing.`,
  }),

  loopStartsAfterTag: (tag: string, loopPosition: number): StructuralError => ({
    _tag: 'EmptyLoopBody',
    loopPosition,
    tag,
    message: `Loop '${tag}' cannot start immediately after its tag.`,
  }),

  emptyLoopBody: (loopPosition: number): StructuralError => ({
    _tag: 'EmptyLoopBody',
    loopPosition,
    message: `Loop at position ${loopPosition} has no steps to repeat.`,
  }),

  intersectingLoops: (first: LoopInterval, second: LoopInterval): ProtocolError => ({
    _tag: 'IntersectingLoops',
    first,
    second,
    message: `Protocol has intersecting loops: ${formatInterval(first)} and ${formatInterval(second)}.`,
  }),

  runawayExpansion: (maxIterations: number, stepsTaken: number): ProtocolError => ({
    _tag: 'RunawayExpansion',
    maxIterations,
    stepsTaken,
    message: `Unrolling stopped after ${stepsTaken} steps (limit ${maxIterations}), likely a loop definition error.`,
  }),

  missingCapacity: (positions: readonly number[]): ProtocolError => ({
    _tag: 'MissingCapacity',
    positions,
    message: `Sample capacity must be set if using C-rate steps (steps ${positions.join(', ')}).`,
  }),

  missingSampleName: (): ProtocolError => ({
    _tag: 'MissingSampleName',
    message: 'If using a blank sample name or the $NAME placeholder, a sample name must be provided.',
  }),

  unsupportedStep: (kind: StepKind, format: string, position: number): ProtocolError => ({
    _tag: 'UnsupportedStep',
    kind,
    format,
    position,
    message: `Step kind '${kind}' at position ${position} is not supported by the ${format} exporter.`,
  }),
} as const;

const STRUCTURAL_TAGS: ReadonlySet<ProtocolErrorTag> = new Set<ProtocolErrorTag>([
  'EmptyMethod',
  'DuplicateTags',
  'LoopNotBackwards',
  'MissingTag',
  'EmptyLoopBody',
]);

export function isStructuralError(e: ProtocolError): e is StructuralError {
  return STRUCTURAL_TAGS.has(e._tag);
}
