import type { z } from 'zod';
import type {
  RestStepSchema,
  ConstantCurrentStepSchema,
  ConstantVoltageStepSchema,
  ImpedanceSweepStepSchema,
  LoopStepSchema,
  TagStepSchema,
  SampleParamsSchema,
  RecordParamsSchema,
  SafetyParamsSchema,
} from './schemas.js';

export type RestStep = Readonly<z.infer<typeof RestStepSchema>>;
export type ConstantCurrentStep = Readonly<z.infer<typeof ConstantCurrentStepSchema>>;
export type ConstantVoltageStep = Readonly<z.infer<typeof ConstantVoltageStepSchema>>;
export type ImpedanceSweepStep = Readonly<z.infer<typeof ImpedanceSweepStepSchema>>;
export type LoopStep = Readonly<z.infer<typeof LoopStepSchema>>;
export type TagStep = Readonly<z.infer<typeof TagStepSchema>>;

/** Steps that do something on the instrument. Loops and tags only steer. */
export type ExecutableStep = RestStep | ConstantCurrentStep | ConstantVoltageStep | ImpedanceSweepStep;

export type Step = ExecutableStep | LoopStep | TagStep;

export type StepKind = Step['kind'];

/**
 * A loop whose target has been rewritten to a 1-based position in the
 * tag-free sequence.
 */
export type ResolvedLoopStep = Omit<LoopStep, 'target'> & { readonly target: number };

export type ResolvedStep = ExecutableStep | ResolvedLoopStep;

export type SampleParams = Readonly<z.infer<typeof SampleParamsSchema>>;
export type RecordParams = Readonly<z.infer<typeof RecordParamsSchema>>;
export type SafetyParams = Readonly<z.infer<typeof SafetyParamsSchema>>;

export interface Protocol {
  readonly sample: SampleParams;
  readonly record: RecordParams;
  readonly safety: SafetyParams;
  readonly method: readonly Step[];
}

export function isLoopStep(step: Step): step is LoopStep {
  return step.kind === 'loop';
}

export function isTagStep(step: Step): step is TagStep {
  return step.kind === 'tag';
}

export function isExecutableStep(step: Step): step is ExecutableStep {
  return step.kind !== 'loop' && step.kind !== 'tag';
}
