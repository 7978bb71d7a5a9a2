import type {
  RestStep,
  ConstantCurrentStep,
  ConstantVoltageStep,
  ImpedanceSweepStep,
  LoopStep,
  TagStep,
  ResolvedLoopStep,
  ResolvedStep,
  Protocol,
  Step,
} from '../../src/domain/protocol/steps.js';
import { parseProtocol } from '../../src/domain/protocol/protocol.js';
import { resolveTags } from '../../src/application/services/sequence/resolve-tags.js';
import { checkNesting, type NestedSequence } from '../../src/application/services/sequence/check-nesting.js';
import { expectOk } from './result-helpers.js';

export const rest = (untilTimeS = 1): RestStep => ({ kind: 'rest', untilTimeS });

export const cc = (fields: Omit<ConstantCurrentStep, 'kind'>): ConstantCurrentStep => ({
  kind: 'constant_current',
  ...fields,
});

export const cv = (fields: Omit<ConstantVoltageStep, 'kind'>): ConstantVoltageStep => ({
  kind: 'constant_voltage',
  ...fields,
});

export const eis = (): ImpedanceSweepStep => ({
  kind: 'impedance_sweep',
  amplitudeV: 0.01,
  startFrequencyHz: 1e4,
  endFrequencyHz: 0.1,
  pointsPerDecade: 10,
  measuresPerPoint: 1,
  driftCorrection: false,
});

export const loop = (target: number | string, repeatCount: number): LoopStep => ({
  kind: 'loop',
  target,
  repeatCount,
});

export const tag = (name: string): TagStep => ({ kind: 'tag', name });

/** Loop with an already resolved, 1-based target. */
export const resolvedLoop = (target: number, repeatCount: number): ResolvedLoopStep => ({
  kind: 'loop',
  target,
  repeatCount,
});

export function nested(steps: readonly Step[]): NestedSequence {
  return expectOk(resolveTags(steps).andThen(checkNesting), 'resolving and nesting-checking');
}

export function nestedResolved(steps: readonly ResolvedStep[]): NestedSequence {
  return expectOk(checkNesting(steps), 'nesting-checking');
}

/** Valid protocol around the given method; sample and record are fixed. */
export function protocolWith(method: readonly unknown[], sample: Record<string, unknown> = { name: 'cell-01', capacityMah: 2 }): Protocol {
  return expectOk(parseProtocol({ sample, record: { timeS: 10 }, method }), 'parsing test protocol');
}
