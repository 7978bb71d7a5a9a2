/**
 * Simulator experiment exporter.
 *
 * Renders a protocol as the list of plain-English step sentences accepted by
 * battery simulators such as PyBaMM ("Charge at 0.5C until 4.2 V"). Simulators
 * have no loop primitive, so the sequence is fully unrolled.
 */

import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { Protocol, ResolvedStep, ConstantCurrentStep, ConstantVoltageStep } from '../../../domain/protocol/steps.js';
import { type ProtocolError, Err } from '../../../domain/protocol/error.js';
import { assertNever } from '../../../runtime/assert-never.js';
import { resolveTags } from '../sequence/resolve-tags.js';
import { checkNesting } from '../sequence/check-nesting.js';
import { unroll, type UnrollOptions } from '../sequence/unroll.js';

const FORMAT = 'simulator experiment';

export type SimulatorExperimentOptions = UnrollOptions;

export function toSimulatorExperiment(
  protocol: Protocol,
  options: SimulatorExperimentOptions = {},
): Result<readonly string[], ProtocolError> {
  return resolveTags(protocol.method)
    .andThen(checkNesting)
    .andThen((steps) =>
      renderSteps(steps).andThen((sentences) =>
        unroll(steps, options).map((trace) => trace.map((index) => sentences[index] ?? ''))
      )
    );
}

// Loop steps render to undefined; the unrolled trace never points at them.
function renderSteps(steps: readonly ResolvedStep[]): Result<readonly (string | undefined)[], ProtocolError> {
  const sentences: (string | undefined)[] = [];
  for (const [index, step] of steps.entries()) {
    switch (step.kind) {
      case 'rest':
        sentences.push(`Rest for ${step.untilTimeS} seconds`);
        break;
      case 'constant_current':
        sentences.push(describeConstantCurrent(step));
        break;
      case 'constant_voltage':
        sentences.push(describeConstantVoltage(step));
        break;
      case 'loop':
        sentences.push(undefined);
        break;
      case 'impedance_sweep':
        return err(Err.unsupportedStep(step.kind, FORMAT, index + 1));
      default:
        return assertNever(step);
    }
  }
  return ok(sentences);
}

function describeConstantCurrent(step: ConstantCurrentStep): string {
  let sentence = '';
  if (step.rateC) {
    sentence += step.rateC > 0 ? `Charge at ${step.rateC}C` : `Discharge at ${Math.abs(step.rateC)}C`;
  } else if (step.currentMa) {
    sentence += step.currentMa > 0 ? `Charge at ${step.currentMa} mA` : `Discharge at ${Math.abs(step.currentMa)} mA`;
  }
  if (step.untilTimeS) {
    sentence += ` for ${describeDuration(step.untilTimeS)}`;
  }
  if (step.untilVoltageV) {
    sentence += ` until ${step.untilVoltageV} V`;
  }
  return sentence;
}

function describeConstantVoltage(step: ConstantVoltageStep): string {
  let sentence = `Hold at ${step.voltageV} V`;
  const conditions: string[] = [];
  if (step.untilTimeS) {
    // Whole hours and minutes read as a duration, odd seconds as one more stop condition.
    if (step.untilTimeS % 60 === 0) {
      sentence += ` for ${describeDuration(step.untilTimeS)}`;
    } else {
      conditions.push(`for ${step.untilTimeS} seconds`);
    }
  }
  if (step.untilRateC) {
    conditions.push(`until ${step.untilRateC}C`);
  }
  if (step.untilCurrentMa) {
    conditions.push(`until ${step.untilCurrentMa} mA`);
  }
  if (conditions.length > 0) {
    sentence += ` ${conditions.join(' or ')}`;
  }
  return sentence;
}

function describeDuration(seconds: number): string {
  if (seconds % 3600 === 0) return `${seconds / 3600} hours`;
  if (seconds % 60 === 0) return `${seconds / 60} minutes`;
  return `${seconds} seconds`;
}
