/**
 * Lab-automation JSON exporter (tomato 0.2 payload for a Biologic MPG2).
 *
 * The device loops natively with `goto` + `n_gotos`, so the resolved,
 * index-based sequence is used as is: goto is the 0-based target and n_gotos
 * counts jumps, one less than the total number of passes.
 */

import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { Protocol, RecordParams, ResolvedStep } from '../../../domain/protocol/steps.js';
import { type ProtocolError, Err } from '../../../domain/protocol/error.js';
import { assertNever } from '../../../runtime/assert-never.js';
import { withOverrides } from '../../../domain/protocol/protocol.js';
import { resolveTags } from '../sequence/resolve-tags.js';
import { checkNesting } from '../sequence/check-nesting.js';
import { requireCapacityIfRateUsed } from '../sequence/capacity.js';

const FORMAT = 'lab-automation JSON';

export const SAMPLE_NAME_PLACEHOLDER = '$NAME';
export const DEFAULT_AUTOMATION_OUTPUT_PATH = 'C:/tomato_data';

export type AutomationStep = Record<string, string | number>;

export interface AutomationDocument {
  readonly version: '0.1';
  readonly sample: { readonly name: string; readonly capacity_mAh: number | null };
  readonly method: readonly AutomationStep[];
  readonly tomato: {
    readonly unlock_when_done: boolean;
    readonly verbosity: 'DEBUG';
    readonly output: { readonly path: string; readonly prefix: string };
  };
}

export interface AutomationJsonOptions {
  readonly sampleName?: string;
  readonly capacityMah?: number;
  /** Where the automation host stores measured data. */
  readonly outputPath?: string;
}

export function toAutomationDocument(
  protocol: Protocol,
  options: AutomationJsonOptions = {},
): Result<AutomationDocument, ProtocolError> {
  const working = withOverrides(protocol, options);
  const { name, capacityMah } = working.sample;

  if (!name || name === SAMPLE_NAME_PLACEHOLDER) {
    return err(Err.missingSampleName());
  }

  return requireCapacityIfRateUsed(working.method, capacityMah)
    .andThen(() => resolveTags(working.method))
    .andThen(checkNesting)
    .andThen((steps) => renderMethod(steps, working.record))
    .map((method) => ({
      version: '0.1' as const,
      sample: { name, capacity_mAh: capacityMah ?? null },
      method,
      tomato: {
        unlock_when_done: true,
        verbosity: 'DEBUG' as const,
        output: { path: options.outputPath ?? DEFAULT_AUTOMATION_OUTPUT_PATH, prefix: name },
      },
    }));
}

export function toAutomationJson(protocol: Protocol, options: AutomationJsonOptions = {}): Result<string, ProtocolError> {
  return toAutomationDocument(protocol, options).map((doc) => JSON.stringify(doc, null, 4));
}

function renderMethod(
  steps: readonly ResolvedStep[],
  record: RecordParams,
): Result<readonly AutomationStep[], ProtocolError> {
  const method: AutomationStep[] = [];
  for (const [index, step] of steps.entries()) {
    const rendered = renderStep(step, index + 1, record);
    if (rendered.isErr()) return err(rendered.error);
    method.push(rendered.value);
  }
  return ok(method);
}

function renderStep(step: ResolvedStep, position: number, record: RecordParams): Result<AutomationStep, ProtocolError> {
  switch (step.kind) {
    case 'rest':
      return ok({ ...measured('open_circuit_voltage', record), time: step.untilTimeS });

    case 'constant_current': {
      const out = measured('constant_current', record);
      let charging: boolean;
      if (step.rateC) {
        charging = step.rateC > 0;
        out.current = charging ? `${step.rateC}C` : `${Math.abs(step.rateC)}D`;
      } else if (step.currentMa) {
        charging = step.currentMa > 0;
        out.current = step.currentMa / 1000;
      } else {
        return err(Err.schemaInvalid([{ path: `method.${position - 1}`, message: 'Must have a current or C-rate' }]));
      }
      if (step.untilTimeS) out.time = step.untilTimeS;
      if (step.untilVoltageV) {
        out[charging ? 'limit_voltage_max' : 'limit_voltage_min'] = step.untilVoltageV;
      }
      return ok(out);
    }

    case 'constant_voltage': {
      const out = measured('constant_voltage', record);
      out.voltage = step.voltageV;
      if (step.untilTimeS) out.time = step.untilTimeS;
      if (step.untilRateC) {
        if (step.untilRateC > 0) {
          out.limit_current_min = `${step.untilRateC}C`;
        } else {
          out.limit_current_max = `${Math.abs(step.untilRateC)}D`;
        }
      }
      return ok(out);
    }

    case 'loop':
      return ok({ device: 'MPG2', technique: 'loop', goto: step.target - 1, n_gotos: step.repeatCount - 1 });

    case 'impedance_sweep':
      return err(Err.unsupportedStep(step.kind, FORMAT, position));

    default:
      return assertNever(step);
  }
}

function measured(technique: string, record: RecordParams): AutomationStep {
  const out: AutomationStep = { device: 'MPG2', technique };
  if (record.timeS) out.measure_every_dt = record.timeS;
  if (record.currentMa) out.measure_every_dI = record.currentMa;
  if (record.voltageV) out.measure_every_dE = record.voltageV;
  out.I_range = '10 mA';
  out.E_range = '+-5.0 V';
  return out;
}
