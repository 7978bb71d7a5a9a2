/**
 * Ontology JSON-LD exporter.
 *
 * Describes a protocol with the battery domain ontology terms used by
 * BattINFO/EMMO: each step is a task (`Resting`, `Charging`, `Discharging`,
 * `Hold`), each loop an `IterativeWorkflow` whose body hangs off `hasTask`,
 * and siblings are chained through `hasNext`. Needs the loop tree.
 */

import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type {
  Protocol,
  ExecutableStep,
  ConstantCurrentStep,
  ConstantVoltageStep,
} from '../../../domain/protocol/steps.js';
import { type ProtocolError, Err } from '../../../domain/protocol/error.js';
import { assertNever } from '../../../runtime/assert-never.js';
import { withOverrides } from '../../../domain/protocol/protocol.js';
import { resolveTags } from '../sequence/resolve-tags.js';
import { checkNesting } from '../sequence/check-nesting.js';
import { buildLoopTree, type LoopTreeNode } from '../sequence/loop-tree.js';

const FORMAT = 'ontology JSON-LD';

export const ONTOLOGY_CONTEXT_URL = 'https://w3id.org/emmo/domain/battery/context';

export interface OntologyQuantity {
  readonly '@type': string | readonly string[];
  readonly hasNumericalPart: { readonly '@type': 'RealData'; readonly hasNumberValue: number };
  readonly hasMeasurementUnit: string;
}

export interface OntologyTask {
  '@type': string;
  hasInput: readonly OntologyQuantity[];
  hasTask?: OntologyTask;
  hasNext?: OntologyTask;
  '@context'?: readonly string[];
}

export interface OntologyJsonLdOptions {
  /** Overrides the protocol's sample capacity. */
  readonly capacityMah?: number;
  readonly includeContext?: boolean;
}

export function toOntologyJsonLd(
  protocol: Protocol,
  options: OntologyJsonLdOptions = {},
): Result<OntologyTask, ProtocolError> {
  const working = withOverrides(protocol, { capacityMah: options.capacityMah });
  const capacityMah = working.sample.capacityMah;

  return resolveTags(working.method)
    .andThen(checkNesting)
    .andThen((steps) => chainTasks(buildLoopTree(steps), capacityMah))
    .map((root) => (options.includeContext ? { ...root, '@context': [ONTOLOGY_CONTEXT_URL] } : root));
}

function chainTasks(
  nodes: readonly LoopTreeNode[],
  capacityMah: number | undefined,
): Result<OntologyTask, ProtocolError> {
  let next: OntologyTask | undefined;
  for (let i = nodes.length - 1; i >= 0; i--) {
    const task = nodeToTask(nodes[i], capacityMah);
    if (task.isErr()) return err(task.error);
    next = next ? { ...task.value, hasNext: next } : task.value;
  }
  // Loop bodies and the method are never empty once structure is validated.
  return next ? ok(next) : err(Err.emptyMethod());
}

function nodeToTask(node: LoopTreeNode, capacityMah: number | undefined): Result<OntologyTask, ProtocolError> {
  switch (node.kind) {
    case 'step':
      return stepToTask(node.step, node.index + 1, capacityMah);
    case 'repeat':
      return chainTasks(node.body, capacityMah).map((body) => ({
        '@type': 'IterativeWorkflow',
        hasInput: [quantity('NumberOfIterations', node.count, 'UnitOne')],
        hasTask: body,
      }));
    default:
      return assertNever(node);
  }
}

function stepToTask(
  step: ExecutableStep,
  position: number,
  capacityMah: number | undefined,
): Result<OntologyTask, ProtocolError> {
  switch (step.kind) {
    case 'rest':
      return ok({ '@type': 'Resting', hasInput: [quantity('Duration', step.untilTimeS, 'Second')] });
    case 'constant_current':
      return ok(constantCurrentTask(step, capacityMah));
    case 'constant_voltage':
      return ok(constantVoltageTask(step, capacityMah));
    case 'impedance_sweep':
      return err(Err.unsupportedStep(step.kind, FORMAT, position));
    default:
      return assertNever(step);
  }
}

function constantCurrentTask(step: ConstantCurrentStep, capacityMah: number | undefined): OntologyTask {
  let currentMa: number | undefined;
  if (step.rateC && capacityMah) {
    currentMa = step.rateC * capacityMah;
  } else if (step.currentMa) {
    currentMa = step.currentMa;
  }
  const charging = (currentMa !== undefined && currentMa > 0) || (step.rateC !== undefined && step.rateC > 0);

  const inputs: OntologyQuantity[] = [];
  if (currentMa) {
    inputs.push(quantity('ElectricCurrent', Math.abs(currentMa), 'MilliAmpere'));
  }
  if (step.rateC) {
    inputs.push(quantity('CRate', Math.abs(step.rateC), 'CRateUnit'));
  }
  if (step.untilVoltageV) {
    inputs.push(
      quantity(
        [charging ? 'UpperVoltageLimit' : 'LowerVoltageLimit', 'TerminationQuantity'],
        step.untilVoltageV,
        'Volt',
      ),
    );
  }
  if (step.untilTimeS) {
    inputs.push(quantity('Duration', step.untilTimeS, 'Second'));
  }
  return { '@type': charging ? 'Charging' : 'Discharging', hasInput: inputs };
}

function constantVoltageTask(step: ConstantVoltageStep, capacityMah: number | undefined): OntologyTask {
  const inputs: OntologyQuantity[] = [quantity('Voltage', step.voltageV, 'Volt')];

  let untilCurrentMa: number | undefined;
  if (step.untilRateC && capacityMah) {
    untilCurrentMa = step.untilRateC * capacityMah;
  } else if (step.untilCurrentMa) {
    untilCurrentMa = step.untilCurrentMa;
  }
  if (untilCurrentMa !== undefined) {
    inputs.push(quantity(['LowerCurrentLimit', 'TerminationQuantity'], Math.abs(untilCurrentMa), 'MilliAmpere'));
  }
  if (step.untilRateC) {
    inputs.push(quantity(['LowerCRateLimit', 'TerminationQuantity'], Math.abs(step.untilRateC), 'CRateUnit'));
  }
  if (step.untilTimeS) {
    inputs.push(quantity('Duration', step.untilTimeS, 'Second'));
  }
  return { '@type': 'Hold', hasInput: inputs };
}

function quantity(type: string | readonly string[], value: number, unit: string): OntologyQuantity {
  return {
    '@type': type,
    hasNumericalPart: { '@type': 'RealData', hasNumberValue: value },
    hasMeasurementUnit: unit,
  };
}
