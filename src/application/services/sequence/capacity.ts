import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { Step } from '../../../domain/protocol/steps.js';
import { type ProtocolError, Err } from '../../../domain/protocol/error.js';
import { assertNever } from '../../../runtime/assert-never.js';

/**
 * Pre-flight for exporters that turn C-rates into currents: any step with a
 * non-zero `rateC` or `untilRateC` needs a positive sample capacity.
 */
export function requireCapacityIfRateUsed(
  steps: readonly Step[],
  capacityMah: number | undefined,
): Result<void, ProtocolError> {
  if (capacityMah !== undefined && capacityMah > 0) return ok(undefined);

  const positions = steps.flatMap((step, index) => (usesRate(step) ? [index + 1] : []));
  return positions.length > 0 ? err(Err.missingCapacity(positions)) : ok(undefined);
}

function usesRate(step: Step): boolean {
  switch (step.kind) {
    case 'constant_current':
      return Boolean(step.rateC);
    case 'constant_voltage':
      return Boolean(step.untilRateC);
    case 'rest':
    case 'impedance_sweep':
    case 'loop':
    case 'tag':
      return false;
    default:
      return assertNever(step);
  }
}
