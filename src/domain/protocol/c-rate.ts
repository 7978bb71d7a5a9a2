import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';

/**
 * Parse a C-rate written as a number or a fraction string.
 *
 * "1/5" -> 0.2, "C/3" -> 0.333..., "2C/5" -> 0.4, "D/2" -> -0.5.
 * A `C` marks charge (positive) and a `D` discharge (negative); a bare marker
 * stands for 1. Blank input means the rate is not set.
 */
export function parseCRate(raw: number | string): Result<number | undefined, string> {
  if (typeof raw === 'number') return ok(raw);

  const compact = raw.replace(/\s/g, '');
  if (compact === '') return ok(undefined);

  const direct = Number(compact);
  if (!Number.isNaN(direct)) return ok(direct);

  const parts = compact.split('/');
  if (parts.length !== 2) return err(`Invalid C-rate value: ${raw}`);
  const [numerator = '', denominator = ''] = parts;

  const markers = [...numerator].filter((c) => c === 'C' || c === 'D').length;
  if (markers > 1) return err(`Invalid C-rate format: ${compact}`);

  let nominal: number;
  if (numerator.includes('C')) {
    const rest = numerator.replace('C', '');
    nominal = rest === '' ? 1 : Number(rest);
  } else if (numerator.includes('D')) {
    const rest = numerator.replace('D', '');
    nominal = rest === '' ? -1 : -Number(rest);
  } else {
    nominal = numerator === '' ? Number.NaN : Number(numerator);
  }

  const denom = denominator === '' ? Number.NaN : Number(denominator);
  if (Number.isNaN(nominal) || Number.isNaN(denom) || denom === 0) {
    return err(`Invalid C-rate value: ${raw}`);
  }
  return ok(nominal / denom);
}
