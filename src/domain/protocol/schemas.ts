import { z } from 'zod';
import { parseCRate } from './c-rate.js';
import { assertNever } from '../../runtime/assert-never.js';

/**
 * Protocol schemas (single source of truth for validation + types).
 *
 * Field names carry their unit: `untilTimeS` is seconds, `currentMa` milliamps,
 * `rateC` a C-rate (mA per mAh of sample capacity).
 */

// =============================================================================
// Field helpers
// =============================================================================

// Blank strings read from spreadsheets and forms mean "not set".
function blankToUndefined(value: unknown): unknown {
  if (value === null) return undefined;
  if (typeof value !== 'string') return value;
  const trimmed = value.trim();
  return trimmed === '' ? undefined : Number(trimmed);
}

const OptionalNumberSchema = z.preprocess(blankToUndefined, z.number().finite().optional());
const RequiredNumberSchema = z.preprocess(blankToUndefined, z.number().finite());
const DurationSchema = z.preprocess(blankToUndefined, z.number().positive());

const CRateSchema = z
  .union([z.number().finite(), z.string()])
  .nullish()
  .transform((value, ctx) => {
    if (value === null || value === undefined) return undefined;
    const parsed = parseCRate(value);
    if (parsed.isErr()) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: parsed.error });
      return z.NEVER;
    }
    return parsed.value;
  });

const FrequencySchema = z.number().min(1e-5).max(1e5);

const nonBlank = (value: string): boolean => value.trim() !== '';

const isSet = (value: number | undefined): boolean => value !== undefined && value !== 0;

// =============================================================================
// Steps
// =============================================================================

const stepId = z.string().optional();

export const RestStepSchema = z
  .object({
    kind: z.literal('rest'),
    id: stepId,
    untilTimeS: DurationSchema,
  })
  .strict();

export const ConstantCurrentStepSchema = z
  .object({
    kind: z.literal('constant_current'),
    id: stepId,
    rateC: CRateSchema,
    currentMa: OptionalNumberSchema,
    untilTimeS: OptionalNumberSchema,
    untilVoltageV: OptionalNumberSchema,
  })
  .strict();

export const ConstantVoltageStepSchema = z
  .object({
    kind: z.literal('constant_voltage'),
    id: stepId,
    voltageV: RequiredNumberSchema,
    untilTimeS: OptionalNumberSchema,
    untilRateC: CRateSchema,
    untilCurrentMa: OptionalNumberSchema,
  })
  .strict();

export const ImpedanceSweepStepSchema = z
  .object({
    kind: z.literal('impedance_sweep'),
    id: stepId,
    amplitudeV: OptionalNumberSchema,
    amplitudeMa: OptionalNumberSchema,
    startFrequencyHz: FrequencySchema,
    endFrequencyHz: FrequencySchema,
    pointsPerDecade: z.number().int().positive().default(10),
    measuresPerPoint: z.number().int().positive().default(1),
    driftCorrection: z.boolean().default(false),
  })
  .strict();

export const LoopStepSchema = z
  .object({
    kind: z.literal('loop'),
    id: stepId,
    target: z.union([
      z.number().int().positive('Loop target must be a positive step number or a tag name'),
      z.string().refine(nonBlank, 'Loop target cannot be empty'),
    ]),
    repeatCount: z.number().int().min(1, 'repeatCount must be at least 1'),
  })
  .strict();

export const TagStepSchema = z
  .object({
    kind: z.literal('tag'),
    id: stepId,
    name: z.string().refine(nonBlank, 'Tag name cannot be empty'),
  })
  .strict();

export const StepSchema = z
  .discriminatedUnion('kind', [
    RestStepSchema,
    ConstantCurrentStepSchema,
    ConstantVoltageStepSchema,
    ImpedanceSweepStepSchema,
    LoopStepSchema,
    TagStepSchema,
  ])
  .superRefine((step, ctx) => {
    switch (step.kind) {
      case 'constant_current':
        if (!isSet(step.rateC) && !isSet(step.currentMa)) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Either rateC or currentMa must be set and non-zero.' });
        }
        if (!isSet(step.untilTimeS) && !isSet(step.untilVoltageV)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: 'Either untilTimeS or untilVoltageV must be set and non-zero.',
          });
        }
        return;
      case 'constant_voltage':
        if (!isSet(step.untilTimeS) && !isSet(step.untilRateC) && !isSet(step.untilCurrentMa)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: 'Either untilTimeS, untilRateC, or untilCurrentMa must be set and non-zero.',
          });
        }
        return;
      case 'impedance_sweep':
        if (step.amplitudeV !== undefined && step.amplitudeMa !== undefined) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Cannot set both amplitudeV and amplitudeMa.' });
        } else if (step.amplitudeV === undefined && step.amplitudeMa === undefined) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Either amplitudeV or amplitudeMa must be set.' });
        }
        return;
      case 'rest':
      case 'loop':
      case 'tag':
        return;
      default:
        assertNever(step);
    }
  });

// =============================================================================
// Protocol
// =============================================================================

export const SampleParamsSchema = z
  .object({
    name: z.string().default('$NAME'),
    capacityMah: z.preprocess(blankToUndefined, z.number().positive().optional()),
  })
  .strict();

export const RecordParamsSchema = z
  .object({
    timeS: DurationSchema,
    currentMa: OptionalNumberSchema,
    voltageV: OptionalNumberSchema,
  })
  .strict();

export const SafetyParamsSchema = z
  .object({
    maxVoltageV: OptionalNumberSchema,
    minVoltageV: OptionalNumberSchema,
    maxCurrentMa: OptionalNumberSchema,
    minCurrentMa: OptionalNumberSchema,
    maxCapacityMah: z.preprocess(blankToUndefined, z.number().min(0).optional()),
    delayS: z.preprocess(blankToUndefined, z.number().min(0).optional()),
  })
  .strict();

export const ProtocolSchema = z
  .object({
    sample: SampleParamsSchema.default({}),
    record: RecordParamsSchema,
    safety: SafetyParamsSchema.default({}),
    method: z.array(StepSchema).min(1, 'Protocol method needs at least one step'),
  })
  .strict();

export type ProtocolInput = z.input<typeof ProtocolSchema>;
