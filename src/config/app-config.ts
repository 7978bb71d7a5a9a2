/**
 * Application configuration - parse, don't validate.
 *
 * - Single source of truth for the config surface
 * - Zod validates the environment at the boundary and returns typed data
 * - Errors are data (Result), never thrown
 */

import { z } from 'zod';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { Brand } from '../runtime/brand.js';
import { Err } from '../errors/factories.js';
import type { ConfigIssue, ConfigInvalidError, ValidatedAppConfig } from '../errors/app-error.js';
import type { LogLevel } from '../core/logging/types.js';
import { DEFAULT_MAX_UNROLL_STEPS } from '../application/services/sequence/unroll.js';

// =============================================================================
// Branded primitives (prove parsing/validation happened)
// =============================================================================

export type MaxUnrollSteps = Brand<number, 'MaxUnrollSteps'>;
export type OutputDir = Brand<string, 'OutputDir'>;

export interface AppConfig {
  readonly logging: { readonly level: LogLevel };
  readonly unroll: { readonly maxSteps: MaxUnrollSteps };
  readonly paths: { readonly outputDir?: OutputDir };
}

export type ValidatedConfig = ValidatedAppConfig<AppConfig>;

export interface LoadConfigOptions {
  readonly env: Record<string, string | undefined>;
}

// =============================================================================
// Schema
// =============================================================================

const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

const EnvSchema = z.object({
  CYCLER_PROTOCOL_LOG_LEVEL: z
    .string()
    .optional()
    .transform((v) => v?.toLowerCase())
    .pipe(z.enum(LOG_LEVELS).default('silent')),

  CYCLER_PROTOCOL_MAX_UNROLL_STEPS: z
    .string()
    .optional()
    .transform((v) => (v === undefined ? undefined : Number(v)))
    .pipe(
      z
        .number()
        .int('CYCLER_PROTOCOL_MAX_UNROLL_STEPS must be a whole number')
        .min(1, 'CYCLER_PROTOCOL_MAX_UNROLL_STEPS must be at least 1')
        .max(10_000_000, 'CYCLER_PROTOCOL_MAX_UNROLL_STEPS cannot exceed 10000000')
        .default(DEFAULT_MAX_UNROLL_STEPS)
    ),

  CYCLER_PROTOCOL_OUTPUT_DIR: z.string().min(1).optional(),
});

type ParsedEnv = z.infer<typeof EnvSchema>;

// =============================================================================
// Public API
// =============================================================================

export type LoadConfigResult = Result<ValidatedConfig, ConfigInvalidError>;

export function loadConfig(options: LoadConfigOptions): LoadConfigResult {
  const parsed = EnvSchema.safeParse(options.env);

  if (!parsed.success) {
    return err(Err.configInvalid(toConfigIssues(parsed.error)));
  }

  return ok(buildConfig(parsed.data) as ValidatedConfig);
}

/**
 * Tests and local construction only: creates a validated config without env parsing.
 * (Still branded as validated to prevent accidentally passing raw objects.)
 */
export function createValidatedConfig(value: AppConfig): ValidatedConfig {
  return value as ValidatedConfig;
}

// =============================================================================
// Internal
// =============================================================================

function buildConfig(env: ParsedEnv): AppConfig {
  return {
    logging: { level: env.CYCLER_PROTOCOL_LOG_LEVEL },
    unroll: { maxSteps: env.CYCLER_PROTOCOL_MAX_UNROLL_STEPS as MaxUnrollSteps },
    paths: env.CYCLER_PROTOCOL_OUTPUT_DIR === undefined ? {} : { outputDir: env.CYCLER_PROTOCOL_OUTPUT_DIR as OutputDir },
  };
}

function toConfigIssues(error: z.ZodError): readonly ConfigIssue[] {
  return error.errors.map((issue) => ({
    path: issue.path.length ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}
