import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { z } from 'zod';
import { ProtocolSchema, type ProtocolInput } from './schemas.js';
import type { Protocol } from './steps.js';
import { type ProtocolError, type SchemaIssue, Err } from './error.js';
import { validateStructure } from './structure.js';

/**
 * Parse an unknown value (a JSON document, a form payload) into a Protocol.
 *
 * Field validation runs first, then the loop/tag structure checks. The
 * returned protocol is deeply frozen.
 */
export function parseProtocol(input: unknown): Result<Protocol, ProtocolError> {
  const incomplete = findIncompleteStep(input);
  if (incomplete !== undefined) {
    return err(
      Err.schemaInvalid([
        { path: `method.${incomplete}`, message: `Step at index ${incomplete} is incomplete, needs a 'kind'.` },
      ])
    );
  }

  const parsed = ProtocolSchema.safeParse(input);
  if (!parsed.success) {
    return err(Err.schemaInvalid(toSchemaIssues(parsed.error)));
  }

  const protocol: Protocol = parsed.data;
  return validateStructure(protocol.method).map(() => deepFreeze(protocol));
}

/** Typed entry point for protocols authored in code. */
export function createProtocol(input: ProtocolInput): Result<Protocol, ProtocolError> {
  return parseProtocol(input);
}

export function serializeProtocol(protocol: Protocol, indent = 4): string {
  return JSON.stringify(protocol, null, indent);
}

export interface ProtocolOverrides {
  readonly sampleName?: string;
  readonly capacityMah?: number;
}

/**
 * Copy of the protocol with sample name and capacity replaced where given.
 * The input protocol is not modified.
 */
export function withOverrides(protocol: Protocol, overrides: ProtocolOverrides = {}): Protocol {
  const sample = {
    ...protocol.sample,
    ...(overrides.sampleName ? { name: overrides.sampleName } : {}),
    ...(overrides.capacityMah ? { capacityMah: overrides.capacityMah } : {}),
  };
  return { ...protocol, sample };
}

// =============================================================================
// Internal
// =============================================================================

function findIncompleteStep(input: unknown): number | undefined {
  if (typeof input !== 'object' || input === null || !('method' in input)) return undefined;
  const { method } = input;
  if (!Array.isArray(method)) return undefined;

  const index = method.findIndex(
    (step: unknown) => typeof step === 'object' && step !== null && (!('kind' in step) || !step.kind)
  );
  return index === -1 ? undefined : index;
}

function toSchemaIssues(error: z.ZodError): readonly SchemaIssue[] {
  return error.errors.map((issue) => ({
    path: issue.path.length ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}
