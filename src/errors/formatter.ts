import type { AppError } from './app-error.js';
import type { ProtocolError } from '../domain/protocol/error.js';
import { assertNever } from '../runtime/assert-never.js';

export function formatAppError(error: AppError): string {
  switch (error._tag) {
    case 'ConfigInvalid': {
      const issues = error.issues.length
        ? error.issues.map((i) => `  - ${i.path}: ${i.message}`).join('\n')
        : '  - (no details)';
      return `${error.message}\n\n${issues}`;
    }

    case 'StartupFailed': {
      const base = `Startup failed during ${error.phase}: ${error.message}`;
      return error.cause ? `${base}\nCause: ${safeToString(error.cause)}` : base;
    }

    case 'Unexpected':
      return `${error.message}\nCause: ${safeToString(error.cause)}`;

    default:
      return assertNever(error);
  }
}

export interface FormattedProtocolError {
  readonly message: string;
  readonly details: readonly string[];
  readonly suggestions: readonly string[];
}

/**
 * Split a protocol error into a headline, detail lines and suggestions
 * for the command line.
 */
export function formatProtocolError(error: ProtocolError): FormattedProtocolError {
  if (error._tag === 'SchemaInvalid') {
    return {
      message: 'Protocol does not match the schema',
      details: error.issues.map((i) => `${i.path}: ${i.message}`),
      suggestions: suggestionsFor(error),
    };
  }
  return { message: error.message, details: [], suggestions: suggestionsFor(error) };
}

function suggestionsFor(error: ProtocolError): readonly string[] {
  switch (error._tag) {
    case 'SchemaInvalid':
      return ['Check each listed field against the step kinds: rest, constant_current, constant_voltage, impedance_sweep, loop, tag'];
    case 'EmptyMethod':
      return ['Add at least one rest, constant_current, constant_voltage or impedance_sweep step'];
    case 'DuplicateTags':
      return ['Give every tag a unique name'];
    case 'LoopNotBackwards':
      return ['Point the loop at a step before it, or move the tag above the loop'];
    case 'MissingTag':
      return [`Add a tag step named '${error.tag}' before the loop`];
    case 'EmptyLoopBody':
      return ['Put at least one executable step between the loop target and the loop'];
    case 'IntersectingLoops':
      return ['Loops may nest or sit side by side, but must not overlap partially'];
    case 'RunawayExpansion':
      return [
        'Check the loop repeat counts',
        'Raise CYCLER_PROTOCOL_MAX_UNROLL_STEPS if the protocol really is this long',
      ];
    case 'MissingCapacity':
      return ['Set sample.capacityMah in the protocol or pass --capacity'];
    case 'MissingSampleName':
      return ['Set sample.name in the protocol or pass --sample-name'];
    case 'UnsupportedStep':
      return ['Choose another export format, or remove the step'];
    default:
      return assertNever(error);
  }
}

export function safeToString(value: unknown): string {
  if (value instanceof Error) return `${value.name}: ${value.message}`;
  try {
    return typeof value === 'string' ? value : JSON.stringify(value);
  } catch {
    return String(value);
  }
}
