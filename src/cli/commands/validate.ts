/**
 * Validate Command
 *
 * Loads a protocol file, runs every structural check (loop nesting included)
 * and reports what the protocol contains. A protocol too long to unroll is
 * still valid; the simulator limit shows up as a warning.
 * Pure function with dependency injection.
 */

import type { Result } from 'neverthrow';
import type { CliResult } from '../types/cli-result.js';
import { success } from '../types/cli-result.js';
import type { LoadProtocolFileResult } from '../../application/use-cases/load-protocol-file.js';
import type { ProtocolSummary } from '../../application/services/protocol-export-service.js';
import type { Protocol } from '../../domain/protocol/steps.js';
import type { ProtocolError } from '../../domain/protocol/error.js';
import { loadFailureToCliResult, protocolErrorToCliResult } from './protocol-file.js';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface ValidateCommandDeps {
  readonly loadProtocolFile: (filePath: string) => LoadProtocolFileResult;
  readonly summarize: (protocol: Protocol) => Result<ProtocolSummary, ProtocolError>;
}

// ═══════════════════════════════════════════════════════════════════════════
// COMMAND EXECUTION
// ═══════════════════════════════════════════════════════════════════════════

export function executeValidateCommand(filePath: string, deps: ValidateCommandDeps): CliResult {
  const loaded = deps.loadProtocolFile(filePath);
  if (loaded.kind !== 'valid') return loadFailureToCliResult(loaded);

  return deps.summarize(loaded.protocol).match(
    (summary) =>
      success({
        message: `Protocol is valid: ${filePath}`,
        details: describeSummary(summary),
        warnings: describeCeiling(summary),
      }),
    (error) => protocolErrorToCliResult(`Protocol is invalid: ${filePath}`, error)
  );
}

function describeSummary(summary: ProtocolSummary): readonly string[] {
  return [
    `${summary.stepCount} steps (${summary.executableCount} executable, ${summary.loopCount} loops, ${summary.tagCount} tags)`,
    `Loop nesting depth: ${summary.maxNestingDepth}`,
    `Unrolled length: ${summary.unrolledLength} steps`,
  ];
}

function describeCeiling(summary: ProtocolSummary): readonly string[] {
  return summary.exceedsUnrollCeiling
    ? [
        `Unrolling exceeds the limit of ${summary.unrollCeiling} steps: simulator export will fail`,
        'Raise CYCLER_PROTOCOL_MAX_UNROLL_STEPS to export it for the simulator',
      ]
    : [];
}
