/**
 * CLI Result Interpreter
 *
 * Bridges CLI command results to process termination.
 * This is the only place where CliResult is converted to process exit.
 */

import type { CliResult } from './types/cli-result.js';
import { toTerminationCode, toNumericExitCode } from './types/exit-code.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';
import { printResult, type OutputStreams } from './output-formatter.js';

/**
 * Interpret a CLI result and handle termination via ProcessTerminator.
 * Use this when the DI container is available.
 */
export function interpretCliResult(
  result: CliResult,
  terminator: ProcessTerminator,
  streams?: OutputStreams
): void {
  printResult(result, streams);

  switch (result.kind) {
    case 'success':
      // Let the process end naturally so stdout is flushed.
      return;

    case 'failure':
      terminator.terminate(toTerminationCode(result.exitCode));
  }
}

/**
 * Interpret a CLI result without DI (the container failed to initialize).
 */
export function interpretCliResultWithoutDI(result: CliResult): void {
  printResult(result);

  switch (result.kind) {
    case 'success':
      return;

    case 'failure':
      process.exit(toNumericExitCode(result.exitCode));
  }
}
