/**
 * CLI Output Formatter
 *
 * Presentation layer for CLI output.
 * Converts CliResult/CliOutput to formatted strings with chalk.
 */

import chalk from 'chalk';
import type { CliResult, CliOutput } from './types/cli-result.js';

export interface OutputStreams {
  readonly out: (text: string) => void;
  readonly err: (text: string) => void;
}

const consoleStreams: OutputStreams = {
  out: (text) => console.log(text),
  err: (text) => console.error(text),
};

/**
 * Format a CliOutput structure to a styled string.
 */
export function formatOutput(output: CliOutput, isError: boolean = false): string {
  const lines: string[] = [];

  if (isError) {
    lines.push(chalk.red(`❌ ${output.message}`));
  } else {
    lines.push(chalk.green(`✅ ${output.message}`));
  }

  if (output.details && output.details.length > 0) {
    lines.push('');
    output.details.forEach((detail) => {
      lines.push(chalk.white(`  • ${detail}`));
    });
  }

  if (output.warnings && output.warnings.length > 0) {
    lines.push('');
    lines.push(chalk.yellow('⚠️  Warnings:'));
    output.warnings.forEach((warning) => {
      lines.push(chalk.yellow(`  • ${warning}`));
    });
  }

  if (output.suggestions && output.suggestions.length > 0) {
    lines.push('');
    lines.push(chalk.gray('💡 Suggestions:'));
    output.suggestions.forEach((suggestion) => {
      lines.push(chalk.gray(`  • ${suggestion}`));
    });
  }

  return lines.join('\n');
}

/**
 * Format a CliResult to a styled string. The payload is not included.
 */
export function formatResult(result: CliResult): string {
  switch (result.kind) {
    case 'success':
      return result.output ? formatOutput(result.output, false) : '';

    case 'failure':
      return formatOutput(result.output, true);
  }
}

/**
 * Print a CliResult. A payload goes to stdout untouched and pushes the
 * human-readable message to stderr, so the document can be piped.
 */
export function printResult(result: CliResult, streams: OutputStreams = consoleStreams): void {
  if (result.kind === 'success' && result.payload !== undefined) {
    streams.out(result.payload);
  }

  const formatted = formatResult(result);
  if (!formatted) return;

  if (result.kind === 'failure' || result.payload !== undefined) {
    streams.err(formatted);
  } else {
    streams.out(formatted);
  }
}
