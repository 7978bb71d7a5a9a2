/**
 * Shared handling of protocol files that could not be loaded.
 */

import type { CliResult } from '../types/cli-result.js';
import { failure } from '../types/cli-result.js';
import type { LoadProtocolFileResult } from '../../application/use-cases/load-protocol-file.js';
import type { ProtocolError } from '../../domain/protocol/error.js';
import { formatProtocolError } from '../../errors/formatter.js';
import { assertNever } from '../../runtime/assert-never.js';

type LoadFailure = Exclude<LoadProtocolFileResult, { kind: 'valid' }>;

export function loadFailureToCliResult(result: LoadFailure): CliResult {
  switch (result.kind) {
    case 'file_not_found':
      return failure(`File not found: ${result.filePath}`, {
        suggestions: ['Check the file path and try again'],
      });

    case 'read_error':
      if (result.code === 'EACCES') {
        return failure(`Permission denied: ${result.filePath}`, {
          suggestions: ['Check file permissions and try again'],
        });
      }
      return failure(`Error reading file: ${result.filePath}`, {
        details: [result.message],
      });

    case 'json_parse_error':
      return failure(`Invalid JSON syntax in ${result.filePath}`, {
        details: [result.message],
        suggestions: ['Check the JSON syntax and try again'],
      });

    case 'invalid':
      return protocolErrorToCliResult(`Protocol is invalid: ${result.filePath}`, result.error);

    default:
      return assertNever(result);
  }
}

export function protocolErrorToCliResult(headline: string, error: ProtocolError): CliResult {
  const formatted = formatProtocolError(error);
  return failure(headline, {
    details: [formatted.message, ...formatted.details],
    suggestions: formatted.suggestions,
  });
}
