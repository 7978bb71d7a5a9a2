/**
 * Export Command
 *
 * Loads a protocol file and renders it in one of the export formats.
 * The document is written to --out, else into the configured output
 * directory, else printed to stdout.
 * Pure function with dependency injection.
 */

import type { Result } from 'neverthrow';
import type { CliResult } from '../types/cli-result.js';
import { failure, misuse, successMessage, successWithPayload } from '../types/cli-result.js';
import type { LoadProtocolFileResult } from '../../application/use-cases/load-protocol-file.js';
import type { ExportRequest, ExportedDocument } from '../../application/services/protocol-export-service.js';
import { EXPORT_FORMATS, isExportFormat, type ExportFormat } from '../../application/services/exporters/index.js';
import type { Protocol } from '../../domain/protocol/steps.js';
import type { ProtocolError } from '../../domain/protocol/error.js';
import { assertNever } from '../../runtime/assert-never.js';
import { loadFailureToCliResult, protocolErrorToCliResult } from './protocol-file.js';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface ExportCommandOptions {
  readonly format: string;
  readonly out?: string;
  readonly sampleName?: string;
  readonly capacity?: string;
  /** Data directory written into the automation payload. */
  readonly dataPath?: string;
}

export interface ExportCommandDeps {
  readonly loadProtocolFile: (filePath: string) => LoadProtocolFileResult;
  readonly exportProtocol: (protocol: Protocol, request: ExportRequest) => Result<ExportedDocument, ProtocolError>;
  readonly writeFileUtf8: (filePath: string, content: string) => void;
  readonly joinPath: (...segments: string[]) => string;
  readonly baseName: (filePath: string) => string;
  /** Directory used when --out is not given. */
  readonly outputDir?: string;
}

// ═══════════════════════════════════════════════════════════════════════════
// COMMAND EXECUTION
// ═══════════════════════════════════════════════════════════════════════════

export function executeExportCommand(
  filePath: string,
  options: ExportCommandOptions,
  deps: ExportCommandDeps
): CliResult {
  const { format } = options;
  if (!isExportFormat(format)) {
    return misuse(`Unknown export format: ${format}`, [`Use one of: ${EXPORT_FORMATS.join(', ')}`]);
  }

  const capacityMah = parseCapacity(options.capacity);
  if (capacityMah === null) {
    return misuse(`Invalid capacity: ${options.capacity ?? ''}`, ['Pass the capacity in mAh as a positive number']);
  }

  if (options.dataPath !== undefined && format !== 'automation') {
    return misuse(`--data-path only applies to the automation format, not ${format}`);
  }

  const loaded = deps.loadProtocolFile(filePath);
  if (loaded.kind !== 'valid') return loadFailureToCliResult(loaded);

  const exported = deps.exportProtocol(loaded.protocol, {
    format,
    sampleName: options.sampleName,
    capacityMah,
    outputPath: options.dataPath,
  });
  if (exported.isErr()) {
    return protocolErrorToCliResult(`Export to ${format} failed: ${filePath}`, exported.error);
  }

  const target = options.out ?? defaultTarget(filePath, format, deps);
  if (target === undefined) {
    return successWithPayload(exported.value.content);
  }

  try {
    deps.writeFileUtf8(target, exported.value.content);
  } catch (error: unknown) {
    return failure(`Could not write ${target}`, {
      details: [error instanceof Error ? error.message : String(error)],
    });
  }
  return successMessage(`Exported ${format} document to ${target}`);
}

// ═══════════════════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════════════════

// undefined: not given; null: given but unusable.
function parseCapacity(raw: string | undefined): number | undefined | null {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  return raw.trim() !== '' && Number.isFinite(value) && value > 0 ? value : null;
}

function defaultTarget(filePath: string, format: ExportFormat, deps: ExportCommandDeps): string | undefined {
  if (deps.outputDir === undefined) return undefined;
  const stem = deps.baseName(filePath).replace(/\.json$/i, '');
  return deps.joinPath(deps.outputDir, `${stem}${extensionFor(format)}`);
}

export function extensionFor(format: ExportFormat): string {
  switch (format) {
    case 'simulator':
      return '.simulator.json';
    case 'ontology':
      return '.jsonld';
    case 'automation':
      return '.automation.json';
    default:
      return assertNever(format);
  }
}
