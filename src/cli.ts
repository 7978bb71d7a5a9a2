#!/usr/bin/env node
/**
 * cycler-protocol CLI - Composition Root
 *
 * This is a thin composition root that:
 * 1. Wires dependencies for each command
 * 2. Interprets CliResult into process termination
 * 3. Contains NO business logic
 *
 * All business logic lives in src/cli/commands/*.ts
 */

import 'reflect-metadata';
import { Command } from 'commander';
import fs from 'fs';
import path from 'path';

import { initializeContainer, container } from './di/container.js';
import { DI } from './di/tokens.js';
import type { ProtocolExportService } from './application/services/protocol-export-service.js';
import type { ProcessTerminator } from './runtime/ports/process-terminator.js';
import type { ValidatedConfig } from './config/app-config.js';
import { createLoadProtocolFileUseCase } from './application/use-cases/load-protocol-file.js';
import { EXPORT_FORMATS } from './application/services/exporters/index.js';
import { formatAppError } from './errors/formatter.js';

import { interpretCliResult, interpretCliResultWithoutDI } from './cli/interpret-result.js';
import { failure } from './cli/types/cli-result.js';
import { executeValidateCommand, executeExportCommand } from './cli/commands/index.js';

// ═══════════════════════════════════════════════════════════════════════════
// WIRING
// ═══════════════════════════════════════════════════════════════════════════

const loadProtocolFile = createLoadProtocolFileUseCase({
  resolvePath: path.resolve,
  existsSync: fs.existsSync,
  readFileSyncUtf8: (resolvedPath: string) => fs.readFileSync(resolvedPath, 'utf-8'),
  parseJson: (content: string): unknown => JSON.parse(content),
});

interface Services {
  readonly terminator: ProcessTerminator;
  readonly exportService: ProtocolExportService;
  readonly config: ValidatedConfig;
}

/** Builds the container; on failure prints the error and exits. */
async function resolveServices(): Promise<Services | undefined> {
  const initialized = await initializeContainer({ runtimeMode: { kind: 'cli' } });
  if (initialized.isErr()) {
    interpretCliResultWithoutDI(failure(formatAppError(initialized.error)));
    return undefined;
  }

  return {
    terminator: container.resolve<ProcessTerminator>(DI.Runtime.ProcessTerminator),
    exportService: container.resolve<ProtocolExportService>(DI.Services.ProtocolExport),
    config: container.resolve<ValidatedConfig>(DI.Config.App),
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// PROGRAM DEFINITION
// ═══════════════════════════════════════════════════════════════════════════

const program = new Command();

program
  .name('cycler-protocol')
  .description('Validate battery cycling protocols and export them for simulators, ontologies and cyclers')
  .version('0.1.0');

program
  .command('validate <file>')
  .description('Validate a protocol file: schema, loops, tags and unrolled length')
  .action(async (filePath: string) => {
    const services = await resolveServices();
    if (!services) return;

    const result = executeValidateCommand(filePath, {
      loadProtocolFile,
      summarize: (protocol) => services.exportService.summarize(protocol),
    });

    interpretCliResult(result, services.terminator);
  });

program
  .command('export <file>')
  .description('Export a protocol file to another format')
  .requiredOption('-f, --format <format>', `Export format (${EXPORT_FORMATS.join(', ')})`)
  .option('-o, --out <path>', 'Output file path (defaults to CYCLER_PROTOCOL_OUTPUT_DIR, then stdout)')
  .option('-n, --sample-name <name>', 'Sample name to use instead of the one in the protocol')
  .option('-c, --capacity <mAh>', 'Sample capacity in mAh to use instead of the one in the protocol')
  .option('-d, --data-path <path>', 'Directory the automation host stores measured data in (automation format)')
  .action(
    async (
      filePath: string,
      options: { format: string; out?: string; sampleName?: string; capacity?: string; dataPath?: string }
    ) => {
      const services = await resolveServices();
      if (!services) return;

      const result = executeExportCommand(filePath, options, {
        loadProtocolFile,
        exportProtocol: (protocol, request) => services.exportService.export(protocol, request),
        writeFileUtf8: (target, content) => fs.writeFileSync(target, content, 'utf-8'),
        joinPath: path.join,
        baseName: (p) => path.basename(p),
        outputDir: services.config.paths.outputDir,
      });

      interpretCliResult(result, services.terminator);
    }
  );

// ═══════════════════════════════════════════════════════════════════════════
// ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════

await program.parseAsync();
