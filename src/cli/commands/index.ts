/**
 * CLI Commands - Public API
 */

export { executeValidateCommand, type ValidateCommandDeps } from './validate.js';
export { executeExportCommand, extensionFor, type ExportCommandDeps, type ExportCommandOptions } from './export.js';
export { loadFailureToCliResult, protocolErrorToCliResult } from './protocol-file.js';
