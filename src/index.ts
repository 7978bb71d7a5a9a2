import 'reflect-metadata';

// DI Container exports
export { initializeContainer, container, resetContainer, isInitialized, type ContainerInitOptions } from './di/container.js';
export { DI } from './di/tokens.js';

// Domain model
export * from './domain/protocol/index.js';

// Sequence engine
export * from './application/services/sequence/index.js';

// Exporters
export * from './application/services/exporters/index.js';

// Services and use cases
export {
  ProtocolExportService,
  type ExportRequest,
  type ExportedDocument,
  type ProtocolSummary,
} from './application/services/protocol-export-service.js';
export {
  createLoadProtocolFileUseCase,
  type LoadProtocolFileResult,
  type LoadProtocolFileDeps,
} from './application/use-cases/load-protocol-file.js';

// Configuration and errors
export {
  loadConfig,
  createValidatedConfig,
  type AppConfig,
  type ValidatedConfig,
  type LoadConfigOptions,
} from './config/app-config.js';
export {
  formatAppError,
  formatProtocolError,
  type AppError,
  type ConfigIssue,
  type FormattedProtocolError,
} from './errors/index.js';

// Logging
export type { Logger, ILoggerFactory, LogLevel } from './core/logging/types.js';
