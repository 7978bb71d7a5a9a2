// Types
export type { Logger, ILoggerFactory, LogLevel } from './types.js';
export { LOG_LEVEL_ENV_VAR } from './types.js';

// Factory (for DI registration)
export { PinoLoggerFactory, createRootLogger } from './create-logger.js';

// Bootstrap (for pre-DI code)
export { getBootstrapLogger, createBootstrapLogger, bootstrapLevel } from './bootstrap.js';
