import type { Logger, LogLevel } from './types.js';
import { LOG_LEVEL_ENV_VAR } from './types.js';
import { createRootLogger } from './create-logger.js';

const LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

/**
 * Bootstrap logger for use BEFORE the DI container is initialized
 * (config loading, container wiring). After that, inject ILoggerFactory.
 */
let _bootstrapLogger: Logger | null = null;

export function getBootstrapLogger(): Logger {
  if (!_bootstrapLogger) {
    _bootstrapLogger = createRootLogger(bootstrapLevel(process.env[LOG_LEVEL_ENV_VAR]));
  }
  return _bootstrapLogger;
}

export function createBootstrapLogger(component: string): Logger {
  return getBootstrapLogger().child({ component });
}

// Invalid values fall back to silent; loadConfig reports them properly later.
export function bootstrapLevel(raw: string | undefined): LogLevel {
  const wanted = raw?.toLowerCase();
  return LEVELS.find((level) => level === wanted) ?? 'silent';
}
