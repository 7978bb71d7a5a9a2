import type { Logger as PinoLogger } from 'pino';

/**
 * Logger type - pino's Logger as is, no wrapper.
 *
 * Data-first, the pino way:
 *   logger.info({ format: 'ontology' }, 'Protocol exported');
 *   logger.error({ err: error }, 'Export failed');
 */
export type Logger = PinoLogger;

/**
 * Logger factory interface for DI.
 */
export interface ILoggerFactory {
  /** Create a child logger for a component */
  create(component: string): Logger;

  /** Root logger instance */
  readonly root: Logger;
}

export type LogLevel = 'silent' | 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

export const LOG_LEVEL_ENV_VAR = 'CYCLER_PROTOCOL_LOG_LEVEL';
