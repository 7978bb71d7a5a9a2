export type {
  AppError,
  ConfigIssue,
  ConfigInvalidError,
  StartupFailedError,
  UnexpectedError,
  ValidatedAppConfig,
} from './app-error.js';
export { Err } from './factories.js';
export { formatAppError, formatProtocolError, safeToString, type FormattedProtocolError } from './formatter.js';
