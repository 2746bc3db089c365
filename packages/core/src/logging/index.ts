/**
 * Logging infrastructure exports
 *
 * Provides structured logging with automatic redaction via pino + fast-redact
 */

export {
  rootLogger,
  createPinoLogger,
  REDACTED_PATHS,
  configureLogging,
  LOG_LEVEL_ENV,
} from './pino-setup.js';

export {
  NoOpLogger,
  PinoLogger,
  defaultLogger,
  createScopedLogger,
} from '../logger.js';
export type { LogLevel, ILogger } from '../logger.js';
