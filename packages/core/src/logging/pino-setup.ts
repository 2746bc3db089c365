/**
 * Pino logger setup with automatic redaction of sensitive data
 *
 * Debuggee launch configurations routinely carry environment maps and
 * credentials; path-based redaction keeps them out of the log stream.
 */

import pino from 'pino';
import type { LogLevel } from '../logger.js';

export const LOG_LEVEL_ENV = 'DAP_GATEWAY_LOG_LEVEL';

const LEVELS: readonly (LogLevel | 'silent')[] = [
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
];

/**
 * Paths censored in every record.
 * @public
 */
export const REDACTED_PATHS: readonly string[] = [
  'password',
  '*.password',
  'token',
  '*.token',
  'secret',
  '*.secret',
  'authorization',
  '*.authorization',
  // Launch configurations
  'env',
  '*.env',
  'arguments.env',
  '*.arguments.env',
];

/**
 * Creates a pino logger with the gateway's redaction and serializers.
 * @param destination - Where records go, stdout by default
 * @public
 */
export function createPinoLogger(
  destination?: pino.DestinationStream,
  level = 'info',
): pino.Logger {
  const options: pino.LoggerOptions = {
    level,
    redact: {
      paths: [...REDACTED_PATHS],
      censor: '[REDACTED]',
      remove: false,
    },
    serializers: {
      ...pino.stdSerializers,
      err: pino.stdSerializers.err,
    },
  };
  return destination ? pino(options, destination) : pino(options);
}

/**
 * Root logger instance with automatic redaction of sensitive data.
 *
 * By default, the log level is set to 'silent' to avoid noise. Call
 * {@link configureLogging} or update the level when needed.
 *
 * @example
 * ```typescript
 * import { rootLogger } from './pino-setup.js';
 *
 * rootLogger.level = 'info'; // Enable logging
 * rootLogger.info({ env: { API_KEY: 'x' } }); // Logs: { env: '[REDACTED]' }
 * ```
 *
 * @public
 */
const rootLogger = createPinoLogger(undefined, 'silent');

/**
 * Applies the level named by `DAP_GATEWAY_LOG_LEVEL` to the root logger.
 *
 * Unknown values leave the current level untouched.
 * @param env - Environment source, `process.env` by default
 * @returns The level in effect afterwards
 * @public
 */
export function configureLogging(
  env: Record<string, string | undefined> = process.env,
): string {
  const requested = (env[LOG_LEVEL_ENV] ?? '').toLowerCase();
  const level = LEVELS.find((candidate) => candidate === requested);
  if (level) {
    rootLogger.level = level;
  }
  return rootLogger.level;
}

export { rootLogger };
