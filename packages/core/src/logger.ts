import type { Logger as PinoInstance } from 'pino';
import { rootLogger } from './logging/pino-setup.js';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';

/**
 * Logging abstraction used across the gateway.
 * @public
 */
export interface ILogger {
  /**
   * Log a debug message.
   * @param message - The log message
   * @param context - Optional context object for structured logging
   */
  debug(message: string, context?: Record<string, unknown>): void;

  /**
   * Log an info message.
   * @param message - The log message
   * @param context - Optional context object for structured logging
   */
  info(message: string, context?: Record<string, unknown>): void;

  /**
   * Log a warning message.
   * @param message - The log message
   * @param context - Optional context object for structured logging
   */
  warn(message: string, context?: Record<string, unknown>): void;

  /**
   * Log an error message.
   * @param message - The log message
   * @param error - Optional error object
   * @param context - Optional context object for structured logging
   */
  error(
    message: string,
    error?: Error | unknown,
    context?: Record<string, unknown>,
  ): void;
}

/**
 * Structured logger writing through a pino instance.
 *
 * Context objects become pino bindings of the record, errors go under `err`
 * so the standard serializer renders their stack.
 * @public
 */
export class PinoLogger implements ILogger {
  public constructor(private readonly pino: PinoInstance = rootLogger) {}

  public debug(message: string, context?: Record<string, unknown>): void {
    this.pino.debug(context ?? {}, message);
  }

  public info(message: string, context?: Record<string, unknown>): void {
    this.pino.info(context ?? {}, message);
  }

  public warn(message: string, context?: Record<string, unknown>): void {
    this.pino.warn(context ?? {}, message);
  }

  public error(
    message: string,
    error?: Error | unknown,
    context?: Record<string, unknown>,
  ): void {
    const bindings: Record<string, unknown> = { ...context };
    if (error !== undefined) {
      bindings.err = error;
    }
    this.pino.error(bindings, message);
  }

  /**
   * Derives a logger whose records all carry the given bindings
   */
  public child(bindings: Record<string, unknown>): PinoLogger {
    return new PinoLogger(this.pino.child(bindings));
  }
}

/**
 * No-op logger implementation for testing or when logging is disabled.
 * @public
 */
export class NoOpLogger implements ILogger {
  public debug(): void {}
  public info(): void {}
  public warn(): void {}
  public error(): void {}
}

/**
 * Default logger instance, writing through the redacting pino root logger.
 * @public
 */
export const defaultLogger: ILogger = new PinoLogger();

/**
 * Creates a logger whose records carry a `scope` binding.
 * @param scope - Component name, e.g. `debug-session`
 * @public
 */
export function createScopedLogger(scope: string): PinoLogger {
  return new PinoLogger(rootLogger.child({ scope }));
}
