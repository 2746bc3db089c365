import type { LogSink, LoggerFactory } from '../types/index.js';

/**
 * Sink for logger names nobody routes; records are dropped.
 */
export const silentLogSink: LogSink = {
  publish: () => undefined,
};

/**
 * Routes exactly one logger name to `sink`.
 *
 * Every other name gets {@link silentLogSink}: those loggers neither keep
 * their own handlers nor inherit a parent's.
 */
export function createLoggerFactory(
  sink: LogSink,
  routedLoggerName: string,
): LoggerFactory {
  return (loggerName) =>
    loggerName === routedLoggerName ? sink : silentLogSink;
}
