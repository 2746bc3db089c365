/**
 * Severity names used by the debuggee-management layer's log records.
 */
export type DebuggeeLogLevel =
  | 'SEVERE'
  | 'WARNING'
  | 'INFO'
  | 'CONFIG'
  | 'FINE'
  | 'FINER'
  | 'FINEST';

/**
 * Receiver of raw leveled log records.
 * @public
 */
export interface LogSink {
  publish(level: DebuggeeLogLevel, message: string): void;
}

/**
 * Hands out a log sink per logger name.
 * @public
 */
export type LoggerFactory = (loggerName: string) => LogSink;
