import type { DebuggeeLogger } from '../debuggee/debuggee-logger.js';
import type { LoggerFactory } from './log-sink.js';

/**
 * What a debuggee starter receives when the session starts it.
 * @public
 */
export interface DebuggeeStartContext {
  /** Logger whose output lines are scanned for the debuggee's address */
  logger: DebuggeeLogger;
  /** Aborted when the session cancels the debuggee */
  signal: AbortSignal;
  /** Log sinks for the debuggee-management layer, by logger name */
  createLogSink: LoggerFactory;
}

/**
 * Starts the debuggee and resolves once it has finished running.
 *
 * Implementations must stop the debuggee when `signal` aborts. They report
 * the debuggee's address through `logger` once it is known.
 * @public
 */
export type DebuggeeStarter = (context: DebuggeeStartContext) => Promise<void>;

/**
 * Cancellable handle to a running debuggee computation.
 * @public
 */
export interface DebuggeeHandle {
  /** Settles when the debuggee computation finishes, however it finishes */
  readonly completion: Promise<void>;
  /** Requests cancellation without waiting for teardown */
  cancel(): void;
  readonly isCancelled: boolean;
}

/**
 * Session phase, moving only along `idle -> started -> cancelled` or
 * `idle -> cancelled`.
 *
 * Key states:
 * - `idle`: constructed, holds the starter that will produce the debuggee
 * - `started`: the read loop runs and the debuggee computation is live
 * - `cancelled`: terminal
 * @public
 */
export type SessionPhase =
  | { status: 'idle'; starter: DebuggeeStarter }
  | { status: 'started'; debuggee: DebuggeeHandle }
  | { status: 'cancelled' };

export type SessionPhaseStatus = SessionPhase['status'];

export interface PhaseChange {
  from: SessionPhaseStatus;
  to: SessionPhaseStatus;
}
