import Emittery from 'emittery';
import {
  GatewayError,
  OneShot,
  createScopedLogger,
  loadSessionConfig,
  type ILogger,
  type SessionConfig,
} from '@dap-gateway/core';
import {
  Commands,
  ExitVerdicts,
  TerminalEvents,
  type DapRequest,
  type DebuggeeAddress,
  type ExitVerdict,
} from '@dap-gateway/models';
import type {
  DebugSessionEvents,
  DebuggeeHandle,
  DebuggeeStarter,
  EngineFactory,
  EngineHooks,
  IProtocolEngine,
  LoggerFactory,
  OutboundEvent,
  OutboundResponse,
  SessionConnection,
  SessionPhaseStatus,
} from '../types/index.js';
import { DebuggeeLogger } from '../debuggee/index.js';
import { DebuggeeLogAdapter, createLoggerFactory } from '../logging/index.js';
import {
  StreamProtocolEngine,
  acknowledgment,
  failedResponse,
  shouldRestart,
  toAttachRequest,
} from '../protocol/index.js';
import { SessionStateCell } from './session-state.js';
import { TerminationTracker } from './termination-tracker.js';

/**
 * Configuration for a {@link DebugSession}.
 * @public
 */
export interface DebugSessionOptions {
  /** Conversation with the debug client */
  connection: SessionConnection;
  /** Produces the debuggee computation once the session starts */
  starter: DebuggeeStarter;
  /** Session logger; the logger adapter writes into it as well */
  logger?: ILogger;
  /** Resolved from the environment when omitted */
  config?: SessionConfig;
  /** Engine the session intercepts; a {@link StreamProtocolEngine} by default */
  createEngine?: EngineFactory;
}

/**
 * Debug adapter session that owns the debuggee's lifecycle apart from the
 * protocol conversation.
 *
 * The client asks to `launch`, but the debuggee is started by the session
 * itself, so each launch is answered by attaching to the debuggee once its
 * address is known. The client only ever sees `launch` responses.
 *
 * The session sits in front of a protocol engine: the engine hands every
 * inbound request and every outbound response and event to the session,
 * which forwards them back to the engine after interception. All interception
 * runs synchronously on the event loop, so the termination tracker, the
 * launched-request set and the disconnect flag have a single writer.
 *
 * Exit verdict:
 * - `restarted` as soon as a `disconnect` with `restart: true` arrives
 * - `terminated` once the debuggee has finished and the conversation has
 *   wound down (`terminated` and `exited` events sent, a disconnect, or the
 *   forced shutdown after {@link DebugSession.cancel})
 *
 * @example
 * ```typescript
 * const session = new DebugSession({
 *   connection: socketConnection(socket),
 *   starter: async ({ logger, signal }) => runDebuggee(logger, signal),
 * });
 * session.start();
 * const verdict = await session.exitStatus();
 * ```
 * @public
 */
export class DebugSession {
  private readonly config: SessionConfig;
  private readonly logger: ILogger;
  private readonly connection: SessionConnection;
  private readonly engine: IProtocolEngine;
  private readonly state: SessionStateCell;
  private readonly tracker: TerminationTracker;
  private readonly loggerAdapter: DebuggeeLogAdapter;
  private readonly createLogSink: LoggerFactory;
  private readonly emitter = new Emittery<DebugSessionEvents>();

  private readonly addressResolved = new OneShot<DebuggeeAddress>();
  private readonly endOfConnection = new OneShot<void>();
  private readonly verdict = new OneShot<ExitVerdict>();

  // Launch request ids whose attach response still has to be relabelled
  private readonly launchedRequests = new Set<number>();
  private disconnectSent = false;
  private connectionClosed = false;

  public constructor(options: DebugSessionOptions) {
    this.config = options.config ?? loadSessionConfig();
    this.logger = options.logger ?? createScopedLogger('debug-session');
    this.connection = options.connection;
    this.loggerAdapter = new DebuggeeLogAdapter(this.logger, this.config.noise);
    this.createLogSink = createLoggerFactory(
      this.loggerAdapter,
      this.config.adapterLoggerName,
    );
    this.tracker = new TerminationTracker(this.config.terminalEvents);
    this.state = new SessionStateCell(
      { status: 'idle', starter: options.starter },
      (change) => {
        this.logger.debug('Session phase changed', { ...change });
        this.notify('phaseChanged', change);
      },
    );

    const hooks: EngineHooks = {
      dispatchRequest: (request) => this.dispatchRequest(request),
      sendResponse: (response) => this.sendResponse(response),
      sendEvent: (event) => this.sendEvent(event),
      createLogSink: this.createLogSink,
    };
    const createEngine: EngineFactory =
      options.createEngine ??
      ((connection, engineHooks) =>
        new StreamProtocolEngine(connection, engineHooks, {
          loggerName: this.config.adapterLoggerName,
        }));
    this.engine = createEngine(this.connection, hooks);
  }

  public get phase(): SessionPhaseStatus {
    return this.state.phase.status;
  }

  public get isEndOfConnection(): boolean {
    return this.endOfConnection.isSettled;
  }

  /**
   * Starts the protocol read loop and the debuggee, each running on its own.
   *
   * Returns immediately. Only the first call in the `idle` phase has an effect.
   */
  public start(): void {
    this.state.transform((phase) => {
      if (phase.status !== 'idle') {
        return phase;
      }
      this.runProtocolLoop();
      return { status: 'started', debuggee: this.startDebuggee(phase.starter) };
    });
  }

  /**
   * Resolves once with the session's exit verdict.
   */
  public exitStatus(): Promise<ExitVerdict> {
    return this.verdict.promise;
  }

  /**
   * Cancels the session. Safe to call from any phase, any number of times.
   *
   * - `idle`: closes the connection, the verdict becomes `terminated`
   * - `started`: cancels the debuggee without waiting for it, then forces the
   *   end of the connection if the client has not wound down within
   *   `shutdownTimeoutMs`
   * - `cancelled`: nothing
   */
  public cancel(): void {
    this.state.transform((phase) => {
      switch (phase.status) {
        case 'idle':
          this.closeConnection();
          this.markEndOfConnection();
          this.settleVerdict(ExitVerdicts.TERMINATED);
          return { status: 'cancelled' };
        case 'started':
          this.cancelDebuggee(phase.debuggee);
          this.scheduleForcedEndOfConnection();
          return { status: 'cancelled' };
        case 'cancelled':
          return phase;
      }
    });
  }

  /**
   * Registers a type-safe listener for session events.
   * @returns Function that removes the listener
   */
  public onTyped<K extends keyof DebugSessionEvents>(
    event: K,
    handler: (data: DebugSessionEvents[K]) => void,
  ): () => void {
    return this.emitter.on(event, handler);
  }

  /**
   * Inbound request interception.
   * @internal Called by the engine through its hooks
   */
  public dispatchRequest(request: DapRequest): void {
    switch (request.command) {
      case Commands.LAUNCH:
        this.launchedRequests.add(request.seq);
        void this.translateLaunch(request);
        return;
      case Commands.DISCONNECT:
        this.disconnect(request);
        return;
      default:
        this.engine.dispatchRequest(request);
    }
  }

  /**
   * Outbound response interception.
   * @internal Called by the engine through its hooks
   */
  public sendResponse(response: OutboundResponse): void {
    if (
      response.command === Commands.ATTACH &&
      this.launchedRequests.delete(response.request_seq)
    ) {
      // The client asked to launch; it must never see the attach
      this.engine.sendResponse({ ...response, command: Commands.LAUNCH });
      return;
    }

    if (response.command === Commands.DISCONNECT) {
      // Both the session and the engine answer a disconnect
      if (this.disconnectSent) {
        this.logger.debug('Dropping duplicate disconnect response', {
          requestSeq: response.request_seq,
        });
        return;
      }
      this.disconnectSent = true;
    }

    this.engine.sendResponse(response);
  }

  /**
   * Outbound event interception; watches for the terminal events.
   * @internal Called by the engine through its hooks
   */
  public sendEvent(event: OutboundEvent): void {
    try {
      this.engine.sendEvent(event);
      if (event.event === TerminalEvents.EXITED) {
        this.loggerAdapter.onDebuggeeFinished();
      }
    } finally {
      // The connection closes by itself once both sides are done
      this.observeTerminalEvent(event.event);
    }
  }

  private async translateLaunch(request: DapRequest): Promise<void> {
    try {
      const address = await this.addressResolved.wait(
        this.config.handshakeTimeoutMs,
      );
      if (address.settled) {
        this.engine.dispatchRequest(toAttachRequest(request.seq, address.value));
        return;
      }

      this.launchedRequests.delete(request.seq);
      this.logger.warn('Debuggee address not resolved in time', {
        requestSeq: request.seq,
        timeoutMs: this.config.handshakeTimeoutMs,
      });
      this.sendResponse(
        failedResponse(request, this.config.launchFailureMessage),
      );
    } catch (error) {
      this.logger.error('Launch handshake failed', error, {
        requestSeq: request.seq,
      });
    }
  }

  private disconnect(request: DapRequest): void {
    try {
      if (shouldRestart(request)) {
        this.settleVerdict(ExitVerdicts.RESTARTED);
      }
      this.sendResponse(acknowledgment(request));
    } finally {
      // No exited event follows once the client has disconnected
      this.observeTerminalEvent(TerminalEvents.EXITED);

      this.state.transform((phase) => {
        if (phase.status !== 'started') {
          return phase;
        }
        this.cancelDebuggee(phase.debuggee);
        this.engine.dispatchRequest(request);
        return { status: 'cancelled' };
      });
    }
  }

  private runProtocolLoop(): void {
    void this.engine.run().then(
      () => this.logger.debug('Protocol read loop finished'),
      (error: unknown) => this.logger.error('Protocol read loop failed', error),
    );
  }

  private startDebuggee(starter: DebuggeeStarter): DebuggeeHandle {
    const abort = new AbortController();
    const logger = new DebuggeeLogger(
      this.logger,
      (address) => {
        this.addressResolved.settle(address);
      },
      {
        addressPattern: this.config.addressPattern,
        host: this.config.debuggeeHost,
      },
    );

    const completion = Promise.resolve()
      .then(() =>
        abort.signal.aborted
          ? undefined
          : starter({
              logger,
              signal: abort.signal,
              createLogSink: this.createLogSink,
            }),
      )
      .then(
        () => this.logger.debug('Debuggee finished'),
        (error: unknown) => {
          if (abort.signal.aborted) {
            this.logger.debug('Debuggee stopped after cancellation', {
              reason: GatewayError.toError(error).message,
            });
            return;
          }
          this.logger.error(
            'Debuggee failed',
            GatewayError.debuggeeFailed(GatewayError.toError(error)),
          );
        },
      );

    // Output events are all sent before the debuggee computation finishes
    void completion
      .then(() => this.terminateGracefully())
      .catch((error: unknown) =>
        this.logger.error('Session termination failed', error),
      );

    return {
      completion,
      cancel: () => {
        if (!abort.signal.aborted) {
          abort.abort();
        }
      },
      get isCancelled() {
        return abort.signal.aborted;
      },
    };
  }

  private async terminateGracefully(): Promise<void> {
    await this.endOfConnection.promise;
    this.settleVerdict(ExitVerdicts.TERMINATED);
    this.closeConnection();
  }

  private cancelDebuggee(debuggee: DebuggeeHandle): void {
    this.loggerAdapter.onDebuggeeFinished();
    debuggee.cancel();
  }

  private scheduleForcedEndOfConnection(): void {
    void this.endOfConnection
      .wait(this.config.shutdownTimeoutMs)
      .then((result) => {
        if (!result.settled) {
          this.logger.warn(
            'Communication with the debug client is frozen, closing client forcefully...',
            { timeoutMs: this.config.shutdownTimeoutMs },
          );
        }
      })
      .finally(() => this.markEndOfConnection());
  }

  private observeTerminalEvent(eventType: string): void {
    if (this.tracker.remove(eventType)) {
      this.markEndOfConnection();
    }
  }

  private markEndOfConnection(): void {
    if (this.endOfConnection.settle()) {
      this.logger.debug('End of connection reached');
      this.notify('endOfConnection', undefined);
    }
  }

  private settleVerdict(verdict: ExitVerdict): void {
    if (this.verdict.settle(verdict)) {
      this.logger.info('Debug session exit verdict', { verdict });
      this.notify('exitVerdict', verdict);
    }
  }

  private closeConnection(): void {
    if (this.connectionClosed) {
      return;
    }
    this.connectionClosed = true;
    try {
      this.connection.close();
    } catch (error) {
      this.logger.warn('Closing the client connection failed', {
        error: GatewayError.toError(error).message,
      });
    }
  }

  private notify<K extends keyof DebugSessionEvents>(
    event: K,
    data: DebugSessionEvents[K],
  ): void {
    this.emitter.emit(event, data).catch((error: unknown) => {
      this.logger.error(`Session event listener failed: ${event}`, error);
    });
  }
}
