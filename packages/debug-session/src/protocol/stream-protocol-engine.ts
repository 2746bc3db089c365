import type { DapMessage, DapRequest } from '@dap-gateway/models';
import { DEFAULT_ADAPTER_LOGGER_NAME } from '@dap-gateway/schemas';
import { GatewayError } from '@dap-gateway/core';
import type {
  EngineHooks,
  IProtocolEngine,
  LogSink,
  OutboundEvent,
  OutboundResponse,
  ProtocolOutbound,
  SessionConnection,
} from '../types/index.js';
import { MessageReader } from './message-reader.js';
import { MessageWriter, type OutboundMessage } from './message-writer.js';
import { failedResponse } from './messages.js';

/**
 * Executes one protocol request. Replies go through `outbound`, never
 * straight to the wire, so interceptors see them.
 * @public
 */
export type RequestHandler = (
  request: DapRequest,
  outbound: ProtocolOutbound,
) => void | Promise<void>;

export interface StreamProtocolEngineOptions {
  /** Command executor; unknown commands are answered with a failure by default */
  requestHandler?: RequestHandler;
  /** Name under which the engine asks the hooks for its log sink */
  loggerName?: string;
}

export const unrecognizedRequestHandler: RequestHandler = (
  request,
  outbound,
) => {
  outbound.sendResponse(
    failedResponse(request, `Unrecognized request: ${request.command}`),
  );
};

/**
 * Protocol engine over a {@link SessionConnection}.
 *
 * Inbound requests are routed to `hooks.dispatchRequest`; only what the
 * interceptor hands back through {@link StreamProtocolEngine.dispatchRequest}
 * reaches the request handler. Diagnostics go to the log sink the hooks
 * provide for `loggerName`.
 * @public
 */
export class StreamProtocolEngine implements IProtocolEngine {
  private readonly writer: MessageWriter;
  private readonly requestHandler: RequestHandler;
  private readonly log: LogSink;
  private running?: Promise<void>;

  public constructor(
    private readonly connection: SessionConnection,
    private readonly hooks: EngineHooks,
    options: StreamProtocolEngineOptions = {},
  ) {
    this.writer = new MessageWriter(connection.output);
    this.requestHandler = options.requestHandler ?? unrecognizedRequestHandler;
    this.log = hooks.createLogSink(
      options.loggerName ?? DEFAULT_ADAPTER_LOGGER_NAME,
    );
  }

  public run(): Promise<void> {
    if (!this.running) {
      this.running = this.readLoop();
    }
    return this.running;
  }

  public dispatchRequest(request: DapRequest): void {
    const outbound: ProtocolOutbound = {
      sendResponse: (response) => this.hooks.sendResponse(response),
      sendEvent: (event) => this.hooks.sendEvent(event),
    };
    const fail = (error: unknown): void => {
      const reason = GatewayError.toError(error).message;
      this.log.publish(
        'SEVERE',
        `[${request.command}] request failed: ${reason}`,
      );
      this.hooks.sendResponse(failedResponse(request, reason));
    };

    try {
      const pending = this.requestHandler(request, outbound);
      if (pending instanceof Promise) {
        void pending.catch(fail);
      }
    } catch (error) {
      fail(error);
    }
  }

  public sendResponse(response: OutboundResponse): void {
    this.write(response);
  }

  public sendEvent(event: OutboundEvent): void {
    this.write(event);
  }

  private write(message: OutboundMessage): void {
    try {
      this.writer.write(message);
    } catch (error) {
      this.log.publish(
        'SEVERE',
        `Failed to send ${message.type}: ${GatewayError.toError(error).message}`,
      );
    }
  }

  private async readLoop(): Promise<void> {
    const reader = new MessageReader(this.connection.input);
    const closed = reader.once('close');
    reader.on('message', (message) => this.route(message));
    reader.on('error', (error) => {
      this.log.publish('SEVERE', error.message);
    });
    await closed;
    reader.clearListeners();
  }

  private route(message: DapMessage): void {
    if (message.type === 'request') {
      this.hooks.dispatchRequest(message);
      return;
    }
    this.log.publish(
      'FINE',
      `Ignoring inbound ${message.type} seq=${message.seq}`,
    );
  }
}
