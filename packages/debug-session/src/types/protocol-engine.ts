import type { Readable, Writable } from 'node:stream';
import type {
  DapEvent,
  DapRequest,
  DapResponse,
  Unsequenced,
} from '@dap-gateway/models';
import type { LoggerFactory } from './log-sink.js';

export type OutboundResponse = Unsequenced<DapResponse>;
export type OutboundEvent = Unsequenced<DapEvent>;

/**
 * Duplex byte stream carrying one protocol conversation.
 * @public
 */
export interface SessionConnection {
  readonly input: Readable;
  readonly output: Writable;
  close(): void;
}

/**
 * Where a protocol engine sends outbound traffic.
 * @public
 */
export interface ProtocolOutbound {
  sendResponse(response: OutboundResponse): void;
  sendEvent(event: OutboundEvent): void;
}

/**
 * Entry points an engine must call instead of its own methods, so that an
 * interceptor placed in front of it sees all traffic.
 * @public
 */
export interface EngineHooks extends ProtocolOutbound {
  dispatchRequest(request: DapRequest): void;
  createLogSink: LoggerFactory;
}

/**
 * The protocol engine contract: parses inbound requests, executes them and
 * writes responses and events.
 * @public
 */
export interface IProtocolEngine extends ProtocolOutbound {
  /** Read loop; resolves once the inbound stream ends */
  run(): Promise<void>;
  /** Executes a request as if the client had sent it */
  dispatchRequest(request: DapRequest): void;
}

/**
 * Builds the engine a session sits in front of.
 * @public
 */
export type EngineFactory = (
  connection: SessionConnection,
  hooks: EngineHooks,
) => IProtocolEngine;
