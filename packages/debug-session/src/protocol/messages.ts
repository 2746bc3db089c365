import {
  Commands,
  type AttachArguments,
  type DapRequest,
  type DebuggeeAddress,
  type DisconnectArguments,
} from '@dap-gateway/models';
import { DisconnectArgumentsSchema } from '@dap-gateway/schemas';
import type { OutboundResponse } from '../types/index.js';

/**
 * Builds the `attach` request that replaces a client `launch`.
 *
 * The request reuses the launch's `seq`, so the engine answers it under the
 * id the client is waiting on.
 */
export function toAttachRequest(
  seq: number,
  address: DebuggeeAddress,
): DapRequest {
  const args: AttachArguments = { hostName: address.host, port: address.port };
  return {
    seq,
    type: 'request',
    command: Commands.ATTACH,
    arguments: { ...args },
  };
}

/**
 * Builds a `disconnect` request that never asks for a restart.
 */
export function toDisconnectRequest(seq: number): DapRequest {
  const args: DisconnectArguments = { restart: false };
  return {
    seq,
    type: 'request',
    command: Commands.DISCONNECT,
    arguments: { ...args },
  };
}

export function failedResponse(
  request: DapRequest,
  message: string,
): OutboundResponse {
  return {
    type: 'response',
    request_seq: request.seq,
    command: request.command,
    success: false,
    message,
  };
}

export function acknowledgment(request: DapRequest): OutboundResponse {
  return {
    type: 'response',
    request_seq: request.seq,
    command: request.command,
    success: true,
  };
}

/**
 * Reads the restart flag of a `disconnect` request.
 * @returns `false` when the arguments are absent or malformed
 */
export function shouldRestart(request: DapRequest): boolean {
  const parsed = DisconnectArgumentsSchema.safeParse(request.arguments ?? {});
  return parsed.success && parsed.data.restart === true;
}
