import type { Writable } from 'node:stream';
import type {
  DapMessage,
  DapEvent,
  DapRequest,
  DapResponse,
  Unsequenced,
} from '@dap-gateway/models';
import { GatewayError } from '@dap-gateway/core';

export type OutboundMessage =
  | Unsequenced<DapRequest>
  | Unsequenced<DapResponse>
  | Unsequenced<DapEvent>;

/**
 * Encodes a message as one `Content-Length` frame.
 */
export function encodeMessage(message: DapMessage): string {
  const json = JSON.stringify(message);
  return `Content-Length: ${Buffer.byteLength(json, 'utf8')}\r\n\r\n${json}`;
}

/**
 * Writes framed protocol messages, stamping each with the next outbound `seq`.
 * @public
 */
export class MessageWriter {
  private seq = 1;

  public constructor(private readonly output: Writable) {}

  /**
   * @returns The message as written, with its `seq`
   * @throws {GatewayError} With code `connection_closed` once the output has ended
   */
  public write(message: OutboundMessage): DapMessage {
    if (this.output.writableEnded || this.output.destroyed) {
      throw GatewayError.connectionClosed();
    }
    const sequenced: DapMessage = { ...message, seq: this.seq++ };
    this.output.write(encodeMessage(sequenced));
    return sequenced;
  }
}
