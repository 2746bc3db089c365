/**
 * Wire-level message shapes of the debug adapter protocol.
 *
 * Only the fields the gateway reads or writes are modelled; payloads
 * (`arguments`, `body`) stay opaque and pass through untouched.
 */

export type ProtocolMessageType = 'request' | 'response' | 'event';

export interface ProtocolMessageBase {
  /** Sequence number of the message, assigned by its sender */
  seq: number;
  type: ProtocolMessageType;
}

export interface DapRequest extends ProtocolMessageBase {
  type: 'request';
  command: string;
  arguments?: Record<string, unknown>;
}

export interface DapResponse extends ProtocolMessageBase {
  type: 'response';
  /** Sequence number of the request this response answers */
  request_seq: number;
  command: string;
  success: boolean;
  message?: string;
  body?: unknown;
}

export interface DapEvent extends ProtocolMessageBase {
  type: 'event';
  event: string;
  body?: unknown;
}

export type DapMessage = DapRequest | DapResponse | DapEvent;

/**
 * A response or event before the writer has stamped its outbound `seq`.
 */
export type Unsequenced<T extends ProtocolMessageBase> = Omit<T, 'seq'> & {
  seq?: number;
};
