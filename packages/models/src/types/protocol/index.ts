export type {
  ProtocolMessageType,
  ProtocolMessageBase,
  DapRequest,
  DapResponse,
  DapEvent,
  DapMessage,
  Unsequenced,
} from './protocol-message.js';
export type { AttachArguments, DisconnectArguments } from './arguments.js';
