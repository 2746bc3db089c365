export { MessageReader } from './message-reader.js';
export type { MessageReaderEvents } from './message-reader.js';
export { MessageWriter, encodeMessage } from './message-writer.js';
export type { OutboundMessage } from './message-writer.js';
export {
  StreamProtocolEngine,
  unrecognizedRequestHandler,
} from './stream-protocol-engine.js';
export type {
  RequestHandler,
  StreamProtocolEngineOptions,
} from './stream-protocol-engine.js';
export { socketConnection } from './connection.js';
export {
  toAttachRequest,
  toDisconnectRequest,
  failedResponse,
  acknowledgment,
  shouldRestart,
} from './messages.js';
