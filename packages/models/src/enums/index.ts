export { Commands, TerminalEvents } from './protocol.js';
export type { InterceptedCommand, TerminalEventType } from './protocol.js';
