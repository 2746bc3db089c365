export { DebugSession } from './debug-session.js';
export type { DebugSessionOptions } from './debug-session.js';
export { SessionStateCell } from './session-state.js';
export { TerminationTracker } from './termination-tracker.js';
