// Session phase and debuggee lifecycle
export * from './session-phase.js';

// Log records from the debuggee-management layer
export * from './log-sink.js';

// Protocol engine seam
export * from './protocol-engine.js';

// Event-driven session events
export * from './events.js';
