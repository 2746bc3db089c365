export * from './types/index.js';
export * from './session/index.js';
export * from './logging/index.js';
export * from './debuggee/index.js';
export * from './protocol/index.js';
export * from './server/index.js';
