export * from './enums/index.js';
export * from './types/protocol/index.js';
export * from './types/session/index.js';
