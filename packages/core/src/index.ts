export * from './logging/index.js';
export * from './errors/index.js';
export * from './signals/index.js';
export * from './config/index.js';
