export { DebuggeeLogAdapter } from './logger-adapter.js';
export { createLoggerFactory, silentLogSink } from './logger-factory.js';
export { matchesNoise } from './noise-matcher.js';
export type { NoiseMatcher } from './noise-matcher.js';
