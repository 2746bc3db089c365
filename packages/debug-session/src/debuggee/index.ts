export { DebuggeeLogger } from './debuggee-logger.js';
export type { DebuggeeLoggerOptions } from './debuggee-logger.js';
