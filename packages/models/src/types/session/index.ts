export type { DebuggeeAddress } from './debuggee-address.js';
export type { ExitVerdict } from './exit-verdict.js';
export { ExitVerdicts } from './exit-verdict.js';
