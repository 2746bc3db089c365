export { OneShot } from './one-shot.js';
export type { OneShotWaitResult } from './one-shot.js';
