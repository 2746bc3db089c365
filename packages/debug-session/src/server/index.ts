export { startDebugServer } from './debug-server.js';
export type {
  DebugServer,
  DebugServerOptions,
  ServedSession,
} from './debug-server.js';
