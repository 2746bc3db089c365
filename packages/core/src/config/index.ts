export { loadSessionConfig, ConfigEnv } from './load-session-config.js';
export type {
  SessionConfig,
  LoadSessionConfigOptions,
} from './load-session-config.js';
