export { NoiseMatcherSchema } from './NoiseMatcherSchema.js';
export type { NoiseMatcherZod } from './NoiseMatcherSchema.js';
export {
  SessionConfigSchema,
  NoiseConfigSchema,
  DEFAULT_HANDSHAKE_TIMEOUT_MS,
  DEFAULT_SHUTDOWN_TIMEOUT_MS,
  DEFAULT_LAUNCH_FAILURE_MESSAGE,
  DEFAULT_ADAPTER_LOGGER_NAME,
  DEFAULT_ADDRESS_PATTERN,
} from './SessionConfigSchema.js';
export type {
  SessionConfigZod,
  SessionConfigInput,
  NoiseConfigZod,
} from './SessionConfigSchema.js';
