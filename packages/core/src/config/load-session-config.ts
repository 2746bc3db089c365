import {
  SessionConfigSchema,
  type SessionConfigInput,
  type SessionConfigZod,
} from '@dap-gateway/schemas';
import { GatewayError } from '../errors/index.js';

export type SessionConfig = SessionConfigZod;

export const ConfigEnv = {
  HANDSHAKE_TIMEOUT_MS: 'DAP_GATEWAY_HANDSHAKE_TIMEOUT_MS',
  SHUTDOWN_TIMEOUT_MS: 'DAP_GATEWAY_SHUTDOWN_TIMEOUT_MS',
  DEBUGGEE_HOST: 'DAP_GATEWAY_DEBUGGEE_HOST',
} as const;

export interface LoadSessionConfigOptions {
  /** Explicit values; these win over the environment */
  overrides?: SessionConfigInput;
  /** Environment source, `process.env` by default */
  env?: Record<string, string | undefined>;
}

function readNumber(
  env: Record<string, string | undefined>,
  name: string,
): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  // Left for the schema to reject when not an integer
  return Number(raw);
}

function fromEnvironment(
  env: Record<string, string | undefined>,
): SessionConfigInput {
  const config: SessionConfigInput = {};
  const handshake = readNumber(env, ConfigEnv.HANDSHAKE_TIMEOUT_MS);
  if (handshake !== undefined) {
    config.handshakeTimeoutMs = handshake;
  }
  const shutdown = readNumber(env, ConfigEnv.SHUTDOWN_TIMEOUT_MS);
  if (shutdown !== undefined) {
    config.shutdownTimeoutMs = shutdown;
  }
  const host = env[ConfigEnv.DEBUGGEE_HOST];
  if (host) {
    config.debuggeeHost = host;
  }
  return config;
}

/**
 * Resolves the session configuration from the environment and explicit overrides.
 *
 * Overrides take precedence over `DAP_GATEWAY_*` variables; everything left
 * unset falls back to the schema defaults.
 * @throws {GatewayError} With code `invalid_configuration`, listing every issue
 * @example
 * ```typescript
 * const config = loadSessionConfig({ overrides: { handshakeTimeoutMs: 1000 } });
 * config.shutdownTimeoutMs; // 5000 unless DAP_GATEWAY_SHUTDOWN_TIMEOUT_MS is set
 * ```
 * @public
 */
export function loadSessionConfig(
  options: LoadSessionConfigOptions = {},
): SessionConfig {
  const merged: SessionConfigInput = {
    ...fromEnvironment(options.env ?? process.env),
    ...options.overrides,
  };
  const result = SessionConfigSchema.safeParse(merged);
  if (!result.success) {
    throw GatewayError.invalidConfiguration(
      result.error.issues.map(
        (issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`,
      ),
    );
  }
  return result.data;
}
