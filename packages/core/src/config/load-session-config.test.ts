import { describe, it, expect } from 'vitest';
import { loadSessionConfig } from './load-session-config.js';
import { GatewayError, GatewayErrorCode } from '../errors/index.js';

describe('loadSessionConfig', () => {
  it('uses schema defaults for an empty environment', () => {
    const config = loadSessionConfig({ env: {} });

    expect(config.handshakeTimeoutMs).toBe(5000);
    expect(config.shutdownTimeoutMs).toBe(5000);
    expect(config.launchFailureMessage).toBe('Could not start debuggee');
  });

  it('reads timeouts and host from the environment', () => {
    const config = loadSessionConfig({
      env: {
        DAP_GATEWAY_HANDSHAKE_TIMEOUT_MS: '1500',
        DAP_GATEWAY_SHUTDOWN_TIMEOUT_MS: '2500',
        DAP_GATEWAY_DEBUGGEE_HOST: 'localhost',
      },
    });

    expect(config.handshakeTimeoutMs).toBe(1500);
    expect(config.shutdownTimeoutMs).toBe(2500);
    expect(config.debuggeeHost).toBe('localhost');
  });

  it('lets overrides win over the environment', () => {
    const config = loadSessionConfig({
      env: { DAP_GATEWAY_HANDSHAKE_TIMEOUT_MS: '1500' },
      overrides: { handshakeTimeoutMs: 300 },
    });

    expect(config.handshakeTimeoutMs).toBe(300);
  });

  it('ignores blank environment values', () => {
    const config = loadSessionConfig({
      env: { DAP_GATEWAY_SHUTDOWN_TIMEOUT_MS: '  ' },
    });

    expect(config.shutdownTimeoutMs).toBe(5000);
  });

  it('throws an invalid_configuration error naming the bad field', () => {
    let caught: unknown;
    try {
      loadSessionConfig({
        env: { DAP_GATEWAY_HANDSHAKE_TIMEOUT_MS: 'soon' },
      });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(GatewayError);
    if (caught instanceof GatewayError) {
      expect(caught.code).toBe(GatewayErrorCode.INVALID_CONFIGURATION);
      expect(caught.message).toContain('handshakeTimeoutMs:');
    }
  });
});
