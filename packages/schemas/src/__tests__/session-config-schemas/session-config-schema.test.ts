import { describe, it, expect } from 'vitest';
import {
  DapMessageSchema,
  DisconnectArgumentsSchema,
  NoiseMatcherSchema,
  SessionConfigSchema,
} from '../../index.js';

describe('SessionConfigSchema', () => {
  describe('defaults', () => {
    it('should fill every field from an empty object', () => {
      const result = SessionConfigSchema.parse({});

      expect(result.handshakeTimeoutMs).toBe(5000);
      expect(result.shutdownTimeoutMs).toBe(5000);
      expect(result.launchFailureMessage).toBe('Could not start debuggee');
      expect(result.terminalEvents).toEqual(['terminated', 'exited']);
      expect(result.adapterLoggerName).toBe('java-debug');
      expect(result.debuggeeHost).toBe('127.0.0.1');
      expect(result.addressPattern).toBe(
        'Listening for transport dt_socket at address: (\\d+)',
      );
    });

    it('should default the noise matchers', () => {
      const result = SessionConfigSchema.parse({});

      expect(result.noise.streamClosed).toEqual({
        match: 'suffix',
        text: 'java.net.SocketException: Socket closed',
      });
      expect(result.noise.ignored).toEqual([
        {
          match: 'prefix',
          text: 'Exception on recording event: com.sun.jdi.VMDisconnectedException',
        },
      ]);
    });

    it('should not share the default ignored list between parses', () => {
      const first = SessionConfigSchema.parse({});
      first.noise.ignored.push({ match: 'contains', text: 'noise' });

      const second = SessionConfigSchema.parse({});
      expect(second.noise.ignored).toHaveLength(1);
    });
  });

  describe('validation', () => {
    it('should keep explicit values', () => {
      const result = SessionConfigSchema.parse({
        handshakeTimeoutMs: 250,
        terminalEvents: ['terminated'],
        noise: { ignored: [] },
      });

      expect(result.handshakeTimeoutMs).toBe(250);
      expect(result.terminalEvents).toEqual(['terminated']);
      expect(result.noise.ignored).toEqual([]);
      expect(result.noise.streamClosed.match).toBe('suffix');
    });

    it('should reject non-positive timeouts', () => {
      expect(() => SessionConfigSchema.parse({ shutdownTimeoutMs: 0 })).toThrow();
      expect(() =>
        SessionConfigSchema.parse({ handshakeTimeoutMs: -1 }),
      ).toThrow();
    });

    it('should reject an empty terminal event list', () => {
      expect(() => SessionConfigSchema.parse({ terminalEvents: [] })).toThrow();
    });

    it('should reject an address pattern that is not a regular expression', () => {
      const result = SessionConfigSchema.safeParse({ addressPattern: '(' });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.issues[0]?.message).toBe(
          'addressPattern must be a valid regular expression',
        );
      }
    });
  });
});

describe('NoiseMatcherSchema', () => {
  it('should reject unknown match kinds', () => {
    expect(() =>
      NoiseMatcherSchema.parse({ match: 'regex', text: 'x' }),
    ).toThrow();
  });

  it('should reject empty text', () => {
    expect(() => NoiseMatcherSchema.parse({ match: 'prefix', text: '' })).toThrow();
  });
});

describe('DisconnectArgumentsSchema', () => {
  it('should read the restart flag', () => {
    expect(DisconnectArgumentsSchema.parse({ restart: true }).restart).toBe(true);
  });

  it('should keep unknown arguments', () => {
    const result = DisconnectArgumentsSchema.parse({
      restart: false,
      suspendDebuggee: true,
    });
    expect(result).toEqual({ restart: false, suspendDebuggee: true });
  });

  it('should reject a restart flag that is not a boolean', () => {
    expect(DisconnectArgumentsSchema.safeParse({ restart: 'yes' }).success).toBe(
      false,
    );
  });
});

describe('DapMessageSchema', () => {
  it('should accept a request and keep its arguments', () => {
    const result = DapMessageSchema.parse({
      seq: 1,
      type: 'request',
      command: 'launch',
      arguments: { noDebug: false },
    });

    expect(result.type).toBe('request');
    if (result.type === 'request') {
      expect(result.arguments).toEqual({ noDebug: false });
    }
  });

  it('should reject a response without success flag', () => {
    expect(
      DapMessageSchema.safeParse({
        seq: 2,
        type: 'response',
        request_seq: 1,
        command: 'launch',
      }).success,
    ).toBe(false);
  });

  it('should reject unknown message types', () => {
    expect(
      DapMessageSchema.safeParse({ seq: 3, type: 'notification' }).success,
    ).toBe(false);
  });
});
