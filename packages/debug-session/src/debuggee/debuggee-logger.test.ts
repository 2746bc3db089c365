import { describe, it, expect, beforeEach } from 'vitest';
import type { DebuggeeAddress } from '@dap-gateway/models';
import { DEFAULT_ADDRESS_PATTERN } from '@dap-gateway/schemas';
import { RecordingLogger } from '../../test/utils/test-doubles.js';
import { DebuggeeLogger } from './debuggee-logger.js';

describe('DebuggeeLogger', () => {
  let sessionLogger: RecordingLogger;
  let addresses: DebuggeeAddress[];
  let logger: DebuggeeLogger;

  beforeEach(() => {
    sessionLogger = new RecordingLogger();
    addresses = [];
    logger = new DebuggeeLogger(sessionLogger, (a) => addresses.push(a), {
      addressPattern: DEFAULT_ADDRESS_PATTERN,
      host: '127.0.0.1',
    });
  });

  it('resolves the address from the listening line', () => {
    logger.output('Listening for transport dt_socket at address: 5005');

    expect(addresses).toEqual([{ host: '127.0.0.1', port: 5005 }]);
    expect(logger.resolvedAddress).toEqual({ host: '127.0.0.1', port: 5005 });
    expect(sessionLogger.entries).toEqual([
      {
        level: 'info',
        message: 'Listening for transport dt_socket at address: 5005',
        context: { source: 'debuggee' },
      },
      {
        level: 'debug',
        message: 'Debuggee address resolved',
        context: { host: '127.0.0.1', port: 5005 },
      },
    ]);
  });

  it('reports only the first address', () => {
    logger.output('Listening for transport dt_socket at address: 5005');
    logger.output('Listening for transport dt_socket at address: 6006');
    logger.reportAddress({ host: 'localhost', port: 7007 });

    expect(addresses).toEqual([{ host: '127.0.0.1', port: 5005 }]);
  });

  it('accepts a directly reported address', () => {
    logger.reportAddress({ host: 'localhost', port: 7007 });

    expect(addresses).toEqual([{ host: 'localhost', port: 7007 }]);
  });

  it('ignores lines without a usable port', () => {
    logger.output('Compiling 3 sources');
    logger.output('Listening for transport dt_socket at address: 70000');
    logger.output('Listening for transport dt_socket at address: 0');

    expect(addresses).toEqual([]);
    expect(logger.resolvedAddress).toBeUndefined();
  });

  it('forwards log calls to the session logger', () => {
    logger.debug('d');
    logger.info('i', { step: 1 });
    logger.warn('w');
    logger.error('e', new Error('boom'));

    expect(sessionLogger.entries).toEqual([
      { level: 'debug', message: 'd' },
      { level: 'info', message: 'i', context: { step: 1 } },
      { level: 'warn', message: 'w' },
      { level: 'error', message: 'e' },
    ]);
  });
});
