import type { ILogger } from '@dap-gateway/core';
import type { DebuggeeAddress } from '@dap-gateway/models';

export interface DebuggeeLoggerOptions {
  /** Regular expression whose first group captures the debuggee's port */
  addressPattern: string;
  /** Host reported with a port found in the output */
  host: string;
}

/**
 * Logger handed to the debuggee starter.
 *
 * Forwards everything to the session logger. Output lines of the debuggee are
 * also scanned for the address it listens on; the first address found, or
 * the first one reported directly, is passed to `onAddress`. Later ones are
 * ignored.
 * @example
 * ```typescript
 * const logger = new DebuggeeLogger(sessionLogger, (address) => connect(address), {
 *   addressPattern: 'Listening for transport dt_socket at address: (\\d+)',
 *   host: '127.0.0.1',
 * });
 * logger.output('Listening for transport dt_socket at address: 5005');
 * // connect({ host: '127.0.0.1', port: 5005 })
 * ```
 * @public
 */
export class DebuggeeLogger implements ILogger {
  private readonly addressPattern: RegExp;
  private address?: DebuggeeAddress;

  public constructor(
    private readonly logger: ILogger,
    private readonly onAddress: (address: DebuggeeAddress) => void,
    private readonly options: DebuggeeLoggerOptions,
  ) {
    this.addressPattern = new RegExp(options.addressPattern);
  }

  public get resolvedAddress(): DebuggeeAddress | undefined {
    return this.address;
  }

  public debug(message: string, context?: Record<string, unknown>): void {
    this.logger.debug(message, context);
  }

  public info(message: string, context?: Record<string, unknown>): void {
    this.logger.info(message, context);
  }

  public warn(message: string, context?: Record<string, unknown>): void {
    this.logger.warn(message, context);
  }

  public error(
    message: string,
    error?: Error | unknown,
    context?: Record<string, unknown>,
  ): void {
    this.logger.error(message, error, context);
  }

  /**
   * Records one line the debuggee printed.
   */
  public output(line: string): void {
    this.logger.info(line, { source: 'debuggee' });
    if (this.address) return;

    const port = Number(this.addressPattern.exec(line)?.[1]);
    if (Number.isInteger(port) && port > 0 && port <= 65535) {
      this.reportAddress({ host: this.options.host, port });
    }
  }

  public reportAddress(address: DebuggeeAddress): void {
    if (this.address) return;
    this.address = address;
    this.logger.debug('Debuggee address resolved', { ...address });
    this.onAddress(address);
  }
}
