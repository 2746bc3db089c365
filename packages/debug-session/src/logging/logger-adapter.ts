import type { ILogger } from '@dap-gateway/core';
import type { NoiseConfigZod } from '@dap-gateway/schemas';
import type { DebuggeeLogLevel, LogSink } from '../types/index.js';
import { matchesNoise } from './noise-matcher.js';

/**
 * Maps log records of the debuggee-management layer onto an {@link ILogger}.
 *
 * `INFO`/`CONFIG` become info, `WARNING` warn, everything below debug.
 * `SEVERE` records surface as errors unless they are known shutdown noise:
 * a stream-closed message once the debuggee has finished, or any message
 * matching one of the ignored matchers. Those go to debug.
 * @public
 */
export class DebuggeeLogAdapter implements LogSink {
  private debuggeeFinished = false;

  public constructor(
    private readonly logger: ILogger,
    private readonly noise: NoiseConfigZod,
  ) {}

  public get isDebuggeeFinished(): boolean {
    return this.debuggeeFinished;
  }

  public publish(level: DebuggeeLogLevel, message: string): void {
    switch (level) {
      case 'INFO':
      case 'CONFIG':
        this.logger.info(message);
        return;
      case 'WARNING':
        this.logger.warn(message);
        return;
      case 'SEVERE':
        if (this.isExpectedDuringShutdown(message) || this.isIgnored(message)) {
          this.logger.debug(message);
        } else {
          this.logger.error(message);
        }
        return;
      default:
        this.logger.debug(message);
    }
  }

  /**
   * Arms suppression of stream-closed errors. Idempotent.
   */
  public onDebuggeeFinished(): void {
    this.debuggeeFinished = true;
  }

  private isExpectedDuringShutdown(message: string): boolean {
    return (
      this.debuggeeFinished && matchesNoise(this.noise.streamClosed, message)
    );
  }

  private isIgnored(message: string): boolean {
    return this.noise.ignored.some((matcher) => matchesNoise(matcher, message));
  }
}
