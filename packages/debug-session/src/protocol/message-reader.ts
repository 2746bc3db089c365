import Emittery from 'emittery';
import type { Readable } from 'node:stream';
import type { DapMessage } from '@dap-gateway/models';
import { DapMessageSchema } from '@dap-gateway/schemas';
import { GatewayError, defaultLogger, type ILogger } from '@dap-gateway/core';

const HEADER_DELIMITER = '\r\n\r\n';
const CONTENT_LENGTH = /Content-Length:\s*(\d+)/i;

/**
 * Typed reader events for Emittery-based subscription.
 * @internal
 */
export interface MessageReaderEvents {
  message: DapMessage;
  error: GatewayError;
  close: undefined;
}

/**
 * Splits a byte stream into `Content-Length` framed protocol messages.
 *
 * Frames whose header lacks a length, or whose body is not a valid protocol
 * message, are reported on `error` and skipped; reading continues with the
 * next frame. `close` fires once when the input ends, errors or closes.
 * @example
 * ```typescript
 * const reader = new MessageReader(socket);
 * reader.on('message', (message) => route(message));
 * await reader.once('close');
 * ```
 * @public
 */
export class MessageReader extends Emittery<MessageReaderEvents> {
  private buffer = Buffer.alloc(0);
  private closed = false;

  public constructor(
    private readonly input: Readable,
    private readonly logger: ILogger = defaultLogger,
  ) {
    super();
    this.input.on('data', (chunk: Buffer | string) => this.onData(chunk));
    this.input.once('end', () => this.onClose());
    this.input.once('close', () => this.onClose());
    this.input.once('error', (error: Error) => {
      this.report(GatewayError.protocolError('input stream failed', error));
      this.onClose();
    });
  }

  public get isClosed(): boolean {
    return this.closed;
  }

  private onData(chunk: Buffer | string): void {
    const bytes = typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
    this.buffer = Buffer.concat([this.buffer, bytes]);

    while (true) {
      const headerEnd = this.buffer.indexOf(HEADER_DELIMITER);
      if (headerEnd === -1) break;

      const header = this.buffer.subarray(0, headerEnd).toString('ascii');
      const match = CONTENT_LENGTH.exec(header);
      const contentStart = headerEnd + HEADER_DELIMITER.length;
      if (!match?.[1]) {
        this.buffer = this.buffer.subarray(contentStart);
        this.report(
          GatewayError.protocolError(`missing Content-Length in "${header}"`),
        );
        continue;
      }

      const contentLength = parseInt(match[1], 10);
      if (this.buffer.length < contentStart + contentLength) break;

      const content = this.buffer
        .subarray(contentStart, contentStart + contentLength)
        .toString('utf8');
      this.buffer = this.buffer.subarray(contentStart + contentLength);
      this.decode(content);
    }
  }

  private decode(content: string): void {
    let json: unknown;
    try {
      json = JSON.parse(content);
    } catch (error) {
      this.report(
        GatewayError.protocolError(
          'malformed JSON body',
          GatewayError.toError(error),
        ),
      );
      return;
    }

    const parsed = DapMessageSchema.safeParse(json);
    if (!parsed.success) {
      this.report(
        GatewayError.protocolError(
          `invalid message: ${parsed.error.issues
            .map((issue) => `${issue.path.join('.')} ${issue.message}`)
            .join(', ')}`,
        ),
      );
      return;
    }
    void this.emit('message', parsed.data).catch((error: unknown) =>
      this.report(
        GatewayError.protocolError(
          'message listener failed',
          GatewayError.toError(error),
        ),
      ),
    );
  }

  private report(error: GatewayError): void {
    this.emit('error', error).catch((failure: unknown) =>
      this.logger.error('MessageReader error listener failed', failure, {
        reported: error.message,
      }),
    );
  }

  private onClose(): void {
    if (this.closed) return;
    this.closed = true;
    this.emit('close').catch((failure: unknown) =>
      this.logger.error('MessageReader close listener failed', failure),
    );
  }
}
