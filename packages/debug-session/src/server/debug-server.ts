import { createServer, type Server, type Socket } from 'node:net';
import {
  createScopedLogger,
  GatewayError,
  GatewayErrorCode,
  OneShot,
  type ILogger,
} from '@dap-gateway/core';
import { ExitVerdicts, type ExitVerdict } from '@dap-gateway/models';
import type { SessionConnection } from '../types/index.js';
import { socketConnection } from '../protocol/index.js';
import type { DebugSession } from '../session/debug-session.js';

/**
 * The part of a {@link DebugSession} the server drives.
 */
export type ServedSession = Pick<DebugSession, 'start' | 'cancel' | 'exitStatus'>;

export interface DebugServerOptions {
  /** Builds the session for one accepted client connection */
  createSession: (connection: SessionConnection) => ServedSession;
  host?: string;
  /** `0` picks an ephemeral port */
  port?: number;
  logger?: ILogger;
}

/**
 * Handle to a listening debug server.
 * @public
 */
export interface DebugServer {
  readonly host: string;
  readonly port: number;
  /** Resolves when the server stops, with the last session's verdict if any */
  readonly closed: Promise<ExitVerdict | undefined>;
  /** Cancels the running session and stops listening */
  close(): Promise<void>;
}

/**
 * Listens for debug clients and runs one session at a time.
 *
 * A session that ends `restarted` is cancelled and the server waits for the
 * client to reconnect; a `terminated` session stops the server. Clients that
 * connect while a session is running are turned away.
 * @example
 * ```typescript
 * const server = await startDebugServer({
 *   createSession: (connection) => new DebugSession({ connection, starter }),
 * });
 * console.info(`debug client can connect to ${server.host}:${server.port}`);
 * const verdict = await server.closed;
 * ```
 * @public
 */
export async function startDebugServer(
  options: DebugServerOptions,
): Promise<DebugServer> {
  const logger = options.logger ?? createScopedLogger('debug-server');
  const closed = new OneShot<ExitVerdict | undefined>();
  let active: ServedSession | undefined;
  let lastVerdict: ExitVerdict | undefined;

  const server: Server = createServer((socket) => accept(socket));

  // Stops accepting clients; connections still open finish on their own
  const stop = (): void => {
    if (server.listening) {
      server.close((error) => {
        if (error) {
          logger.warn('Debug server close failed', { error: error.message });
        }
      });
    }
    if (closed.settle(lastVerdict)) {
      logger.info('Debug server stopped', { verdict: lastVerdict });
    }
  };

  const accept = (socket: Socket): void => {
    if (active || closed.isSettled) {
      logger.warn('Rejecting debug client, a session is already running', {
        remote: `${socket.remoteAddress}:${socket.remotePort}`,
      });
      socket.destroy();
      return;
    }

    const session = options.createSession(socketConnection(socket));
    active = session;
    session.start();
    void session
      .exitStatus()
      .then((verdict) => {
        lastVerdict = verdict;
        if (verdict === ExitVerdicts.RESTARTED) {
          logger.info('Debug session restarted, waiting for the client');
          session.cancel();
          active = undefined;
          return;
        }
        active = undefined;
        stop();
      })
      .catch((error: unknown) =>
        logger.error('Debug session supervision failed', error),
      );
  };

  const address = await new Promise<{ host: string; port: number }>(
    (resolve, reject) => {
      server.once('error', reject);
      server.listen(options.port ?? 0, options.host ?? '127.0.0.1', () => {
        server.off('error', reject);
        const bound = server.address();
        if (!bound || typeof bound === 'string') {
          reject(
            new GatewayError(
              'Debug server is not bound to a TCP address',
              GatewayErrorCode.CONNECTION_CLOSED,
            ),
          );
          return;
        }
        resolve({ host: bound.address, port: bound.port });
      });
    },
  );
  server.on('error', (error) => logger.error('Debug server failed', error));
  logger.info('Debug server listening', { ...address });

  return {
    host: address.host,
    port: address.port,
    closed: closed.promise,
    close: async () => {
      active?.cancel();
      stop();
      await closed.promise;
    },
  };
}
