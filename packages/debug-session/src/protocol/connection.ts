import type { Socket } from 'node:net';
import type { SessionConnection } from '../types/index.js';

/**
 * Adapts a TCP socket to a {@link SessionConnection}.
 *
 * Closing ends the socket after pending writes flush, so the last events of a
 * conversation still reach the client.
 */
export function socketConnection(socket: Socket): SessionConnection {
  return {
    input: socket,
    output: socket,
    close: () => {
      socket.end();
    },
  };
}
