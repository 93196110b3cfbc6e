/**
 * Bidirectional byte pump between a plain TCP socket and a tunnel session.
 *
 * Each direction runs on its own:
 *   socket → session   send each chunk; on FIN, session.endWrite()
 *   session → socket   write each received chunk; on end of stream, socket.end()
 *
 * The socket is paused while a send waits for the tunnel to drain, and the
 * session loop waits for the socket's 'drain' before receiving more. When
 * both directions are done (or either fails) the socket is destroyed and the
 * session closed.
 */

import { once } from 'node:events';
import type { Socket } from 'node:net';

import type { TunnelSession } from '../tunnel/index.js';
import { toError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';

const log = createLogger('pump');

function socketToSession(socket: Socket, session: TunnelSession): Promise<void> {
  return new Promise((resolve, reject) => {
    let ended = false;

    socket.on('data', (chunk: Buffer) => {
      socket.pause();
      session.send(chunk).then(
        () => socket.resume(),
        (err: unknown) => reject(toError(err)),
      );
    });
    socket.once('end', () => {
      ended = true;
      session.endWrite().then(resolve, reject);
    });
    socket.once('error', reject);
    socket.once('close', () => {
      if (!ended) reject(new Error('Socket closed before end of stream'));
    });
    // A 'data' listener does not restart a socket paused by its owner.
    socket.resume();
  });
}

async function sessionToSocket(session: TunnelSession, socket: Socket, pending: Buffer): Promise<void> {
  if (pending.length > 0 && !socket.write(pending)) {
    await once(socket, 'drain');
  }
  for (;;) {
    const chunk = await session.receive();
    if (chunk === null) break;
    if (!socket.write(chunk)) {
      await once(socket, 'drain');
    }
  }
  await new Promise<void>((resolve) => socket.end(() => resolve()));
}

/**
 * Pump bytes both ways until both directions finish.
 *
 * @param pending - Bytes already taken from the session that belong to the socket
 */
export async function pumpSocket(
  socket: Socket,
  session: TunnelSession,
  pending: Buffer = Buffer.alloc(0),
): Promise<void> {
  try {
    await Promise.all([socketToSession(socket, session), sessionToSocket(session, socket, pending)]);
  } catch (err) {
    log.debug(`[${session.id}] pump stopped: ${toError(err).message}`);
  } finally {
    socket.destroy();
    await session.close();
  }
}
