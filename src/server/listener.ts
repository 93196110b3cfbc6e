/**
 * Tunnel listener: accept raw TCP connections, wrap each in a TunnelSession
 * and hand it to a session handler (the relay by default).
 *
 * Session failures stay inside their session; the listener keeps accepting.
 */

import net from 'node:net';

import type { SessionConfig } from '../shared/config.js';
import type { CryptoEngine } from '../shared/crypto/index.js';
import { toError } from '../shared/errors.js';
import { noopSink, type LifecycleSink } from '../shared/lifecycle.js';
import { createLogger } from '../shared/logger.js';
import { createRelayHandler, type SessionHandler } from '../relay/index.js';
import { TunnelSession } from '../tunnel/index.js';

const log = createLogger('listener');

export interface TunnelListenerOptions {
  host: string;
  port: number;
  key: Buffer | CryptoEngine;
  /** Session tuning (keepalive, frame size, rekey) */
  session?: Partial<SessionConfig>;
  /** Reject connections beyond this many concurrent sessions */
  maxSessions?: number;
  /** Upstream connect timeout for the default relay handler (ms) */
  connectTimeoutMs?: number;
  /** Runs once per accepted session; defaults to the SOCKS5 relay */
  handler?: SessionHandler;
  sink?: LifecycleSink;
}

export class TunnelListener {
  private readonly server: net.Server;
  private readonly sessions = new Set<TunnelSession>();
  private readonly handler: SessionHandler;
  private readonly sink: LifecycleSink;

  constructor(private readonly options: TunnelListenerOptions) {
    this.sink = options.sink ?? noopSink;
    this.handler =
      options.handler ??
      createRelayHandler({ connectTimeoutMs: options.connectTimeoutMs ?? 10_000, sink: this.sink });
    this.server = net.createServer({ allowHalfOpen: true }, (socket) => this.accept(socket));
  }

  /** Number of sessions currently open. */
  get sessionCount(): number {
    return this.sessions.size;
  }

  listen(): Promise<net.AddressInfo> {
    return new Promise((resolve, reject) => {
      this.server.once('error', reject);
      this.server.listen(this.options.port, this.options.host, () => {
        this.server.off('error', reject);
        this.server.on('error', (err) => log.error('Server error:', err));

        const address = this.server.address();
        if (address === null || typeof address === 'string') {
          reject(new Error(`Unexpected listen address: ${String(address)}`));
          return;
        }
        log.info(`Listening on ${address.address}:${address.port}`);
        resolve(address);
      });
    });
  }

  /** Stop accepting and close every open session. */
  async close(): Promise<void> {
    const stopped = new Promise<void>((resolve) => this.server.close(() => resolve()));
    await Promise.all([...this.sessions].map((session) => session.close()));
    await stopped;
    log.info('Listener closed');
  }

  private accept(socket: net.Socket): void {
    const peer = `${socket.remoteAddress ?? 'unknown'}:${socket.remotePort ?? 0}`;
    const { maxSessions } = this.options;

    if (maxSessions !== undefined && this.sessions.size >= maxSessions) {
      log.warn(`Rejecting ${peer}: ${this.sessions.size} sessions open (limit ${maxSessions})`);
      socket.destroy();
      return;
    }

    socket.setNoDelay(true);
    const session = new TunnelSession(socket, {
      ...this.options.session,
      key: this.options.key,
      peer,
      sink: this.sink,
    });
    this.sessions.add(session);
    session.once('close', () => this.sessions.delete(session));

    this.handler(session).catch(async (err: unknown) => {
      log.error(`[${session.id}] handler failed:`, err);
      await session.close(toError(err));
    });
  }
}
