/**
 * Client-side SOCKS5 entry point.
 *
 * Local applications connect here as to any SOCKS5 proxy. Each connection
 * gets its own tunnel session and the bytes are pumped through unchanged:
 * the SOCKS5 exchange itself is answered by the relay on the server.
 */

import net from 'node:net';

import { toError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import { pumpSocket } from '../relay/index.js';
import type { TunnelSession } from '../tunnel/index.js';
import type { TunnelDialer } from './dialer.js';

const log = createLogger('socks');

export interface LocalSocksServerOptions {
  host: string;
  port: number;
  dialer: TunnelDialer;
}

export class LocalSocksServer {
  private readonly server: net.Server;
  private readonly sessions = new Set<TunnelSession>();

  constructor(private readonly options: LocalSocksServerOptions) {
    this.server = net.createServer({ allowHalfOpen: true }, (socket) => {
      this.serve(socket).catch((err: unknown) => {
        log.error('Connection failed:', err);
        socket.destroy();
      });
    });
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
        log.info(`SOCKS5 proxy listening on ${address.address}:${address.port}`);
        resolve(address);
      });
    });
  }

  async close(): Promise<void> {
    const stopped = new Promise<void>((resolve) => this.server.close(() => resolve()));
    await Promise.all([...this.sessions].map((session) => session.close()));
    await stopped;
  }

  private async serve(socket: net.Socket): Promise<void> {
    // Hold application bytes until the tunnel is up.
    socket.pause();
    socket.on('error', (err) => log.debug(`Local connection error: ${err.message}`));

    let session: TunnelSession;
    try {
      session = await this.options.dialer.connect();
    } catch (err) {
      log.warn(`Tunnel connect failed: ${toError(err).message}`);
      socket.destroy();
      return;
    }

    this.sessions.add(session);
    session.once('close', () => this.sessions.delete(session));
    await pumpSocket(socket, session);
  }
}
