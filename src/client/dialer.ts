import type { SessionConfig } from '../shared/config.js';
import type { CryptoEngine } from '../shared/crypto/index.js';
import { noopSink, type LifecycleSink } from '../shared/lifecycle.js';
import { createLogger } from '../shared/logger.js';
import { connectTcp } from '../shared/net.js';
import { TunnelSession } from '../tunnel/index.js';

const log = createLogger('dialer');

export interface TunnelDialerOptions {
  host: string;
  port: number;
  key: Buffer | CryptoEngine;
  /** Session tuning (keepalive, frame size, rekey) */
  session?: Partial<SessionConfig>;
  /** TCP connect timeout (ms) */
  connectTimeoutMs?: number;
  sink?: LifecycleSink;
}

/** Opens tunnel sessions to one server. */
export class TunnelDialer {
  constructor(private readonly options: TunnelDialerOptions) {}

  /**
   * Connect to the server and start a session on the new connection.
   *
   * @throws TimeoutError if the connection is not established in time
   */
  async connect(): Promise<TunnelSession> {
    const { host, port } = this.options;
    const socket = await connectTcp(host, port, {
      timeoutMs: this.options.connectTimeoutMs ?? 10_000,
      allowHalfOpen: true,
    });
    log.debug(`Connected to ${host}:${port}`);

    return new TunnelSession(socket, {
      ...this.options.session,
      key: this.options.key,
      peer: `${host}:${port}`,
      sink: this.options.sink ?? noopSink,
    });
  }
}
