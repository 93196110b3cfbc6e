/**
 * Server-side relay: serve SOCKS5 CONNECT requests carried inside a tunnel
 * session and pump bytes to the requested upstream.
 *
 * A failed upstream connect is answered in-band and the relay waits for the
 * next request on the same session (no new greeting). Violations the stream
 * cannot recover from (bad version byte, unknown address type, truncated
 * message) close the session with `ProtocolError`.
 */

import type { Socket } from 'node:net';

import type { TunnelSession } from '../tunnel/index.js';
import { ProtocolError, RelayConnectError, toError } from '../shared/errors.js';
import { noopSink, type LifecycleSink } from '../shared/lifecycle.js';
import { createLogger } from '../shared/logger.js';
import { connectTcp } from '../shared/net.js';
import { pumpSocket } from './pump.js';
import { SessionReader } from './session-reader.js';
import {
  ADDRESS_TYPES,
  AUTH_METHODS,
  COMMANDS,
  REPLY_CODES,
  SOCKS_VERSION,
  bytesToIpv6,
  encodeMethodChoice,
  encodeReply,
  formatTarget,
  replyCodeFor,
  type SocksTarget,
} from './socks5.js';

const log = createLogger('relay');

export interface RelayOptions {
  /** Upper bound on each upstream TCP connect (ms) */
  connectTimeoutMs: number;
  /** Receives one relay_connect event per attempt */
  sink?: LifecycleSink;
}

interface ParsedRequest {
  command: number;
  target: SocksTarget;
}

export type SessionHandler = (session: TunnelSession) => Promise<void>;

// ── Parsing ────────────────────────────────────────────────────────────────

function checkVersion(version: number): void {
  if (version !== SOCKS_VERSION) {
    throw new ProtocolError(`Unsupported SOCKS version: ${version}`);
  }
}

/**
 * Run method negotiation until the peer offers "no authentication".
 *
 * @returns false if the peer ended its stream first
 */
async function negotiate(session: TunnelSession, reader: SessionReader): Promise<boolean> {
  for (;;) {
    const head = await reader.readOrEnd(2);
    if (head === null) return false;
    checkVersion(head[0]);

    const methods = await reader.read(head[1]);
    if (methods.includes(AUTH_METHODS.noAuth)) {
      await session.send(encodeMethodChoice(AUTH_METHODS.noAuth));
      return true;
    }
    await session.send(encodeMethodChoice(AUTH_METHODS.noAcceptable));
  }
}

async function readRequest(
  session: TunnelSession,
  reader: SessionReader,
): Promise<ParsedRequest | null> {
  const head = await reader.readOrEnd(4);
  if (head === null) return null;
  checkVersion(head[0]);
  const command = head[1];
  const atyp = head[3];

  let target: Omit<SocksTarget, 'port'>;
  switch (atyp) {
    case ADDRESS_TYPES.ipv4:
      target = { addressType: 'ipv4', host: Array.from(await reader.read(4)).join('.') };
      break;
    case ADDRESS_TYPES.ipv6:
      target = { addressType: 'ipv6', host: bytesToIpv6(await reader.read(16)) };
      break;
    case ADDRESS_TYPES.domain: {
      const [length] = await reader.read(1);
      target = { addressType: 'domain', host: (await reader.read(length)).toString('utf-8') };
      break;
    }
    default:
      // The address length is unknown, so the stream cannot be resynchronised.
      await session.send(encodeReply(REPLY_CODES.addressTypeNotSupported));
      throw new ProtocolError(`Unsupported address type: 0x${atyp.toString(16).padStart(2, '0')}`);
  }

  const port = (await reader.read(2)).readUInt16BE(0);
  return { command, target: { ...target, port } };
}

// ── Upstream ───────────────────────────────────────────────────────────────

async function openTarget(
  session: TunnelSession,
  target: SocksTarget,
  options: RelayOptions,
): Promise<Socket | null> {
  const sink = options.sink ?? noopSink;
  const label = formatTarget(target);

  let upstream: Socket;
  try {
    // The resolver would take an empty name for localhost.
    if (target.host === '') {
      throw new RelayConnectError('empty domain name', REPLY_CODES.hostUnreachable);
    }
    upstream = await connectTcp(target.host, target.port, {
      timeoutMs: options.connectTimeoutMs,
      allowHalfOpen: true,
    });
  } catch (err) {
    const failure = new RelayConnectError(
      `Connect to ${label} failed: ${toError(err).message}`,
      replyCodeFor(err),
      { cause: err },
    );
    log.info(`[${session.id}] ${failure.message}`);
    sink({
      type: 'relay_connect',
      sessionId: session.id,
      target: label,
      ok: false,
      reply: failure.replyCode,
      message: failure.message,
    });
    await session.send(encodeReply(failure.replyCode));
    return null;
  }

  upstream.on('error', (err) => log.debug(`[${session.id}] upstream ${label}: ${err.message}`));

  try {
    await session.send(
      encodeReply(REPLY_CODES.succeeded, {
        address: upstream.localAddress ?? '0.0.0.0',
        port: upstream.localPort ?? 0,
      }),
    );
  } catch (err) {
    upstream.destroy();
    throw err;
  }

  log.debug(`[${session.id}] connected to ${label}`);
  sink({
    type: 'relay_connect',
    sessionId: session.id,
    target: label,
    ok: true,
    reply: REPLY_CODES.succeeded,
  });
  return upstream;
}

// ── Entry ──────────────────────────────────────────────────────────────────

/**
 * Serve one session: negotiate, accept CONNECT requests until one succeeds,
 * then pump until both directions end. Resolves once the session is closed.
 */
export async function relaySession(session: TunnelSession, options: RelayOptions): Promise<void> {
  const reader = new SessionReader(session);
  let upstream: Socket | null = null;

  try {
    if (await negotiate(session, reader)) {
      while (!upstream) {
        const request = await readRequest(session, reader);
        if (request === null) break;

        if (request.command !== COMMANDS.connect) {
          log.info(`[${session.id}] unsupported command 0x${request.command.toString(16)}`);
          await session.send(encodeReply(REPLY_CODES.commandNotSupported));
          continue;
        }
        upstream = await openTarget(session, request.target, options);
      }
    }
  } catch (err) {
    await session.close(toError(err));
    return;
  }

  if (!upstream) {
    await session.close();
    return;
  }
  await pumpSocket(upstream, session, reader.drain());
}

/** Listener handler that runs the relay on every accepted session. */
export function createRelayHandler(options: RelayOptions): SessionHandler {
  return (session) => relaySession(session, options);
}
