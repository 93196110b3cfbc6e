/**
 * Structured lifecycle events.
 *
 * The core never formats or routes these itself: sessions, relays and
 * listeners hand them to a `LifecycleSink` supplied by whoever constructed
 * them. `createLifecycleLog()` is the default sink used by the entry points;
 * it writes one JSON line per event, like an audit log.
 */

import type { CloseReasonKind } from './errors.js';
import { createLogger, type Logger } from './logger.js';

export interface SessionStats {
  framesSent: number;
  framesReceived: number;
  bytesSent: number;
  bytesReceived: number;
  rekeys: number;
}

export interface SessionOpenedEvent {
  type: 'session_opened';
  sessionId: string;
  /** Remote address of the transport, when known */
  peer?: string;
}

export interface SessionClosedEvent {
  type: 'session_closed';
  sessionId: string;
  /** null for a clean close, from either side */
  reason: CloseReasonKind | null;
  message?: string;
  stats: SessionStats;
}

export interface RekeyEvent {
  type: 'rekey';
  sessionId: string;
  role: 'initiator' | 'responder';
  keyId: string;
}

export interface RelayConnectEvent {
  type: 'relay_connect';
  sessionId: string;
  /** host:port as requested by the peer */
  target: string;
  ok: boolean;
  /** SOCKS5 reply code sent back */
  reply: number;
  message?: string;
}

export type LifecycleEvent =
  | SessionOpenedEvent
  | SessionClosedEvent
  | RekeyEvent
  | RelayConnectEvent;

export type LifecycleSink = (event: LifecycleEvent) => void;

/** Sink that drops everything. */
export const noopSink: LifecycleSink = () => {};

/**
 * Default sink: log each event as `[event] {json}`.
 *
 * Failed closes and failed relay attempts are logged at warn, rekeys at debug,
 * the rest at info.
 */
export function createLifecycleLog(logger: Logger = createLogger('event')): LifecycleSink {
  return (event) => {
    const line = `[event] ${JSON.stringify({ timestamp: new Date().toISOString(), ...event })}`;
    if (event.type === 'rekey') {
      logger.debug(line);
    } else if (
      (event.type === 'session_closed' && event.reason !== null) ||
      (event.type === 'relay_connect' && !event.ok)
    ) {
      logger.warn(line);
    } else {
      logger.info(line);
    }
  };
}
