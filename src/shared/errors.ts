/**
 * Error taxonomy for the tunnel.
 *
 * Every failure the core raises is a `TunnelError` with a stable `kind`, so
 * lifecycle events and logs can report *what* went wrong without matching on
 * message text.
 *
 *   framing          malformed header, length mismatch, oversized frame
 *   authentication   integrity tag did not verify (tampering or wrong key)
 *   incomplete_frame peer closed the transport in the middle of a frame
 *   disconnected     transport closed on a frame boundary without an `end` record
 *   timeout          keepalive expiry, unacknowledged rekey, slow connect
 *   relay_connect    upstream unreachable (local to one relay attempt)
 *   configuration    bad key length, missing key file, invalid config
 *   session_closed   operation on a session that is closing or closed
 *   protocol         SOCKS5 violation that cannot be answered in-band
 */

export type TunnelErrorKind =
  | 'framing'
  | 'authentication'
  | 'incomplete_frame'
  | 'disconnected'
  | 'timeout'
  | 'relay_connect'
  | 'configuration'
  | 'session_closed'
  | 'protocol';

/** Kinds reported for a session close; `transport` covers raw socket errors. */
export type CloseReasonKind = TunnelErrorKind | 'transport';

export abstract class TunnelError extends Error {
  abstract readonly kind: TunnelErrorKind;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class FramingError extends TunnelError {
  readonly kind = 'framing' as const;
}

export class AuthenticationError extends TunnelError {
  readonly kind = 'authentication' as const;
}

export class IncompleteFrameError extends TunnelError {
  readonly kind = 'incomplete_frame' as const;

  constructor(
    readonly expected: number,
    readonly received: number,
  ) {
    super(`Connection closed mid-frame: expected ${expected} bytes, got ${received}`);
  }
}

export class DisconnectedError extends TunnelError {
  readonly kind = 'disconnected' as const;

  constructor(message = 'Peer closed the connection without ending its stream') {
    super(message);
  }
}

export class TimeoutError extends TunnelError {
  readonly kind = 'timeout' as const;
}

export class RelayConnectError extends TunnelError {
  readonly kind = 'relay_connect' as const;

  constructor(
    message: string,
    /** SOCKS5 reply code sent back to the peer */
    readonly replyCode: number,
    options?: ErrorOptions,
  ) {
    super(message, options);
  }
}

export class ConfigurationError extends TunnelError {
  readonly kind = 'configuration' as const;
}

export class SessionClosedError extends TunnelError {
  readonly kind = 'session_closed' as const;

  constructor(message = 'Session is closed') {
    super(message);
  }
}

export class ProtocolError extends TunnelError {
  readonly kind = 'protocol' as const;
}

/** Map any thrown value to the kind reported in lifecycle events. */
export function errorKind(err: unknown): CloseReasonKind {
  return err instanceof TunnelError ? err.kind : 'transport';
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
