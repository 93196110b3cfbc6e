/**
 * SOCKS5 wire helpers (RFC 1928 subset: no-auth, CONNECT).
 *
 *   greeting  VER | NMETHODS | METHODS...
 *   choice    VER | METHOD
 *   request   VER | CMD | RSV | ATYP | DST.ADDR | DST.PORT
 *   reply     VER | REP | RSV | ATYP | BND.ADDR | BND.PORT
 */

import net from 'node:net';

import { ProtocolError, RelayConnectError, TimeoutError } from '../shared/errors.js';

export const SOCKS_VERSION = 0x05;

export const AUTH_METHODS = {
  noAuth: 0x00,
  noAcceptable: 0xff,
} as const;

export const COMMANDS = {
  connect: 0x01,
} as const;

export const ADDRESS_TYPES = {
  ipv4: 0x01,
  domain: 0x03,
  ipv6: 0x04,
} as const;

export const REPLY_CODES = {
  succeeded: 0x00,
  generalFailure: 0x01,
  notAllowed: 0x02,
  networkUnreachable: 0x03,
  hostUnreachable: 0x04,
  connectionRefused: 0x05,
  ttlExpired: 0x06,
  commandNotSupported: 0x07,
  addressTypeNotSupported: 0x08,
} as const;

export type AddressType = keyof typeof ADDRESS_TYPES;

export interface SocksTarget {
  addressType: AddressType;
  host: string;
  port: number;
}

export interface BoundAddress {
  address: string;
  port: number;
}

/** `host:port`, with IPv6 hosts in brackets. */
export function formatTarget(target: Pick<SocksTarget, 'host' | 'port'>): string {
  return net.isIPv6(target.host) ? `[${target.host}]:${target.port}` : `${target.host}:${target.port}`;
}

// ── IPv6 text ↔ bytes ─────────────────────────────────────────────────────

/**
 * Parse an IPv6 address (with `::` compression and an optional dotted IPv4
 * tail) into 16 bytes.
 */
export function ipv6ToBytes(address: string): Buffer {
  const zone = address.indexOf('%');
  const text = zone === -1 ? address : address.slice(0, zone);
  if (!net.isIPv6(text)) {
    throw new ProtocolError(`Invalid IPv6 address: ${address}`);
  }

  const toGroups = (part: string): number[] => {
    if (part === '') return [];
    const groups: number[] = [];
    for (const piece of part.split(':')) {
      if (piece.includes('.')) {
        const [a, b, c, d] = piece.split('.').map(Number);
        groups.push((a << 8) | b, (c << 8) | d);
      } else {
        groups.push(parseInt(piece, 16));
      }
    }
    return groups;
  };

  const [head, tail] = text.split('::');
  const headGroups = toGroups(head);
  const tailGroups = tail === undefined ? [] : toGroups(tail);
  const fill = new Array<number>(8 - headGroups.length - tailGroups.length).fill(0);
  const groups = [...headGroups, ...fill, ...tailGroups];

  const buf = Buffer.alloc(16);
  groups.forEach((group, i) => buf.writeUInt16BE(group, i * 2));
  return buf;
}

/** Uncompressed textual form (`0:0:0:0:0:0:0:1`). */
export function bytesToIpv6(bytes: Buffer): string {
  const groups: string[] = [];
  for (let i = 0; i < 16; i += 2) {
    groups.push(bytes.readUInt16BE(i).toString(16));
  }
  return groups.join(':');
}

// ── Encoding ──────────────────────────────────────────────────────────────

/** ATYP + address bytes for `host`. */
export function encodeAddress(host: string): Buffer {
  if (net.isIPv4(host)) {
    return Buffer.from([ADDRESS_TYPES.ipv4, ...host.split('.').map(Number)]);
  }
  if (net.isIPv6(host)) {
    return Buffer.concat([Buffer.from([ADDRESS_TYPES.ipv6]), ipv6ToBytes(host)]);
  }
  const name = Buffer.from(host, 'utf-8');
  if (name.length > 255) {
    throw new ProtocolError(`Domain name too long: ${name.length} bytes`);
  }
  return Buffer.concat([Buffer.from([ADDRESS_TYPES.domain, name.length]), name]);
}

function encodePort(port: number): Buffer {
  const buf = Buffer.alloc(2);
  buf.writeUInt16BE(port, 0);
  return buf;
}

export function encodeGreeting(methods: number[] = [AUTH_METHODS.noAuth]): Buffer {
  return Buffer.from([SOCKS_VERSION, methods.length, ...methods]);
}

export function encodeMethodChoice(method: number): Buffer {
  return Buffer.from([SOCKS_VERSION, method]);
}

export function encodeRequest(
  host: string,
  port: number,
  command: number = COMMANDS.connect,
): Buffer {
  return Buffer.concat([
    Buffer.from([SOCKS_VERSION, command, 0x00]),
    encodeAddress(host),
    encodePort(port),
  ]);
}

/** A reply; failure replies carry the all-zero IPv4 address. */
export function encodeReply(
  code: number,
  bound: BoundAddress = { address: '0.0.0.0', port: 0 },
): Buffer {
  return Buffer.concat([
    Buffer.from([SOCKS_VERSION, code, 0x00]),
    encodeAddress(bound.address),
    encodePort(bound.port),
  ]);
}

// ── Errors → reply codes ──────────────────────────────────────────────────

const ERRNO_REPLIES: Record<string, number> = {
  ENETUNREACH: REPLY_CODES.networkUnreachable,
  EHOSTUNREACH: REPLY_CODES.hostUnreachable,
  ENOTFOUND: REPLY_CODES.hostUnreachable,
  EAI_AGAIN: REPLY_CODES.hostUnreachable,
  ETIMEDOUT: REPLY_CODES.hostUnreachable,
  ECONNREFUSED: REPLY_CODES.connectionRefused,
};

function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

/** SOCKS5 reply code for a failed upstream connect. */
export function replyCodeFor(err: unknown): number {
  if (err instanceof RelayConnectError) return err.replyCode;
  if (err instanceof TimeoutError) return REPLY_CODES.hostUnreachable;
  const code = errnoCode(err);
  return (code !== undefined ? ERRNO_REPLIES[code] : undefined) ?? REPLY_CODES.generalFailure;
}
