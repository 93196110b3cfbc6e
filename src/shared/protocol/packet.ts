/**
 * Binary framing for encrypted packets.
 *
 *   ┌─────────┬──────────────┬─────────────┬────────────────────────────┐
 *   │ version │ nonce_length │ data_length │ ciphertext                 │
 *   │  u8     │  u32 BE      │  u32 BE     │ nonce || payload || tag    │
 *   └─────────┴──────────────┴─────────────┴────────────────────────────┘
 *
 * `nonce_length` covers the nonce at the front of the ciphertext and
 * `data_length` the rest, so the codec works with any nonce size. Both fields
 * must equal the bytes actually present: a mismatch is a framing error, never
 * padded or truncated.
 */

import { FramingError } from '../errors.js';

export const PROTOCOL_VERSION = 1;
export const HEADER_LENGTH = 9;
/** Upper bound on nonce_length + data_length accepted by default (1 MiB). */
export const DEFAULT_MAX_FRAME_SIZE = 1024 * 1024;

const MAX_U32 = 0xffff_ffff;

export interface PacketHeader {
  version: number;
  nonceLength: number;
  dataLength: number;
}

export interface UnpackedPacket {
  version: number;
  nonceLength: number;
  /** nonce || payload || tag */
  ciphertext: Buffer;
}

export interface HeaderCheck {
  /** Reject any other version */
  expectedVersion?: number;
  /** Reject bodies (nonce + data) larger than this */
  maxFrameSize?: number;
}

/** Total body length a header announces. */
export function bodyLength(header: PacketHeader): number {
  return header.nonceLength + header.dataLength;
}

export function encodeHeader(header: PacketHeader): Buffer {
  const { version, nonceLength, dataLength } = header;
  if (!Number.isInteger(version) || version < 0 || version > 0xff) {
    throw new FramingError(`Invalid protocol version: ${version}`);
  }
  if (!Number.isInteger(nonceLength) || nonceLength < 0 || nonceLength > MAX_U32) {
    throw new FramingError(`Invalid nonce length: ${nonceLength}`);
  }
  if (!Number.isInteger(dataLength) || dataLength < 0 || dataLength > MAX_U32) {
    throw new FramingError(`Invalid data length: ${dataLength}`);
  }

  const buf = Buffer.alloc(HEADER_LENGTH);
  buf.writeUInt8(version, 0);
  buf.writeUInt32BE(nonceLength, 1);
  buf.writeUInt32BE(dataLength, 5);
  return buf;
}

/**
 * Decode the fixed-size header on its own (streaming receive reads the header
 * before it knows how much body to wait for).
 */
export function parseHeader(header: Buffer, check: HeaderCheck = {}): PacketHeader {
  if (header.length !== HEADER_LENGTH) {
    throw new FramingError(`Header must be ${HEADER_LENGTH} bytes, got ${header.length}`);
  }

  const parsed: PacketHeader = {
    version: header.readUInt8(0),
    nonceLength: header.readUInt32BE(1),
    dataLength: header.readUInt32BE(5),
  };

  if (check.expectedVersion !== undefined && parsed.version !== check.expectedVersion) {
    throw new FramingError(
      `Unsupported protocol version: expected ${check.expectedVersion}, got ${parsed.version}`,
    );
  }
  if (check.maxFrameSize !== undefined && bodyLength(parsed) > check.maxFrameSize) {
    throw new FramingError(
      `Frame too large: ${bodyLength(parsed)} bytes exceeds limit of ${check.maxFrameSize}`,
    );
  }
  return parsed;
}

/**
 * Frame a ciphertext.
 *
 * @param nonceLength - Length of the nonce prefix inside `ciphertext`
 */
export function pack(version: number, ciphertext: Buffer, nonceLength: number): Buffer {
  if (nonceLength > ciphertext.length) {
    throw new FramingError(
      `Nonce length ${nonceLength} exceeds ciphertext length ${ciphertext.length}`,
    );
  }
  const header = encodeHeader({
    version,
    nonceLength,
    dataLength: ciphertext.length - nonceLength,
  });
  return Buffer.concat([header, ciphertext]);
}

/**
 * Parse one complete packet.
 *
 * @throws FramingError if the buffer is shorter than the header or its length
 *         fields disagree with the bytes present
 */
export function unpack(buffer: Buffer): UnpackedPacket {
  if (buffer.length < HEADER_LENGTH) {
    throw new FramingError(
      `Packet too short: ${buffer.length} bytes, header alone is ${HEADER_LENGTH}`,
    );
  }

  const header = parseHeader(buffer.subarray(0, HEADER_LENGTH));
  const body = buffer.subarray(HEADER_LENGTH);

  if (bodyLength(header) !== body.length) {
    throw new FramingError(
      `Length mismatch: header declares ${bodyLength(header)} bytes, packet carries ${body.length}`,
    );
  }

  return { version: header.version, nonceLength: header.nonceLength, ciphertext: body };
}
