/**
 * Records: the plaintext carried inside one encrypted packet.
 *
 * The empty plaintext is the keepalive probe. Anything else starts with a
 * one-byte record type:
 *
 *   0x01 data         application bytes
 *   0x02 end          sender will send no more data (half-close)
 *   0x10 rekey        keyId (8) || new key (32), sent under the current key
 *   0x11 rekey_ack    keyId (8), sent under the old key by the responder
 *   0x12 rekey_done   keyId (8), sent under the new key by the initiator
 */

import { FramingError } from '../errors.js';
import { KEY_LENGTH } from '../crypto/index.js';

export const KEY_ID_LENGTH = 8;

export const RECORD_TYPES = {
  data: 0x01,
  end: 0x02,
  rekey: 0x10,
  rekey_ack: 0x11,
  rekey_done: 0x12,
} as const;

// ── Record types ───────────────────────────────────────────────────────────

export interface ProbeRecord {
  type: 'probe';
}

export interface DataRecord {
  type: 'data';
  payload: Buffer;
}

export interface EndRecord {
  type: 'end';
}

export interface RekeyRecord {
  type: 'rekey';
  /** Random identifier of the proposed key */
  keyId: Buffer;
  /** The proposed key itself */
  key: Buffer;
}

export interface RekeyAckRecord {
  type: 'rekey_ack';
  keyId: Buffer;
}

export interface RekeyDoneRecord {
  type: 'rekey_done';
  keyId: Buffer;
}

export type TunnelRecord =
  | ProbeRecord
  | DataRecord
  | EndRecord
  | RekeyRecord
  | RekeyAckRecord
  | RekeyDoneRecord;

// ── Encoding ───────────────────────────────────────────────────────────────

function withType(type: number, ...parts: Buffer[]): Buffer {
  return Buffer.concat([Buffer.from([type]), ...parts]);
}

function checkKeyId(keyId: Buffer): void {
  if (keyId.length !== KEY_ID_LENGTH) {
    throw new FramingError(`Key id must be ${KEY_ID_LENGTH} bytes, got ${keyId.length}`);
  }
}

export function encodeRecord(record: TunnelRecord): Buffer {
  switch (record.type) {
    case 'probe':
      return Buffer.alloc(0);
    case 'data':
      return withType(RECORD_TYPES.data, record.payload);
    case 'end':
      return withType(RECORD_TYPES.end);
    case 'rekey':
      checkKeyId(record.keyId);
      if (record.key.length !== KEY_LENGTH) {
        throw new FramingError(`Rekey key must be ${KEY_LENGTH} bytes, got ${record.key.length}`);
      }
      return withType(RECORD_TYPES.rekey, record.keyId, record.key);
    case 'rekey_ack':
      checkKeyId(record.keyId);
      return withType(RECORD_TYPES.rekey_ack, record.keyId);
    case 'rekey_done':
      checkKeyId(record.keyId);
      return withType(RECORD_TYPES.rekey_done, record.keyId);
  }
}

// ── Decoding ───────────────────────────────────────────────────────────────

function expectBody(name: string, body: Buffer, length: number): void {
  if (body.length !== length) {
    throw new FramingError(`Malformed ${name} record: expected ${length} bytes, got ${body.length}`);
  }
}

/**
 * Parse a decrypted plaintext into a record.
 *
 * @throws FramingError on an unknown record type or a malformed body
 */
export function decodeRecord(plaintext: Buffer): TunnelRecord {
  if (plaintext.length === 0) {
    return { type: 'probe' };
  }

  const type = plaintext[0];
  const body = plaintext.subarray(1);

  switch (type) {
    case RECORD_TYPES.data:
      return { type: 'data', payload: body };
    case RECORD_TYPES.end:
      expectBody('end', body, 0);
      return { type: 'end' };
    case RECORD_TYPES.rekey:
      expectBody('rekey', body, KEY_ID_LENGTH + KEY_LENGTH);
      return {
        type: 'rekey',
        keyId: Buffer.from(body.subarray(0, KEY_ID_LENGTH)),
        key: Buffer.from(body.subarray(KEY_ID_LENGTH)),
      };
    case RECORD_TYPES.rekey_ack:
      expectBody('rekey_ack', body, KEY_ID_LENGTH);
      return { type: 'rekey_ack', keyId: Buffer.from(body) };
    case RECORD_TYPES.rekey_done:
      expectBody('rekey_done', body, KEY_ID_LENGTH);
      return { type: 'rekey_done', keyId: Buffer.from(body) };
    default:
      throw new FramingError(`Unknown record type: 0x${type.toString(16).padStart(2, '0')}`);
  }
}
