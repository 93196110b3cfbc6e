/**
 * Authenticated symmetric encryption over the pre-shared key (AES-256-GCM).
 *
 * Each call to `encrypt` draws a fresh random nonce, so the engine holds no
 * state beyond the key and one instance can be shared by any number of
 * sessions.
 *
 * Wire format: nonce (12) || ciphertext (variable) || authTag (16)
 */

import crypto from 'node:crypto';

import { AuthenticationError, ConfigurationError } from '../errors.js';

export const KEY_LENGTH = 32;
export const NONCE_LENGTH = 12;
export const AUTH_TAG_LENGTH = 16;

const ALGORITHM = 'aes-256-gcm';

export class CryptoEngine {
  readonly nonceLength = NONCE_LENGTH;
  private readonly key: Buffer;

  constructor(key: Buffer) {
    if (key.length !== KEY_LENGTH) {
      throw new ConfigurationError(
        `Invalid key size: expected ${KEY_LENGTH} bytes, got ${key.length}`,
      );
    }
    // Private copy: a caller mutating its buffer must not change our key.
    this.key = Buffer.from(key);
  }

  /** Smallest input `decrypt` will attempt (empty plaintext). */
  get overhead(): number {
    return NONCE_LENGTH + AUTH_TAG_LENGTH;
  }

  /**
   * Encrypt a plaintext under a fresh random nonce.
   *
   * @returns nonce || ciphertext || authTag
   */
  encrypt(plaintext: Buffer): Buffer {
    const nonce = crypto.randomBytes(NONCE_LENGTH);
    const cipher = crypto.createCipheriv(ALGORITHM, this.key, nonce);
    const encrypted = Buffer.concat([cipher.update(plaintext), cipher.final()]);
    return Buffer.concat([nonce, encrypted, cipher.getAuthTag()]);
  }

  /**
   * Verify and decrypt a packed ciphertext.
   *
   * @throws AuthenticationError if the input is truncated, tampered with, or
   *         was encrypted under a different key
   */
  decrypt(packed: Buffer): Buffer {
    if (packed.length < NONCE_LENGTH + AUTH_TAG_LENGTH) {
      throw new AuthenticationError(
        `Ciphertext too short: ${packed.length} bytes, need at least ${NONCE_LENGTH + AUTH_TAG_LENGTH}`,
      );
    }

    const nonce = packed.subarray(0, NONCE_LENGTH);
    const ciphertext = packed.subarray(NONCE_LENGTH, packed.length - AUTH_TAG_LENGTH);
    const authTag = packed.subarray(packed.length - AUTH_TAG_LENGTH);

    const decipher = crypto.createDecipheriv(ALGORITHM, this.key, nonce);
    decipher.setAuthTag(authTag);

    try {
      return Buffer.concat([decipher.update(ciphertext), decipher.final()]);
    } catch (err) {
      throw new AuthenticationError(
        'Decryption failed: authentication tag mismatch (tampered or wrong key)',
        { cause: err },
      );
    }
  }
}
