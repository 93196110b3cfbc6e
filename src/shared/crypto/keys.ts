/**
 * Shared-key generation and storage.
 *
 * The key file holds exactly KEY_LENGTH raw bytes. It is written owner-only
 * (0600) inside an owner-only directory (0700) and is never logged; only its
 * fingerprint is shown.
 */

import crypto from 'node:crypto';
import fs from 'node:fs';
import path from 'node:path';

import { ConfigurationError } from '../errors.js';
import { KEY_LENGTH } from './engine.js';

/**
 * Generate a fresh random shared key.
 */
export function generateSharedKey(): Buffer {
  return crypto.randomBytes(KEY_LENGTH);
}

/**
 * Save a key to disk with owner-only permissions.
 */
export function saveSharedKey(key: Buffer, filePath: string): void {
  if (key.length !== KEY_LENGTH) {
    throw new ConfigurationError(`Invalid key size: expected ${KEY_LENGTH} bytes, got ${key.length}`);
  }
  fs.mkdirSync(path.dirname(filePath), { recursive: true, mode: 0o700 });
  fs.writeFileSync(filePath, key, { mode: 0o600 });
}

/**
 * Load the shared key, failing fast on a missing file or a wrong length.
 */
export function loadSharedKey(filePath: string): Buffer {
  if (!fs.existsSync(filePath)) {
    throw new ConfigurationError(
      `Key file not found: ${filePath}\nGenerate one with: cipherlink-keygen --output ${filePath}`,
    );
  }

  const key = fs.readFileSync(filePath);
  if (key.length !== KEY_LENGTH) {
    throw new ConfigurationError(
      `Invalid key file ${filePath}: expected ${KEY_LENGTH} bytes, got ${key.length}`,
    );
  }
  return key;
}

/**
 * Compute a fingerprint of a key for display/verification.
 * Returns a hex string like "a3:f2:1b:..."
 */
export function fingerprint(key: Buffer): string {
  const hash = crypto.createHash('sha256').update(key).digest();
  // Show first 16 bytes as colon-separated hex
  return Array.from(hash.subarray(0, 16))
    .map((b) => b.toString(16).padStart(2, '0'))
    .join(':');
}
