/**
 * Per-session key state for rekeying.
 *
 *   current   encrypts every outgoing frame; tried first on decrypt
 *   previous  the key that was current before the last switch; decrypts
 *             frames still in flight until the grace window ends or the peer
 *             confirms the switch
 *   pending   a candidate this side proposed and the peer has not yet acked
 *
 * All transitions are synchronous, so a switch can never interleave with an
 * encrypt or decrypt on the same session.
 */

import crypto from 'node:crypto';

import { CryptoEngine, generateSharedKey } from '../shared/crypto/index.js';
import { AuthenticationError } from '../shared/errors.js';
import { KEY_ID_LENGTH } from '../shared/protocol/index.js';

export interface KeyProposal {
  keyId: Buffer;
  key: Buffer;
}

export interface KeyRingOptions {
  /** How long the previous key keeps decrypting after a switch (ms) */
  graceMs: number;
  /** Clock, injectable for tests */
  now?: () => number;
}

interface RetiringKey {
  engine: CryptoEngine;
  expiresAt: number;
}

interface PendingKey {
  keyId: Buffer;
  engine: CryptoEngine;
}

export class KeyRing {
  private current: CryptoEngine;
  private previous: RetiringKey | null = null;
  private pending: PendingKey | null = null;
  private readonly graceMs: number;
  private readonly now: () => number;

  constructor(initialKey: Buffer | CryptoEngine, options: KeyRingOptions) {
    this.current = initialKey instanceof CryptoEngine ? initialKey : new CryptoEngine(initialKey);
    this.graceMs = options.graceMs;
    this.now = options.now ?? Date.now;
  }

  get nonceLength(): number {
    return this.current.nonceLength;
  }

  /** Key id of the proposal awaiting acknowledgment, if any. */
  get pendingKeyId(): Buffer | null {
    return this.pending?.keyId ?? null;
  }

  /** Whether a previous key is still usable for decryption. */
  get hasPrevious(): boolean {
    return this.livePrevious() !== null;
  }

  encrypt(plaintext: Buffer): Buffer {
    return this.current.encrypt(plaintext);
  }

  /**
   * Decrypt with the current key, falling back to the previous key while it
   * is inside its grace window.
   */
  decrypt(ciphertext: Buffer): Buffer {
    try {
      return this.current.decrypt(ciphertext);
    } catch (err) {
      const previous = this.livePrevious();
      if (!previous || !(err instanceof AuthenticationError)) throw err;
      return previous.engine.decrypt(ciphertext);
    }
  }

  /**
   * Generate a candidate key to offer the peer. The current key stays in use
   * until `confirm()`.
   */
  propose(): KeyProposal {
    if (this.pending) {
      throw new Error('A rekey is already pending');
    }
    const keyId = crypto.randomBytes(KEY_ID_LENGTH);
    const key = generateSharedKey();
    this.pending = { keyId, engine: new CryptoEngine(key) };
    return { keyId, key };
  }

  /** Drop our own unacknowledged proposal. */
  abandon(): void {
    this.pending = null;
  }

  /**
   * Responder side: adopt the peer's proposed key. The old key moves to
   * `previous` for the grace window.
   */
  accept(key: Buffer): void {
    this.rotate(new CryptoEngine(key));
  }

  /**
   * Initiator side: the peer acknowledged `keyId`; switch to the pending key.
   *
   * @returns false if `keyId` does not match the pending proposal
   */
  confirm(keyId: Buffer): boolean {
    if (!this.pending || !this.pending.keyId.equals(keyId)) {
      return false;
    }
    const next = this.pending.engine;
    this.pending = null;
    this.rotate(next);
    return true;
  }

  /** Discard the previous key (the peer confirmed the switch). */
  retire(): void {
    this.previous = null;
  }

  private rotate(next: CryptoEngine): void {
    this.previous = { engine: this.current, expiresAt: this.now() + this.graceMs };
    this.current = next;
  }

  private livePrevious(): RetiringKey | null {
    if (this.previous && this.now() >= this.previous.expiresAt) {
      this.previous = null;
    }
    return this.previous;
  }
}
