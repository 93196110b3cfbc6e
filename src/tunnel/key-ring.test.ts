import { describe, it, expect } from 'vitest';
import crypto from 'node:crypto';

import { KeyRing } from './key-ring.js';
import { AuthenticationError } from '../shared/errors.js';

function createPair(graceMs = 1000) {
  let clock = 0;
  const key = crypto.randomBytes(32);
  const now = () => clock;
  return {
    initiator: new KeyRing(key, { graceMs, now }),
    responder: new KeyRing(key, { graceMs, now }),
    advance: (ms: number) => {
      clock += ms;
    },
  };
}

describe('KeyRing', () => {
  it('should decrypt what the peer ring encrypts under the shared key', () => {
    const { initiator, responder } = createPair();
    expect(responder.decrypt(initiator.encrypt(Buffer.from('hi'))).toString()).toBe('hi');
  });

  it('should keep encrypting under the current key while a proposal is pending', () => {
    const { initiator, responder } = createPair();
    initiator.propose();

    expect(initiator.pendingKeyId).not.toBeNull();
    expect(responder.decrypt(initiator.encrypt(Buffer.from('still old'))).toString()).toBe(
      'still old',
    );
  });

  it('should refuse a second proposal while one is pending', () => {
    const { initiator } = createPair();
    initiator.propose();
    expect(() => initiator.propose()).toThrow('A rekey is already pending');
  });

  it('should switch both sides to the new key through accept and confirm', () => {
    const { initiator, responder } = createPair();
    const proposal = initiator.propose();

    // Frame sent by the initiator before it learns of the ack (old key)
    const inFlight = initiator.encrypt(Buffer.from('before'));

    responder.accept(proposal.key);
    expect(responder.hasPrevious).toBe(true);
    expect(responder.decrypt(inFlight).toString()).toBe('before');

    expect(initiator.confirm(proposal.keyId)).toBe(true);
    expect(initiator.pendingKeyId).toBeNull();

    // Both directions under the new key
    expect(responder.decrypt(initiator.encrypt(Buffer.from('after'))).toString()).toBe('after');
    expect(initiator.decrypt(responder.encrypt(Buffer.from('reply'))).toString()).toBe('reply');
  });

  it('should ignore an acknowledgment for a different key id', () => {
    const { initiator } = createPair();
    initiator.propose();
    expect(initiator.confirm(crypto.randomBytes(8))).toBe(false);
    expect(initiator.pendingKeyId).not.toBeNull();
  });

  it('should stop decrypting with the previous key after the grace window', () => {
    const { initiator, responder, advance } = createPair(500);
    const proposal = initiator.propose();
    const late = initiator.encrypt(Buffer.from('late'));

    responder.accept(proposal.key);
    advance(500);

    expect(responder.hasPrevious).toBe(false);
    expect(() => responder.decrypt(late)).toThrow(AuthenticationError);
  });

  it('should stop decrypting with the previous key once retired', () => {
    const { initiator, responder } = createPair();
    const proposal = initiator.propose();
    const old = initiator.encrypt(Buffer.from('old'));

    responder.accept(proposal.key);
    responder.retire();

    expect(() => responder.decrypt(old)).toThrow(AuthenticationError);
  });

  it('should let abandon clear the pending proposal', () => {
    const { initiator } = createPair();
    initiator.propose();
    initiator.abandon();
    expect(initiator.pendingKeyId).toBeNull();
    expect(() => initiator.propose()).not.toThrow();
  });
});
