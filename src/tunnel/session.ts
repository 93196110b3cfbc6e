/**
 * TunnelSession: one encrypted, framed connection over a duplex byte stream.
 *
 * Lifecycle:
 *   connecting → active → closing → closed
 *
 * ('handshaking' is reserved; possession of the shared key is the only
 * authentication, so a session is active as soon as its transport is.)
 *
 * A single read loop owns the transport's readable side. It reads exactly one
 * header, then exactly one body, decrypts with the key ring and dispatches
 * the record. Data records wait in a FIFO inbox for `receive()`; control
 * records (probe, end, rekey) are consumed here. Any framing, authentication
 * or truncation failure closes the session with that error.
 *
 * The transport reaching EOF (or closing) ends the session: cleanly if the
 * peer sent its `end` record first, with DisconnectedError otherwise. Data
 * received before that stays readable through `receive()`.
 *
 * Writes are synchronous up to the transport's `write()` call: each frame is
 * sealed under whichever key is current at that instant, so a key switch can
 * never split a frame.
 */

import crypto from 'node:crypto';
import { EventEmitter, once } from 'node:events';
import type { Duplex } from 'node:stream';

import { resolveSessionConfig, type SessionConfig } from '../shared/config.js';
import type { CryptoEngine } from '../shared/crypto/index.js';
import { AUTH_TAG_LENGTH } from '../shared/crypto/index.js';
import {
  DisconnectedError,
  FramingError,
  ProtocolError,
  SessionClosedError,
  TimeoutError,
  errorKind,
  toError,
} from '../shared/errors.js';
import { noopSink, type LifecycleSink, type SessionStats } from '../shared/lifecycle.js';
import { createLogger } from '../shared/logger.js';
import {
  HEADER_LENGTH,
  PROTOCOL_VERSION,
  decodeRecord,
  encodeRecord,
  pack,
  parseHeader,
  type RekeyAckRecord,
  type RekeyDoneRecord,
  type RekeyRecord,
  type TunnelRecord,
} from '../shared/protocol/index.js';
import { FrameReader } from './frame-reader.js';
import { KeyRing } from './key-ring.js';

const log = createLogger('session');

export type SessionState = 'connecting' | 'handshaking' | 'active' | 'closing' | 'closed';

/** Inbox size (bytes) above which the transport is paused. */
export const DEFAULT_HIGH_WATER_MARK = 1024 * 1024;

/** How long a clean close waits for queued writes before destroying the transport. */
const FLUSH_TIMEOUT_MS = 5_000;

export interface TunnelSessionOptions extends Partial<SessionConfig> {
  /** Shared key (or an engine built from it) */
  key: Buffer | CryptoEngine;
  /** Identifier used in logs and lifecycle events (random by default) */
  id?: string;
  /** Remote address, for the session_opened event */
  peer?: string;
  /** Receives lifecycle events */
  sink?: LifecycleSink;
  /** Inbox size at which the transport is paused */
  highWaterMark?: number;
  /** Clock, injectable for tests */
  now?: () => number;
}

export interface RekeyInfo {
  role: 'initiator' | 'responder';
  keyId: string;
}

interface Receiver {
  resolve: (data: Buffer | null) => void;
  reject: (err: Error) => void;
}

interface PendingRekey {
  keyId: Buffer;
  promise: Promise<void>;
  resolve: () => void;
  reject: (err: Error) => void;
  timer: NodeJS.Timeout;
}

export class TunnelSession extends EventEmitter {
  readonly id: string;

  private currentState: SessionState = 'connecting';
  private readonly config: SessionConfig;
  private readonly keys: KeyRing;
  private readonly reader: FrameReader;
  private readonly sink: LifecycleSink;
  private readonly now: () => number;
  private readonly highWaterMark: number;
  /** Largest data payload that fits one frame under maxFrameSize. */
  private readonly maxPayload: number;

  private inbox: Buffer[] = [];
  private inboxBytes = 0;
  private receivers: Receiver[] = [];
  private peerEnded = false;
  private writeEnded = false;
  private readPaused = false;

  private lastReceivedAt: number;
  private lastSentAt: number;
  private lastProbeAt = 0;
  private bytesSinceRekey = 0;
  private pendingRekey: PendingRekey | null = null;

  private keepaliveTimer: NodeJS.Timeout | null = null;
  private rekeyTimer: NodeJS.Timeout | null = null;
  private readonly closing = new AbortController();
  private closeReason: Error | null = null;
  private closed: Promise<void> | null = null;

  private readonly counters: SessionStats = {
    framesSent: 0,
    framesReceived: 0,
    bytesSent: 0,
    bytesReceived: 0,
    rekeys: 0,
  };

  constructor(
    private readonly transport: Duplex,
    options: TunnelSessionOptions,
  ) {
    super();
    const { key, id, peer, sink, highWaterMark, now, ...session } = options;

    this.id = id ?? crypto.randomBytes(6).toString('hex');
    this.config = resolveSessionConfig(session);
    this.now = now ?? Date.now;
    this.sink = sink ?? noopSink;
    this.highWaterMark = highWaterMark ?? DEFAULT_HIGH_WATER_MARK;
    this.keys = new KeyRing(key, { graceMs: this.config.rekeyGraceMs, now: this.now });
    // 1 byte of record type inside nonce || ciphertext || tag
    this.maxPayload = this.config.maxFrameSize - this.keys.nonceLength - AUTH_TAG_LENGTH - 1;

    this.lastReceivedAt = this.now();
    this.lastSentAt = this.lastReceivedAt;

    // The reader treats 'close' like 'end', so the read loop sees every
    // transport shutdown once the frames buffered before it are dispatched.
    this.reader = new FrameReader(transport);
    transport.on('close', () => {
      // Nothing more can be written; wake any send waiting for 'drain'.
      this.closing.abort();
    });

    this.currentState = 'active';
    this.startTimers();
    this.readLoop().catch((err: unknown) => {
      log.error(`[${this.id}] read loop failed:`, err);
    });

    log.debug(`[${this.id}] opened${peer ? ` (peer ${peer})` : ''}`);
    this.sink({ type: 'session_opened', sessionId: this.id, peer });
  }

  get state(): SessionState {
    return this.currentState;
  }

  /** Frame and byte counters; bytes are counted on the wire, headers included. */
  stats(): SessionStats {
    return { ...this.counters };
  }

  // ── Sending ──────────────────────────────────────────────────────────────

  /**
   * Encrypt and send `data`. Payloads larger than one frame are split; every
   * frame is handed to the transport before this returns, and the returned
   * promise waits for the transport to drain under backpressure.
   *
   * @throws SessionClosedError if the session is not active or the write side
   *         has been ended
   */
  async send(data: Buffer): Promise<void> {
    this.assertWritable();
    if (data.length === 0) return;

    let flushed = true;
    for (let offset = 0; offset < data.length; offset += this.maxPayload) {
      flushed = this.writeRecord({
        type: 'data',
        payload: data.subarray(offset, offset + this.maxPayload),
      });
    }

    this.bytesSinceRekey += data.length;
    if (
      this.config.rekeyAfterBytes !== undefined &&
      this.bytesSinceRekey >= this.config.rekeyAfterBytes
    ) {
      this.bytesSinceRekey = 0;
      this.autoRekey();
    }

    if (!flushed) {
      await this.waitForDrain();
    }
  }

  /** Half-close: tell the peer no more data follows. Receiving continues. */
  async endWrite(): Promise<void> {
    if (this.writeEnded) return;
    this.assertWritable();
    this.writeEnded = true;
    if (!this.writeRecord({ type: 'end' })) {
      await this.waitForDrain();
    }
  }

  // ── Receiving ────────────────────────────────────────────────────────────

  /**
   * Next chunk of application data, in order. Resolves `null` once the peer
   * has sent its `end` record and everything before it has been delivered.
   *
   * Data already received is still handed out after a clean close or a
   * disconnect; after that, and after any other failure, this rejects.
   *
   * @throws the close reason (or SessionClosedError) once the session is closing
   */
  receive(): Promise<Buffer | null> {
    const next = this.inbox.shift();
    if (next) {
      this.inboxBytes -= next.length;
      this.resumeIfDrained();
      return Promise.resolve(next);
    }

    const endedCleanly = this.peerEnded && this.closeReason === null;
    if (this.currentState !== 'active' && !endedCleanly) {
      return Promise.reject(this.closeReason ?? new SessionClosedError());
    }
    if (this.peerEnded) {
      return Promise.resolve(null);
    }
    return new Promise((resolve, reject) => {
      this.receivers.push({ resolve, reject });
    });
  }

  // ── Rekey ────────────────────────────────────────────────────────────────

  /**
   * Replace the session key. Resolves once both sides have switched. A call
   * while a rekey is already in flight joins it.
   */
  rekey(): Promise<void> {
    if (this.currentState !== 'active') {
      return Promise.reject(this.closeReason ?? new SessionClosedError());
    }
    if (this.pendingRekey) {
      return this.pendingRekey.promise;
    }
    if (!this.canWrite()) {
      return Promise.reject(new SessionClosedError('Transport is no longer writable'));
    }

    const { keyId, key } = this.keys.propose();
    let resolve: () => void = () => {};
    let reject: (err: Error) => void = () => {};
    const promise = new Promise<void>((res, rej) => {
      resolve = res;
      reject = rej;
    });

    const timeoutMs = this.config.keepaliveTimeoutMs;
    const timer = setTimeout(() => {
      void this.close(new TimeoutError(`Rekey not acknowledged within ${timeoutMs} ms`));
    }, timeoutMs);
    timer.unref();

    this.pendingRekey = { keyId, promise, resolve, reject, timer };
    this.writeRecord({ type: 'rekey', keyId, key });
    log.debug(`[${this.id}] proposed key ${keyId.toString('hex')}`);
    return promise;
  }

  // ── Closing ──────────────────────────────────────────────────────────────

  /**
   * Close the session. A clean close first sends the `end` record (unless
   * `endWrite()` already did); queued writes flush and the transport is
   * ended, then destroyed. Pending operations reject with `reason`, or with
   * SessionClosedError for a clean close. Idempotent; never rejects.
   */
  close(reason?: Error): Promise<void> {
    if (!this.closed) {
      this.closed = this.shutdown(reason ?? null);
    }
    return this.closed;
  }

  private async shutdown(reason: Error | null): Promise<void> {
    if (reason === null && !this.writeEnded && this.canWrite()) {
      this.writeEnded = true;
      this.writeRecord({ type: 'end' });
    }

    this.currentState = 'closing';
    this.closeReason = reason;
    this.stopTimers();
    this.closing.abort();

    const err = reason ?? new SessionClosedError();
    for (const receiver of this.receivers.splice(0)) {
      receiver.reject(err);
    }
    if (reason !== null && !(reason instanceof DisconnectedError)) {
      this.inbox = [];
      this.inboxBytes = 0;
    }

    const pending = this.pendingRekey;
    if (pending) {
      this.pendingRekey = null;
      clearTimeout(pending.timer);
      pending.reject(err);
    }

    this.reader.fail(new SessionClosedError());
    await this.releaseTransport();

    this.currentState = 'closed';
    if (reason) {
      log.warn(`[${this.id}] closed: ${reason.message}`);
    } else {
      log.debug(`[${this.id}] closed`);
    }
    this.sink({
      type: 'session_closed',
      sessionId: this.id,
      reason: reason ? errorKind(reason) : null,
      message: reason?.message,
      stats: this.stats(),
    });
    this.emit('close', reason);
  }

  private releaseTransport(): Promise<void> {
    const transport = this.transport;
    if (transport.closed) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      const timer = setTimeout(() => transport.destroy(), FLUSH_TIMEOUT_MS);
      transport.once('close', () => {
        clearTimeout(timer);
        resolve();
      });
      if (transport.destroyed || transport.writableEnded) {
        transport.destroy();
      } else {
        transport.end(() => transport.destroy());
      }
    });
  }

  // ── Read loop ────────────────────────────────────────────────────────────

  private async readLoop(): Promise<void> {
    try {
      for (;;) {
        const header = await this.reader.readOrEnd(HEADER_LENGTH);
        if (header === null) {
          this.onTransportEnd();
          return;
        }

        const { nonceLength, dataLength } = parseHeader(header, {
          expectedVersion: PROTOCOL_VERSION,
          maxFrameSize: this.config.maxFrameSize,
        });
        if (nonceLength !== this.keys.nonceLength) {
          throw new FramingError(
            `Unexpected nonce length: expected ${this.keys.nonceLength}, got ${nonceLength}`,
          );
        }

        const body = await this.reader.read(nonceLength + dataLength);
        const plaintext = this.keys.decrypt(body);

        this.lastReceivedAt = this.now();
        this.counters.framesReceived++;
        this.counters.bytesReceived += HEADER_LENGTH + body.length;

        this.dispatch(decodeRecord(plaintext));
      }
    } catch (err) {
      if (this.currentState === 'active') {
        await this.close(toError(err));
      }
    }
  }

  private dispatch(record: TunnelRecord): void {
    switch (record.type) {
      case 'probe':
        return;
      case 'data':
        if (this.peerEnded) {
          throw new ProtocolError('Data record received after end of stream');
        }
        this.deliver(record.payload);
        return;
      case 'end':
        this.markPeerEnded();
        return;
      case 'rekey':
        this.onRekeyRequest(record);
        return;
      case 'rekey_ack':
        this.onRekeyAck(record);
        return;
      case 'rekey_done':
        this.onRekeyDone(record);
        return;
    }
  }

  private deliver(payload: Buffer): void {
    const receiver = this.receivers.shift();
    if (receiver) {
      receiver.resolve(payload);
      return;
    }
    this.inbox.push(payload);
    this.inboxBytes += payload.length;
    if (!this.readPaused && this.inboxBytes >= this.highWaterMark) {
      this.readPaused = true;
      this.transport.pause();
    }
  }

  private resumeIfDrained(): void {
    if (this.currentState !== 'active') return;
    if (this.readPaused && this.inboxBytes < this.highWaterMark) {
      this.readPaused = false;
      // The idle clock restarts: time spent paused is not the peer's silence.
      this.lastReceivedAt = this.now();
      this.transport.resume();
    }
  }

  private markPeerEnded(): void {
    this.peerEnded = true;
    // Receivers only wait while the inbox is empty.
    for (const receiver of this.receivers.splice(0)) {
      receiver.resolve(null);
    }
  }

  private onTransportEnd(): void {
    if (this.currentState !== 'active') return;
    // Only an `end` record marks the end of the peer's stream; a bare EOF
    // may be a truncation.
    void this.close(this.peerEnded ? undefined : new DisconnectedError());
  }

  // ── Rekey handling ───────────────────────────────────────────────────────

  private onRekeyRequest(record: RekeyRecord): void {
    const mine = this.pendingRekey;
    if (mine) {
      if (Buffer.compare(mine.keyId, record.keyId) > 0) {
        // Our proposal wins; the peer will answer it.
        return;
      }
      this.keys.abandon();
      clearTimeout(mine.timer);
      this.pendingRekey = null;
    }

    // Acknowledge under the old key, then switch.
    this.writeRecord({ type: 'rekey_ack', keyId: record.keyId });
    this.keys.accept(record.key);
    this.completeRekey('responder', record.keyId);
    mine?.resolve();
  }

  private onRekeyAck(record: RekeyAckRecord): void {
    const pending = this.pendingRekey;
    if (!pending || !this.keys.confirm(record.keyId)) {
      throw new ProtocolError(
        `Unexpected rekey acknowledgment for key ${record.keyId.toString('hex')}`,
      );
    }
    clearTimeout(pending.timer);
    this.pendingRekey = null;

    this.writeRecord({ type: 'rekey_done', keyId: record.keyId });
    this.completeRekey('initiator', record.keyId);
    pending.resolve();
  }

  private onRekeyDone(record: RekeyDoneRecord): void {
    log.debug(`[${this.id}] peer switched to key ${record.keyId.toString('hex')}`);
    this.keys.retire();
  }

  private completeRekey(role: RekeyInfo['role'], keyId: Buffer): void {
    this.counters.rekeys++;
    this.bytesSinceRekey = 0;
    const info: RekeyInfo = { role, keyId: keyId.toString('hex') };
    this.sink({ type: 'rekey', sessionId: this.id, ...info });
    this.emit('rekey', info);
  }

  private autoRekey(): void {
    if (this.pendingRekey || this.currentState !== 'active') return;
    this.rekey().catch((err: unknown) => {
      log.debug(`[${this.id}] automatic rekey abandoned: ${toError(err).message}`);
    });
  }

  // ── Timers ───────────────────────────────────────────────────────────────

  private startTimers(): void {
    const tick = Math.max(5, Math.floor(this.config.keepaliveIntervalMs / 2));
    this.keepaliveTimer = setInterval(() => this.checkLiveness(), tick);
    this.keepaliveTimer.unref();

    if (this.config.rekeyIntervalMs !== undefined) {
      this.rekeyTimer = setInterval(() => this.autoRekey(), this.config.rekeyIntervalMs);
      this.rekeyTimer.unref();
    }
  }

  private stopTimers(): void {
    if (this.keepaliveTimer) clearInterval(this.keepaliveTimer);
    if (this.rekeyTimer) clearInterval(this.rekeyTimer);
    this.keepaliveTimer = null;
    this.rekeyTimer = null;
  }

  /**
   * Probe when either direction has been quiet for a keepalive interval;
   * close when nothing has arrived for the keepalive timeout.
   */
  private checkLiveness(): void {
    if (this.currentState !== 'active') return;
    const now = this.now();
    const { keepaliveIntervalMs, keepaliveTimeoutMs } = this.config;

    if (!this.readPaused) {
      if (now - this.lastReceivedAt >= keepaliveTimeoutMs) {
        void this.close(new TimeoutError(`No frame received for ${keepaliveTimeoutMs} ms`));
        return;
      }
    }

    const sendIdle = now - this.lastSentAt >= keepaliveIntervalMs;
    const receiveIdle =
      now - this.lastReceivedAt >= keepaliveIntervalMs &&
      now - this.lastProbeAt >= keepaliveIntervalMs;
    if ((sendIdle || receiveIdle) && this.canWrite()) {
      this.lastProbeAt = now;
      this.writeRecord({ type: 'probe' });
    }
  }

  // ── Helpers ──────────────────────────────────────────────────────────────

  private canWrite(): boolean {
    return !this.transport.destroyed && !this.transport.writableEnded;
  }

  private assertWritable(): void {
    if (this.currentState !== 'active') {
      throw this.closeReason ?? new SessionClosedError();
    }
    if (this.writeEnded) {
      throw new SessionClosedError('Write side has been ended');
    }
    if (!this.canWrite()) {
      throw new SessionClosedError('Transport is no longer writable');
    }
  }

  /** Seal one record under the current key and hand it to the transport. */
  private writeRecord(record: TunnelRecord): boolean {
    const sealed = this.keys.encrypt(encodeRecord(record));
    const frame = pack(PROTOCOL_VERSION, sealed, this.keys.nonceLength);

    this.counters.framesSent++;
    this.counters.bytesSent += frame.length;
    this.lastSentAt = this.now();
    return this.transport.write(frame);
  }

  private async waitForDrain(): Promise<void> {
    try {
      await once(this.transport, 'drain', { signal: this.closing.signal });
    } catch {
      throw this.closeReason ?? new SessionClosedError('Transport closed before draining');
    }
  }
}
