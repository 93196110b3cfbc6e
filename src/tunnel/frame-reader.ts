/**
 * Exact-length reads over a byte stream.
 *
 * TCP (or any stream transport) delivers bytes in arbitrary chunks; the
 * session needs "exactly 9 header bytes, then exactly N body bytes". The
 * reader buffers incoming chunks and resolves one outstanding read at a time
 * once enough bytes have arrived.
 *
 * End of stream is reported two ways:
 *   - `readOrEnd` resolves `null` when the stream ends cleanly before any byte
 *     of the requested unit arrived (a frame boundary);
 *   - any read that has started receiving bytes rejects with
 *     `IncompleteFrameError` if the stream ends before it is satisfied.
 */

import type { Readable } from 'node:stream';

import { IncompleteFrameError } from '../shared/errors.js';

interface PendingRead {
  length: number;
  allowEnd: boolean;
  resolve: (buf: Buffer | null) => void;
  reject: (err: Error) => void;
}

export class FrameReader {
  private chunks: Buffer[] = [];
  private buffered = 0;
  private ended = false;
  private failure: Error | null = null;
  private pending: PendingRead | null = null;

  private readonly onData = (chunk: Buffer | string) => {
    const buf = typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
    if (buf.length === 0) return;
    this.chunks.push(buf);
    this.buffered += buf.length;
    this.settle();
  };

  private readonly onEnd = () => {
    this.ended = true;
    this.settle();
  };

  private readonly onError = (err: Error) => {
    this.fail(err);
  };

  constructor(source: Readable) {
    source.on('data', this.onData);
    source.on('end', this.onEnd);
    source.on('close', this.onEnd);
    source.on('error', this.onError);
  }

  /** Bytes received but not yet consumed. */
  get bufferedLength(): number {
    return this.buffered;
  }

  /**
   * Read exactly `length` bytes.
   *
   * @throws IncompleteFrameError if the stream ends first
   */
  async read(length: number): Promise<Buffer> {
    const buf = await this.enqueue(length, false);
    if (buf === null) {
      throw new IncompleteFrameError(length, 0);
    }
    return buf;
  }

  /**
   * Read exactly `length` bytes, or `null` if the stream ended cleanly before
   * the first of them arrived.
   */
  readOrEnd(length: number): Promise<Buffer | null> {
    return this.enqueue(length, true);
  }

  /** Reject the outstanding read (if any) and every later one. */
  fail(err: Error): void {
    if (this.failure) return;
    this.failure = err;
    const pending = this.pending;
    this.pending = null;
    pending?.reject(err);
  }

  private enqueue(length: number, allowEnd: boolean): Promise<Buffer | null> {
    if (this.pending) {
      return Promise.reject(new Error('FrameReader supports one outstanding read at a time'));
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    return new Promise<Buffer | null>((resolve, reject) => {
      this.pending = { length, allowEnd, resolve, reject };
      this.settle();
    });
  }

  private settle(): void {
    const pending = this.pending;
    if (!pending) return;

    if (this.buffered >= pending.length) {
      this.pending = null;
      pending.resolve(this.take(pending.length));
      return;
    }

    if (this.ended) {
      this.pending = null;
      if (this.buffered === 0 && pending.allowEnd) {
        pending.resolve(null);
      } else {
        pending.reject(new IncompleteFrameError(pending.length, this.buffered));
      }
    }
  }

  private take(length: number): Buffer {
    if (length === 0) return Buffer.alloc(0);

    const first = this.chunks[0];
    if (first.length >= length) {
      const out = first.subarray(0, length);
      if (first.length === length) {
        this.chunks.shift();
      } else {
        this.chunks[0] = first.subarray(length);
      }
      this.buffered -= length;
      return out;
    }

    const out = Buffer.allocUnsafe(length);
    let offset = 0;
    while (offset < length) {
      const chunk = this.chunks[0];
      const n = Math.min(chunk.length, length - offset);
      chunk.copy(out, offset, 0, n);
      offset += n;
      if (n === chunk.length) {
        this.chunks.shift();
      } else {
        this.chunks[0] = chunk.subarray(n);
      }
    }
    this.buffered -= length;
    return out;
  }
}
