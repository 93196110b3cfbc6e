/**
 * Exact-length reads over a session's decrypted data stream.
 *
 * The peer's SOCKS5 bytes arrive in whatever chunks it sent them; the relay
 * needs "2 bytes, then NMETHODS bytes, ...". Bytes read past the request
 * (pipelined application data) are handed back by `drain()`.
 */

import type { TunnelSession } from '../tunnel/index.js';
import { ProtocolError } from '../shared/errors.js';

export class SessionReader {
  private buffer: Buffer = Buffer.alloc(0);
  private ended = false;

  constructor(private readonly session: TunnelSession) {}

  /**
   * Read exactly `length` bytes, or `null` if the peer ended its stream
   * before sending any of them.
   */
  async readOrEnd(length: number): Promise<Buffer | null> {
    while (this.buffer.length < length) {
      if (this.ended) {
        if (this.buffer.length === 0) return null;
        throw new ProtocolError(
          `Stream ended mid-message: expected ${length} bytes, got ${this.buffer.length}`,
        );
      }
      const chunk = await this.session.receive();
      if (chunk === null) {
        this.ended = true;
      } else {
        this.buffer = this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);
      }
    }
    const out = this.buffer.subarray(0, length);
    this.buffer = this.buffer.subarray(length);
    return out;
  }

  /**
   * Read exactly `length` bytes.
   *
   * @throws ProtocolError if the stream ends first
   */
  async read(length: number): Promise<Buffer> {
    const buf = await this.readOrEnd(length);
    if (buf === null) {
      throw new ProtocolError(`Stream ended mid-message: expected ${length} bytes, got 0`);
    }
    return buf;
  }

  /** Take whatever was received but not consumed. */
  drain(): Buffer {
    const rest = this.buffer;
    this.buffer = Buffer.alloc(0);
    return rest;
  }
}
