/**
 * Full path over loopback TCP:
 *   application → LocalSocksServer → TunnelDialer ⇄ TunnelListener → relay → echo server
 */

import { describe, it, expect, beforeAll, afterAll, afterEach, vi } from 'vitest';
import net from 'node:net';

import { LocalSocksServer } from './local-socks.js';
import { TunnelDialer } from './dialer.js';
import { TunnelListener } from '../server/listener.js';
import { encodeGreeting, encodeRequest } from '../relay/index.js';
import { FrameReader } from '../tunnel/index.js';
import { DisconnectedError } from '../shared/errors.js';
import type { LifecycleEvent } from '../shared/lifecycle.js';

const KEY = Buffer.alloc(32, 1);
const OTHER_KEY = Buffer.alloc(32, 2);

let echoServer: net.Server;
let echoPort: number;

function listenOnLoopback(server: net.Server): Promise<number> {
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(0, '127.0.0.1', () => {
      const address = server.address();
      resolve(typeof address === 'object' && address ? address.port : 0);
    });
  });
}

function connect(port: number): Promise<net.Socket> {
  return new Promise((resolve, reject) => {
    const socket = net.connect({ host: '127.0.0.1', port });
    socket.once('connect', () => resolve(socket));
    socket.once('error', reject);
  });
}

beforeAll(async () => {
  echoServer = net.createServer({ allowHalfOpen: true }, (socket) => socket.pipe(socket));
  echoPort = await listenOnLoopback(echoServer);
});

afterAll(async () => {
  await new Promise<void>((resolve) => echoServer.close(() => resolve()));
});

const cleanups: Array<() => Promise<void>> = [];

afterEach(async () => {
  for (const cleanup of cleanups.splice(0).reverse()) {
    await cleanup();
  }
});

async function startListener(options: { maxSessions?: number } = {}) {
  const events: LifecycleEvent[] = [];
  const listener = new TunnelListener({
    host: '127.0.0.1',
    port: 0,
    key: KEY,
    connectTimeoutMs: 2000,
    sink: (e) => events.push(e),
    ...options,
  });
  const address = await listener.listen();
  cleanups.push(() => listener.close());
  return { listener, events, port: address.port };
}

describe('tunnel client and server', () => {
  it('should carry an application connection through the local SOCKS5 proxy', async () => {
    const { port } = await startListener();
    const socks = new LocalSocksServer({
      host: '127.0.0.1',
      port: 0,
      dialer: new TunnelDialer({ host: '127.0.0.1', port, key: KEY }),
    });
    const socksAddress = await socks.listen();
    cleanups.push(() => socks.close());

    const app = await connect(socksAddress.port);
    const replies = new FrameReader(app);

    app.write(encodeGreeting());
    expect(await replies.read(2)).toEqual(Buffer.from([0x05, 0x00]));

    app.write(encodeRequest('127.0.0.1', echoPort));
    const reply = await replies.read(10);
    expect([...reply.subarray(0, 4)]).toEqual([0x05, 0x00, 0x00, 0x01]);

    app.write('Hello!');
    expect((await replies.read(6)).toString()).toBe('Hello!');

    app.end();
    expect(await replies.readOrEnd(1)).toBeNull();
    app.destroy();
  });

  it('should exchange data between a dialed session and a custom handler', async () => {
    const listener = new TunnelListener({
      host: '127.0.0.1',
      port: 0,
      key: KEY,
      handler: async (session) => {
        const message = await session.receive();
        if (message) await session.send(message);
        await session.close();
      },
    });
    const { port } = await listener.listen();
    cleanups.push(() => listener.close());

    const session = await new TunnelDialer({ host: '127.0.0.1', port, key: KEY }).connect();
    cleanups.push(() => session.close());

    await session.send(Buffer.from('Hello!'));
    expect((await session.receive())?.toString()).toBe('Hello!');
    expect(await session.receive()).toBeNull();
  });

  it('should close a session sealed under the wrong key without stopping the listener', async () => {
    const { port, events, listener } = await startListener();

    const intruder = await new TunnelDialer({ host: '127.0.0.1', port, key: OTHER_KEY }).connect();
    cleanups.push(() => intruder.close());
    await intruder.send(Buffer.from([0x05, 0x01, 0x00]));

    await vi.waitFor(() => {
      expect(events).toContainEqual(
        expect.objectContaining({ type: 'session_closed', reason: 'authentication' }),
      );
    });
    await expect(intruder.receive()).rejects.toBeInstanceOf(DisconnectedError);

    // A well-keyed client still gets through.
    const session = await new TunnelDialer({ host: '127.0.0.1', port, key: KEY }).connect();
    cleanups.push(() => session.close());
    await session.send(encodeGreeting());
    expect(await session.receive()).toEqual(Buffer.from([0x05, 0x00]));
    expect(listener.sessionCount).toBe(1);
  });

  it('should turn away connections beyond maxSessions', async () => {
    const { port } = await startListener({ maxSessions: 1 });
    const dialer = new TunnelDialer({ host: '127.0.0.1', port, key: KEY });

    const first = await dialer.connect();
    cleanups.push(() => first.close());
    await first.send(encodeGreeting());
    expect(await first.receive()).toEqual(Buffer.from([0x05, 0x00]));

    const second = await dialer.connect();
    cleanups.push(() => second.close());
    await expect(second.receive()).rejects.toBeInstanceOf(DisconnectedError);
  });

  it('should reject dialing a port nobody listens on', async () => {
    const probe = net.createServer();
    const port = await listenOnLoopback(probe);
    await new Promise<void>((resolve) => probe.close(() => resolve()));

    await expect(
      new TunnelDialer({ host: '127.0.0.1', port, key: KEY }).connect(),
    ).rejects.toMatchObject({ code: 'ECONNREFUSED' });
  });
});
