import { describe, it, expect, afterEach } from 'vitest';

import { TunnelSession, type RekeyInfo, type TunnelSessionOptions } from './session.js';
import { createDuplexPair } from '../testing/duplex-pair.js';
import { SessionClosedError, TimeoutError } from '../shared/errors.js';
import type { LifecycleEvent } from '../shared/lifecycle.js';

const KEY = Buffer.alloc(32, 3);

const open: TunnelSession[] = [];

type Options = Omit<TunnelSessionOptions, 'key'>;

function connectedPair(options: Options = {}, serverOptions: Options = options) {
  const [a, b] = createDuplexPair();
  const client = new TunnelSession(a, { key: KEY, id: 'client', ...options });
  const server = new TunnelSession(b, { key: KEY, id: 'server', ...serverOptions });
  open.push(client, server);
  return { client, server };
}

function nextRekey(s: TunnelSession): Promise<RekeyInfo> {
  return new Promise((resolve) => s.once('rekey', resolve));
}

async function text(s: TunnelSession): Promise<string | undefined> {
  return (await s.receive())?.toString();
}

afterEach(async () => {
  await Promise.all(open.splice(0).map((s) => s.close()));
});

describe('TunnelSession rekey', () => {
  it('should deliver frames sent just before and just after a rekey', async () => {
    const { client, server } = connectedPair();
    const responderSwitched = nextRekey(server);

    await client.send(Buffer.from('before'));
    const rekeyed = client.rekey();
    await client.send(Buffer.from('after'));

    expect(await text(server)).toBe('before');
    expect(await text(server)).toBe('after');

    await rekeyed;
    expect(await responderSwitched).toMatchObject({ role: 'responder' });

    // Both directions run under the new key.
    await server.send(Buffer.from('from server'));
    await client.send(Buffer.from('from client'));
    expect(await text(client)).toBe('from server');
    expect(await text(server)).toBe('from client');

    expect(client.stats().rekeys).toBe(1);
    expect(server.stats().rekeys).toBe(1);
  });

  it('should not lose server frames sent while the ack is in flight', async () => {
    const { client, server } = connectedPair();
    const switched = nextRekey(server);

    const rekeyed = client.rekey();
    await switched;
    // Sealed under the new key before the client has seen the ack.
    await server.send(Buffer.from('fresh'));

    await rekeyed;
    expect(await text(client)).toBe('fresh');
  });

  it('should join a rekey that is already in flight', async () => {
    const { client } = connectedPair();

    const first = client.rekey();
    const second = client.rekey();

    expect(second).toBe(first);
    await first;
    expect(client.stats().rekeys).toBe(1);
  });

  it('should settle simultaneous rekeys on a single key', async () => {
    const { client, server } = connectedPair();

    await Promise.all([client.rekey(), server.rekey()]);

    await client.send(Buffer.from('ping'));
    expect(await text(server)).toBe('ping');
    await server.send(Buffer.from('pong'));
    expect(await text(client)).toBe('pong');

    expect(client.stats().rekeys).toBe(1);
    expect(server.stats().rekeys).toBe(1);
  });

  it('should report both roles to the lifecycle sink', async () => {
    const events: LifecycleEvent[] = [];
    const { client } = connectedPair({ sink: (e) => events.push(e) });

    await client.rekey();

    const rekeys = events.flatMap((e) => (e.type === 'rekey' ? [[e.sessionId, e.role]] : []));
    expect(rekeys).toEqual([
      ['server', 'responder'],
      ['client', 'initiator'],
    ]);
  });

  it('should rekey automatically after the configured byte count', async () => {
    const { client, server } = connectedPair({ rekeyAfterBytes: 16 });
    const switched = nextRekey(client);

    await client.send(Buffer.alloc(20, 0x62));
    expect(await switched).toMatchObject({ role: 'initiator' });

    expect((await server.receive())?.length).toBe(20);
    await client.send(Buffer.from('next'));
    expect(await text(server)).toBe('next');
  });

  it('should rekey automatically on the configured interval', async () => {
    const { client } = connectedPair({ rekeyIntervalMs: 30 }, {});

    const info = await nextRekey(client);
    expect(info.role).toBe('initiator');
  });

  it('should close with TimeoutError when a rekey is never acknowledged', async () => {
    const [, transport] = createDuplexPair();
    const lonely = new TunnelSession(transport, {
      key: KEY,
      keepaliveIntervalMs: 20,
      keepaliveTimeoutMs: 60,
    });
    open.push(lonely);

    await expect(lonely.rekey()).rejects.toBeInstanceOf(TimeoutError);
    await lonely.close();
    expect(lonely.state).toBe('closed');
  });

  it('should reject rekey() on a closed session', async () => {
    const { client } = connectedPair();
    await client.close();
    await expect(client.rekey()).rejects.toBeInstanceOf(SessionClosedError);
  });
});
