import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { SERVER_FLAGS, resolveServerConfig } from './main.js';
import { CLIENT_FLAGS, resolveClientConfig } from '../client/main.js';
import { parseArgs } from '../cli/args.js';

describe('entry point configuration', () => {
  let tmpDir: string;
  let configPath: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'cipherlink-main-'));
    configPath = path.join(tmpDir, 'config.json');
    fs.writeFileSync(
      configPath,
      JSON.stringify({ server: { port: 7000, host: '127.0.0.1' }, client: { socksPort: 1090 } }),
    );
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should let server flags override the environment and the file', () => {
    const args = parseArgs(
      ['--config', configPath, '--port', '9443', '--max-sessions', '4'],
      SERVER_FLAGS,
    );
    const config = resolveServerConfig(args, { CIPHERLINK_SERVER_HOST: '10.0.0.5' });

    expect(config.server).toMatchObject({ host: '10.0.0.5', port: 9443, maxSessions: 4 });
  });

  it('should keep file values the flags do not mention', () => {
    const args = parseArgs(['--config', configPath], SERVER_FLAGS);
    expect(resolveServerConfig(args, {}).server).toMatchObject({ host: '127.0.0.1', port: 7000 });
  });

  it('should reject an out-of-range port flag', () => {
    const args = parseArgs(['--config', configPath, '--port', '70000'], SERVER_FLAGS);
    expect(() => resolveServerConfig(args, {})).toThrow(/server\.port/);
  });

  it('should apply client flags on top of the file', () => {
    const args = parseArgs(
      ['--config', configPath, '--server-host', 'tunnel.test', '--key-file', '/tmp/k'],
      CLIENT_FLAGS,
    );
    const config = resolveClientConfig(args, {});

    expect(config.client).toMatchObject({
      serverHost: 'tunnel.test',
      socksPort: 1090,
      keyFile: '/tmp/k',
    });
  });
});
