import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import {
  applyEnvOverrides,
  getConfigDir,
  getConfigPath,
  getDefaultKeyFile,
  getEnvFilePath,
  loadConfig,
  parseConfig,
  resolveSessionConfig,
  saveConfig,
} from './config.js';
import { ConfigurationError } from './errors.js';

describe('config paths', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  it('should default to .cipherlink in the working directory', () => {
    delete process.env.CIPHERLINK_CONFIG_DIR;
    expect(getConfigDir()).toBe(path.join(process.cwd(), '.cipherlink'));
  });

  it('should honour CIPHERLINK_CONFIG_DIR', () => {
    process.env.CIPHERLINK_CONFIG_DIR = '/etc/cipherlink';
    expect(getConfigPath()).toBe(path.join('/etc/cipherlink', 'config.json'));
    expect(getEnvFilePath()).toBe(path.join('/etc/cipherlink', '.env'));
    expect(getDefaultKeyFile()).toBe(path.join('/etc/cipherlink', 'keys', 'shared.key'));
  });
});

describe('parseConfig', () => {
  it('should fill every default from an empty object', () => {
    const config = parseConfig({});

    expect(config.server).toMatchObject({
      host: '0.0.0.0',
      port: 8888,
      connectTimeoutMs: 10_000,
    });
    expect(config.server.maxSessions).toBeUndefined();
    expect(config.client).toMatchObject({
      serverHost: '127.0.0.1',
      serverPort: 8888,
      socksHost: '127.0.0.1',
      socksPort: 1080,
    });
    expect(config.session).toEqual({
      keepaliveIntervalMs: 15_000,
      keepaliveTimeoutMs: 45_000,
      maxFrameSize: 1024 * 1024,
      rekeyGraceMs: 10_000,
    });
  });

  it('should keep provided values', () => {
    const config = parseConfig({
      server: { port: 9000, maxSessions: 5 },
      session: { rekeyAfterBytes: 1_000_000 },
    });

    expect(config.server.port).toBe(9000);
    expect(config.server.maxSessions).toBe(5);
    expect(config.session.rekeyAfterBytes).toBe(1_000_000);
  });

  it('should reject invalid ports with the failing path', () => {
    expect(() => parseConfig({ server: { port: 70_000 } })).toThrow(ConfigurationError);
    expect(() => parseConfig({ server: { port: 70_000 } })).toThrow(/server\.port/);
  });

  it('should require the keepalive timeout to exceed the interval', () => {
    expect(() =>
      parseConfig({ session: { keepaliveIntervalMs: 5000, keepaliveTimeoutMs: 5000 } }),
    ).toThrow(
      'Invalid configuration: session.keepaliveTimeoutMs: keepaliveTimeoutMs must be greater than keepaliveIntervalMs',
    );
  });
});

describe('resolveSessionConfig', () => {
  it('should fill defaults around the provided values', () => {
    expect(resolveSessionConfig({ keepaliveIntervalMs: 100, keepaliveTimeoutMs: 300 })).toEqual({
      keepaliveIntervalMs: 100,
      keepaliveTimeoutMs: 300,
      maxFrameSize: 1024 * 1024,
      rekeyGraceMs: 10_000,
    });
  });

  it('should reject a timeout shorter than the default interval', () => {
    expect(() => resolveSessionConfig({ keepaliveTimeoutMs: 1000 })).toThrow(
      'Invalid session configuration: keepaliveTimeoutMs: keepaliveTimeoutMs must be greater than keepaliveIntervalMs',
    );
  });
});

describe('applyEnvOverrides', () => {
  it('should override hosts, ports and key file from the environment', () => {
    const raw = applyEnvOverrides(
      { server: { port: 1 } },
      {
        CIPHERLINK_SERVER_HOST: '10.0.0.1',
        CIPHERLINK_SERVER_PORT: '9443',
        CIPHERLINK_CLIENT_HOST: 'tunnel.example.com',
        CIPHERLINK_KEY_FILE: '/keys/test.key',
      },
    );
    const config = parseConfig(raw);

    expect(config.server.host).toBe('10.0.0.1');
    expect(config.server.port).toBe(9443);
    expect(config.client.serverHost).toBe('tunnel.example.com');
    expect(config.client.serverPort).toBe(9443);
    expect(config.server.keyFile).toBe('/keys/test.key');
    expect(config.client.keyFile).toBe('/keys/test.key');
  });

  it('should let the schema reject a non-numeric port', () => {
    const raw = applyEnvOverrides({}, { CIPHERLINK_SERVER_PORT: 'abc' });
    expect(() => parseConfig(raw)).toThrow(ConfigurationError);
  });

  it('should leave the input untouched without overrides', () => {
    const raw = { server: { port: 1234 } };
    expect(applyEnvOverrides(raw, {})).toEqual({ server: { port: 1234 }, client: {} });
  });
});

describe('loadConfig / saveConfig', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'cipherlink-config-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should return defaults when the file does not exist', () => {
    const config = loadConfig(path.join(tmpDir, 'missing.json'), {});
    expect(config.server.port).toBe(8888);
  });

  it('should round-trip a saved config', () => {
    const configPath = path.join(tmpDir, 'nested', 'config.json');
    const config = parseConfig({ client: { socksPort: 1081, keyFile: '/tmp/k' } });

    saveConfig(config, configPath);

    expect(loadConfig(configPath, {})).toEqual(config);
  });

  it('should reject malformed JSON', () => {
    const configPath = path.join(tmpDir, 'config.json');
    fs.writeFileSync(configPath, '{ not json');

    expect(() => loadConfig(configPath, {})).toThrow(`Config file ${configPath} is not valid JSON`);
  });

  it('should reject a JSON document that is not an object', () => {
    const configPath = path.join(tmpDir, 'config.json');
    fs.writeFileSync(configPath, '[1, 2]');

    expect(() => loadConfig(configPath, {})).toThrow(ConfigurationError);
  });
});
