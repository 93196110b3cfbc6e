#!/usr/bin/env node
/**
 * Tunnel client entry point.
 *
 * Opens a local SOCKS5 endpoint; every application connection to it is
 * carried through its own encrypted session to the tunnel server.
 *
 * Usage:
 *   cipherlink-client [--server-host <addr>] [--server-port <n>]
 *                     [--socks-host <addr>] [--socks-port <n>] [--key-file <file>]
 *                     [--config <file>] [--log-level <level>]
 */

import { config as loadEnv } from 'dotenv';

import {
  getConfigPath,
  getEnvFilePath,
  loadConfig,
  parseConfig,
  type CipherlinkConfig,
} from '../shared/config.js';
import { fingerprint, loadSharedKey } from '../shared/crypto/index.js';
import { createLifecycleLog } from '../shared/lifecycle.js';
import { createLogger, setLogLevel } from '../shared/logger.js';
import {
  defined,
  isDirectRun,
  logLevelFlag,
  numberFlag,
  parseArgs,
  stringFlag,
  type FlagKind,
  type ParsedArgs,
} from '../cli/args.js';
import { TunnelDialer } from './dialer.js';
import { LocalSocksServer } from './local-socks.js';

const log = createLogger('client');

export const CLIENT_FLAGS = {
  'server-host': 'string',
  'server-port': 'string',
  'socks-host': 'string',
  'socks-port': 'string',
  'key-file': 'string',
  config: 'string',
  'log-level': 'string',
} satisfies Record<string, FlagKind>;

function usage(): void {
  console.log(`
Cipherlink tunnel client

Usage:
  cipherlink-client [options]

Options:
  --server-host <addr>   Tunnel server address (default 127.0.0.1)
  --server-port <n>      Tunnel server port (default 8888)
  --socks-host <addr>    Local SOCKS5 bind address (default 127.0.0.1)
  --socks-port <n>       Local SOCKS5 port (default 1080)
  --key-file <file>      Shared key file
  --config <file>        Config file (default ${getConfigPath()})
  --log-level <level>    error | warn | info | debug
`);
}

/** Config file and environment, overridden by command-line flags. */
export function resolveClientConfig(
  args: ParsedArgs,
  env: NodeJS.ProcessEnv = process.env,
): CipherlinkConfig {
  const base = loadConfig(stringFlag(args, 'config') ?? getConfigPath(), env);
  return parseConfig({
    ...base,
    client: {
      ...base.client,
      ...defined({
        serverHost: stringFlag(args, 'server-host'),
        serverPort: numberFlag(args, 'server-port'),
        socksHost: stringFlag(args, 'socks-host'),
        socksPort: numberFlag(args, 'socks-port'),
        keyFile: stringFlag(args, 'key-file'),
      }),
    },
  });
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2), CLIENT_FLAGS);
  if (args.flags.has('help')) {
    usage();
    return;
  }

  loadEnv({ path: getEnvFilePath() });
  const level = logLevelFlag(args);
  if (level) setLogLevel(level);

  const config = resolveClientConfig(args);
  const { client } = config;
  const key = loadSharedKey(client.keyFile);
  log.info(`Loaded shared key ${client.keyFile} (fingerprint ${fingerprint(key)})`);

  const dialer = new TunnelDialer({
    host: client.serverHost,
    port: client.serverPort,
    key,
    session: config.session,
    connectTimeoutMs: client.connectTimeoutMs,
    sink: createLifecycleLog(),
  });
  const socks = new LocalSocksServer({ host: client.socksHost, port: client.socksPort, dialer });
  await socks.listen();
  log.info(`Tunneling through ${client.serverHost}:${client.serverPort}`);

  const shutdown = () => {
    log.info('Shutting down gracefully...');
    socks.close().then(
      () => process.exit(0),
      (err: unknown) => {
        log.error('Shutdown failed:', err);
        process.exit(1);
      },
    );

    setTimeout(() => {
      log.error('Forced shutdown after timeout.');
      process.exit(1);
    }, 10_000).unref();
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

if (isDirectRun(import.meta.url)) {
  main().catch((err: unknown) => {
    log.error('Fatal error:', err instanceof Error ? err.message : err);
    process.exit(1);
  });
}
