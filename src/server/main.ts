#!/usr/bin/env node
/**
 * Tunnel server entry point.
 *
 * Loads <configDir>/.env, the config file and the shared key, then accepts
 * tunnel connections and relays their SOCKS5 CONNECT requests.
 *
 * Usage:
 *   cipherlink-server [--host <addr>] [--port <n>] [--key-file <file>]
 *                     [--max-sessions <n>] [--config <file>] [--log-level <level>]
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
import { TunnelListener } from './listener.js';

const log = createLogger('server');

export const SERVER_FLAGS = {
  host: 'string',
  port: 'string',
  'key-file': 'string',
  'max-sessions': 'string',
  config: 'string',
  'log-level': 'string',
} satisfies Record<string, FlagKind>;

function usage(): void {
  console.log(`
Cipherlink tunnel server

Usage:
  cipherlink-server [options]

Options:
  --host <addr>          Address to bind (default 0.0.0.0)
  --port <n>             Port to listen on (default 8888)
  --key-file <file>      Shared key file
  --max-sessions <n>     Reject connections beyond this many open sessions
  --config <file>        Config file (default ${getConfigPath()})
  --log-level <level>    error | warn | info | debug
`);
}

/** Config file and environment, overridden by command-line flags. */
export function resolveServerConfig(
  args: ParsedArgs,
  env: NodeJS.ProcessEnv = process.env,
): CipherlinkConfig {
  const base = loadConfig(stringFlag(args, 'config') ?? getConfigPath(), env);
  return parseConfig({
    ...base,
    server: {
      ...base.server,
      ...defined({
        host: stringFlag(args, 'host'),
        port: numberFlag(args, 'port'),
        keyFile: stringFlag(args, 'key-file'),
        maxSessions: numberFlag(args, 'max-sessions'),
      }),
    },
  });
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2), SERVER_FLAGS);
  if (args.flags.has('help')) {
    usage();
    return;
  }

  loadEnv({ path: getEnvFilePath() });
  const level = logLevelFlag(args);
  if (level) setLogLevel(level);

  const config = resolveServerConfig(args);
  const key = loadSharedKey(config.server.keyFile);
  log.info(`Loaded shared key ${config.server.keyFile} (fingerprint ${fingerprint(key)})`);

  const listener = new TunnelListener({
    host: config.server.host,
    port: config.server.port,
    key,
    session: config.session,
    maxSessions: config.server.maxSessions,
    connectTimeoutMs: config.server.connectTimeoutMs,
    sink: createLifecycleLog(),
  });
  await listener.listen();

  // Graceful shutdown: close the listener and its sessions on SIGTERM or SIGINT.
  const shutdown = () => {
    log.info('Shutting down gracefully...');
    listener.close().then(
      () => process.exit(0),
      (err: unknown) => {
        log.error('Shutdown failed:', err);
        process.exit(1);
      },
    );

    // Force exit after 10 seconds if sessions don't drain
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
