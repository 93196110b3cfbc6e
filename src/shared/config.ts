/**
 * Configuration schema and loading for both the tunnel server and client.
 *
 * Config file: <configDir>/config.json
 * Env file:    <configDir>/.env (loaded by the entry points via dotenv)
 * Shared key:  <configDir>/keys/shared.key
 *
 * Precedence (highest first): CLI flags, environment variables, config file,
 * built-in defaults. Configuration values are passed explicitly to the
 * listener, dialer and sessions; nothing here is a process-wide singleton.
 */

import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';

import { ConfigurationError } from './errors.js';
import { DEFAULT_MAX_FRAME_SIZE } from './protocol/index.js';

/** Base directory for config and keys.
 *  Defaults to .cipherlink/ in the current working directory.
 *  Override with CIPHERLINK_CONFIG_DIR for containers or custom deployments. */
export function getConfigDir(): string {
  return process.env.CIPHERLINK_CONFIG_DIR || path.join(process.cwd(), '.cipherlink');
}

export function getConfigPath(): string {
  return path.join(getConfigDir(), 'config.json');
}

export function getEnvFilePath(): string {
  return path.join(getConfigDir(), '.env');
}

export function getKeysDir(): string {
  return path.join(getConfigDir(), 'keys');
}

export function getDefaultKeyFile(): string {
  return path.join(getKeysDir(), 'shared.key');
}

// ── Schema ─────────────────────────────────────────────────────────────────

const port = z.number().int().min(0).max(65_535);
const timeoutMs = z.number().int().positive();

export const sessionConfigSchema = z
  .object({
    /** Send a probe after this long without traffic */
    keepaliveIntervalMs: timeoutMs.default(15_000),
    /** Close the session after this long without receiving any frame */
    keepaliveTimeoutMs: timeoutMs.default(45_000),
    /** Largest accepted frame body (nonce + ciphertext + tag) */
    maxFrameSize: z.number().int().min(64).default(DEFAULT_MAX_FRAME_SIZE),
    /** Rekey periodically (disabled when unset) */
    rekeyIntervalMs: timeoutMs.optional(),
    /** Rekey after this many plaintext bytes sent under one key (disabled when unset) */
    rekeyAfterBytes: z.number().int().positive().optional(),
    /** How long the previous key still decrypts after a rekey */
    rekeyGraceMs: timeoutMs.default(10_000),
  })
  .refine((s) => s.keepaliveTimeoutMs > s.keepaliveIntervalMs, {
    message: 'keepaliveTimeoutMs must be greater than keepaliveIntervalMs',
    path: ['keepaliveTimeoutMs'],
  });

export const serverConfigSchema = z.object({
  /** Host to bind to */
  host: z.string().min(1).default('0.0.0.0'),
  /** Port to listen on */
  port: port.default(8888),
  /** Path to the shared key file */
  keyFile: z.string().min(1).default(() => getDefaultKeyFile()),
  /** Optional cap on concurrent sessions */
  maxSessions: z.number().int().positive().optional(),
  /** Upstream connect timeout for relay requests (ms) */
  connectTimeoutMs: timeoutMs.default(10_000),
});

export const clientConfigSchema = z.object({
  /** Tunnel server to dial */
  serverHost: z.string().min(1).default('127.0.0.1'),
  serverPort: port.default(8888),
  /** Local SOCKS5 endpoint for applications */
  socksHost: z.string().min(1).default('127.0.0.1'),
  socksPort: port.default(1080),
  /** Path to the shared key file */
  keyFile: z.string().min(1).default(() => getDefaultKeyFile()),
  /** Tunnel connect timeout (ms) */
  connectTimeoutMs: timeoutMs.default(10_000),
});

export const configSchema = z.object({
  server: serverConfigSchema.default({}),
  client: clientConfigSchema.default({}),
  session: sessionConfigSchema.default({}),
});

export type SessionConfig = z.infer<typeof sessionConfigSchema>;
export type ServerConfig = z.infer<typeof serverConfigSchema>;
export type ClientConfig = z.infer<typeof clientConfigSchema>;
export type CipherlinkConfig = z.infer<typeof configSchema>;

// ── Loading ────────────────────────────────────────────────────────────────

type RawSection = Record<string, unknown>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: Record<string, unknown>, name: string): RawSection {
  const value = raw[name];
  return isRecord(value) ? { ...value } : {};
}

function readConfigFile(configPath: string): Record<string, unknown> {
  if (!fs.existsSync(configPath)) {
    return {};
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new ConfigurationError(`Config file ${configPath} is not valid JSON`, { cause: err });
  }
  if (!isRecord(parsed)) {
    throw new ConfigurationError(`Config file ${configPath} must contain a JSON object`);
  }
  return parsed;
}

/**
 * Apply CIPHERLINK_* environment overrides on top of the raw file contents.
 * Numbers are converted here; the schema rejects anything that is not one.
 */
export function applyEnvOverrides(
  raw: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env,
): Record<string, unknown> {
  const server = section(raw, 'server');
  const client = section(raw, 'client');

  if (env.CIPHERLINK_SERVER_HOST) server.host = env.CIPHERLINK_SERVER_HOST;
  if (env.CIPHERLINK_SERVER_PORT) {
    server.port = Number(env.CIPHERLINK_SERVER_PORT);
    client.serverPort = Number(env.CIPHERLINK_SERVER_PORT);
  }
  if (env.CIPHERLINK_CLIENT_HOST) client.serverHost = env.CIPHERLINK_CLIENT_HOST;
  if (env.CIPHERLINK_KEY_FILE) {
    server.keyFile = env.CIPHERLINK_KEY_FILE;
    client.keyFile = env.CIPHERLINK_KEY_FILE;
  }

  return { ...raw, server, client };
}

/**
 * Validate raw config input, filling defaults.
 *
 * @throws ConfigurationError listing every failing path
 */
export function parseConfig(raw: unknown): CipherlinkConfig {
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(`Invalid configuration: ${formatIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Fill session defaults for a partial override, as accepted by the session,
 * listener and dialer constructors.
 */
export function resolveSessionConfig(input: Partial<SessionConfig> = {}): SessionConfig {
  const result = sessionConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(`Invalid session configuration: ${formatIssues(result.error)}`);
  }
  return result.data;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

export function loadConfig(
  configPath: string = getConfigPath(),
  env: NodeJS.ProcessEnv = process.env,
): CipherlinkConfig {
  return parseConfig(applyEnvOverrides(readConfigFile(configPath), env));
}

export function saveConfig(config: CipherlinkConfig, configPath: string = getConfigPath()): void {
  fs.mkdirSync(path.dirname(configPath), { recursive: true, mode: 0o700 });
  fs.writeFileSync(configPath, JSON.stringify(config, null, 2), { mode: 0o600 });
}
