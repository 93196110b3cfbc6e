/**
 * Minimal argv parsing shared by the CLI entry points.
 *
 * Accepts `--name value`, `--name=value` and boolean `--name` flags as
 * declared by the caller; anything not starting with `--` is a positional.
 */

import fs from 'node:fs';
import { fileURLToPath } from 'node:url';

import { ConfigurationError } from '../shared/errors.js';
import { LEVELS, isLevelName, type LevelName } from '../shared/logger.js';

export type FlagKind = 'string' | 'boolean';

export interface ParsedArgs {
  flags: Map<string, string | true>;
  positionals: string[];
}

export function parseArgs(argv: string[], declared: Record<string, FlagKind>): ParsedArgs {
  const flags = new Map<string, string | true>();
  const positionals: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '-h') {
      flags.set('help', true);
      continue;
    }
    if (!arg.startsWith('--')) {
      positionals.push(arg);
      continue;
    }

    const eq = arg.indexOf('=');
    const name = eq === -1 ? arg.slice(2) : arg.slice(2, eq);
    const kind = name === 'help' ? 'boolean' : declared[name];
    if (kind === undefined) {
      throw new ConfigurationError(`Unknown option: --${name}`);
    }

    if (kind === 'boolean') {
      if (eq !== -1) {
        throw new ConfigurationError(`Option --${name} does not take a value`);
      }
      flags.set(name, true);
      continue;
    }

    let value: string | undefined;
    if (eq !== -1) {
      value = arg.slice(eq + 1);
    } else {
      value = argv[i + 1];
      i++;
    }
    if (value === undefined || value === '' || value.startsWith('--')) {
      throw new ConfigurationError(`Option --${name} requires a value`);
    }
    flags.set(name, value);
  }

  return { flags, positionals };
}

export function stringFlag(args: ParsedArgs, name: string): string | undefined {
  const value = args.flags.get(name);
  return typeof value === 'string' ? value : undefined;
}

/** Numeric flag; the config schema checks the range. */
export function numberFlag(args: ParsedArgs, name: string): number | undefined {
  const value = stringFlag(args, name);
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new ConfigurationError(`Option --${name} must be a number, got "${value}"`);
  }
  return parsed;
}

/** Drop undefined entries so they do not override lower-precedence values. */
export function defined(
  values: Record<string, string | number | undefined>,
): Record<string, string | number> {
  const out: Record<string, string | number> = {};
  for (const [key, value] of Object.entries(values)) {
    if (value !== undefined) out[key] = value;
  }
  return out;
}

/** `--log-level`, validated against the logger's levels. */
export function logLevelFlag(args: ParsedArgs): LevelName | undefined {
  const value = stringFlag(args, 'log-level');
  if (value === undefined) return undefined;
  if (!isLevelName(value)) {
    throw new ConfigurationError(
      `Option --log-level must be one of ${Object.keys(LEVELS).join(', ')}, got "${value}"`,
    );
  }
  return value;
}

/**
 * Whether the module at `moduleUrl` is the script node was started with
 * (directly, through tsx, or through an npm bin symlink).
 */
export function isDirectRun(moduleUrl: string): boolean {
  const script = process.argv[1];
  if (!script) return false;
  try {
    return fs.realpathSync(script) === fileURLToPath(moduleUrl);
  } catch {
    return false;
  }
}
