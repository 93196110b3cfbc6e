#!/usr/bin/env node
/**
 * Key generation CLI.
 *
 * Generates the 32-byte shared key both tunnel ends load at startup and saves
 * it with owner-only permissions (0600, directory 0700). Copy the same file
 * to the server and the client over a channel you trust.
 *
 * Usage:
 *   npx tsx src/cli/generate-keys.ts                      # <configDir>/keys/shared.key
 *   npx tsx src/cli/generate-keys.ts --output ./my.key    # Custom path
 *   npx tsx src/cli/generate-keys.ts show ./my.key        # Print a key's fingerprint
 */

import fs from 'node:fs';

import { getDefaultKeyFile } from '../shared/config.js';
import {
  fingerprint,
  generateSharedKey,
  loadSharedKey,
  saveSharedKey,
} from '../shared/crypto/index.js';
import { isDirectRun, parseArgs, stringFlag } from './args.js';

function usage(): void {
  console.log(`
Cipherlink key generation

Usage:
  cipherlink-keygen [--output <file>] [--force]
                              Generate a shared key (default: ${getDefaultKeyFile()})
  cipherlink-keygen show <file>
                              Show the fingerprint of an existing key

The key file holds 32 raw bytes. Install the same file on the server and the
client; compare fingerprints to confirm both ends hold the same key.
`);
}

/**
 * Write a new key unless one exists (or `force` is set).
 *
 * @returns the fingerprint of the new key, or null if an existing key was kept
 */
export function generateKeyFile(filePath: string, force = false): string | null {
  if (fs.existsSync(filePath) && !force) {
    return null;
  }
  const key = generateSharedKey();
  saveSharedKey(key, filePath);
  return fingerprint(key);
}

function main(argv: string[]): number {
  const args = parseArgs(argv, { output: 'string', force: 'boolean' });
  if (args.flags.has('help')) {
    usage();
    return 0;
  }

  const [command, target] = args.positionals;
  if (command === 'show') {
    if (!target) {
      console.error('Usage: cipherlink-keygen show <file>');
      return 1;
    }
    console.log(`Fingerprint: ${fingerprint(loadSharedKey(target))}`);
    return 0;
  }
  if (command !== undefined) {
    console.error(`Unknown argument: ${command}`);
    usage();
    return 1;
  }

  const filePath = stringFlag(args, 'output') ?? getDefaultKeyFile();
  const fp = generateKeyFile(filePath, args.flags.has('force'));
  if (fp === null) {
    console.error(`\n⚠️  Key already exists: ${filePath}`);
    console.error('   Pass --force to replace it.');
    console.log(`\n   Existing fingerprint: ${fingerprint(loadSharedKey(filePath))}\n`);
    return 1;
  }

  console.log(`\n✓ Key saved to: ${filePath}`);
  console.log(`  Fingerprint: ${fp}`);
  console.log('\n  Keep this file secret. Copy it to the other end of the tunnel.\n');
  return 0;
}

if (isDirectRun(import.meta.url)) {
  try {
    process.exitCode = main(process.argv.slice(2));
  } catch (err: unknown) {
    console.error(err instanceof Error ? err.message : err);
    process.exitCode = 1;
  }
}
