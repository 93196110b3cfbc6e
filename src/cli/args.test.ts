import { describe, it, expect } from 'vitest';

import { defined, logLevelFlag, numberFlag, parseArgs, stringFlag } from './args.js';
import { ConfigurationError } from '../shared/errors.js';

const FLAGS = { port: 'string', force: 'boolean', 'log-level': 'string' } as const;

describe('parseArgs', () => {
  it('should read spaced and inline values, booleans and positionals', () => {
    const args = parseArgs(['show', '--port', '9000', '--force', '--log-level=debug', 'file'], FLAGS);

    expect(args.positionals).toEqual(['show', 'file']);
    expect(stringFlag(args, 'port')).toBe('9000');
    expect(numberFlag(args, 'port')).toBe(9000);
    expect(args.flags.get('force')).toBe(true);
    expect(logLevelFlag(args)).toBe('debug');
  });

  it('should recognise --help and -h without declaring them', () => {
    expect(parseArgs(['--help'], FLAGS).flags.has('help')).toBe(true);
    expect(parseArgs(['-h'], FLAGS).flags.has('help')).toBe(true);
  });

  it('should reject unknown options', () => {
    expect(() => parseArgs(['--verbose'], FLAGS)).toThrow('Unknown option: --verbose');
  });

  it('should reject a string option without a value', () => {
    expect(() => parseArgs(['--port'], FLAGS)).toThrow('Option --port requires a value');
    expect(() => parseArgs(['--port', '--force'], FLAGS)).toThrow(ConfigurationError);
  });

  it('should reject a value on a boolean option', () => {
    expect(() => parseArgs(['--force=yes'], FLAGS)).toThrow('Option --force does not take a value');
  });

  it('should reject non-numeric numbers and unknown log levels', () => {
    expect(() => numberFlag(parseArgs(['--port', 'http'], FLAGS), 'port')).toThrow(
      'Option --port must be a number, got "http"',
    );
    expect(() => logLevelFlag(parseArgs(['--log-level', 'trace'], FLAGS))).toThrow(
      'Option --log-level must be one of error, warn, info, debug, got "trace"',
    );
  });

  it('should return undefined for absent flags', () => {
    const args = parseArgs([], FLAGS);
    expect(stringFlag(args, 'port')).toBeUndefined();
    expect(numberFlag(args, 'port')).toBeUndefined();
    expect(logLevelFlag(args)).toBeUndefined();
  });
});

describe('defined', () => {
  it('should drop undefined entries', () => {
    expect(defined({ host: 'a', port: undefined, maxSessions: 3 })).toEqual({
      host: 'a',
      maxSessions: 3,
    });
  });
});
