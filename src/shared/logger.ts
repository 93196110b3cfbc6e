/**
 * Leveled console logging for the tunnel processes.
 *
 *   2026-02-21T12:00:00.000Z INFO  [listener] Listening on 0.0.0.0:8888
 *
 * The threshold is the `--log-level` flag (setLogLevel) when given, else
 * `LOG_LEVEL`, read on first use so the entry points can load `.env` before
 * anything is logged. error and warn go to stderr, the rest to stdout; the
 * level tag is coloured only when that stream is a terminal and NO_COLOR is
 * unset.
 */

export const LEVELS = { error: 0, warn: 1, info: 2, debug: 3 } as const;
export type LevelName = keyof typeof LEVELS;

const COLORS: Record<LevelName, number> = { error: 31, warn: 33, info: 32, debug: 90 };

export function isLevelName(value: string): value is LevelName {
  return Object.hasOwn(LEVELS, value);
}

let flagLevel: LevelName | null = null;
let envLevel: LevelName | null = null;

function threshold(): number {
  if (flagLevel !== null) return LEVELS[flagLevel];
  if (envLevel === null) {
    const env = (process.env.LOG_LEVEL ?? '').toLowerCase();
    envLevel = isLevelName(env) ? env : 'info';
  }
  return LEVELS[envLevel];
}

/**
 * Set the level for every logger. `null` drops the override and re-reads
 * `LOG_LEVEL` on the next message.
 */
export function setLogLevel(level: LevelName | null): void {
  flagLevel = level;
  envLevel = null;
}

function isLevelEnabled(level: LevelName): boolean {
  return LEVELS[level] <= threshold();
}

function formatLine(
  level: LevelName,
  module: string,
  message: string,
  now: Date = new Date(),
  color = false,
): string {
  const tag = level.toUpperCase().padEnd(5);
  const shown = color ? `\x1b[${COLORS[level]}m${tag}\x1b[0m` : tag;
  return `${now.toISOString()} ${shown} [${module}] ${message}`;
}

function useColor(stream: NodeJS.WriteStream): boolean {
  return Boolean(stream.isTTY) && process.env.NO_COLOR === undefined;
}

export interface Logger {
  error(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}

/** Logger whose lines carry `module` as their label. */
export function createLogger(module: string): Logger {
  const emit = (level: LevelName, message: string, args: unknown[]) => {
    if (!isLevelEnabled(level)) return;
    if (level === 'error' || level === 'warn') {
      console.error(formatLine(level, module, message, new Date(), useColor(process.stderr)), ...args);
    } else {
      console.log(formatLine(level, module, message, new Date(), useColor(process.stdout)), ...args);
    }
  };

  return {
    error: (message, ...args) => emit('error', message, args),
    warn: (message, ...args) => emit('warn', message, args),
    info: (message, ...args) => emit('info', message, args),
    debug: (message, ...args) => emit('debug', message, args),
  };
}
