/**
 * Minimal structured logger interface.
 *
 * Wraps console with a named prefix so log lines are easy to grep.
 * Lines below LOG_LEVEL are dropped.
 */

type LogArgs = [string, ...unknown[]];

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  info(...args: LogArgs): void;
  warn(...args: LogArgs): void;
  error(...args: LogArgs): void;
  debug(...args: LogArgs): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function currentThreshold(): number {
  const raw = process.env.LOG_LEVEL;
  if (raw === 'debug' || raw === 'info' || raw === 'warn' || raw === 'error') {
    return LEVEL_RANK[raw];
  }
  return LEVEL_RANK.info;
}

function makeLogger(prefix: string): Logger {
  const enabled = (level: LogLevel) => LEVEL_RANK[level] >= currentThreshold();
  return {
    info(msg, ...args) {
      if (enabled('info')) console.log(`[${prefix}]`, msg, ...args);
    },
    warn(msg, ...args) {
      if (enabled('warn')) console.warn(`[${prefix}]`, msg, ...args);
    },
    error(msg, ...args) {
      if (enabled('error')) console.error(`[${prefix}]`, msg, ...args);
    },
    debug(msg, ...args) {
      if (enabled('debug')) console.debug(`[${prefix}]`, msg, ...args);
    },
  };
}

export function createLogger(prefix: string): Logger {
  return makeLogger(prefix);
}
