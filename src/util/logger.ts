import { CFG, type LogLevel } from '../config';

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

function enabled(level: LogLevel): boolean {
  return RANK[level] >= RANK[CFG.LOG_LEVEL];
}

export function createLogger(scope: string): Logger {
  const tag = `[${scope}]`;
  return {
    debug: (...args) => { if (enabled('debug')) console.debug(tag, ...args); },
    info: (...args) => { if (enabled('info')) console.log(tag, ...args); },
    warn: (...args) => { if (enabled('warn')) console.warn(tag, ...args); },
    error: (...args) => { if (enabled('error')) console.error(tag, ...args); }
  };
}
