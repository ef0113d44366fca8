import 'dotenv/config';
import path from 'node:path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export const DEFAULT_CATALOG_PATH = path.resolve(__dirname, '../catalog/default.json');

function parseLogLevel(raw: string | undefined): LogLevel {
  const level = LOG_LEVELS.find(l => l === raw?.toLowerCase());
  return level ?? 'info';
}

export const CFG = {
  // Pattern catalog (reloadable without code changes)
  CATALOG_PATH: process.env.CATALOG_PATH || DEFAULT_CATALOG_PATH,

  LOG_LEVEL: parseLogLevel(process.env.LOG_LEVEL),

  // Batch runs
  RUNS_DIR: process.env.RUNS_DIR || './runs',

  // 0 keeps every generated question
  MAX_SUGGESTIONS: Number(process.env.MAX_SUGGESTIONS || 0)
};
