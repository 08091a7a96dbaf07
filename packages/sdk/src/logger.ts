/**
 * Logging
 * @module logger
 */

import { pino } from 'pino';
import type { Logger, LevelWithSilent } from 'pino';

export type { Logger } from 'pino';

export interface LoggerConfig {
  name?: string;
  level?: LevelWithSilent;
}

/**
 * Creates the root logger. Components derive children with `{ module }`.
 */
export function createLogger(config: LoggerConfig = {}): Logger {
  const level = config.level ?? parseLevel(process.env.LOG_LEVEL) ?? 'info';

  return pino({
    name: config.name ?? 'household-sync',
    level,
  });
}

const LEVELS: readonly LevelWithSilent[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
];

function parseLevel(value: string | undefined): LevelWithSilent | undefined {
  return LEVELS.find((level) => level === value);
}
