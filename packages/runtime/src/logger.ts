/**
 * Logger
 * Named pino loggers shared by the runtime components
 */

import { pino, type Logger, type LevelWithSilent } from 'pino';

export type { Logger };

export function createLogger(name: string, level: LevelWithSilent = 'info'): Logger {
  return pino({ name, level });
}
