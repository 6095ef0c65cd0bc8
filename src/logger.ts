import { pino, type LevelWithSilent, type Logger } from 'pino';

export type { Logger } from 'pino';

export function createLogger(level: LevelWithSilent = 'info'): Logger {
  return pino({ name: 'search-query-tree', level });
}

/** Library-wide default. Searchers built from config get their own level. */
export const logger = createLogger();
