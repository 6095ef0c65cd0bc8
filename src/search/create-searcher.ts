import pg from 'pg';
import type { SearchConfig } from '../config.js';
import { ConfigError } from '../errors.js';
import { createLogger } from '../logger.js';
import { ParseFieldMatcher } from '../query/parse-field.js';
import { PostgresDocumentSearcher } from './searcher.js';

/**
 * Builds a searcher from loaded configuration. A pool may be passed in; one is
 * created from `DATABASE_URL` otherwise.
 */
export function createSearcher(config: SearchConfig, pool?: pg.Pool): PostgresDocumentSearcher {
  const logger = createLogger(config.LOG_LEVEL);
  let resolvedPool = pool;
  if (resolvedPool === undefined) {
    if (config.DATABASE_URL === undefined) {
      throw new ConfigError({ DATABASE_URL: ['required when no pool is given'] });
    }
    resolvedPool = new pg.Pool({ connectionString: config.DATABASE_URL });
  }
  return new PostgresDocumentSearcher({
    pool: resolvedPool,
    table: config.SEARCH_TABLE,
    matcher: new ParseFieldMatcher(config.STRICT_PARSING, logger.child({ module: 'deprecation' })),
    logger,
  });
}
