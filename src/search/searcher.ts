import type pg from 'pg';
import { SearchError } from '../errors.js';
import { logger as defaultLogger, type Logger } from '../logger.js';
import { compileCountQuery, compileSearchQuery } from '../query/compiler.js';
import type { ExecutableQuery } from '../query/executable.js';
import { ParseFieldMatcher } from '../query/parse-field.js';
import { createDefaultRegistry, type QueryRegistry } from '../query/registry.js';
import { QueryRewriteContext, rewriteQuery } from '../query/rewrite.js';
import { parseQuery } from '../query/serialization.js';
import { QueryShardContext } from '../query/shard-context.js';
import type { QueryNode } from '../query/types.js';
import type { DocumentSearcher, NewDocument, SearchOptions, SearchResult } from '../types.js';
import { mapRow, type DocumentRow } from './row-mapper.js';
import { applySchema, assertTableName } from './schema.js';

export interface DocumentSearcherConfig {
  pool: pg.Pool;
  table?: string;
  registry?: QueryRegistry;
  matcher?: ParseFieldMatcher;
  logger?: Logger;
}

export interface PreparedQuery {
  query: ExecutableQuery;
  namedQueries: ReadonlyMap<string, ExecutableQuery>;
}

const DEFAULT_SIZE = 10;

function assertWindow(from: number, size: number): void {
  if (!Number.isInteger(from) || from < 0) {
    throw new SearchError(`[from] must be a non-negative integer, got [${from}]`);
  }
  if (!Number.isInteger(size) || size < 0) {
    throw new SearchError(`[size] must be a non-negative integer, got [${size}]`);
  }
}

export class PostgresDocumentSearcher implements DocumentSearcher {
  private readonly pool: pg.Pool;
  private readonly table: string;
  private readonly registry: QueryRegistry;
  private readonly matcher: ParseFieldMatcher;
  private readonly log: Logger;

  constructor(config: DocumentSearcherConfig) {
    this.pool = config.pool;
    this.table = assertTableName(config.table ?? 'documents');
    this.registry = config.registry ?? createDefaultRegistry();
    this.matcher = config.matcher ?? ParseFieldMatcher.LENIENT;
    this.log = config.logger ?? defaultLogger;
  }

  async initializeSchema(): Promise<void> {
    const client = await this.pool.connect();
    try {
      await applySchema(client, this.table);
    } finally {
      client.release();
    }
  }

  /** Upserts documents in one transaction. Returns the number written. */
  async index(documents: NewDocument | NewDocument[]): Promise<number> {
    const docs = Array.isArray(documents) ? documents : [documents];
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      for (const doc of docs) {
        await client.query(
          `INSERT INTO ${this.table} (doc_id, source)
        VALUES ($1, $2::jsonb)
        ON CONFLICT (doc_id) DO UPDATE SET source = EXCLUDED.source, indexed_at = NOW()`.trim(),
          [doc.id, doc.source],
        );
      }
      await client.query('COMMIT');
      return docs.length;
    } catch (err) {
      await client.query('ROLLBACK').catch((rollbackErr: unknown) => {
        this.log.warn({ err: rollbackErr }, 'rollback after failed index failed');
      });
      this.log.error({ err }, 'failed to index documents');
      throw new SearchError(`Failed to index documents: ${String(err)}`, err);
    } finally {
      client.release();
    }
  }

  /**
   * Seals the tree, rewrites it to a fixed point and compiles it. A tree that
   * compiles to nothing matches nothing.
   */
  prepare(query: QueryNode): PreparedQuery {
    const rewritten = rewriteQuery(query.seal(), new QueryRewriteContext(this.registry, this.matcher));
    const context = new QueryShardContext();
    const executable = context.toQuery(rewritten);
    return { query: executable, namedQueries: context.namedQueries() };
  }

  async search(query: QueryNode, options: SearchOptions = {}): Promise<SearchResult> {
    const from = options.from ?? 0;
    const size = options.size ?? DEFAULT_SIZE;
    assertWindow(from, size);

    const prepared = this.prepare(query);
    const { sql, params, namedQueries } = compileSearchQuery(prepared.query, prepared.namedQueries, {
      table: this.table,
      from,
      size,
    });
    this.log.debug({ sql, params }, 'executing search');

    let result: pg.QueryResult<DocumentRow>;
    try {
      result = await this.pool.query<DocumentRow>(sql, params);
    } catch (err) {
      this.log.error({ err }, 'search failed');
      throw new SearchError(`Failed to search documents: ${String(err)}`, err);
    }

    const hits = result.rows.map((row) => mapRow(row, namedQueries));
    const maxScore = hits.length > 0 ? Math.max(...hits.map((h) => h.score)) : null;
    return { hits, maxScore, query: prepared.query };
  }

  async searchJson(json: string, options: SearchOptions = {}): Promise<SearchResult> {
    return this.search(parseQuery(json, { registry: this.registry, matcher: this.matcher }), options);
  }

  async count(query: QueryNode): Promise<number> {
    const prepared = this.prepare(query);
    const { sql, params } = compileCountQuery(prepared.query, this.table);
    let result: pg.QueryResult<{ total: string }>;
    try {
      result = await this.pool.query<{ total: string }>(sql, params);
    } catch (err) {
      this.log.error({ err }, 'count failed');
      throw new SearchError(`Failed to count documents: ${String(err)}`, err);
    }
    const row = result.rows[0];
    return row === undefined ? 0 : Number(row.total);
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
