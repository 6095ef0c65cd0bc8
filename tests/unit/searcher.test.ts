import { describe, it, expect, vi } from 'vitest';
import pg from 'pg';
import { PostgresDocumentSearcher } from '../../src/search/searcher.js';
import { createSearcher } from '../../src/search/create-searcher.js';
import { ddlCreateGinIndex, ddlCreateTable } from '../../src/search/schema.js';
import { loadConfig } from '../../src/config.js';
import { createLogger } from '../../src/logger.js';
import { query } from '../../src/query/query-object.js';
import { ParseFieldMatcher } from '../../src/query/parse-field.js';
import { ConfigError, ParsingError, SearchError } from '../../src/errors.js';

const logger = createLogger('silent');

function makeRow(overrides: Partial<Record<string, unknown>> = {}) {
  return {
    doc_id: 'd1',
    source: { status: 'published' },
    score: 2,
    matched: [true],
    ...overrides,
  };
}

describe('PostgresDocumentSearcher.search() (unit)', () => {
  it('runs the compiled tree and maps hits', async () => {
    const pool = {
      query: vi.fn().mockResolvedValue({
        rows: [makeRow({ score: '2' }), makeRow({ doc_id: 'd2', matched: [false] })],
      }),
    };
    const searcher = new PostgresDocumentSearcher({ pool: pool as unknown as pg.Pool, logger });
    const tree = query.constantScore(query.term('status', 'published')).setBoost(2).setQueryName('pub');

    const result = await searcher.search(tree);

    expect(pool.query).toHaveBeenCalledWith(
      [
        'SELECT doc_id, source, (1.0 * $2::float8) AS score, ARRAY[source @> $3::jsonb]::boolean[] AS matched',
        'FROM documents',
        'WHERE source @> $1::jsonb',
        'ORDER BY score DESC, doc_id ASC',
        'LIMIT $4 OFFSET $5',
      ].join('\n'),
      ['{"status":"published"}', 2, '{"status":"published"}', 10, 0],
    );
    expect(result.hits).toEqual([
      { id: 'd1', score: 2, source: { status: 'published' }, matchedQueries: ['pub'] },
      { id: 'd2', score: 2, source: { status: 'published' }, matchedQueries: [] },
    ]);
    expect(result.maxScore).toBe(2);
    expect(result.query).toEqual({
      kind: 'boost',
      boost: 2,
      query: { kind: 'constant_score', filter: { kind: 'term', field: 'status', value: 'published' } },
    });
    expect(tree.sealed).toBe(true);
  });

  it('rewrites wrapped source before compiling', async () => {
    const pool = { query: vi.fn().mockResolvedValue({ rows: [] }) };
    const searcher = new PostgresDocumentSearcher({ pool: pool as unknown as pg.Pool, logger });
    const result = await searcher.search(query.constantScore(query.wrapper({ term: { a: 'b' } })));
    expect(result.query).toEqual({ kind: 'constant_score', filter: { kind: 'term', field: 'a', value: 'b' } });
    expect(result.maxScore).toBeNull();
  });

  it('matches nothing for a tree that compiles to nothing', async () => {
    const pool = { query: vi.fn().mockResolvedValue({ rows: [] }) };
    const searcher = new PostgresDocumentSearcher({ pool: pool as unknown as pg.Pool, logger });
    const result = await searcher.searchJson('{"constant_score":{"filter":{}}}', { from: 20, size: 5 });
    expect(result.query).toEqual({ kind: 'match_none' });
    expect(pool.query).toHaveBeenCalledWith(
      [
        'SELECT doc_id, source, 0.0 AS score, ARRAY[]::boolean[] AS matched',
        'FROM documents',
        'WHERE FALSE',
        'ORDER BY score DESC, doc_id ASC',
        'LIMIT $1 OFFSET $2',
      ].join('\n'),
      [5, 20],
    );
  });

  it('rejects deprecated names before querying when strict', async () => {
    const pool = { query: vi.fn() };
    const searcher = new PostgresDocumentSearcher({
      pool: pool as unknown as pg.Pool,
      matcher: ParseFieldMatcher.STRICT,
      logger,
    });
    await expect(searcher.searchJson('{"constant_score":{"query":{"match_all":{}}}}')).rejects.toThrow(ParsingError);
    expect(pool.query).not.toHaveBeenCalled();
  });

  it('rejects a negative offset', async () => {
    const searcher = new PostgresDocumentSearcher({ pool: { query: vi.fn() } as unknown as pg.Pool, logger });
    await expect(searcher.search(query.matchAll(), { from: -1 }))
      .rejects.toThrow('[from] must be a non-negative integer, got [-1]');
  });

  it('wraps database failures in SearchError', async () => {
    const pool = { query: vi.fn().mockRejectedValue(new Error('boom')) };
    const searcher = new PostgresDocumentSearcher({ pool: pool as unknown as pg.Pool, logger });
    const promise = searcher.search(query.matchAll());
    await expect(promise).rejects.toThrow(SearchError);
    await expect(promise).rejects.toThrow('Failed to search documents: Error: boom');
  });
});

describe('PostgresDocumentSearcher.count() (unit)', () => {
  it('returns the total as a number', async () => {
    const pool = { query: vi.fn().mockResolvedValue({ rows: [{ total: '7' }] }) };
    const searcher = new PostgresDocumentSearcher({ pool: pool as unknown as pg.Pool, logger });
    expect(await searcher.count(query.term('a', 'b'))).toBe(7);
    expect(pool.query).toHaveBeenCalledWith(
      'SELECT COUNT(*) AS total\nFROM documents\nWHERE source @> $1::jsonb',
      ['{"a":"b"}'],
    );
  });
});

describe('PostgresDocumentSearcher.index() (unit)', () => {
  it('upserts every document in one transaction', async () => {
    const mockClient = {
      query: vi.fn().mockResolvedValue({}),
      release: vi.fn(),
    };
    const pool = { connect: vi.fn().mockResolvedValue(mockClient) } as unknown as pg.Pool;
    const searcher = new PostgresDocumentSearcher({ pool, logger });

    const written = await searcher.index([
      { id: 'd1', source: { a: 1 } },
      { id: 'd2', source: { a: 2 } },
    ]);

    expect(written).toBe(2);
    expect(mockClient.query).toHaveBeenCalledTimes(4);
    expect(mockClient.query.mock.calls[0]?.[0]).toBe('BEGIN');
    expect(mockClient.query.mock.calls[1]?.[1]).toEqual(['d1', { a: 1 }]);
    expect(mockClient.query.mock.calls[2]?.[1]).toEqual(['d2', { a: 2 }]);
    expect(mockClient.query.mock.calls[3]?.[0]).toBe('COMMIT');
    expect(mockClient.release).toHaveBeenCalledOnce();
  });

  it('rolls back and releases the client on failure', async () => {
    const mockClient = {
      query: vi.fn()
        .mockResolvedValueOnce({}) // BEGIN
        .mockRejectedValueOnce(new Error('dup')) // INSERT
        .mockResolvedValueOnce({}), // ROLLBACK
      release: vi.fn(),
    };
    const pool = { connect: vi.fn().mockResolvedValue(mockClient) } as unknown as pg.Pool;
    const searcher = new PostgresDocumentSearcher({ pool, logger });

    await expect(searcher.index({ id: 'd1', source: {} })).rejects.toThrow('Failed to index documents: Error: dup');
    expect(mockClient.query.mock.calls[2]?.[0]).toBe('ROLLBACK');
    expect(mockClient.release).toHaveBeenCalledOnce();
  });
});

describe('PostgresDocumentSearcher lifecycle (unit)', () => {
  it('applies the schema on one client', async () => {
    const mockClient = { query: vi.fn().mockResolvedValue({}), release: vi.fn() };
    const pool = { connect: vi.fn().mockResolvedValue(mockClient) } as unknown as pg.Pool;
    await new PostgresDocumentSearcher({ pool, table: 'docs', logger }).initializeSchema();
    expect(mockClient.query.mock.calls.map((call) => call[0])).toEqual([
      ddlCreateTable('docs'),
      ddlCreateGinIndex('docs'),
    ]);
    expect(mockClient.release).toHaveBeenCalledOnce();
  });

  it('ends the pool on close', async () => {
    const pool = { end: vi.fn().mockResolvedValue(undefined) };
    await new PostgresDocumentSearcher({ pool: pool as unknown as pg.Pool, logger }).close();
    expect(pool.end).toHaveBeenCalledOnce();
  });

  it('rejects table names that are not identifiers', () => {
    expect(() => new PostgresDocumentSearcher({ pool: {} as unknown as pg.Pool, table: 'docs; drop', logger }))
      .toThrow(ConfigError);
  });
});

describe('createSearcher', () => {
  it('uses the configured table', async () => {
    const pool = { query: vi.fn().mockResolvedValue({ rows: [{ total: '0' }] }) };
    const searcher = createSearcher(loadConfig({ SEARCH_TABLE: 'docs', LOG_LEVEL: 'silent' }), pool as unknown as pg.Pool);
    await searcher.count(query.matchAll());
    expect(pool.query).toHaveBeenCalledWith('SELECT COUNT(*) AS total\nFROM docs\nWHERE TRUE', []);
  });

  it('rejects deprecated names when strict parsing is configured', async () => {
    const pool = { query: vi.fn() };
    const searcher = createSearcher(
      loadConfig({ STRICT_PARSING: 'true', LOG_LEVEL: 'silent' }),
      pool as unknown as pg.Pool,
    );
    await expect(searcher.searchJson('{"bool":{"mustNot":{"match_all":{}}}}')).rejects.toThrow(
      'Deprecated field [mustNot] used, expected [must_not] instead',
    );
  });

  it('needs a database URL when no pool is given', () => {
    let error: unknown;
    try {
      createSearcher(loadConfig({ LOG_LEVEL: 'silent' }));
    } catch (err) {
      error = err;
    }
    expect(error).toBeInstanceOf(ConfigError);
    expect(error instanceof ConfigError ? Object.keys(error.fieldErrors) : []).toEqual(['DATABASE_URL']);
  });
});
