import { describe, it, expect } from 'vitest';
import { assertTableName, ddlCreateGinIndex, ddlCreateTable } from '../../src/search/schema.js';
import { mapRow } from '../../src/search/row-mapper.js';
import { ConfigError } from '../../src/errors.js';

describe('ddlCreateTable', () => {
  it('creates the documents table if missing', () => {
    expect(ddlCreateTable('documents')).toMatch(/^CREATE TABLE IF NOT EXISTS documents \(/);
  });

  it('defines doc_id as TEXT PRIMARY KEY and source as JSONB NOT NULL', () => {
    const ddl = ddlCreateTable('documents');
    expect(ddl).toMatch(/doc_id\s+TEXT\s+PRIMARY KEY/);
    expect(ddl).toMatch(/source\s+JSONB\s+NOT NULL/);
  });
});

describe('ddlCreateGinIndex', () => {
  it('indexes source for containment queries', () => {
    expect(ddlCreateGinIndex('docs')).toBe(
      'CREATE INDEX IF NOT EXISTS idx_docs_source_gin\n  ON docs USING GIN (source jsonb_path_ops)',
    );
  });
});

describe('assertTableName', () => {
  it('accepts plain identifiers', () => {
    expect(assertTableName('search_docs_2')).toBe('search_docs_2');
  });

  it('rejects anything else', () => {
    expect(() => assertTableName('docs; DROP TABLE x')).toThrow(ConfigError);
    expect(() => assertTableName('2docs')).toThrow('[2docs] is not a valid table name');
  });
});

describe('mapRow', () => {
  it('converts the score and resolves matched names by position', () => {
    const hit = mapRow(
      { doc_id: 'd1', source: { a: 1 }, score: '1.5', matched: [false, true] },
      ['first', 'second'],
    );
    expect(hit).toEqual({ id: 'd1', score: 1.5, source: { a: 1 }, matchedQueries: ['second'] });
  });

  it('treats a null matched array as no matches', () => {
    expect(mapRow({ doc_id: 'd1', source: {}, score: 0, matched: null }, ['x']).matchedQueries).toEqual([]);
  });
});
