import type pg from 'pg';
import { ConfigError } from '../errors.js';

const IDENTIFIER = /^[a-zA-Z_][a-zA-Z0-9_]{0,62}$/;

/** Table names are interpolated into SQL, so only plain identifiers pass. */
export function assertTableName(table: string): string {
  if (!IDENTIFIER.test(table)) {
    throw new ConfigError({ SEARCH_TABLE: [`[${table}] is not a valid table name`] });
  }
  return table;
}

export function ddlCreateTable(table: string): string {
  return `
CREATE TABLE IF NOT EXISTS ${assertTableName(table)} (
  doc_id      TEXT         PRIMARY KEY,
  source      JSONB        NOT NULL,
  indexed_at  TIMESTAMPTZ  NOT NULL DEFAULT NOW()
)
`.trim();
}

export function ddlCreateGinIndex(table: string): string {
  return `
CREATE INDEX IF NOT EXISTS idx_${assertTableName(table)}_source_gin
  ON ${table} USING GIN (source jsonb_path_ops)
`.trim();
}

export async function applySchema(client: pg.ClientBase, table: string): Promise<void> {
  await client.query(ddlCreateTable(table));
  await client.query(ddlCreateGinIndex(table));
}
