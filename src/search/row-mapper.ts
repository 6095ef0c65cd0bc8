import type { SearchHit } from '../types.js';

// Must stay a type alias: pg's QueryResultRow needs an index signature.
export type DocumentRow = {
  doc_id: string;
  source: Record<string, unknown>; // pg auto-parses JSONB
  score: string | number;          // NUMERIC arrives as string, FLOAT8 as number
  matched: boolean[] | null;
};

export function mapRow(row: DocumentRow, namedQueries: readonly string[]): SearchHit {
  const matched = row.matched ?? [];
  return {
    id: row.doc_id,
    score: Number(row.score),
    source: row.source,
    matchedQueries: namedQueries.filter((_, i) => matched[i] === true),
  };
}
