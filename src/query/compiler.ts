import type { ExecutableQuery, TermValue } from './executable.js';

export interface CompiledQuery {
  sql: string;
  params: unknown[];
}

export interface CompiledSearch extends CompiledQuery {
  /** Names of the `matched` array entries, in order. */
  namedQueries: string[];
}

export interface SearchQueryOptions {
  table: string;
  from: number;
  size: number;
}

/**
 * A compiled predicate plus its score expression. The score is rendered on
 * demand so that parameters used only for scoring are never bound for
 * clauses whose score is discarded (filters, exclusions).
 */
interface Fragment {
  where: string;
  score: () => string;
}

function constant(where: string, score: string): Fragment {
  return { where, score: () => score };
}

/** `a.b` + v → {"a":{"b":v}} */
function containment(field: string, value: TermValue): string {
  const nested = field
    .split('.')
    .reduceRight<unknown>((acc, key) => ({ [key]: acc }), value);
  return JSON.stringify(nested);
}

function joinAll(parts: string[], op: string, empty: string): string {
  if (parts.length === 0) return empty;
  if (parts.length === 1) return parts[0] ?? empty;
  return `(${parts.join(` ${op} `)})`;
}

function compileBool(
  query: Extract<ExecutableQuery, { kind: 'bool' }>,
  params: unknown[],
  counter: { n: number },
): Fragment {
  const must = query.must.map((q) => compileNode(q, params, counter));
  const filter = query.filter.map((q) => compileNode(q, params, counter));
  const mustNot = query.mustNot.map((q) => compileNode(q, params, counter));
  const should = query.should.map((q) => compileNode(q, params, counter));

  const conditions = [
    ...must.map((f) => f.where),
    ...filter.map((f) => f.where),
    ...mustNot.map((f) => `NOT (${f.where})`),
  ];

  if (should.length > 0 && query.minimumShouldMatch > 0) {
    if (query.minimumShouldMatch === 1) {
      conditions.push(`(${should.map((f) => f.where).join(' OR ')})`);
    } else {
      const hits = should.map((f) => `CASE WHEN ${f.where} THEN 1 ELSE 0 END`).join(' + ');
      params.push(query.minimumShouldMatch);
      counter.n += 1;
      conditions.push(`(${hits}) >= $${counter.n}::int`);
    }
  }

  return {
    where: joinAll(conditions, 'AND', 'TRUE'),
    score: () => joinAll(
      [
        ...must.map((f) => f.score()),
        ...should.map((f) => `CASE WHEN ${f.where} THEN ${f.score()} ELSE 0.0 END`),
      ],
      '+',
      '0.0',
    ),
  };
}

/**
 * Compiles an ExecutableQuery into a predicate over the `source` JSONB
 * column. Uses a shared counter object so recursive calls share the same
 * parameter sequence.
 */
function compileNode(
  query: ExecutableQuery,
  params: unknown[],
  counter: { n: number },
): Fragment {
  switch (query.kind) {
    case 'match_all':
      return constant('TRUE', '1.0');
    case 'match_none':
      return constant('FALSE', '0.0');
    case 'term': {
      params.push(containment(query.field, query.value));
      counter.n += 1;
      return constant(`source @> $${counter.n}::jsonb`, '1.0');
    }
    case 'constant_score': {
      const inner = compileNode(query.filter, params, counter);
      return constant(inner.where, '1.0');
    }
    case 'boost': {
      const inner = compileNode(query.query, params, counter);
      return {
        where: inner.where,
        score: () => {
          const innerScore = inner.score();
          params.push(query.boost);
          counter.n += 1;
          return `(${innerScore} * $${counter.n}::float8)`;
        },
      };
    }
    case 'bool':
      return compileBool(query, params, counter);
  }
}

/** Predicate only, for embedding in a larger statement. */
export function compilePredicate(query: ExecutableQuery, paramOffset: number = 0): CompiledQuery {
  const params: unknown[] = [];
  const counter = { n: paramOffset };
  const { where } = compileNode(query, params, counter);
  return { sql: where, params };
}

/** Score expression only. */
export function compileScore(query: ExecutableQuery, paramOffset: number = 0): CompiledQuery {
  const params: unknown[] = [];
  const counter = { n: paramOffset };
  const sql = compileNode(query, params, counter).score();
  return { sql, params };
}

/**
 * Compiles a search: matching documents ordered by score, each row carrying a
 * boolean per named query telling whether that clause matched.
 */
export function compileSearchQuery(
  query: ExecutableQuery,
  namedQueries: ReadonlyMap<string, ExecutableQuery>,
  options: SearchQueryOptions,
): CompiledSearch {
  const params: unknown[] = [];
  const counter = { n: 0 };

  const root = compileNode(query, params, counter);
  const score = root.score();
  const matched = [...namedQueries.values()].map((q) => compileNode(q, params, counter).where);

  params.push(options.size);
  counter.n += 1;
  const limitRef = `$${counter.n}`;

  params.push(options.from);
  counter.n += 1;
  const offsetRef = `$${counter.n}`;

  const sql = [
    `SELECT doc_id, source, ${score} AS score, ARRAY[${matched.join(', ')}]::boolean[] AS matched`,
    `FROM ${options.table}`,
    `WHERE ${root.where}`,
    'ORDER BY score DESC, doc_id ASC',
    `LIMIT ${limitRef} OFFSET ${offsetRef}`,
  ].join('\n');

  return { sql, params, namedQueries: [...namedQueries.keys()] };
}

export function compileCountQuery(query: ExecutableQuery, table: string): CompiledQuery {
  const { sql: where, params } = compilePredicate(query);
  const sql = [
    'SELECT COUNT(*) AS total',
    `FROM ${table}`,
    `WHERE ${where}`,
  ].join('\n');
  return { sql, params };
}
