/**
 * Low-level executable queries produced by compiling a query tree. These are
 * what the execution engine runs; see `compiler.ts` for the SQL rendering.
 */
export type TermValue = string | number | boolean;

export type ExecutableQuery =
  | { kind: 'match_all' }
  | { kind: 'match_none' }
  | { kind: 'term'; field: string; value: TermValue }
  | { kind: 'constant_score'; filter: ExecutableQuery }
  | { kind: 'boost'; query: ExecutableQuery; boost: number }
  | {
      kind: 'bool';
      must: ExecutableQuery[];
      filter: ExecutableQuery[];
      should: ExecutableQuery[];
      mustNot: ExecutableQuery[];
      minimumShouldMatch: number;
    };

/** Every document matching `filter` scores the same constant. */
export function constantScoreQuery(filter: ExecutableQuery): ExecutableQuery {
  return { kind: 'constant_score', filter };
}

export function matchAllQuery(): ExecutableQuery {
  return { kind: 'match_all' };
}

export function matchNoneQuery(): ExecutableQuery {
  return { kind: 'match_none' };
}
