import type { ExecutableQuery } from './query/executable.js';
import type { QueryNode } from './query/types.js';

export interface NewDocument<S = Record<string, unknown>> {
  id: string;
  source: S;
}

export interface SearchHit<S = Record<string, unknown>> {
  id: string;
  score: number;
  source: S;
  /** Names of the named clauses this document matched. */
  matchedQueries: string[];
}

export interface SearchResult {
  hits: SearchHit[];
  maxScore: number | null;
  /** The executable form the tree compiled to. */
  query: ExecutableQuery;
}

export interface SearchOptions {
  from?: number;
  size?: number;
}

export interface DocumentSearcher {
  initializeSchema(): Promise<void>;
  index(documents: NewDocument | NewDocument[]): Promise<number>;
  search(query: QueryNode, options?: SearchOptions): Promise<SearchResult>;
  searchJson(json: string, options?: SearchOptions): Promise<SearchResult>;
  count(query: QueryNode): Promise<number>;
  close(): Promise<void>;
}
