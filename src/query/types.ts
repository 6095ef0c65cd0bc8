import type { StreamOutput } from '../io/stream.js';
import type { ExecutableQuery } from './executable.js';
import type { QueryRewriteContext } from './rewrite.js';
import type { QueryShardContext } from './shard-context.js';

export const DEFAULT_BOOST = 1.0;

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export type XContentObject = { [key: string]: JsonValue };

/**
 * Capability every node of the query tree implements. Generic tree-walking
 * code (codec, rewrite loop, compiler, caches) only ever sees this interface.
 */
export interface QueryNode {
  /** Clause name; also the registry key used on the wire. */
  readonly writeableName: string;
  readonly boost: number;
  readonly queryName: string | null;
  readonly sealed: boolean;

  setBoost(boost: number): this;
  setQueryName(queryName: string | null): this;
  /** Freeze this node and every node below it. */
  seal(): this;

  /** Compile for scoring. `null` means the clause contributes nothing. */
  toQuery(context: QueryShardContext): ExecutableQuery | null;
  /** Compile in filter mode. */
  toFilter(context: QueryShardContext): ExecutableQuery | null;
  /** Returns `this` when nothing changed. Callers loop to a fixed point. */
  rewrite(context: QueryRewriteContext): QueryNode;

  writeTo(out: StreamOutput): void;
  toXContent(): XContentObject;

  equals(other: QueryNode): boolean;
  hashCode(): number;
}
