import type { ExecutableQuery } from './executable.js';
import { matchNoneQuery } from './executable.js';
import type { QueryNode } from './types.js';

/**
 * Request-scoped state consulted while compiling a tree: whether the current
 * clause is compiled in filter mode, and the compiled form of every named
 * clause. Not shared between requests.
 */
export class QueryShardContext {
  private filter = false;
  private readonly named = new Map<string, ExecutableQuery>();

  isFilter(): boolean {
    return this.filter;
  }

  setIsFilter(filter: boolean): void {
    this.filter = filter;
  }

  addNamedQuery(name: string, query: ExecutableQuery): void {
    this.named.set(name, query);
  }

  namedQueries(): ReadonlyMap<string, ExecutableQuery> {
    return this.named;
  }

  /** Compile a whole tree. A tree that compiles to nothing matches nothing. */
  toQuery(node: QueryNode): ExecutableQuery {
    return node.toQuery(this) ?? matchNoneQuery();
  }
}
