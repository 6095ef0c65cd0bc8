import type { StreamInput, StreamOutput } from '../io/stream.js';
import { AbstractQueryNode } from './abstract-query.js';
import type { ExecutableQuery } from './executable.js';
import type { QueryNode, XContentObject } from './types.js';

/**
 * What `{}` parses to. Compiles to nothing, so enclosing clauses drop it.
 */
export class EmptyQueryNode extends AbstractQueryNode {
  static readonly NAME = 'empty_query';

  readonly writeableName = EmptyQueryNode.NAME;

  static readFrom(_input: StreamInput): EmptyQueryNode {
    return new EmptyQueryNode();
  }

  override toXContent(): XContentObject {
    return {};
  }

  protected doXContent(): XContentObject {
    return {};
  }

  protected doWriteTo(_out: StreamOutput): void {}

  protected doToQuery(): ExecutableQuery | null {
    return null;
  }

  protected doHashCode(): number {
    return 0;
  }

  protected doEquals(other: QueryNode): boolean {
    return other instanceof EmptyQueryNode;
  }
}
