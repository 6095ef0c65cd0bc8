import { ParsingError, QueryConstructionError } from '../errors.js';
import type { StreamInput, StreamOutput } from '../io/stream.js';
import { isValue, type Token } from '../xcontent/token.js';
import { AbstractQueryNode, BOOST_FIELD, NAME_FIELD, readBoost } from './abstract-query.js';
import { readQuery, writeQuery } from './codec.js';
import { constantScoreQuery, type ExecutableQuery } from './executable.js';
import { combineHashes } from './hash.js';
import type { QueryParseContext } from './parse-context.js';
import { ParseField } from './parse-field.js';
import type { QueryRegistry } from './registry.js';
import type { QueryRewriteContext } from './rewrite.js';
import type { QueryShardContext } from './shard-context.js';
import { DEFAULT_BOOST, type QueryNode, type XContentObject } from './types.js';

const INNER_QUERY_FIELD = new ParseField('filter', ['query']);

/**
 * Wraps a query and gives every document it matches the same score: the
 * boost of this node. The inner query is evaluated as a filter only.
 */
export class ConstantScoreQueryNode extends AbstractQueryNode {
  static readonly NAME = 'constant_score';

  readonly writeableName = ConstantScoreQueryNode.NAME;

  private readonly filterNode: QueryNode;

  /** @param filter query to wrap; owned by this node from now on */
  constructor(filter: QueryNode) {
    super();
    if (filter == null) {
      throw new QueryConstructionError('inner clause [filter] cannot be null.');
    }
    this.filterNode = filter;
  }

  /** The wrapped query. */
  innerQuery(): QueryNode {
    return this.filterNode;
  }

  protected override children(): readonly QueryNode[] {
    return [this.filterNode];
  }

  protected doXContent(): XContentObject {
    return this.printBoostAndQueryName({
      [INNER_QUERY_FIELD.getPreferredName()]: this.filterNode.toXContent(),
    });
  }

  static fromXContent(context: QueryParseContext): ConstantScoreQueryNode {
    const stream = context.stream;

    let query: QueryNode | null = null;
    let queryName: string | null = null;
    let boost = DEFAULT_BOOST;

    let currentFieldName: string | null = null;
    let token: Token | null;
    while ((token = stream.nextToken()) !== 'END_OBJECT') {
      if (token === null) {
        throw new ParsingError(stream.tokenLocation(), `[${ConstantScoreQueryNode.NAME}] unexpected end of input`);
      }
      if (token === 'FIELD_NAME') {
        currentFieldName = stream.currentName();
      } else if (context.isDeprecatedSetting(currentFieldName)) {
        stream.skipChildren();
      } else if (token === 'START_OBJECT') {
        if (context.match(currentFieldName, INNER_QUERY_FIELD)) {
          if (query !== null) {
            throw new ParsingError(
              stream.tokenLocation(),
              `[${ConstantScoreQueryNode.NAME}] accepts only one 'filter' element.`,
            );
          }
          query = context.parseInnerQuery();
        } else {
          throw new ParsingError(
            stream.tokenLocation(),
            `[${ConstantScoreQueryNode.NAME}] query does not support [${String(currentFieldName)}]`,
          );
        }
      } else if (isValue(token)) {
        if (context.match(currentFieldName, NAME_FIELD)) {
          queryName = stream.text();
        } else if (context.match(currentFieldName, BOOST_FIELD)) {
          boost = readBoost(stream);
        } else {
          throw new ParsingError(
            stream.tokenLocation(),
            `[${ConstantScoreQueryNode.NAME}] query does not support [${String(currentFieldName)}]`,
          );
        }
      } else {
        throw new ParsingError(stream.tokenLocation(), `unexpected token [${token}]`);
      }
    }

    if (query === null) {
      throw new ParsingError(
        stream.tokenLocation(),
        `[${ConstantScoreQueryNode.NAME}] requires a 'filter' element`,
      );
    }

    return new ConstantScoreQueryNode(query).setBoost(boost).setQueryName(queryName);
  }

  static readFrom(input: StreamInput, registry: QueryRegistry): ConstantScoreQueryNode {
    return new ConstantScoreQueryNode(readQuery(input, registry));
  }

  protected doWriteTo(out: StreamOutput): void {
    writeQuery(out, this.filterNode);
  }

  protected doToQuery(context: QueryShardContext): ExecutableQuery | null {
    const innerFilter = this.filterNode.toFilter(context);
    if (innerFilter === null) {
      // null so that enclosing queries (e.g. bool) ignore this clause too
      return null;
    }
    return constantScoreQuery(innerFilter);
  }

  protected override doRewrite(context: QueryRewriteContext): QueryNode {
    const rewritten = this.filterNode.rewrite(context);
    if (rewritten !== this.filterNode) {
      return new ConstantScoreQueryNode(rewritten);
    }
    return this;
  }

  protected doHashCode(): number {
    return combineHashes(this.filterNode.hashCode());
  }

  protected doEquals(other: QueryNode): boolean {
    return other instanceof ConstantScoreQueryNode && this.filterNode.equals(other.filterNode);
  }
}
