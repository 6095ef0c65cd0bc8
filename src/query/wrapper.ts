import { ParsingError, QueryConstructionError, QueryShardError } from '../errors.js';
import type { StreamInput, StreamOutput } from '../io/stream.js';
import { JsonTokenStream } from '../xcontent/json-token-stream.js';
import { isValue, type Token } from '../xcontent/token.js';
import { AbstractQueryNode, BOOST_FIELD, NAME_FIELD, readBoost } from './abstract-query.js';
import { BoolQueryNode } from './bool.js';
import type { ExecutableQuery } from './executable.js';
import { combineHashes, hashString } from './hash.js';
import type { QueryParseContext } from './parse-context.js';
import { ParseField } from './parse-field.js';
import type { QueryRewriteContext } from './rewrite.js';
import { DEFAULT_BOOST, type QueryNode, type XContentObject } from './types.js';

const QUERY_FIELD = new ParseField('query');

/**
 * Carries a query as unparsed JSON source (base64 in structured form). It is
 * replaced by the parsed query during rewrite and cannot be compiled itself.
 */
export class WrapperQueryNode extends AbstractQueryNode {
  static readonly NAME = 'wrapper';

  readonly writeableName = WrapperQueryNode.NAME;

  constructor(readonly source: string) {
    super();
    if (source == null || source.trim() === '') {
      throw new QueryConstructionError('query source string must not be null or empty');
    }
  }

  protected doXContent(): XContentObject {
    return this.printBoostAndQueryName({
      [QUERY_FIELD.getPreferredName()]: Buffer.from(this.source, 'utf8').toString('base64'),
    });
  }

  static fromXContent(context: QueryParseContext): WrapperQueryNode {
    const stream = context.stream;
    let source: string | null = null;
    let boost = DEFAULT_BOOST;
    let queryName: string | null = null;

    let currentFieldName: string | null = null;
    let token: Token | null;
    while ((token = stream.nextToken()) !== 'END_OBJECT') {
      if (token === null) {
        throw new ParsingError(stream.tokenLocation(), `[${WrapperQueryNode.NAME}] unexpected end of input`);
      }
      if (token === 'FIELD_NAME') {
        currentFieldName = stream.currentName();
      } else if (isValue(token)) {
        if (context.match(currentFieldName, QUERY_FIELD)) {
          source = Buffer.from(stream.text(), 'base64').toString('utf8');
        } else if (context.match(currentFieldName, BOOST_FIELD)) {
          boost = readBoost(stream);
        } else if (context.match(currentFieldName, NAME_FIELD)) {
          queryName = stream.text();
        } else {
          throw new ParsingError(
            stream.tokenLocation(),
            `[${WrapperQueryNode.NAME}] query does not support [${String(currentFieldName)}]`,
          );
        }
      } else {
        throw new ParsingError(stream.tokenLocation(), `unexpected token [${token}]`);
      }
    }
    if (source === null || source.trim() === '') {
      throw new ParsingError(stream.tokenLocation(), `[${WrapperQueryNode.NAME}] query has no [query] specified`);
    }
    return new WrapperQueryNode(source).setBoost(boost).setQueryName(queryName);
  }

  static readFrom(input: StreamInput): WrapperQueryNode {
    return new WrapperQueryNode(input.readString());
  }

  protected doWriteTo(out: StreamOutput): void {
    out.writeString(this.source);
  }

  protected doToQuery(): ExecutableQuery | null {
    throw new QueryShardError('this query must be rewritten first');
  }

  protected override doRewrite(context: QueryRewriteContext): QueryNode {
    const parsed = context.newParseContext(new JsonTokenStream(this.source)).parseTopLevelQuery();
    if (this.boost !== DEFAULT_BOOST || this.queryName !== null) {
      // Keep the parsed query's own boost/name intact; ours go on the wrapper bool.
      return new BoolQueryNode().must(parsed);
    }
    return parsed;
  }

  protected doHashCode(): number {
    return combineHashes(hashString(this.source));
  }

  protected doEquals(other: QueryNode): boolean {
    return other instanceof WrapperQueryNode && this.source === other.source;
  }
}
