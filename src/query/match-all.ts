import { ParsingError } from '../errors.js';
import type { StreamOutput } from '../io/stream.js';
import { isValue, type Token } from '../xcontent/token.js';
import { AbstractQueryNode, BOOST_FIELD, NAME_FIELD, readBoost } from './abstract-query.js';
import { matchAllQuery, type ExecutableQuery } from './executable.js';
import type { QueryParseContext } from './parse-context.js';
import { DEFAULT_BOOST, type QueryNode, type XContentObject } from './types.js';

/** Matches every document with score 1 (times boost). */
export class MatchAllQueryNode extends AbstractQueryNode {
  static readonly NAME = 'match_all';

  readonly writeableName = MatchAllQueryNode.NAME;

  protected doXContent(): XContentObject {
    return this.printBoostAndQueryName({});
  }

  static fromXContent(context: QueryParseContext): MatchAllQueryNode {
    const stream = context.stream;
    let queryName: string | null = null;
    let boost = DEFAULT_BOOST;
    let currentFieldName: string | null = null;
    let token: Token | null;
    while ((token = stream.nextToken()) !== 'END_OBJECT') {
      if (token === null) {
        throw new ParsingError(stream.tokenLocation(), `[${MatchAllQueryNode.NAME}] unexpected end of input`);
      }
      if (token === 'FIELD_NAME') {
        currentFieldName = stream.currentName();
      } else if (isValue(token)) {
        if (context.match(currentFieldName, NAME_FIELD)) {
          queryName = stream.text();
        } else if (context.match(currentFieldName, BOOST_FIELD)) {
          boost = readBoost(stream);
        } else {
          throw new ParsingError(
            stream.tokenLocation(),
            `[${MatchAllQueryNode.NAME}] query does not support [${String(currentFieldName)}]`,
          );
        }
      } else {
        throw new ParsingError(stream.tokenLocation(), `unexpected token [${token}]`);
      }
    }
    return new MatchAllQueryNode().setBoost(boost).setQueryName(queryName);
  }

  static readFrom(): MatchAllQueryNode {
    return new MatchAllQueryNode();
  }

  protected doWriteTo(_out: StreamOutput): void {}

  protected doToQuery(): ExecutableQuery | null {
    return matchAllQuery();
  }

  protected doHashCode(): number {
    return 0;
  }

  protected doEquals(other: QueryNode): boolean {
    return other instanceof MatchAllQueryNode;
  }
}
