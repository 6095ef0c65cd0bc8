import { ParsingError, QueryConstructionError } from '../errors.js';
import type { StreamInput, StreamOutput } from '../io/stream.js';
import { isValue, type Token } from '../xcontent/token.js';
import { AbstractQueryNode, BOOST_FIELD, NAME_FIELD, readBoost } from './abstract-query.js';
import { readQuery, writeQuery } from './codec.js';
import { matchAllQuery, matchNoneQuery, type ExecutableQuery } from './executable.js';
import { combineHashes, hashNumber } from './hash.js';
import { MatchAllQueryNode } from './match-all.js';
import type { QueryParseContext } from './parse-context.js';
import { ParseField } from './parse-field.js';
import type { QueryRegistry } from './registry.js';
import type { QueryRewriteContext } from './rewrite.js';
import type { QueryShardContext } from './shard-context.js';
import { DEFAULT_BOOST, type JsonValue, type QueryNode, type XContentObject } from './types.js';

const MUST = new ParseField('must');
const FILTER = new ParseField('filter');
const SHOULD = new ParseField('should');
const MUST_NOT = new ParseField('must_not', ['mustNot']);
const MINIMUM_SHOULD_MATCH = new ParseField('minimum_should_match', ['minimumShouldMatch']);
const ADJUST_PURE_NEGATIVE = new ParseField('adjust_pure_negative');

type Occur = 'must' | 'filter' | 'should' | 'mustNot';

const OCCURS: readonly Occur[] = ['must', 'filter', 'should', 'mustNot'];

function listsEqual(a: readonly QueryNode[], b: readonly QueryNode[]): boolean {
  return a.length === b.length && a.every((node, i) => {
    const other = b[i];
    return other !== undefined && node.equals(other);
  });
}

/**
 * Boolean combination of clauses. `must` and `should` clauses score,
 * `filter` and `must_not` clauses only restrict the match set.
 */
export class BoolQueryNode extends AbstractQueryNode {
  static readonly NAME = 'bool';
  static readonly ADJUST_PURE_NEGATIVE_DEFAULT = true;

  readonly writeableName = BoolQueryNode.NAME;

  private readonly clauses: Record<Occur, QueryNode[]> = {
    must: [],
    filter: [],
    should: [],
    mustNot: [],
  };
  private minimumShouldMatchValue: number | null = null;
  private adjustPureNegativeValue = BoolQueryNode.ADJUST_PURE_NEGATIVE_DEFAULT;

  must(query: QueryNode): this {
    return this.add('must', query);
  }

  filter(query: QueryNode): this {
    return this.add('filter', query);
  }

  should(query: QueryNode): this {
    return this.add('should', query);
  }

  mustNot(query: QueryNode): this {
    return this.add('mustNot', query);
  }

  mustClauses(): readonly QueryNode[] {
    return this.clauses.must;
  }

  filterClauses(): readonly QueryNode[] {
    return this.clauses.filter;
  }

  shouldClauses(): readonly QueryNode[] {
    return this.clauses.should;
  }

  mustNotClauses(): readonly QueryNode[] {
    return this.clauses.mustNot;
  }

  hasClauses(): boolean {
    return OCCURS.some((occur) => this.clauses[occur].length > 0);
  }

  minimumShouldMatch(): number | null;
  minimumShouldMatch(value: number | null): this;
  minimumShouldMatch(value?: number | null): number | null | this {
    if (value === undefined) return this.minimumShouldMatchValue;
    this.assertMutable();
    if (value !== null && (!Number.isInteger(value) || value < 0)) {
      throw new QueryConstructionError(`[${BoolQueryNode.NAME}] minimum_should_match must be a non-negative integer, got [${value}]`);
    }
    this.minimumShouldMatchValue = value;
    return this;
  }

  adjustPureNegative(): boolean;
  adjustPureNegative(value: boolean): this;
  adjustPureNegative(value?: boolean): boolean | this {
    if (value === undefined) return this.adjustPureNegativeValue;
    this.assertMutable();
    this.adjustPureNegativeValue = value;
    return this;
  }

  protected override children(): readonly QueryNode[] {
    return OCCURS.flatMap((occur) => this.clauses[occur]);
  }

  protected doXContent(): XContentObject {
    const body: XContentObject = {};
    const print = (name: string, nodes: readonly QueryNode[]): void => {
      if (nodes.length > 0) {
        body[name] = nodes.map((n): JsonValue => n.toXContent());
      }
    };
    print(MUST.getPreferredName(), this.clauses.must);
    print(FILTER.getPreferredName(), this.clauses.filter);
    print(MUST_NOT.getPreferredName(), this.clauses.mustNot);
    print(SHOULD.getPreferredName(), this.clauses.should);
    body[ADJUST_PURE_NEGATIVE.getPreferredName()] = this.adjustPureNegativeValue;
    if (this.minimumShouldMatchValue !== null) {
      body[MINIMUM_SHOULD_MATCH.getPreferredName()] = this.minimumShouldMatchValue;
    }
    return this.printBoostAndQueryName(body);
  }

  static fromXContent(context: QueryParseContext): BoolQueryNode {
    const stream = context.stream;
    const node = new BoolQueryNode();
    let boost = DEFAULT_BOOST;
    let queryName: string | null = null;

    const occurFor = (fieldName: string | null): Occur => {
      if (context.match(fieldName, MUST)) return 'must';
      if (context.match(fieldName, FILTER)) return 'filter';
      if (context.match(fieldName, SHOULD)) return 'should';
      if (context.match(fieldName, MUST_NOT)) return 'mustNot';
      throw new ParsingError(
        stream.tokenLocation(),
        `[${BoolQueryNode.NAME}] query does not support [${String(fieldName)}]`,
      );
    };

    let currentFieldName: string | null = null;
    let token: Token | null;
    while ((token = stream.nextToken()) !== 'END_OBJECT') {
      if (token === null) {
        throw new ParsingError(stream.tokenLocation(), `[${BoolQueryNode.NAME}] unexpected end of input`);
      }
      if (token === 'FIELD_NAME') {
        currentFieldName = stream.currentName();
      } else if (context.isDeprecatedSetting(currentFieldName)) {
        stream.skipChildren();
      } else if (token === 'START_OBJECT') {
        node.add(occurFor(currentFieldName), context.parseInnerQuery());
      } else if (token === 'START_ARRAY') {
        const occur = occurFor(currentFieldName);
        while ((token = stream.nextToken()) !== 'END_ARRAY') {
          if (token !== 'START_OBJECT') {
            throw new ParsingError(
              stream.tokenLocation(),
              `[${BoolQueryNode.NAME}] query malformed, expected an object in [${String(currentFieldName)}] but found [${String(token)}]`,
            );
          }
          node.add(occur, context.parseInnerQuery());
        }
      } else if (isValue(token)) {
        if (context.match(currentFieldName, MINIMUM_SHOULD_MATCH)) {
          const minimum = stream.intValue();
          if (minimum < 0) {
            throw new ParsingError(
              stream.tokenLocation(),
              `[${BoolQueryNode.NAME}] minimum_should_match must be non-negative, got [${minimum}]`,
            );
          }
          node.minimumShouldMatch(minimum);
        } else if (context.match(currentFieldName, ADJUST_PURE_NEGATIVE)) {
          node.adjustPureNegative(stream.booleanValue());
        } else if (context.match(currentFieldName, BOOST_FIELD)) {
          boost = readBoost(stream);
        } else if (context.match(currentFieldName, NAME_FIELD)) {
          queryName = stream.text();
        } else {
          throw new ParsingError(
            stream.tokenLocation(),
            `[${BoolQueryNode.NAME}] query does not support [${String(currentFieldName)}]`,
          );
        }
      } else {
        throw new ParsingError(stream.tokenLocation(), `unexpected token [${token}]`);
      }
    }
    return node.setBoost(boost).setQueryName(queryName);
  }

  static readFrom(input: StreamInput, registry: QueryRegistry): BoolQueryNode {
    const node = new BoolQueryNode();
    for (const occur of OCCURS) {
      const count = input.readVInt();
      for (let i = 0; i < count; i++) {
        node.add(occur, readQuery(input, registry));
      }
    }
    node.adjustPureNegative(input.readBoolean());
    const hasMinimum = input.readBoolean();
    node.minimumShouldMatch(hasMinimum ? input.readVInt() : null);
    return node;
  }

  protected doWriteTo(out: StreamOutput): void {
    for (const occur of OCCURS) {
      const nodes = this.clauses[occur];
      out.writeVInt(nodes.length);
      for (const n of nodes) {
        writeQuery(out, n);
      }
    }
    out.writeBoolean(this.adjustPureNegativeValue);
    out.writeBoolean(this.minimumShouldMatchValue !== null);
    if (this.minimumShouldMatchValue !== null) {
      out.writeVInt(this.minimumShouldMatchValue);
    }
  }

  protected doToQuery(context: QueryShardContext): ExecutableQuery | null {
    if (!this.hasClauses()) {
      return matchAllQuery();
    }

    const compile = (nodes: readonly QueryNode[], asFilter: boolean): ExecutableQuery[] =>
      nodes
        .map((n) => (asFilter ? n.toFilter(context) : n.toQuery(context)))
        .filter((q): q is ExecutableQuery => q !== null);

    const must = compile(this.clauses.must, false);
    const filter = compile(this.clauses.filter, true);
    const should = compile(this.clauses.should, false);
    const mustNot = compile(this.clauses.mustNot, true);

    if (must.length + filter.length + should.length + mustNot.length === 0) {
      return matchNoneQuery();
    }

    if (this.adjustPureNegativeValue && must.length + filter.length + should.length === 0) {
      must.push(matchAllQuery());
    }

    const required = must.length + filter.length;
    const minimumShouldMatch = should.length === 0
      ? 0
      : Math.min(this.minimumShouldMatchValue ?? (required === 0 ? 1 : 0), should.length);

    return { kind: 'bool', must, filter, should, mustNot, minimumShouldMatch };
  }

  protected override doRewrite(context: QueryRewriteContext): QueryNode {
    if (!this.hasClauses()) {
      return new MatchAllQueryNode();
    }

    let changed = false;
    const rewritten = new BoolQueryNode();
    for (const occur of OCCURS) {
      for (const n of this.clauses[occur]) {
        const r = n.rewrite(context);
        if (r !== n) changed = true;
        rewritten.add(occur, r);
      }
    }
    if (!changed) {
      return this;
    }
    rewritten.adjustPureNegative(this.adjustPureNegativeValue);
    rewritten.minimumShouldMatch(this.minimumShouldMatchValue);
    return rewritten;
  }

  protected doHashCode(): number {
    return combineHashes(
      ...OCCURS.map((occur) => combineHashes(...this.clauses[occur].map((n) => n.hashCode()))),
      this.adjustPureNegativeValue ? 1231 : 1237,
      this.minimumShouldMatchValue === null ? 0 : hashNumber(this.minimumShouldMatchValue),
    );
  }

  protected doEquals(other: QueryNode): boolean {
    return (
      other instanceof BoolQueryNode &&
      this.adjustPureNegativeValue === other.adjustPureNegativeValue &&
      this.minimumShouldMatchValue === other.minimumShouldMatchValue &&
      OCCURS.every((occur) => listsEqual(this.clauses[occur], other.clauses[occur]))
    );
  }

  private add(occur: Occur, query: QueryNode): this {
    this.assertMutable();
    this.clauses[occur].push(query);
    return this;
  }

}
