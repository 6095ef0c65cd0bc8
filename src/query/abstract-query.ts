import { ParsingError, QueryConstructionError } from '../errors.js';
import type { StreamOutput } from '../io/stream.js';
import type { TokenStream } from '../xcontent/token.js';
import type { ExecutableQuery } from './executable.js';
import { combineHashes, hashNumber, hashString } from './hash.js';
import { ParseField } from './parse-field.js';
import type { QueryRewriteContext } from './rewrite.js';
import type { QueryShardContext } from './shard-context.js';
import { DEFAULT_BOOST, type QueryNode, type XContentObject } from './types.js';

export const BOOST_FIELD = new ParseField('boost');
export const NAME_FIELD = new ParseField('_name');

/** Reads the current token as a boost. Values outside float range are a parse error. */
export function readBoost(stream: TokenStream): number {
  const boost = stream.floatValue();
  if (!Number.isFinite(boost)) {
    throw new ParsingError(stream.tokenLocation(), `[boost] must be a finite number, got [${stream.text()}]`);
  }
  return boost;
}

/**
 * Shared behaviour of every node: boost and name metadata, sealing, and the
 * steps common to compiling, rewriting, encoding and comparing. Subclasses
 * only deal with their own fields through the `do*` hooks.
 */
export abstract class AbstractQueryNode implements QueryNode {
  abstract readonly writeableName: string;

  private boostValue = DEFAULT_BOOST;
  private name: string | null = null;
  private isSealed = false;

  get boost(): number {
    return this.boostValue;
  }

  get queryName(): string | null {
    return this.name;
  }

  get sealed(): boolean {
    return this.isSealed;
  }

  setBoost(boost: number): this {
    this.assertMutable();
    if (!Number.isFinite(boost)) {
      throw new QueryConstructionError(`[${this.writeableName}] boost must be a finite number, got [${boost}]`);
    }
    // Stored at float precision so it survives the wire encoding unchanged.
    this.boostValue = Math.fround(boost);
    return this;
  }

  setQueryName(queryName: string | null): this {
    this.assertMutable();
    this.name = queryName;
    return this;
  }

  seal(): this {
    if (!this.isSealed) {
      this.isSealed = true;
      for (const child of this.children()) {
        child.seal();
      }
    }
    return this;
  }

  /** Direct child nodes, for sealing. */
  protected children(): readonly QueryNode[] {
    return [];
  }

  // ---------------------------------------------------------------------------
  // Compilation
  // ---------------------------------------------------------------------------

  toQuery(context: QueryShardContext): ExecutableQuery | null {
    let query = this.doToQuery(context);
    if (query !== null) {
      if (this.boostValue !== DEFAULT_BOOST) {
        query = { kind: 'boost', query, boost: this.boostValue };
      }
      if (this.name !== null) {
        context.addNamedQuery(this.name, query);
      }
    }
    return query;
  }

  toFilter(context: QueryShardContext): ExecutableQuery | null {
    const wasFilter = context.isFilter();
    context.setIsFilter(true);
    try {
      return this.toQuery(context);
    } finally {
      context.setIsFilter(wasFilter);
    }
  }

  protected abstract doToQuery(context: QueryShardContext): ExecutableQuery | null;

  // ---------------------------------------------------------------------------
  // Rewrite
  // ---------------------------------------------------------------------------

  rewrite(context: QueryRewriteContext): QueryNode {
    const rewritten = this.doRewrite(context);
    if (rewritten === this) {
      return this;
    }
    if (this.name !== null && rewritten.queryName === null) {
      rewritten.setQueryName(this.name);
    }
    if (this.boostValue !== DEFAULT_BOOST && rewritten.boost === DEFAULT_BOOST) {
      rewritten.setBoost(this.boostValue);
    }
    return rewritten;
  }

  protected doRewrite(_context: QueryRewriteContext): QueryNode {
    return this;
  }

  // ---------------------------------------------------------------------------
  // Serialization
  // ---------------------------------------------------------------------------

  /** Variant fields first, then boost and name. `readQuery` mirrors this. */
  writeTo(out: StreamOutput): void {
    this.doWriteTo(out);
    out.writeFloat(this.boostValue);
    out.writeOptionalString(this.name);
  }

  protected abstract doWriteTo(out: StreamOutput): void;

  toXContent(): XContentObject {
    return { [this.writeableName]: this.doXContent() };
  }

  protected abstract doXContent(): XContentObject;

  protected printBoostAndQueryName(body: XContentObject): XContentObject {
    body['boost'] = this.boostValue;
    if (this.name !== null) {
      body['_name'] = this.name;
    }
    return body;
  }

  toString(): string {
    return JSON.stringify(this.toXContent(), null, 2);
  }

  // ---------------------------------------------------------------------------
  // Identity
  // ---------------------------------------------------------------------------

  equals(other: QueryNode): boolean {
    if (this === other) return true;
    if (other.writeableName !== this.writeableName) return false;
    return (
      this.boostValue === other.boost &&
      this.name === other.queryName &&
      this.doEquals(other)
    );
  }

  /** Called only for nodes with the same writeable name. */
  protected abstract doEquals(other: QueryNode): boolean;

  hashCode(): number {
    return combineHashes(
      hashString(this.writeableName),
      hashNumber(this.boostValue),
      hashString(this.name),
      this.doHashCode(),
    );
  }

  protected abstract doHashCode(): number;

  protected assertMutable(): void {
    if (this.isSealed) {
      throw new QueryConstructionError(`[${this.writeableName}] is sealed and can no longer be modified`);
    }
  }
}
