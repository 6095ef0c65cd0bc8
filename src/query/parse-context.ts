import { ParsingError } from '../errors.js';
import type { TokenStream } from '../xcontent/token.js';
import { EmptyQueryNode } from './empty.js';
import { ParseField, ParseFieldMatcher } from './parse-field.js';
import type { QueryRegistry } from './registry.js';
import type { QueryNode } from './types.js';

const CACHE = new ParseField('_cache').withAllDeprecated('caching is decided by the engine');
const CACHE_KEY = new ParseField('_cache_key').withAllDeprecated('caching is decided by the engine');

/**
 * Parsing state shared by every clause parser: the token stream, the registry
 * of clause parsers and the field matcher.
 */
export class QueryParseContext {
  constructor(
    readonly stream: TokenStream,
    readonly registry: QueryRegistry,
    readonly matcher: ParseFieldMatcher = ParseFieldMatcher.LENIENT,
  ) {}

  match(fieldName: string | null, field: ParseField): boolean {
    return this.matcher.match(fieldName, field, this.stream.tokenLocation());
  }

  /** Legacy settings that are skipped rather than rejected. */
  isDeprecatedSetting(fieldName: string | null): boolean {
    return this.match(fieldName, CACHE) || this.match(fieldName, CACHE_KEY);
  }

  /**
   * Parses `{ "<clause>": { ... } }` starting at (or just before) its
   * START_OBJECT and leaves the stream on the matching END_OBJECT.
   * `{}` parses to the empty node.
   */
  parseInnerQuery(): QueryNode {
    const stream = this.stream;
    if (stream.currentToken() !== 'START_OBJECT') {
      if (stream.nextToken() !== 'START_OBJECT') {
        throw new ParsingError(stream.tokenLocation(), '[_na] query malformed, must start with start_object');
      }
    }

    let token = stream.nextToken();
    if (token === 'END_OBJECT') {
      return new EmptyQueryNode();
    }
    if (token !== 'FIELD_NAME') {
      throw new ParsingError(stream.tokenLocation(), '[_na] query malformed, no field after start_object');
    }
    const queryName = stream.currentName() ?? '';

    token = stream.nextToken();
    if (token !== 'START_OBJECT' && token !== 'START_ARRAY') {
      throw new ParsingError(stream.tokenLocation(), '[_na] query malformed, no start_object after query name');
    }

    const parse = this.registry.lookupParser(queryName, stream.tokenLocation());
    const result = parse(this);

    // The clause parser stops on its own body's end token; step to the wrapper's.
    if (stream.currentToken() === 'END_OBJECT' || stream.currentToken() === 'END_ARRAY') {
      stream.nextToken();
    }
    const closing = stream.currentToken();
    if (closing !== 'END_OBJECT') {
      throw new ParsingError(
        stream.tokenLocation(),
        `[${queryName}] malformed query, expected [END_OBJECT] but found [${String(closing)}]`,
      );
    }
    return result;
  }

  /** Parses one query that must make up the whole input. */
  parseTopLevelQuery(): QueryNode {
    const result = this.parseInnerQuery();
    const trailing = this.stream.nextToken();
    if (trailing !== null) {
      throw new ParsingError(this.stream.tokenLocation(), `unexpected trailing token [${trailing}]`);
    }
    return result;
  }
}
