import type { TokenStream } from '../xcontent/token.js';
import { QueryParseContext } from './parse-context.js';
import { ParseFieldMatcher } from './parse-field.js';
import type { QueryRegistry } from './registry.js';
import type { QueryNode } from './types.js';

/**
 * Context handed to every node's rewrite. Nodes that carry unparsed source
 * (wrapper) parse it through here.
 */
export class QueryRewriteContext {
  constructor(
    readonly registry: QueryRegistry,
    readonly matcher: ParseFieldMatcher = ParseFieldMatcher.LENIENT,
  ) {}

  newParseContext(stream: TokenStream): QueryParseContext {
    return new QueryParseContext(stream, this.registry, this.matcher);
  }
}

/**
 * Rewrites `original` until a rewrite returns its input unchanged. Fixed-point
 * detection is by reference.
 */
export function rewriteQuery(original: QueryNode, context: QueryRewriteContext): QueryNode {
  let current = original;
  for (let next = original.rewrite(context); next !== current; next = current.rewrite(context)) {
    current = next;
  }
  return current;
}
