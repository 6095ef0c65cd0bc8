import { BoolQueryNode } from './bool.js';
import { ConstantScoreQueryNode } from './constant-score.js';
import { MatchAllQueryNode } from './match-all.js';
import { TermQueryNode } from './term.js';
import type { TermValue } from './executable.js';
import type { QueryNode } from './types.js';
import { WrapperQueryNode } from './wrapper.js';

/**
 * Entry point for building trees in code.
 *
 * @example
 * query.constantScore(
 *   query.bool()
 *     .filter(query.term('status', 'published'))
 *     .mustNot(query.term('archived', true)),
 * ).setBoost(2).setQueryName('published')
 */
export const query = {
  constantScore(filter: QueryNode): ConstantScoreQueryNode {
    return new ConstantScoreQueryNode(filter);
  },
  matchAll(): MatchAllQueryNode {
    return new MatchAllQueryNode();
  },
  term(field: string, value: TermValue): TermQueryNode {
    return new TermQueryNode(field, value);
  },
  bool(): BoolQueryNode {
    return new BoolQueryNode();
  },
  /** Accepts JSON text or a plain object, which is serialized. */
  wrapper(source: string | Record<string, unknown>): WrapperQueryNode {
    return new WrapperQueryNode(typeof source === 'string' ? source : JSON.stringify(source));
  },
};
