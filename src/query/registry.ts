import { ParsingError, WireFormatError } from '../errors.js';
import type { StreamInput } from '../io/stream.js';
import type { XContentLocation } from '../xcontent/token.js';
import { BoolQueryNode } from './bool.js';
import { ConstantScoreQueryNode } from './constant-score.js';
import { EmptyQueryNode } from './empty.js';
import { MatchAllQueryNode } from './match-all.js';
import type { QueryParseContext } from './parse-context.js';
import { TermQueryNode } from './term.js';
import type { QueryNode } from './types.js';
import { WrapperQueryNode } from './wrapper.js';

/** Parses a clause body; the stream is on the body's START_OBJECT. */
export type QueryParser = (context: QueryParseContext) => QueryNode;

/** Decodes a node's variant fields; boost and name are read by the caller. */
export type QueryReader = (input: StreamInput, registry: QueryRegistry) => QueryNode;

export interface QueryRegistration {
  name: string;
  /** Omitted for nodes that cannot be written by name in structured input. */
  parse?: QueryParser;
  read: QueryReader;
}

/** Clause name → parser and wire reader. */
export class QueryRegistry {
  private readonly entries = new Map<string, QueryRegistration>();

  register(registration: QueryRegistration): this {
    if (this.entries.has(registration.name)) {
      throw new Error(`query [${registration.name}] is already registered`);
    }
    this.entries.set(registration.name, registration);
    return this;
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  names(): string[] {
    return [...this.entries.keys()];
  }

  lookupParser(name: string, location: XContentLocation | null = null): QueryParser {
    const parse = this.entries.get(name)?.parse;
    if (parse === undefined) {
      throw new ParsingError(location, `no [query] registered for [${name}]`);
    }
    return parse;
  }

  lookupReader(name: string): QueryReader {
    const entry = this.entries.get(name);
    if (entry === undefined) {
      throw new WireFormatError(`no reader registered for query [${name}]`);
    }
    return entry.read;
  }
}

export function createDefaultRegistry(): QueryRegistry {
  return new QueryRegistry()
    .register({
      name: ConstantScoreQueryNode.NAME,
      parse: ConstantScoreQueryNode.fromXContent,
      read: ConstantScoreQueryNode.readFrom,
    })
    .register({
      name: MatchAllQueryNode.NAME,
      parse: MatchAllQueryNode.fromXContent,
      read: MatchAllQueryNode.readFrom,
    })
    .register({
      name: TermQueryNode.NAME,
      parse: TermQueryNode.fromXContent,
      read: TermQueryNode.readFrom,
    })
    .register({
      name: BoolQueryNode.NAME,
      parse: BoolQueryNode.fromXContent,
      read: BoolQueryNode.readFrom,
    })
    .register({
      name: WrapperQueryNode.NAME,
      parse: WrapperQueryNode.fromXContent,
      read: WrapperQueryNode.readFrom,
    })
    .register({
      name: EmptyQueryNode.NAME,
      read: EmptyQueryNode.readFrom,
    });
}
