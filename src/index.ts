export { query } from './query/query-object.js';
export type { QueryNode, XContentObject, JsonValue } from './query/types.js';
export { DEFAULT_BOOST } from './query/types.js';
export { AbstractQueryNode } from './query/abstract-query.js';
export { ConstantScoreQueryNode } from './query/constant-score.js';
export { MatchAllQueryNode } from './query/match-all.js';
export { TermQueryNode } from './query/term.js';
export { BoolQueryNode } from './query/bool.js';
export { WrapperQueryNode } from './query/wrapper.js';
export { EmptyQueryNode } from './query/empty.js';
export type { ExecutableQuery, TermValue } from './query/executable.js';
export { parseQuery, toJson, encodeQuery, decodeQuery } from './query/serialization.js';
export type { SerializationOptions } from './query/serialization.js';
export { readQuery, writeQuery } from './query/codec.js';
export { QueryRegistry, createDefaultRegistry } from './query/registry.js';
export type { QueryParser, QueryReader, QueryRegistration } from './query/registry.js';
export { ParseField, ParseFieldMatcher } from './query/parse-field.js';
export { QueryParseContext } from './query/parse-context.js';
export { QueryRewriteContext, rewriteQuery } from './query/rewrite.js';
export { QueryShardContext } from './query/shard-context.js';
export {
  compilePredicate,
  compileScore,
  compileSearchQuery,
  compileCountQuery,
} from './query/compiler.js';
export type { CompiledQuery, CompiledSearch } from './query/compiler.js';
export { JsonTokenStream } from './xcontent/json-token-stream.js';
export type { Token, TokenStream, XContentLocation } from './xcontent/token.js';
export { BytesStreamInput, BytesStreamOutput } from './io/stream.js';
export type { StreamInput, StreamOutput } from './io/stream.js';
export type {
  NewDocument,
  SearchHit,
  SearchResult,
  SearchOptions,
  DocumentSearcher,
} from './types.js';
export { PostgresDocumentSearcher } from './search/searcher.js';
export type { DocumentSearcherConfig } from './search/searcher.js';
export { createSearcher } from './search/create-searcher.js';
export { loadConfig } from './config.js';
export type { SearchConfig } from './config.js';
export { createLogger, logger } from './logger.js';
export {
  ParsingError,
  QueryConstructionError,
  QueryShardError,
  WireFormatError,
  SearchError,
  ConfigError,
} from './errors.js';
