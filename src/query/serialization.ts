import { WireFormatError } from '../errors.js';
import { BytesStreamInput, BytesStreamOutput } from '../io/stream.js';
import { JsonTokenStream } from '../xcontent/json-token-stream.js';
import { readQuery, writeQuery } from './codec.js';
import { QueryParseContext } from './parse-context.js';
import { ParseFieldMatcher } from './parse-field.js';
import { createDefaultRegistry, type QueryRegistry } from './registry.js';
import type { QueryNode } from './types.js';

export interface SerializationOptions {
  registry?: QueryRegistry;
  matcher?: ParseFieldMatcher;
}

/** Parses a JSON query document into a sealed tree. */
export function parseQuery(json: string, options: SerializationOptions = {}): QueryNode {
  const context = new QueryParseContext(
    new JsonTokenStream(json),
    options.registry ?? createDefaultRegistry(),
    options.matcher ?? ParseFieldMatcher.LENIENT,
  );
  return context.parseTopLevelQuery().seal();
}

export function toJson(node: QueryNode): string {
  return JSON.stringify(node.toXContent());
}

export function encodeQuery(node: QueryNode): Uint8Array {
  const out = new BytesStreamOutput();
  writeQuery(out, node);
  return out.bytes();
}

/** Decodes bytes written by `encodeQuery` into a sealed tree. */
export function decodeQuery(bytes: Uint8Array, options: Pick<SerializationOptions, 'registry'> = {}): QueryNode {
  const input = new BytesStreamInput(bytes);
  const node = readQuery(input, options.registry ?? createDefaultRegistry());
  if (input.available() > 0) {
    throw new WireFormatError(`${input.available()} unread byte(s) after query [${node.writeableName}]`);
  }
  return node.seal();
}
