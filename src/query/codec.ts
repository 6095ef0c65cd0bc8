import { WireFormatError } from '../errors.js';
import type { StreamInput, StreamOutput } from '../io/stream.js';
import type { QueryRegistry } from './registry.js';
import type { QueryNode } from './types.js';

/** Writes any node: its writeable name, then the node itself. */
export function writeQuery(out: StreamOutput, node: QueryNode): void {
  out.writeString(node.writeableName);
  node.writeTo(out);
}

/**
 * Reads any node written by `writeQuery`. The registered reader decodes the
 * variant fields; boost and name follow them on the wire.
 */
export function readQuery(input: StreamInput, registry: QueryRegistry): QueryNode {
  const name = input.readString();
  const node = registry.lookupReader(name)(input, registry);
  const boost = input.readFloat();
  if (!Number.isFinite(boost)) {
    throw new WireFormatError(`invalid boost [${boost}] for query [${name}]`);
  }
  node.setBoost(boost);
  node.setQueryName(input.readOptionalString());
  return node;
}
