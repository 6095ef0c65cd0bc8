import type { XContentLocation } from './xcontent/token.js';

/**
 * Malformed or non-conformant structured query input. Always carries the
 * location of the offending token when one is known.
 */
export class ParsingError extends Error {
  override readonly name = 'ParsingError';

  readonly line: number;
  readonly column: number;

  constructor(
    location: XContentLocation | null,
    message: string,
  ) {
    super(message);
    this.line = location?.line ?? -1;
    this.column = location?.column ?? -1;
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** A node was built with arguments it cannot hold. Programmer error, never a syntax problem. */
export class QueryConstructionError extends Error {
  override readonly name = 'QueryConstructionError';

  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** A node could not be compiled against the shard context. */
export class QueryShardError extends Error {
  override readonly name = 'QueryShardError';

  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Binary query data is truncated or names an unknown node type. */
export class WireFormatError extends Error {
  override readonly name = 'WireFormatError';

  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class SearchError extends Error {
  override readonly name = 'SearchError';

  constructor(
    message: string,
    override readonly cause?: unknown,
  ) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ConfigError extends Error {
  override readonly name = 'ConfigError';

  constructor(
    readonly fieldErrors: Record<string, string[]>,
    message?: string,
  ) {
    super(message ?? `Invalid configuration: ${Object.keys(fieldErrors).join(', ')}`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
