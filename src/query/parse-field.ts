import { ParsingError } from '../errors.js';
import { logger } from '../logger.js';
import type { XContentLocation } from '../xcontent/token.js';

export type DeprecationLogger = { warn(message: string): void };

/**
 * A field name as it may appear in structured input: one preferred name plus
 * deprecated names that are still recognised.
 */
export class ParseField {
  readonly deprecatedNames: readonly string[];

  constructor(
    readonly name: string,
    deprecatedNames: readonly string[] = [],
    /** Set when every name, the preferred one included, is deprecated. */
    readonly allReplacedWith: string | null = null,
  ) {
    this.deprecatedNames = deprecatedNames;
  }

  getPreferredName(): string {
    return this.name;
  }

  getAllNamesIncludingReplaced(): string[] {
    return [this.name, ...this.deprecatedNames];
  }

  /** A copy where the preferred name is deprecated too. */
  withAllDeprecated(replacement: string): ParseField {
    return new ParseField(this.name, this.deprecatedNames, replacement);
  }
}

/**
 * Matches field names against ParseFields. Deprecated names are accepted with
 * a warning when lenient and rejected when strict.
 */
export class ParseFieldMatcher {
  static readonly LENIENT = new ParseFieldMatcher(false);
  static readonly STRICT = new ParseFieldMatcher(true);

  constructor(
    readonly strict: boolean,
    private readonly deprecationLogger: DeprecationLogger = logger.child({ module: 'deprecation' }),
  ) {}

  match(fieldName: string | null, field: ParseField, location: XContentLocation | null = null): boolean {
    if (fieldName === null) return false;
    const preferred = fieldName === field.name;
    if (!preferred && !field.deprecatedNames.includes(fieldName)) {
      return false;
    }
    if (preferred && field.allReplacedWith === null) {
      return true;
    }
    const message = field.allReplacedWith === null
      ? `Deprecated field [${fieldName}] used, expected [${field.name}] instead`
      : `Deprecated field [${fieldName}] used, replaced by [${field.allReplacedWith}]`;
    if (this.strict) {
      throw new ParsingError(location, message);
    }
    this.deprecationLogger.warn(message);
    return true;
  }
}
