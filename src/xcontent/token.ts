export type Token =
  | 'START_OBJECT'
  | 'END_OBJECT'
  | 'START_ARRAY'
  | 'END_ARRAY'
  | 'FIELD_NAME'
  | 'VALUE_STRING'
  | 'VALUE_NUMBER'
  | 'VALUE_BOOLEAN'
  | 'VALUE_NULL';

/** Scalar value tokens. `VALUE_NULL` is deliberately not one of them. */
export function isValue(token: Token): boolean {
  return token === 'VALUE_STRING' || token === 'VALUE_NUMBER' || token === 'VALUE_BOOLEAN';
}

/** 1-based position of a token's first character. */
export interface XContentLocation {
  line: number;
  column: number;
}

/**
 * Pull-based reader over a structured document. Clause parsers consume it
 * token by token; values are read from the current token.
 */
export interface TokenStream {
  /** Advance to the next token; returns null once the input is exhausted. */
  nextToken(): Token | null;
  currentToken(): Token | null;
  /** Name of the most recent FIELD_NAME token. */
  currentName(): string | null;
  text(): string;
  /** Current value as a 32-bit float. Numeric strings are coerced. */
  floatValue(): number;
  doubleValue(): number;
  intValue(): number;
  booleanValue(): boolean;
  /** When on START_OBJECT or START_ARRAY, advance to the matching end token. */
  skipChildren(): void;
  tokenLocation(): XContentLocation;
}
