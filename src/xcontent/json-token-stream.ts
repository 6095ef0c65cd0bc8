import { ParsingError } from '../errors.js';
import type { Token, TokenStream, XContentLocation } from './token.js';

type Expect = 'first' | 'next' | 'element';

interface Frame {
  kind: 'object' | 'array';
  expect: Expect;
}

const NUMBER_PATTERN = /-?(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][+-]?\d+)?/y;

const ESCAPES: Record<string, string> = {
  '"': '"',
  '\\': '\\',
  '/': '/',
  b: '\b',
  f: '\f',
  n: '\n',
  r: '\r',
  t: '\t',
};

/**
 * Tokenizes JSON text into a TokenStream. Structural errors (missing commas,
 * unterminated strings, unbalanced brackets) surface as ParsingError at the
 * offending position.
 */
export class JsonTokenStream implements TokenStream {
  private pos = 0;
  private line = 1;
  private column = 1;
  private readonly stack: Frame[] = [];
  private afterFieldName = false;

  private token: Token | null = null;
  private tokenText = '';
  private fieldName: string | null = null;
  private location: XContentLocation = { line: 1, column: 1 };

  constructor(private readonly input: string) {}

  nextToken(): Token | null {
    this.skipWhitespace();

    if (this.afterFieldName) {
      this.afterFieldName = false;
      this.expectChar(':');
      this.skipWhitespace();
      return this.readValue();
    }

    const frame = this.stack[this.stack.length - 1];

    if (frame === undefined) {
      if (this.atEnd()) {
        this.token = null;
        return null;
      }
      return this.readValue();
    }

    if (this.atEnd()) {
      throw new ParsingError(this.here(), 'unexpected end of input');
    }

    const closing = frame.kind === 'object' ? '}' : ']';
    if (this.peek() === closing && frame.expect !== 'element') {
      this.mark();
      this.advance();
      this.stack.pop();
      return this.emit(frame.kind === 'object' ? 'END_OBJECT' : 'END_ARRAY', closing);
    }

    if (frame.expect === 'next') {
      this.expectChar(',');
      this.skipWhitespace();
      frame.expect = 'element';
      if (this.atEnd()) {
        throw new ParsingError(this.here(), 'unexpected end of input');
      }
    }

    if (frame.kind === 'array') {
      frame.expect = 'next';
      return this.readValue();
    }

    if (this.peek() !== '"') {
      throw new ParsingError(this.here(), `expected field name but found [${this.peek()}]`);
    }
    this.mark();
    const name = this.readString();
    frame.expect = 'next';
    this.afterFieldName = true;
    this.fieldName = name;
    return this.emit('FIELD_NAME', name);
  }

  currentToken(): Token | null {
    return this.token;
  }

  currentName(): string | null {
    return this.fieldName;
  }

  text(): string {
    if (
      this.token === 'VALUE_STRING' ||
      this.token === 'VALUE_NUMBER' ||
      this.token === 'VALUE_BOOLEAN' ||
      this.token === 'FIELD_NAME'
    ) {
      return this.tokenText;
    }
    throw new ParsingError(this.location, `current token [${String(this.token)}] has no text value`);
  }

  floatValue(): number {
    return Math.fround(this.doubleValue());
  }

  doubleValue(): number {
    if (this.token === 'VALUE_NUMBER') {
      return Number(this.tokenText);
    }
    if (this.token === 'VALUE_STRING') {
      const trimmed = this.tokenText.trim();
      const value = Number(trimmed);
      if (trimmed === '' || !Number.isFinite(value)) {
        throw new ParsingError(this.location, `[${this.tokenText}] is not a number`);
      }
      return value;
    }
    throw new ParsingError(this.location, `current token [${String(this.token)}] is not numeric`);
  }

  intValue(): number {
    const value = this.doubleValue();
    if (!Number.isInteger(value)) {
      throw new ParsingError(this.location, `[${this.tokenText}] is not an integer`);
    }
    return value;
  }

  booleanValue(): boolean {
    if (this.token === 'VALUE_BOOLEAN' || this.token === 'VALUE_STRING') {
      if (this.tokenText === 'true') return true;
      if (this.tokenText === 'false') return false;
    }
    throw new ParsingError(this.location, `[${this.tokenText}] is not a boolean`);
  }

  skipChildren(): void {
    if (this.token !== 'START_OBJECT' && this.token !== 'START_ARRAY') {
      return;
    }
    let depth = 1;
    while (depth > 0) {
      const token = this.nextToken();
      if (token === 'START_OBJECT' || token === 'START_ARRAY') depth += 1;
      else if (token === 'END_OBJECT' || token === 'END_ARRAY') depth -= 1;
    }
  }

  tokenLocation(): XContentLocation {
    return { ...this.location };
  }

  // ---------------------------------------------------------------------------
  // Lexing
  // ---------------------------------------------------------------------------

  private readValue(): Token {
    if (this.atEnd()) {
      throw new ParsingError(this.here(), 'unexpected end of input');
    }
    this.mark();
    const c = this.peek();

    if (c === '{' || c === '[') {
      this.advance();
      this.stack.push({ kind: c === '{' ? 'object' : 'array', expect: 'first' });
      return this.emit(c === '{' ? 'START_OBJECT' : 'START_ARRAY', c);
    }
    if (c === '"') {
      return this.emit('VALUE_STRING', this.readString());
    }
    if (c === '-' || (c >= '0' && c <= '9')) {
      NUMBER_PATTERN.lastIndex = this.pos;
      const match = NUMBER_PATTERN.exec(this.input);
      if (match === null) {
        throw new ParsingError(this.here(), `malformed number at [${c}]`);
      }
      this.advanceBy(match[0].length);
      return this.emit('VALUE_NUMBER', match[0]);
    }
    for (const [literal, token] of [
      ['true', 'VALUE_BOOLEAN'],
      ['false', 'VALUE_BOOLEAN'],
      ['null', 'VALUE_NULL'],
    ] as const) {
      if (this.input.startsWith(literal, this.pos)) {
        this.advanceBy(literal.length);
        return this.emit(token, literal);
      }
    }
    throw new ParsingError(this.here(), `unexpected character [${c}]`);
  }

  private readString(): string {
    this.advance(); // opening quote
    let out = '';
    while (true) {
      if (this.atEnd()) {
        throw new ParsingError(this.here(), 'unterminated string');
      }
      const c = this.peek();
      if (c === '"') {
        this.advance();
        return out;
      }
      if (c === '\\') {
        this.advance();
        const esc = this.peek();
        if (esc === 'u') {
          const hex = this.input.slice(this.pos + 1, this.pos + 5);
          if (!/^[0-9a-fA-F]{4}$/.test(hex)) {
            throw new ParsingError(this.here(), `invalid unicode escape [\\u${hex}]`);
          }
          out += String.fromCharCode(parseInt(hex, 16));
          this.advanceBy(5);
          continue;
        }
        const replacement = ESCAPES[esc];
        if (replacement === undefined) {
          throw new ParsingError(this.here(), `invalid escape [\\${esc}]`);
        }
        out += replacement;
        this.advance();
        continue;
      }
      out += c;
      this.advance();
    }
  }

  private expectChar(expected: string): void {
    if (this.atEnd()) {
      throw new ParsingError(this.here(), 'unexpected end of input');
    }
    const c = this.peek();
    if (c !== expected) {
      throw new ParsingError(this.here(), `expected [${expected}] but found [${c}]`);
    }
    this.advance();
  }

  private emit(token: Token, text: string): Token {
    this.token = token;
    this.tokenText = text;
    return token;
  }

  private mark(): void {
    this.location = this.here();
  }

  private here(): XContentLocation {
    return { line: this.line, column: this.column };
  }

  private peek(): string {
    return this.input.charAt(this.pos);
  }

  private atEnd(): boolean {
    return this.pos >= this.input.length;
  }

  private advance(): void {
    if (this.input.charAt(this.pos) === '\n') {
      this.line += 1;
      this.column = 1;
    } else {
      this.column += 1;
    }
    this.pos += 1;
  }

  private advanceBy(n: number): void {
    for (let i = 0; i < n; i++) this.advance();
  }

  private skipWhitespace(): void {
    while (!this.atEnd() && /\s/.test(this.peek())) {
      this.advance();
    }
  }
}
