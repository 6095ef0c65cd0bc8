import { describe, it, expect } from 'vitest';
import { JsonTokenStream } from '../../src/xcontent/json-token-stream.js';
import type { Token } from '../../src/xcontent/token.js';
import { ParsingError } from '../../src/errors.js';

function tokens(input: string): Array<Token | null> {
  const stream = new JsonTokenStream(input);
  const out: Array<Token | null> = [];
  let token: Token | null;
  do {
    token = stream.nextToken();
    out.push(token);
  } while (token !== null);
  return out;
}

function errorOf(fn: () => unknown): ParsingError | null {
  try {
    fn();
  } catch (err) {
    return err instanceof ParsingError ? err : null;
  }
  return null;
}

describe('JsonTokenStream', () => {
  it('emits tokens for nested objects and arrays', () => {
    expect(tokens('{"a":[1,"x",true,null],"b":{}}')).toEqual([
      'START_OBJECT',
      'FIELD_NAME',
      'START_ARRAY',
      'VALUE_NUMBER',
      'VALUE_STRING',
      'VALUE_BOOLEAN',
      'VALUE_NULL',
      'END_ARRAY',
      'FIELD_NAME',
      'START_OBJECT',
      'END_OBJECT',
      'END_OBJECT',
      null,
    ]);
  });

  it('tracks the current field name and values', () => {
    const stream = new JsonTokenStream('{"boost": 2.5, "name": "x"}');
    stream.nextToken();
    stream.nextToken();
    expect(stream.currentName()).toBe('boost');
    stream.nextToken();
    expect(stream.doubleValue()).toBe(2.5);
    expect(stream.text()).toBe('2.5');
    stream.nextToken();
    expect(stream.currentName()).toBe('name');
    stream.nextToken();
    expect(stream.currentToken()).toBe('VALUE_STRING');
    expect(stream.text()).toBe('x');
  });

  it('reports 1-based token locations across lines', () => {
    const stream = new JsonTokenStream('{\n  "a": 1\n}');
    stream.nextToken();
    expect(stream.tokenLocation()).toEqual({ line: 1, column: 1 });
    stream.nextToken();
    expect(stream.tokenLocation()).toEqual({ line: 2, column: 3 });
    stream.nextToken();
    expect(stream.tokenLocation()).toEqual({ line: 2, column: 8 });
    stream.nextToken();
    expect(stream.tokenLocation()).toEqual({ line: 3, column: 1 });
  });

  it('decodes string escapes', () => {
    const stream = new JsonTokenStream('"a\\nb\\u0041\\""');
    stream.nextToken();
    expect(stream.text()).toBe('a\nbA"');
  });

  it('coerces numeric strings for numeric reads', () => {
    const stream = new JsonTokenStream('"2.5"');
    stream.nextToken();
    expect(stream.floatValue()).toBe(2.5);
  });

  it('rounds float reads to single precision', () => {
    const stream = new JsonTokenStream('0.1');
    stream.nextToken();
    expect(stream.floatValue()).toBe(Math.fround(0.1));
    expect(stream.doubleValue()).toBe(0.1);
  });

  it('rejects non-numeric text for numeric reads', () => {
    const stream = new JsonTokenStream('"abc"');
    stream.nextToken();
    expect(() => stream.floatValue()).toThrow('[abc] is not a number');
  });

  it('rejects fractions for integer reads', () => {
    const stream = new JsonTokenStream('1.5');
    stream.nextToken();
    expect(() => stream.intValue()).toThrow('[1.5] is not an integer');
  });

  it('reads booleans from literals and strings', () => {
    const literal = new JsonTokenStream('false');
    literal.nextToken();
    expect(literal.booleanValue()).toBe(false);
    const text = new JsonTokenStream('"true"');
    text.nextToken();
    expect(text.booleanValue()).toBe(true);
  });

  it('skips a whole subtree', () => {
    const stream = new JsonTokenStream('{"a":{"b":[1,{"c":2}]},"d":3}');
    stream.nextToken();
    stream.nextToken();
    expect(stream.nextToken()).toBe('START_OBJECT');
    stream.skipChildren();
    expect(stream.currentToken()).toBe('END_OBJECT');
    expect(stream.nextToken()).toBe('FIELD_NAME');
    expect(stream.currentName()).toBe('d');
  });

  it('rejects a missing colon at its position', () => {
    const err = errorOf(() => tokens('{"a" 1}'));
    expect(err?.message).toBe('expected [:] but found [1]');
    expect(err?.column).toBe(6);
  });

  it('rejects a trailing comma', () => {
    expect(() => tokens('{"a":1,}')).toThrow('expected field name but found [}]');
  });

  it('rejects a missing comma', () => {
    expect(() => tokens('[1 2]')).toThrow('expected [,] but found [2]');
  });

  it('rejects an unterminated string', () => {
    expect(() => tokens('{"a":"x')).toThrow('unterminated string');
  });

  it('rejects truncated input', () => {
    expect(() => tokens('{"a":')).toThrow('unexpected end of input');
  });

  it('rejects unknown literals', () => {
    expect(() => tokens('nope')).toThrow('unexpected character [n]');
  });
});
