import { describe, it, expect } from 'vitest';
import { BytesStreamInput, BytesStreamOutput } from '../../src/io/stream.js';
import { WireFormatError } from '../../src/errors.js';

function written(fn: (out: BytesStreamOutput) => void): number[] {
  const out = new BytesStreamOutput();
  fn(out);
  return Array.from(out.bytes());
}

describe('BytesStreamOutput', () => {
  it('writes vints low bits first, 7 bits per byte', () => {
    expect(written((o) => o.writeVInt(0))).toEqual([0x00]);
    expect(written((o) => o.writeVInt(127))).toEqual([0x7f]);
    expect(written((o) => o.writeVInt(128))).toEqual([0x80, 0x01]);
    expect(written((o) => o.writeVInt(300))).toEqual([0xac, 0x02]);
  });

  it('rejects values that are not unsigned 32-bit integers', () => {
    expect(() => written((o) => o.writeVInt(-1))).toThrow('cannot write [-1] as a vint');
    expect(() => written((o) => o.writeVInt(1.5))).toThrow(WireFormatError);
  });

  it('writes floats big-endian', () => {
    expect(written((o) => o.writeFloat(2.5))).toEqual([0x40, 0x20, 0x00, 0x00]);
  });

  it('prefixes strings with their UTF-8 byte length', () => {
    expect(written((o) => o.writeString('héllo'))).toEqual([6, 0x68, 0xc3, 0xa9, 0x6c, 0x6c, 0x6f]);
  });

  it('writes absent optional strings as a single false byte', () => {
    expect(written((o) => o.writeOptionalString(null))).toEqual([0]);
    expect(written((o) => o.writeOptionalString('a'))).toEqual([1, 1, 0x61]);
  });

  it('grows past its initial capacity', () => {
    const out = new BytesStreamOutput();
    for (let i = 0; i < 100; i++) out.writeDouble(i);
    expect(out.size()).toBe(800);
    const input = new BytesStreamInput(out.bytes());
    expect(input.readDouble()).toBe(0);
    for (let i = 1; i < 99; i++) input.readDouble();
    expect(input.readDouble()).toBe(99);
    expect(input.available()).toBe(0);
  });
});

describe('BytesStreamInput', () => {
  it('reads back what was written', () => {
    const out = new BytesStreamOutput();
    out.writeVInt(300);
    out.writeBoolean(true);
    out.writeString('héllo');
    out.writeOptionalString(null);
    out.writeGenericValue('x');
    out.writeGenericValue(42.5);
    out.writeGenericValue(false);

    const input = new BytesStreamInput(out.bytes());
    expect(input.readVInt()).toBe(300);
    expect(input.readBoolean()).toBe(true);
    expect(input.readString()).toBe('héllo');
    expect(input.readOptionalString()).toBeNull();
    expect(input.readGenericValue()).toBe('x');
    expect(input.readGenericValue()).toBe(42.5);
    expect(input.readGenericValue()).toBe(false);
    expect(input.available()).toBe(0);
  });

  it('reports truncation with offsets', () => {
    const input = new BytesStreamInput(new Uint8Array([0x40, 0x20]));
    expect(() => input.readFloat()).toThrow('unexpected end of stream: needed 4 byte(s) at offset 0, 2 available');
  });

  it('rejects boolean bytes other than 0 and 1', () => {
    expect(() => new BytesStreamInput(new Uint8Array([2])).readBoolean()).toThrow('unexpected boolean byte [2]');
  });

  it('rejects vints longer than 5 bytes', () => {
    const input = new BytesStreamInput(new Uint8Array([0x80, 0x80, 0x80, 0x80, 0x80, 0x01]));
    expect(() => input.readVInt()).toThrow('vint is longer than 5 bytes');
  });

  it('rejects unknown generic value tags', () => {
    expect(() => new BytesStreamInput(new Uint8Array([9])).readGenericValue()).toThrow('unknown generic value type [9]');
  });
});
