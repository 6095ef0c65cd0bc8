import { WireFormatError } from '../errors.js';

/** Scalars that can travel through `writeGenericValue`. */
export type GenericValue = string | number | boolean;

export interface StreamOutput {
  writeByte(value: number): void;
  writeBoolean(value: boolean): void;
  writeVInt(value: number): void;
  writeFloat(value: number): void;
  writeDouble(value: number): void;
  writeString(value: string): void;
  writeOptionalString(value: string | null): void;
  writeGenericValue(value: GenericValue): void;
}

export interface StreamInput {
  readByte(): number;
  readBoolean(): boolean;
  readVInt(): number;
  readFloat(): number;
  readDouble(): number;
  readString(): string;
  readOptionalString(): string | null;
  readGenericValue(): GenericValue;
  /** Bytes left to read. */
  available(): number;
}

const GENERIC_STRING = 0;
const GENERIC_DOUBLE = 1;
const GENERIC_BOOLEAN = 2;

/** Growable in-memory output. */
export class BytesStreamOutput implements StreamOutput {
  private buffer = Buffer.alloc(64);
  private length = 0;

  writeByte(value: number): void {
    this.ensure(1);
    this.buffer.writeUInt8(value & 0xff, this.length);
    this.length += 1;
  }

  writeBoolean(value: boolean): void {
    this.writeByte(value ? 1 : 0);
  }

  /** Unsigned variable-length int, 7 bits per byte, low bits first. */
  writeVInt(value: number): void {
    if (!Number.isInteger(value) || value < 0 || value > 0xffffffff) {
      throw new WireFormatError(`cannot write [${value}] as a vint`);
    }
    let rest = value;
    while (rest > 0x7f) {
      this.writeByte((rest & 0x7f) | 0x80);
      rest = Math.floor(rest / 128);
    }
    this.writeByte(rest);
  }

  writeFloat(value: number): void {
    this.ensure(4);
    this.buffer.writeFloatBE(value, this.length);
    this.length += 4;
  }

  writeDouble(value: number): void {
    this.ensure(8);
    this.buffer.writeDoubleBE(value, this.length);
    this.length += 8;
  }

  writeString(value: string): void {
    const bytes = Buffer.from(value, 'utf8');
    this.writeVInt(bytes.length);
    this.ensure(bytes.length);
    bytes.copy(this.buffer, this.length);
    this.length += bytes.length;
  }

  writeOptionalString(value: string | null): void {
    if (value === null) {
      this.writeBoolean(false);
      return;
    }
    this.writeBoolean(true);
    this.writeString(value);
  }

  writeGenericValue(value: GenericValue): void {
    if (typeof value === 'string') {
      this.writeByte(GENERIC_STRING);
      this.writeString(value);
    } else if (typeof value === 'number') {
      this.writeByte(GENERIC_DOUBLE);
      this.writeDouble(value);
    } else {
      this.writeByte(GENERIC_BOOLEAN);
      this.writeBoolean(value);
    }
  }

  /** A copy of the bytes written so far. */
  bytes(): Uint8Array {
    return new Uint8Array(this.buffer.subarray(0, this.length));
  }

  size(): number {
    return this.length;
  }

  private ensure(extra: number): void {
    if (this.length + extra <= this.buffer.length) return;
    let capacity = this.buffer.length * 2;
    while (capacity < this.length + extra) capacity *= 2;
    const grown = Buffer.alloc(capacity);
    this.buffer.copy(grown, 0, 0, this.length);
    this.buffer = grown;
  }
}

export class BytesStreamInput implements StreamInput {
  private readonly buffer: Buffer;
  private pos = 0;

  constructor(bytes: Uint8Array) {
    this.buffer = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  readByte(): number {
    this.require(1);
    const value = this.buffer.readUInt8(this.pos);
    this.pos += 1;
    return value;
  }

  readBoolean(): boolean {
    const value = this.readByte();
    if (value > 1) {
      throw new WireFormatError(`unexpected boolean byte [${value}]`);
    }
    return value === 1;
  }

  readVInt(): number {
    let result = 0;
    let multiplier = 1;
    for (let i = 0; i < 5; i++) {
      const b = this.readByte();
      result += (b & 0x7f) * multiplier;
      if ((b & 0x80) === 0) return result;
      multiplier *= 128;
    }
    throw new WireFormatError('vint is longer than 5 bytes');
  }

  readFloat(): number {
    this.require(4);
    const value = this.buffer.readFloatBE(this.pos);
    this.pos += 4;
    return value;
  }

  readDouble(): number {
    this.require(8);
    const value = this.buffer.readDoubleBE(this.pos);
    this.pos += 8;
    return value;
  }

  readString(): string {
    const length = this.readVInt();
    this.require(length);
    const value = this.buffer.toString('utf8', this.pos, this.pos + length);
    this.pos += length;
    return value;
  }

  readOptionalString(): string | null {
    return this.readBoolean() ? this.readString() : null;
  }

  readGenericValue(): GenericValue {
    const type = this.readByte();
    switch (type) {
      case GENERIC_STRING:
        return this.readString();
      case GENERIC_DOUBLE:
        return this.readDouble();
      case GENERIC_BOOLEAN:
        return this.readBoolean();
      default:
        throw new WireFormatError(`unknown generic value type [${type}]`);
    }
  }

  available(): number {
    return this.buffer.length - this.pos;
  }

  private require(n: number): void {
    if (this.pos + n > this.buffer.length) {
      throw new WireFormatError(
        `unexpected end of stream: needed ${n} byte(s) at offset ${this.pos}, ${this.available()} available`,
      );
    }
  }
}
