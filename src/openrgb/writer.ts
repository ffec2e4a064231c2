import type { Encodable } from './codec.js';
import { WIRE_LIMITS } from './constants.js';
import { OpenRGBInvariantError, OpenRGBProtocolError } from './errors.js';

function checkRange(value: number, min: number, max: number, type: string): void {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new OpenRGBProtocolError(`Cannot encode ${value} as ${type}: expected an integer in [${min}, ${max}]`);
  }
}

/**
 * Growable little-endian byte buffer. The protocol version it carries is the
 * one every nested value is encoded for.
 */
export class BinaryWriter {
  private buffer: Uint8Array;
  private view: DataView;
  private offset: number;

  constructor(
    public readonly protocolVersion: number = 0,
    capacity: number = 64,
  ) {
    this.buffer = new Uint8Array(Math.max(capacity, 8));
    this.view = new DataView(this.buffer.buffer);
    this.offset = 0;
  }

  get length(): number {
    return this.offset;
  }

  private reserve(bytes: number): void {
    const required = this.offset + bytes;
    if (required <= this.buffer.byteLength) {
      return;
    }

    let capacity = this.buffer.byteLength * 2;
    while (capacity < required) {
      capacity *= 2;
    }
    const grown = new Uint8Array(capacity);
    grown.set(this.buffer.subarray(0, this.offset));
    this.buffer = grown;
    this.view = new DataView(grown.buffer);
  }

  writeUint8(value: number): this {
    checkRange(value, 0, WIRE_LIMITS.U8_MAX, 'u8');
    this.reserve(1);
    this.view.setUint8(this.offset, value);
    this.offset += 1;
    return this;
  }

  writeUint16(value: number): this {
    checkRange(value, 0, WIRE_LIMITS.U16_MAX, 'u16');
    this.reserve(2);
    this.view.setUint16(this.offset, value, true);
    this.offset += 2;
    return this;
  }

  writeUint32(value: number): this {
    checkRange(value, 0, WIRE_LIMITS.U32_MAX, 'u32');
    this.reserve(4);
    this.view.setUint32(this.offset, value, true);
    this.offset += 4;
    return this;
  }

  writeInt32(value: number): this {
    checkRange(value, WIRE_LIMITS.I32_MIN, WIRE_LIMITS.I32_MAX, 'i32');
    this.reserve(4);
    this.view.setInt32(this.offset, value, true);
    this.offset += 4;
    return this;
  }

  writeBytes(bytes: Uint8Array): this {
    this.reserve(bytes.byteLength);
    this.buffer.set(bytes, this.offset);
    this.offset += bytes.byteLength;
    return this;
  }

  /**
   * Encodes a value and checks the encoder wrote exactly the number of
   * bytes its `size` announced.
   */
  writeValue<T>(encoder: Encodable<T>, value: T): this {
    const expected = encoder.size(value, this.protocolVersion);
    const start = this.offset;
    encoder.encode(value, this);
    const written = this.offset - start;
    if (written !== expected) {
      throw new OpenRGBInvariantError(
        `Encoder announced ${expected} bytes but wrote ${written} (protocol version ${this.protocolVersion})`,
      );
    }
    return this;
  }

  toBytes(): Uint8Array {
    return this.buffer.slice(0, this.offset);
  }
}
