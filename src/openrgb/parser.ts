import type { Decodable } from './codec.js';
import { OpenRGBParseError } from './errors.js';

/**
 * Read cursor over a received payload. Values are decoded for the protocol
 * version the cursor was created with.
 */
export class BinaryParser {
  private data: Uint8Array;
  private view: DataView;
  private offset: number;

  constructor(
    data: Uint8Array,
    public readonly protocolVersion: number = 0,
    offset: number = 0,
  ) {
    this.data = data;
    this.view = new DataView(data.buffer, data.byteOffset, data.byteLength);
    this.offset = offset;
  }

  private ensureAvailable(bytes: number, what: string): void {
    if (this.offset + bytes > this.data.byteLength) {
      throw new OpenRGBParseError(
        `Cannot ${what} at offset ${this.offset}, buffer size: ${this.data.byteLength}`,
        this.offset,
        this.data.byteLength,
      );
    }
  }

  readUint8(): number {
    this.ensureAvailable(1, 'read Uint8');
    const value = this.view.getUint8(this.offset);
    this.offset += 1;
    return value;
  }

  readUint16(): number {
    this.ensureAvailable(2, 'read Uint16');
    const value = this.view.getUint16(this.offset, true);
    this.offset += 2;
    return value;
  }

  readUint32(): number {
    this.ensureAvailable(4, 'read Uint32');
    const value = this.view.getUint32(this.offset, true);
    this.offset += 4;
    return value;
  }

  readInt32(): number {
    this.ensureAvailable(4, 'read Int32');
    const value = this.view.getInt32(this.offset, true);
    this.offset += 4;
    return value;
  }

  readBytes(length: number): Uint8Array {
    this.ensureAvailable(length, `read ${length} bytes`);
    const bytes = this.data.slice(this.offset, this.offset + length);
    this.offset += length;
    return bytes;
  }

  readValue<T>(decoder: Decodable<T>): T {
    return decoder.decode(this);
  }

  /**
   * Reads `count` consecutive values. Use this when the count was consumed
   * separately; sequences carrying their own prefix go through `vec`.
   */
  readValues<T>(decoder: Decodable<T>, count: number): T[] {
    const values: T[] = [];
    for (let i = 0; i < count; i++) {
      values.push(decoder.decode(this));
    }
    return values;
  }

  skip(bytes: number): void {
    this.ensureAvailable(bytes, `skip ${bytes} bytes`);
    this.offset += bytes;
  }

  hasMoreData(): boolean {
    return this.offset < this.data.byteLength;
  }

  getCurrentOffset(): number {
    return this.offset;
  }

  getRemainingBytes(): number {
    return this.data.byteLength - this.offset;
  }
}
