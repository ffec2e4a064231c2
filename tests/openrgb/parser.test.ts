import { describe, expect, it } from 'vitest';
import { u16, u32 } from '../../src/openrgb/codec.js';
import { OpenRGBParseError } from '../../src/openrgb/errors.js';
import { BinaryParser } from '../../src/openrgb/parser.js';

function sampleBuffer(): Uint8Array {
  const data = new Uint8Array(16);
  const view = new DataView(data.buffer);
  view.setUint32(0, 0x12345678, true);
  view.setUint16(4, 0xabcd, true);
  view.setUint8(6, 0x7f);
  view.setInt32(7, -42, true);
  view.setUint32(11, 9, true);
  return data;
}

describe('BinaryParser', () => {
  it('should read little-endian integers and advance the offset', () => {
    const parser = new BinaryParser(sampleBuffer());

    expect(parser.readUint32()).toBe(0x12345678);
    expect(parser.readUint16()).toBe(0xabcd);
    expect(parser.readUint8()).toBe(0x7f);
    expect(parser.readInt32()).toBe(-42);
    expect(parser.getCurrentOffset()).toBe(11);
    expect(parser.getRemainingBytes()).toBe(5);
  });

  it('should start at a custom offset', () => {
    const parser = new BinaryParser(sampleBuffer(), 0, 4);
    expect(parser.readUint16()).toBe(0xabcd);
  });

  it('should respect the byte offset of a subarray', () => {
    const parser = new BinaryParser(sampleBuffer().subarray(4));
    expect(parser.readUint16()).toBe(0xabcd);
  });

  it('should carry a protocol version', () => {
    expect(new BinaryParser(new Uint8Array(0), 4).protocolVersion).toBe(4);
    expect(new BinaryParser(new Uint8Array(0)).protocolVersion).toBe(0);
  });

  describe('short reads', () => {
    it('should throw a parse error naming the offset and buffer size', () => {
      const parser = new BinaryParser(sampleBuffer(), 0, 14);

      expect(() => parser.readUint32()).toThrow('Cannot read Uint32 at offset 14, buffer size: 16');
      expect(() => parser.readBytes(3)).toThrow(OpenRGBParseError);
      expect(() => parser.skip(5)).toThrow('Cannot skip 5 bytes at offset 14, buffer size: 16');
      expect(parser.getCurrentOffset()).toBe(14);
    });

    it('should record where the read failed', () => {
      const parser = new BinaryParser(new Uint8Array(1));

      try {
        parser.readUint16();
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(OpenRGBParseError);
        if (error instanceof OpenRGBParseError) {
          expect(error.offset).toBe(0);
          expect(error.bufferSize).toBe(1);
          expect(error.code).toBe('PARSE_ERROR');
        }
      }
    });
  });

  it('should copy bytes out of the buffer', () => {
    const data = sampleBuffer();
    const parser = new BinaryParser(data);
    const bytes = parser.readBytes(2);
    data[0] = 0;

    expect(Array.from(bytes)).toEqual([0x78, 0x56]);
  });

  it('should skip bytes and report when data is exhausted', () => {
    const parser = new BinaryParser(sampleBuffer());
    parser.skip(15);
    expect(parser.hasMoreData()).toBe(true);
    parser.skip(1);
    expect(parser.hasMoreData()).toBe(false);
  });

  it('should decode values through codecs', () => {
    const parser = new BinaryParser(sampleBuffer());

    expect(parser.readValue(u32)).toBe(0x12345678);
    expect(parser.readValues(u16, 1)).toEqual([0xabcd]);
    expect(parser.readValues(u16, 0)).toEqual([]);
  });
});
