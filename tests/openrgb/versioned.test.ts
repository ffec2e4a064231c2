import { describe, expect, it } from 'vitest';
import { u32 } from '../../src/openrgb/codec.js';
import { OpenRGBProtocolError } from '../../src/openrgb/errors.js';
import { BinaryParser } from '../../src/openrgb/parser.js';
import {
  gatedValue,
  gateValue,
  isSupported,
  present,
  unsupported,
  versionGated,
} from '../../src/openrgb/versioned.js';
import { BinaryWriter } from '../../src/openrgb/writer.js';

describe('VersionGated', () => {
  const gated = versionGated(3, u32);

  it('should take no bytes below its minimum version', () => {
    expect(gated.size(present(7), 2)).toBe(0);
    expect(new BinaryWriter(2).writeValue(gated, present(7)).length).toBe(0);
    expect(new BinaryWriter(2).writeValue(gated, unsupported).length).toBe(0);
  });

  it('should decode to unsupported below its minimum version without consuming bytes', () => {
    const parser = new BinaryParser(Uint8Array.from([7, 0, 0, 0]), 2);

    expect(parser.readValue(gated)).toBe(unsupported);
    expect(parser.getCurrentOffset()).toBe(0);
  });

  it('should behave like the inner codec from its minimum version', () => {
    const bytes = new BinaryWriter(3).writeValue(gated, present(7)).toBytes();
    expect(Array.from(bytes)).toEqual([7, 0, 0, 0]);
    expect(gated.size(present(7), 3)).toBe(4);

    const parser = new BinaryParser(bytes, 5);
    expect(parser.readValue(gated)).toEqual(present(7));
  });

  it('should refuse to encode a missing value where the field exists', () => {
    expect(() => new BinaryWriter(4).writeValue(gated, unsupported)).toThrow(OpenRGBProtocolError);
  });

  it('should gate plain values by version', () => {
    expect(gateValue('x', 5, 4)).toBe(unsupported);
    expect(gateValue('x', 5, 5)).toEqual({ kind: 'present', value: 'x' });
  });

  it('should expose the value only when present', () => {
    expect(gatedValue(present(0))).toBe(0);
    expect(gatedValue(unsupported)).toBeUndefined();
    expect(isSupported(present(1))).toBe(true);
    expect(isSupported(unsupported)).toBe(false);
  });
});
