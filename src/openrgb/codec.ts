/**
 * Wire codecs for the primitive shapes of the OpenRGB protocol.
 *
 * Encoding and decoding are separate interfaces: some values only ever
 * travel one way. A full `Codec` is both. Every encoder reports its exact
 * encoded size up front, since framing needs sizes before bytes exist.
 */

import { WIRE_LIMITS } from './constants.js';
import { enumValues } from './enums.js';
import { OpenRGBParseError, OpenRGBProtocolError } from './errors.js';
import type { BinaryParser } from './parser.js';
import type { BinaryWriter } from './writer.js';

export interface Encodable<T> {
  /** Exact number of bytes `encode` writes for `value` at `version` */
  size(value: T, version: number): number;
  encode(value: T, writer: BinaryWriter): void;
}

export interface Decodable<T> {
  decode(parser: BinaryParser): T;
}

export type Codec<T> = Encodable<T> & Decodable<T>;

const utf8Decoder = new TextDecoder('utf-8', { fatal: true });
const utf8Encoder = new TextEncoder();

function checkedCount(count: number, what: string): number {
  if (count > WIRE_LIMITS.U16_MAX) {
    throw new OpenRGBProtocolError(
      `${what} of ${count} elements is too large to encode (limit ${WIRE_LIMITS.U16_MAX})`,
    );
  }
  return count;
}

export const u8: Codec<number> = {
  size: () => 1,
  encode: (value, writer) => {
    writer.writeUint8(value);
  },
  decode: (parser) => parser.readUint8(),
};

export const u16: Codec<number> = {
  size: () => 2,
  encode: (value, writer) => {
    writer.writeUint16(value);
  },
  decode: (parser) => parser.readUint16(),
};

export const u32: Codec<number> = {
  size: () => 4,
  encode: (value, writer) => {
    writer.writeUint32(value);
  },
  decode: (parser) => parser.readUint32(),
};

export const i32: Codec<number> = {
  size: () => 4,
  encode: (value, writer) => {
    writer.writeInt32(value);
  },
  decode: (parser) => parser.readInt32(),
};

/** Zero-byte value, used for packets without a payload */
export const unit: Codec<undefined> = {
  size: () => 0,
  encode: () => undefined,
  decode: () => undefined,
};

/** Everything left in the payload, verbatim */
export const bytes: Codec<Uint8Array> = {
  size: (value) => value.byteLength,
  encode: (value, writer) => {
    writer.writeBytes(value);
  },
  decode: (parser) => parser.readBytes(parser.getRemainingBytes()),
};

/**
 * Length-prefixed, null-terminated UTF-8 string. The `u16` length counts the
 * terminator.
 */
export const string: Codec<string> = {
  size: (value) => 2 + Buffer.byteLength(value, 'utf8') + 1,
  encode: (value, writer) => {
    const encoded = utf8Encoder.encode(value);
    writer.writeUint16(checkedCount(encoded.byteLength + 1, 'String'));
    writer.writeBytes(encoded);
    writer.writeUint8(0);
  },
  decode: (parser) => {
    const length = parser.readUint16();
    if (length === 0) {
      return '';
    }

    const offset = parser.getCurrentOffset();
    const raw = parser.readBytes(length);
    try {
      return utf8Decoder.decode(raw.subarray(0, length - 1));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new OpenRGBParseError(
        `Failed decoding string at offset ${offset} as UTF-8: ${reason}`,
        offset,
      );
    }
  },
};

/** Null-terminated string without a length prefix (write only) */
export const rawString: Encodable<string> = {
  size: (value) => Buffer.byteLength(value, 'utf8') + 1,
  encode: (value, writer) => {
    writer.writeBytes(utf8Encoder.encode(value));
    writer.writeUint8(0);
  },
};

/** `u16` element count followed by the elements */
export function vec<T>(codec: Codec<T>): Codec<T[]> {
  return {
    size: (values, version) =>
      values.reduce((total, value) => total + codec.size(value, version), 2),
    encode: (values, writer) => {
      writer.writeUint16(checkedCount(values.length, 'Sequence'));
      for (const value of values) {
        writer.writeValue(codec, value);
      }
    },
    decode: (parser) => {
      const count = parser.readUint16();
      if (count > parser.getRemainingBytes()) {
        throw new OpenRGBParseError(
          `Sequence claims ${count} elements but only ${parser.getRemainingBytes()} bytes remain`,
          parser.getCurrentOffset(),
        );
      }
      return parser.readValues(codec, count);
    },
  };
}

/**
 * Fixed-length collection. The count prefix is still written so the bytes
 * match a `vec` of the same elements.
 */
export function array<T>(codec: Codec<T>, length: number): Codec<T[]> {
  const inner = vec(codec);
  return {
    size: inner.size,
    encode: (values, writer) => {
      if (values.length !== length) {
        throw new OpenRGBProtocolError(`Expected an array of ${length} elements, got ${values.length}`);
      }
      inner.encode(values, writer);
    },
    decode: (parser) => {
      const values = inner.decode(parser);
      if (values.length !== length) {
        throw new OpenRGBProtocolError(`Expected an array of ${length} elements, got ${values.length}`);
      }
      return values;
    },
  };
}

export function pair<A, B>(first: Codec<A>, second: Codec<B>): Codec<[A, B]> {
  return {
    size: ([a, b], version) => first.size(a, version) + second.size(b, version),
    encode: ([a, b], writer) => {
      writer.writeValue(first, a).writeValue(second, b);
    },
    decode: (parser) => [first.decode(parser), second.decode(parser)],
  };
}

export function triple<A, B, C>(
  first: Codec<A>,
  second: Codec<B>,
  third: Codec<C>,
): Codec<[A, B, C]> {
  return {
    size: ([a, b, c], version) =>
      first.size(a, version) + second.size(b, version) + third.size(c, version),
    encode: ([a, b, c], writer) => {
      writer.writeValue(first, a).writeValue(second, b).writeValue(third, c);
    },
    decode: (parser) => [first.decode(parser), second.decode(parser), third.decode(parser)],
  };
}

/** `u32` bit set; bits outside `universe` are rejected both ways */
export function flagSet(name: string, universe: number): Codec<number> {
  const check = (value: number): number => {
    if ((value & ~universe) >>> 0 !== 0) {
      throw new OpenRGBProtocolError(
        `Invalid ${name} set 0x${value.toString(16)}: unknown bits 0x${((value & ~universe) >>> 0).toString(16)}`,
      );
    }
    return value;
  };

  return {
    size: () => 4,
    encode: (value, writer) => {
      writer.writeUint32(check(value));
    },
    decode: (parser) => check(parser.readUint32()),
  };
}

/**
 * `u32` enum discriminant. Unknown discriminants decode to `fallback` when
 * one is given and are a protocol error otherwise. Only members encode.
 */
export function enumCodec<E extends number>(
  name: string,
  enumObject: { [key: string]: string | E },
  fallback?: E,
): Codec<E> {
  const values = enumValues(enumObject);

  return {
    size: () => 4,
    encode: (value, writer) => {
      if (!values.includes(value) && value !== fallback) {
        throw new OpenRGBProtocolError(`Cannot encode unknown ${name} discriminant ${value}`);
      }
      writer.writeUint32(value);
    },
    decode: (parser) => {
      const raw = parser.readUint32();
      const value = values.find((candidate) => candidate === raw);
      if (value !== undefined) {
        return value;
      }
      if (fallback !== undefined) {
        return fallback;
      }
      throw new OpenRGBProtocolError(`Unknown ${name} discriminant ${raw}`);
    },
  };
}
