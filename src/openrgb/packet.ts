import { type Codec, type Encodable, enumCodec, u32 } from './codec.js';
import { PROTOCOL } from './constants.js';
import { PacketType, packetTypeName } from './enums.js';
import { OpenRGBProtocolError } from './errors.js';
import { BinaryWriter } from './writer.js';

export interface PacketHeader {
  deviceId: number;
  packetType: PacketType;
  /** Payload byte count, header excluded */
  payloadLength: number;
}

const MAGIC_BYTES = new TextEncoder().encode(PROTOCOL.MAGIC);

const packetTypeCodec = enumCodec('PacketType', PacketType);

/**
 * The 16-byte packet header. Its layout does not depend on the protocol
 * version.
 */
export const headerCodec: Codec<PacketHeader> = {
  size: () => PROTOCOL.HEADER_SIZE,
  encode: (header, writer) => {
    writer
      .writeBytes(MAGIC_BYTES)
      .writeUint32(header.deviceId)
      .writeValue(packetTypeCodec, header.packetType)
      .writeUint32(header.payloadLength);
  },
  decode: (parser) => {
    const magic = parser.readBytes(MAGIC_BYTES.byteLength);
    if (!magic.every((byte, i) => byte === MAGIC_BYTES[i])) {
      throw new OpenRGBProtocolError(
        `Expected OpenRGB magic value ${PROTOCOL.MAGIC}, got [${Array.from(magic).join(', ')}]`,
      );
    }

    const deviceId = parser.readUint32();
    const packetType = parser.readValue(packetTypeCodec);
    const payloadLength = parser.readUint32();
    return { deviceId, packetType, payloadLength };
  },
};

/**
 * Serializes a value with a leading `u32` holding the encoded size, the size
 * field itself included. Several packets repeat their payload length this
 * way; servers expect it.
 *
 * On the way in, the leading size is read and discarded without checking it
 * against the bytes that follow.
 */
export function lengthPrefixed<T>(codec: Codec<T>): Codec<T> {
  return {
    size: (value, version) => 4 + codec.size(value, version),
    encode: (value, writer) => {
      const inner = new BinaryWriter(writer.protocolVersion);
      inner.writeValue(codec, value);
      writer.writeUint32(inner.length + 4);
      writer.writeBytes(inner.toBytes());
    },
    decode: (parser) => {
      parser.readValue(u32);
      return parser.readValue(codec);
    },
  };
}

/** Header and payload of one packet, ready for the socket */
export function encodePacket<T>(
  deviceId: number,
  packetType: PacketType,
  encoder: Encodable<T>,
  value: T,
  protocolVersion: number,
): Uint8Array {
  const payload = new BinaryWriter(protocolVersion).writeValue(encoder, value).toBytes();
  const header = new BinaryWriter(protocolVersion, PROTOCOL.HEADER_SIZE).writeValue(headerCodec, {
    deviceId,
    packetType,
    payloadLength: payload.byteLength,
  });
  return header.writeBytes(payload).toBytes();
}

/**
 * Checks a received header against the request it answers. Any mismatch
 * means the stream is out of step with this client.
 */
export function validateHeader(
  header: PacketHeader,
  expectedDeviceId: number,
  expectedPacketType: PacketType,
): void {
  if (header.packetType !== expectedPacketType) {
    throw new OpenRGBProtocolError(
      `Unexpected packet type: expected ${packetTypeName(expectedPacketType)}, got ${packetTypeName(header.packetType)}`,
      header.packetType,
    );
  }
  if (header.deviceId !== expectedDeviceId) {
    throw new OpenRGBProtocolError(
      `Unexpected device id: expected ${expectedDeviceId}, got ${header.deviceId}`,
      header.packetType,
    );
  }
  if (header.payloadLength > PROTOCOL.MAX_PACKET_SIZE) {
    throw new OpenRGBProtocolError(
      `Payload length ${header.payloadLength} exceeds the ${PROTOCOL.MAX_PACKET_SIZE} byte limit`,
      header.packetType,
    );
  }
}
