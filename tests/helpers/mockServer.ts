import { Duplex } from 'node:stream';
import { type Encodable, u32 } from '../../src/openrgb/codec.js';
import { PROTOCOL } from '../../src/openrgb/constants.js';
import { PacketType } from '../../src/openrgb/enums.js';
import { encodePacket, headerCodec } from '../../src/openrgb/packet.js';
import { BinaryParser } from '../../src/openrgb/parser.js';

export interface ReceivedPacket {
  deviceId: number;
  packetType: PacketType;
  payload: Uint8Array;
}

/** Bytes to send back for a packet, or nothing */
export type PacketHandler = (packet: ReceivedPacket) => Uint8Array | Uint8Array[] | undefined;

/** A complete server packet, encoded at `version` */
export function reply<T>(
  deviceId: number,
  packetType: PacketType,
  encoder: Encodable<T>,
  value: T,
  version: number = PROTOCOL.MAX_PROTOCOL_VERSION,
): Uint8Array {
  return encodePacket(deviceId, packetType, encoder, value, version);
}

/**
 * Answers the version request with `serverVersion` and hands every other
 * packet to `next`.
 */
export function negotiating(serverVersion: number, next: PacketHandler = () => undefined): PacketHandler {
  return (packet) => {
    if (packet.packetType === PacketType.REQUEST_PROTOCOL_VERSION) {
      return reply(0, PacketType.REQUEST_PROTOCOL_VERSION, u32, serverVersion);
    }
    return next(packet);
  };
}

/**
 * In-process stand-in for an OpenRGB server. The client side of `stream`
 * is handed to the code under test; every packet written to it is parsed,
 * recorded and passed to the handler, whose bytes are sent back on the
 * next turn of the event loop.
 */
export class MockServer {
  readonly stream: Duplex;
  readonly received: ReceivedPacket[] = [];
  private handler: PacketHandler;
  private incoming: Buffer = Buffer.alloc(0);

  constructor(handler: PacketHandler) {
    this.handler = handler;
    this.stream = new Duplex({
      read: () => undefined,
      write: (chunk: Buffer, _encoding, callback) => {
        this.incoming = Buffer.concat([this.incoming, chunk]);
        this.drain();
        callback();
      },
    });
  }

  /** Total bytes the client has written */
  get bytesReceived(): number {
    return this.received.reduce(
      (total, packet) => total + PROTOCOL.HEADER_SIZE + packet.payload.byteLength,
      this.incoming.byteLength,
    );
  }

  setHandler(handler: PacketHandler): void {
    this.handler = handler;
  }

  /** Sends bytes the client did not ask for */
  push(bytes: Uint8Array): void {
    this.stream.push(Buffer.from(bytes));
  }

  /** Ends the stream from the server side */
  hangUp(): void {
    this.stream.push(null);
  }

  fail(error: Error): void {
    this.stream.destroy(error);
  }

  private drain(): void {
    while (this.incoming.byteLength >= PROTOCOL.HEADER_SIZE) {
      const header = new BinaryParser(this.incoming).readValue(headerCodec);
      const total = PROTOCOL.HEADER_SIZE + header.payloadLength;
      if (this.incoming.byteLength < total) {
        return;
      }

      const packet: ReceivedPacket = {
        deviceId: header.deviceId,
        packetType: header.packetType,
        payload: new Uint8Array(this.incoming.subarray(PROTOCOL.HEADER_SIZE, total)),
      };
      this.incoming = this.incoming.subarray(total);
      this.received.push(packet);

      const response = this.handler(packet);
      if (response === undefined) {
        continue;
      }
      const chunks = Array.isArray(response) ? response : [response];
      setImmediate(() => {
        for (const chunk of chunks) {
          this.push(chunk);
        }
      });
    }
  }
}
