import * as net from 'node:net';
import type { Duplex } from 'node:stream';
import type { Encodable } from './codec.js';
import { DEFAULT_CONNECTION, PROTOCOL } from './constants.js';
import { type PacketType, packetTypeName } from './enums.js';
import { OpenRGBConnectionError } from './errors.js';
import { encodePacket, headerCodec, validateHeader } from './packet.js';
import { BinaryParser } from './parser.js';

interface PendingRead {
  size: number;
  resolve: (bytes: Uint8Array) => void;
  reject: (error: Error) => void;
}

/**
 * Owns the byte stream to the server: opens it, writes whole packets and
 * reads exactly-sized chunks back. It knows the header layout but nothing
 * about payloads, and it does not order callers; `OpenRGBClient` does.
 */
export class NetworkClient {
  private address: string;
  private port: number;
  private stream: Duplex | null;
  private received: Buffer;
  private pendingRead: PendingRead | null;
  private failure: Error | null;

  constructor(address: string = DEFAULT_CONNECTION.HOST, port: number = DEFAULT_CONNECTION.PORT) {
    this.address = address;
    this.port = port;
    this.stream = null;
    this.received = Buffer.alloc(0);
    this.pendingRead = null;
    this.failure = null;
  }

  get connected(): boolean {
    return this.stream !== null && this.failure === null;
  }

  get target(): string {
    return `${this.address}:${this.port}`;
  }

  async connect(): Promise<void> {
    this.disconnect();

    const socket = await new Promise<net.Socket>((resolve, reject) => {
      const socket = net.createConnection({ host: this.address, port: this.port });
      const onError = (error: Error) => {
        console.error(`OpenRGB: Connection to ${this.target} failed:`, error.message);
        socket.destroy();
        reject(
          new OpenRGBConnectionError(
            `Failed to connect to ${this.target}: ${error.message}`,
            this.address,
            this.port,
            { cause: error },
          ),
        );
      };
      socket.once('error', onError);
      socket.once('connect', () => {
        socket.off('error', onError);
        resolve(socket);
      });
    });

    socket.setNoDelay(true);
    console.log(`OpenRGB: Connected to ${this.target}`);
    this.attach(socket);
  }

  /**
   * Adopts an already connected stream, replacing any previous one.
   */
  attach(stream: Duplex): void {
    this.disconnect();

    this.stream = stream;
    this.received = Buffer.alloc(0);
    this.failure = null;

    stream.on('data', (chunk: Buffer) => {
      if (this.stream !== stream) return;
      this.received = Buffer.concat([this.received, chunk]);
      this.flushPendingRead();
    });
    stream.on('error', (error: Error) => {
      if (this.stream !== stream) return;
      this.fail(error);
    });
    const onClosed = () => {
      if (this.stream !== stream) return;
      this.fail(new OpenRGBConnectionError('Connection closed by server', this.address, this.port));
    };
    stream.on('end', onClosed);
    stream.on('close', onClosed);
  }

  disconnect(): void {
    const stream = this.stream;
    if (!stream) {
      return;
    }

    this.stream = null;
    this.rejectPendingRead(
      new OpenRGBConnectionError('Connection closed by client', this.address, this.port),
    );
    if (stream.destroyed) {
      console.warn(`OpenRGB: Connection to ${this.target} was already closed`);
    } else {
      stream.destroy();
    }
    console.log('OpenRGB: Connection closed');
  }

  async sendPacket<T>(
    deviceId: number,
    packetType: PacketType,
    encoder: Encodable<T>,
    value: T,
    protocolVersion: number,
  ): Promise<void> {
    const stream = this.requireStream();
    const packet = encodePacket(deviceId, packetType, encoder, value, protocolVersion);
    console.debug(
      `OpenRGB: -> ${packetTypeName(packetType)} device ${deviceId} (${packet.byteLength - PROTOCOL.HEADER_SIZE} bytes)`,
    );

    await new Promise<void>((resolve, reject) => {
      stream.write(packet, (error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }

  /**
   * Reads one packet and returns its payload. The header must answer the
   * given device and packet type; if it does not, the stream cannot be
   * trusted any more and is closed.
   */
  async readPacket(expectedDeviceId: number, expectedPacketType: PacketType): Promise<Uint8Array> {
    const headerBytes = await this.readExact(PROTOCOL.HEADER_SIZE);

    let payloadLength: number;
    try {
      const header = new BinaryParser(headerBytes).readValue(headerCodec);
      validateHeader(header, expectedDeviceId, expectedPacketType);
      payloadLength = header.payloadLength;
    } catch (error) {
      this.invalidate(error instanceof Error ? error : new Error(String(error)));
      throw error;
    }

    const payload = await this.readExact(payloadLength);
    console.debug(
      `OpenRGB: <- ${packetTypeName(expectedPacketType)} device ${expectedDeviceId} (${payloadLength} bytes)`,
    );
    return payload;
  }

  async readExact(size: number): Promise<Uint8Array> {
    this.requireStream();
    if (this.pendingRead) {
      throw new OpenRGBConnectionError(
        'A read is already pending on this connection',
        this.address,
        this.port,
      );
    }

    return new Promise<Uint8Array>((resolve, reject) => {
      this.pendingRead = { size, resolve, reject };
      this.flushPendingRead();
    });
  }

  private flushPendingRead(): void {
    const pending = this.pendingRead;
    if (!pending || this.received.byteLength < pending.size) {
      return;
    }

    this.pendingRead = null;
    const bytes = new Uint8Array(this.received.subarray(0, pending.size));
    this.received = this.received.subarray(pending.size);
    pending.resolve(bytes);
  }

  private rejectPendingRead(error: Error): void {
    const pending = this.pendingRead;
    this.pendingRead = null;
    pending?.reject(error);
  }

  private fail(error: Error): void {
    if (this.failure) {
      return;
    }
    this.failure = error;
    this.rejectPendingRead(error);
  }

  private invalidate(error: Error): void {
    this.fail(error);
    this.stream?.destroy();
  }

  private requireStream(): Duplex {
    if (!this.stream) {
      throw new OpenRGBConnectionError('Not connected to OpenRGB server', this.address, this.port);
    }
    if (this.failure) {
      throw new OpenRGBConnectionError(
        `Connection to ${this.target} was lost: ${this.failure.message}`,
        this.address,
        this.port,
        { cause: this.failure },
      );
    }
    return this.stream;
  }
}
