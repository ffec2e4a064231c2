import type { Duplex } from 'node:stream';
import {
  bytes,
  type Decodable,
  type Encodable,
  i32,
  pair,
  rawString,
  string,
  u32,
  unit,
  vec,
} from './codec.js';
import { colorCodec } from './color.js';
import { DEFAULT_CONNECTION, PROTOCOL, VERSION_GATES } from './constants.js';
import { controllerDataCodec } from './device.js';
import { PacketType } from './enums.js';
import {
  formatErrorMessage,
  OpenRGBConnectionError,
  OpenRGBTimeoutError,
  OpenRGBUnsupportedOperationError,
} from './errors.js';
import { modeCodec } from './mode.js';
import { Mutex } from './mutex.js';
import { NetworkClient } from './network.js';
import { lengthPrefixed } from './packet.js';
import { BinaryParser } from './parser.js';
import { pluginListCodec } from './plugin.js';
import { segmentCodec } from './segment.js';
import type { ControllerData, ModeData, PluginData, RGBColor, SegmentData } from './types.js';

export interface ClientOptions {
  host?: string;
  port?: number;
  /** Announced with SetClientName once the version is negotiated */
  name?: string;
  /** Milliseconds to wait for the protocol version reply */
  timeout?: number;
  /** Highest protocol version to advertise, clamped to what this client speaks */
  maxProtocolVersion?: number;
}

export type SessionState =
  | { status: 'disconnected' }
  | { status: 'connecting' }
  | { status: 'negotiated'; protocolVersion: number };

const colorsCodec = vec(colorCodec);
const updateLedsCodec = lengthPrefixed(colorsCodec);
const updateZoneLedsCodec = lengthPrefixed(pair(u32, colorsCodec));
const updateSingleLedCodec = pair(i32, colorCodec);
const resizeZoneCodec = pair(i32, i32);
const modeUpdateCodec = lengthPrefixed(pair(i32, modeCodec));
const addSegmentCodec = lengthPrefixed(pair(u32, segmentCodec));
const profileListCodec = lengthPrefixed(vec(string));
const pluginRequestCodec = pair(u32, bytes);

function clampVersion(version: number): number {
  return Math.max(1, Math.min(PROTOCOL.MAX_PROTOCOL_VERSION, Math.trunc(version)));
}

async function withTimeout<T>(operation: Promise<T>, timeoutMs: number, what: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new OpenRGBTimeoutError(`${what} timed out after ${timeoutMs} ms`, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * A session with an OpenRGB server.
 *
 * Each call is one request/response exchange (or one fire-and-forget
 * packet). Calls may be issued concurrently; they reach the wire one at a
 * time, in call order, so every reply is read by the caller that asked for
 * it.
 */
export class OpenRGBClient {
  private networkClient: NetworkClient;
  private mutex: Mutex;
  private state: SessionState;
  /** Bumped whenever the transport is torn down; requests queued earlier must not run */
  private generation = 0;
  private readonly name: string | undefined;
  private readonly timeout: number;
  private readonly maxProtocolVersion: number;

  constructor(options: ClientOptions = {}) {
    this.networkClient = new NetworkClient(
      options.host ?? DEFAULT_CONNECTION.HOST,
      options.port ?? DEFAULT_CONNECTION.PORT,
    );
    this.mutex = new Mutex();
    this.state = { status: 'disconnected' };
    this.name = options.name;
    this.timeout = options.timeout ?? PROTOCOL.DEFAULT_TIMEOUT;
    this.maxProtocolVersion = clampVersion(
      options.maxProtocolVersion ?? PROTOCOL.MAX_PROTOCOL_VERSION,
    );
  }

  get status(): SessionState['status'] {
    return this.state.status;
  }

  get connected(): boolean {
    return this.state.status === 'negotiated' && this.networkClient.connected;
  }

  /** Version agreed with the server: the lower of both sides' maximums */
  get protocolVersion(): number {
    if (this.state.status !== 'negotiated') {
      throw new OpenRGBConnectionError('Client is not connected to OpenRGB server');
    }
    return this.state.protocolVersion;
  }

  async connect(): Promise<void> {
    await this.open(() => this.networkClient.connect());
  }

  /**
   * Negotiates over a stream the caller already opened.
   */
  async connectWith(stream: Duplex): Promise<void> {
    await this.open(async () => {
      this.networkClient.attach(stream);
    });
  }

  disconnect(): void {
    this.generation++;
    this.networkClient.disconnect();
    this.state = { status: 'disconnected' };
  }

  /**
   * Sends one packet and decodes the reply, which must carry the same
   * device id and packet type.
   */
  async request<Req, Res>(
    deviceId: number,
    packetType: PacketType,
    encoder: Encodable<Req>,
    value: Req,
    decoder: Decodable<Res>,
  ): Promise<Res> {
    const protocolVersion = this.protocolVersion;
    return this.exchange(protocolVersion, async () => {
      await this.networkClient.sendPacket(deviceId, packetType, encoder, value, protocolVersion);
      const payload = await this.networkClient.readPacket(deviceId, packetType);
      return new BinaryParser(payload, protocolVersion).readValue(decoder);
    });
  }

  /** Sends one packet that has no reply */
  async send<Req>(
    deviceId: number,
    packetType: PacketType,
    encoder: Encodable<Req>,
    value: Req,
  ): Promise<void> {
    const protocolVersion = this.protocolVersion;
    await this.exchange(protocolVersion, () =>
      this.networkClient.sendPacket(deviceId, packetType, encoder, value, protocolVersion),
    );
  }

  async setClientName(name: string): Promise<void> {
    await this.send(0, PacketType.SET_CLIENT_NAME, rawString, name);
  }

  async getControllerCount(): Promise<number> {
    return this.request(0, PacketType.REQUEST_CONTROLLER_COUNT, unit, undefined, u32);
  }

  async getControllerData(controllerId: number): Promise<ControllerData> {
    return this.request(
      controllerId,
      PacketType.REQUEST_CONTROLLER_DATA,
      u32,
      this.protocolVersion,
      controllerDataCodec,
    );
  }

  async getControllers(): Promise<ControllerData[]> {
    const count = await this.getControllerCount();
    console.log(`OpenRGB: Found ${count} controllers`);

    const controllers: ControllerData[] = [];
    for (let id = 0; id < count; id++) {
      controllers.push(await this.getControllerData(id));
    }
    return controllers;
  }

  async resizeZone(controllerId: number, zoneId: number, size: number): Promise<void> {
    await this.send(controllerId, PacketType.RGBCONTROLLER_RESIZEZONE, resizeZoneCodec, [
      zoneId,
      size,
    ]);
  }

  async clearSegments(controllerId: number, zoneId: number): Promise<void> {
    this.requireVersion('clearSegments', VERSION_GATES.SEGMENT_CONTROL);
    await this.send(controllerId, PacketType.RGBCONTROLLER_CLEARSEGMENTS, u32, zoneId);
  }

  async addSegment(controllerId: number, zoneId: number, segment: SegmentData): Promise<void> {
    this.requireVersion('addSegment', VERSION_GATES.SEGMENT_CONTROL);
    await this.send(controllerId, PacketType.RGBCONTROLLER_ADDSEGMENT, addSegmentCodec, [
      zoneId,
      segment,
    ]);
  }

  async updateLeds(controllerId: number, colors: RGBColor[]): Promise<void> {
    await this.send(controllerId, PacketType.RGBCONTROLLER_UPDATELEDS, updateLedsCodec, colors);
  }

  async updateZoneLeds(controllerId: number, zoneId: number, colors: RGBColor[]): Promise<void> {
    await this.send(controllerId, PacketType.RGBCONTROLLER_UPDATEZONELEDS, updateZoneLedsCodec, [
      zoneId,
      colors,
    ]);
  }

  async updateSingleLed(controllerId: number, ledId: number, color: RGBColor): Promise<void> {
    await this.send(
      controllerId,
      PacketType.RGBCONTROLLER_UPDATESINGLELED,
      updateSingleLedCodec,
      [ledId, color],
    );
  }

  async setCustomMode(controllerId: number): Promise<void> {
    await this.send(controllerId, PacketType.RGBCONTROLLER_SETCUSTOMMODE, unit, undefined);
  }

  async updateMode(controllerId: number, modeIndex: number, mode: ModeData): Promise<void> {
    await this.send(controllerId, PacketType.RGBCONTROLLER_UPDATEMODE, modeUpdateCodec, [
      modeIndex,
      mode,
    ]);
  }

  async saveMode(controllerId: number, modeIndex: number, mode: ModeData): Promise<void> {
    this.requireVersion('saveMode', VERSION_GATES.SAVE_MODE);
    await this.send(controllerId, PacketType.RGBCONTROLLER_SAVEMODE, modeUpdateCodec, [
      modeIndex,
      mode,
    ]);
  }

  async getProfiles(): Promise<string[]> {
    this.requireVersion('getProfiles', VERSION_GATES.PROFILES);
    return this.request(0, PacketType.REQUEST_PROFILE_LIST, unit, undefined, profileListCodec);
  }

  async saveProfile(name: string): Promise<void> {
    this.requireVersion('saveProfile', VERSION_GATES.PROFILES);
    await this.send(0, PacketType.REQUEST_SAVE_PROFILE, rawString, name);
  }

  async loadProfile(name: string): Promise<void> {
    this.requireVersion('loadProfile', VERSION_GATES.PROFILES);
    await this.send(0, PacketType.REQUEST_LOAD_PROFILE, rawString, name);
  }

  async deleteProfile(name: string): Promise<void> {
    this.requireVersion('deleteProfile', VERSION_GATES.PROFILES);
    await this.send(0, PacketType.REQUEST_DELETE_PROFILE, rawString, name);
  }

  async rescanDevices(): Promise<void> {
    this.requireVersion('rescanDevices', VERSION_GATES.DEVICE_RESCAN);
    await this.send(0, PacketType.REQUEST_DEVICE_RESCAN, unit, undefined);
  }

  async getPlugins(): Promise<PluginData[]> {
    this.requireVersion('getPlugins', VERSION_GATES.PLUGINS);
    return this.request(0, PacketType.REQUEST_PLUGIN_LIST, unit, undefined, pluginListCodec);
  }

  /**
   * Forwards an opaque request to a server plugin and returns its opaque
   * reply. The plugin defines both payloads.
   */
  async pluginSpecific(pluginIndex: number, type: number, data: Uint8Array): Promise<Uint8Array> {
    this.requireVersion('pluginSpecific', VERSION_GATES.PLUGINS);
    return this.request(pluginIndex, PacketType.PLUGIN_SPECIFIC, pluginRequestCodec, [type, data], bytes);
  }

  private requireVersion(operation: string, requiredVersion: number): void {
    const currentVersion = this.protocolVersion;
    if (currentVersion < requiredVersion) {
      throw new OpenRGBUnsupportedOperationError(operation, requiredVersion, currentVersion);
    }
  }

  private async open(openTransport: () => Promise<void>): Promise<void> {
    if (this.state.status === 'connecting') {
      throw new OpenRGBConnectionError('A connection attempt is already in progress');
    }

    this.disconnect();
    this.state = { status: 'connecting' };

    try {
      await openTransport();
      const protocolVersion = await this.negotiate();
      this.state = { status: 'negotiated', protocolVersion };
      console.log(`OpenRGB: Negotiated protocol version ${protocolVersion}`);
    } catch (error) {
      this.networkClient.disconnect();
      this.state = { status: 'disconnected' };
      if (error instanceof OpenRGBConnectionError) {
        throw error;
      }
      throw new OpenRGBConnectionError(
        `Protocol negotiation with ${this.networkClient.target} failed: ${formatErrorMessage(error)}`,
        undefined,
        undefined,
        { cause: error },
      );
    }

    if (this.name !== undefined) {
      await this.setClientName(this.name);
    }
  }

  private async negotiate(): Promise<number> {
    const exchange = this.mutex.runExclusive(async () => {
      await this.networkClient.sendPacket(
        0,
        PacketType.REQUEST_PROTOCOL_VERSION,
        u32,
        this.maxProtocolVersion,
        0,
      );
      const payload = await this.networkClient.readPacket(0, PacketType.REQUEST_PROTOCOL_VERSION);
      return new BinaryParser(payload).readValue(u32);
    });

    const serverVersion = await withTimeout(exchange, this.timeout, 'Protocol negotiation');
    console.debug(`OpenRGB: Server speaks protocol version ${serverVersion}`);
    return Math.min(this.maxProtocolVersion, serverVersion);
  }

  /**
   * Runs `section` under the lock, but only if the session that issued it is
   * still the current one once its turn comes.
   */
  private async exchange<T>(protocolVersion: number, section: () => Promise<T>): Promise<T> {
    const generation = this.generation;
    try {
      return await this.mutex.runExclusive(async () => {
        if (generation !== this.generation) {
          throw new OpenRGBConnectionError(
            `Session (protocol version ${protocolVersion}) was closed before the request was sent`,
          );
        }
        return section();
      });
    } catch (error) {
      if (
        generation === this.generation &&
        this.state.status === 'negotiated' &&
        !this.networkClient.connected
      ) {
        console.warn('OpenRGB: Connection lost:', formatErrorMessage(error));
        this.disconnect();
      }
      throw error;
    }
  }
}
