// Main classes
export { type ClientOptions, OpenRGBClient, type SessionState } from './client.js';
export { NetworkClient } from './network.js';
export { Mutex } from './mutex.js';
// Wire codecs
export {
  array,
  bytes,
  type Codec,
  type Decodable,
  type Encodable,
  enumCodec,
  flagSet,
  i32,
  pair,
  rawString,
  string,
  triple,
  u8,
  u16,
  u32,
  unit,
  vec,
} from './codec.js';
export { colorCodec, isValidRGBColor } from './color.js';
export { controllerDataCodec } from './device.js';
export { ledCodec } from './led.js';
export {
  hasModeFlag,
  modeBrightness,
  modeBrightnessRange,
  modeCodec,
  modeColorRange,
  modeDirection,
  modeSpeed,
  modeSpeedRange,
  type Range,
} from './mode.js';
export {
  encodePacket,
  headerCodec,
  lengthPrefixed,
  type PacketHeader,
  validateHeader,
} from './packet.js';
export { pluginCodec, pluginListCodec } from './plugin.js';
export { segmentCodec } from './segment.js';
export { zoneCodec } from './zone.js';
export { BinaryParser } from './parser.js';
export { BinaryWriter } from './writer.js';
export {
  gatedValue,
  gateValue,
  isSupported,
  present,
  unsupported,
  type VersionGated,
  versionGated,
} from './versioned.js';
// Enums and constants
export {
  ColorMode,
  DeviceType,
  Direction,
  enumFromValue,
  enumValues,
  MODE_FLAG_MASK,
  ModeFlag,
  PacketType,
  packetTypeName,
  ZoneType,
} from './enums.js';
export {
  COLOR_LIMITS,
  DEFAULT_CONNECTION,
  PROTOCOL,
  VERSION_GATES,
  WIRE_LIMITS,
} from './constants.js';
export {
  formatErrorMessage,
  isOpenRGBError,
  OpenRGBConnectionError,
  OpenRGBError,
  OpenRGBInvariantError,
  OpenRGBParseError,
  OpenRGBProtocolError,
  OpenRGBTimeoutError,
  OpenRGBUnsupportedOperationError,
} from './errors.js';
// Types and interfaces
export type {
  ControllerData,
  LED,
  LedMatrix,
  ModeData,
  PluginData,
  RGBColor,
  SegmentData,
  ZoneData,
} from './types.js';
