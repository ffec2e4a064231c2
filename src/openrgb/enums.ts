/**
 * OpenRGB protocol enumerations.
 *
 * Every discriminant is part of the wire contract, so values are spelled
 * out rather than left to auto-increment.
 */

/** Packet type carried in the header of every packet */
export enum PacketType {
  REQUEST_CONTROLLER_COUNT = 0,
  REQUEST_CONTROLLER_DATA = 1,
  REQUEST_PROTOCOL_VERSION = 40,
  SET_CLIENT_NAME = 50,
  DEVICE_LIST_UPDATED = 100,
  REQUEST_DEVICE_RESCAN = 140,
  REQUEST_PROFILE_LIST = 150,
  REQUEST_SAVE_PROFILE = 151,
  REQUEST_LOAD_PROFILE = 152,
  REQUEST_DELETE_PROFILE = 153,
  REQUEST_PLUGIN_LIST = 200,
  PLUGIN_SPECIFIC = 201,
  RGBCONTROLLER_RESIZEZONE = 1000,
  RGBCONTROLLER_CLEARSEGMENTS = 1001,
  RGBCONTROLLER_ADDSEGMENT = 1002,
  RGBCONTROLLER_UPDATELEDS = 1050,
  RGBCONTROLLER_UPDATEZONELEDS = 1051,
  RGBCONTROLLER_UPDATESINGLELED = 1052,
  RGBCONTROLLER_SETCUSTOMMODE = 1100,
  RGBCONTROLLER_UPDATEMODE = 1101,
  RGBCONTROLLER_SAVEMODE = 1102,
}

export enum DeviceType {
  MOTHERBOARD = 0,
  DRAM = 1,
  GPU = 2,
  COOLER = 3,
  LED_STRIP = 4,
  KEYBOARD = 5,
  MOUSE = 6,
  MOUSE_MAT = 7,
  HEADSET = 8,
  HEADSET_STAND = 9,
  GAMEPAD = 10,
  LIGHT = 11,
  SPEAKER = 12,
  VIRTUAL = 13,
  /** Any discriminant this client does not know decodes to this */
  UNKNOWN = 14,
}

export enum ZoneType {
  SINGLE = 0,
  LINEAR = 1,
  MATRIX = 2,
}

export enum ColorMode {
  NONE = 0,
  PER_LED = 1,
  MODE_SPECIFIC = 2,
  RANDOM = 3,
}

export enum Direction {
  LEFT = 0,
  RIGHT = 1,
  UP = 2,
  DOWN = 3,
  HORIZONTAL = 4,
  VERTICAL = 5,
}

/** Capability bits of a mode */
export enum ModeFlag {
  HAS_SPEED = 1 << 0,
  HAS_DIRECTION_LR = 1 << 1,
  HAS_DIRECTION_UD = 1 << 2,
  HAS_DIRECTION_HV = 1 << 3,
  HAS_DIRECTION = HAS_DIRECTION_LR | HAS_DIRECTION_UD | HAS_DIRECTION_HV,
  HAS_BRIGHTNESS = 1 << 4,
  HAS_PER_LED_COLOR = 1 << 5,
  HAS_MODE_SPECIFIC_COLOR = 1 << 6,
  HAS_RANDOM_COLOR = 1 << 7,
  MANUAL_SAVE = 1 << 8,
  AUTOMATIC_SAVE = 1 << 9,
}

/** Every bit a mode flag set may carry */
export const MODE_FLAG_MASK = (1 << 10) - 1;

/**
 * Collects the numeric members of a TypeScript numeric enum, skipping the
 * reverse-mapping string entries.
 */
export function enumValues<E extends number>(enumObject: { [key: string]: string | E }): E[] {
  return Object.values(enumObject).filter((value): value is E => typeof value === 'number');
}

/** Looks up the enum member with the given discriminant */
export function enumFromValue<E extends number>(
  enumObject: { [key: string]: string | E },
  raw: number,
): E | undefined {
  return enumValues(enumObject).find((value) => value === raw);
}

/** Human-readable name of a packet type, for logs and error messages */
export function packetTypeName(packetType: number): string {
  return PacketType[packetType] ?? `UNKNOWN(${packetType})`;
}
