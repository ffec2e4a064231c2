/**
 * OpenRGB Protocol Constants
 *
 * These constants define various protocol-level values used throughout
 * the OpenRGB communication protocol.
 */

/** Default OpenRGB server connection settings */
export const DEFAULT_CONNECTION = {
  /** Default host address for OpenRGB server */
  HOST: '127.0.0.1',
  /** Default port for OpenRGB server */
  PORT: 6742,
} as const;

/** Protocol-level constants */
export const PROTOCOL = {
  /** Magic bytes that open every packet header */
  MAGIC: 'ORGB',
  /** Size of packet header in bytes */
  HEADER_SIZE: 16,
  /** Highest protocol version this client speaks */
  MAX_PROTOCOL_VERSION: 5,
  /** Maximum accepted payload size in bytes */
  MAX_PACKET_SIZE: 1024 * 1024, // 1MB
  /** Default timeout for version negotiation in milliseconds */
  DEFAULT_TIMEOUT: 10000,
  /** Size of each color in bytes (RGB + padding) */
  COLOR_SIZE: 4,
  /** Matrix cell value for a position without an LED */
  NO_LED: 0xffffffff,
} as const;

/** Minimum protocol version required by each versioned feature */
export const VERSION_GATES = {
  PROFILES: 2,
  MODE_BRIGHTNESS: 3,
  SAVE_MODE: 3,
  SEGMENTS: 4,
  PLUGINS: 4,
  SEGMENT_CONTROL: 5,
  DEVICE_RESCAN: 5,
  LED_ALT_NAMES: 5,
  CONTROLLER_FLAGS: 5,
  ZONE_FLAGS: 5,
} as const;

/** Wire-level integer limits */
export const WIRE_LIMITS = {
  U8_MAX: 0xff,
  U16_MAX: 0xffff,
  U32_MAX: 0xffffffff,
  I32_MIN: -0x80000000,
  I32_MAX: 0x7fffffff,
} as const;

/** Color value constraints */
export const COLOR_LIMITS = {
  /** Minimum color component value */
  MIN: 0,
  /** Maximum color component value */
  MAX: 255,
} as const;
