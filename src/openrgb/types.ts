/**
 * OpenRGB Protocol Types
 *
 * These interfaces represent the data structures defined by the OpenRGB protocol specification.
 * Decoded values are snapshots: every fetch rebuilds them from the wire.
 */

import type { ColorMode, DeviceType, Direction, ZoneType } from './enums.js';
import type { VersionGated } from './versioned.js';

/**
 * RGB color. On the wire it takes four bytes, the last one padding.
 */
export interface RGBColor {
  /** Red component (0-255) */
  r: number;
  /** Green component (0-255) */
  g: number;
  /** Blue component (0-255) */
  b: number;
}

/**
 * Represents an individual LED within an OpenRGB device
 */
export interface LED {
  /** Human-readable name of the LED */
  name: string;
  /** Device-specific value with no meaning to clients */
  value: number;
}

/**
 * Named sub-range of a zone (protocol version 4 and later)
 */
export interface SegmentData {
  name: string;
  type: number;
  /** Index of the first LED of the segment within its zone */
  startIndex: number;
  ledCount: number;
}

/**
 * Represents an OpenRGB device mode with its configuration.
 *
 * The numeric parameters are always on the wire but only mean something
 * when the matching flag is set; see the accessors in `mode.ts`.
 */
export interface ModeData {
  /** Position of the mode in its controller's list, not sent by the server */
  index: number;
  /** Human-readable name of the mode */
  name: string;
  /** Device-specific mode value */
  value: number;
  /** Mode capability flags (`ModeFlag` bits) */
  flags: number;
  /** Minimum speed value for the mode */
  speedMin: number;
  /** Maximum speed value for the mode */
  speedMax: number;
  brightnessMin: VersionGated<number>;
  brightnessMax: VersionGated<number>;
  /** Minimum number of colors for the mode */
  colorsMin: number;
  /** Maximum number of colors for the mode */
  colorsMax: number;
  /** Current speed setting */
  speed: number;
  brightness: VersionGated<number>;
  /** Direction setting for animated modes */
  direction: Direction;
  colorMode: ColorMode;
  /** Mode-specific colors, empty when the mode uses none */
  colors: RGBColor[];
}

/**
 * Spatial layout of a matrix zone. `rows[y][x]` is the LED index at that
 * position, or `PROTOCOL.NO_LED` when the position is empty.
 */
export interface LedMatrix {
  height: number;
  width: number;
  rows: number[][];
}

/**
 * Represents a zone within an OpenRGB device
 */
export interface ZoneData {
  /** Position of the zone in its controller's list, not sent by the server */
  id: number;
  /** Human-readable name of the zone */
  name: string;
  type: ZoneType;
  /** Minimum number of LEDs in this zone */
  ledsMin: number;
  /** Maximum number of LEDs in this zone */
  ledsMax: number;
  /** Current number of LEDs in this zone */
  ledsCount: number;
  matrix?: LedMatrix;
  segments: VersionGated<SegmentData[]>;
  flags: VersionGated<number>;
}

/**
 * Everything the server reports about one controller
 */
export interface ControllerData {
  deviceType: DeviceType;
  name: string;
  vendor: string;
  description: string;
  version: string;
  serial: string;
  location: string;
  activeMode: number;
  modes: ModeData[];
  zones: ZoneData[];
  leds: LED[];
  /** Current LED colors, parallel to `leds` */
  colors: RGBColor[];
  ledAltNames: VersionGated<string[]>;
  flags: VersionGated<number>;
}

/**
 * Plugin loaded by the server (protocol version 4 and later)
 */
export interface PluginData {
  name: string;
  description: string;
  version: string;
  /** Device id to address `PluginSpecific` packets to */
  index: number;
  protocolVersion: number;
}
