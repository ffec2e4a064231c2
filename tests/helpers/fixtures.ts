import { PROTOCOL, VERSION_GATES } from '../../src/openrgb/constants.js';
import { ColorMode, DeviceType, Direction, ModeFlag, ZoneType } from '../../src/openrgb/enums.js';
import type { ControllerData, ModeData, PluginData, ZoneData } from '../../src/openrgb/types.js';
import { gateValue } from '../../src/openrgb/versioned.js';

export function directMode(version: number): ModeData {
  return {
    index: 0,
    name: 'Direct',
    value: 0,
    flags: ModeFlag.HAS_PER_LED_COLOR,
    speedMin: 0,
    speedMax: 0,
    brightnessMin: gateValue(0, VERSION_GATES.MODE_BRIGHTNESS, version),
    brightnessMax: gateValue(0, VERSION_GATES.MODE_BRIGHTNESS, version),
    colorsMin: 0,
    colorsMax: 0,
    speed: 0,
    brightness: gateValue(0, VERSION_GATES.MODE_BRIGHTNESS, version),
    direction: Direction.LEFT,
    colorMode: ColorMode.PER_LED,
    colors: [],
  };
}

export function breathingMode(version: number): ModeData {
  return {
    index: 1,
    name: 'Breathing',
    value: 2,
    flags:
      ModeFlag.HAS_SPEED |
      ModeFlag.HAS_DIRECTION_LR |
      ModeFlag.HAS_BRIGHTNESS |
      ModeFlag.HAS_MODE_SPECIFIC_COLOR,
    speedMin: 1,
    speedMax: 5,
    brightnessMin: gateValue(10, VERSION_GATES.MODE_BRIGHTNESS, version),
    brightnessMax: gateValue(100, VERSION_GATES.MODE_BRIGHTNESS, version),
    colorsMin: 1,
    colorsMax: 2,
    speed: 3,
    brightness: gateValue(80, VERSION_GATES.MODE_BRIGHTNESS, version),
    direction: Direction.RIGHT,
    colorMode: ColorMode.MODE_SPECIFIC,
    colors: [{ r: 255, g: 0, b: 64 }],
  };
}

export function matrixZone(version: number): ZoneData {
  return {
    id: 0,
    name: 'Keys',
    type: ZoneType.MATRIX,
    ledsMin: 5,
    ledsMax: 5,
    ledsCount: 5,
    matrix: {
      height: 2,
      width: 3,
      rows: [
        [0, 1, 2],
        [3, 4, PROTOCOL.NO_LED],
      ],
    },
    segments: gateValue([], VERSION_GATES.SEGMENTS, version),
    flags: gateValue(0, VERSION_GATES.ZONE_FLAGS, version),
  };
}

export function stripZone(version: number): ZoneData {
  return {
    id: 1,
    name: 'Underglow',
    type: ZoneType.LINEAR,
    ledsMin: 0,
    ledsMax: 30,
    ledsCount: 2,
    segments: gateValue(
      [{ name: 'Front', type: ZoneType.LINEAR, startIndex: 0, ledCount: 2 }],
      VERSION_GATES.SEGMENTS,
      version,
    ),
    flags: gateValue(1, VERSION_GATES.ZONE_FLAGS, version),
  };
}

/** A keyboard with a matrix zone and a resizable strip, shaped for `version` */
export function sampleController(version: number): ControllerData {
  const ledNames = ['Key: A', 'Key: B', 'Key: C', 'Key: D', 'Key: E', 'Strip 1', 'Strip 2'];

  return {
    deviceType: DeviceType.KEYBOARD,
    name: 'Test Keyboard',
    vendor: 'Test Vendor',
    description: 'Keyboard used in tests',
    version: '1.0.0',
    serial: 'SN-0001',
    location: 'HID: /dev/hidraw0',
    activeMode: 1,
    modes: [directMode(version), breathingMode(version)],
    zones: [matrixZone(version), stripZone(version)],
    leds: ledNames.map((name, value) => ({ name, value })),
    colors: ledNames.map((_, i) => ({ r: i * 10, g: 0, b: 255 - i })),
    ledAltNames: gateValue(['A', 'B', 'C', 'D', 'E', '', ''], VERSION_GATES.LED_ALT_NAMES, version),
    flags: gateValue(0, VERSION_GATES.CONTROLLER_FLAGS, version),
  };
}

export const samplePlugins: PluginData[] = [
  {
    name: 'Effects',
    description: 'Effect engine',
    version: '0.9',
    index: 0,
    protocolVersion: 1,
  },
  {
    name: 'Visual Map',
    description: 'Virtual controllers',
    version: '1.2',
    index: 1,
    protocolVersion: 2,
  },
];
