import { type Codec, enumCodec, flagSet, i32, string, u32, vec } from './codec.js';
import { colorCodec } from './color.js';
import { VERSION_GATES } from './constants.js';
import { ColorMode, Direction, MODE_FLAG_MASK, ModeFlag } from './enums.js';
import type { ModeData } from './types.js';
import { gatedValue, versionGated } from './versioned.js';

const modeFlagsCodec = flagSet('ModeFlag', MODE_FLAG_MASK);
const directionCodec = enumCodec('Direction', Direction);
const colorModeCodec = enumCodec('ColorMode', ColorMode);
const brightnessCodec = versionGated(VERSION_GATES.MODE_BRIGHTNESS, u32);
const colorsCodec = vec(colorCodec);

/**
 * Mode description as carried by controller data, `UpdateMode` and
 * `SaveMode`. `index` is not on the wire: decoding leaves it at 0 and the
 * controller decoder assigns positions.
 */
export const modeCodec: Codec<ModeData> = {
  size: (mode, version) =>
    string.size(mode.name, version) +
    4 * 9 +
    brightnessCodec.size(mode.brightnessMin, version) +
    brightnessCodec.size(mode.brightnessMax, version) +
    brightnessCodec.size(mode.brightness, version) +
    colorsCodec.size(mode.colors, version),
  encode: (mode, writer) => {
    writer
      .writeValue(string, mode.name)
      .writeValue(i32, mode.value)
      .writeValue(modeFlagsCodec, mode.flags)
      .writeValue(u32, mode.speedMin)
      .writeValue(u32, mode.speedMax)
      .writeValue(brightnessCodec, mode.brightnessMin)
      .writeValue(brightnessCodec, mode.brightnessMax)
      .writeValue(u32, mode.colorsMin)
      .writeValue(u32, mode.colorsMax)
      .writeValue(u32, mode.speed)
      .writeValue(brightnessCodec, mode.brightness)
      .writeValue(directionCodec, mode.direction)
      .writeValue(colorModeCodec, mode.colorMode)
      .writeValue(colorsCodec, mode.colors);
  },
  decode: (parser) => {
    const name = parser.readValue(string);
    const value = parser.readValue(i32);
    // flags come first: they decide which of the following numbers mean anything
    const flags = parser.readValue(modeFlagsCodec);
    const speedMin = parser.readValue(u32);
    const speedMax = parser.readValue(u32);
    const brightnessMin = parser.readValue(brightnessCodec);
    const brightnessMax = parser.readValue(brightnessCodec);
    const colorsMin = parser.readValue(u32);
    const colorsMax = parser.readValue(u32);
    const speed = parser.readValue(u32);
    const brightness = parser.readValue(brightnessCodec);
    const direction = parser.readValue(directionCodec);
    const colorMode = parser.readValue(colorModeCodec);
    const colors = parser.readValue(colorsCodec);

    return {
      index: 0,
      name,
      value,
      flags,
      speedMin,
      speedMax,
      brightnessMin,
      brightnessMax,
      colorsMin,
      colorsMax,
      speed,
      brightness,
      direction,
      colorMode,
      colors,
    };
  },
};

export interface Range {
  min: number;
  max: number;
}

/**
 * True when every bit of `flag` is set on the mode. For the combined
 * `ModeFlag.HAS_DIRECTION` that means all three axes; `modeDirection`
 * only needs one of them.
 */
export function hasModeFlag(mode: ModeData, flag: ModeFlag): boolean {
  return (mode.flags & flag) === flag;
}

function hasAnyDirection(mode: ModeData): boolean {
  return (mode.flags & ModeFlag.HAS_DIRECTION) !== 0;
}

export function modeSpeed(mode: ModeData): number | undefined {
  return hasModeFlag(mode, ModeFlag.HAS_SPEED) ? mode.speed : undefined;
}

export function modeSpeedRange(mode: ModeData): Range | undefined {
  return hasModeFlag(mode, ModeFlag.HAS_SPEED) ? { min: mode.speedMin, max: mode.speedMax } : undefined;
}

export function modeBrightness(mode: ModeData): number | undefined {
  return hasModeFlag(mode, ModeFlag.HAS_BRIGHTNESS) ? gatedValue(mode.brightness) : undefined;
}

export function modeBrightnessRange(mode: ModeData): Range | undefined {
  if (!hasModeFlag(mode, ModeFlag.HAS_BRIGHTNESS)) {
    return undefined;
  }
  const min = gatedValue(mode.brightnessMin);
  const max = gatedValue(mode.brightnessMax);
  return min === undefined || max === undefined ? undefined : { min, max };
}

/** Set when the mode supports any of the three direction axes */
export function modeDirection(mode: ModeData): Direction | undefined {
  return hasAnyDirection(mode) ? mode.direction : undefined;
}

export function modeColorRange(mode: ModeData): Range | undefined {
  return mode.colors.length > 0 ? { min: mode.colorsMin, max: mode.colorsMax } : undefined;
}
