import type { Codec } from './codec.js';
import { COLOR_LIMITS, PROTOCOL } from './constants.js';
import { OpenRGBProtocolError } from './errors.js';
import type { RGBColor } from './types.js';

/** R, G, B and a padding byte written as 0 and ignored on read */
export const colorCodec: Codec<RGBColor> = {
  size: () => PROTOCOL.COLOR_SIZE,
  encode: (color, writer) => {
    const { r, g, b } = color;
    if (!isValidRGBColor(color)) {
      throw new OpenRGBProtocolError(
        `Invalid color (${r}, ${g}, ${b}): channels must be integers in [${COLOR_LIMITS.MIN}, ${COLOR_LIMITS.MAX}]`,
      );
    }
    writer.writeUint8(r).writeUint8(g).writeUint8(b).writeUint8(0);
  },
  decode: (parser) => {
    const r = parser.readUint8();
    const g = parser.readUint8();
    const b = parser.readUint8();
    parser.skip(1);
    return { r, g, b };
  },
};

/**
 * Checks if an object is a valid RGBColor
 */
export function isValidRGBColor(obj: unknown): obj is RGBColor {
  if (typeof obj !== 'object' || obj === null) return false;

  const isChannel = (value: unknown): boolean =>
    typeof value === 'number' &&
    Number.isInteger(value) &&
    value >= COLOR_LIMITS.MIN &&
    value <= COLOR_LIMITS.MAX;

  return 'r' in obj && 'g' in obj && 'b' in obj && isChannel(obj.r) && isChannel(obj.g) && isChannel(obj.b);
}
