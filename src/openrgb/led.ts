import { type Codec, string, u32 } from './codec.js';
import type { LED } from './types.js';

export const ledCodec: Codec<LED> = {
  size: (led, version) => string.size(led.name, version) + 4,
  encode: (led, writer) => {
    writer.writeValue(string, led.name).writeValue(u32, led.value);
  },
  decode: (parser) => ({
    name: parser.readValue(string),
    value: parser.readValue(u32),
  }),
};
