import { type Codec, i32, string, u32, vec } from './codec.js';
import { lengthPrefixed } from './packet.js';
import type { PluginData } from './types.js';

export const pluginCodec: Codec<PluginData> = {
  size: (plugin, version) =>
    string.size(plugin.name, version) +
    string.size(plugin.description, version) +
    string.size(plugin.version, version) +
    8,
  encode: (plugin, writer) => {
    writer
      .writeValue(string, plugin.name)
      .writeValue(string, plugin.description)
      .writeValue(string, plugin.version)
      .writeValue(u32, plugin.index)
      .writeValue(i32, plugin.protocolVersion);
  },
  decode: (parser) => ({
    name: parser.readValue(string),
    description: parser.readValue(string),
    version: parser.readValue(string),
    index: parser.readValue(u32),
    protocolVersion: parser.readValue(i32),
  }),
};

/** `RequestPluginList` reply: data size, then the plugins */
export const pluginListCodec: Codec<PluginData[]> = lengthPrefixed(vec(pluginCodec));
