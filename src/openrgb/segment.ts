import { type Codec, i32, string, u32 } from './codec.js';
import { VERSION_GATES } from './constants.js';
import { OpenRGBProtocolError } from './errors.js';
import type { SegmentData } from './types.js';

function requireSegments(version: number): void {
  if (version < VERSION_GATES.SEGMENTS) {
    throw new OpenRGBProtocolError(
      `SegmentData is not supported in protocol version ${version} (requires ${VERSION_GATES.SEGMENTS})`,
    );
  }
}

/**
 * Segments do not exist before protocol version 4. Encoding or decoding one
 * for an older version is an error rather than a silent default.
 */
export const segmentCodec: Codec<SegmentData> = {
  size: (segment, version) => {
    requireSegments(version);
    return string.size(segment.name, version) + 12;
  },
  encode: (segment, writer) => {
    requireSegments(writer.protocolVersion);
    writer
      .writeValue(string, segment.name)
      .writeValue(i32, segment.type)
      .writeValue(u32, segment.startIndex)
      .writeValue(u32, segment.ledCount);
  },
  decode: (parser) => {
    requireSegments(parser.protocolVersion);
    return {
      name: parser.readValue(string),
      type: parser.readValue(i32),
      startIndex: parser.readValue(u32),
      ledCount: parser.readValue(u32),
    };
  },
};
