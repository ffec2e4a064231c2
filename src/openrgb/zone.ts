import { type Codec, enumCodec, string, u32, vec } from './codec.js';
import { VERSION_GATES } from './constants.js';
import { ZoneType } from './enums.js';
import { OpenRGBParseError, OpenRGBProtocolError } from './errors.js';
import type { BinaryParser } from './parser.js';
import { segmentCodec } from './segment.js';
import type { LedMatrix, ZoneData } from './types.js';
import type { BinaryWriter } from './writer.js';
import { versionGated } from './versioned.js';

const zoneTypeCodec = enumCodec('ZoneType', ZoneType);
const segmentsCodec = versionGated(VERSION_GATES.SEGMENTS, vec(segmentCodec));
const zoneFlagsCodec = versionGated(VERSION_GATES.ZONE_FLAGS, u32);

/** Bytes announced by the matrix length field: height, width, then the cells */
function matrixByteLength(matrix: LedMatrix | undefined): number {
  return matrix === undefined ? 0 : 8 + 4 * matrix.height * matrix.width;
}

function writeMatrix(matrix: LedMatrix | undefined, writer: BinaryWriter): void {
  const length = matrixByteLength(matrix);
  writer.writeUint16(length);
  if (matrix === undefined) {
    return;
  }

  if (matrix.rows.length !== matrix.height || matrix.rows.some((row) => row.length !== matrix.width)) {
    throw new OpenRGBProtocolError(
      `Matrix rows do not match the declared ${matrix.height}x${matrix.width} shape`,
    );
  }
  writer.writeUint32(matrix.height).writeUint32(matrix.width);
  for (const row of matrix.rows) {
    for (const cell of row) {
      writer.writeUint32(cell);
    }
  }
}

function readMatrix(parser: BinaryParser): LedMatrix | undefined {
  const length = parser.readUint16();
  if (length === 0) {
    return undefined;
  }

  const height = parser.readUint32();
  const width = parser.readUint32();
  const cells = height * width;
  if (cells * 4 > parser.getRemainingBytes()) {
    throw new OpenRGBParseError(
      `Matrix of ${height}x${width} needs ${cells * 4} bytes, only ${parser.getRemainingBytes()} remain`,
      parser.getCurrentOffset(),
    );
  }

  const rows: number[][] = [];
  for (let y = 0; y < height; y++) {
    rows.push(parser.readValues(u32, width));
  }
  return { height, width, rows };
}

/**
 * Zone description. `id` is not on the wire: decoding leaves it at 0 and
 * the controller decoder assigns positions.
 */
export const zoneCodec: Codec<ZoneData> = {
  size: (zone, version) =>
    string.size(zone.name, version) +
    4 * 4 +
    2 +
    matrixByteLength(zone.matrix) +
    segmentsCodec.size(zone.segments, version) +
    zoneFlagsCodec.size(zone.flags, version),
  encode: (zone, writer) => {
    writer
      .writeValue(string, zone.name)
      .writeValue(zoneTypeCodec, zone.type)
      .writeValue(u32, zone.ledsMin)
      .writeValue(u32, zone.ledsMax)
      .writeValue(u32, zone.ledsCount);
    writeMatrix(zone.matrix, writer);
    writer.writeValue(segmentsCodec, zone.segments).writeValue(zoneFlagsCodec, zone.flags);
  },
  decode: (parser) => {
    const name = parser.readValue(string);
    const type = parser.readValue(zoneTypeCodec);
    const ledsMin = parser.readValue(u32);
    const ledsMax = parser.readValue(u32);
    const ledsCount = parser.readValue(u32);
    const matrix = readMatrix(parser);
    const segments = parser.readValue(segmentsCodec);
    const flags = parser.readValue(zoneFlagsCodec);

    return { id: 0, name, type, ledsMin, ledsMax, ledsCount, matrix, segments, flags };
  },
};
