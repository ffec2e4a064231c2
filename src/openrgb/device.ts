import { type Codec, enumCodec, i32, string, u32, vec } from './codec.js';
import { colorCodec } from './color.js';
import { VERSION_GATES } from './constants.js';
import { DeviceType } from './enums.js';
import { OpenRGBParseError } from './errors.js';
import { ledCodec } from './led.js';
import { modeCodec } from './mode.js';
import { lengthPrefixed } from './packet.js';
import type { ControllerData } from './types.js';
import { versionGated } from './versioned.js';
import { zoneCodec } from './zone.js';

// unknown device types are expected from newer servers, so they are not an error
const deviceTypeCodec = enumCodec('DeviceType', DeviceType, DeviceType.UNKNOWN);
const zonesCodec = vec(zoneCodec);
const ledsCodec = vec(ledCodec);
const colorsCodec = vec(colorCodec);
const ledAltNamesCodec = versionGated(VERSION_GATES.LED_ALT_NAMES, vec(string));
const controllerFlagsCodec = versionGated(VERSION_GATES.CONTROLLER_FLAGS, u32);

const controllerBodyCodec: Codec<ControllerData> = {
  size: (controller, version) =>
    4 +
    [
      controller.name,
      controller.vendor,
      controller.description,
      controller.version,
      controller.serial,
      controller.location,
    ].reduce((total, text) => total + string.size(text, version), 0) +
    2 +
    4 +
    controller.modes.reduce((total, mode) => total + modeCodec.size(mode, version), 0) +
    zonesCodec.size(controller.zones, version) +
    ledsCodec.size(controller.leds, version) +
    colorsCodec.size(controller.colors, version) +
    ledAltNamesCodec.size(controller.ledAltNames, version) +
    controllerFlagsCodec.size(controller.flags, version),
  encode: (controller, writer) => {
    writer
      .writeValue(deviceTypeCodec, controller.deviceType)
      .writeValue(string, controller.name)
      .writeValue(string, controller.vendor)
      .writeValue(string, controller.description)
      .writeValue(string, controller.version)
      .writeValue(string, controller.serial)
      .writeValue(string, controller.location)
      .writeUint16(controller.modes.length)
      .writeValue(i32, controller.activeMode);
    for (const mode of controller.modes) {
      writer.writeValue(modeCodec, mode);
    }
    writer
      .writeValue(zonesCodec, controller.zones)
      .writeValue(ledsCodec, controller.leds)
      .writeValue(colorsCodec, controller.colors)
      .writeValue(ledAltNamesCodec, controller.ledAltNames)
      .writeValue(controllerFlagsCodec, controller.flags);
  },
  decode: (parser) => {
    const deviceType = parser.readValue(deviceTypeCodec);
    const name = parser.readValue(string);
    const vendor = parser.readValue(string);
    const description = parser.readValue(string);
    const version = parser.readValue(string);
    const serial = parser.readValue(string);
    const location = parser.readValue(string);

    // the mode count precedes the active mode, so modes are not a plain `vec`
    const modeCount = parser.readUint16();
    const activeMode = parser.readValue(i32);
    if (modeCount > parser.getRemainingBytes()) {
      throw new OpenRGBParseError(
        `Controller claims ${modeCount} modes but only ${parser.getRemainingBytes()} bytes remain`,
        parser.getCurrentOffset(),
      );
    }
    const modes = parser
      .readValues(modeCodec, modeCount)
      .map((mode, index) => ({ ...mode, index }));

    const zones = parser.readValue(zonesCodec).map((zone, id) => ({ ...zone, id }));
    const leds = parser.readValue(ledsCodec);
    const colors = parser.readValue(colorsCodec);
    const ledAltNames = parser.readValue(ledAltNamesCodec);
    const flags = parser.readValue(controllerFlagsCodec);

    return {
      deviceType,
      name,
      vendor,
      description,
      version,
      serial,
      location,
      activeMode,
      modes,
      zones,
      leds,
      colors,
      ledAltNames,
      flags,
    };
  },
};

/**
 * Payload of a `RequestControllerData` reply. The leading data size is
 * written on encode and skipped on decode.
 */
export const controllerDataCodec: Codec<ControllerData> = lengthPrefixed(controllerBodyCodec);
