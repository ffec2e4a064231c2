import type { Codec } from './codec.js';
import { OpenRGBProtocolError } from './errors.js';

/**
 * A field that only exists on the wire from some protocol version onward.
 *
 * Below that version the field is `unsupported`: it takes no bytes and has
 * no value. Fields not yet read and fields the server predates both end up
 * here, which is all callers need to know.
 */
export type VersionGated<T> =
  | { readonly kind: 'present'; readonly value: T }
  | { readonly kind: 'unsupported' };

export const unsupported: VersionGated<never> = Object.freeze({ kind: 'unsupported' });

export function present<T>(value: T): VersionGated<T> {
  return { kind: 'present', value };
}

/** Wraps `value` as present when `version` reaches `minVersion` */
export function gateValue<T>(value: T, minVersion: number, version: number): VersionGated<T> {
  return version < minVersion ? unsupported : present(value);
}

export function isSupported<T>(
  gated: VersionGated<T>,
): gated is { readonly kind: 'present'; readonly value: T } {
  return gated.kind === 'present';
}

export function gatedValue<T>(gated: VersionGated<T>): T | undefined {
  return gated.kind === 'present' ? gated.value : undefined;
}

export function versionGated<T>(minVersion: number, codec: Codec<T>): Codec<VersionGated<T>> {
  return {
    size: (gated, version) => {
      if (version < minVersion || gated.kind === 'unsupported') {
        return 0;
      }
      return codec.size(gated.value, version);
    },
    encode: (gated, writer) => {
      if (writer.protocolVersion < minVersion) {
        return;
      }
      if (gated.kind === 'unsupported') {
        throw new OpenRGBProtocolError(
          `Field introduced in protocol version ${minVersion} has no value to encode at version ${writer.protocolVersion}`,
        );
      }
      writer.writeValue(codec, gated.value);
    },
    decode: (parser) => {
      if (parser.protocolVersion < minVersion) {
        return unsupported;
      }
      return present(parser.readValue(codec));
    },
  };
}
