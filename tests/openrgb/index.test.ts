import { describe, expect, it } from 'vitest';

describe('OpenRGB Module Index', () => {
  describe('module exports', () => {
    it('should export the client, codecs and enums', async () => {
      const openrgb = await import('../../src/openrgb/index.js');

      expect(typeof openrgb.OpenRGBClient).toBe('function');
      expect(typeof openrgb.NetworkClient).toBe('function');
      expect(typeof openrgb.controllerDataCodec.decode).toBe('function');
      expect(typeof openrgb.PacketType).toBe('object');
      expect(openrgb.PROTOCOL.MAX_PROTOCOL_VERSION).toBe(5);
    });

    it('should allow creating a client without options', async () => {
      const { OpenRGBClient } = await import('../../src/openrgb/index.js');

      const client = new OpenRGBClient();
      expect(client).toBeInstanceOf(OpenRGBClient);
      expect(client.status).toBe('disconnected');
    });
  });

  describe('re-exports consistency', () => {
    it('should re-export the same objects as individual modules', async () => {
      const fromIndex = await import('../../src/openrgb/index.js');
      const fromRoot = await import('../../src/index.js');

      const { PacketType } = await import('../../src/openrgb/enums.js');
      const { controllerDataCodec } = await import('../../src/openrgb/device.js');
      const { OpenRGBClient } = await import('../../src/openrgb/client.js');

      expect(fromIndex.PacketType).toBe(PacketType);
      expect(fromIndex.controllerDataCodec).toBe(controllerDataCodec);
      expect(fromIndex.OpenRGBClient).toBe(OpenRGBClient);
      expect(fromRoot.OpenRGBClient).toBe(OpenRGBClient);
    });
  });
});
