/**
 * Tests for material export and the two-pass material import
 */

import { describe, test, expect, vi } from 'vitest';
import {
  createMaterialResolver,
  DecodingMaterialResolver,
  DisabledMaterialResolver,
  flattenMaterial,
  meshToMaterial,
  substituteTextures
} from '../../../src/converters/helpers/material-mapper';
import { DEGRADATIONS } from '../../../src/constants/errors';
import type { GltfDocument } from '../../../src/schemas/gltf-document';
import { echoDecoder, quietLogger } from '../../fixtures/scenes';

const IMAGE_BYTES = new Uint8Array([137, 80, 78, 71]);

const TEXTURED: GltfDocument = {
  images: [{ bufferView: 0, mimeType: 'image/png' }],
  textures: [{ source: 0 }],
  materials: [
    {
      name: 'painted',
      pbrMetallicRoughness: { baseColorFactor: [1, 1, 1, 1], baseColorTexture: { index: 0 }, roughnessFactor: 0.5 },
      normalTexture: { index: 0 },
      doubleSided: true,
    },
  ],
};

describe('meshToMaterial', () => {
  test('scales the main color into [0, 1]', () => {
    expect(meshToMaterial([255, 0, 51, 255])).toEqual({
      pbrMetallicRoughness: {
        baseColorFactor: [1, 0, Math.fround(0.2), 1],
        metallicFactor: 0,
        roughnessFactor: 0,
      },
    });
  });
});

describe('flattenMaterial', () => {
  test('lifts PBR fields and separates texture references', () => {
    const material = TEXTURED.materials?.[0] ?? {};
    const { scalars, textures } = flattenMaterial(material);

    expect(scalars).toEqual({ name: 'painted', baseColorFactor: [1, 1, 1, 1], roughnessFactor: 0.5, doubleSided: true });
    expect(textures).toEqual({ baseColorTexture: { index: 0 }, normalTexture: { index: 0 } });
  });
});

describe('substituteTextures', () => {
  test('replaces references with images and missing sources with null', () => {
    const bitmap = { width: 1, height: 1, data: IMAGE_BYTES };
    const tree: GltfDocument = { textures: [{ source: 0 }, {}] };
    const fields = substituteTextures(
      { scalars: { name: 'm' }, textures: { baseColorTexture: { index: 0 }, emissiveTexture: { index: 1 } } },
      tree,
      [bitmap]
    );
    expect(fields).toEqual({ name: 'm', baseColorTexture: bitmap, emissiveTexture: null });
  });
});

describe('DecodingMaterialResolver', () => {
  test('decodes each image once and builds one material per entry', () => {
    const decode = vi.spyOn(echoDecoder, 'decode');
    const resolver = new DecodingMaterialResolver(echoDecoder, quietLogger());
    const [material] = resolver.resolve({ tree: TEXTURED, views: [IMAGE_BYTES] });

    expect(decode).toHaveBeenCalledTimes(1);
    expect(decode).toHaveBeenCalledWith(IMAGE_BYTES, 'image/png');
    expect(material.name).toBe('painted');
    expect(material.roughnessFactor).toBe(0.5);
    expect(material.baseColorTexture?.data).toBe(IMAGE_BYTES);
    expect(material.normalTexture).toBe(material.baseColorTexture);
    decode.mockRestore();
  });

  test('reads images from data URIs and external files', () => {
    const tree: GltfDocument = {
      images: [{ uri: 'data:image/png;base64,AQID' }, { uri: 'tex%20a.png' }],
    };
    const decoder = { decode: vi.fn(echoDecoder.decode) };
    const files = new Map([['tex a.png', new Uint8Array([9])]]);

    new DecodingMaterialResolver(decoder, quietLogger()).resolve({ tree, views: [], resolveUri: uri => files.get(uri) ?? null });

    expect(Array.from(decoder.decode.mock.calls[0][0])).toEqual([1, 2, 3]);
    expect(Array.from(decoder.decode.mock.calls[1][0])).toEqual([9]);
  });

  test('leaves an image with a malformed URI empty', () => {
    const logger = quietLogger();
    const error = vi.spyOn(logger, 'error').mockImplementation(() => undefined);
    const tree: GltfDocument = { ...TEXTURED, images: [{ uri: 'tex%zz.png' }] };
    const resolveUri = vi.fn(() => IMAGE_BYTES);

    const [material] = new DecodingMaterialResolver(echoDecoder, logger).resolve({ tree, views: [], resolveUri });

    expect(material.baseColorTexture).toBeNull();
    expect(resolveUri).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledWith(
      'Image 0 has no readable data',
      expect.objectContaining({ degradation: DEGRADATIONS.IMAGE_DECODE_FAILED, uri: 'tex%zz.png' })
    );
  });

  test('logs a failed decode and leaves the texture empty', () => {
    const logger = quietLogger();
    const error = vi.spyOn(logger, 'error').mockImplementation(() => undefined);
    const failing = { decode: () => { throw new Error('corrupt image'); } };

    const [material] = new DecodingMaterialResolver(failing, logger).resolve({ tree: TEXTURED, views: [IMAGE_BYTES] });

    expect(material.baseColorTexture).toBeNull();
    expect(error).toHaveBeenCalledWith(
      'Image 0 failed to decode',
      expect.objectContaining({ degradation: DEGRADATIONS.IMAGE_DECODE_FAILED })
    );
  });
});

describe('createMaterialResolver', () => {
  test('returns no materials without a decoder and warns', () => {
    const logger = quietLogger();
    const warn = vi.spyOn(logger, 'warn');
    const resolver = createMaterialResolver(undefined, logger);

    expect(resolver).toBeInstanceOf(DisabledMaterialResolver);
    expect(resolver.enabled).toBe(false);
    expect(resolver.resolve({ tree: TEXTURED, views: [] })).toEqual([]);
    expect(warn).toHaveBeenCalledWith(
      expect.any(String),
      expect.objectContaining({ degradation: DEGRADATIONS.MISSING_IMAGE_DECODER })
    );
  });

  test('stays silent for documents without materials', () => {
    const logger = quietLogger();
    const warn = vi.spyOn(logger, 'warn');
    createMaterialResolver(undefined, logger).resolve({ tree: {}, views: [] });
    expect(warn).not.toHaveBeenCalled();
  });

  test('decodes when a decoder is supplied', () => {
    expect(createMaterialResolver(echoDecoder, quietLogger())).toBeInstanceOf(DecodingMaterialResolver);
  });
});
