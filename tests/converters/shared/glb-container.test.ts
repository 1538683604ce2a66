/**
 * Tests for the GLB container: header arithmetic, chunk alignment and
 * rejection of malformed files
 */

import { describe, test, expect } from 'vitest';
import { isGlb, packGlb, readGlbHeader, unpackGlb } from '../../../src/converters/shared/glb-container';
import { GLB_CONSTANTS } from '../../../src/constants/gltf';
import { ERROR_MESSAGES } from '../../../src/constants/errors';
import { GltfFormatError, GltfInvariantError } from '../../../src/errors';

const BINARY = new Uint8Array([1, 2, 3, 4]);

function view(bytes: Uint8Array): DataView {
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

describe('packGlb', () => {
  // '{"a":1}' is 7 bytes, padded to 8
  const glb = packGlb({ a: 1 }, BINARY);

  test('writes magic, version and total length', () => {
    expect(glb.length).toBe(40);
    expect(view(glb).getUint32(0, true)).toBe(GLB_CONSTANTS.MAGIC);
    expect(view(glb).getUint32(4, true)).toBe(2);
    expect(view(glb).getUint32(8, true)).toBe(28 + 8 + 4);
  });

  test('pads the JSON chunk with spaces to a 4-byte boundary', () => {
    expect(view(glb).getUint32(12, true)).toBe(8);
    expect(view(glb).getUint32(16, true)).toBe(GLB_CONSTANTS.CHUNK_TYPE_JSON);
    expect(new TextDecoder().decode(glb.subarray(20, 28))).toBe('{"a":1} ');
  });

  test('writes the BIN chunk after the JSON chunk', () => {
    expect(view(glb).getUint32(28, true)).toBe(4);
    expect(view(glb).getUint32(32, true)).toBe(GLB_CONSTANTS.CHUNK_TYPE_BIN);
    expect(Array.from(glb.subarray(36))).toEqual([1, 2, 3, 4]);
  });

  test('pads multi-byte UTF-8 text by encoded length', () => {
    // '{"n":"é"}' is 9 characters but 10 bytes
    const packed = packGlb({ n: 'é' }, new Uint8Array(0));
    expect(view(packed).getUint32(12, true)).toBe(12);
    expect(packed.length % 4).toBe(0);
  });

  test('rejects an unaligned binary payload', () => {
    expect(() => packGlb({}, new Uint8Array(3))).toThrow(GltfInvariantError);
  });
});

describe('unpackGlb', () => {
  test('returns the parsed JSON and the BIN chunk', () => {
    const { header, buffers } = unpackGlb(packGlb({ a: 1 }, BINARY));
    expect(header).toEqual({ a: 1 });
    expect(buffers).toHaveLength(1);
    expect(Array.from(buffers[0])).toEqual([1, 2, 3, 4]);
  });

  test('rejects a file whose magic is not glTF', () => {
    const glb = packGlb({ a: 1 }, BINARY);
    glb[0] = 0;
    expect(() => unpackGlb(glb)).toThrow(GltfFormatError);
    expect(() => unpackGlb(glb)).toThrow(ERROR_MESSAGES.NOT_GLTF_2);
  });

  test('rejects version 1 files', () => {
    const glb = packGlb({ a: 1 }, BINARY);
    view(glb).setUint32(4, 1, true);
    expect(() => readGlbHeader(glb)).toThrow(ERROR_MESSAGES.NOT_GLTF_2);
  });

  test('rejects a first chunk that is not JSON', () => {
    const glb = packGlb({ a: 1 }, BINARY);
    view(glb).setUint32(16, GLB_CONSTANTS.CHUNK_TYPE_BIN, true);
    expect(() => unpackGlb(glb)).toThrow(ERROR_MESSAGES.NO_JSON_CHUNK);
  });

  test('rejects JSON that is not valid UTF-8', () => {
    const glb = packGlb({ a: 1 }, BINARY);
    glb[20] = 0xff;
    expect(() => unpackGlb(glb)).toThrow(ERROR_MESSAGES.INVALID_JSON);
  });

  test('rejects a binary chunk shorter than declared', () => {
    const glb = packGlb({ a: 1 }, BINARY).slice(0, 38);
    expect(() => unpackGlb(glb)).toThrow(ERROR_MESSAGES.TRUNCATED_CHUNK);
  });

  test('rejects a chunk after JSON that is not BIN', () => {
    const glb = packGlb({ a: 1 }, BINARY);
    view(glb).setUint32(32, GLB_CONSTANTS.CHUNK_TYPE_JSON, true);
    expect(() => unpackGlb(glb)).toThrow(ERROR_MESSAGES.NOT_BINARY_CHUNK);
  });

  test('stops at trailing bytes too short for a chunk header', () => {
    const glb = packGlb({ a: 1 }, BINARY);
    const padded = new Uint8Array(43);
    padded.set(glb);
    view(padded).setUint32(8, 44, true);
    expect(unpackGlb(padded).buffers).toHaveLength(1);
  });

  test('carries the stage on format errors', () => {
    const glb = packGlb({ a: 1 }, BINARY).slice(0, 38);
    try {
      unpackGlb(glb);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(GltfFormatError);
      if (error instanceof GltfFormatError) {
        expect(error.stage).toBe('glb_binary_chunk');
        expect(error.code).toBe('GLTF_FORMAT_ERROR');
      }
    }
  });
});

describe('isGlb', () => {
  test('detects the magic number', () => {
    expect(isGlb(packGlb({}, new Uint8Array(0)))).toBe(true);
    expect(isGlb(new TextEncoder().encode('{"asset":{}}'))).toBe(false);
  });
});
