/**
 * Byte Utilities
 *
 * Helpers for laying typed values out as little-endian byte chunks.
 */

import { COMPONENT_ENCODINGS, GLB_CONSTANTS, type ComponentType } from '../constants/gltf';
import { assertInvariant } from '../errors';

/**
 * Pads a chunk with `fill` bytes so its length is a multiple of `bound`.
 * Returns the input unchanged when it is already aligned.
 */
export function bytePad(
  data: Uint8Array,
  bound: number = GLB_CONSTANTS.ALIGNMENT,
  fill: number = GLB_CONSTANTS.BIN_PADDING_BYTE
): Uint8Array {
  const remainder = data.length % bound;
  if (remainder === 0) {
    return data;
  }

  const padded = new Uint8Array(data.length + bound - remainder);
  padded.set(data, 0);
  padded.fill(fill, data.length);
  assertInvariant(padded.length % bound === 0, 'padded chunk is not aligned', { length: padded.length, bound });
  return padded;
}

/**
 * Concatenates chunks into a single buffer
 */
export function concatBytes(chunks: readonly Uint8Array[]): Uint8Array {
  const total = chunks.reduce((sum, chunk) => sum + chunk.length, 0);
  const result = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    result.set(chunk, offset);
    offset += chunk.length;
  }
  return result;
}

/**
 * Encodes numbers as consecutive little-endian components
 */
export function encodeComponents(values: ArrayLike<number>, componentType: ComponentType): Uint8Array {
  const encoding = COMPONENT_ENCODINGS[componentType];
  const bytes = new Uint8Array(values.length * encoding.size);
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  for (let i = 0; i < values.length; i++) {
    encoding.write(view, i * encoding.size, values[i]);
  }
  return bytes;
}

/**
 * Per-axis minimum and maximum of an interleaved array; empty arrays when
 * there are no values
 */
export function computeBounds(values: ArrayLike<number>, width: number): { min: number[]; max: number[] } {
  if (values.length === 0) return { min: [], max: [] };

  const min = new Array<number>(width).fill(Infinity);
  const max = new Array<number>(width).fill(-Infinity);

  for (let i = 0; i < values.length; i++) {
    const axis = i % width;
    const value = values[i];
    if (value < min[axis]) min[axis] = value;
    if (value > max[axis]) max[axis] = value;
  }

  return { min, max };
}

/**
 * Largest value of an array, 0 when empty
 */
export function maxValue(values: ArrayLike<number>): number {
  let max = 0;
  for (let i = 0; i < values.length; i++) {
    if (values[i] > max) max = values[i];
  }
  return max;
}

/**
 * Decodes a base64 `data:` URI into bytes
 */
export function bufferFromDataURI(uri: string): Uint8Array | null {
  const match = uri.match(/^data:.*?;base64,(.*)$/);
  if (!match) return null;
  return new Uint8Array(Buffer.from(match[1], 'base64'));
}

/**
 * Percent-decodes a relative URI, null when an escape is malformed
 */
export function decodeUriPath(uri: string): string | null {
  try {
    return decodeURIComponent(uri);
  } catch (error) {
    if (error instanceof URIError) return null;
    throw error;
  }
}
