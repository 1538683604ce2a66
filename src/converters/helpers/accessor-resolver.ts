/**
 * Accessor Resolver
 *
 * Slices bufferViews out of buffers and reinterprets accessor bytes as
 * typed arrays.
 */

import {
  ACCESSOR_SHAPES,
  COMPONENT_ENCODINGS,
  componentsPerElement,
  type AccessorType,
  type ComponentArray,
  type ComponentType
} from '../../constants/gltf';
import { ERROR_MESSAGES, ERROR_STAGES } from '../../constants/errors';
import { GltfErrorFactory } from '../../errors';
import type { GltfAccessor, GltfDocument } from '../../schemas/gltf-document';

/**
 * Accessor data read into a flat typed array
 */
export interface ResolvedAccessor {
  /** components of every element, tightly packed */
  array: ComponentArray;
  /** [count] for SCALAR, [count, n] for VECn, [count, n, n] for MATn */
  shape: number[];
  componentType: ComponentType;
  type: AccessorType;
  normalized: boolean;
}

/**
 * Cuts every bufferView out of its buffer
 */
export function sliceBufferViews(tree: GltfDocument, buffers: readonly Uint8Array[]): Uint8Array[] {
  return (tree.bufferViews ?? []).map((view, index) => {
    const buffer = buffers[view.buffer];
    if (!buffer) {
      throw GltfErrorFactory.formatError(ERROR_MESSAGES.MISSING_BUFFER, ERROR_STAGES.BUFFER_VIEWS, {
        bufferView: index,
        buffer: view.buffer
      });
    }

    const start = view.byteOffset ?? 0;
    const end = start + view.byteLength;
    if (end > buffer.length) {
      throw GltfErrorFactory.formatError(ERROR_MESSAGES.BUFFER_VIEW_MISMATCH, ERROR_STAGES.BUFFER_VIEWS, {
        bufferView: index,
        byteOffset: start,
        byteLength: view.byteLength,
        bufferLength: buffer.length
      });
    }

    return buffer.subarray(start, end);
  });
}

/**
 * Reads one accessor from its bufferView.
 * Elements are `byteStride` apart when the view declares a stride,
 * otherwise tightly packed.
 */
export function readAccessor(
  accessor: GltfAccessor,
  index: number,
  views: readonly Uint8Array[],
  byteStride?: number
): ResolvedAccessor {
  const encoding = COMPONENT_ENCODINGS[accessor.componentType];
  const width = componentsPerElement(accessor.type);
  const shape = [accessor.count, ...ACCESSOR_SHAPES[accessor.type]];
  const array = encoding.create(accessor.count * width);

  const resolved: ResolvedAccessor = {
    array,
    shape,
    componentType: accessor.componentType,
    type: accessor.type,
    normalized: accessor.normalized ?? false,
  };

  // accessors without a bufferView are all zeros
  if (accessor.bufferView === undefined) {
    return resolved;
  }

  const data = views[accessor.bufferView];
  if (!data) {
    throw GltfErrorFactory.formatError(ERROR_MESSAGES.INVALID_REFERENCE, ERROR_STAGES.ACCESSORS, {
      accessor: index,
      bufferView: accessor.bufferView
    });
  }

  const elementSize = encoding.size * width;
  const stride = byteStride ?? elementSize;
  const start = accessor.byteOffset ?? 0;
  const required = accessor.count === 0 ? 0 : start + stride * (accessor.count - 1) + elementSize;

  if (required > data.length) {
    throw GltfErrorFactory.formatError(ERROR_MESSAGES.ACCESSOR_MISMATCH, ERROR_STAGES.ACCESSORS, {
      accessor: index,
      count: accessor.count,
      required,
      available: data.length
    });
  }

  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  for (let element = 0; element < accessor.count; element++) {
    const elementOffset = start + element * stride;
    for (let component = 0; component < width; component++) {
      array[element * width + component] = encoding.read(view, elementOffset + component * encoding.size);
    }
  }

  return resolved;
}

/**
 * Resolves every accessor of the document, in order
 */
export function resolveAccessors(tree: GltfDocument, views: readonly Uint8Array[]): ResolvedAccessor[] {
  return (tree.accessors ?? []).map((accessor, index) => {
    const byteStride = accessor.bufferView === undefined
      ? undefined
      : tree.bufferViews?.[accessor.bufferView]?.byteStride;
    return readAccessor(accessor, index, views, byteStride);
  });
}
