/**
 * glTF Layout Constants
 *
 * Component encodings, accessor shapes and GLB container magic numbers.
 * Every multi-byte value in glTF binary data is little-endian.
 */

/**
 * Typed arrays an accessor can resolve to
 */
export type ComponentArray =
  | Int8Array
  | Uint8Array
  | Int16Array
  | Uint16Array
  | Uint32Array
  | Float32Array;

/**
 * Binary encoding of a single accessor component
 */
export interface ComponentEncoding {
  readonly name: string;
  readonly size: number;
  create(length: number): ComponentArray;
  read(view: DataView, byteOffset: number): number;
  write(view: DataView, byteOffset: number, value: number): void;
}

/**
 * Accessor componentType codes
 */
export const COMPONENT_TYPE = {
  BYTE: 5120,
  UNSIGNED_BYTE: 5121,
  SHORT: 5122,
  UNSIGNED_SHORT: 5123,
  UNSIGNED_INT: 5125,
  FLOAT: 5126,
} as const;

export type ComponentType = typeof COMPONENT_TYPE[keyof typeof COMPONENT_TYPE];

/**
 * componentType code -> element encoding
 */
export const COMPONENT_ENCODINGS: Readonly<Record<ComponentType, ComponentEncoding>> = {
  [COMPONENT_TYPE.BYTE]: {
    name: 'BYTE',
    size: 1,
    create: (length) => new Int8Array(length),
    read: (view, offset) => view.getInt8(offset),
    write: (view, offset, value) => view.setInt8(offset, value),
  },
  [COMPONENT_TYPE.UNSIGNED_BYTE]: {
    name: 'UNSIGNED_BYTE',
    size: 1,
    create: (length) => new Uint8Array(length),
    read: (view, offset) => view.getUint8(offset),
    write: (view, offset, value) => view.setUint8(offset, value),
  },
  [COMPONENT_TYPE.SHORT]: {
    name: 'SHORT',
    size: 2,
    create: (length) => new Int16Array(length),
    read: (view, offset) => view.getInt16(offset, true),
    write: (view, offset, value) => view.setInt16(offset, value, true),
  },
  [COMPONENT_TYPE.UNSIGNED_SHORT]: {
    name: 'UNSIGNED_SHORT',
    size: 2,
    create: (length) => new Uint16Array(length),
    read: (view, offset) => view.getUint16(offset, true),
    write: (view, offset, value) => view.setUint16(offset, value, true),
  },
  [COMPONENT_TYPE.UNSIGNED_INT]: {
    name: 'UNSIGNED_INT',
    size: 4,
    create: (length) => new Uint32Array(length),
    read: (view, offset) => view.getUint32(offset, true),
    write: (view, offset, value) => view.setUint32(offset, value, true),
  },
  [COMPONENT_TYPE.FLOAT]: {
    name: 'FLOAT',
    size: 4,
    create: (length) => new Float32Array(length),
    read: (view, offset) => view.getFloat32(offset, true),
    write: (view, offset, value) => view.setFloat32(offset, value, true),
  },
};

/**
 * Accessor type strings
 */
export const ACCESSOR_TYPES = ['SCALAR', 'VEC2', 'VEC3', 'VEC4', 'MAT2', 'MAT3', 'MAT4'] as const;

export type AccessorType = typeof ACCESSOR_TYPES[number];

/**
 * Accessor type string -> element shape
 * SCALAR has no trailing dimension.
 */
export const ACCESSOR_SHAPES: Readonly<Record<AccessorType, readonly number[]>> = {
  SCALAR: [],
  VEC2: [2],
  VEC3: [3],
  VEC4: [4],
  MAT2: [2, 2],
  MAT3: [3, 3],
  MAT4: [4, 4],
};

/**
 * Number of components in one element of an accessor type
 */
export function componentsPerElement(type: AccessorType): number {
  return ACCESSOR_SHAPES[type].reduce((product, dim) => product * dim, 1);
}

/**
 * Primitive draw modes
 */
export const PRIMITIVE_MODE = {
  LINES: 1,
  TRIANGLES: 4,
} as const;

/**
 * GLB container constants
 */
export const GLB_CONSTANTS = {
  MAGIC: 0x46546c67,
  VERSION: 2,
  CHUNK_TYPE_JSON: 0x4e4f534a,
  CHUNK_TYPE_BIN: 0x004e4942,

  HEADER_SIZE: 12,
  CHUNK_HEADER_SIZE: 8,
  // file header + JSON chunk header
  JSON_CONTENT_OFFSET: 20,
  // file header + both chunk headers
  FIXED_OVERHEAD: 28,

  ALIGNMENT: 4,
  JSON_PADDING_BYTE: 0x20,
  BIN_PADDING_BYTE: 0x00,
} as const;

/**
 * Attribute names written and read by the codec
 */
export const ATTRIBUTE_NAMES = {
  POSITION: 'POSITION',
  NORMAL: 'NORMAL',
  COLOR: 'COLOR_0',
  TEXCOORD: 'TEXCOORD_0',
} as const;

/**
 * PBR factors used for every exported path
 */
export const DEFAULT_PATH_MATERIAL = {
  BASE_COLOR_FACTOR: [0, 0, 0, 0],
  METALLIC_FACTOR: 0,
  ROUGHNESS_FACTOR: 0,
} as const;
