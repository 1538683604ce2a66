/**
 * Configuration Constants
 */

/**
 * Default Configuration Values
 */
export const DEFAULT_CONFIG = {
  INCLUDE_NORMALS: false,
  DETERMINISTIC_NAMES: true,
  BASE_FRAME: 'world',
  GENERATOR: 'gltf-scene-codec',
  GLTF_FILE_NAME: 'model.gltf',
} as const;

/**
 * Naming Defaults
 */
export const NAMING = {
  // name for primitives of meshes without a `name`
  DEFAULT_GEOMETRY: 'GLTF_geometry',
  BUFFER_FILE_PREFIX: 'mesh_',
  INSTANCE_SUFFIX_LENGTH: 6,
  NUMERIC_FRAME_LENGTH: 10,
} as const;

/**
 * File Extensions
 */
export const FILE_EXTENSIONS = {
  GLB: '.glb',
  GLTF: '.gltf',
  BIN: '.bin',
} as const;

