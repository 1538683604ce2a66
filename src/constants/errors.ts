/**
 * Error Constants for the glTF Scene Codec
 */

/**
 * Error Codes
 */
export const ERROR_CODES = {
  FORMAT_ERROR: 'GLTF_FORMAT_ERROR',
  CONFIG_VALIDATION_ERROR: 'GLTF_CONFIG_VALIDATION_ERROR',
  INVARIANT_VIOLATION: 'GLTF_INVARIANT_VIOLATION',
  FILE_SYSTEM_ERROR: 'GLTF_FILE_SYSTEM_ERROR',
} as const;

/**
 * Error Messages
 */
export const ERROR_MESSAGES = {
  NOT_GLTF_2: 'file is not GLTF 2.0',
  TRUNCATED_HEADER: 'GLB header is truncated',
  NO_JSON_CHUNK: 'no initial JSON chunk',
  INVALID_JSON: 'JSON chunk could not be parsed',
  NOT_BINARY_CHUNK: 'chunk after JSON is not a BIN chunk',
  TRUNCATED_CHUNK: 'chunk was not expected length',
  INVALID_DOCUMENT: 'glTF document failed validation',
  BUFFER_VIEW_MISMATCH: 'bufferView does not fit inside its buffer',
  ACCESSOR_MISMATCH: 'accessor does not fit inside its bufferView',
  MISSING_BUFFER: 'buffer is not available',
  MALFORMED_URI: 'URI has a malformed percent escape',
  MISSING_DOCUMENT: 'no .gltf document among the files',
  INVALID_REFERENCE: 'index reference is out of range',
  INVALID_CONFIG: 'Invalid configuration provided',
  FILE_OPERATION_FAILED: 'File operation failed',
} as const;

/**
 * Stages reported on format errors
 */
export const ERROR_STAGES = {
  GLB_HEADER: 'glb_header',
  GLB_JSON: 'glb_json_chunk',
  GLB_BINARY: 'glb_binary_chunk',
  DOCUMENT: 'document_validation',
  BUFFERS: 'buffer_resolution',
  BUFFER_VIEWS: 'buffer_view_slicing',
  ACCESSORS: 'accessor_resolution',
  MESHES: 'mesh_assembly',
  GRAPH: 'graph_reconstruction',
} as const;

/**
 * Non-fatal degradations logged during import
 */
export const DEGRADATIONS = {
  MISSING_IMAGE_DECODER: 'missing_image_decoder',
  IMAGE_DECODE_FAILED: 'image_decode_failed',
  TEXCOORD_WITHOUT_MATERIAL: 'texcoord_without_material',
  UNRESOLVED_MATERIAL: 'unresolved_material',
} as const;
