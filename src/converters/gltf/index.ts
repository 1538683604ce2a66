/**
 * glTF / GLB Codec
 */

export { createGltfStructure, exportGlb, exportGltf } from './gltf-exporter';
export type { ExportContext } from './gltf-exporter';
export { loadGlb, loadGltf, readBuffers } from './gltf-importer';
export type { ImportContext } from './gltf-importer';
