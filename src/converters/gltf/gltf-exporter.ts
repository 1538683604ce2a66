/**
 * glTF Exporter
 *
 * Builds the document tree for a scene and serializes it either as a single
 * GLB file or as a `.gltf` file with one `.bin` buffer per geometry.
 */

import { FILE_EXTENSIONS, NAMING } from '../../constants/config';
import { assertInvariant } from '../../errors';
import type { SceneSource } from '../../interfaces';
import type { GltfBuffer, GltfBufferView, GltfDocument } from '../../schemas/gltf-document';
import { concatBytes, Logger, LoggerFactory } from '../../utils';
import { appendPath, appendTriangleMesh } from '../helpers/geometry-appender';
import { BuiltStructure, DocumentBuilder } from '../shared/document-builder';
import { packGlb } from '../shared/glb-container';

/**
 * Options read by the exporter
 */
export interface ExportContext {
  includeNormals: boolean;
  generator: string;
  gltfFileName: string;
  logger?: Logger;
}

const GLTF_VERSION = '2.0';

/**
 * Converts a scene into a document tree plus its ordered buffer items.
 * The tree has no `buffers` or `bufferViews` yet.
 */
export function createGltfStructure(
  scene: SceneSource,
  options: Pick<ExportContext, 'includeNormals' | 'generator'>
): BuiltStructure {
  const builder = new DocumentBuilder();

  const meshIndex = new Map<string, number>();
  [...scene.geometry.keys()].forEach((name, index) => meshIndex.set(name, index));

  for (const [name, geometry] of scene.geometry) {
    const index = geometry.type === 'mesh'
      ? appendTriangleMesh(builder, name, geometry, { includeNormals: options.includeNormals })
      : appendPath(builder, name, geometry);
    assertInvariant(index === meshIndex.get(name), 'mesh index does not follow scene order', { geometry: name, index });
  }

  const graph = scene.graph.toGltf(meshIndex);
  const base: GltfDocument = {
    scene: graph.scene ?? 0,
    scenes: graph.scenes ?? [{ nodes: [0] }],
    asset: { version: GLTF_VERSION, generator: options.generator },
    nodes: graph.nodes,
  };

  return builder.build(base);
}

/**
 * Exports a scene as GLB bytes. All buffer items share buffer 0.
 */
export function exportGlb(scene: SceneSource, options: ExportContext): Uint8Array {
  const logger = options.logger ?? LoggerFactory.forExport();

  return logger.time('export_glb', () => {
    const { tree, bufferItems } = createGltfStructure(scene, options);

    let byteOffset = 0;
    const bufferViews: GltfBufferView[] = bufferItems.map(item => {
      const view = { buffer: 0, byteOffset, byteLength: item.data.length };
      byteOffset += item.data.length;
      return view;
    });

    tree.bufferViews = bufferViews;
    tree.buffers = [{ byteLength: byteOffset }];

    const glb = packGlb(tree, concatBytes(bufferItems.map(item => item.data)));
    logger.debug('Packed GLB', { geometryCount: scene.geometry.size, byteLength: glb.length });
    return glb;
  });
}

/**
 * Exports a scene as a file map: the `.gltf` document plus one
 * `mesh_<geometryName>.bin` per geometry holding all of its buffer items
 */
export function exportGltf(scene: SceneSource, options: ExportContext): Map<string, Uint8Array> {
  const logger = options.logger ?? LoggerFactory.forExport();

  return logger.time('export_gltf', () => {
    const { tree, bufferItems } = createGltfStructure(scene, options);

    // owner -> buffer index and running length, in order of first use
    const owners = new Map<string, { index: number; chunks: Uint8Array[]; byteLength: number }>();
    const bufferViews: GltfBufferView[] = [];

    for (const item of bufferItems) {
      let owner = owners.get(item.owner);
      if (!owner) {
        owner = { index: owners.size, chunks: [], byteLength: 0 };
        owners.set(item.owner, owner);
      }
      bufferViews.push({ buffer: owner.index, byteOffset: owner.byteLength, byteLength: item.data.length });
      owner.chunks.push(item.data);
      owner.byteLength += item.data.length;
    }

    const files = new Map<string, Uint8Array>();
    const buffers: GltfBuffer[] = [];
    for (const [name, owner] of owners) {
      const fileName = `${NAMING.BUFFER_FILE_PREFIX}${name}${FILE_EXTENSIONS.BIN}`;
      buffers.push({ uri: encodeURIComponent(fileName), byteLength: owner.byteLength });
      files.set(fileName, concatBytes(owner.chunks));
    }
    tree.buffers = buffers;
    tree.bufferViews = bufferViews;

    const gltf = new TextEncoder().encode(JSON.stringify(tree));
    logger.debug('Serialized glTF', { geometryCount: scene.geometry.size, bufferCount: owners.size });

    return new Map([[options.gltfFileName, gltf], ...files]);
  });
}
