/**
 * glTF Importer
 *
 * Decodes GLB bytes or a `.gltf` file set into scene construction
 * arguments: geometry per triangle primitive plus the transform graph.
 */

import { FILE_EXTENSIONS } from '../../constants/config';
import { ERROR_MESSAGES, ERROR_STAGES } from '../../constants/errors';
import { GltfErrorFactory } from '../../errors';
import type { ImageDecoder, SceneKwargs } from '../../interfaces';
import type { GltfDocument } from '../../schemas/gltf-document';
import { bufferFromDataURI, decodeUriPath, Logger, LoggerFactory } from '../../utils';
import { validateDocument } from '../../validation';
import { resolveAccessors, sliceBufferViews } from '../helpers/accessor-resolver';
import { reconstructGraph } from '../helpers/graph-reconstructor';
import { createMaterialResolver } from '../helpers/material-mapper';
import { assembleMeshes } from '../helpers/mesh-assembler';
import { parseJsonChunk, unpackGlb } from '../shared/glb-container';

/**
 * Options read by the importer
 */
export interface ImportContext {
  baseFrame: string;
  deterministicNames: boolean;
  gltfFileName: string;
  decoder?: ImageDecoder;
  logger?: Logger;
}

type UriResolver = (uri: string) => Uint8Array | null;

/**
 * Bytes of every buffer: `data:` URIs, files resolved by URI, or for
 * buffers without a URI the binary chunk at the same position
 */
export function readBuffers(
  tree: GltfDocument,
  chunks: readonly Uint8Array[],
  resolveUri?: UriResolver
): Uint8Array[] {
  return (tree.buffers ?? []).map((buffer, index) => {
    const data = buffer.uri === undefined
      ? chunks[index]
      : bufferFromUri(buffer.uri, index, resolveUri);

    if (!data) {
      throw GltfErrorFactory.formatError(ERROR_MESSAGES.MISSING_BUFFER, ERROR_STAGES.BUFFERS, {
        buffer: index,
        uri: buffer.uri
      });
    }
    return data;
  });
}

function bufferFromUri(uri: string, index: number, resolveUri?: UriResolver): Uint8Array | undefined {
  const embedded = bufferFromDataURI(uri);
  if (embedded) return embedded;

  const path = decodeUriPath(uri);
  if (path === null) {
    throw GltfErrorFactory.formatError(ERROR_MESSAGES.MALFORMED_URI, ERROR_STAGES.BUFFERS, { buffer: index, uri });
  }
  return resolveUri?.(path) ?? undefined;
}

function decodeDocument(
  header: unknown,
  chunks: readonly Uint8Array[],
  options: ImportContext,
  logger: Logger,
  resolveUri?: UriResolver
): SceneKwargs {
  const tree = validateDocument(header);
  const views = sliceBufferViews(tree, readBuffers(tree, chunks, resolveUri));
  const accessors = resolveAccessors(tree, views);

  const materials = createMaterialResolver(options.decoder, logger).resolve({ tree, views, resolveUri });
  const { geometry, meshNames } = assembleMeshes(tree, accessors, materials, logger);
  const { graph, baseFrame } = reconstructGraph(tree, meshNames, options);

  logger.debug('Decoded document', {
    geometryCount: geometry.size,
    edgeCount: graph.length,
    materialCount: materials.length
  });

  return { kind: 'Scene', geometry, graph, baseFrame };
}

/**
 * Loads a GLB file
 */
export function loadGlb(bytes: Uint8Array, options: ImportContext): SceneKwargs {
  const logger = options.logger ?? LoggerFactory.forImport();
  return logger.time('load_glb', () => {
    const { header, buffers } = unpackGlb(bytes);
    return decodeDocument(header, buffers, options, logger);
  }, { byteLength: bytes.length });
}

/**
 * Loads a `.gltf` document together with the files it references,
 * keyed by file name
 */
export function loadGltf(files: ReadonlyMap<string, Uint8Array>, options: ImportContext): SceneKwargs {
  const logger = options.logger ?? LoggerFactory.forImport();
  return logger.time('load_gltf', () => {
    const document = files.get(options.gltfFileName)
      ?? [...files].find(([name]) => name.toLowerCase().endsWith(FILE_EXTENSIONS.GLTF))?.[1];

    if (!document) {
      throw GltfErrorFactory.formatError(ERROR_MESSAGES.MISSING_DOCUMENT, ERROR_STAGES.DOCUMENT, {
        files: [...files.keys()]
      });
    }

    return decodeDocument(parseJsonChunk(document), [], options, logger, uri => files.get(uri) ?? null);
  }, { fileCount: files.size });
}
