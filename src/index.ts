/**
 * glTF Scene Codec
 *
 * Converts in-memory scenes to and from glTF 2.0, as GLB files or as a
 * `.gltf` document with external buffers.
 *
 * @example
 * ```typescript
 * import { defineCodec } from 'gltf-scene-codec';
 *
 * const codec = defineCodec({ includeNormals: true });
 *
 * const glb = codec.exportGlb(scene);
 * const { geometry, graph } = codec.loadGlb(glb);
 * ```
 */

import * as path from 'path';
import type { Document } from '@gltf-transform/core';
import { ERROR_STAGES, FILE_EXTENSIONS } from './constants';
import { exportGlb, exportGltf, loadGlb, loadGltf, type ExportContext, type ImportContext } from './converters/gltf';
import { isGlb } from './converters/shared/glb-container';
import { GltfTransformBridge } from './converters/parsers/gltf-transform-bridge';
import { GltfErrorFactory } from './errors';
import type { ImageDecoder, SceneKwargs, SceneSource } from './interfaces';
import type { CodecConfig, CodecConfigInput, ExportSettings, ImportSettings } from './schemas';
import { createLogger, getExtension, Logger, readBinaryFile, readDirectoryFiles, writeFiles } from './utils';
import { parseCodecConfig, parseExportOptions, parseImportOptions } from './validation';

/**
 * Collaborators injected into the codec
 */
export interface CodecDependencies {
  /** enables material and texture loading */
  decoder?: ImageDecoder;
  logger?: Logger;
}

/**
 * Main codec class
 */
export class GltfSceneCodec {
  private readonly config: CodecConfig;
  private readonly decoder?: ImageDecoder;
  private readonly logger: Logger;
  private readonly bridge: GltfTransformBridge;

  constructor(config: CodecConfigInput = {}, dependencies: CodecDependencies = {}) {
    this.config = parseCodecConfig(config);
    this.decoder = dependencies.decoder;
    this.logger = dependencies.logger ?? createLogger({ level: this.config.logLevel, prefix: 'GltfCodec' });
    this.bridge = new GltfTransformBridge(this.logger);
  }

  private exportContext(options: Partial<ExportSettings>): ExportContext {
    const settings = parseExportOptions({
      includeNormals: this.config.includeNormals,
      generator: this.config.generator,
      gltfFileName: this.config.gltfFileName,
      ...options
    });
    return { ...settings, logger: this.logger };
  }

  private importContext(options: Partial<ImportSettings>): ImportContext {
    const settings = parseImportOptions({
      deterministicNames: this.config.deterministicNames,
      baseFrame: this.config.baseFrame,
      gltfFileName: this.config.gltfFileName,
      ...options
    });
    return { ...settings, decoder: this.decoder, logger: this.logger };
  }

  /**
   * Export a scene as GLB bytes
   */
  exportGlb(scene: SceneSource, options: Partial<ExportSettings> = {}): Uint8Array {
    return exportGlb(scene, this.exportContext(options));
  }

  /**
   * Export a scene as a `.gltf` document plus one `.bin` file per geometry
   *
   * @returns file name -> bytes
   */
  exportGltf(scene: SceneSource, options: Partial<ExportSettings> = {}): Map<string, Uint8Array> {
    return exportGltf(scene, this.exportContext(options));
  }

  /**
   * Load GLB bytes, or a self-contained `.gltf` document
   */
  load(bytes: Uint8Array, options: Partial<ImportSettings> = {}): SceneKwargs {
    if (isGlb(bytes)) {
      return this.loadGlb(bytes, options);
    }
    const context = this.importContext(options);
    return loadGltf(new Map([[context.gltfFileName, bytes]]), context);
  }

  loadGlb(bytes: Uint8Array, options: Partial<ImportSettings> = {}): SceneKwargs {
    return loadGlb(bytes, this.importContext(options));
  }

  /**
   * Load a `.gltf` document and the files it references, keyed by file name
   */
  loadGltf(files: ReadonlyMap<string, Uint8Array>, options: Partial<ImportSettings> = {}): SceneKwargs {
    return loadGltf(files, this.importContext(options));
  }

  /**
   * Load a `.glb` file, or a `.gltf` file with the files beside it
   *
   * @example
   * ```typescript
   * const scene = await codec.readFile('./out/model.gltf');
   * ```
   */
  async readFile(filePath: string): Promise<SceneKwargs> {
    const extension = getExtension(filePath);

    if (extension === FILE_EXTENSIONS.GLB) {
      return this.loadGlb(await readBinaryFile(filePath));
    }
    if (extension === FILE_EXTENSIONS.GLTF) {
      const files = await readDirectoryFiles(path.dirname(filePath));
      return this.loadGltf(files, { gltfFileName: path.basename(filePath) });
    }

    throw GltfErrorFactory.formatError(`Unsupported file format: ${extension}`, ERROR_STAGES.DOCUMENT, { filePath });
  }

  /**
   * Write an exported file map into a directory
   */
  async writeFiles(files: ReadonlyMap<string, Uint8Array>, outDir: string): Promise<string[]> {
    return writeFiles(files, outDir, this.logger);
  }

  /**
   * Export a scene into a glTF-Transform document
   */
  async toDocument(scene: SceneSource): Promise<Document> {
    return this.bridge.readGlb(this.exportGlb(scene));
  }

  /**
   * Load a glTF-Transform document
   */
  async fromDocument(document: Document, options: Partial<ImportSettings> = {}): Promise<SceneKwargs> {
    return this.loadGlb(await this.bridge.writeGlb(document), options);
  }

  /**
   * Get current configuration
   */
  getConfig(): CodecConfig {
    return { ...this.config };
  }
}

/**
 * Create a codec instance with configuration
 *
 * @example
 * ```typescript
 * const codec = defineCodec({ baseFrame: 'root', deterministicNames: false });
 * ```
 */
export function defineCodec(config: CodecConfigInput = {}, dependencies: CodecDependencies = {}): GltfSceneCodec {
  return new GltfSceneCodec(config, dependencies);
}

/**
 * Direct codec exports
 */
export { createGltfStructure, exportGlb, exportGltf, loadGlb, loadGltf, readBuffers } from './converters/gltf';
export { packGlb, unpackGlb, readGlbHeader, isGlb } from './converters/shared/glb-container';
export { DocumentBuilder } from './converters/shared/document-builder';
export { sliceBufferViews, resolveAccessors, readAccessor } from './converters/helpers/accessor-resolver';
export type { ResolvedAccessor } from './converters/helpers/accessor-resolver';
export { assembleMeshes, flipTexcoords } from './converters/helpers/mesh-assembler';
export {
  PbrMaterial,
  meshToMaterial,
  defaultPathMaterial,
  createMaterialResolver,
  DecodingMaterialResolver,
  DisabledMaterialResolver
} from './converters/helpers/material-mapper';
export type { MaterialResolver, PbrMaterialFields } from './converters/helpers/material-mapper';
export { reconstructGraph } from './converters/helpers/graph-reconstructor';
export { EdgeListGraph } from './converters/helpers/edge-list-graph';
export { GltfTransformBridge } from './converters/parsers/gltf-transform-bridge';

/**
 * Errors, logging and types
 */
export {
  GltfFormatError,
  GltfConfigError,
  GltfInvariantError,
  GltfFileSystemError,
  GltfErrorFactory
} from './errors';
export type { GltfError } from './errors';
export { Logger, LoggerFactory, LogLevel, createLogger } from './utils';
export { COMPONENT_TYPE, ACCESSOR_TYPES, GLB_CONSTANTS, PRIMITIVE_MODE, ERROR_CODES, DEGRADATIONS } from './constants';
export * from './types';
