/**
 * glTF-Transform Bridge
 *
 * Moves GLB bytes in and out of `@gltf-transform/core` documents, so scenes
 * can be handed to glTF-Transform tooling and documents it produced can be
 * loaded back.
 */

import { Document, NodeIO } from '@gltf-transform/core';
import { ALL_EXTENSIONS } from '@gltf-transform/extensions';
import { ERROR_STAGES } from '../../constants/errors';
import { GltfErrorFactory } from '../../errors';
import { Logger, LoggerFactory } from '../../utils';

export class GltfTransformBridge {
  private readonly io: NodeIO;

  constructor(private readonly logger: Logger = LoggerFactory.forImport()) {
    this.io = new NodeIO().registerExtensions(ALL_EXTENSIONS);
  }

  /**
   * Parses GLB bytes into a glTF-Transform document
   */
  async readGlb(glb: Uint8Array): Promise<Document> {
    return this.logger.withTiming('gltf_transform_read', async () => {
      try {
        return await this.io.readBinary(glb);
      } catch (error) {
        throw GltfErrorFactory.formatError(
          `glTF-Transform could not read GLB: ${error instanceof Error ? error.message : String(error)}`,
          ERROR_STAGES.DOCUMENT,
          { byteLength: glb.length }
        );
      }
    });
  }

  /**
   * Serializes a glTF-Transform document as GLB bytes
   */
  async writeGlb(document: Document): Promise<Uint8Array> {
    return this.logger.withTiming('gltf_transform_write', () => this.io.writeBinary(document));
  }
}
