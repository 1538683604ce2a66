/**
 * GLB Container
 *
 * Binary glTF: a 12-byte header followed by a JSON chunk and BIN chunks,
 * every chunk prefixed by its length and type and aligned to 4 bytes.
 */

import { GLB_CONSTANTS } from '../../constants/gltf';
import { ERROR_MESSAGES, ERROR_STAGES } from '../../constants/errors';
import { GltfErrorFactory, assertInvariant } from '../../errors';
import { bytePad, concatBytes } from '../../utils/byte-utils';

/**
 * Contents of an unpacked GLB
 */
export interface UnpackedGlb {
  /** parsed JSON chunk, not yet validated */
  header: unknown;
  /** BIN chunks in file order */
  buffers: Uint8Array[];
}

/**
 * Header fields of a GLB file
 */
export interface GlbHeader {
  magic: number;
  version: number;
  length: number;
}

/**
 * Checks the magic number only, for format sniffing
 */
export function isGlb(bytes: Uint8Array): boolean {
  if (bytes.length < 4) return false;
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  return view.getUint32(0, true) === GLB_CONSTANTS.MAGIC;
}

/**
 * Packs a document tree and its binary payload into GLB bytes
 */
export function packGlb(tree: object, binary: Uint8Array): Uint8Array {
  assertInvariant(binary.length % GLB_CONSTANTS.ALIGNMENT === 0, 'binary chunk is not 4-byte aligned', {
    length: binary.length
  });

  // 20 header bytes precede the JSON text and are themselves aligned,
  // so padding the text alone aligns the BIN chunk header
  const content = bytePad(
    new TextEncoder().encode(JSON.stringify(tree)),
    GLB_CONSTANTS.ALIGNMENT,
    GLB_CONSTANTS.JSON_PADDING_BYTE
  );
  assertInvariant((content.length + GLB_CONSTANTS.JSON_CONTENT_OFFSET) % GLB_CONSTANTS.ALIGNMENT === 0, 'JSON chunk is not 4-byte aligned', {
    length: content.length
  });

  const header = new Uint8Array(GLB_CONSTANTS.JSON_CONTENT_OFFSET);
  const headerView = new DataView(header.buffer);
  headerView.setUint32(0, GLB_CONSTANTS.MAGIC, true);
  headerView.setUint32(4, GLB_CONSTANTS.VERSION, true);
  headerView.setUint32(8, content.length + binary.length + GLB_CONSTANTS.FIXED_OVERHEAD, true);
  headerView.setUint32(12, content.length, true);
  headerView.setUint32(16, GLB_CONSTANTS.CHUNK_TYPE_JSON, true);

  const binHeader = new Uint8Array(GLB_CONSTANTS.CHUNK_HEADER_SIZE);
  const binView = new DataView(binHeader.buffer);
  binView.setUint32(0, binary.length, true);
  binView.setUint32(4, GLB_CONSTANTS.CHUNK_TYPE_BIN, true);

  return concatBytes([header, content, binHeader, binary]);
}

/**
 * Reads and checks the 12-byte file header
 */
export function readGlbHeader(bytes: Uint8Array): GlbHeader {
  if (bytes.length < GLB_CONSTANTS.HEADER_SIZE) {
    throw GltfErrorFactory.formatError(ERROR_MESSAGES.TRUNCATED_HEADER, ERROR_STAGES.GLB_HEADER, {
      byteLength: bytes.length
    });
  }

  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const header: GlbHeader = {
    magic: view.getUint32(0, true),
    version: view.getUint32(4, true),
    length: view.getUint32(8, true),
  };

  if (header.magic !== GLB_CONSTANTS.MAGIC || header.version !== GLB_CONSTANTS.VERSION) {
    throw GltfErrorFactory.formatError(ERROR_MESSAGES.NOT_GLTF_2, ERROR_STAGES.GLB_HEADER, {
      magic: header.magic,
      version: header.version
    });
  }

  return header;
}

/**
 * Unpacks GLB bytes into the parsed JSON chunk and the BIN chunks
 */
export function unpackGlb(bytes: Uint8Array): UnpackedGlb {
  const { length } = readGlbHeader(bytes);

  if (bytes.length < GLB_CONSTANTS.JSON_CONTENT_OFFSET) {
    throw GltfErrorFactory.formatError(ERROR_MESSAGES.TRUNCATED_HEADER, ERROR_STAGES.GLB_HEADER, {
      byteLength: bytes.length
    });
  }

  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const jsonLength = view.getUint32(12, true);
  const jsonType = view.getUint32(16, true);

  if (jsonType !== GLB_CONSTANTS.CHUNK_TYPE_JSON) {
    throw GltfErrorFactory.formatError(ERROR_MESSAGES.NO_JSON_CHUNK, ERROR_STAGES.GLB_JSON, { chunkType: jsonType });
  }

  let offset = GLB_CONSTANTS.JSON_CONTENT_OFFSET;
  if (bytes.length - offset < jsonLength) {
    throw GltfErrorFactory.formatError(ERROR_MESSAGES.TRUNCATED_CHUNK, ERROR_STAGES.GLB_JSON, {
      declared: jsonLength,
      available: bytes.length - offset
    });
  }

  const header = parseJsonChunk(bytes.subarray(offset, offset + jsonLength));
  offset += jsonLength;

  const buffers: Uint8Array[] = [];
  while (offset < length) {
    // trailing bytes too short for a chunk header end the file
    if (bytes.length - offset < GLB_CONSTANTS.CHUNK_HEADER_SIZE) {
      break;
    }

    const chunkLength = view.getUint32(offset, true);
    const chunkType = view.getUint32(offset + 4, true);
    offset += GLB_CONSTANTS.CHUNK_HEADER_SIZE;

    if (chunkType !== GLB_CONSTANTS.CHUNK_TYPE_BIN) {
      throw GltfErrorFactory.formatError(ERROR_MESSAGES.NOT_BINARY_CHUNK, ERROR_STAGES.GLB_BINARY, {
        chunkType,
        chunkIndex: buffers.length + 1
      });
    }

    if (bytes.length - offset < chunkLength) {
      throw GltfErrorFactory.formatError(ERROR_MESSAGES.TRUNCATED_CHUNK, ERROR_STAGES.GLB_BINARY, {
        declared: chunkLength,
        available: bytes.length - offset
      });
    }

    buffers.push(bytes.subarray(offset, offset + chunkLength));
    offset += chunkLength;
  }

  return { header, buffers };
}

/**
 * Decodes UTF-8 JSON text
 */
export function parseJsonChunk(data: Uint8Array): unknown {
  try {
    return JSON.parse(new TextDecoder('utf-8', { fatal: true }).decode(data));
  } catch (error) {
    throw GltfErrorFactory.formatError(ERROR_MESSAGES.INVALID_JSON, ERROR_STAGES.GLB_JSON, {
      cause: error instanceof Error ? error.message : String(error)
    });
  }
}
