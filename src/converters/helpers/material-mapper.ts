/**
 * Material Mapper
 *
 * Export: PBR materials derived from mesh colors.
 * Import: glTF materials flattened into `PbrMaterial` objects, with texture
 * references replaced by decoded images.
 */

import { DEFAULT_PATH_MATERIAL } from '../../constants/gltf';
import { DEGRADATIONS } from '../../constants/errors';
import type { BitmapLike, ImageDecoder, Rgba8 } from '../../interfaces';
import type {
  AlphaMode,
  GltfDocument,
  GltfImage,
  GltfMaterial,
  GltfTextureInfo
} from '../../schemas/gltf-document';
import { Logger } from '../../utils/logger';
import { bufferFromDataURI, decodeUriPath } from '../../utils/byte-utils';

/**
 * Material for a mesh exported without vertex colors
 */
export function meshToMaterial(mainColor: Rgba8): GltfMaterial {
  return {
    pbrMetallicRoughness: {
      baseColorFactor: [
        Math.fround(mainColor[0] / 255),
        Math.fround(mainColor[1] / 255),
        Math.fround(mainColor[2] / 255),
        Math.fround(mainColor[3] / 255),
      ],
      metallicFactor: 0,
      roughnessFactor: 0,
    },
  };
}

/**
 * Material shared by every exported path
 */
export function defaultPathMaterial(): GltfMaterial {
  const [r, g, b, a] = DEFAULT_PATH_MATERIAL.BASE_COLOR_FACTOR;
  return {
    pbrMetallicRoughness: {
      baseColorFactor: [r, g, b, a],
      metallicFactor: DEFAULT_PATH_MATERIAL.METALLIC_FACTOR,
      roughnessFactor: DEFAULT_PATH_MATERIAL.ROUGHNESS_FACTOR,
    },
  };
}

/**
 * Texture-reference fields, after flattening
 */
export const TEXTURE_FIELDS = [
  'baseColorTexture',
  'metallicRoughnessTexture',
  'normalTexture',
  'occlusionTexture',
  'emissiveTexture',
] as const;

export type TextureField = typeof TEXTURE_FIELDS[number];

/**
 * Scalar fields, after flattening
 */
export interface PbrScalarFields {
  name?: string;
  baseColorFactor?: [number, number, number, number];
  metallicFactor?: number;
  roughnessFactor?: number;
  emissiveFactor?: [number, number, number];
  alphaMode?: AlphaMode;
  alphaCutoff?: number;
  doubleSided?: boolean;
}

/**
 * Fields accepted by `PbrMaterial`; textures are decoded images, or null
 * when the referenced image was unavailable
 */
export type PbrMaterialFields = PbrScalarFields & Partial<Record<TextureField, BitmapLike | null>>;

/**
 * Output of the flattening pass
 */
export interface FlattenedMaterial {
  scalars: PbrScalarFields;
  textures: Partial<Record<TextureField, GltfTextureInfo>>;
}

/**
 * PBR metallic-roughness material as handed to the geometry model
 */
export class PbrMaterial {
  readonly name?: string;
  readonly baseColorFactor?: [number, number, number, number];
  readonly metallicFactor?: number;
  readonly roughnessFactor?: number;
  readonly emissiveFactor?: [number, number, number];
  readonly alphaMode?: AlphaMode;
  readonly alphaCutoff?: number;
  readonly doubleSided?: boolean;
  readonly baseColorTexture?: BitmapLike | null;
  readonly metallicRoughnessTexture?: BitmapLike | null;
  readonly normalTexture?: BitmapLike | null;
  readonly occlusionTexture?: BitmapLike | null;
  readonly emissiveTexture?: BitmapLike | null;

  constructor(fields: PbrMaterialFields) {
    this.name = fields.name;
    this.baseColorFactor = fields.baseColorFactor;
    this.metallicFactor = fields.metallicFactor;
    this.roughnessFactor = fields.roughnessFactor;
    this.emissiveFactor = fields.emissiveFactor;
    this.alphaMode = fields.alphaMode;
    this.alphaCutoff = fields.alphaCutoff;
    this.doubleSided = fields.doubleSided;
    this.baseColorTexture = fields.baseColorTexture;
    this.metallicRoughnessTexture = fields.metallicRoughnessTexture;
    this.normalTexture = fields.normalTexture;
    this.occlusionTexture = fields.occlusionTexture;
    this.emissiveTexture = fields.emissiveTexture;
  }
}

/**
 * Pass 1: lifts `pbrMetallicRoughness` into top-level fields and separates
 * scalar fields from texture references
 */
export function flattenMaterial(material: GltfMaterial): FlattenedMaterial {
  const pbr = material.pbrMetallicRoughness ?? {};
  const scalars: PbrScalarFields = {
    name: material.name,
    baseColorFactor: pbr.baseColorFactor,
    metallicFactor: pbr.metallicFactor,
    roughnessFactor: pbr.roughnessFactor,
    emissiveFactor: material.emissiveFactor,
    alphaMode: material.alphaMode,
    alphaCutoff: material.alphaCutoff,
    doubleSided: material.doubleSided,
  };

  const references: Record<TextureField, GltfTextureInfo | undefined> = {
    baseColorTexture: pbr.baseColorTexture,
    metallicRoughnessTexture: pbr.metallicRoughnessTexture,
    normalTexture: material.normalTexture,
    occlusionTexture: material.occlusionTexture,
    emissiveTexture: material.emissiveTexture,
  };

  const textures: Partial<Record<TextureField, GltfTextureInfo>> = {};
  for (const field of TEXTURE_FIELDS) {
    const reference = references[field];
    if (reference) textures[field] = reference;
  }

  return { scalars: dropUndefined(scalars), textures };
}

/**
 * Pass 2: replaces each texture reference with the decoded image of
 * `textures[index].source`, or null
 */
export function substituteTextures(
  flattened: FlattenedMaterial,
  tree: GltfDocument,
  images: ReadonlyArray<BitmapLike | null>
): PbrMaterialFields {
  const fields: PbrMaterialFields = { ...flattened.scalars };
  for (const field of TEXTURE_FIELDS) {
    const reference = flattened.textures[field];
    if (!reference) continue;
    const source = tree.textures?.[reference.index]?.source;
    fields[field] = source === undefined ? null : images[source] ?? null;
  }
  return fields;
}

function dropUndefined<T extends object>(fields: T): T {
  const result = { ...fields };
  for (const key of Object.keys(result)) {
    if (Reflect.get(result, key) === undefined) {
      Reflect.deleteProperty(result, key);
    }
  }
  return result;
}

/**
 * Inputs a resolver may read images from
 */
export interface MaterialSourceContext {
  tree: GltfDocument;
  /** sliced bufferViews */
  views: readonly Uint8Array[];
  /** bytes of a file referenced by URI, for directory imports */
  resolveUri?: (uri: string) => Uint8Array | null;
}

/**
 * Resolves the document's materials, one entry per `tree.materials` item
 */
export interface MaterialResolver {
  readonly enabled: boolean;
  resolve(context: MaterialSourceContext): PbrMaterial[];
}

/**
 * Resolver used when no image decoder is available
 */
export class DisabledMaterialResolver implements MaterialResolver {
  readonly enabled = false;

  constructor(private readonly logger: Logger) {}

  resolve({ tree }: MaterialSourceContext): PbrMaterial[] {
    if ((tree.materials?.length ?? 0) > 0 || (tree.images?.length ?? 0) > 0) {
      this.logger.warn('No image decoder configured, materials are not loaded', {
        degradation: DEGRADATIONS.MISSING_IMAGE_DECODER,
        materialCount: tree.materials?.length ?? 0,
        imageCount: tree.images?.length ?? 0
      });
    }
    return [];
  }
}

/**
 * Resolver that decodes every image once and builds one material per entry
 */
export class DecodingMaterialResolver implements MaterialResolver {
  readonly enabled = true;

  constructor(
    private readonly decoder: ImageDecoder,
    private readonly logger: Logger
  ) {}

  resolve(context: MaterialSourceContext): PbrMaterial[] {
    const images = (context.tree.images ?? []).map((image, index) => this.decodeImage(image, index, context));

    return (context.tree.materials ?? []).map(material =>
      new PbrMaterial(substituteTextures(flattenMaterial(material), context.tree, images))
    );
  }

  private decodeImage(image: GltfImage, index: number, context: MaterialSourceContext): BitmapLike | null {
    const bytes = imageBytes(image, context);
    if (!bytes) {
      this.logger.error(`Image ${index} has no readable data`, {
        degradation: DEGRADATIONS.IMAGE_DECODE_FAILED,
        imageIndex: index,
        uri: image.uri
      });
      return null;
    }

    try {
      return this.decoder.decode(bytes, image.mimeType);
    } catch (error) {
      this.logger.error(`Image ${index} failed to decode`, {
        degradation: DEGRADATIONS.IMAGE_DECODE_FAILED,
        imageIndex: index,
        error: error instanceof Error ? error.message : String(error)
      });
      return null;
    }
  }
}

function imageBytes(image: GltfImage, context: MaterialSourceContext): Uint8Array | null {
  if (image.bufferView !== undefined) {
    return context.views[image.bufferView] ?? null;
  }
  if (image.uri !== undefined) {
    const embedded = bufferFromDataURI(image.uri);
    if (embedded) return embedded;
    const path = decodeUriPath(image.uri);
    return path === null ? null : context.resolveUri?.(path) ?? null;
  }
  return null;
}

/**
 * Picks the resolver for the available capability
 */
export function createMaterialResolver(decoder: ImageDecoder | undefined, logger: Logger): MaterialResolver {
  return decoder ? new DecodingMaterialResolver(decoder, logger) : new DisabledMaterialResolver(logger);
}
