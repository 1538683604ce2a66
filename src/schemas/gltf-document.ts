/**
 * Zod Schemas for the glTF Document Tree
 *
 * Covers the subset of glTF 2.0 the codec reads and writes. Unknown
 * top-level properties are stripped on parse.
 */

import { z } from 'zod';
import {
  IndexSchema,
  ComponentTypeSchema,
  AccessorTypeSchema,
  ColumnMajorMatrixSchema,
  Vec3Schema,
  Vec4Schema,
  ExtrasSchema
} from './base-schemas';

export const GltfAssetSchema = z.object({
  version: z.string(),
  generator: z.string().optional(),
  copyright: z.string().optional(),
  minVersion: z.string().optional(),
});

export const GltfBufferSchema = z.object({
  uri: z.string().optional(),
  byteLength: z.number().int().nonnegative(),
  name: z.string().optional(),
});

export const GltfBufferViewSchema = z.object({
  buffer: IndexSchema,
  byteOffset: z.number().int().nonnegative().optional(),
  byteLength: z.number().int().nonnegative(),
  byteStride: z.number().int().min(4).max(252).optional(),
  target: z.number().int().optional(),
  name: z.string().optional(),
});

export const GltfAccessorSchema = z.object({
  bufferView: IndexSchema.optional(),
  byteOffset: z.number().int().nonnegative().optional(),
  componentType: ComponentTypeSchema,
  normalized: z.boolean().optional(),
  count: z.number().int().nonnegative(),
  type: AccessorTypeSchema,
  max: z.array(z.number()).optional(),
  min: z.array(z.number()).optional(),
  name: z.string().optional(),
});

export const GltfPrimitiveSchema = z.object({
  attributes: z.record(z.string(), IndexSchema),
  indices: IndexSchema.optional(),
  material: IndexSchema.optional(),
  mode: z.number().int().min(0).max(6).optional(),
});

export const GltfMeshSchema = z.object({
  name: z.string().optional(),
  primitives: z.array(GltfPrimitiveSchema),
  extras: ExtrasSchema.optional(),
});

/**
 * Reference from a material field to a texture
 */
export const GltfTextureInfoSchema = z.object({
  index: IndexSchema,
  texCoord: z.number().int().nonnegative().optional(),
  scale: z.number().optional(),
  strength: z.number().optional(),
});

export const GltfPbrMetallicRoughnessSchema = z.object({
  baseColorFactor: Vec4Schema.optional(),
  baseColorTexture: GltfTextureInfoSchema.optional(),
  metallicFactor: z.number().optional(),
  roughnessFactor: z.number().optional(),
  metallicRoughnessTexture: GltfTextureInfoSchema.optional(),
});

export const AlphaModeSchema = z.enum(['OPAQUE', 'MASK', 'BLEND']);

export const GltfMaterialSchema = z.object({
  name: z.string().optional(),
  pbrMetallicRoughness: GltfPbrMetallicRoughnessSchema.optional(),
  normalTexture: GltfTextureInfoSchema.optional(),
  occlusionTexture: GltfTextureInfoSchema.optional(),
  emissiveTexture: GltfTextureInfoSchema.optional(),
  emissiveFactor: Vec3Schema.optional(),
  alphaMode: AlphaModeSchema.optional(),
  alphaCutoff: z.number().optional(),
  doubleSided: z.boolean().optional(),
  extras: ExtrasSchema.optional(),
  extensions: ExtrasSchema.optional(),
});

export const GltfNodeSchema = z.object({
  name: z.string().optional(),
  children: z.array(IndexSchema).optional(),
  mesh: IndexSchema.optional(),
  matrix: ColumnMajorMatrixSchema.optional(),
  translation: Vec3Schema.optional(),
  rotation: Vec4Schema.optional(),
  scale: Vec3Schema.optional(),
  extras: ExtrasSchema.optional(),
});

export const GltfSceneSchema = z.object({
  name: z.string().optional(),
  nodes: z.array(IndexSchema).optional(),
});

export const GltfImageSchema = z.object({
  name: z.string().optional(),
  uri: z.string().optional(),
  mimeType: z.string().optional(),
  bufferView: IndexSchema.optional(),
});

export const GltfTextureSchema = z.object({
  name: z.string().optional(),
  source: IndexSchema.optional(),
  sampler: IndexSchema.optional(),
});

export const GltfDocumentSchema = z.object({
  asset: GltfAssetSchema.optional(),
  scene: IndexSchema.optional(),
  scenes: z.array(GltfSceneSchema).optional(),
  nodes: z.array(GltfNodeSchema).optional(),
  meshes: z.array(GltfMeshSchema).optional(),
  accessors: z.array(GltfAccessorSchema).optional(),
  bufferViews: z.array(GltfBufferViewSchema).optional(),
  buffers: z.array(GltfBufferSchema).optional(),
  materials: z.array(GltfMaterialSchema).optional(),
  images: z.array(GltfImageSchema).optional(),
  textures: z.array(GltfTextureSchema).optional(),
  samplers: z.array(ExtrasSchema).optional(),
  extensionsUsed: z.array(z.string()).optional(),
  extras: ExtrasSchema.optional(),
});

/**
 * Type exports for TypeScript inference
 */
export type GltfAsset = z.infer<typeof GltfAssetSchema>;
export type GltfBuffer = z.infer<typeof GltfBufferSchema>;
export type GltfBufferView = z.infer<typeof GltfBufferViewSchema>;
export type GltfAccessor = z.infer<typeof GltfAccessorSchema>;
export type GltfPrimitive = z.infer<typeof GltfPrimitiveSchema>;
export type GltfMesh = z.infer<typeof GltfMeshSchema>;
export type GltfTextureInfo = z.infer<typeof GltfTextureInfoSchema>;
export type GltfPbrMetallicRoughness = z.infer<typeof GltfPbrMetallicRoughnessSchema>;
export type AlphaMode = z.infer<typeof AlphaModeSchema>;
export type GltfMaterial = z.infer<typeof GltfMaterialSchema>;
export type GltfNode = z.infer<typeof GltfNodeSchema>;
export type GltfScene = z.infer<typeof GltfSceneSchema>;
export type GltfImage = z.infer<typeof GltfImageSchema>;
export type GltfTexture = z.infer<typeof GltfTextureSchema>;
export type GltfDocument = z.infer<typeof GltfDocumentSchema>;
