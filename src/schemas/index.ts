/**
 * Zod Schemas for the glTF Scene Codec
 *
 * Configuration schemas; the document schemas live in ./gltf-document.
 */

import { z } from 'zod';
import { DEFAULT_CONFIG } from '../constants/config';
import { LogLevel } from '../utils/logger';

/**
 * Codec Configuration Schema
 */
export const CodecConfigSchema = z.object({
  includeNormals: z.boolean().optional().default(DEFAULT_CONFIG.INCLUDE_NORMALS),
  deterministicNames: z.boolean().optional().default(DEFAULT_CONFIG.DETERMINISTIC_NAMES),
  baseFrame: z.string().min(1, 'Base frame name cannot be empty').optional().default(DEFAULT_CONFIG.BASE_FRAME),
  generator: z.string().min(1).optional().default(DEFAULT_CONFIG.GENERATOR),
  gltfFileName: z.string()
    .regex(/\.gltf$/i, 'glTF file name must end with .gltf')
    .optional()
    .default(DEFAULT_CONFIG.GLTF_FILE_NAME),
  logLevel: z.nativeEnum(LogLevel).optional().default(LogLevel.WARN),
});

/**
 * Export Options Schema
 */
export const ExportOptionsSchema = z.object({
  includeNormals: z.boolean().optional().default(DEFAULT_CONFIG.INCLUDE_NORMALS),
  generator: z.string().min(1).optional().default(DEFAULT_CONFIG.GENERATOR),
  gltfFileName: z.string().optional().default(DEFAULT_CONFIG.GLTF_FILE_NAME),
});

/**
 * Import Options Schema
 */
export const ImportOptionsSchema = z.object({
  deterministicNames: z.boolean().optional().default(DEFAULT_CONFIG.DETERMINISTIC_NAMES),
  baseFrame: z.string().min(1).optional().default(DEFAULT_CONFIG.BASE_FRAME),
  gltfFileName: z.string().optional().default(DEFAULT_CONFIG.GLTF_FILE_NAME),
});

/**
 * Type exports for TypeScript inference
 */
export type CodecConfig = z.infer<typeof CodecConfigSchema>;
export type CodecConfigInput = z.input<typeof CodecConfigSchema>;
export type ExportSettings = z.infer<typeof ExportOptionsSchema>;
export type ImportSettings = z.infer<typeof ImportOptionsSchema>;

// Re-export base and document schemas
export * from './base-schemas';
export * from './gltf-document';
