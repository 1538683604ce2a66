/**
 * Validation
 *
 * Parses untrusted input through the zod schemas and reports failures as
 * tagged errors.
 */

import { ZodError, type ZodType, type ZodTypeDef } from 'zod';
import { ERROR_MESSAGES, ERROR_STAGES } from './constants/errors';
import { GltfErrorFactory } from './errors';
import {
  CodecConfigSchema,
  ExportOptionsSchema,
  GltfDocumentSchema,
  ImportOptionsSchema,
  type CodecConfig,
  type ExportSettings,
  type GltfDocument,
  type ImportSettings
} from './schemas';

function parseConfig<Output, Input>(
  schema: ZodType<Output, ZodTypeDef, Input>,
  input: unknown,
  configKey: string
): Output {
  try {
    return schema.parse(input);
  } catch (error) {
    if (error instanceof ZodError) {
      throw GltfErrorFactory.configError(ERROR_MESSAGES.INVALID_CONFIG, configKey, {
        issues: error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
      });
    }
    throw error;
  }
}

export function parseCodecConfig(input: unknown): CodecConfig {
  return parseConfig(CodecConfigSchema, input ?? {}, 'CodecConfig');
}

export function parseExportOptions(input: unknown): ExportSettings {
  return parseConfig(ExportOptionsSchema, input ?? {}, 'ExportOptions');
}

export function parseImportOptions(input: unknown): ImportSettings {
  return parseConfig(ImportOptionsSchema, input ?? {}, 'ImportOptions');
}

/**
 * Validates a parsed JSON document
 */
export function validateDocument(header: unknown): GltfDocument {
  const result = GltfDocumentSchema.safeParse(header);
  if (!result.success) {
    throw GltfErrorFactory.formatError(ERROR_MESSAGES.INVALID_DOCUMENT, ERROR_STAGES.DOCUMENT, {
      issueCount: result.error.issues.length
    }, result.error);
  }
  return result.data;
}

export {
  CodecConfigSchema,
  ExportOptionsSchema,
  ImportOptionsSchema,
  GltfDocumentSchema
} from './schemas';
