/**
 * Custom Error Classes for glTF Operations
 *
 * Tagged union errors; zod failures are carried on the error that wraps them.
 */

import { ZodError, ZodIssue } from 'zod';
import { ERROR_CODES } from './constants/errors';

/**
 * Base glTF Error Class
 */
export abstract class BaseGltfError extends Error {
  abstract readonly _tag: string;
  abstract readonly code: string;
  readonly timestamp: Date;
  readonly context?: Record<string, unknown>;

  constructor(message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.timestamp = new Date();
    this.context = context;
  }

  /**
   * Get error details for logging
   */
  getDetails(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      tag: this._tag,
      timestamp: this.timestamp,
      context: this.context,
    };
  }
}

/**
 * glTF Format Error
 *
 * Malformed GLB containers, documents, buffers or accessors.
 * Aborts the whole decode.
 */
export class GltfFormatError extends BaseGltfError {
  readonly _tag = 'GltfFormatError' as const;
  readonly code = ERROR_CODES.FORMAT_ERROR;
  readonly stage: string;
  readonly zodError?: ZodError;

  constructor(message: string, stage: string, context?: Record<string, unknown>, zodError?: ZodError) {
    super(message, { stage, ...context });
    this.stage = stage;
    this.zodError = zodError;
  }

  /**
   * Get Zod validation issues
   */
  getValidationIssues(): ZodIssue[] {
    return this.zodError?.issues || [];
  }

  /**
   * Get formatted validation errors
   */
  getFormattedErrors(): string[] {
    return this.zodError?.issues.map(issue =>
      `${issue.path.join('.')}: ${issue.message}`
    ) || [];
  }
}

/**
 * glTF Configuration Error
 */
export class GltfConfigError extends BaseGltfError {
  readonly _tag = 'GltfConfigError' as const;
  readonly code = ERROR_CODES.CONFIG_VALIDATION_ERROR;
  readonly configKey: string;

  constructor(message: string, configKey: string, context?: Record<string, unknown>) {
    super(message, { configKey, ...context });
    this.configKey = configKey;
  }
}

/**
 * glTF Invariant Error
 *
 * A builder produced inconsistent output. Never caused by input files.
 */
export class GltfInvariantError extends BaseGltfError {
  readonly _tag = 'GltfInvariantError' as const;
  readonly code = ERROR_CODES.INVARIANT_VIOLATION;

  constructor(message: string, context?: Record<string, unknown>) {
    super(message, context);
  }
}

/**
 * glTF File System Error
 */
export class GltfFileSystemError extends BaseGltfError {
  readonly _tag = 'GltfFileSystemError' as const;
  readonly code = ERROR_CODES.FILE_SYSTEM_ERROR;
  readonly filePath: string;
  readonly operation: string;

  constructor(message: string, filePath: string, operation: string, context?: Record<string, unknown>) {
    super(message, { filePath, operation, ...context });
    this.filePath = filePath;
    this.operation = operation;
  }
}

/**
 * Union type for all glTF errors
 */
export type GltfError =
  | GltfFormatError
  | GltfConfigError
  | GltfInvariantError
  | GltfFileSystemError;

/**
 * Error factory functions
 */
export const GltfErrorFactory = {
  /**
   * Create format error
   */
  formatError(message: string, stage: string, context?: Record<string, unknown>, zodError?: ZodError): GltfFormatError {
    return new GltfFormatError(message, stage, context, zodError);
  },

  /**
   * Create configuration error
   */
  configError(message: string, configKey: string, context?: Record<string, unknown>): GltfConfigError {
    return new GltfConfigError(message, configKey, context);
  },

  /**
   * Create invariant error
   */
  invariantError(message: string, context?: Record<string, unknown>): GltfInvariantError {
    return new GltfInvariantError(message, context);
  },

  /**
   * Create file system error
   */
  fileSystemError(message: string, filePath: string, operation: string, context?: Record<string, unknown>): GltfFileSystemError {
    return new GltfFileSystemError(message, filePath, operation, context);
  },
};

/**
 * Throws a GltfInvariantError when a builder invariant does not hold
 */
export function assertInvariant(condition: boolean, message: string, context?: Record<string, unknown>): asserts condition {
  if (!condition) {
    throw GltfErrorFactory.invariantError(message, context);
  }
}
