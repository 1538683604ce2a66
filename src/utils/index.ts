/**
 * Utilities
 */

export { Logger, LoggerFactory, LogLevel, createLogger, logger } from './logger';
export type { LoggerOptions, LoggerContext } from './logger';
export { bytePad, concatBytes, encodeComponents, computeBounds, maxValue, bufferFromDataURI, decodeUriPath } from './byte-utils';
export { identityMatrix, fromColumnMajor, toColumnMajor, isIdentityMatrix, composeTrs } from './matrix-utils';
export { FrameNameGenerator } from './name-utils';
export { generateId, generateUniqueId } from './encoding';
export { computeSmoothNormals } from './normal-utils';
export { getExtension, readBinaryFile, readDirectoryFiles, writeFiles } from './file-utils';
