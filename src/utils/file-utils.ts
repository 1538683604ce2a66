/**
 * File Utilities
 *
 * Reads and writes the files produced by the exporters.
 */

import * as fs from 'fs';
import * as path from 'path';
import { GltfErrorFactory } from '../errors';
import { ERROR_MESSAGES } from '../constants/errors';
import { Logger, LoggerFactory } from './logger';

/**
 * Lower-cased extension of a path, including the dot
 */
export function getExtension(filePath: string): string {
  return path.extname(filePath).toLowerCase();
}

/**
 * Reads a file as bytes
 */
export async function readBinaryFile(filePath: string): Promise<Uint8Array> {
  try {
    const data = await fs.promises.readFile(filePath);
    return new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
  } catch (error) {
    throw GltfErrorFactory.fileSystemError(
      `${ERROR_MESSAGES.FILE_OPERATION_FAILED}: ${error instanceof Error ? error.message : String(error)}`,
      filePath,
      'read'
    );
  }
}

/**
 * Reads every regular file of a directory (non-recursive) keyed by file name
 */
export async function readDirectoryFiles(dirPath: string): Promise<Map<string, Uint8Array>> {
  const files = new Map<string, Uint8Array>();
  let entries: fs.Dirent[];
  try {
    entries = await fs.promises.readdir(dirPath, { withFileTypes: true });
  } catch (error) {
    throw GltfErrorFactory.fileSystemError(
      `${ERROR_MESSAGES.FILE_OPERATION_FAILED}: ${error instanceof Error ? error.message : String(error)}`,
      dirPath,
      'readdir'
    );
  }

  for (const entry of entries.filter(e => e.isFile()).sort((a, b) => a.name.localeCompare(b.name))) {
    files.set(entry.name, await readBinaryFile(path.join(dirPath, entry.name)));
  }
  return files;
}

/**
 * Writes a file map into a directory, creating it when missing.
 * Returns the written paths in map order.
 */
export async function writeFiles(
  files: ReadonlyMap<string, Uint8Array>,
  outDir: string,
  logger: Logger = LoggerFactory.forFileOperations()
): Promise<string[]> {
  const written: string[] = [];

  try {
    await fs.promises.mkdir(outDir, { recursive: true });
  } catch (error) {
    throw GltfErrorFactory.fileSystemError(
      `${ERROR_MESSAGES.FILE_OPERATION_FAILED}: ${error instanceof Error ? error.message : String(error)}`,
      outDir,
      'mkdir'
    );
  }

  for (const [name, data] of files) {
    const filePath = path.join(outDir, name);
    try {
      await fs.promises.writeFile(filePath, data);
    } catch (error) {
      throw GltfErrorFactory.fileSystemError(
        `${ERROR_MESSAGES.FILE_OPERATION_FAILED}: ${error instanceof Error ? error.message : String(error)}`,
        filePath,
        'write'
      );
    }
    logger.logFileOperation('write', filePath, data.byteLength);
    written.push(filePath);
  }

  return written;
}
