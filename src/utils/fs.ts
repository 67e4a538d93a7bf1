/**
 * File system utilities
 */

import { mkdir, stat, unlink } from 'fs/promises';
import path from 'path';

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Delete a file, ignoring only a missing file
 */
export async function safeUnlink(filePath: string): Promise<void> {
  try {
    await unlink(filePath);
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return;
    }
    throw error;
  }
}

/**
 * Create a directory (and its parents) if it does not exist
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await mkdir(dirPath, { recursive: true });
}

/**
 * Create the directory that will hold a file
 */
export async function ensureParentDir(filePath: string): Promise<void> {
  await ensureDir(path.dirname(filePath));
}

/**
 * Check that a path exists and is a regular file
 */
export async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await stat(filePath)).isFile();
  } catch (error) {
    if (isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
      return false;
    }
    throw error;
  }
}

/**
 * Check that a path exists and is a Unix domain socket
 */
export async function isSocket(filePath: string): Promise<boolean> {
  try {
    return (await stat(filePath)).isSocket();
  } catch (error) {
    if (isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
      return false;
    }
    throw error;
  }
}

/**
 * Build an output path in another directory with another extension
 *
 * @example
 * getOutputPath('/raw/IMG_0001.CR2', '/previews', 'webp') // '/previews/IMG_0001.webp'
 */
export function getOutputPath(inputPath: string, outputDir: string, extension: string): string {
  const parsed = path.parse(inputPath);
  return path.join(outputDir, `${parsed.name}.${extension}`);
}
