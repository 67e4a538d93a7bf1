/**
 * Input helpers shared by operation handlers
 */

import { z } from 'zod';

import { isFile } from '../../utils/fs.js';
import { getRawExtensions, isRawFile } from '../../utils/mime-types.js';
import { ValidationError } from '../../utils/errors.js';

/**
 * Non-empty path string with a description for the capability card
 */
export function pathField(description: string) {
  return z.string().min(1).describe(description);
}

/**
 * Fail validation unless the path names an existing regular file
 */
export async function requireFile(path: string, field: string): Promise<void> {
  if (!(await isFile(path))) {
    throw new ValidationError(`${field}: file not found: ${path}`, field, [
      { path: field, message: `file not found: ${path}` },
    ]);
  }
}

/**
 * Fail validation unless the path exists and has a camera RAW extension
 */
export async function requireRawFile(path: string, field: string): Promise<void> {
  if (!isRawFile(path)) {
    const message = `not a RAW file (supported: ${getRawExtensions().join(', ')})`;
    throw new ValidationError(`${field}: ${message}`, field, [{ path: field, message }]);
  }
  await requireFile(path, field);
}
