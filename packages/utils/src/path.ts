/**
 * Path Utilities
 */

import { basename, dirname, extname, join } from 'node:path';

/**
 * Get file extension (lowercase, without dot)
 */
export function getExtension(filename: string): string {
  const ext = extname(filename);
  return ext.toLowerCase().replace(/^\./, '');
}

/**
 * Get base filename without extension
 */
export function getBasename(filename: string): string {
  const ext = extname(filename);
  return basename(filename, ext);
}

/**
 * Path next to `filePath` with `suffix` appended to its stem
 * and the extension replaced by `extension`.
 */
export function siblingPath(filePath: string, suffix: string, extension: string): string {
  return join(dirname(filePath), `${getBasename(filePath)}${suffix}.${extension}`);
}
