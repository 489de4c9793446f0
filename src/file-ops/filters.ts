/**
 * Image file filtering (no fs operations)
 */
import { extname } from 'node:path';

import { IMAGE_SCANNING } from '../constants';

export const IMAGE_EXTENSIONS: ReadonlySet<string> = new Set<string>(IMAGE_SCANNING.IMAGE_EXTENSIONS);

/**
 * Check if a file name carries one of the supported image extensions
 * @param fileName A file name or path; the extension is compared case-insensitively
 */
export function isImageFile(fileName: string): boolean {
  return IMAGE_EXTENSIONS.has(extname(fileName).toLowerCase());
}

/**
 * Lexicographic code-unit ordering, independent of locale so visiting order
 * is the same on every machine.
 */
export function compareLexicographic(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
