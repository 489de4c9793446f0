/**
 * Path utilities for history keys and archive destinations (no fs operations)
 */
import * as nodePath from 'node:path';

import { IMAGE_SCANNING } from '../constants';

/**
 * Gets a path relative to a base directory
 * @param targetPath The absolute path
 * @param baseDir The base directory path
 * @returns Path relative to baseDir, or null when targetPath is not inside baseDir
 */
export function getRelativePath(targetPath: string, baseDir: string): string | null {
  const relativePath = nodePath.relative(nodePath.resolve(baseDir), nodePath.resolve(targetPath));
  if (relativePath.startsWith('..') || nodePath.isAbsolute(relativePath)) {
    return null;
  }
  return relativePath;
}

/**
 * True when `candidate` is `ancestor` itself or lies somewhere beneath it
 */
export function isWithin(candidate: string, ancestor: string): boolean {
  return getRelativePath(candidate, ancestor) !== null;
}

/**
 * Key identifying a directory in the processed history.
 *
 * Relative to `root` when the directory lies strictly beneath it, otherwise the
 * directory's base name. Two scans with different roots can produce the same key;
 * history is scoped per archive directory.
 */
export function directoryKey(directory: string, root?: string): string {
  if (root) {
    const relativePath = getRelativePath(directory, root);
    if (relativePath) {
      return relativePath;
    }
  }
  return nodePath.basename(nodePath.resolve(directory));
}

const SPECIAL_FOLDERS: ReadonlySet<string> = new Set<string>(IMAGE_SCANNING.SPECIAL_FOLDER_NAMES);

export function isSpecialFolder(directory: string): boolean {
  return SPECIAL_FOLDERS.has(nodePath.basename(directory));
}

/**
 * Appends `_N` to the final path component. Files keep their extension last
 * (`photo.jpg` -> `photo_1.jpg`), directories take the suffix at the end.
 */
export function withConflictSuffix(target: string, n: number, isDirectory: boolean): string {
  const dir = nodePath.dirname(target);
  const base = nodePath.basename(target);
  if (isDirectory) {
    return nodePath.join(dir, `${base}_${n}`);
  }
  const ext = nodePath.extname(base);
  const stem = ext ? base.slice(0, -ext.length) : base;
  return nodePath.join(dir, `${stem}_${n}${ext}`);
}
