import fs from 'node:fs';
import path from 'node:path';

import { compareLexicographic } from '../file-ops/filters';
import { isWithin } from '../file-ops/path';
import { ERROR_CODES, createScanError, getErrorMessage } from '../utils/error-handling';
import { logger } from '../utils/logger';

async function readSubdirectories(directory: string): Promise<string[]> {
  const entries = await fs.promises.readdir(directory, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isDirectory())
    .map((entry) => path.join(directory, entry.name));
}

/**
 * Directories to visit for a scan, parents before children.
 *
 * Recursive plans are sorted by full path so the visiting order is identical
 * across runs. Symbolic links are not followed. Only an unreadable `folder`
 * fails the plan; unreadable subdirectories are listed but not descended into.
 * Subdirectories within any `exclude` path (such as an archive directory kept
 * inside the scanned tree) are neither listed nor descended into. An exclude
 * path that contains `folder` is ignored.
 */
export async function planDirectories(
  folder: string,
  recursive: boolean,
  exclude: readonly string[] = []
): Promise<string[]> {
  const start = path.resolve(folder);

  let children: string[];
  try {
    children = await readSubdirectories(start);
  } catch (error: unknown) {
    throw createScanError(
      ERROR_CODES.FILESYSTEM_ERROR,
      `Error reading directory: ${getErrorMessage(error)}`,
      'planDirectories',
      { folder: start },
      error
    );
  }

  if (!recursive) {
    return [start];
  }

  const excluded = exclude.filter((candidate) => !isWithin(start, candidate));
  const planned: string[] = [start];
  const queue = [...children];
  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined) break;
    if (excluded.some((candidate) => isWithin(current, candidate))) {
      logger.debug('Excluded from scan', { directory: current });
      continue;
    }
    planned.push(current);
    try {
      queue.push(...(await readSubdirectories(current)));
    } catch (error: unknown) {
      logger.warn('Cannot descend into directory', { directory: current, error: getErrorMessage(error) });
    }
  }

  return planned.sort(compareLexicographic);
}
