import path from 'node:path';

import * as fse from 'fs-extra';

import { ARCHIVE } from '../constants';
import { getRelativePath, withConflictSuffix } from '../file-ops/path';
import { ERROR_CODES, failure, type Failure } from '../utils/error-handling';
import { logger } from '../utils/logger';

export type MoveResult =
  | { ok: true; source: string; destination: string }
  | Failure;

/**
 * Where `source` lands in the archive: mirrored relative to `root` when it lies
 * under it, otherwise directly in `archiveDir` under its own name.
 */
export function resolveDestination(source: string, archiveDir: string, root?: string): string {
  if (root) {
    const relativePath = getRelativePath(source, root);
    if (relativePath) {
      return path.join(archiveDir, relativePath);
    }
  }
  return path.join(archiveDir, path.basename(source));
}

/**
 * First of `target`, `target_1`, `target_2`, … that does not exist yet
 */
export async function findFreeDestination(target: string, isDirectory: boolean): Promise<string> {
  if (!(await fse.pathExists(target))) {
    return target;
  }
  for (let n = 1; n <= ARCHIVE.MAX_CONFLICT_SUFFIX; n++) {
    const candidate = withConflictSuffix(target, n, isDirectory);
    if (!(await fse.pathExists(candidate))) {
      return candidate;
    }
  }
  throw new Error(`No free archive destination for ${target}`);
}

export class ArchiveMover {
  constructor(
    private readonly archiveDir: string,
    private readonly root?: string
  ) {}

  destinationFor(source: string): string {
    return resolveDestination(source, this.archiveDir, this.root);
  }

  /** Move one file into the archive. The source stays in place on any failure. */
  async moveFile(file: string): Promise<MoveResult> {
    return this.move(file, false);
  }

  /** Move a whole directory subtree into the archive. */
  async moveDirectory(directory: string): Promise<MoveResult> {
    return this.move(directory, true);
  }

  private async move(source: string, isDirectory: boolean): Promise<MoveResult> {
    try {
      const target = this.destinationFor(source);
      await fse.ensureDir(path.dirname(target));
      const destination = await findFreeDestination(target, isDirectory);
      // fs-extra falls back to copy + remove when rename crosses devices
      await fse.move(source, destination, { overwrite: false });
      logger.debug('Archived', { source, destination });
      return { ok: true, source, destination };
    } catch (error: unknown) {
      logger.warn('Archive move failed', { source, error: String(error) });
      return failure(ERROR_CODES.FILESYSTEM_ERROR, error);
    }
  }
}
