import fs from 'node:fs';
import path from 'node:path';

import { HISTORY } from '../constants';
import { ERROR_CODES, failure, isErrnoException, type Failure } from '../utils/error-handling';
import { logger } from '../utils/logger';

export type SaveHistoryResult =
  | { ok: true; keys: Set<string>; added: boolean }
  | Failure;

export function historyFilePath(archiveDir: string): string {
  return path.join(archiveDir, HISTORY.FILENAME);
}

function parseHistory(raw: string): Set<string> | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  if (!Array.isArray(parsed)) {
    return null;
  }
  return new Set(parsed.filter((entry): entry is string => typeof entry === 'string'));
}

/**
 * Read the processed-directory history for an archive directory.
 * A missing, unreadable or malformed file yields an empty set so a scan starts clean.
 */
export async function loadHistory(archiveDir: string): Promise<Set<string>> {
  const filePath = historyFilePath(archiveDir);
  let raw: string;
  try {
    raw = await fs.promises.readFile(filePath, 'utf8');
  } catch (error: unknown) {
    if (!isErrnoException(error) || error.code !== 'ENOENT') {
      logger.debug('History unreadable, starting from empty history', { filePath, error: String(error) });
    }
    return new Set();
  }

  const keys = parseHistory(raw);
  if (!keys) {
    logger.debug('History corrupt, starting from empty history', { filePath, code: ERROR_CODES.HISTORY_CORRUPTION });
    return new Set();
  }
  return keys;
}

/**
 * Add a key to the history file. Re-reads before writing so keys added by
 * earlier saves (or external edits) survive; the write goes through a temp file
 * and a rename.
 */
export async function saveToHistory(archiveDir: string, key: string): Promise<SaveHistoryResult> {
  const keys = await loadHistory(archiveDir);
  const added = !keys.has(key);
  keys.add(key);

  const filePath = historyFilePath(archiveDir);
  const tempPath = `${filePath}${HISTORY.TEMP_SUFFIX}`;
  try {
    await fs.promises.mkdir(archiveDir, { recursive: true });
    await fs.promises.writeFile(tempPath, JSON.stringify([...keys], null, 2), 'utf8');
    await fs.promises.rename(tempPath, filePath);
    return { ok: true, keys, added };
  } catch (error: unknown) {
    await fs.promises.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
      logger.debug('Failed to remove temporary history file', { tempPath, error: String(cleanupError) });
    });
    return failure(ERROR_CODES.FILESYSTEM_ERROR, error);
  }
}

/**
 * In-memory view of the history backed by the file. Reads go to the cached set
 * loaded at scan start; every commit is written through immediately.
 */
export class HistoryStore {
  private keys = new Set<string>();

  constructor(private readonly archiveDir: string) {}

  async load(): Promise<Set<string>> {
    this.keys = await loadHistory(this.archiveDir);
    return new Set(this.keys);
  }

  has(key: string): boolean {
    return this.keys.has(key);
  }

  async commit(key: string): Promise<SaveHistoryResult> {
    const result = await saveToHistory(this.archiveDir, key);
    if (result.ok) {
      this.keys = new Set(result.keys);
    } else {
      // Keep the key for this run even if the file could not be written
      this.keys.add(key);
    }
    return result;
  }
}
