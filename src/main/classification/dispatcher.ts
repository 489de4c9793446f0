import fs from 'node:fs';
import path from 'node:path';

import { compareLexicographic, isImageFile } from '../../file-ops/filters';
import type { ClassificationResult } from '../../file-ops/scan-types';

import type { ClassifierPool } from './classifier-pool-base';

const ABORTED = Symbol('aborted');

async function isRegularFile(filePath: string): Promise<boolean> {
  try {
    return (await fs.promises.stat(filePath)).isFile();
  } catch {
    // Broken link
    return false;
  }
}

/**
 * Image files directly inside `directory` (no recursion), sorted by full path.
 * Symbolic links count when they resolve to a regular file.
 * Throws if the directory cannot be read.
 */
export async function listImageFiles(directory: string): Promise<string[]> {
  const entries = await fs.promises.readdir(directory, { withFileTypes: true });
  const files: string[] = [];
  for (const entry of entries) {
    if (!isImageFile(entry.name)) continue;
    const filePath = path.join(directory, entry.name);
    if (entry.isFile() || (entry.isSymbolicLink() && (await isRegularFile(filePath)))) {
      files.push(filePath);
    }
  }
  return files.sort(compareLexicographic);
}

function raceAbort<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T | typeof ABORTED> {
  if (!signal) return promise;
  if (signal.aborted) return Promise.resolve(ABORTED);

  return new Promise<T | typeof ABORTED>((resolve, reject) => {
    const onAbort = () => resolve(ABORTED);
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

export class ClassificationDispatcher {
  constructor(private readonly pool: ClassifierPool) {}

  get workerCount(): number {
    return this.pool.size;
  }

  /**
   * Submit the whole batch, then yield results strictly in input order, each as
   * soon as it and every earlier result are ready. Stops when `signal` aborts.
   */
  async *classify(
    files: readonly string[],
    signal?: AbortSignal
  ): AsyncGenerator<ClassificationResult, void, undefined> {
    const pending = files.map((filePath) => this.pool.classify(filePath));

    for (let i = 0; i < files.length; i++) {
      const hasPeople = await raceAbort(pending[i], signal);
      if (hasPeople === ABORTED) return;
      yield { path: files[i], hasPeople };
    }
  }
}
