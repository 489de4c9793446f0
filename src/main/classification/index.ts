import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { CLASSIFIER_POOL } from '../../constants';
import { logger } from '../../utils/logger';

import type { ClassifierPool } from './classifier-pool-base';
import { createDetector, type DetectorFactory, type DetectorSpec } from './detector';
import { InProcessClassifierPool } from './in-process-classifier-pool';
import { ThreadClassifierPool } from './thread-classifier-pool';

export { ClassificationDispatcher, listImageFiles } from './dispatcher';
export type { ClassifierPool } from './classifier-pool-base';
export { InProcessClassifierPool } from './in-process-classifier-pool';
export { ThreadClassifierPool } from './thread-classifier-pool';
export {
  CommandDetector,
  createDetector,
  detectorSpecSchema,
  parseDetectorCommand,
  type DetectorFactory,
  type DetectorSpec,
  type PersonDetector,
} from './detector';

/** One worker per CPU, keeping one CPU for the controlling process */
export function defaultPoolSize(cpuCount: number = os.cpus().length): number {
  return Math.max(CLASSIFIER_POOL.MIN_WORKERS, cpuCount - CLASSIFIER_POOL.RESERVED_CPUS);
}

// Compiled output places the worker entry beside this module
export function resolveWorkerPath(): string | null {
  const candidate = path.join(__dirname, 'classify-worker.js');
  return fs.existsSync(candidate) ? candidate : null;
}

export interface ClassifierPoolOptions {
  size: number;
  detector: DetectorSpec;
  classifyTimeoutMs?: number;
  startupTimeoutMs?: number;
  /** Overrides thread workers with in-process slots built from this factory */
  detectorFactory?: DetectorFactory;
}

export function createClassifierPool(options: ClassifierPoolOptions): ClassifierPool {
  const classifyTimeoutMs = options.classifyTimeoutMs ?? options.detector.timeoutMs + 1_000;
  const startupTimeoutMs = options.startupTimeoutMs ?? CLASSIFIER_POOL.STARTUP_TIMEOUT_MS;

  if (options.detectorFactory) {
    return new InProcessClassifierPool(options.size, classifyTimeoutMs, options.detectorFactory);
  }

  const workerPath = resolveWorkerPath();
  if (!workerPath) {
    logger.warn('Compiled classifier worker not found; classifying on the main thread');
    const spec = options.detector;
    return new InProcessClassifierPool(options.size, classifyTimeoutMs, () => createDetector(spec));
  }

  return new ThreadClassifierPool(options.size, classifyTimeoutMs, workerPath, options.detector, startupTimeoutMs);
}
