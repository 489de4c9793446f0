import { v4 as uuidv4 } from 'uuid';

import { ERROR_CODES, createScanError, getErrorMessage } from '../../utils/error-handling';
import { logger } from '../../utils/logger';

import { SlotCrashedError, TimeoutError, withTimeout } from './worker-common';

/**
 * One worker of a classifier pool. A slot owns its detector for its whole
 * lifetime and handles one file at a time.
 */
export interface ClassifierSlot {
  start(): Promise<void>;
  classify(filePath: string): Promise<boolean>;
  dispose(): Promise<void>;
}

export interface ClassifierPool {
  readonly size: number;
  start(): Promise<void>;
  /** Resolves to false on failure, timeout or termination; never rejects. */
  classify(filePath: string): Promise<boolean>;
  terminate(): Promise<void>;
}

export interface PoolStats {
  queueLength: number;
  activeJobs: number;
  workerCount: number;
  isTerminated: boolean;
}

interface QueueItem {
  id: string;
  filePath: string;
  resolve: (value: boolean) => void;
}

interface ActiveJob {
  slotIndex: number;
  item: QueueItem;
}

/**
 * Fixed-size pool dispatching classification jobs FIFO to the first idle slot.
 *
 * Failure policy:
 * - A job that fails or exceeds classifyTimeoutMs resolves to false
 * - A slot whose job timed out or whose worker crashed is replaced before it
 *   takes more work
 * - terminate() resolves every queued and in-flight job to false
 */
export abstract class ClassifierPoolBase implements ClassifierPool {
  private slots: ClassifierSlot[] = [];
  private slotBusy: boolean[] = [];
  private queue: QueueItem[] = [];
  private activeJobs = new Map<string, ActiveJob>();
  private recovering = new Map<number, Promise<void>>();

  private isStarted = false;
  private isTerminated = false;

  constructor(
    public readonly size: number,
    protected readonly classifyTimeoutMs: number
  ) {}

  protected abstract createSlot(index: number): ClassifierSlot;

  async start(): Promise<void> {
    if (this.isStarted) return;
    this.isStarted = true;

    this.slots = Array.from({ length: this.size }, (_, i) => this.createSlot(i));
    this.slotBusy = this.slots.map(() => false);

    const results = await Promise.allSettled(this.slots.map((slot) => slot.start()));
    const failed = results.find((r): r is PromiseRejectedResult => r.status === 'rejected');
    if (failed) {
      await this.terminate();
      throw createScanError(
        ERROR_CODES.POOL_START_FAILED,
        `Failed to start classifier pool: ${getErrorMessage(failed.reason)}`,
        'ClassifierPool.start',
        { size: this.size },
        failed.reason
      );
    }
    logger.debug('Classifier pool started', { size: this.size });
  }

  classify(filePath: string): Promise<boolean> {
    if (this.isTerminated || !this.isStarted) {
      return Promise.resolve(false);
    }

    return new Promise<boolean>((resolve) => {
      const item: QueueItem = { id: uuidv4(), filePath, resolve };
      const slotIndex = this.findAvailableSlot();
      if (slotIndex === null) {
        this.queue.push(item);
      } else {
        this.dispatch(item, slotIndex);
      }
    });
  }

  getStats(): PoolStats {
    return {
      queueLength: this.queue.length,
      activeJobs: this.activeJobs.size,
      workerCount: this.slots.length,
      isTerminated: this.isTerminated,
    };
  }

  async terminate(): Promise<void> {
    if (this.isTerminated) return;
    this.isTerminated = true;

    for (const item of this.queue) {
      item.resolve(false);
    }
    this.queue = [];

    for (const job of this.activeJobs.values()) {
      job.item.resolve(false);
    }
    this.activeJobs.clear();

    const disposals = await Promise.allSettled(this.slots.map((slot) => slot.dispose()));
    for (const result of disposals) {
      if (result.status === 'rejected') {
        logger.debug('Classifier slot did not shut down cleanly', { error: getErrorMessage(result.reason) });
      }
    }
    this.slots = [];
    this.slotBusy = [];
    this.recovering.clear();
  }

  private findAvailableSlot(): number | null {
    for (let i = 0; i < this.slots.length; i++) {
      if (!this.slotBusy[i] && !this.recovering.has(i)) {
        return i;
      }
    }
    return null;
  }

  private dispatch(item: QueueItem, slotIndex: number): void {
    const slot = this.slots[slotIndex];
    this.slotBusy[slotIndex] = true;
    this.activeJobs.set(item.id, { slotIndex, item });

    withTimeout(slot.classify(item.filePath), this.classifyTimeoutMs, `Classification of ${item.filePath}`)
      .then((hasPeople) => this.finish(item.id, hasPeople, false))
      .catch((error: unknown) => {
        logger.warn('Classification failed, treating as no person', {
          path: item.filePath,
          code: ERROR_CODES.CLASSIFICATION_FAILURE,
          error: getErrorMessage(error),
        });
        this.finish(item.id, false, error instanceof TimeoutError || error instanceof SlotCrashedError);
      });
  }

  private finish(id: string, hasPeople: boolean, replaceSlot: boolean): void {
    const job = this.activeJobs.get(id);
    if (!job) return;
    this.activeJobs.delete(id);
    this.slotBusy[job.slotIndex] = false;
    job.item.resolve(hasPeople);

    if (replaceSlot && !this.isTerminated) {
      this.recoverSlot(job.slotIndex);
    } else {
      this.processNext();
    }
  }

  private processNext(): void {
    while (!this.isTerminated && this.queue.length > 0) {
      const slotIndex = this.findAvailableSlot();
      if (slotIndex === null) return;
      const item = this.queue.shift();
      if (!item) return;
      this.dispatch(item, slotIndex);
    }
  }

  // A timed-out slot may still be busy with the old file, and a crashed one has no worker; replace it outright
  private recoverSlot(slotIndex: number): void {
    if (this.recovering.has(slotIndex)) return;

    const recovery = (async () => {
      const old = this.slots[slotIndex];
      try {
        await old.dispose();
      } catch (error: unknown) {
        logger.debug('Disposing failed slot did not complete', { slotIndex, error: getErrorMessage(error) });
      }
      if (this.isTerminated) return;
      const replacement = this.createSlot(slotIndex);
      await replacement.start();
      if (this.isTerminated) {
        await replacement.dispose();
        return;
      }
      this.slots[slotIndex] = replacement;
    })();

    this.recovering.set(slotIndex, recovery);
    recovery
      .catch((error: unknown) => {
        logger.error('Classifier slot could not be restarted', { slotIndex, error: getErrorMessage(error) });
      })
      .finally(() => {
        this.recovering.delete(slotIndex);
        this.processNext();
      });
  }
}
