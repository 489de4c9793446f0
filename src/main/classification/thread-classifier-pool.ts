import { Worker } from 'node:worker_threads';

import { v4 as uuidv4 } from 'uuid';

import { logger } from '../../utils/logger';

import { ClassifierPoolBase, type ClassifierSlot } from './classifier-pool-base';
import type { DetectorSpec } from './detector';
import {
  MESSAGE_TYPES,
  SlotCrashedError,
  fromWorkerMessage,
  withTimeout,
  type FromWorkerMessage,
  type ToWorkerMessage,
} from './worker-common';

interface PendingRequest {
  resolve: (hasPeople: boolean) => void;
  reject: (error: Error) => void;
}

class ThreadSlot implements ClassifierSlot {
  private worker: Worker | null = null;
  private pending = new Map<string, PendingRequest>();

  constructor(
    private readonly workerPath: string,
    private readonly detector: DetectorSpec,
    private readonly startupTimeoutMs: number,
    private readonly index: number
  ) {}

  async start(): Promise<void> {
    const worker = new Worker(this.workerPath);
    this.worker = worker;

    try {
      await withTimeout(this.handshake(worker), this.startupTimeoutMs, `Classifier worker ${this.index} handshake`);
    } catch (error) {
      this.worker = null;
      await worker.terminate();
      throw error;
    }

    worker.on('message', (raw: unknown) => this.onMessage(raw));
    worker.on('error', (error: Error) => {
      this.failPending(new SlotCrashedError(`Classifier worker ${this.index} error: ${error.message}`));
    });
    worker.on('exit', (code: number) => {
      if (this.worker !== worker) return;
      this.worker = null;
      this.failPending(new SlotCrashedError(`Classifier worker ${this.index} exited with code ${code}`));
    });
  }

  classify(filePath: string): Promise<boolean> {
    const worker = this.worker;
    if (!worker) {
      return Promise.reject(new SlotCrashedError(`Classifier worker ${this.index} is not running`));
    }
    const id = uuidv4();
    return new Promise<boolean>((resolve, reject) => {
      this.pending.set(id, { resolve, reject });
      this.post(worker, { type: MESSAGE_TYPES.CLASSIFY, id, path: filePath });
    });
  }

  async dispose(): Promise<void> {
    const worker = this.worker;
    this.worker = null;
    this.failPending(new Error(`Classifier worker ${this.index} terminated`));
    if (worker) {
      await worker.terminate();
    }
  }

  private handshake(worker: Worker): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const onMessage = (raw: unknown) => {
        const parsed = fromWorkerMessage.safeParse(raw);
        if (!parsed.success) return;
        const message = parsed.data;
        if (message.type === MESSAGE_TYPES.READY) {
          this.post(worker, { type: MESSAGE_TYPES.INIT, detector: this.detector });
        } else if (message.type === MESSAGE_TYPES.INIT_COMPLETE) {
          cleanup();
          resolve();
        } else if (message.type === MESSAGE_TYPES.INIT_ERROR) {
          cleanup();
          reject(new Error(`Classifier worker ${this.index} failed to initialize: ${message.message}`));
        }
      };
      const onError = (error: Error) => {
        cleanup();
        reject(new Error(`Classifier worker ${this.index} error during handshake: ${error.message}`));
      };
      const onExit = (code: number) => {
        cleanup();
        reject(new Error(`Classifier worker ${this.index} exited with code ${code} during handshake`));
      };
      const cleanup = () => {
        worker.off('message', onMessage);
        worker.off('error', onError);
        worker.off('exit', onExit);
      };
      worker.on('message', onMessage);
      worker.on('error', onError);
      worker.on('exit', onExit);
    });
  }

  private onMessage(raw: unknown): void {
    const parsed = fromWorkerMessage.safeParse(raw);
    if (!parsed.success) {
      logger.debug('Ignoring malformed worker message', { index: this.index });
      return;
    }
    const message: FromWorkerMessage = parsed.data;
    if (message.type !== MESSAGE_TYPES.CLASSIFY_RESULT) return;

    const request = this.pending.get(message.id);
    if (!request) return;
    this.pending.delete(message.id);
    if (message.error) {
      request.reject(new Error(message.error));
    } else {
      request.resolve(message.hasPeople);
    }
  }

  private failPending(error: Error): void {
    for (const request of this.pending.values()) {
      request.reject(error);
    }
    this.pending.clear();
  }

  private post(worker: Worker, message: ToWorkerMessage): void {
    worker.postMessage(message);
  }
}

/**
 * Pool backed by worker_threads; each thread constructs one detector during
 * the handshake and keeps it until the pool terminates.
 */
export class ThreadClassifierPool extends ClassifierPoolBase {
  constructor(
    size: number,
    classifyTimeoutMs: number,
    private readonly workerPath: string,
    private readonly detector: DetectorSpec,
    private readonly startupTimeoutMs: number
  ) {
    super(size, classifyTimeoutMs);
  }

  protected createSlot(index: number): ClassifierSlot {
    return new ThreadSlot(this.workerPath, this.detector, this.startupTimeoutMs, index);
  }
}
