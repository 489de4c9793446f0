import { z } from 'zod';

import { detectorSpecSchema } from './detector';

/**
 * Handshake lifecycle between the pool and a classifier thread:
 * 1. The thread posts READY once it has booted
 * 2. The pool posts INIT with the DetectorSpec
 * 3. The thread constructs its detector and answers INIT_COMPLETE (or INIT_ERROR)
 */
export const MESSAGE_TYPES = {
  READY: 'READY',
  INIT: 'INIT',
  INIT_COMPLETE: 'INIT_COMPLETE',
  INIT_ERROR: 'INIT_ERROR',
  CLASSIFY: 'CLASSIFY',
  CLASSIFY_RESULT: 'CLASSIFY_RESULT',
} as const;

export const toWorkerMessage = z.discriminatedUnion('type', [
  z.object({ type: z.literal(MESSAGE_TYPES.INIT), detector: detectorSpecSchema }),
  z.object({ type: z.literal(MESSAGE_TYPES.CLASSIFY), id: z.string(), path: z.string() }),
]);

export const fromWorkerMessage = z.discriminatedUnion('type', [
  z.object({ type: z.literal(MESSAGE_TYPES.READY) }),
  z.object({ type: z.literal(MESSAGE_TYPES.INIT_COMPLETE) }),
  z.object({ type: z.literal(MESSAGE_TYPES.INIT_ERROR), message: z.string() }),
  z.object({
    type: z.literal(MESSAGE_TYPES.CLASSIFY_RESULT),
    id: z.string(),
    hasPeople: z.boolean(),
    error: z.string().optional(),
  }),
]);

export type ToWorkerMessage = z.infer<typeof toWorkerMessage>;
export type FromWorkerMessage = z.infer<typeof fromWorkerMessage>;

export class TimeoutError extends Error {
  constructor(label: string, ms: number) {
    super(`${label} timeout after ${ms}ms`);
    this.name = 'TimeoutError';
  }
}

/** The slot's worker died or stopped running; the slot must be replaced before it takes more work */
export class SlotCrashedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SlotCrashedError';
  }
}

export function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  label: string
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new TimeoutError(label, ms));
    }, ms);

    promise
      .then(value => {
        clearTimeout(timer);
        resolve(value);
      })
      .catch(error => {
        clearTimeout(timer);
        reject(error);
      });
  });
}
