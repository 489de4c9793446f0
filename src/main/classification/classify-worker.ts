import { parentPort } from 'node:worker_threads';

import { getErrorMessage } from '../../utils/error-handling';
import { logger } from '../../utils/logger';

import { createDetector, type PersonDetector } from './detector';
import { MESSAGE_TYPES, toWorkerMessage, type FromWorkerMessage } from './worker-common';

// Constructed once during INIT and reused for every file this thread handles
let detector: PersonDetector | null = null;

function send(message: FromWorkerMessage): void {
  parentPort?.postMessage(message);
}

async function classify(id: string, filePath: string): Promise<void> {
  if (!detector) {
    send({ type: MESSAGE_TYPES.CLASSIFY_RESULT, id, hasPeople: false, error: 'Worker detector not initialized' });
    return;
  }
  try {
    const hasPeople = await detector.containsPeople(filePath);
    send({ type: MESSAGE_TYPES.CLASSIFY_RESULT, id, hasPeople });
  } catch (error: unknown) {
    logger.warn(`Error processing ${filePath}: ${getErrorMessage(error)}`);
    send({ type: MESSAGE_TYPES.CLASSIFY_RESULT, id, hasPeople: false });
  }
}

if (parentPort) {
  parentPort.on('message', (raw: unknown) => {
    const parsed = toWorkerMessage.safeParse(raw);
    if (!parsed.success) {
      logger.debug('Classifier worker: ignoring malformed message');
      return;
    }
    const message = parsed.data;
    switch (message.type) {
      case MESSAGE_TYPES.INIT: {
        try {
          detector = createDetector(message.detector);
          send({ type: MESSAGE_TYPES.INIT_COMPLETE });
        } catch (error: unknown) {
          send({ type: MESSAGE_TYPES.INIT_ERROR, message: getErrorMessage(error) });
        }
        break;
      }
      case MESSAGE_TYPES.CLASSIFY: {
        void classify(message.id, message.path);
        break;
      }
    }
  });

  send({ type: MESSAGE_TYPES.READY });
}
