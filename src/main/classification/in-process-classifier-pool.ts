import { ClassifierPoolBase, type ClassifierSlot } from './classifier-pool-base';
import type { DetectorFactory, PersonDetector } from './detector';

class InProcessSlot implements ClassifierSlot {
  private detector: PersonDetector | null = null;

  constructor(private readonly factory: DetectorFactory) {}

  async start(): Promise<void> {
    this.detector = this.factory();
  }

  async classify(filePath: string): Promise<boolean> {
    if (!this.detector) {
      throw new Error('Detector not initialized');
    }
    return this.detector.containsPeople(filePath);
  }

  async dispose(): Promise<void> {
    this.detector = null;
  }
}

/**
 * Pool whose slots run on the controlling event loop. Used when the compiled
 * thread entry is unavailable, and in tests. Each slot still owns a private
 * detector instance.
 */
export class InProcessClassifierPool extends ClassifierPoolBase {
  constructor(
    size: number,
    classifyTimeoutMs: number,
    private readonly factory: DetectorFactory
  ) {
    super(size, classifyTimeoutMs);
  }

  protected createSlot(): ClassifierSlot {
    return new InProcessSlot(this.factory);
  }
}
