import { spawn } from 'node:child_process';

import { TERMINAL } from '../../constants';
import { getErrorMessage } from '../../utils/error-handling';
import { logger } from '../../utils/logger';
import { findExecutable } from '../utils/executable';

import type { ScanReporter } from './scan-reporter';

/** Draws an image in the terminal. Best effort: never rejects. */
export interface ImageRenderer {
  render(imagePath: string): Promise<void>;
}

/**
 * Renders through `img2sixel` when it is on PATH; otherwise prints a
 * placeholder line naming the image.
 */
export class SixelRenderer implements ImageRenderer {
  private binary: string | null | undefined;

  constructor(
    private readonly reporter: ScanReporter,
    private readonly locate: (name: string) => string | null = findExecutable
  ) {}

  isSupported(): boolean {
    if (this.binary === undefined) {
      this.binary = this.locate(TERMINAL.SIXEL_BINARY);
    }
    return this.binary !== null;
  }

  async render(imagePath: string): Promise<void> {
    const binary = this.isSupported() ? this.binary : null;
    if (!binary) {
      this.reporter.line(`[Image: ${imagePath}] (${TERMINAL.SIXEL_BINARY} not found)`);
      return;
    }

    try {
      await new Promise<void>((resolve, reject) => {
        const child = spawn(binary, [imagePath], { stdio: ['ignore', 'inherit', 'pipe'] });
        let stderr = '';
        child.stderr?.on('data', (chunk: Buffer) => {
          stderr += chunk.toString('utf8');
        });
        child.on('error', reject);
        child.on('close', (code: number | null) => {
          if (code === 0) resolve();
          else reject(new Error(stderr.trim() || `${TERMINAL.SIXEL_BINARY} exited with code ${String(code)}`));
        });
      });
    } catch (error: unknown) {
      logger.debug('Sixel rendering failed', { imagePath, error: getErrorMessage(error) });
      this.reporter.line(`Error displaying image: ${getErrorMessage(error)}`);
    }
  }
}
