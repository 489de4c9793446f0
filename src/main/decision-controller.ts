import { EventEmitter } from 'node:events';
import path from 'node:path';

import type { Decision } from '../file-ops/scan-types';

import type { ArchiveMover, MoveResult } from './archive-mover';
import type { ImageRenderer } from './terminal/image-renderer';
import type { KeyReader } from './terminal/key-reader';
import type { ScanReporter } from './terminal/scan-reporter';

export type DecisionState = 'presenting' | 'awaiting_input' | 'keeping' | 'archiving' | 'quitting';

export type DecisionOutcome =
  | { kind: 'keep' }
  | { kind: 'archive'; move: MoveResult }
  | { kind: 'quit' }
  | { kind: 'interrupted' };

export interface DecisionControllerDeps {
  renderer: ImageRenderer;
  keys: KeyReader;
  mover: ArchiveMover;
  reporter: ScanReporter;
}

const KEY_TO_DECISION: Readonly<Record<string, Decision>> = {
  k: 'keep',
  a: 'archive',
  q: 'quit',
};

export function parseDecisionKey(key: string): Decision | null {
  return KEY_TO_DECISION[key.toLowerCase()] ?? null;
}

/**
 * Per-match interactive loop: show the image, wait for k/a/q, then act.
 * Emits `state` with each DecisionState as it is entered.
 */
export class DecisionController extends EventEmitter {
  private current: DecisionState | null = null;

  constructor(private readonly deps: DecisionControllerDeps) {
    super();
  }

  get state(): DecisionState | null {
    return this.current;
  }

  async decide(filePath: string): Promise<DecisionOutcome> {
    const { renderer, reporter } = this.deps;

    this.enter('presenting', filePath);
    reporter.line();
    reporter.line(`Found person in: ${path.basename(filePath)}`);
    await renderer.render(filePath);

    this.enter('awaiting_input', filePath);
    reporter.line();
    reporter.line();
    reporter.write('Action ([k]eep, [a]rchive, [q]uit): ');

    const decision = await this.awaitDecision();
    if (decision === null) {
      reporter.line();
      return { kind: 'interrupted' };
    }

    switch (decision) {
      case 'keep': {
        this.enter('keeping', filePath);
        reporter.line('Keep');
        reporter.line('Kept.');
        return { kind: 'keep' };
      }
      case 'archive': {
        this.enter('archiving', filePath);
        reporter.line('Archive');
        const move = await this.deps.mover.moveFile(filePath);
        if (move.ok) {
          reporter.line(`Archived to ${move.destination}`);
        } else {
          reporter.line(`Failed to archive: ${move.message}`);
        }
        return { kind: 'archive', move };
      }
      case 'quit': {
        this.enter('quitting', filePath);
        reporter.line('Quit');
        reporter.line('Exiting...');
        return { kind: 'quit' };
      }
    }
  }

  // Unrecognised keys re-read without leaving awaiting_input; null means interrupted
  private async awaitDecision(): Promise<Decision | null> {
    for (;;) {
      const key = await this.deps.keys.readKey();
      if (key.kind === 'interrupt') {
        return null;
      }
      const decision = parseDecisionKey(key.value);
      if (decision) {
        return decision;
      }
    }
  }

  private enter(state: DecisionState, filePath: string): void {
    this.current = state;
    this.emit('state', state, filePath);
  }
}
