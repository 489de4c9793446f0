import { spawn } from 'node:child_process';

import { z } from 'zod';

import { CLASSIFIER_POOL } from '../../constants';
import { findExecutable } from '../utils/executable';

/**
 * "Does this image contain a person?" One instance is constructed per worker
 * and reused for every file that worker classifies.
 */
export interface PersonDetector {
  containsPeople(imagePath: string): Promise<boolean>;
}

export const commandDetectorSpec = z.object({
  kind: z.literal('command'),
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  timeoutMs: z.number().int().positive().default(CLASSIFIER_POOL.CLASSIFY_TIMEOUT_MS),
});

// Single variant today; the discriminator leaves room for in-process detectors
export const detectorSpecSchema = z.discriminatedUnion('kind', [commandDetectorSpec]);

export type DetectorSpec = z.infer<typeof detectorSpecSchema>;

export type DetectorFactory = () => PersonDetector;

/**
 * Split a command line such as `detect-people --threshold 0.5` into the
 * executable and its leading arguments. Double or single quotes group words.
 */
export function parseDetectorCommand(commandLine: string): { command: string; args: string[] } {
  const words = commandLine.match(/"[^"]*"|'[^']*'|\S+/g) ?? [];
  const unquoted = words.map((word) => word.replace(/^(["'])(.*)\1$/, '$2'));
  const [command, ...args] = unquoted;
  if (!command) {
    throw new Error('Detector command is empty');
  }
  return { command, args };
}

/**
 * Runs an external program once per image with the image path appended as the
 * last argument. Exit code 0 means a person was found, 1 means none; any other
 * exit, a spawn error or a timeout is a classification failure.
 *
 * The command is resolved when the detector is built, so a missing program
 * fails the pool start instead of every image.
 */
export class CommandDetector implements PersonDetector {
  private readonly command: string;
  private readonly args: readonly string[];
  private readonly timeoutMs: number;

  constructor(spec: z.infer<typeof commandDetectorSpec>, locate: (name: string) => string | null = findExecutable) {
    const resolved = locate(spec.command);
    if (!resolved) {
      throw new Error(`Detector command not found: ${spec.command}`);
    }
    this.command = resolved;
    this.args = spec.args;
    this.timeoutMs = spec.timeoutMs;
  }

  containsPeople(imagePath: string): Promise<boolean> {
    return new Promise<boolean>((resolve, reject) => {
      let settled = false;
      let stderr = '';
      const child = spawn(this.command, [...this.args, imagePath], { stdio: ['ignore', 'ignore', 'pipe'] });

      const settle = (fn: () => void) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        fn();
      };

      const timer = setTimeout(() => {
        child.kill('SIGKILL');
        settle(() => reject(new Error(`Detector timed out after ${this.timeoutMs}ms`)));
      }, this.timeoutMs);

      child.stderr?.on('data', (chunk: Buffer) => {
        stderr += chunk.toString('utf8');
      });

      child.on('error', (error: NodeJS.ErrnoException) => {
        settle(() => {
          if (error.code === 'ENOENT') {
            reject(new Error(`Detector command not found: ${this.command}`));
          } else {
            reject(error);
          }
        });
      });

      child.on('close', (code: number | null) => {
        settle(() => {
          if (code === 0) {
            resolve(true);
          } else if (code === 1) {
            resolve(false);
          } else {
            const detail = stderr.trim();
            reject(new Error(`Detector exited with code ${String(code)}${detail ? `: ${detail}` : ''}`));
          }
        });
      });
    });
  }
}

export function createDetector(spec: DetectorSpec): PersonDetector {
  switch (spec.kind) {
    case 'command': {
      return new CommandDetector(spec);
    }
  }
}
