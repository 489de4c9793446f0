import fs from 'node:fs';
import path from 'node:path';

import { z } from 'zod';

import { ARCHIVE, CLASSIFIER_POOL, ENV_KEYS } from '../constants';
import { isWithin } from '../file-ops/path';
import type { DeclinedRescanPolicy, ScanRequest } from '../file-ops/scan-types';
import { ERROR_CODES, createScanError, getErrorMessage } from '../utils/error-handling';

import { defaultPoolSize, detectorSpecSchema, parseDetectorCommand, type DetectorSpec } from './classification';

const positiveInt = z.coerce.number().int().positive();

export const scanOptionsSchema = z.object({
  folder: z.string().min(1),
  archiveDir: z.string().min(1).default(ARCHIVE.DEFAULT_DIR),
  root: z.string().min(1).optional(),
  recursive: z.boolean().default(false),
  workers: positiveInt.max(CLASSIFIER_POOL.MAX_WORKERS).optional(),
  detector: z.string().min(1).optional(),
  detectorTimeoutMs: positiveInt.optional(),
  onDeclinedRescan: z.enum(['abort', 'skip']).default('abort'),
});

export type ScanOptionsInput = z.input<typeof scanOptionsSchema>;

const envSchema = z.object({
  [ENV_KEYS.DETECTOR]: z.string().min(1).optional(),
  [ENV_KEYS.DETECTOR_TIMEOUT_MS]: positiveInt.optional(),
  [ENV_KEYS.WORKERS]: positiveInt.max(CLASSIFIER_POOL.MAX_WORKERS).optional(),
});

export interface ScanConfig {
  request: ScanRequest;
  workers: number;
  detector: DetectorSpec;
  declinedRescan: DeclinedRescanPolicy;
}

function invalid(message: string, details?: Record<string, unknown>) {
  return createScanError(ERROR_CODES.INVALID_REQUEST, message, 'resolveScanConfig', details);
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Resolve paths and apply the root rules: `folder` must sit at or under `root`,
 * and a recursive scan without a root uses `folder` as its root.
 */
export function buildScanRequest(
  input: { folder: string; archiveDir: string; root?: string; recursive: boolean },
  cwd: string = process.cwd()
): ScanRequest {
  const folder = path.resolve(cwd, input.folder);
  const archiveDir = path.resolve(cwd, input.archiveDir);
  let root = input.root ? path.resolve(cwd, input.root) : undefined;

  if (root && !isWithin(folder, root)) {
    throw invalid(`Scanned folder '${folder}' is not under root '${root}'`, { folder, root });
  }
  if (input.recursive && !root) {
    root = folder;
  }

  return Object.freeze({ folder, archiveDir, root, recursive: input.recursive });
}

function assertDirectory(label: string, target: string): void {
  let stat: fs.Stats;
  try {
    stat = fs.statSync(target);
  } catch {
    throw invalid(`${label} '${target}' does not exist`, { [label]: target });
  }
  if (!stat.isDirectory()) {
    throw invalid(`${label} '${target}' is not a directory`, { [label]: target });
  }
}

/**
 * Merge CLI options with MV_PEOPLE_* environment variables (options win) and
 * validate the result.
 */
export function resolveScanConfig(
  input: ScanOptionsInput,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): ScanConfig {
  const options = scanOptionsSchema.safeParse(input);
  if (!options.success) {
    throw invalid(`Invalid options: ${formatIssues(options.error)}`);
  }
  const environment = envSchema.safeParse(env);
  if (!environment.success) {
    throw invalid(`Invalid environment: ${formatIssues(environment.error)}`);
  }
  const opts = options.data;
  const fromEnv = environment.data;

  const request = buildScanRequest(opts, cwd);
  assertDirectory('folder', request.folder);
  if (request.root && request.root !== request.folder) {
    assertDirectory('root', request.root);
  }

  const commandLine = opts.detector ?? fromEnv[ENV_KEYS.DETECTOR];
  if (!commandLine) {
    throw invalid(`No detector configured. Pass --detector <command> or set ${ENV_KEYS.DETECTOR}.`);
  }
  let parsedCommand: { command: string; args: string[] };
  try {
    parsedCommand = parseDetectorCommand(commandLine);
  } catch (error: unknown) {
    throw invalid(getErrorMessage(error));
  }
  const detector = detectorSpecSchema.parse({
    kind: 'command',
    ...parsedCommand,
    timeoutMs: opts.detectorTimeoutMs ?? fromEnv[ENV_KEYS.DETECTOR_TIMEOUT_MS],
  });

  return {
    request,
    workers: opts.workers ?? fromEnv[ENV_KEYS.WORKERS] ?? defaultPoolSize(),
    detector,
    declinedRescan: opts.onDeclinedRescan,
  };
}
