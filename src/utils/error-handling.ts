import { logger } from './logger';

export interface ErrorContext {
  operation: string;
  details?: Record<string, unknown>;
  timestamp: number;
}

export const ERROR_CODES = {
  FILESYSTEM_ERROR: 'FILESYSTEM_ERROR',
  HISTORY_CORRUPTION: 'HISTORY_CORRUPTION',
  CLASSIFICATION_FAILURE: 'CLASSIFICATION_FAILURE',
  USER_ABORT: 'USER_ABORT',
  INTERRUPTED: 'INTERRUPTED',
  POOL_START_FAILED: 'POOL_START_FAILED',
  INVALID_REQUEST: 'INVALID_REQUEST',
} as const;

export type ScanErrorCode = typeof ERROR_CODES[keyof typeof ERROR_CODES];

export class ScanError extends Error {
  public readonly code: ScanErrorCode;
  public readonly context: ErrorContext;

  constructor(message: string, code: ScanErrorCode, context: ErrorContext, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ScanError';
    this.code = code;
    this.context = context;
  }
}

/** Failure half of the `{ ok }` results returned by per-file and per-directory operations. */
export type Failure = { ok: false; code: ScanErrorCode; message: string };

export function failure(code: ScanErrorCode, error: unknown): Failure {
  return { ok: false, code, message: getErrorMessage(error) };
}

export function createScanError(
  code: ScanErrorCode,
  message: string,
  operation: string,
  details?: Record<string, unknown>,
  cause?: unknown
): ScanError {
  return new ScanError(message, code, { operation, details, timestamp: Date.now() }, { cause });
}

export function isScanError(error: unknown): error is ScanError {
  return error instanceof ScanError;
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

export function logError(error: unknown, context: ErrorContext): void {
  logger.error(context.operation, {
    message: getErrorMessage(error),
    code: isScanError(error) ? error.code : 'UNKNOWN',
    details: context.details,
    stack: error instanceof Error ? error.stack : undefined,
    timestamp: new Date(context.timestamp).toISOString(),
  });
}
