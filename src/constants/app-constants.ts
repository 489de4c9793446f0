/**
 * Centralized scan constants for mv-people
 */

// ==================== FILE SCANNING ====================

export const IMAGE_SCANNING = {
  /** Extensions treated as classifiable images (compared lower-cased) */
  IMAGE_EXTENSIONS: ['.jpg', '.jpeg', '.png', '.bmp', '.tiff'],
  /** Sidecar-backup folders archived wholesale instead of being scanned */
  SPECIAL_FOLDER_NAMES: ['.picasaoriginals', '.original'],
} as const;

// ==================== HISTORY ====================

export const HISTORY = {
  /** History file written inside the archive directory */
  FILENAME: 'processed_history.json',
  /** Suffix for the temporary file swapped in on save */
  TEMP_SUFFIX: '.tmp',
} as const;

// ==================== ARCHIVE ====================

export const ARCHIVE = {
  /** Default archive directory, resolved against the working directory */
  DEFAULT_DIR: './archive',
  /** Upper bound on `_N` suffix attempts when resolving a free destination */
  MAX_CONFLICT_SUFFIX: 10_000,
} as const;

// ==================== WORKER POOL ====================

export const CLASSIFIER_POOL = {
  /** Workers kept free for the controlling process */
  RESERVED_CPUS: 1,
  /** Minimum pool size regardless of CPU count */
  MIN_WORKERS: 1,
  /** Upper bound accepted from configuration */
  MAX_WORKERS: 64,
  /** Time allowed for a worker to construct its detector (milliseconds) */
  STARTUP_TIMEOUT_MS: 30_000,
  /** Per-file classification timeout (milliseconds) */
  CLASSIFY_TIMEOUT_MS: 60_000,
} as const;

// ==================== TERMINAL ====================

export const TERMINAL = {
  /** External binary used to draw images as sixels */
  SIXEL_BINARY: 'img2sixel',
  /** Ctrl+C as delivered by a raw-mode stdin */
  CTRL_C: '\u0003',
} as const;

// ==================== EXIT CODES ====================

export const EXIT_CODES = {
  SUCCESS: 0,
  FAILURE: 1,
  INVALID_REQUEST: 2,
  INTERRUPTED: 130,
} as const;
