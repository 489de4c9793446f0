/**
 * File operations suite - path, key and filter helpers shared by the scan engine
 */

// Path utilities
export {
  getRelativePath,
  isWithin,
  directoryKey,
  isSpecialFolder,
  withConflictSuffix
} from './path';

// File filters
export {
  IMAGE_EXTENSIONS,
  isImageFile,
  compareLexicographic
} from './filters';

// Scan types
export type {
  ScanRequest,
  ClassificationResult,
  Decision,
  DeclinedRescanPolicy,
  ScanOutcome,
  ScanSummary
} from './scan-types';
export { emptySummary } from './scan-types';
