/**
 * Cross-cutting types supporting scan orchestration (no fs operations)
 */

export interface ScanRequest {
  readonly folder: string;
  readonly archiveDir: string;
  readonly root?: string;
  readonly recursive: boolean;
}

export interface ClassificationResult {
  path: string;
  hasPeople: boolean;
}

export type Decision = 'keep' | 'archive' | 'quit';

/** What the orchestrator does when the user declines to re-scan the target folder */
export type DeclinedRescanPolicy = 'abort' | 'skip';

export type ScanOutcome = 'completed' | 'quit' | 'interrupted' | 'declined';

export interface ScanSummary {
  outcome: ScanOutcome;
  directoriesVisited: number;
  directoriesSkipped: number;
  imagesClassified: number;
  matches: number;
  kept: number;
  archived: number;
  moveFailures: number;
  specialFoldersArchived: number;
}

export function emptySummary(): ScanSummary {
  return {
    outcome: 'completed',
    directoriesVisited: 0,
    directoriesSkipped: 0,
    imagesClassified: 0,
    matches: 0,
    kept: 0,
    archived: 0,
    moveFailures: 0,
    specialFoldersArchived: 0,
  };
}
