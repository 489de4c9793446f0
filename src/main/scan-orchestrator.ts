import * as fse from 'fs-extra';

import {
  directoryKey,
  emptySummary,
  isSpecialFolder,
  isWithin,
  type DeclinedRescanPolicy,
  type ScanOutcome,
  type ScanRequest,
  type ScanSummary,
} from '../file-ops';
import { ERROR_CODES, createScanError, getErrorMessage } from '../utils/error-handling';
import { logger } from '../utils/logger';

import { ArchiveMover } from './archive-mover';
import { ClassificationDispatcher, listImageFiles, type ClassifierPool } from './classification';
import { DecisionController, type DecisionState } from './decision-controller';
import { HistoryStore } from './history-store';
import type { ImageRenderer } from './terminal/image-renderer';
import type { KeyReader } from './terminal/key-reader';
import type { ScanReporter } from './terminal/scan-reporter';
import { planDirectories } from './traversal-planner';

export interface ScanOrchestratorDeps {
  pool: ClassifierPool;
  renderer: ImageRenderer;
  keys: KeyReader;
  reporter: ScanReporter;
  /** Aborted on an external interrupt (SIGINT) */
  signal?: AbortSignal;
  declinedRescan?: DeclinedRescanPolicy;
  onDecisionState?: (state: DecisionState, filePath: string) => void;
}

type StepResult = 'continue' | Exclude<ScanOutcome, 'completed'>;

interface ScanContext {
  request: ScanRequest;
  history: HistoryStore;
  mover: ArchiveMover;
  controller: DecisionController;
  dispatcher: ClassificationDispatcher;
  summary: ScanSummary;
  /** Special folders already archived or skipped; everything beneath them is skipped too */
  specialFolders: string[];
}

/**
 * Drives one scan: plan directories, then for each one check history, archive
 * special folders, classify images and run the keep/archive/quit loop over
 * matches. History is committed after every finished directory, so a quit or
 * crash keeps earlier progress.
 */
export class ScanOrchestrator {
  private poolStarted = false;

  constructor(private readonly deps: ScanOrchestratorDeps) {}

  async run(request: ScanRequest): Promise<ScanSummary> {
    const { reporter } = this.deps;

    try {
      await fse.ensureDir(request.archiveDir);
    } catch (error: unknown) {
      throw createScanError(
        ERROR_CODES.FILESYSTEM_ERROR,
        `Cannot create archive directory: ${getErrorMessage(error)}`,
        'ScanOrchestrator.run',
        { archiveDir: request.archiveDir },
        error
      );
    }

    // Archived files must not be offered again when the archive lives inside the scanned tree
    const directories = await planDirectories(request.folder, request.recursive, [request.archiveDir]);

    const history = new HistoryStore(request.archiveDir);
    await history.load();
    const mover = new ArchiveMover(request.archiveDir, request.root);
    const controller = new DecisionController({
      renderer: this.deps.renderer,
      keys: this.deps.keys,
      mover,
      reporter,
    });
    if (this.deps.onDecisionState) {
      controller.on('state', this.deps.onDecisionState);
    }

    const context: ScanContext = {
      request,
      history,
      mover,
      controller,
      dispatcher: new ClassificationDispatcher(this.deps.pool),
      summary: emptySummary(),
      specialFolders: [],
    };

    try {
      for (const directory of directories) {
        if (this.deps.signal?.aborted) {
          context.summary.outcome = 'interrupted';
          break;
        }
        const step = await this.processDirectory(directory, context);
        if (step !== 'continue') {
          context.summary.outcome = step;
          break;
        }
      }
    } finally {
      await this.deps.pool.terminate();
    }

    this.reportSummary(context.summary);
    return context.summary;
  }

  private async processDirectory(directory: string, context: ScanContext): Promise<StepResult> {
    const { request, history, summary } = context;
    const { reporter } = this.deps;
    const key = directoryKey(directory, request.root);
    const isTarget = directory === request.folder;

    if (context.specialFolders.some((special) => isWithin(directory, special))) {
      summary.directoriesSkipped++;
      return 'continue';
    }

    if (isSpecialFolder(directory)) {
      await this.handleSpecialFolder(directory, key, context);
      return 'continue';
    }

    if (history.has(key)) {
      if (!isTarget) {
        logger.debug('Skipping processed directory', { directory, key });
        summary.directoriesSkipped++;
        return 'continue';
      }
      const confirmed = await this.confirmRescan(key);
      if (confirmed === 'interrupted') {
        return 'interrupted';
      }
      if (!confirmed) {
        if ((this.deps.declinedRescan ?? 'abort') === 'abort') {
          return 'declined';
        }
        reporter.line(`Skipping '${key}'.`);
        summary.directoriesSkipped++;
        return 'continue';
      }
    }

    let files: string[];
    try {
      files = await listImageFiles(directory);
    } catch (error: unknown) {
      if (isTarget) {
        throw createScanError(
          ERROR_CODES.FILESYSTEM_ERROR,
          `Error reading directory: ${getErrorMessage(error)}`,
          'ScanOrchestrator.processDirectory',
          { directory },
          error
        );
      }
      reporter.line(`Error reading directory ${directory}: ${getErrorMessage(error)}`);
      summary.directoriesSkipped++;
      return 'continue';
    }

    summary.directoriesVisited++;

    if (files.length === 0) {
      if (isTarget && !request.recursive) {
        reporter.line('No images found in the specified folder.');
      }
      await this.commit(key, context);
      return 'continue';
    }

    if (request.recursive) {
      reporter.line(`Scanning ${key}`);
    }
    reporter.line(`Found ${files.length} images. Starting scan...`);

    const step = await this.reviewMatches(files, context);
    if (step !== 'continue') {
      return step;
    }

    await this.commit(key, context);
    return 'continue';
  }

  private async reviewMatches(files: string[], context: ScanContext): Promise<StepResult> {
    const { summary, controller } = context;
    const signal = this.deps.signal;

    await this.ensurePoolStarted();
    logger.debug('Classifying batch', { files: files.length, workers: context.dispatcher.workerCount });

    for await (const result of context.dispatcher.classify(files, signal)) {
      summary.imagesClassified++;
      if (!result.hasPeople) continue;

      summary.matches++;
      const outcome = await controller.decide(result.path);
      switch (outcome.kind) {
        case 'keep': {
          summary.kept++;
          break;
        }
        case 'archive': {
          if (outcome.move.ok) summary.archived++;
          else summary.moveFailures++;
          break;
        }
        case 'quit': {
          return 'quit';
        }
        case 'interrupted': {
          return 'interrupted';
        }
      }
    }

    // The dispatcher stops early only when the interrupt fired mid-batch
    return signal?.aborted ? 'interrupted' : 'continue';
  }

  private async handleSpecialFolder(directory: string, key: string, context: ScanContext): Promise<void> {
    const { history, mover, summary } = context;
    const { reporter } = this.deps;
    context.specialFolders.push(directory);

    if (history.has(key)) {
      logger.debug('Special folder already archived', { directory, key });
      summary.directoriesSkipped++;
      return;
    }

    const move = await mover.moveDirectory(directory);
    if (!move.ok) {
      reporter.line(`Failed to archive special folder ${directory}: ${move.message}`);
      summary.moveFailures++;
      return;
    }
    reporter.line(`Archived special folder ${directory} to ${move.destination}`);
    summary.specialFoldersArchived++;
    await this.commit(key, context);
  }

  private async confirmRescan(key: string): Promise<boolean | 'interrupted'> {
    const { reporter, keys } = this.deps;
    reporter.write(`Folder '${key}' was already processed. Scan again? [y/N] `);
    const press = await keys.readKey();
    if (press.kind === 'interrupt') {
      reporter.line();
      return 'interrupted';
    }
    const confirmed = press.value.toLowerCase() === 'y';
    reporter.line(confirmed ? 'y' : 'n');
    return confirmed;
  }

  private async commit(key: string, context: ScanContext): Promise<void> {
    const result = await context.history.commit(key);
    if (!result.ok) {
      this.deps.reporter.line(`Warning: could not update history: ${result.message}`);
    }
  }

  private async ensurePoolStarted(): Promise<void> {
    if (this.poolStarted) return;
    this.poolStarted = true;
    await this.deps.pool.start();
  }

  private reportSummary(summary: ScanSummary): void {
    const { reporter } = this.deps;
    switch (summary.outcome) {
      case 'completed': {
        reporter.line('Scan complete.');
        break;
      }
      case 'quit': {
        reporter.line('Scan stopped.');
        break;
      }
      case 'interrupted': {
        reporter.line('Scan interrupted.');
        break;
      }
      case 'declined': {
        reporter.line('Scan cancelled: folder already processed.');
        break;
      }
    }
    reporter.line(
      `Directories: ${summary.directoriesVisited} scanned, ${summary.directoriesSkipped} skipped. ` +
        `Images: ${summary.imagesClassified} classified, ${summary.matches} with people ` +
        `(${summary.kept} kept, ${summary.archived} archived, ${summary.moveFailures} failed moves).`
    );
    if (summary.specialFoldersArchived > 0) {
      reporter.line(`Special folders archived: ${summary.specialFoldersArchived}.`);
    }
  }
}
