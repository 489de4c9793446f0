import type { Command } from "commander";

import { EXIT_CODES } from "../../../src/constants";
import type { ScanOutcome } from "../../../src/file-ops/scan-types";
import { createClassifierPool } from "../../../src/main/classification";
import { ScanOrchestrator } from "../../../src/main/scan-orchestrator";
import { resolveScanConfig, type ScanConfig } from "../../../src/main/scan-config";
import { SixelRenderer } from "../../../src/main/terminal/image-renderer";
import { StdinKeyReader } from "../../../src/main/terminal/key-reader";
import { ConsoleReporter } from "../../../src/main/terminal/scan-reporter";
import { ERROR_CODES, getErrorMessage, isScanError, logError } from "../../../src/utils/error-handling";
import { isLogLevel, logger } from "../../../src/utils/logger";
import type { RootOptions } from "../index";
import { parseDeclinedRescanPolicy, parsePositiveInt } from "../util/parse";

export interface ScanCommandOptions {
  archiveDir: string;
  root?: string;
  recursive: boolean;
  workers?: number;
  detector?: string;
  detectorTimeout?: number;
  onDeclinedRescan: "abort" | "skip";
}

export function exitCodeForOutcome(outcome: ScanOutcome): number {
  return outcome === "interrupted" ? EXIT_CODES.INTERRUPTED : EXIT_CODES.SUCCESS;
}

export function exitCodeForError(error: unknown): number {
  if (isScanError(error) && error.code === ERROR_CODES.INVALID_REQUEST) {
    return EXIT_CODES.INVALID_REQUEST;
  }
  return EXIT_CODES.FAILURE;
}

export async function runScan(folder: string, opts: ScanCommandOptions, flags: RootOptions): Promise<number> {
  if (flags.logLevel) {
    const level = flags.logLevel.toLowerCase();
    if (!isLogLevel(level)) {
      console.error(`Invalid log level '${flags.logLevel}'`);
      return EXIT_CODES.INVALID_REQUEST;
    }
    logger.setLevel(level);
  }

  let config: ScanConfig;
  try {
    config = resolveScanConfig({
      folder,
      archiveDir: opts.archiveDir,
      root: opts.root,
      recursive: opts.recursive,
      workers: opts.workers,
      detector: opts.detector,
      detectorTimeoutMs: opts.detectorTimeout,
      onDeclinedRescan: opts.onDeclinedRescan,
    });
  } catch (err) {
    console.error(`Error: ${getErrorMessage(err)}`);
    return exitCodeForError(err);
  }

  const interrupt = new AbortController();
  const onSigint = () => interrupt.abort();
  process.once("SIGINT", onSigint);

  const reporter = new ConsoleReporter();
  const orchestrator = new ScanOrchestrator({
    pool: createClassifierPool({ size: config.workers, detector: config.detector }),
    renderer: new SixelRenderer(reporter),
    keys: new StdinKeyReader(process.stdin, interrupt.signal),
    reporter,
    signal: interrupt.signal,
    declinedRescan: config.declinedRescan,
  });

  try {
    const summary = await orchestrator.run(config.request);
    return exitCodeForOutcome(summary.outcome);
  } catch (err) {
    if (isScanError(err)) logError(err, err.context);
    console.error(`Error: ${getErrorMessage(err)}`);
    return exitCodeForError(err);
  } finally {
    process.off("SIGINT", onSigint);
  }
}

export function attachScanCommand(root: Command): void {
  root
    .command("scan", { isDefault: true })
    .description("Scan a folder for images containing people and ask whether to archive each one")
    .argument("<folder>", "Folder to scan")
    .option("--archive-dir <dir>", "Directory to move archived images to", "./archive")
    .option("--root <dir>", "Root directory for preserving folder structure in archive")
    .option("-R, --recursive", "Recursively scan subdirectories", false)
    .option("-w, --workers <n>", "Number of classifier workers (default: CPU count - 1)", parsePositiveInt)
    .option("--detector <command>", "Detector command; the image path is appended (exit 0 = person, 1 = none)")
    .option("--detector-timeout <ms>", "Per-image detector timeout in ms", parsePositiveInt)
    .option(
      "--on-declined-rescan <policy>",
      "When re-scanning a processed folder is declined: abort the run or skip only that folder",
      parseDeclinedRescanPolicy,
      "abort"
    )
    .action(async (folder: string, opts: ScanCommandOptions) => {
      const flags = root.opts<RootOptions>();
      const code = await runScan(folder, opts, flags);
      process.exit(code);
    });
}
