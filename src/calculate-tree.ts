// src/calculate-tree.ts
import path from "node:path";
import { Command, InvalidArgumentError } from "commander";
import { Calculator, ProgressCounters, recalculate } from "./calculate.js";
import { BranchError, ConfigurationError, toError } from "./errors.js";
import type { Enumerator } from "./enumerate.js";
import type { FileHasher } from "./hash.js";
import { ConsoleLogger, type Logger } from "./logger.js";
import { OccasionThrottle } from "./occasion.js";
import {
  clearRecord,
  findKeyByValue,
  isComplete,
  type TreeRecord,
} from "./record.js";
import {
  extractRecord,
  findRecordFile,
  readRecordFile,
  recordFileFor,
  removeRecordFile,
  writeRecordFile,
} from "./record-store.js";
import { wait } from "./util.js";

export const DEFAULT_PAUSE_MS = 5_000;

export type ProgressHook = (totalFiles: number, filesDone: number) => void;

export interface ComputeTreeOptions {
  target: string;
  continuePrevious?: boolean;
  startNew?: boolean;
  detailFiles?: boolean;
  parallelism?: number;
  logger?: Logger;
  onProgress?: ProgressHook;
  // how long to stand still after warning about a higher-level record file
  pauseMs?: number;
  enumerator?: Enumerator;
  hasher?: FileHasher;
  clock?: () => number;
}

export interface ComputeTreeResult {
  recordFile: string;
  checksum: string | undefined;
  rootChecksum: string | undefined;
  totalFiles: number;
  filesDone: number;
  durationMs: number;
}

interface LoadedTree {
  recordFile: string;
  root: TreeRecord;
  target: TreeRecord;
  ancestors: TreeRecord[];
}

function validateOptions({
  continuePrevious,
  startNew,
  parallelism,
}: ComputeTreeOptions): void {
  if (startNew && continuePrevious) {
    throw new ConfigurationError(
      "Cannot specify both --new and --continue at the same time.",
    );
  }
  if (
    parallelism !== undefined &&
    (!Number.isInteger(parallelism) || parallelism < 1)
  ) {
    throw new ConfigurationError(
      `parallelism must be a positive integer (got ${parallelism})`,
    );
  }
}

async function startNewTree(
  target: string,
  logger: Logger,
  pauseMs: number,
): Promise<LoadedTree> {
  const recordFile = recordFileFor(target);
  const higher = await findRecordFile(target);
  if (higher && higher !== recordFile) {
    logger.warn(`Starting a new record file at: ${recordFile}`);
    logger.warn(`However a higher-level record file was found at: ${higher}`);
    logger.warn(
      "Note that further operations will utilize the highest-level record found automatically.",
    );
    logger.warn(
      "Consider removing --new from your command or deleting the higher-level record if not intentional.",
    );
    await wait(pauseMs);
    logger.warn("Proceeding as requested.");
  }
  await removeRecordFile(recordFile);
  const root: TreeRecord = {};
  return { recordFile, root, target: root, ancestors: [] };
}

async function loadTree(
  target: string,
  continuePrevious: boolean,
  logger: Logger,
  pauseMs: number,
): Promise<LoadedTree> {
  const recordFile = await findRecordFile(target);
  if (!recordFile) {
    return startNewTree(target, logger, pauseMs);
  }
  logger.info(`Updating existing checksum file found at: ${recordFile}`);
  const root = await readRecordFile(recordFile);
  const { target: node, ancestors } = extractRecord(root, recordFile, target);
  if (!continuePrevious) {
    clearRecord(node);
  }
  return { recordFile, root, target: node, ancestors };
}

function describeAncestors(ancestors: TreeRecord[]): string {
  const names: string[] = [];
  for (let i = 1; i < ancestors.length; i++) {
    names.push(
      findKeyByValue(ancestors[i - 1].subdirectories, ancestors[i]) ?? "?",
    );
  }
  return ["root", ...names].join(" / ");
}

/**
 * Compute (or resume computing) the checksum tree for `target`, persisting
 * it in the record file that governs `target`. Every ancestor of `target`
 * in that file is invalidated for the duration of the run and recombined
 * bottom-up once the target is complete.
 */
export async function computeTree(
  opts: ComputeTreeOptions,
): Promise<ComputeTreeResult> {
  validateOptions(opts);
  const {
    continuePrevious = false,
    startNew = false,
    detailFiles = false,
    parallelism = 1,
    logger: providedLogger,
    onProgress,
    pauseMs = DEFAULT_PAUSE_MS,
    enumerator,
    hasher,
    clock,
  } = opts;
  const logger = providedLogger ?? new ConsoleLogger();
  const target = path.resolve(opts.target);
  const t0 = Date.now();

  logger.info(`Calculating checksum for path '${target}'...`);

  const tree = startNew
    ? await startNewTree(target, logger, pauseMs)
    : await loadTree(target, continuePrevious, logger, pauseMs);
  const { recordFile, root, ancestors } = tree;
  root.calculated_at = new Date().toISOString();

  // The caller may be redoing one subdirectory of a tree that was never
  // finished, so ancestors without an MD5 are fine too.
  for (const ancestor of ancestors) {
    delete ancestor.MD5;
  }
  logger.debug("parent records", { chain: describeAncestors(ancestors) });

  const saveRecord = async (final: boolean) => {
    logger.info(`Saving checksum to file: ${recordFile}`);
    if (final) {
      try {
        for (let i = ancestors.length - 1; i >= 0; i--) {
          recalculate(ancestors[i]);
          // Never scanned: nothing above it can be complete either.
          if (!isComplete(ancestors[i])) break;
        }
      } catch (err) {
        // The target itself is complete; keep it even if an ancestor is not.
        await writeRecordFile(recordFile, root);
        throw err;
      }
    }
    await writeRecordFile(recordFile, root);
  };

  const progress = new ProgressCounters();
  const reportProgress: ProgressHook =
    onProgress ??
    ((totalFiles, filesDone) => {
      logger.info("progress", {
        totalFiles,
        filesDone,
        percent: totalFiles
          ? Math.min(100, Math.round((filesDone / totalFiles) * 100))
          : 0,
      });
    });
  const throttle = new OccasionThrottle({
    clock,
    onOccasion: async () => {
      reportProgress(progress.totalFiles, progress.filesDone);
      try {
        await saveRecord(false);
      } catch (err) {
        // the final save still throws
        logger.warn("checkpoint failed", {
          recordFile,
          error: toError(err).message,
        });
      }
    },
  });
  const calc = new Calculator({
    continuePrevious,
    detailFiles,
    parallelism,
    enumerator,
    hasher,
    throttle,
    progress,
    logger: logger.child("calculate"),
  });

  try {
    await calc.computeBranch(tree.target, target, ancestors.length);
  } catch (err) {
    if (!(err instanceof BranchError)) throw err;
    for (const failure of err.failures) {
      logger.warn("branch incomplete", {
        path: failure.path,
        error: failure.error.message,
      });
    }
    // Keep what did complete so --continue can pick up from here.
    await saveRecord(false);
    throw err;
  }
  reportProgress(progress.totalFiles, progress.filesDone);
  await saveRecord(true);

  const result: ComputeTreeResult = {
    recordFile,
    checksum: tree.target.MD5,
    rootChecksum: root.MD5,
    totalFiles: progress.totalFiles,
    filesDone: progress.filesDone,
    durationMs: Date.now() - t0,
  };
  logger.info("calculation complete", {
    checksum: result.checksum,
    totalFiles: result.totalFiles,
    durationMs: result.durationMs,
    parallelPeak: calc.pool.peak,
  });
  logger.info("Done.");
  return result;
}

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError("expected a positive integer");
  }
  return n;
}

export function configureCalculateCommand(command: Command): Command {
  return command
    .description(
      "Compute the checksum tree for a directory, resuming or extending an existing record file",
    )
    .argument("<target>", "directory to inventory")
    .option(
      "--new",
      "start a new record file at the target, discarding any existing one there",
      false,
    )
    .option(
      "--continue",
      "keep completed subdirectories from an interrupted run",
      false,
    )
    .option(
      "--detail-files",
      "record digest, size and mtime of every file",
      false,
    )
    .option(
      "-j, --parallel <n>",
      "subdirectories to compute concurrently",
      parsePositiveInt,
      1,
    );
}

export interface CalculateCommandOptions {
  new: boolean;
  continue: boolean;
  detailFiles: boolean;
  parallel: number;
}

export async function runCalculateCommand(
  target: string,
  opts: CalculateCommandOptions,
  logger: Logger,
): Promise<ComputeTreeResult> {
  return computeTree({
    target,
    startNew: opts.new,
    continuePrevious: opts.continue,
    detailFiles: opts.detailFiles,
    parallelism: opts.parallel,
    logger,
  });
}
