// src/calculate.ts
import path from "node:path";
import type { Hash } from "node:crypto";
import { createChecksum, md5FileHasher, type FileHasher } from "./hash.js";
import { compareNames, fsEnumerator, type Enumerator } from "./enumerate.js";
import {
  BranchError,
  IncompleteChildError,
  toError,
  type BranchFailure,
} from "./errors.js";
import { NullLogger, type Logger } from "./logger.js";
import {
  isComplete,
  isRecordArtifact,
  isScanned,
  nameMap,
  ownEntry,
  setEntry,
  type FileListingEntry,
  type TreeRecord,
} from "./record.js";
import { BranchPool } from "./scheduler.js";
import { OccasionThrottle } from "./occasion.js";

export interface CalculatorOptions {
  // reuse sub-records that already carry an MD5
  continuePrevious?: boolean;
  detailFiles?: boolean;
  parallelism?: number;
  enumerator?: Enumerator;
  hasher?: FileHasher;
  throttle?: OccasionThrottle;
  progress?: ProgressCounters;
  logger?: Logger;
}

/** Shared by every branch of one calculation. */
export class ProgressCounters {
  totalFiles = 0;
  filesDone = 0;
}

/**
 * Feed `name ∥ MD5` for every subdirectory, in order, into a fresh
 * accumulator. Throws if any of them is incomplete.
 */
function subdirectoryChecksum(
  subdirectories: Record<string, TreeRecord>,
  names: readonly string[],
): Hash {
  const checksum = createChecksum();
  const incomplete: string[] = [];
  for (const name of names) {
    const md5 = ownEntry(subdirectories, name)?.MD5;
    if (md5 === undefined) {
      incomplete.push(name);
      continue;
    }
    checksum.update(name, "utf8");
    checksum.update(md5, "utf8");
  }
  if (incomplete.length) {
    throw new IncompleteChildError(incomplete);
  }
  return checksum;
}

/**
 * Recombine the MD5 of a directory that was already scanned, from its
 * children's MD5s and its own files-only checksum, without touching the
 * filesystem. A record that was never scanned is left as it is.
 */
export function recalculate(record: TreeRecord): void {
  if (!isScanned(record)) return;
  const subdirectories = record.subdirectories ?? {};
  const checksum = subdirectoryChecksum(
    subdirectories,
    Object.keys(subdirectories).sort(compareNames),
  );
  const filesOnly = record["MD5-files_only"];
  if (filesOnly === undefined) {
    throw new Error(
      "Cannot recalculate a record that has an MD5 but no MD5-files_only.",
    );
  }
  checksum.update(filesOnly, "utf8");
  record.MD5 = checksum.digest("hex");
}

export class Calculator {
  readonly progress: ProgressCounters;
  readonly pool: BranchPool;
  readonly throttle: OccasionThrottle;
  private readonly continuePrevious: boolean;
  private readonly detailFiles: boolean;
  private readonly enumerator: Enumerator;
  private readonly hasher: FileHasher;
  private readonly logger: Logger;

  constructor({
    continuePrevious = false,
    detailFiles = false,
    parallelism = 1,
    enumerator = fsEnumerator,
    hasher = md5FileHasher,
    throttle = new OccasionThrottle(),
    progress = new ProgressCounters(),
    logger = new NullLogger(),
  }: CalculatorOptions = {}) {
    this.progress = progress;
    this.continuePrevious = continuePrevious;
    this.detailFiles = detailFiles;
    this.pool = new BranchPool(parallelism);
    this.throttle = throttle;
    this.enumerator = enumerator;
    this.hasher = hasher;
    this.logger = logger;
    this.logger.debug(`using ${parallelism} branches in parallel`);
  }

  /**
   * Fill in `record` for `dir`, recursing into every subdirectory that
   * still needs it. `depth` is 0 only for the directory holding the record
   * file. On failure the record is left without an MD5 and a BranchError
   * listing every failed path below `dir` is thrown, after all siblings
   * have finished.
   */
  async computeBranch(
    record: TreeRecord,
    dir: string,
    depth: number,
  ): Promise<void> {
    delete record.MD5;
    try {
      await this.throttle.maybeFire();
      await this.scanBranch(record, dir, depth);
    } catch (err) {
      delete record.MD5;
      if (err instanceof BranchError) throw err;
      throw new BranchError(dir, [{ path: dir, error: toError(err) }]);
    }
  }

  private async scanBranch(
    record: TreeRecord,
    dir: string,
    depth: number,
  ): Promise<void> {
    const { files, subdirectories } = await this.enumerator.enumerate(dir);
    this.progress.totalFiles += files.length + subdirectories.length;

    // Every reused child must be in the map before a checkpoint can fire.
    const previous = this.continuePrevious ? record.subdirectories : undefined;
    const children = nameMap<TreeRecord>();
    for (const name of subdirectories) {
      setEntry(children, name, ownEntry(previous, name) ?? {});
    }
    if (subdirectories.length > 0) {
      record.subdirectories = children;
    } else {
      delete record.subdirectories;
    }

    const failures: BranchFailure[] = [];
    const pending: Promise<void>[] = [];
    const computeChild = async (name: string, child: TreeRecord) => {
      try {
        await this.computeBranch(child, path.join(dir, name), depth + 1);
      } catch (err) {
        if (err instanceof BranchError) {
          failures.push(...err.failures);
        } else {
          failures.push({ path: path.join(dir, name), error: toError(err) });
        }
      }
    };

    let reused = 0;
    for (const name of subdirectories) {
      const child = children[name];
      if (isComplete(child)) {
        reused += 1;
        continue;
      }
      const started = this.pool.tryStart(() => computeChild(name, child));
      if (started) {
        pending.push(started);
      } else {
        await computeChild(name, child);
      }
    }
    await Promise.all(pending);

    if (failures.length) {
      throw new BranchError(dir, failures);
    }

    let totalSize = 0;
    const checksum = subdirectoryChecksum(children, subdirectories);
    for (const name of subdirectories) {
      totalSize += children[name].size ?? 0;
      this.progress.filesDone += 1;
      await this.throttle.maybeFire();
    }
    if (this.logger.isLevelEnabled("debug") && subdirectories.length) {
      this.logger.debug("subdirectories done", {
        dir,
        subdirectories: subdirectories.length,
        parallel: pending.length,
        reused,
        checksum: checksum.copy().digest("hex"),
      });
    }

    const filesChecksum = createChecksum();
    const listing = nameMap<FileListingEntry>();
    let nFiles = 0;
    let filesSize = 0;
    for (const name of files) {
      if (depth === 0 && isRecordArtifact(name)) {
        this.progress.filesDone += 1;
        continue;
      }
      const { digest, size, mtimeMs } = await this.hasher.hashFile(dir, name);
      filesChecksum.update(name, "utf8");
      filesChecksum.update(digest, "utf8");
      nFiles += 1;
      filesSize += size;
      if (this.detailFiles) {
        setEntry(listing, name, {
          MD5: digest,
          size,
          "last-modified-at": mtimeMs / 1000,
        });
      }
      this.progress.filesDone += 1;
      await this.throttle.maybeFire();
    }
    const filesOnly = filesChecksum.digest("hex");
    checksum.update(filesOnly, "utf8");

    record.size = totalSize + filesSize;
    record.n_files = nFiles;
    record["files-size"] = filesSize;
    if (this.detailFiles) {
      record["file-listing"] = listing;
    } else {
      delete record["file-listing"];
    }
    record["MD5-files_only"] = filesOnly;
    record.MD5 = checksum.digest("hex");
    this.logger.debug("branch complete", { dir, MD5: record.MD5 });
  }
}
