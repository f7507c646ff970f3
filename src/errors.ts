/** `startNew` with `continuePrevious`, or a parallelism that is not a positive integer. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/**
 * A record was asked to recombine its checksum while one of its
 * subdirectories has none. Ancestors are always restored innermost first,
 * so this means the restore order is broken.
 */
export class IncompleteChildError extends Error {
  constructor(readonly children: string[]) {
    super(
      `Cannot recalculate this record because one or more sub-records does not have a completed checksum: ${children.join(", ")}`,
    );
    this.name = "IncompleteChildError";
  }
}

export class RecordFileError extends Error {
  constructor(
    readonly file: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`${file}: ${message}`, options);
    this.name = "RecordFileError";
  }
}

export interface BranchFailure {
  path: string;
  error: Error;
}

/**
 * Raised at a branch's join when it, or any branch below it, could not be
 * read. The branch is left without an MD5; siblings are unaffected.
 */
export class BranchError extends Error {
  constructor(
    readonly dir: string,
    readonly failures: BranchFailure[],
  ) {
    super(
      failures.length === 1
        ? `${dir}: checksum incomplete (${failures[0].path}: ${failures[0].error.message})`
        : `${dir}: checksum incomplete (${failures.length} failed branches)`,
    );
    this.name = "BranchError";
  }
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
