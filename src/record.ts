import { RECORD_FILE_NAME } from "./constants.js";

export interface FileListingEntry {
  MD5: string;
  size: number;
  // seconds since the epoch, fractional
  "last-modified-at": number;
}

/**
 * One directory of the inventory. Key names are the on-disk field names of
 * the record file. A record without `MD5` is incomplete: never scanned,
 * interrupted, or invalidated because something below it is being redone.
 */
export interface TreeRecord {
  MD5?: string;
  "MD5-files_only"?: string;
  size?: number;
  n_files?: number;
  "files-size"?: number;
  subdirectories?: Record<string, TreeRecord>;
  "file-listing"?: Record<string, FileListingEntry>;
  calculated_at?: string;
}

export function isComplete(record: TreeRecord): boolean {
  return record.MD5 !== undefined;
}

export function isScanned(record: TreeRecord): boolean {
  return record.MD5 !== undefined || record["MD5-files_only"] !== undefined;
}

const RECORD_KEYS = [
  "MD5",
  "MD5-files_only",
  "size",
  "n_files",
  "files-size",
  "subdirectories",
  "file-listing",
  "calculated_at",
] as const satisfies readonly (keyof TreeRecord)[];

// Keyed by directory or file names, which may be any string at all,
// `__proto__` and `constructor` included.
export function nameMap<T>(): Record<string, T> {
  return Object.create(null);
}

export function ownEntry<T>(
  map: Record<string, T> | undefined,
  name: string,
): T | undefined {
  return map !== undefined && Object.hasOwn(map, name) ? map[name] : undefined;
}

// Defines rather than assigns, so `__proto__` never reaches a setter.
export function setEntry<T>(
  map: Record<string, T>,
  name: string,
  value: T,
): T {
  Object.defineProperty(map, name, {
    value,
    writable: true,
    enumerable: true,
    configurable: true,
  });
  return value;
}

export function findKeyByValue<T>(
  map: Record<string, T> | undefined,
  value: T,
): string | undefined {
  if (!map) return undefined;
  return Object.keys(map).find((key) => map[key] === value);
}

/** The record file and the temporaries it is written through. */
export function isRecordArtifact(name: string): boolean {
  return (
    name === RECORD_FILE_NAME ||
    (name.startsWith(`.${RECORD_FILE_NAME}.`) && name.endsWith(".tmp"))
  );
}

// Parents hold this object by identity, so empty it rather than replace it.
export function clearRecord(record: TreeRecord): void {
  for (const key of RECORD_KEYS) {
    delete record[key];
  }
}
