export {
  computeTree,
  DEFAULT_PAUSE_MS,
  type ComputeTreeOptions,
  type ComputeTreeResult,
  type ProgressHook,
} from "./calculate-tree.js";

export {
  Calculator,
  ProgressCounters,
  recalculate,
  type CalculatorOptions,
} from "./calculate.js";

export { BranchPool } from "./scheduler.js";

export {
  OccasionThrottle,
  type OccasionCallback,
  type OccasionThrottleOptions,
} from "./occasion.js";

export {
  clearRecord,
  findKeyByValue,
  isComplete,
  type FileListingEntry,
  type TreeRecord,
} from "./record.js";

export {
  extractRecord,
  findRecordFile,
  readRecordFile,
  writeRecordFile,
  type ExtractedRecord,
} from "./record-store.js";

export {
  enumerateDir,
  fsEnumerator,
  type DirListing,
  type Enumerator,
} from "./enumerate.js";

export {
  fileDigest,
  md5FileHasher,
  type FileHash,
  type FileHasher,
} from "./hash.js";

export {
  BranchError,
  ConfigurationError,
  IncompleteChildError,
  RecordFileError,
  type BranchFailure,
} from "./errors.js";

export {
  ConsoleLogger,
  NullLogger,
  StructuredLogger,
  parseLogLevel,
  type Logger,
  type LogLevel,
} from "./logger.js";

export { RECORD_FILE_NAME } from "./constants.js";
