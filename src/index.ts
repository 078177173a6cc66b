export {
  synchronize,
  mirrorOnce,
  type MirrorOptions,
  type CycleReport,
  type EntryResult,
  type EntryAction,
} from "./mirror.js";

export {
  compareFiles,
  filesAreEqual,
  type CompareOptions,
  type CompareResult,
} from "./compare.js";

export {
  fileDigest,
  listSupportedHashes,
  normalizeHashAlg,
  defaultHashAlg,
  type HashAlg,
} from "./hash.js";

export { snapshotTree, type TreeSnapshot } from "./walk.js";

export { createIgnorer, type Ignorer } from "./ignore.js";

export {
  resolveConfig,
  defaultPaths,
  type MirrorConfig,
  type ConfigInput,
} from "./config.js";

export {
  runCycle,
  runScheduler,
  type SchedulerDeps,
  type SchedulerResult,
} from "./scheduler.js";

export {
  MirrorError,
  SourceRootMissingError,
  ReplicaRootError,
  ConfigError,
  describeError,
} from "./errors.js";

export {
  StructuredLogger,
  NullLogger,
  parseLogLevel,
  formatLogLine,
  type Logger,
  type LogLevel,
  type LogEntry,
} from "./logger.js";

export { createFileLogger, type FileLoggerHandle } from "./log-file.js";
