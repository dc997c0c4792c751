/**
 * cronstamp: Main Exports
 *
 * Public API surface for the cronstamp library.
 *
 * @module cronstamp
 */

// Types
export {
  type Config,
  type CronFields,
  type CronFieldName,
  type EvaluateOptions,
  type LogLevel,
  type Result,
  type RunOutcome,
  type StampKey,
  type Task,
  type WeekdayStart,
  ConfigSchema,
  ok,
  err,
  isOk,
  isErr,
} from './types/index.js';

// Config
export {
  DEFAULT_CONFIG,
  getConfig,
  setConfig,
  loadConfig,
  saveConfig,
  ensureConfig,
  reloadConfig,
  clearConfigCache,
  getBaseDir,
  getCacheDir,
  getConfigPath,
  expandPath,
} from './config/config.js';

// Schedule
export { CronParseError, ScheduleLockError } from './schedule/errors.js';
export { FIELD_RANGES, parseCronField, parseCronExpression } from './schedule/cron.js';
export {
  DEFAULT_LOOKBACK_DAYS,
  latestMatchAtOrBefore,
  latestScheduledAtOrBefore,
  toEpochSeconds,
  weekdayOf,
} from './schedule/evaluator.js';
export {
  type StampStore,
  FileStampStore,
  MemoryStampStore,
  sanitizeCronExpr,
  sanitizeTaskId,
  stampFileName,
} from './schedule/stamp-store.js';
export { type FileLock, type LockOptions, acquireLock } from './schedule/lock.js';
export {
  type ScheduleInspection,
  type ScheduleRunnerOptions,
  ScheduleRunner,
  createScheduleRunner,
  isDue,
  scheduleAndRun,
} from './schedule/runner.js';

// Events
export { EventBus, type EventMap } from './kernel/event-bus.js';

// Tasks
export { type ExecOptions, type ExecResult, TaskCommandError, commandTask, execFileNoThrow } from './utils/exec.js';
export {
  type AgeBucket,
  type BucketSelection,
  type CleanupReport,
  type ImageFile,
  ageBucketOf,
  cleanImages,
  groupByAgeBucket,
  listImageFiles,
  selectFiles,
} from './tasks/image-cleanup.js';

// Logging
export { createLogger, formatError, setLogLevel } from './utils/logger.js';
