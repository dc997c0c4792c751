/**
 * Schedule Runner
 *
 * Gates a task behind a cron expression and a persisted stamp:
 * evaluate the latest scheduled instant, compare it with the stamp,
 * run the task if that instant has not been served yet, and record the
 * instant only when the task completes without throwing.
 *
 * Meant to be called once per process invocation (a shell hook, a CLI
 * command), not from a long-running loop.
 */

import { EventBus } from '../kernel/event-bus.js';
import { getCacheDir, getConfig } from '../config/config.js';
import {
  type EvaluateOptions,
  type RunOutcome,
  type StampKey,
  type Task,
  type WeekdayStart,
} from '../types/index.js';
import { createLogger, formatError } from '../utils/logger.js';
import { latestScheduledAtOrBefore, toEpochSeconds } from './evaluator.js';
import { acquireLock, type FileLock } from './lock.js';
import { FileStampStore, type StampStore } from './stamp-store.js';

const log = createLogger('runner');

export interface ScheduleRunnerOptions {
  /** Stamp storage; defaults to a FileStampStore on `cacheDir`. */
  store?: StampStore;
  /** Directory for stamp files when no store is given. */
  cacheDir?: string;
  /** Clock, injectable for tests. */
  now?: () => Date;
  eventBus?: EventBus;
  lookbackDays?: number;
  weekdayStart?: WeekdayStart;
  /** Serialize read → run → write across processes. File store only. */
  lock?: boolean;
  lockTimeoutMs?: number;
}

export interface ScheduleInspection {
  key: StampKey;
  scheduledAt: Date | null;
  lastRunEpoch: number;
  due: boolean;
  /** Stamp file location when backed by the file store. */
  stampPath?: string;
}

export class ScheduleRunner {
  private readonly store: StampStore;
  private readonly clock: () => Date;
  private readonly eventBus: EventBus;
  private readonly evaluateOptions: EvaluateOptions;
  private readonly lock: boolean;
  private readonly lockTimeoutMs: number;

  constructor(options: ScheduleRunnerOptions = {}) {
    const config = getConfig();

    this.store = options.store ?? new FileStampStore(options.cacheDir ?? getCacheDir(config));
    this.clock = options.now ?? (() => new Date());
    this.eventBus = options.eventBus ?? new EventBus();
    this.evaluateOptions = {
      lookbackDays: options.lookbackDays ?? config.schedule.lookback_days,
      weekdayStart: options.weekdayStart ?? config.schedule.weekday_start,
    };
    this.lock = options.lock ?? config.schedule.lock;
    this.lockTimeoutMs = options.lockTimeoutMs ?? config.schedule.lock_timeout_ms;

    if (this.lock && !(this.store instanceof FileStampStore)) {
      throw new Error('Locking requires the file stamp store');
    }
  }

  getEventBus(): EventBus {
    return this.eventBus;
  }

  /** Evaluate the schedule and read the stamp without running anything. */
  async inspect(cronExpr: string, taskId: string): Promise<ScheduleInspection> {
    const key: StampKey = { cronExpr, taskId };
    const now = this.clock();
    const scheduledAt = latestScheduledAtOrBefore(cronExpr, now, this.evaluateOptions);
    const lastRunEpoch = await this.store.read(key);
    const stampPath = this.store instanceof FileStampStore ? this.store.pathFor(key) : undefined;

    return {
      key,
      scheduledAt,
      lastRunEpoch,
      due: scheduledAt !== null && isDue(now, scheduledAt, lastRunEpoch),
      ...(stampPath !== undefined ? { stampPath } : {}),
    };
  }

  /**
   * Run `task` if the latest scheduled instant of `cronExpr` has not been
   * served for `taskId`. A throwing task propagates and leaves the stamp as it was.
   */
  async runIfDue(cronExpr: string, taskId: string, task: Task): Promise<RunOutcome> {
    const key: StampKey = { cronExpr, taskId };

    if (this.store instanceof FileStampStore) {
      await this.store.ensureDirectory();
    }

    const now = this.clock();
    const scheduledAt = latestScheduledAtOrBefore(cronExpr, now, this.evaluateOptions);
    this.eventBus.emit('schedule:evaluated', { cronExpr, taskId, now, scheduledAt });

    if (scheduledAt === null) {
      log.debug({ cronExpr, taskId }, 'No scheduled instant in lookback window');
      return { status: 'not-scheduled' };
    }

    const lock = await this.acquire(key);
    try {
      return await this.runLocked(key, task, now, scheduledAt);
    } finally {
      await lock?.release();
    }
  }

  private async acquire(key: StampKey): Promise<FileLock | null> {
    if (!this.lock || !(this.store instanceof FileStampStore)) return null;
    return acquireLock(this.store.pathFor(key), { timeoutMs: this.lockTimeoutMs });
  }

  private async runLocked(key: StampKey, task: Task, now: Date, scheduledAt: Date): Promise<RunOutcome> {
    const { cronExpr, taskId } = key;
    const lastRunEpoch = await this.store.read(key);

    if (!isDue(now, scheduledAt, lastRunEpoch)) {
      log.debug({ cronExpr, taskId, scheduledAt, lastRunEpoch }, 'Not due');
      this.eventBus.emit('schedule:skipped', { cronExpr, taskId, scheduledAt, lastRunEpoch });
      return { status: 'not-due', scheduledAt, lastRunEpoch };
    }

    const startedAt = new Date();
    log.info({ cronExpr, taskId, scheduledAt }, 'Running scheduled task');
    this.eventBus.emit('schedule:task_run', { cronExpr, taskId, scheduledAt, startedAt });

    try {
      await task();
    } catch (error) {
      const durationMs = Date.now() - startedAt.getTime();
      log.error({ cronExpr, taskId, durationMs, err: formatError(error) }, 'Scheduled task failed');
      this.eventBus.emit('schedule:task_complete', {
        cronExpr,
        taskId,
        scheduledAt,
        durationMs,
        success: false,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }

    await this.store.write(key, toEpochSeconds(scheduledAt));

    const durationMs = Date.now() - startedAt.getTime();
    log.info({ cronExpr, taskId, durationMs }, 'Scheduled task complete');
    this.eventBus.emit('schedule:task_complete', {
      cronExpr,
      taskId,
      scheduledAt,
      durationMs,
      success: true,
    });

    return { status: 'ran', scheduledAt, durationMs };
  }
}

/** Due when the instant is not in the future and the stamp has not reached it. */
export function isDue(now: Date, scheduledAt: Date, lastRunEpoch: number): boolean {
  const scheduledEpoch = toEpochSeconds(scheduledAt);
  return toEpochSeconds(now) >= scheduledEpoch && lastRunEpoch < scheduledEpoch;
}

export function createScheduleRunner(options: ScheduleRunnerOptions = {}): ScheduleRunner {
  return new ScheduleRunner(options);
}

/**
 * One-shot entry point: run `task` under `taskId` if `cronExpr` is due.
 */
export async function scheduleAndRun(
  cronExpr: string,
  taskId: string,
  task: Task,
  options: ScheduleRunnerOptions = {},
): Promise<RunOutcome> {
  return new ScheduleRunner(options).runIfDue(cronExpr, taskId, task);
}
