/**
 * Run Stamp Storage
 *
 * A stamp is the epoch (seconds) of the last scheduled instant a task
 * completed for. Reads and writes are best-effort: a missing or corrupt
 * stamp reads as 0 ("never run"), and a failed write is logged rather
 * than surfaced, so it cannot turn a successful task into a failure.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import { type StampKey } from '../types/index.js';
import { createLogger, formatError } from '../utils/logger.js';

const log = createLogger('stamp-store');

const MAX_TASK_NAME_LENGTH = 64;
const FALLBACK_TASK_NAME = 'task';

// ─── Naming ──────────────────────────────────────────────────────────────────

export function sanitizeCronExpr(cronExpr: string): string {
  return cronExpr.trim().replace(/\s+/g, '_');
}

export function sanitizeTaskId(taskId: string): string {
  const cleaned = taskId
    .replace(/[^A-Za-z0-9._-]/g, '-')
    .replace(/-{2,}/g, '-')
    .replace(/^-+|-+$/g, '')
    .slice(0, MAX_TASK_NAME_LENGTH)
    .replace(/-+$/, '');
  return cleaned || FALLBACK_TASK_NAME;
}

/** `.cron_<cron>_<task>_last_run` */
export function stampFileName(key: StampKey): string {
  return `.cron_${sanitizeCronExpr(key.cronExpr)}_${sanitizeTaskId(key.taskId)}_last_run`;
}

function parseStamp(raw: string): number {
  const text = raw.trim();
  if (!/^\d+$/.test(text)) return 0;
  return parseInt(text, 10);
}

// ─── Stores ──────────────────────────────────────────────────────────────────

export interface StampStore {
  read(key: StampKey): Promise<number>;
  write(key: StampKey, epoch: number): Promise<void>;
}

export class FileStampStore implements StampStore {
  constructor(private readonly cacheDir: string) {}

  get directory(): string {
    return this.cacheDir;
  }

  pathFor(key: StampKey): string {
    return path.join(this.cacheDir, stampFileName(key));
  }

  async ensureDirectory(): Promise<void> {
    await fs.mkdir(this.cacheDir, { recursive: true });
  }

  async read(key: StampKey): Promise<number> {
    const stampPath = this.pathFor(key);
    try {
      const stamp = parseStamp(await fs.readFile(stampPath, 'utf-8'));
      log.debug({ stampPath, stamp }, 'Stamp read');
      return stamp;
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        log.debug({ stampPath }, 'No stamp yet');
      } else {
        log.warn({ stampPath, err: formatError(error) }, 'Stamp unreadable, treating as never run');
      }
      return 0;
    }
  }

  async write(key: StampKey, epoch: number): Promise<void> {
    const stampPath = this.pathFor(key);
    try {
      await fs.writeFile(stampPath, String(epoch), 'utf-8');
      log.debug({ stampPath, stamp: epoch }, 'Stamp written');
    } catch (error) {
      log.warn({ stampPath, err: formatError(error) }, 'Stamp write failed; the task may run again');
    }
  }
}

/** In-process store keyed by the same names the file store uses. */
export class MemoryStampStore implements StampStore {
  private readonly stamps = new Map<string, number>();

  async read(key: StampKey): Promise<number> {
    return this.stamps.get(stampFileName(key)) ?? 0;
  }

  async write(key: StampKey, epoch: number): Promise<void> {
    this.stamps.set(stampFileName(key), epoch);
  }

  entries(): Array<[string, number]> {
    return [...this.stamps.entries()];
  }
}
