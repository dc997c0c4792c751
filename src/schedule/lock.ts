import { mkdir, rmdir, stat } from 'node:fs/promises';
import { ScheduleLockError } from './errors.js';
import { createLogger, formatError } from '../utils/logger.js';

const log = createLogger('lock');

// ── Lock Interface ───────────────────────────────────────────────────────────

export interface FileLock {
  readonly lockPath: string;
  release(): Promise<void>;
}

export interface LockOptions {
  timeoutMs?: number;
  pollIntervalMs?: number;
  /** Locks whose directory is older than this are treated as abandoned. */
  staleAfterMs?: number;
}

// ── Constants ────────────────────────────────────────────────────────────────

const DEFAULT_TIMEOUT_MS = 5_000;
const POLL_INTERVAL_MS = 50;
const STALE_LOCK_AGE_MS = 10 * 60_000;

// ── Lock Acquisition ─────────────────────────────────────────────────────────

/**
 * Acquire an exclusive lock beside `filePath` using atomic mkdir.
 * Creates `<filePath>.lock`; while it exists, polls until it is released
 * or the timeout expires.
 */
export async function acquireLock(filePath: string, options: LockOptions = {}): Promise<FileLock> {
  const lockPath = `${filePath}.lock`;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const pollIntervalMs = options.pollIntervalMs ?? POLL_INTERVAL_MS;
  const staleAfterMs = options.staleAfterMs ?? STALE_LOCK_AGE_MS;
  const startTime = Date.now();

  while (true) {
    try {
      await mkdir(lockPath);
      log.debug({ lockPath }, 'Lock acquired');
      return {
        lockPath,
        async release() {
          try {
            await rmdir(lockPath);
          } catch (error) {
            // Left behind; the stale check reclaims it later
            if (!isMissing(error)) {
              log.warn({ lockPath, err: formatError(error) }, 'Lock release failed');
            }
          }
        },
      };
    } catch (error: unknown) {
      if (!isErrnoException(error) || error.code !== 'EEXIST') {
        throw error;
      }

      await removeIfStale(lockPath, staleAfterMs);

      if (Date.now() - startTime > timeoutMs) {
        throw new ScheduleLockError(`Lock timeout after ${timeoutMs}ms on ${filePath}`, lockPath);
      }
      await sleep(pollIntervalMs);
    }
  }
}

// ── Helpers ──────────────────────────────────────────────────────────────────

async function removeIfStale(lockPath: string, staleAfterMs: number): Promise<void> {
  try {
    const lockStat = await stat(lockPath);
    const age = Date.now() - lockStat.mtimeMs;
    if (age > staleAfterMs) {
      log.warn({ lockPath, ageMs: Math.round(age) }, 'Removing stale lock');
      await rmdir(lockPath);
    }
  } catch (error) {
    // Released between the check and the cleanup
    if (!isMissing(error)) {
      log.warn({ lockPath, err: formatError(error) }, 'Stale lock check failed');
    }
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

function isMissing(err: unknown): boolean {
  return isErrnoException(err) && err.code === 'ENOENT';
}
