/**
 * Image Cleanup
 *
 * Lists image files in a folder (non-recursive), groups them into age
 * buckets by modification time and deletes a chosen bucket. This is the
 * stock task behind `cronstamp images clean`.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import { isSameDay, subDays } from 'date-fns';
import { z } from 'zod';
import { expandPath } from '../config/config.js';
import { createLogger, formatError } from '../utils/logger.js';

const log = createLogger('image-cleanup');

export const DEFAULT_IMAGE_FOLDER = '~/Downloads';

export const IMAGE_EXTENSIONS: readonly string[] = ['.png', '.jpg', '.jpeg', '.gif', '.bmp', '.webp', '.tiff', '.ico'];

export const AgeBucketSchema = z.enum(['today', 'last-7-days', 'last-30-days', 'older-than-30-days']);
export type AgeBucket = z.infer<typeof AgeBucketSchema>;

export const BucketSelectionSchema = z.union([AgeBucketSchema, z.literal('all')]);
export type BucketSelection = z.infer<typeof BucketSelectionSchema>;

export const AGE_BUCKETS: readonly AgeBucket[] = AgeBucketSchema.options;

export const AGE_BUCKET_LABELS: Readonly<Record<AgeBucket, string>> = {
  today: 'Today',
  'last-7-days': 'Last 7 days',
  'last-30-days': 'Last 30 days',
  'older-than-30-days': 'Older than 30 days',
};

export interface ImageFile {
  path: string;
  name: string;
  modifiedAt: Date;
}

export interface CleanupReport {
  selection: BucketSelection;
  deleted: ImageFile[];
  failed: Array<{ file: ImageFile; error: string }>;
  dryRun: boolean;
}

export function isImageFile(fileName: string): boolean {
  return IMAGE_EXTENSIONS.includes(path.extname(fileName).toLowerCase());
}

export function ageBucketOf(modifiedAt: Date, now: Date): AgeBucket {
  if (isSameDay(modifiedAt, now)) return 'today';
  if (modifiedAt > subDays(now, 7)) return 'last-7-days';
  if (modifiedAt > subDays(now, 30)) return 'last-30-days';
  return 'older-than-30-days';
}

/**
 * Image files directly inside `folder`, sorted by name.
 * Throws when the folder does not exist.
 */
export async function listImageFiles(folder: string): Promise<ImageFile[]> {
  const dir = expandPath(folder);
  const entries = await fs.readdir(dir, { withFileTypes: true });

  const files: ImageFile[] = [];
  for (const entry of entries) {
    if (!entry.isFile() || !isImageFile(entry.name)) continue;
    const filePath = path.join(dir, entry.name);
    const stat = await fs.stat(filePath);
    files.push({ path: filePath, name: entry.name, modifiedAt: stat.mtime });
  }

  return files.sort((a, b) => a.name.localeCompare(b.name));
}

export function groupByAgeBucket(files: readonly ImageFile[], now: Date): Record<AgeBucket, ImageFile[]> {
  const groups: Record<AgeBucket, ImageFile[]> = {
    today: [],
    'last-7-days': [],
    'last-30-days': [],
    'older-than-30-days': [],
  };
  for (const file of files) {
    groups[ageBucketOf(file.modifiedAt, now)].push(file);
  }
  return groups;
}

export function selectFiles(files: readonly ImageFile[], selection: BucketSelection, now: Date): ImageFile[] {
  if (selection === 'all') return [...files];
  return groupByAgeBucket(files, now)[selection];
}

/**
 * Delete the image files of one bucket. A file that cannot be removed is
 * reported in `failed` and does not stop the others.
 */
export async function cleanImages(
  folder: string,
  selection: BucketSelection,
  options: { now?: Date; dryRun?: boolean } = {},
): Promise<CleanupReport> {
  const now = options.now ?? new Date();
  const dryRun = options.dryRun ?? false;
  const targets = selectFiles(await listImageFiles(folder), selection, now);

  const report: CleanupReport = { selection, deleted: [], failed: [], dryRun };
  for (const file of targets) {
    if (dryRun) {
      report.deleted.push(file);
      continue;
    }
    try {
      await fs.unlink(file.path);
      report.deleted.push(file);
    } catch (error) {
      log.warn({ file: file.path, err: formatError(error) }, 'Could not delete image');
      report.failed.push({ file, error: error instanceof Error ? error.message : String(error) });
    }
  }

  log.info({ folder, selection, deleted: report.deleted.length, failed: report.failed.length, dryRun }, 'Image cleanup finished');
  return report;
}
