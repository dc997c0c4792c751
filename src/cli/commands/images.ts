import { Command } from 'commander';
import {
  AGE_BUCKET_LABELS,
  AGE_BUCKETS,
  BucketSelectionSchema,
  DEFAULT_IMAGE_FOLDER,
  cleanImages,
  groupByAgeBucket,
  listImageFiles,
  selectFiles,
  type CleanupReport,
} from '../../tasks/image-cleanup.js';
import { createScheduleRunner } from '../../schedule/runner.js';
import { errorMessage, fail, out, parseInstant, parseRecordableInstant, describeOutcome } from '../output.js';

interface CleanOptions {
  bucket: string;
  cron?: string;
  cacheDir?: string;
  at?: string;
  dryRun: boolean;
  force: boolean;
}

function printReport(report: CleanupReport): void {
  const verb = report.dryRun ? 'Would delete' : 'Deleted';
  for (const file of report.deleted) {
    out(`${verb}: ${file.name}`);
  }
  for (const { file, error } of report.failed) {
    out(`Error deleting ${file.name}: ${error}`);
  }
  out(`${verb} ${report.deleted.length} files from the '${report.selection}' bucket.`);
}

export function registerImagesCommand(program: Command): void {
  const images = program.command('images').description('List and delete image files by age');

  images
    .command('list [folder]')
    .description('List image files grouped by age bucket')
    .action(async (folder: string | undefined) => {
      try {
        const now = new Date();
        const files = await listImageFiles(folder ?? DEFAULT_IMAGE_FOLDER);
        if (files.length === 0) {
          out('No image files found.');
          return;
        }

        const groups = groupByAgeBucket(files, now);
        for (const bucket of AGE_BUCKETS) {
          if (groups[bucket].length === 0) continue;
          out(`${AGE_BUCKET_LABELS[bucket]}:`);
          for (const file of groups[bucket]) {
            out(`- ${file.name}`);
          }
        }

        out('Summary:');
        for (const bucket of AGE_BUCKETS) {
          if (groups[bucket].length === 0) continue;
          out(`${AGE_BUCKET_LABELS[bucket]}: ${groups[bucket].length} files`);
        }
        out(`Total: ${files.length} files`);
      } catch (error) {
        fail(errorMessage(error));
      }
    });

  images
    .command('clean [folder]')
    .description('Delete image files in an age bucket, optionally gated by a cron schedule')
    .option('-b, --bucket <bucket>', `Age bucket: ${[...AGE_BUCKETS, 'all'].join(', ')}`, 'older-than-30-days')
    .option('--cron <expr>', 'Only clean when this schedule is due (implies --force)')
    .option('--cache-dir <dir>', 'Directory holding stamp files')
    .option('--at <iso>', 'Evaluate as of this instant instead of now (past only with --cron)')
    .option('--dry-run', 'Show what would be deleted', false)
    .option('-f, --force', 'Delete without a --cron gate', false)
    .action(async (folder: string | undefined, options: CleanOptions) => {
      const selection = BucketSelectionSchema.safeParse(options.bucket);
      if (!selection.success) {
        fail(`Unknown bucket "${options.bucket}"`);
        return;
      }

      try {
        const stamps = options.cron !== undefined && !options.dryRun;
        const now = stamps ? parseRecordableInstant(options.at) : parseInstant(options.at);
        const target = folder ?? DEFAULT_IMAGE_FOLDER;
        const clean = async (): Promise<void> => {
          printReport(await cleanImages(target, selection.data, { now, dryRun: options.dryRun }));
        };

        if (options.cron === undefined) {
          if (!options.dryRun && !options.force) {
            const targets = selectFiles(await listImageFiles(target), selection.data, now);
            if (targets.length === 0) {
              out(`No files found in the '${selection.data}' bucket.`);
              return;
            }
            out(`Files to delete (${targets.length} files):`);
            for (const file of targets) {
              out(`- ${file.name}`);
            }
            fail('Nothing deleted; pass --force to delete these files');
            return;
          }
          await clean();
          return;
        }

        const runner = createScheduleRunner({
          now: () => now,
          ...(options.cacheDir !== undefined ? { cacheDir: options.cacheDir } : {}),
        });

        // A dry run must not consume the scheduled instant
        if (options.dryRun) {
          const status = await runner.inspect(options.cron, `images-clean-${selection.data}`);
          if (status.due) {
            await clean();
          } else {
            out('not due');
          }
          return;
        }

        const outcome = await runner.runIfDue(options.cron, `images-clean-${selection.data}`, clean);
        out(describeOutcome(outcome, now));
      } catch (error) {
        fail(errorMessage(error));
      }
    });
}
