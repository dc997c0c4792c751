import { Command } from 'commander';
import { latestScheduledAtOrBefore } from '../../schedule/evaluator.js';
import { createScheduleRunner, type ScheduleRunnerOptions } from '../../schedule/runner.js';
import { getConfig } from '../../config/config.js';
import { commandTask, TaskCommandError } from '../../utils/exec.js';
import {
  describeOutcome,
  errorMessage,
  fail,
  formatInstant,
  out,
  parseInstant,
  parseRecordableInstant,
} from '../output.js';

// ═══════════════════════════════════════════════════════════════════════════════
// SCHEDULE CLI COMMANDS
// ═══════════════════════════════════════════════════════════════════════════════

interface StampOptions {
  id: string;
  cacheDir?: string;
  at?: string;
}

function runnerOptions(options: StampOptions, now: Date): ScheduleRunnerOptions {
  return {
    now: () => now,
    ...(options.cacheDir !== undefined ? { cacheDir: options.cacheDir } : {}),
  };
}

export function registerScheduleCommands(program: Command): void {
  program
    .command('latest <cron>')
    .description('Print the latest scheduled instant at or before now')
    .option('--at <iso>', 'Evaluate as of this instant instead of now')
    .action((cron: string, options: { at?: string }) => {
      try {
        const now = parseInstant(options.at);
        const { schedule } = getConfig();
        const latest = latestScheduledAtOrBefore(cron, now, {
          lookbackDays: schedule.lookback_days,
          weekdayStart: schedule.weekday_start,
        });
        out(formatInstant(latest));
      } catch (error) {
        fail(errorMessage(error));
      }
    });

  program
    .command('status <cron>')
    .description('Show the schedule, stamp and due state of a task')
    .requiredOption('--id <taskId>', 'Stable task identifier')
    .option('--cache-dir <dir>', 'Directory holding stamp files')
    .option('--at <iso>', 'Evaluate as of this instant instead of now')
    .action(async (cron: string, options: StampOptions) => {
      try {
        const now = parseInstant(options.at);
        const runner = createScheduleRunner(runnerOptions(options, now));
        const status = await runner.inspect(cron, options.id);

        out(`Task:      ${options.id}`);
        out(`Schedule:  ${cron}`);
        out(`Latest:    ${formatInstant(status.scheduledAt)}`);
        out(`Last run:  ${status.lastRunEpoch === 0 ? 'never' : formatInstant(new Date(status.lastRunEpoch * 1000))}`);
        if (status.stampPath !== undefined) {
          out(`Stamp:     ${status.stampPath}`);
        }
        out(`Due:       ${status.due ? 'yes' : 'no'}`);
      } catch (error) {
        fail(errorMessage(error));
      }
    });

  program
    .command('run <cron> <command...>')
    .description('Run a command if its schedule is due (put the command after --)')
    .requiredOption('--id <taskId>', 'Stable task identifier')
    .option('--cache-dir <dir>', 'Directory holding stamp files')
    .option('--at <iso>', 'Evaluate as of this past instant instead of now')
    .option('--lock', 'Hold an exclusive lock while running')
    .action(async (cron: string, command: string[], options: StampOptions & { lock?: boolean }) => {
      const [file, ...args] = command;
      if (file === undefined) {
        fail('No command given');
        return;
      }

      try {
        const now = parseRecordableInstant(options.at);
        const runner = createScheduleRunner({
          ...runnerOptions(options, now),
          ...(options.lock !== undefined ? { lock: options.lock } : {}),
        });
        const task = commandTask(file, args, {
          onOutput: (result) => {
            process.stdout.write(result.stdout);
            process.stderr.write(result.stderr);
          },
        });

        const outcome = await runner.runIfDue(cron, options.id, task);
        out(describeOutcome(outcome, now));
      } catch (error) {
        if (error instanceof TaskCommandError) {
          fail(error.message, error.status);
          return;
        }
        fail(errorMessage(error));
      }
    });
}
