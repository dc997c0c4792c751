/**
 * cronstamp: Command Line Interface
 *
 * Builds the commander program: schedule inspection, cron-gated command
 * runs, image cleanup and first-time setup.
 *
 * @module cli/program
 */

import { Command } from 'commander';
import { ensureConfig, getBaseDir, getCacheDir, getConfigPath, reloadConfig } from '../config/config.js';
import { resolveLogLevel, setLogLevel } from '../utils/logger.js';
import { registerImagesCommand } from './commands/images.js';
import { registerScheduleCommands } from './commands/schedule.js';
import { fail, out } from './output.js';

export const VERSION = '1.0.0';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('cronstamp')
    .description('Run tasks at most once per cron-scheduled instant')
    .version(VERSION)
    .option('-c, --config <path>', 'Path to a config file')
    .option('-v, --verbose', 'Log at debug level', false);

  program.hook('preAction', (thisCommand) => {
    const { config, verbose } = thisCommand.opts<{ config?: string; verbose: boolean }>();
    if (config !== undefined) {
      const result = reloadConfig(config);
      if (!result.success) {
        throw result.error;
      }
    }
    setLogLevel(verbose ? 'debug' : resolveLogLevel());
  });

  // ═══════════════════════════════════════════════════════════════════════════
  // INIT
  // ═══════════════════════════════════════════════════════════════════════════

  program
    .command('init')
    .description('Create the cronstamp directories and default config')
    .action(() => {
      const configPath = program.opts<{ config?: string }>().config;
      const result = ensureConfig(configPath);
      if (!result.success) {
        fail(`Failed to initialize: ${result.error.message}`);
        return;
      }

      out(`Base directory: ${getBaseDir(result.data)}`);
      out(`Cache directory: ${getCacheDir(result.data)}`);
      out(`Config file: ${configPath ?? getConfigPath(result.data)}`);
    });

  registerScheduleCommands(program);
  registerImagesCommand(program);

  return program;
}
