import { Command, InvalidArgumentError, Option } from 'commander';
import { MATCH_POLICIES } from '@facefix/core';
import { runFix } from './commands/fix.js';
import type { FixCommandOptions, FixDependencies } from './commands/fix.js';
import { PRODUCT_NAME, VERSION } from './version.js';

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

export function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

/**
 * Build the `facefix` command. `onExit` receives the exit code of the run.
 */
export function createProgram(deps: FixDependencies, onExit: (code: number) => void): Command {
  return new Command('facefix')
    .description(`${PRODUCT_NAME}: rewrite ps-tN face texture slots to 'this' in .ini files`)
    .version(VERSION)
    .argument('[folder]', 'Folder to scan (default: current directory)')
    .option('-r, --recursive', 'Scan sub-folders')
    .option('--process-disabled', 'Include files named or marked as DISABLED')
    .option('--backup', 'Write <name>_backup.bak before modifying (default)')
    .option('--no-backup', 'Do not write backups')
    .option('-e, --exclude <pattern>', 'Folder name or glob to exclude (repeatable)', collect)
    .addOption(
      new Option('--policy <policy>', 'Which face resources to rewrite').choices(
        MATCH_POLICIES.filter((policy) => policy !== 'custom')
      )
    )
    .option('--pattern <regex>', 'Custom slot pattern; group 1 is the resource')
    .option('-w, --workers <n>', 'Files written in parallel', parsePositiveInt)
    .option('-c, --config <file>', 'YAML or JSON configuration file')
    .option('-y, --yes', 'Apply without asking')
    .option('--dry-run', 'Preview only, never write')
    .option('-i, --interactive', 'Ask for the settings interactively')
    .option('--color', 'Force highlighted output')
    .option('--no-color', 'Disable highlighted output')
    .option('--log-file <file>', 'Append a timestamped log to this file')
    .action(async (folder: string | undefined, options: FixCommandOptions) => {
      onExit(await runFix({ ...options, folder }, deps));
    });
}
