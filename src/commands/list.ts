import { Command } from 'commander';
import { withErrorHandling } from '../utils/errors.js';
import {
  addIndexOptions,
  addTargetOptions,
  IndexCommandOptions,
  isListFormat,
  listFormatOption,
  TargetCommandOptions,
  toIndexOptions,
  toTargetSelection
} from './options.js';
import { withSession } from './run-session.js';

interface ListCommandOptions extends TargetCommandOptions, IndexCommandOptions {
  outdated?: boolean;
  uptodate?: boolean;
  notRequired?: boolean;
  pre?: boolean;
  format?: string;
  exclude?: string[];
}

async function listCommand(options: ListCommandOptions): Promise<void> {
  await withSession(toTargetSelection(options), session => session.list({
    ...toIndexOptions(options),
    outdated: options.outdated,
    uptodate: options.uptodate,
    notRequired: options.notRequired,
    pre: options.pre,
    format: isListFormat(options.format) ? options.format : undefined,
    excludes: options.exclude
  }));
}

export function setupListCommand(program: Command): void {
  const command = program
    .command('list')
    .alias('ls')
    .description('List packages installed on the target');

  addTargetOptions(command);
  addIndexOptions(command);

  command
    .option('-o, --outdated', 'list outdated packages')
    .option('-u, --uptodate', 'list up to date packages')
    .option('--not-required', 'list packages that are not dependencies of installed packages')
    .option('--pre', 'include pre-release and development versions')
    .addOption(listFormatOption())
    .option('--exclude <pkg...>', 'leave these packages out of the output')
    .action(withErrorHandling(listCommand));
}
