import { Command } from 'commander';
import { withErrorHandling } from '../utils/errors.js';
import { addTargetOptions, TargetCommandOptions, toTargetSelection } from './options.js';
import { withSession } from './run-session.js';

interface FreezeCommandOptions extends TargetCommandOptions {
  exclude?: string[];
}

export function setupFreezeCommand(program: Command): void {
  const command = program
    .command('freeze')
    .description('Output installed packages in requirements format');

  addTargetOptions(command);

  command
    .option('--exclude <pkg...>', 'leave these packages out of the output')
    .action(withErrorHandling(async (options: FreezeCommandOptions) => {
      await withSession(toTargetSelection(options), session => session.freeze({ excludes: options.exclude }));
    }));
}
