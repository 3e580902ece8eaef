import { Command } from 'commander';
import { withErrorHandling } from '../utils/errors.js';
import { addTargetOptions, TargetCommandOptions, toTargetSelection } from './options.js';
import { withSession } from './run-session.js';

export function setupShowCommand(program: Command): void {
  const command = program
    .command('show')
    .argument('<packages...>', 'installed packages to describe')
    .description('Show information about packages installed on the target');

  addTargetOptions(command);

  command.action(withErrorHandling(async (packages: string[], options: TargetCommandOptions) => {
    await withSession(toTargetSelection(options), session => session.show(packages));
  }));
}
