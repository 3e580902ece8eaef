import { Command } from 'commander';
import { withErrorHandling } from '../utils/errors.js';
import { addTargetOptions, TargetCommandOptions, toTargetSelection } from './options.js';
import { withSession } from './run-session.js';

export function setupCheckCommand(program: Command): void {
  const command = program
    .command('check')
    .description('Verify that packages on the target have compatible dependencies');

  addTargetOptions(command);

  command.action(withErrorHandling(async (options: TargetCommandOptions) => {
    await withSession(toTargetSelection(options), session => session.check());
  }));
}
