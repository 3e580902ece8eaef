import { Command } from 'commander';
import { withErrorHandling } from '../utils/errors.js';
import { addTargetOptions, TargetCommandOptions, toTargetSelection } from './options.js';
import { withSession } from './run-session.js';

interface UninstallCommandOptions extends TargetCommandOptions {
  requirement?: string[];
  yes?: boolean;
}

async function uninstallCommand(packages: string[], options: UninstallCommandOptions): Promise<void> {
  await withSession(toTargetSelection(options), session => session.uninstall({
    packages,
    requirementFiles: options.requirement,
    yes: options.yes
  }));
}

export function setupUninstallCommand(program: Command): void {
  const command = program
    .command('uninstall')
    .argument('[packages...]', 'names of the packages to remove')
    .description('Remove packages from the target');

  addTargetOptions(command);

  command
    .option('-r, --requirement <file...>', 'uninstall all packages named in the given requirements file(s)')
    .option('-y, --yes', "don't ask for confirmation")
    .action(withErrorHandling(uninstallCommand));
}
