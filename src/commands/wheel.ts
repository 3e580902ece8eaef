import { Command } from 'commander';
import { withErrorHandling } from '../utils/errors.js';
import { ArchiveCommandOptions, toArchiveSelection } from './download.js';
import { addIndexOptions, addSelectionOptions, addTargetOptions, toTargetSelection } from './options.js';
import { withSession } from './run-session.js';

interface WheelCommandOptions extends ArchiveCommandOptions {
  wheelDir?: string;
}

export function setupWheelCommand(program: Command): void {
  const command = program
    .command('wheel')
    .argument('[specs...]', 'requirement specifiers')
    .description('Build wheels (resolved against the target) into a local directory');

  addTargetOptions(command);
  addIndexOptions(command);
  addSelectionOptions(command);

  command
    .option('-w, --wheel-dir <dir>', 'build wheels into this directory')
    .action(withErrorHandling(async (specs: string[], options: WheelCommandOptions) => {
      const selection = toArchiveSelection(specs, options);
      await withSession(toTargetSelection(options), session => session.wheel({ ...selection, wheelDir: options.wheelDir }));
    }));
}
