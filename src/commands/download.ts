import { Command } from 'commander';
import type { IndexOptions, SelectionOptions } from '../types/index.js';
import { ValidationError, withErrorHandling } from '../utils/errors.js';
import {
  addIndexOptions,
  addSelectionOptions,
  addTargetOptions,
  IndexCommandOptions,
  TargetCommandOptions,
  toIndexOptions,
  toTargetSelection
} from './options.js';
import { withSession } from './run-session.js';

export interface ArchiveCommandOptions extends TargetCommandOptions, IndexCommandOptions {
  requirement?: string[];
  constraint?: string[];
  pre?: boolean;
  deps?: boolean;
}

export function toArchiveSelection(specs: string[], options: ArchiveCommandOptions): IndexOptions & SelectionOptions {
  if (specs.length === 0 && !options.requirement?.length) {
    throw new ValidationError('Name at least one package or pass -r <file>');
  }
  return {
    ...toIndexOptions(options),
    specs,
    requirementFiles: options.requirement,
    constraintFiles: options.constraint,
    pre: options.pre,
    noDeps: options.deps === false
  };
}

interface DownloadCommandOptions extends ArchiveCommandOptions {
  dest?: string;
}

export function setupDownloadCommand(program: Command): void {
  const command = program
    .command('download')
    .argument('[specs...]', 'requirement specifiers')
    .description('Download packages (resolved against the target) into a local directory');

  addTargetOptions(command, { shortDir: false });
  addIndexOptions(command);
  addSelectionOptions(command);

  command
    .option('-d, --dest <dir>', 'download packages into this directory')
    .action(withErrorHandling(async (specs: string[], options: DownloadCommandOptions) => {
      const selection = toArchiveSelection(specs, options);
      await withSession(toTargetSelection(options), session => session.download({ ...selection, dest: options.dest }));
    }));
}
