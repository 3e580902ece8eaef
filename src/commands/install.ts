import { Command } from 'commander';
import { ValidationError, withErrorHandling } from '../utils/errors.js';
import {
  addIndexOptions,
  addSelectionOptions,
  addTargetOptions,
  IndexCommandOptions,
  isUpgradeStrategy,
  TargetCommandOptions,
  toIndexOptions,
  toTargetSelection,
  upgradeStrategyOption
} from './options.js';
import { withSession } from './run-session.js';

interface InstallCommandOptions extends TargetCommandOptions, IndexCommandOptions {
  requirement?: string[];
  constraint?: string[];
  pre?: boolean;
  deps?: boolean;
  upgrade?: boolean;
  upgradeStrategy?: string;
  forceReinstall?: boolean;
  compile?: boolean;
  continueOnError?: boolean;
}

async function installCommand(specs: string[], options: InstallCommandOptions): Promise<void> {
  if (specs.length === 0 && !options.requirement?.length) {
    throw new ValidationError('Name at least one package or pass -r <file>');
  }

  await withSession(toTargetSelection(options), session => session.install({
    ...toIndexOptions(options),
    specs,
    requirementFiles: options.requirement,
    constraintFiles: options.constraint,
    pre: options.pre,
    noDeps: options.deps === false,
    upgrade: options.upgrade,
    upgradeStrategy: isUpgradeStrategy(options.upgradeStrategy) ? options.upgradeStrategy : undefined,
    forceReinstall: options.forceReinstall,
    compile: options.compile,
    continueOnError: options.continueOnError
  }));
}

export function setupInstallCommand(program: Command): void {
  const command = program
    .command('install')
    .argument('[specs...]', 'requirement specifiers, e.g. "micropython-logging>=0.5"')
    .description('Install packages onto the target');

  addTargetOptions(command);
  addIndexOptions(command);
  addSelectionOptions(command);

  command
    .option('-U, --upgrade', 'upgrade the named packages to the newest available version')
    .addOption(upgradeStrategyOption())
    .option('--force-reinstall', 'reinstall all packages even if they are up to date')
    .option('--compile', 'compile .py files with mpy-cross before transfer')
    .option('--continue-on-error', 'keep going when a target operation fails')
    .action(withErrorHandling(installCommand));
}
