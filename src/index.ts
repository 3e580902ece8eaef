#!/usr/bin/env node

import { realpathSync } from 'fs';
import { fileURLToPath } from 'url';
import { Command } from 'commander';
import pc from 'picocolors';
import { setupCacheCommand } from './commands/cache.js';
import { setupCheckCommand } from './commands/check.js';
import { setupDownloadCommand } from './commands/download.js';
import { setupFreezeCommand } from './commands/freeze.js';
import { setupInstallCommand } from './commands/install.js';
import { setupListCommand } from './commands/list.js';
import { GlobalOptions, validateGlobalOptions } from './commands/options.js';
import { setupShowCommand } from './commands/show.js';
import { setupUninstallCommand } from './commands/uninstall.js';
import { setupWheelCommand } from './commands/wheel.js';
import { LogLevel } from './types/index.js';
import { describeError } from './utils/errors.js';
import { logger } from './utils/logger.js';
import { getVersion } from './utils/package.js';

/**
 * pipbridge CLI - Main entry point
 *
 * pip for MicroPython and CircuitPython targets.
 */

const program = new Command();

program
  .name('pipbridge')
  .description('Install pip packages onto MicroPython/CircuitPython boards, board volumes and plain directories')
  .version(getVersion())
  .option('-v, --verbose', 'show debug output')
  .option('-q, --quiet', 'only show errors')
  .configureHelp({ sortSubcommands: true })
  .showHelpAfterError();

setupInstallCommand(program);
setupUninstallCommand(program);
setupListCommand(program);
setupShowCommand(program);
setupFreezeCommand(program);
setupCheckCommand(program);
setupDownloadCommand(program);
setupWheelCommand(program);
setupCacheCommand(program);

program.hook('preAction', () => {
  const opts: GlobalOptions = program.opts();
  try {
    validateGlobalOptions(opts);
  } catch (error) {
    console.error(pc.red(`ERROR: ${describeError(error)}`));
    process.exit(1);
  }

  if (opts.verbose) {
    logger.setLevel(LogLevel.DEBUG);
  } else if (opts.quiet) {
    logger.setLevel(LogLevel.ERROR);
  }
  logger.debug(`pipbridge ${getVersion()} on Node.js ${process.version}`);
});

// === GLOBAL ERROR HANDLING ===

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception occurred', { error: error.message, stack: error.stack });
  console.error(pc.red('An unexpected error occurred. Run with --verbose for details.'));
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', { reason });
  console.error(pc.red('An unexpected error occurred. Run with --verbose for details.'));
  process.exit(1);
});

/**
 * Main execution function
 */
export async function run(argv: string[] = process.argv): Promise<void> {
  if (argv.length <= 2) {
    program.outputHelp();
    return;
  }
  await program.parseAsync(argv);
}

/**
 * Whether this module is the executed script (directly or through the npm bin link)
 */
function isMainModule(): boolean {
  const script = process.argv[1];
  if (!script) {
    return false;
  }
  try {
    return realpathSync(script) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

if (isMainModule()) {
  run().catch((error) => {
    logger.error('Fatal error in main execution', { error });
    console.error(pc.red(`ERROR: ${describeError(error)}`));
    process.exit(1);
  });
}

// Export the program for testing purposes
export { program };
