import { Argument, Command } from 'commander';
import type { CacheCommand } from '../types/index.js';
import { ValidationError, withErrorHandling } from '../utils/errors.js';
import { withSession } from './run-session.js';

const CACHE_COMMANDS: readonly CacheCommand[] = ['dir', 'info', 'list', 'purge'];

function isCacheCommand(value: string): value is CacheCommand {
  return CACHE_COMMANDS.some(command => command === value);
}

export function setupCacheCommand(program: Command): void {
  program
    .command('cache')
    .addArgument(new Argument('<command>', 'what to do with the cache').choices([...CACHE_COMMANDS]))
    .description("Inspect and manage pip's download cache; purge also drops the working environments")
    .action(withErrorHandling(async (command: string) => {
      if (!isCacheCommand(command)) {
        throw new ValidationError(`Unknown cache command '${command}'`);
      }
      await withSession(null, session => session.cache(command));
    }));
}
