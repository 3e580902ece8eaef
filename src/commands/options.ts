import { Command, Option } from 'commander';
import type { IndexOptions, ListFormat, TargetSelection, UpgradeStrategy } from '../types/index.js';
import { ValidationError } from '../utils/errors.js';

export const UPGRADE_STRATEGIES: readonly UpgradeStrategy[] = ['eager', 'only-if-needed'];
export const LIST_FORMATS: readonly ListFormat[] = ['columns', 'freeze', 'json'];

export interface TargetCommandOptions {
  port?: string;
  mount?: string;
  dir?: string;
}

/**
 * Index flags as commander hands them over: `--no-index` and `--no-mp-org`
 * arrive as `index: false` and `mpOrg: false`.
 */
export interface IndexCommandOptions {
  indexUrl?: string;
  extraIndexUrl?: string[];
  index?: boolean;
  mpOrg?: boolean;
  findLinks?: string;
}

export interface GlobalOptions {
  verbose?: boolean;
  quiet?: boolean;
}

/**
 * `-d` is left off where the command already uses it (download's --dest).
 */
export function addTargetOptions(command: Command, options: { shortDir?: boolean } = {}): Command {
  return command
    .option('-p, --port <port>', 'serial port of a MicroPython/CircuitPython board')
    .option('-m, --mount <path>', 'mount point of a board volume (e.g. CIRCUITPY)')
    .option(options.shortDir === false ? '--dir <path>' : '-d, --dir <path>', 'local directory used as the target');
}

export function addIndexOptions(command: Command): Command {
  return command
    .option('-i, --index-url <url>', 'base URL of the Python Package Index')
    .option('--extra-index-url <url...>', 'extra index URLs, consulted after --index-url')
    .option('--no-index', 'ignore package indexes (use --find-links)')
    .option('--no-mp-org', 'do not consult micropython.org/pi')
    .option('-f, --find-links <path>', 'local directory or URL with archives');
}

export function addSelectionOptions(command: Command): Command {
  return command
    .option('-r, --requirement <file...>', 'install from the given requirements file(s)')
    .option('-c, --constraint <file...>', 'constrain versions using the given constraints file(s)')
    .option('--pre', 'include pre-release and development versions')
    .option('--no-deps', "don't install package dependencies");
}

export function upgradeStrategyOption(): Option {
  return new Option('--upgrade-strategy <strategy>', 'how dependencies are upgraded')
    .choices([...UPGRADE_STRATEGIES])
    .default('only-if-needed');
}

export function listFormatOption(): Option {
  return new Option('--format <format>', 'output format').choices([...LIST_FORMATS]).default('columns');
}

export function toTargetSelection(options: TargetCommandOptions): TargetSelection {
  return { port: options.port, mount: options.mount, dir: options.dir };
}

export function toIndexOptions(options: IndexCommandOptions): IndexOptions {
  const result: IndexOptions = {
    indexUrl: options.indexUrl,
    extraIndexUrls: options.extraIndexUrl,
    noIndex: options.index === false,
    findLinks: options.findLinks
  };
  // Unset keeps the configured value
  if (options.mpOrg === false) {
    result.noMpOrg = true;
  }
  if (result.noIndex && !result.findLinks) {
    throw new ValidationError('--no-index needs --find-links');
  }
  return result;
}

export function isUpgradeStrategy(value: unknown): value is UpgradeStrategy {
  return UPGRADE_STRATEGIES.some(strategy => strategy === value);
}

export function isListFormat(value: unknown): value is ListFormat {
  return LIST_FORMATS.some(format => format === value);
}

export function validateGlobalOptions(options: GlobalOptions): void {
  if (options.verbose && options.quiet) {
    throw new ValidationError('--verbose and --quiet cannot be used together');
  }
}
