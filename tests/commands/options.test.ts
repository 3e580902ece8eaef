import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { Command } from 'commander';
import {
  addIndexOptions,
  addSelectionOptions,
  addTargetOptions,
  IndexCommandOptions,
  isListFormat,
  isUpgradeStrategy,
  TargetCommandOptions,
  toIndexOptions,
  toTargetSelection,
  upgradeStrategyOption,
  validateGlobalOptions
} from '../../src/commands/options.js';
import { ValidationError } from '../../src/utils/errors.js';

interface ParsedOptions extends TargetCommandOptions, IndexCommandOptions {
  deps?: boolean;
  upgradeStrategy?: string;
}

function parse(argv: string[]): ParsedOptions {
  let parsed: ParsedOptions = {};
  const program = new Command().exitOverride();
  const command = program.command('install').argument('[specs...]');
  addTargetOptions(command);
  addIndexOptions(command);
  addSelectionOptions(command);
  command.addOption(upgradeStrategyOption()).action((_specs: string[], options: ParsedOptions) => {
    parsed = options;
  });
  program.parse(['node', 'pipbridge', 'install', ...argv]);
  return parsed;
}

describe('command options', () => {
  it('collects target options', () => {
    assert.deepEqual(toTargetSelection(parse(['-p', '/dev/ttyACM0'])), { port: '/dev/ttyACM0', mount: undefined, dir: undefined });
    assert.deepEqual(toTargetSelection(parse(['--dir', 'out/lib'])), { port: undefined, mount: undefined, dir: 'out/lib' });
  });

  it('turns negated index flags into positive options', () => {
    const index = toIndexOptions(parse(['--no-mp-org', '--no-index', '-f', './wheels']));
    assert.deepEqual(index, { indexUrl: undefined, extraIndexUrls: undefined, noIndex: true, noMpOrg: true, findLinks: './wheels' });
  });

  it('leaves noMpOrg unset when the flag is absent', () => {
    const index = toIndexOptions(parse(['-i', 'https://mirror.example.test/simple', '--extra-index-url', 'https://a.example.test', 'https://b.example.test']));
    assert.equal('noMpOrg' in index, false);
    assert.equal(index.noIndex, false);
    assert.equal(index.indexUrl, 'https://mirror.example.test/simple');
    assert.deepEqual(index.extraIndexUrls, ['https://a.example.test', 'https://b.example.test']);
  });

  it('requires --find-links with --no-index', () => {
    assert.throws(() => toIndexOptions(parse(['--no-index'])), ValidationError);
  });

  it('defaults the upgrade strategy and keeps dependencies on', () => {
    const options = parse([]);
    assert.equal(options.upgradeStrategy, 'only-if-needed');
    assert.equal(options.deps, true);
    assert.equal(parse(['--no-deps']).deps, false);
  });

  it('rejects an unknown upgrade strategy', () => {
    assert.throws(() => parse(['--upgrade-strategy', 'always']));
  });
});

describe('option guards', () => {
  it('recognizes upgrade strategies and list formats', () => {
    assert.equal(isUpgradeStrategy('eager'), true);
    assert.equal(isUpgradeStrategy('sometimes'), false);
    assert.equal(isListFormat('json'), true);
    assert.equal(isListFormat('yaml'), false);
  });

  it('refuses --verbose together with --quiet', () => {
    assert.throws(() => validateGlobalOptions({ verbose: true, quiet: true }), {
      message: 'Validation error: --verbose and --quiet cannot be used together'
    });
    validateGlobalOptions({ verbose: true });
  });
});
