import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  compareVersions,
  installerMajor,
  isPrerelease,
  latestVersion,
  satisfiesSpecifier,
  versionsEqual
} from '../../src/utils/version.js';

describe('compareVersions', () => {
  it('orders dev and pre-releases before the final release', () => {
    const sorted = ['1.0', '1.0a1', '1.0.post1', '1.0.dev0', '0.9'].sort(compareVersions);
    assert.deepEqual(sorted, ['0.9', '1.0.dev0', '1.0a1', '1.0', '1.0.post1']);
  });

  it('ignores the local label for precedence but breaks ties with it', () => {
    assert.equal(compareVersions('1.0+a', '1.1'), -1);
    assert.equal(compareVersions('1.0+b', '1.0+a'), 1);
    assert.equal(compareVersions('1.0', '1.0+a'), -1);
  });

  it('keeps the local label for equality', () => {
    assert.equal(versionsEqual('1.0', '1.0.0'), true);
    assert.equal(versionsEqual('1.0+cp1', '1.0'), false);
    assert.equal(versionsEqual('1.0+cp1', '1.0+CP1'), true);
  });

  it('sorts unparseable versions before valid ones', () => {
    assert.equal(compareVersions('nightly', '0.1'), -1);
    assert.equal(compareVersions('0.1', 'nightly'), 1);
  });
});

describe('satisfiesSpecifier', () => {
  it('accepts everything for an empty specifier', () => {
    assert.equal(satisfiesSpecifier('3.2.1', ''), true);
    assert.equal(satisfiesSpecifier('3.2.1', '  '), true);
  });

  it('checks comma separated clauses', () => {
    assert.equal(satisfiesSpecifier('1.5', '>=1.0,<2'), true);
    assert.equal(satisfiesSpecifier('2.0', '>=1.0,<2'), false);
    assert.equal(satisfiesSpecifier('1.4.2', '==1.4.*'), true);
  });

  it('rejects unparseable versions', () => {
    assert.equal(satisfiesSpecifier('not-a-version', '>=1'), false);
  });
});

describe('latestVersion', () => {
  it('skips pre-releases unless asked for', () => {
    assert.equal(isPrerelease('2.0rc1'), true);
    assert.equal(latestVersion(['1.0', '2.0rc1', '1.5']), '1.5');
    assert.equal(latestVersion(['1.0', '2.0rc1', '1.5'], true), '2.0rc1');
    assert.equal(latestVersion([]), null);
  });
});

describe('installerMajor', () => {
  it('reads the major of pip versions', () => {
    assert.equal(installerMajor('24.0'), 24);
    assert.equal(installerMajor('23.3.2'), 23);
    assert.equal(installerMajor('pip'), null);
  });
});
