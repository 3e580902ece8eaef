import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { readdir, readFile, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { createDistribution, distributionsEqual } from '../../../src/core/dist/distribution.js';
import { applyPlan, isExcluded } from '../../../src/core/reconcile/apply.js';
import type { SourceCompiler } from '../../../src/core/reconcile/compiler.js';
import { diffStates } from '../../../src/core/reconcile/plan.js';
import { DirectoryTargetAdapter } from '../../../src/core/target/directory-adapter.js';
import { CompilationFailureError, TargetIOError } from '../../../src/utils/errors.js';
import { exists } from '../../../src/utils/fs.js';
import { installLikePip } from '../../fakes/fake-python.js';
import { bytes, makeTempDir, text } from '../../test-helpers.js';

let root: string;

before(async () => {
  root = await makeTempDir('apply');
});

after(async () => {
  await rm(root, { recursive: true, force: true });
});

function setup(name: string): { site: DirectoryTargetAdapter; target: DirectoryTargetAdapter; targetDir: string } {
  const targetDir = join(root, name, 'target');
  return {
    site: new DirectoryTargetAdapter(join(root, name, 'site')),
    target: new DirectoryTargetAdapter(targetDir),
    targetDir
  };
}

class FakeCompiler implements SourceCompiler {
  accepts(path: string): boolean {
    return path.endsWith('.py');
  }

  outputPath(path: string): string {
    return path.replace(/\.py$/, '.mpy');
  }

  async compile(source: Uint8Array, path: string): Promise<Uint8Array> {
    if (path.endsWith('bad.py')) {
      throw new CompilationFailureError(path, 'syntax error');
    }
    return bytes(`compiled:${text(source)}`);
  }
}

class FlakyTarget extends DirectoryTargetAdapter {
  override async writeFile(path: string, content: Uint8Array): Promise<void> {
    if (path.startsWith('broken/')) {
      throw new TargetIOError('write', path, new Error('device busy'));
    }
    await super.writeFile(path, content);
  }
}

describe('applyPlan', () => {
  it('installs into an empty target so that the target matches the workspace', async () => {
    const { site, target, targetDir } = setup('install');
    await installLikePip(join(root, 'install', 'site'), 'foo', '1.0', { 'foo/__init__.py': 'from .core import X\n', 'foo/core.py': 'X = 1\n' });
    const wanted = await site.listDistributions();

    const result = await applyPlan(diffStates(new Map(), wanted), { target, workspace: site, targetState: new Map() });

    const onTarget = await target.listDistributions();
    const installed = onTarget.get('foo');
    const expected = wanted.get('foo');
    assert.ok(installed && expected);
    assert.equal(distributionsEqual(installed, expected), true);
    assert.equal(result.transferred, 2);
    assert.deepEqual(result.installed.map(dist => dist.name), ['foo']);
    assert.equal(await readFile(join(targetDir, 'foo', 'core.py'), 'utf8'), 'X = 1\n');
    assert.deepEqual((await readdir(join(targetDir, 'foo-1.0.dist-info'))).sort(), ['METADATA', 'RECORD']);
    assert.equal(
      await readFile(join(targetDir, 'foo-1.0.dist-info', 'METADATA'), 'utf8'),
      'Metadata-Version: 2.1\nName: foo\nVersion: 1.0\n'
    );

    assert.equal(diffStates(onTarget, wanted).isEmpty, true);
  });

  it('removes the files of the old version on upgrade', async () => {
    const { site, target, targetDir } = setup('upgrade');
    await installLikePip(targetDir, 'foo', '1.0', { 'foo/__init__.py': '', 'foo/old.py': 'OLD = 1\n' });
    await installLikePip(join(root, 'upgrade', 'site'), 'foo', '2.0', { 'foo/__init__.py': '', 'foo/new.py': 'NEW = 1\n' });
    const targetState = await target.listDistributions();

    const result = await applyPlan(diffStates(targetState, await site.listDistributions()), { target, workspace: site, targetState });

    assert.equal(result.upgraded.length, 1);
    assert.equal(await exists(join(targetDir, 'foo', 'old.py')), false);
    assert.equal(await exists(join(targetDir, 'foo-1.0.dist-info')), false);
    assert.equal(await readFile(join(targetDir, 'foo', 'new.py'), 'utf8'), 'NEW = 1\n');
    assert.deepEqual([...(await target.listDistributions()).values()].map(dist => dist.version), ['2.0']);
  });

  it('prunes directories a removal leaves empty', async () => {
    const { site, target, targetDir } = setup('remove');
    await installLikePip(targetDir, 'bar', '1.0', { 'bar/sub/deep.py': '', 'bar/__init__.py': '' });
    await installLikePip(targetDir, 'keep', '1.0', { 'keep.py': '' });
    const targetState = await target.listDistributions();
    const kept = new Map([...targetState].filter(([name]) => name === 'keep'));

    const result = await applyPlan(diffStates(targetState, kept), { target, workspace: site, targetState });

    assert.deepEqual(result.removed.map(dist => dist.name), ['bar']);
    assert.deepEqual((await readdir(targetDir)).sort(), ['keep-1.0.dist-info', 'keep.py']);
  });

  it('warns and goes on when a distribution to remove is not on the target', async () => {
    const { site, target } = setup('ghost');
    const ghost = new Map([['ghost', createDistribution({ displayName: 'ghost', version: '0.1' })]]);

    const result = await applyPlan(diffStates(ghost, new Map()), { target, workspace: site, targetState: new Map() });
    assert.deepEqual(result.removed.map(dist => dist.name), ['ghost']);
    assert.deepEqual(result.failures, []);
  });

  it('skips a file that does not compile and transfers the rest', async () => {
    const { site, target, targetDir } = setup('compile');
    await installLikePip(join(root, 'compile', 'site'), 'foo', '1.0', {
      'foo/__init__.py': '',
      'foo/bad.py': 'def',
      'foo/good.py': 'G = 1\n'
    });

    const result = await applyPlan(diffStates(new Map(), await site.listDistributions()), {
      target,
      workspace: site,
      targetState: new Map(),
      compiler: new FakeCompiler()
    });

    assert.deepEqual(result.skipped, [{ dist: 'foo', path: 'foo/bad.py', reason: "Could not compile 'foo/bad.py': syntax error" }]);
    assert.equal(result.transferred, 2);
    assert.equal(await readFile(join(targetDir, 'foo', 'good.mpy'), 'utf8'), 'compiled:G = 1\n');
    assert.deepEqual((await readdir(join(targetDir, 'foo'))).sort(), ['__init__.mpy', 'good.mpy']);
    const installed = (await target.listDistributions()).get('foo');
    assert.deepEqual(installed?.files.map(entry => entry.path), ['foo/__init__.mpy', 'foo/good.mpy']);
  });

  it('leaves excluded files behind', async () => {
    const { site, target, targetDir } = setup('exclude');
    await installLikePip(join(root, 'exclude', 'site'), 'foo', '1.0', { 'foo/__init__.py': '', 'foo/tests/test_foo.py': '' });

    await applyPlan(diffStates(new Map(), await site.listDistributions()), {
      target,
      workspace: site,
      targetState: new Map(),
      excludePatterns: ['foo/tests/**']
    });

    assert.equal(await exists(join(targetDir, 'foo', 'tests')), false);
    assert.deepEqual((await target.listDistributions()).get('foo')?.files.map(entry => entry.path), ['foo/__init__.py']);
  });

  it('aborts on a target error by default', async () => {
    const { site } = setup('abort');
    const target = new FlakyTarget(join(root, 'abort', 'target'));
    await installLikePip(join(root, 'abort', 'site'), 'broken', '1.0', { 'broken/__init__.py': '' });

    await assert.rejects(
      applyPlan(diffStates(new Map(), await site.listDistributions()), { target, workspace: site, targetState: new Map() }),
      TargetIOError
    );
  });

  it('records target errors and continues when asked to', async () => {
    const { site } = setup('continue');
    const target = new FlakyTarget(join(root, 'continue', 'target'));
    await installLikePip(join(root, 'continue', 'site'), 'broken', '1.0', { 'broken/__init__.py': '' });
    await installLikePip(join(root, 'continue', 'site'), 'fine', '1.0', { 'fine.py': '' });

    const result = await applyPlan(diffStates(new Map(), await site.listDistributions()), {
      target,
      workspace: site,
      targetState: new Map(),
      onTargetError: 'continue'
    });

    assert.deepEqual(result.installed.map(dist => dist.name), ['fine']);
    assert.deepEqual(result.failures.map(failure => failure.operation), ['install broken 1.0']);
    assert.equal(result.failures[0].error.path, 'broken/__init__.py');
  });

  it('reports each operation as it starts', async () => {
    const { site, target } = setup('progress');
    await installLikePip(join(root, 'progress', 'site'), 'a', '1.0', { 'a.py': '' });
    await installLikePip(join(root, 'progress', 'site'), 'b', '1.0', { 'b.py': '' });
    const seen: string[] = [];

    await applyPlan(diffStates(new Map(), await site.listDistributions()), {
      target,
      workspace: site,
      targetState: new Map(),
      onOperation: (operation, index, total) => seen.push(`${index + 1}/${total} ${operation.kind}`)
    });

    assert.deepEqual(seen, ['1/2 install', '2/2 install']);
  });

  it('refuses a plan that was already applied', async () => {
    const { site, target } = setup('twice');
    const plan = diffStates(new Map(), new Map());
    await applyPlan(plan, { target, workspace: site, targetState: new Map() });
    await assert.rejects(applyPlan(plan, { target, workspace: site, targetState: new Map() }), {
      message: 'Validation error: operation plan has already been applied'
    });
  });
});

describe('isExcluded', () => {
  it('matches glob patterns including dot files', () => {
    assert.equal(isExcluded('foo/__pycache__/x.cpython-311.pyc', ['**/__pycache__/**']), true);
    assert.equal(isExcluded('foo/.hidden', ['foo/*']), true);
    assert.equal(isExcluded('foo/core.py', ['**/*.pyc']), false);
  });
});

