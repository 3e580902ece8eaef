import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { readFile, rm, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { DirectoryTargetAdapter } from '../../../src/core/target/directory-adapter.js';
import { TargetIOError } from '../../../src/utils/errors.js';
import { bytes, distInfoFiles, makeTempDir, text, writeTree } from '../../test-helpers.js';

let root: string;

before(async () => {
  root = await makeTempDir('dir-adapter');
});

after(async () => {
  await rm(root, { recursive: true, force: true });
});

describe('DirectoryTargetAdapter', () => {
  it('writes files with their parent directories and reads them back', async () => {
    const adapter = new DirectoryTargetAdapter(join(root, 'write'));

    await adapter.writeFile('pkg/sub/mod.py', bytes('VALUE = 1\n'));

    assert.equal(await readFile(join(root, 'write', 'pkg', 'sub', 'mod.py'), 'utf8'), 'VALUE = 1\n');
    assert.equal(text(await adapter.readFile('pkg/sub/mod.py')), 'VALUE = 1\n');
    assert.deepEqual(await adapter.listEntries('pkg'), [{ name: 'sub', isDirectory: true }]);
  });

  it('lists a missing root as empty', async () => {
    const adapter = new DirectoryTargetAdapter(join(root, 'nothing-here'));
    assert.deepEqual(await adapter.listEntries(''), []);
    assert.equal((await adapter.listDistributions()).size, 0);
  });

  it('treats deleting a missing file as done', async () => {
    const adapter = new DirectoryTargetAdapter(join(root, 'delete'));
    await adapter.writeFile('a.py', bytes('a'));
    await adapter.deleteFile('a.py');
    await adapter.deleteFile('a.py');
    await assert.rejects(stat(join(root, 'delete', 'a.py')));
  });

  it('removes only empty directories and never the root', async () => {
    const adapter = new DirectoryTargetAdapter(join(root, 'prune'));
    await adapter.writeFile('pkg/a.py', bytes('a'));
    assert.equal(await adapter.removeDirIfEmpty('pkg'), false);
    await adapter.deleteFile('pkg/a.py');
    assert.equal(await adapter.removeDirIfEmpty('pkg'), true);
    assert.equal(await adapter.removeDirIfEmpty(''), false);
    assert.equal(await adapter.removeDirIfEmpty('pkg'), false);
  });

  it('rejects paths that leave the root', async () => {
    const adapter = new DirectoryTargetAdapter(join(root, 'escape'));
    await assert.rejects(adapter.writeFile('../outside.py', bytes('x')), (error: unknown) => {
      assert.ok(error instanceof TargetIOError);
      assert.equal(error.operation, 'write');
      assert.equal(error.path, '../outside.py');
      return true;
    });
    await assert.rejects(adapter.readFile('/etc/passwd'), TargetIOError);
  });

  it('wraps read failures in TargetIOError', async () => {
    const adapter = new DirectoryTargetAdapter(join(root, 'read'));
    await assert.rejects(adapter.readFile('missing.py'), (error: unknown) =>
      error instanceof TargetIOError && error.operation === 'read' && error.path === 'missing.py'
    );
  });

  it('scans installed distributions but not the installer tooling', async () => {
    const dir = join(root, 'scan');
    await writeTree(dir, {
      ...distInfoFiles('micropython-os', '0.6', { 'os/__init__.py': '' }),
      ...distInfoFiles('pip', '24.0', { 'pip/__init__.py': '' })
    });
    const adapter = new DirectoryTargetAdapter(dir);

    const state = await adapter.listDistributions();

    assert.deepEqual([...state.keys()], ['micropython-os']);
  });
});
