import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { acquireWorkspaceLock, isProcessAlive } from '../../../src/core/workspace/workspace-lock.js';
import { WorkspaceError } from '../../../src/utils/errors.js';
import { exists } from '../../../src/utils/fs.js';
import { makeTempDir } from '../../test-helpers.js';

const DEAD_PID = 999999999;

let root: string;

before(async () => {
  root = await makeTempDir('lock');
});

after(async () => {
  await rm(root, { recursive: true, force: true });
});

describe('acquireWorkspaceLock', () => {
  it('records the holder pid and removes the file on release', async () => {
    const path = join(root, 'plain.lock');
    const lock = await acquireWorkspaceLock(path);

    assert.equal(await readFile(path, 'utf8'), String(process.pid));
    await lock.release();
    assert.equal(await exists(path), false);
  });

  it('refuses a lock held by a live process', async () => {
    const path = join(root, 'held.lock');
    const lock = await acquireWorkspaceLock(path);

    await assert.rejects(acquireWorkspaceLock(path), (error: unknown) => {
      assert.ok(error instanceof WorkspaceError);
      assert.equal(error.message, `The workspace is in use by process ${process.pid} (lock file ${path})`);
      return true;
    });
    await lock.release();
  });

  it('reclaims a lock left by a dead process', async () => {
    const path = join(root, 'stale.lock');
    await writeFile(path, String(DEAD_PID), 'utf8');

    const lock = await acquireWorkspaceLock(path);
    assert.equal(await readFile(path, 'utf8'), String(process.pid));
    await lock.release();
  });

  it('reclaims a lock file without a pid', async () => {
    const path = join(root, 'garbage.lock');
    await writeFile(path, 'not a pid', 'utf8');

    const lock = await acquireWorkspaceLock(path);
    await lock.release();
    assert.equal(await exists(path), false);
  });

  it('leaves a lock alone once someone else has taken it over', async () => {
    const path = join(root, 'taken.lock');
    const lock = await acquireWorkspaceLock(path);
    await writeFile(path, '12345', 'utf8');

    await lock.release();
    assert.equal(await readFile(path, 'utf8'), '12345');
  });
});

describe('isProcessAlive', () => {
  it('sees the current process and not a dead one', () => {
    assert.equal(isProcessAlive(process.pid), true);
    assert.equal(isProcessAlive(DEAD_PID), false);
  });
});
