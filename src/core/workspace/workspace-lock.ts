import { open, readFile } from 'fs/promises';
import { WorkspaceError, describeError, isNodeErrorWithCode } from '../../utils/errors.js';
import { remove } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';

export interface WorkspaceLock {
  readonly path: string;
  release(): Promise<void>;
}

export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // The process exists but belongs to someone else
    return isNodeErrorWithCode(error, 'EPERM');
  }
}

async function readHolder(path: string): Promise<number | null> {
  try {
    const pid = Number.parseInt((await readFile(path, 'utf8')).trim(), 10);
    return Number.isInteger(pid) && pid > 0 ? pid : null;
  } catch (error) {
    if (isNodeErrorWithCode(error, 'ENOENT')) {
      return null;
    }
    throw error;
  }
}

/**
 * Exclusive pid-file lock. A lock left behind by a dead process is reclaimed;
 * one held by a live process fails with WorkspaceError.
 */
export async function acquireWorkspaceLock(path: string, pid: number = process.pid): Promise<WorkspaceLock> {
  for (let attempt = 0; attempt < 2; attempt++) {
    try {
      const handle = await open(path, 'wx');
      try {
        await handle.writeFile(String(pid), 'utf8');
      } finally {
        await handle.close();
      }
      logger.debug(`Acquired workspace lock ${path}`);
      return {
        path,
        async release(): Promise<void> {
          if ((await readHolder(path)) === pid) {
            await remove(path);
            logger.debug(`Released workspace lock ${path}`);
          }
        }
      };
    } catch (error) {
      if (!isNodeErrorWithCode(error, 'EEXIST')) {
        throw new WorkspaceError(`Cannot create workspace lock ${path}: ${describeError(error)}`, { path });
      }
    }

    const holder = await readHolder(path);
    if (holder !== null && isProcessAlive(holder)) {
      throw new WorkspaceError(`The workspace is in use by process ${holder} (lock file ${path})`, { path, holder });
    }
    logger.debug(`Reclaiming stale workspace lock ${path}`, { holder });
    await remove(path);
  }

  throw new WorkspaceError(`Could not acquire workspace lock ${path}`, { path });
}
