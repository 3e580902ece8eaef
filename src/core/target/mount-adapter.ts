import { promises as fs } from 'fs';
import type { FileHandle } from 'fs/promises';
import { dirname, join } from 'path';
import { VOLUME_SIGNATURES } from '../../constants/index.js';
import { TargetIOError, isNodeErrorWithCode } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { DirectoryTargetAdapter } from './directory-adapter.js';
import type { RuntimeInfo, TargetKind } from './target-adapter.js';

const BOOT_OUT_VERSION = /(CircuitPython|MicroPython)\s+v?(\d+\.\d+(?:\.\d+)?)/;

/**
 * Target on a mounted board volume (CIRCUITPY). Packages live in `<mount>/lib`.
 * Writes are flushed one by one and `sync()` flushes every directory touched,
 * so the volume can be ejected right after the session.
 */
export class MountTargetAdapter extends DirectoryTargetAdapter {
  override readonly kind: TargetKind = 'mount';
  private readonly touchedDirs = new Set<string>();

  constructor(private readonly mountPoint: string) {
    super(join(mountPoint, VOLUME_SIGNATURES.LIB_DIR), { skipJunk: true });
  }

  override async getRuntimeInfo(): Promise<RuntimeInfo> {
    const info: RuntimeInfo = { implementation: null, version: null, mpyVersion: null, sysPath: [] };
    for (const marker of VOLUME_SIGNATURES.MARKER_FILES) {
      let content: string;
      try {
        content = await fs.readFile(join(this.mountPoint, marker), 'utf8');
      } catch (error) {
        logger.debug(`No ${marker} on ${this.mountPoint}`, { error });
        continue;
      }
      const match = content.match(BOOT_OUT_VERSION);
      if (match) {
        info.implementation = match[1].toLowerCase();
        info.version = match[2];
      }
    }
    return info;
  }

  override async sync(): Promise<void> {
    for (const dir of [...this.touchedDirs].sort().reverse()) {
      await this.fsyncDirectory(dir);
    }
    this.touchedDirs.clear();
  }

  protected override async writeLocal(localPath: string, content: Uint8Array): Promise<void> {
    const handle = await fs.open(localPath, 'w');
    try {
      await handle.writeFile(content);
      await handle.sync();
    } finally {
      await handle.close();
    }
    this.touched(dirname(localPath));
  }

  protected override touched(localDir: string): void {
    this.touchedDirs.add(localDir);
  }

  private async fsyncDirectory(dir: string): Promise<void> {
    let handle: FileHandle;
    try {
      handle = await fs.open(dir, 'r');
    } catch (error) {
      if (isNodeErrorWithCode(error, 'ENOENT')) {
        return;
      }
      throw new TargetIOError('sync', dir, error);
    }
    try {
      await handle.sync();
    } catch (error) {
      // Some platforms refuse fsync on directories
      if (!isNodeErrorWithCode(error, 'EPERM') && !isNodeErrorWithCode(error, 'EINVAL') && !isNodeErrorWithCode(error, 'EISDIR')) {
        throw new TargetIOError('sync', dir, error);
      }
      logger.debug(`fsync not supported for ${dir}`);
    } finally {
      await handle.close();
    }
  }
}
