import { promises as fs } from 'fs';
import { dirname, join } from 'path';
import { isJunk } from 'junk';
import { TargetIOError, TargetOperation, isNodeErrorWithCode } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { DirEntry } from '../dist/dist-scanner.js';
import { BaseTargetAdapter, RuntimeInfo, TargetKind } from './target-adapter.js';

export interface DirectoryAdapterOptions {
  /** Leave OS litter (.DS_Store, Thumbs.db, ...) out of listings */
  skipJunk?: boolean;
}

/**
 * Target backed by a local directory.
 */
export class DirectoryTargetAdapter extends BaseTargetAdapter {
  readonly kind: TargetKind = 'directory';
  readonly description: string;

  constructor(protected readonly root: string, private readonly options: DirectoryAdapterOptions = {}) {
    super();
    this.description = root;
  }

  async listEntries(dir: string): Promise<DirEntry[]> {
    const rel = this.checkPath(dir, 'list');
    try {
      const entries = await fs.readdir(this.toLocal(rel), { withFileTypes: true });
      return entries
        .filter(entry => !(this.options.skipJunk && isJunk(entry.name)))
        .map(entry => ({ name: entry.name, isDirectory: entry.isDirectory() }));
    } catch (error) {
      if (isNodeErrorWithCode(error, 'ENOENT')) {
        return [];
      }
      throw new TargetIOError('list', rel, error);
    }
  }

  async readFile(path: string): Promise<Uint8Array> {
    const rel = this.checkPath(path, 'read');
    return this.wrap('read', rel, () => fs.readFile(this.toLocal(rel)));
  }

  async writeFile(path: string, content: Uint8Array): Promise<void> {
    const rel = this.checkPath(path, 'write');
    const local = this.toLocal(rel);
    await this.wrap('write', rel, async () => {
      await fs.mkdir(dirname(local), { recursive: true });
      await this.writeLocal(local, content);
    });
    logger.debug(`Wrote ${rel} (${content.byteLength} bytes) to ${this.description}`);
  }

  async deleteFile(path: string): Promise<void> {
    const rel = this.checkPath(path, 'delete');
    try {
      await fs.unlink(this.toLocal(rel));
      this.touched(dirname(this.toLocal(rel)));
    } catch (error) {
      if (isNodeErrorWithCode(error, 'ENOENT')) {
        return;
      }
      throw new TargetIOError('delete', rel, error);
    }
  }

  async ensureDir(dir: string): Promise<void> {
    const rel = this.checkPath(dir, 'mkdir');
    await this.wrap('mkdir', rel, () => fs.mkdir(this.toLocal(rel), { recursive: true }));
  }

  async removeDirIfEmpty(dir: string): Promise<boolean> {
    const rel = this.checkPath(dir, 'rmdir');
    if (rel === '') {
      return false;
    }
    try {
      await fs.rmdir(this.toLocal(rel));
      this.touched(dirname(this.toLocal(rel)));
      return true;
    } catch (error) {
      if (isNodeErrorWithCode(error, 'ENOENT') || isNodeErrorWithCode(error, 'ENOTEMPTY') || isNodeErrorWithCode(error, 'EEXIST')) {
        return false;
      }
      throw new TargetIOError('rmdir', rel, error);
    }
  }

  async getRuntimeInfo(): Promise<RuntimeInfo> {
    return { implementation: null, version: null, mpyVersion: null, sysPath: [] };
  }

  protected async writeLocal(localPath: string, content: Uint8Array): Promise<void> {
    await fs.writeFile(localPath, content);
  }

  /** Called with every local directory whose entries changed */
  protected touched(_localDir: string): void {
    // Plain directories need no bookkeeping
  }

  protected toLocal(rel: string): string {
    return rel === '' ? this.root : join(this.root, ...rel.split('/'));
  }

  protected async wrap<T>(operation: TargetOperation, rel: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw new TargetIOError(operation, rel, error);
    }
  }
}
