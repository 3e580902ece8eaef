import { readFile } from 'fs/promises';
import { posix } from 'path';
import { SERIAL_DEFAULTS, TIMEOUTS } from '../../constants/index.js';
import { TargetIOError, TargetOperation } from '../../utils/errors.js';
import { isPlainObject } from '../../utils/guards.js';
import { logger } from '../../utils/logger.js';
import type { DirEntry } from '../dist/dist-scanner.js';
import { ReplProtocol } from './repl-protocol.js';
import type { SerialLink } from './serial-link.js';
import { BaseTargetAdapter, RuntimeInfo, TargetKind } from './target-adapter.js';

const HELPER_URL = new URL('../../../resources/serial-helper.py', import.meta.url);

export async function loadHelperSource(): Promise<string> {
  return readFile(HELPER_URL, 'utf8');
}

export interface SerialConnectOptions {
  /** Port name used in messages */
  portName: string;
  timeoutMs?: number;
  helperSource?: string;
  writeChunkBytes?: number;
}

/**
 * Package root on the first `sys.path` entry that mentions `lib`.
 */
export function pickLibDir(sysPath: readonly string[]): string {
  return sysPath.find(entry => entry.includes('lib')) ?? SERIAL_DEFAULTS.DEFAULT_LIB_DIR;
}

/**
 * Target reached through the board's REPL over a serial link.
 */
export class SerialTargetAdapter extends BaseTargetAdapter {
  readonly kind: TargetKind = 'serial';
  readonly description: string;

  private constructor(
    private readonly link: SerialLink,
    private readonly protocol: ReplProtocol,
    private readonly root: string,
    private readonly info: RuntimeInfo,
    portName: string,
    private readonly writeChunkBytes: number
  ) {
    super();
    this.description = `${portName}:${root}`;
  }

  static async connect(link: SerialLink, options: SerialConnectOptions): Promise<SerialTargetAdapter> {
    const protocol = new ReplProtocol(link, options.timeoutMs ?? TIMEOUTS.SERIAL_MS);
    try {
      await protocol.start(options.helperSource ?? await loadHelperSource());
      const info = parseRuntimeInfo(await protocol.request('info'));
      const root = pickLibDir(info.sysPath);
      logger.debug(`Connected to ${info.implementation ?? 'unknown'} ${info.version ?? ''} on ${options.portName}, package root ${root}`);
      return new SerialTargetAdapter(link, protocol, root, info, options.portName, options.writeChunkBytes ?? SERIAL_DEFAULTS.WRITE_CHUNK_BYTES);
    } catch (error) {
      await link.close().catch(closeError => logger.debug('Failed to close serial link', { error: closeError }));
      throw new TargetIOError('connect', options.portName, error);
    }
  }

  async listEntries(dir: string): Promise<DirEntry[]> {
    const rel = this.checkPath(dir, 'list');
    const result = await this.call('list', rel, 'ls', { path: this.toDevice(rel) });
    if (!Array.isArray(result)) {
      throw new TargetIOError('list', rel, new Error('malformed listing'));
    }
    const entries: DirEntry[] = [];
    for (const item of result) {
      if (Array.isArray(item) && typeof item[0] === 'string' && typeof item[1] === 'boolean') {
        entries.push({ name: item[0], isDirectory: item[1] });
      }
    }
    return entries;
  }

  async readFile(path: string): Promise<Uint8Array> {
    const rel = this.checkPath(path, 'read');
    const chunks: Buffer[] = [];
    for (let offset = 0; ; offset += SERIAL_DEFAULTS.READ_CHUNK_BYTES) {
      const result = await this.call('read', rel, 'read', {
        path: this.toDevice(rel),
        offset,
        size: SERIAL_DEFAULTS.READ_CHUNK_BYTES
      });
      if (typeof result !== 'string') {
        throw new TargetIOError('read', rel, new Error('malformed read response'));
      }
      const chunk = Buffer.from(result, 'base64');
      chunks.push(chunk);
      if (chunk.length < SERIAL_DEFAULTS.READ_CHUNK_BYTES) {
        break;
      }
    }
    return Buffer.concat(chunks);
  }

  async writeFile(path: string, content: Uint8Array): Promise<void> {
    const rel = this.checkPath(path, 'write');
    const parent = posix.dirname(rel);
    if (parent !== '.') {
      await this.ensureDir(parent);
    }

    const data = Buffer.from(content);
    let offset = 0;
    do {
      const chunk = data.subarray(offset, offset + this.writeChunkBytes);
      await this.call('write', rel, 'write', {
        path: this.toDevice(rel),
        data: chunk.toString('base64'),
        append: offset > 0
      });
      offset += this.writeChunkBytes;
    } while (offset < data.length);
    logger.debug(`Wrote ${rel} (${data.length} bytes) to ${this.description}`);
  }

  async deleteFile(path: string): Promise<void> {
    const rel = this.checkPath(path, 'delete');
    await this.call('delete', rel, 'rm', { path: this.toDevice(rel) });
  }

  async ensureDir(dir: string): Promise<void> {
    const rel = this.checkPath(dir, 'mkdir');
    await this.call('mkdir', rel, 'mkdir', { path: this.toDevice(rel) });
  }

  async removeDirIfEmpty(dir: string): Promise<boolean> {
    const rel = this.checkPath(dir, 'rmdir');
    if (rel === '') {
      return false;
    }
    const result = await this.call('rmdir', rel, 'rmdir', { path: this.toDevice(rel) });
    return result === true;
  }

  override async sync(): Promise<void> {
    await this.call('sync', '', 'sync');
  }

  override supportsStreamingWrite(): boolean {
    return false;
  }

  async getRuntimeInfo(): Promise<RuntimeInfo> {
    return this.info;
  }

  override async close(): Promise<void> {
    try {
      await this.link.close();
    } catch (error) {
      throw new TargetIOError('connect', this.description, error);
    }
  }

  private toDevice(rel: string): string {
    return rel === '' ? this.root : posix.join(this.root, rel);
  }

  private async call(operation: TargetOperation, rel: string, op: string, args: Record<string, unknown> = {}): Promise<unknown> {
    try {
      return await this.protocol.request(op, args);
    } catch (error) {
      throw new TargetIOError(operation, rel, error);
    }
  }
}

function parseRuntimeInfo(value: unknown): RuntimeInfo {
  if (!isPlainObject(value)) {
    throw new Error('malformed runtime info');
  }
  const sysPath = Array.isArray(value.path) ? value.path.filter((entry): entry is string => typeof entry === 'string') : [];
  return {
    implementation: typeof value.implementation === 'string' ? value.implementation : null,
    version: typeof value.version === 'string' ? value.version : null,
    mpyVersion: typeof value.mpy === 'number' ? value.mpy : null,
    sysPath
  };
}
