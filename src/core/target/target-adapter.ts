import { posix } from 'path';
import { WORKSPACE_TOOLING } from '../../constants/index.js';
import { TargetIOError, TargetOperation } from '../../utils/errors.js';
import { normalizeDistName } from '../../utils/package-name.js';
import { DirEntry, MetadataSource, scanDistributions } from '../dist/dist-scanner.js';
import type { TargetState } from '../dist/distribution.js';

export type TargetKind = 'directory' | 'mount' | 'serial';

export interface RuntimeInfo {
  /** `micropython`, `circuitpython`, or null when unknown */
  implementation: string | null;
  version: string | null;
  /** `.mpy` format version reported by MicroPython */
  mpyVersion: number | null;
  sysPath: string[];
}

/**
 * File operations on a target's package root. Paths are POSIX and relative
 * to the root; every failure surfaces as TargetIOError.
 */
export interface TargetAdapter extends MetadataSource {
  readonly kind: TargetKind;
  /** Human readable location, e.g. `/dev/ttyACM0:/lib` */
  readonly description: string;

  listDistributions(): Promise<TargetState>;
  writeFile(path: string, content: Uint8Array): Promise<void>;
  /** Missing files are not an error */
  deleteFile(path: string): Promise<void>;
  ensureDir(dir: string): Promise<void>;
  /** Returns whether the directory was removed */
  removeDirIfEmpty(dir: string): Promise<boolean>;
  sync(): Promise<void>;
  supportsStreamingWrite(): boolean;
  getRuntimeInfo(): Promise<RuntimeInfo>;
  close(): Promise<void>;
}

const TOOLING_NAMES = new Set<string>(WORKSPACE_TOOLING.DISTS.map(name => normalizeDistName(name)));

/**
 * Whether a normalized distribution name belongs to pip's own tooling.
 */
export function isToolingDist(name: string): boolean {
  return TOOLING_NAMES.has(name);
}

/**
 * Shared path checking and state scanning for the transports.
 */
export abstract class BaseTargetAdapter implements TargetAdapter {
  abstract readonly kind: TargetKind;
  abstract readonly description: string;

  abstract listEntries(dir: string): Promise<DirEntry[]>;
  abstract readFile(path: string): Promise<Uint8Array>;
  abstract writeFile(path: string, content: Uint8Array): Promise<void>;
  abstract deleteFile(path: string): Promise<void>;
  abstract ensureDir(dir: string): Promise<void>;
  abstract removeDirIfEmpty(dir: string): Promise<boolean>;
  abstract getRuntimeInfo(): Promise<RuntimeInfo>;

  async listDistributions(): Promise<TargetState> {
    return scanDistributions(this, { ignore: isToolingDist });
  }

  async sync(): Promise<void> {
    // Nothing buffered by default
  }

  supportsStreamingWrite(): boolean {
    return true;
  }

  async close(): Promise<void> {
    // No resources by default
  }

  /**
   * Normalize a root-relative path, rejecting anything that leaves the root.
   * '' and '.' mean the root itself.
   */
  protected checkPath(path: string, operation: TargetOperation): string {
    const slashed = path.replace(/\\/g, '/');
    if (slashed.startsWith('/')) {
      throw new TargetIOError(operation, path, new Error('absolute paths are not allowed'));
    }
    const normalized = posix.normalize(slashed === '' ? '.' : slashed).replace(/\/+$/, '');
    if (normalized === '..' || normalized.startsWith('../')) {
      throw new TargetIOError(operation, path, new Error('path escapes the package root'));
    }
    return normalized === '.' ? '' : normalized;
  }
}
