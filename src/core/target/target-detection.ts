import { promises as fs } from 'fs';
import { homedir, platform, userInfo } from 'os';
import { basename, join } from 'path';
import { SerialPort } from 'serialport';
import { KNOWN_BOARD_SIGNATURES, VOLUME_SIGNATURES } from '../../constants/index.js';
import { NoTargetFoundError } from '../../utils/errors.js';
import { exists } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';

export interface SerialPortCandidate {
  path: string;
  vendorId?: string;
  productId?: string;
}

export type DetectedTarget =
  | { kind: 'serial'; port: string; label: string }
  | { kind: 'mount'; mount: string; label: string };

/**
 * Where detection looks. Replaced in tests.
 */
export interface DetectionProviders {
  listSerialPorts(): Promise<SerialPortCandidate[]>;
  listMountPoints(): Promise<string[]>;
  fileExists(path: string): Promise<boolean>;
}

export function matchBoardSignature(port: SerialPortCandidate): string | null {
  const vendorId = port.vendorId?.toLowerCase();
  const productId = port.productId?.toLowerCase();
  if (!vendorId) {
    return null;
  }
  const signature = KNOWN_BOARD_SIGNATURES.find(candidate =>
    candidate.vendorId === vendorId && (candidate.productId === undefined || candidate.productId === productId)
  );
  return signature ? signature.label : null;
}

const VOLUME_LABELS: readonly string[] = VOLUME_SIGNATURES.LABELS;

export async function isBoardVolume(mount: string, fileExists: DetectionProviders['fileExists']): Promise<boolean> {
  if (VOLUME_LABELS.includes(basename(mount))) {
    return true;
  }
  for (const marker of VOLUME_SIGNATURES.MARKER_FILES) {
    if (await fileExists(join(mount, marker))) {
      return true;
    }
  }
  return false;
}

/**
 * Find the single connected board. Zero or several candidates is an error.
 */
export async function detectTarget(providers: DetectionProviders = createDefaultProviders()): Promise<DetectedTarget> {
  const candidates: DetectedTarget[] = [];

  for (const port of await providers.listSerialPorts()) {
    const label = matchBoardSignature(port);
    if (label) {
      candidates.push({ kind: 'serial', port: port.path, label });
    }
  }
  for (const mount of await providers.listMountPoints()) {
    if (await isBoardVolume(mount, providers.fileExists)) {
      candidates.push({ kind: 'mount', mount, label: basename(mount) || mount });
    }
  }

  logger.debug('Target candidates', { candidates });
  if (candidates.length !== 1) {
    throw new NoTargetFoundError(candidates.map(describeCandidate));
  }
  return candidates[0];
}

export function describeCandidate(candidate: DetectedTarget): string {
  return candidate.kind === 'serial'
    ? `${candidate.port} (${candidate.label})`
    : `${candidate.mount} (${candidate.label})`;
}

export function createDefaultProviders(): DetectionProviders {
  return {
    listSerialPorts: async () => {
      const ports = await SerialPort.list();
      return ports.map(port => ({ path: port.path, vendorId: port.vendorId, productId: port.productId }));
    },
    listMountPoints,
    fileExists: exists
  };
}

async function listMountPoints(): Promise<string[]> {
  const os = platform();
  if (os === 'win32') {
    const drives: string[] = [];
    for (let code = 'D'.charCodeAt(0); code <= 'Z'.charCodeAt(0); code++) {
      const drive = `${String.fromCharCode(code)}:\\`;
      if (await exists(drive)) {
        drives.push(drive);
      }
    }
    return drives;
  }

  const parents = os === 'darwin'
    ? ['/Volumes']
    : [join('/media', userInfo().username), join('/run/media', userInfo().username), '/media', join(homedir(), 'mnt')];

  const mounts: string[] = [];
  for (const parent of parents) {
    let names: string[];
    try {
      names = await fs.readdir(parent);
    } catch {
      continue;
    }
    for (const name of names) {
      mounts.push(join(parent, name));
    }
  }
  return mounts;
}
