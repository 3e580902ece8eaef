import { mkdtemp, mkdir, writeFile } from 'node:fs/promises';
import { inflateRawSync } from 'node:zlib';
import { tmpdir } from 'node:os';
import path from 'node:path';
import type { DirEntry, MetadataSource } from '../src/core/dist/dist-scanner.js';

const encoder = new TextEncoder();
const decoder = new TextDecoder();

export function bytes(text: string): Uint8Array {
  return encoder.encode(text);
}

export function text(content: Uint8Array): string {
  return decoder.decode(content);
}

export async function makeTempDir(prefix: string): Promise<string> {
  return mkdtemp(path.join(tmpdir(), `pipbridge-${prefix}-`));
}

/**
 * A package root held in memory, keyed by POSIX relative path.
 */
export class MemorySource implements MetadataSource {
  readonly files = new Map<string, Uint8Array>();

  constructor(files: Record<string, string> = {}) {
    for (const [filePath, content] of Object.entries(files)) {
      this.files.set(filePath, bytes(content));
    }
  }

  async listEntries(dir: string): Promise<DirEntry[]> {
    const prefix = dir ? `${dir}/` : '';
    const seen = new Map<string, boolean>();
    for (const filePath of this.files.keys()) {
      if (!filePath.startsWith(prefix)) continue;
      const rest = filePath.slice(prefix.length);
      const slash = rest.indexOf('/');
      if (slash === -1) {
        seen.set(rest, false);
      } else {
        seen.set(rest.slice(0, slash), true);
      }
    }
    return [...seen].map(([name, isDirectory]) => ({ name, isDirectory }));
  }

  async readFile(filePath: string): Promise<Uint8Array> {
    const content = this.files.get(filePath);
    if (!content) {
      throw new Error(`ENOENT: ${filePath}`);
    }
    return content;
  }
}

/**
 * Write files under a directory, creating parents.
 */
export async function writeTree(root: string, files: Record<string, string>): Promise<void> {
  for (const [relPath, content] of Object.entries(files)) {
    const full = path.join(root, ...relPath.split('/'));
    await mkdir(path.dirname(full), { recursive: true });
    await writeFile(full, content, 'utf8');
  }
}

/**
 * METADATA + RECORD of a minimal installed distribution, as path → content.
 */
export function distInfoFiles(
  name: string,
  version: string,
  payload: Record<string, string> = {},
  requires: string[] = []
): Record<string, string> {
  const metaDir = `${name.replace(/[-_.]+/g, '_')}-${version}.dist-info`;
  const metadata = [
    'Metadata-Version: 2.1',
    `Name: ${name}`,
    `Version: ${version}`,
    ...requires.map(req => `Requires-Dist: ${req}`)
  ].join('\n') + '\n';
  const record = [
    ...Object.keys(payload).map(filePath => `${filePath},,`),
    `${metaDir}/METADATA,,`,
    `${metaDir}/RECORD,,`
  ].join('\n') + '\n';
  return {
    ...payload,
    [`${metaDir}/METADATA`]: metadata,
    [`${metaDir}/RECORD`]: record
  };
}

/**
 * Entries of a zip archive as name → bytes, read from the central directory.
 */
export function readZipEntries(zip: Buffer): Map<string, Buffer> {
  let eocd = -1;
  for (let i = zip.length - 22; i >= Math.max(0, zip.length - 0xffff - 22); i -= 1) {
    if (zip.readUInt32LE(i) === 0x06054b50) {
      eocd = i;
      break;
    }
  }
  if (eocd === -1) {
    throw new Error('invalid zip: end-of-central-directory signature not found');
  }

  const entries = new Map<string, Buffer>();
  const total = zip.readUInt16LE(eocd + 10);
  let cursor = zip.readUInt32LE(eocd + 16);
  for (let i = 0; i < total; i += 1) {
    const method = zip.readUInt16LE(cursor + 10);
    const compressedSize = zip.readUInt32LE(cursor + 20);
    const nameLength = zip.readUInt16LE(cursor + 28);
    const extraLength = zip.readUInt16LE(cursor + 30);
    const commentLength = zip.readUInt16LE(cursor + 32);
    const localOffset = zip.readUInt32LE(cursor + 42);
    const name = zip.toString('utf8', cursor + 46, cursor + 46 + nameLength);

    const dataOffset = localOffset + 30 + zip.readUInt16LE(localOffset + 26) + zip.readUInt16LE(localOffset + 28);
    const data = zip.subarray(dataOffset, dataOffset + compressedSize);
    entries.set(name, method === 8 ? inflateRawSync(data) : Buffer.from(data));

    cursor += 46 + nameLength + extraLength + commentLength;
  }
  return entries;
}
