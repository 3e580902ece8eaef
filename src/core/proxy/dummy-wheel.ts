import archiver from 'archiver';
import { DIR_PATTERNS, META_FILES } from '../../constants/index.js';
import { createDistribution } from '../dist/distribution.js';
import { renderDistInfo, RenderedFile } from '../dist/dist-scanner.js';

const WHEEL_TAG = 'py3-none-any';
// Fixed so identical requests produce identical bytes
const ENTRY_DATE = new Date('2020-01-01T00:00:00Z');

const WHEEL_FILE = [
  'Wheel-Version: 1.0',
  'Generator: pipbridge',
  'Root-Is-Purelib: true',
  `Tag: ${WHEEL_TAG}`
].join('\n') + '\n';

export function dummyWheelFilename(name: string, version: string): string {
  const metaDir = createDistribution({ displayName: name, version }).metaDirName;
  return `${metaDir.slice(0, -DIR_PATTERNS.DIST_INFO_SUFFIX.length)}-${WHEEL_TAG}.whl`;
}

/**
 * Contents of a placeholder wheel: a dist-info directory and nothing else.
 */
export async function dummyWheelEntries(name: string, version: string): Promise<RenderedFile[]> {
  const dist = createDistribution({ displayName: name, version });
  return renderDistInfo(dist, { extraFiles: { [META_FILES.WHEEL]: WHEEL_FILE } });
}

export async function buildDummyWheel(name: string, version: string): Promise<Buffer> {
  const entries = await dummyWheelEntries(name, version);
  const archive = archiver('zip', { zlib: { level: 9 } });

  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    archive.on('data', (chunk: Buffer) => chunks.push(chunk));
    archive.on('end', () => resolve(Buffer.concat(chunks)));
    archive.on('error', reject);

    for (const entry of entries) {
      archive.append(Buffer.from(entry.content), { name: entry.path, date: ENTRY_DATE });
    }

    archive.finalize().catch(reject);
  });
}
