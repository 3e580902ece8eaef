import { mkdtemp } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import * as tar from 'tar';
import { createDistribution } from '../dist/distribution.js';
import { parseHeaders, serializeMetadata } from '../dist/metadata-file.js';
import { ValidationError } from '../../utils/errors.js';
import { ensureDir, exists, listDirectories, listFiles, readBinaryFile, readTextFile, remove, writeBinaryFile, writeTextFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { versionFromFilename } from './upstream-client.js';

export const LEGACY_ARCHIVE_SUFFIX = '.tar.gz';

export interface LegacySdistSource {
  /** Project name as requested */
  project: string;
  filename: string;
}

const SDIST_UPIP_IMPORT = /^[ \t]*(?:import[ \t]+sdist_upip|from[ \t]+sdist_upip[ \t]+import\b)[^\n]*\n?/gm;
const SDIST_UPIP_CMDCLASS = /[ \t]*cmdclass\s*=\s*\{[^}]*sdist_upip[^}]*\}\s*,?[ \t]*\n?/g;

/**
 * Drop the `sdist_upip` helper from a setup script; modern pip cannot import it.
 */
export function stripSdistUpip(setupSource: string): string {
  return setupSource.replace(SDIST_UPIP_IMPORT, '').replace(SDIST_UPIP_CMDCLASS, '');
}

export function synthesizeSetupPy(name: string, version: string, modules: readonly string[]): string {
  const moduleList = modules.map(module => JSON.stringify(module)).join(', ');
  return [
    'from setuptools import setup, find_packages',
    '',
    'setup(',
    `    name=${JSON.stringify(name)},`,
    `    version=${JSON.stringify(version)},`,
    '    packages=find_packages(),',
    `    py_modules=[${moduleList}],`,
    ')',
    ''
  ].join('\n');
}

/**
 * Repack an old-style sdist so that current pip can build it:
 * setup.py without `sdist_upip` (or a synthesized one) and a PKG-INFO.
 */
export async function rewriteLegacySdist(archive: Uint8Array, source: LegacySdistSource): Promise<Buffer> {
  if (!source.filename.endsWith(LEGACY_ARCHIVE_SUFFIX)) {
    throw new ValidationError(`'${source.filename}' is not a ${LEGACY_ARCHIVE_SUFFIX} archive`);
  }

  const workDir = await mkdtemp(join(tmpdir(), 'pipbridge-sdist-'));
  try {
    const inputPath = join(workDir, 'input.tar.gz');
    const extractDir = join(workDir, 'extract');
    const outputPath = join(workDir, source.filename);
    await writeBinaryFile(inputPath, archive);
    await ensureDir(extractDir);
    await tar.x({ file: inputPath, cwd: extractDir });

    const topDirs = await listDirectories(extractDir);
    const topFiles = await listFiles(extractDir);
    if (topDirs.length !== 1 || topFiles.length > 0) {
      throw new ValidationError(`'${source.filename}' does not contain a single top-level directory`);
    }
    const topDir = topDirs[0];
    const packageDir = join(extractDir, topDir);

    const pkgInfoPath = join(packageDir, 'PKG-INFO');
    let name = source.project;
    let version = versionFromFilename(source.filename, source.project) ?? '0.0.0';
    if (await exists(pkgInfoPath)) {
      const headers = parseHeaders(await readTextFile(pkgInfoPath));
      name = headers.get('name')?.[0] ?? name;
      version = headers.get('version')?.[0] ?? version;
    } else {
      await writeTextFile(pkgInfoPath, serializeMetadata(createDistribution({ displayName: name, version })));
      logger.debug(`Synthesized PKG-INFO for ${source.filename}`);
    }

    const setupPath = join(packageDir, 'setup.py');
    if (await exists(setupPath)) {
      await writeTextFile(setupPath, stripSdistUpip(await readTextFile(setupPath)));
    } else {
      const modules = (await listFiles(packageDir))
        .filter(file => file.endsWith('.py'))
        .map(file => file.slice(0, -'.py'.length))
        .sort();
      await writeTextFile(setupPath, synthesizeSetupPy(name, version, modules));
      logger.debug(`Synthesized setup.py for ${source.filename}`);
    }

    await tar.c({ gzip: true, portable: true, cwd: extractDir, file: outputPath }, [topDir]);
    return Buffer.from(await readBinaryFile(outputPath));
  } finally {
    await remove(workDir);
  }
}
