import { UpstreamUnreachableError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { normalizeDistName } from '../../utils/package-name.js';
import { compareVersions, satisfiesSpecifier } from '../../utils/version.js';
import { constraintFor, isDummyPackage, isIndexExcluded, ProxyRouteTable, UpstreamIndex } from './route-table.js';
import type { UpstreamClient, UpstreamFile } from './upstream-client.js';

export const FALLBACK_DUMMY_VERSION = '0.0.0';

export type ResolvedProject =
  | { kind: 'dummy'; name: string; versions: string[] }
  | { kind: 'upstream'; name: string; index: UpstreamIndex; files: UpstreamFile[] };

/**
 * Decide which upstream serves a project.
 * A dummy override wins; otherwise the first non-excluded, reachable index
 * offering a version that satisfies the user's constraint.
 */
export async function resolveProject(
  table: ProxyRouteTable,
  client: UpstreamClient,
  name: string
): Promise<ResolvedProject | null> {
  const normalized = normalizeDistName(name);

  if (isDummyPackage(table, normalized)) {
    return { kind: 'dummy', name: normalized, versions: await mirrorDummyVersions(table, client, normalized) };
  }

  const constraint = constraintFor(table, normalized);
  for (const index of table.indexes) {
    if (isIndexExcluded(table, normalized, index)) {
      logger.debug(`Skipping ${index.url} for ${normalized} (excluded)`);
      continue;
    }

    const project = await fetchTolerant(client, index, normalized);
    if (!project) {
      continue;
    }

    const offered = project.files.some(file =>
      !file.yanked && file.version !== null && satisfiesSpecifier(file.version, constraint)
    );
    if (offered) {
      logger.debug(`Serving ${normalized} from ${index.url}`);
      return { kind: 'upstream', name: normalized, index, files: project.files };
    }
    logger.debug(`${index.url} has no version of ${normalized} matching '${constraint || '*'}'`);
  }

  return null;
}

/**
 * Versions a placeholder wheel is offered in: the first reachable upstream
 * listing, else a single fallback version.
 */
async function mirrorDummyVersions(table: ProxyRouteTable, client: UpstreamClient, name: string): Promise<string[]> {
  for (const index of table.indexes) {
    if (isIndexExcluded(table, name, index)) {
      continue;
    }
    const project = await fetchTolerant(client, index, name);
    if (!project) {
      continue;
    }
    const versions = new Set<string>();
    for (const file of project.files) {
      if (!file.yanked && file.version !== null) {
        versions.add(file.version);
      }
    }
    if (versions.size > 0) {
      return [...versions].sort(compareVersions);
    }
  }
  return [FALLBACK_DUMMY_VERSION];
}

async function fetchTolerant(client: UpstreamClient, index: UpstreamIndex, name: string) {
  try {
    return await client.fetchProject(index, name);
  } catch (error) {
    if (error instanceof UpstreamUnreachableError) {
      logger.warn(error.message);
      return null;
    }
    throw error;
  }
}
