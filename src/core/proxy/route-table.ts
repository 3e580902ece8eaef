import { DEFAULT_DUMMY_PACKAGES, INDEX_URLS } from '../../constants/index.js';
import { ValidationError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { normalizeDistName, ParsedRequirement, parseRequirement } from '../../utils/package-name.js';

export type UpstreamKind = 'simple' | 'legacy-json';

export interface UpstreamIndex {
  readonly url: string;
  /** `simple`: PEP 503/691 simple API; `legacy-json`: PyPI style `/<name>/json` */
  readonly kind: UpstreamKind;
  /** Serve this index's `.tar.gz` sdists rewritten for modern pip */
  readonly legacyArchives: boolean;
}

/**
 * Where each package comes from. Built once per session and only read while serving.
 */
export interface ProxyRouteTable {
  readonly indexes: readonly UpstreamIndex[];
  /** Normalized names served as empty placeholder wheels */
  readonly dummyPackages: ReadonlySet<string>;
  /** Normalized name → index URLs never consulted for it */
  readonly excludedIndexes: ReadonlyMap<string, ReadonlySet<string>>;
  /** Normalized name → specifier requested by the user */
  readonly constraints: ReadonlyMap<string, string>;
}

export interface RouteTableInput {
  indexUrl?: string;
  extraIndexUrls?: string[];
  noMpOrg?: boolean;
  dummyPackages?: string[];
  excludedIndexes?: Record<string, string[]>;
  /** Requirement specifiers given on the command line */
  specs?: string[];
}

export function normalizeIndexUrl(url: string): string {
  return url.trim().replace(/\/+$/, '');
}

export function buildRouteTable(input: RouteTableInput = {}): ProxyRouteTable {
  const indexes: UpstreamIndex[] = [];
  const seen = new Set<string>();
  const addIndex = (index: UpstreamIndex): void => {
    if (!seen.has(index.url)) {
      seen.add(index.url);
      indexes.push(Object.freeze(index));
    }
  };

  if (!input.noMpOrg) {
    addIndex({ url: INDEX_URLS.MP_ORG, kind: 'legacy-json', legacyArchives: true });
  }
  addIndex({ url: normalizeIndexUrl(input.indexUrl ?? INDEX_URLS.PYPI_SIMPLE), kind: 'simple', legacyArchives: false });
  for (const url of input.extraIndexUrls ?? []) {
    addIndex({ url: normalizeIndexUrl(url), kind: 'simple', legacyArchives: false });
  }

  const dummyPackages = new Set<string>([...DEFAULT_DUMMY_PACKAGES, ...(input.dummyPackages ?? [])].map(normalizeDistName));

  const excludedIndexes = new Map<string, ReadonlySet<string>>();
  for (const [name, urls] of Object.entries(input.excludedIndexes ?? {})) {
    excludedIndexes.set(normalizeDistName(name), new Set(urls.map(normalizeIndexUrl)));
  }

  const constraints = new Map<string, string>();
  for (const spec of input.specs ?? []) {
    const requirement = constrainingRequirement(spec);
    if (!requirement?.specifier) {
      continue;
    }
    const existing = constraints.get(requirement.name);
    constraints.set(requirement.name, existing ? `${existing},${requirement.specifier}` : requirement.specifier);
  }

  return Object.freeze({
    indexes: Object.freeze(indexes),
    dummyPackages,
    excludedIndexes,
    constraints
  });
}

/**
 * Parsed `<name>[<specifier>]`, or null for paths, URLs and anything else pip
 * takes that carries no constraint.
 */
function constrainingRequirement(spec: string): ParsedRequirement | null {
  try {
    return parseRequirement(spec);
  } catch (error) {
    if (!(error instanceof ValidationError)) {
      throw error;
    }
    logger.debug(`No index constraint from '${spec}': ${error.message}`);
    return null;
  }
}

export function isDummyPackage(table: ProxyRouteTable, name: string): boolean {
  return table.dummyPackages.has(normalizeDistName(name));
}

export function isIndexExcluded(table: ProxyRouteTable, name: string, index: UpstreamIndex): boolean {
  return table.excludedIndexes.get(normalizeDistName(name))?.has(index.url) ?? false;
}

export function constraintFor(table: ProxyRouteTable, name: string): string {
  return table.constraints.get(normalizeDistName(name)) ?? '';
}
