import { ValidationError } from './errors.js';
import { DIR_PATTERNS } from '../constants/index.js';

/**
 * A parsed requirement such as `adafruit-circuitpython-bus-device[extra]>=5.0; python_version>"3"`
 */
export interface DependencySpec {
  /** Normalized name */
  name: string;
  extras?: readonly string[];
  /** Comma separated specifier without surrounding parentheses, '' for any version */
  specifier: string;
  marker?: string;
}

export interface ParsedRequirement extends DependencySpec {
  /** The name as written */
  displayName: string;
}

const REQUIREMENT_REGEX = /^\s*([A-Za-z0-9](?:[A-Za-z0-9._-]*[A-Za-z0-9])?)\s*(?:\[([^\]]*)\])?\s*(.*?)\s*$/;
const NAME_RUN_REGEX = /[-_.]+/g;

/**
 * PEP 503 normalization: lowercase, runs of `-`, `_` and `.` become one `-`.
 */
export function normalizeDistName(name: string): string {
  return name.trim().replace(NAME_RUN_REGEX, '-').toLowerCase();
}

export function parseRequirement(requirement: string): ParsedRequirement {
  const semicolon = requirement.indexOf(';');
  const body = semicolon === -1 ? requirement : requirement.slice(0, semicolon);
  const marker = semicolon === -1 ? '' : requirement.slice(semicolon + 1).trim();

  const match = body.match(REQUIREMENT_REGEX);
  if (!match) {
    throw new ValidationError(`Invalid requirement: '${requirement}'`);
  }

  const [, displayName, rawExtras, rawSpecifier] = match;
  const parsed: ParsedRequirement = {
    displayName,
    name: normalizeDistName(displayName),
    specifier: normalizeSpecifier(rawSpecifier)
  };

  if (rawExtras !== undefined) {
    const extras = rawExtras.split(',').map(extra => extra.trim()).filter(extra => extra.length > 0);
    if (extras.length > 0) {
      parsed.extras = extras;
    }
  }
  if (marker) {
    parsed.marker = marker;
  }
  return parsed;
}

/**
 * Render a dependency back into `Requires-Dist` form.
 */
export function formatRequirement(dep: DependencySpec, displayName: string = dep.name): string {
  let text = displayName;
  if (dep.extras && dep.extras.length > 0) {
    text += `[${dep.extras.join(',')}]`;
  }
  if (dep.specifier) {
    text += dep.specifier;
  }
  if (dep.marker) {
    text += `; ${dep.marker}`;
  }
  return text;
}

/**
 * `<escaped name>-<escaped version>.dist-info`, the directory name pip uses.
 */
export function formatMetaDirName(displayName: string, version: string): string {
  const escapedName = displayName.replace(NAME_RUN_REGEX, '_');
  const escapedVersion = version.replace(/-/g, '_');
  return `${escapedName}-${escapedVersion}${DIR_PATTERNS.DIST_INFO_SUFFIX}`;
}

export function isMetaDirName(entryName: string): boolean {
  return entryName.endsWith(DIR_PATTERNS.DIST_INFO_SUFFIX) && parseMetaDirName(entryName) !== null;
}

/**
 * Split a dist-info directory name into normalized name and version.
 * Returns null for names that are not dist-info directories.
 */
export function parseMetaDirName(entryName: string): { name: string; version: string } | null {
  if (!entryName.endsWith(DIR_PATTERNS.DIST_INFO_SUFFIX)) {
    return null;
  }
  const stem = entryName.slice(0, -DIR_PATTERNS.DIST_INFO_SUFFIX.length);
  // Escaped versions never contain '-'
  const dash = stem.lastIndexOf('-');
  if (dash <= 0 || dash === stem.length - 1) {
    return null;
  }
  return {
    name: normalizeDistName(stem.slice(0, dash)),
    version: stem.slice(dash + 1)
  };
}

function normalizeSpecifier(raw: string): string {
  let specifier = raw.trim();
  // Direct references (`name @ url`) carry no version constraint
  if (specifier.startsWith('@')) {
    return '';
  }
  if (specifier.startsWith('(') && specifier.endsWith(')')) {
    specifier = specifier.slice(1, -1);
  }
  if (specifier && !/^(~=|==|!=|<=|>=|<|>|===)/.test(specifier)) {
    throw new ValidationError(`Invalid version specifier: '${raw.trim()}'`);
  }
  return specifier
    .split(',')
    .map(part => part.replace(/\s+/g, ''))
    .filter(part => part.length > 0)
    .join(',');
}
