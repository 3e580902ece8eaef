import * as pep440 from '@renovatebot/pep440';
import * as semver from 'semver';

/**
 * Version helpers for Python distribution versions (PEP 440).
 *
 * Precedence ignores the local label (`+cp1`), equality keeps it.
 */

export function splitLocalLabel(version: string): { publicVersion: string; local: string } {
  const plus = version.indexOf('+');
  if (plus === -1) {
    return { publicVersion: version, local: '' };
  }
  return { publicVersion: version.slice(0, plus), local: version.slice(plus + 1) };
}

export function isValidVersion(version: string): boolean {
  return pep440.valid(version) !== null;
}

/**
 * Total order over version strings. Unparseable versions sort before valid ones
 * and among themselves by plain string comparison.
 */
export function compareVersions(a: string, b: string): number {
  const left = splitLocalLabel(a);
  const right = splitLocalLabel(b);
  const leftValid = isValidVersion(left.publicVersion);
  const rightValid = isValidVersion(right.publicVersion);

  if (leftValid && rightValid) {
    const byPublic = pep440.compare(left.publicVersion, right.publicVersion);
    if (byPublic !== 0) {
      return byPublic < 0 ? -1 : 1;
    }
    return compareStrings(left.local.toLowerCase(), right.local.toLowerCase());
  }
  if (leftValid !== rightValid) {
    return leftValid ? 1 : -1;
  }
  return compareStrings(a, b);
}

export function versionsEqual(a: string, b: string): boolean {
  return compareVersions(a, b) === 0;
}

/**
 * Check a version against a specifier such as `>=1.0,<2`.
 * An empty specifier accepts everything, an unparseable version nothing.
 */
export function satisfiesSpecifier(version: string, specifier: string): boolean {
  const trimmed = specifier.trim();
  if (!trimmed) {
    return true;
  }
  const { publicVersion } = splitLocalLabel(version);
  if (!isValidVersion(publicVersion)) {
    return false;
  }
  try {
    return pep440.satisfies(publicVersion, trimmed);
  } catch {
    return false;
  }
}

export function isPrerelease(version: string): boolean {
  const explained = pep440.explain(splitLocalLabel(version).publicVersion);
  return explained !== null && (explained.is_prerelease || explained.is_devrelease);
}

/**
 * Highest version in the list, skipping pre-releases unless asked for.
 */
export function latestVersion(versions: Iterable<string>, includePrereleases = false): string | null {
  let best: string | null = null;
  for (const version of versions) {
    if (!includePrereleases && isPrerelease(version)) {
      continue;
    }
    if (best === null || compareVersions(version, best) > 0) {
      best = version;
    }
  }
  return best;
}

/**
 * Major component of an installer version (`24.0` → 24), or null when it has none.
 */
export function installerMajor(version: string): number | null {
  const coerced = semver.coerce(version);
  return coerced ? coerced.major : null;
}

function compareStrings(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}
