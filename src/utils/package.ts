import { readFileSync } from 'fs';
import { isPlainObject } from './guards.js';

let cachedVersion: string | undefined;

/**
 * Version from the package.json next to src/ (or dist/)
 */
export function getVersion(): string {
  if (cachedVersion === undefined) {
    try {
      const manifest: unknown = JSON.parse(readFileSync(new URL('../../package.json', import.meta.url), 'utf8'));
      cachedVersion = isPlainObject(manifest) && typeof manifest.version === 'string' ? manifest.version : '0.0.0';
    } catch {
      cachedVersion = '0.0.0';
    }
  }
  return cachedVersion;
}
