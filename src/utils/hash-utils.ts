/**
 * Hash Utilities Module
 * Content hashes in the forms used by wheel RECORD files and index links
 */

import { createSHA256, md5 } from 'hash-wasm';

/**
 * RECORD-style hash: `sha256=<urlsafe base64 without padding>`
 */
export async function calculateRecordHash(content: Uint8Array): Promise<string> {
  const hasher = await createSHA256();
  hasher.init();
  hasher.update(content);
  const digest = hasher.digest('binary');
  return `sha256=${Buffer.from(digest).toString('base64url')}`;
}

export async function calculateCacheKey(...parts: string[]): Promise<string> {
  return md5(parts.join('\n'));
}
